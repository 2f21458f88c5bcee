const mockClient = {
    request: jest.fn(),
};

const mockAxiosCreate = jest.fn(() => mockClient);

const mockLogger = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(),
};
mockLogger.child.mockImplementation(() => mockLogger);

jest.mock("axios", () => ({
    __esModule: true,
    default: {
        create: mockAxiosCreate,
    },
}));

jest.mock("../../utils/logger", () => ({
    logger: mockLogger,
}));

import { createHash } from "node:crypto";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fixture, reply } from "../../__tests__/helpers";
import { Album } from "../../models/album";
import { Track } from "../../models/media";
import { Playlist, UserPlaylist } from "../../models/playlist";
import { LoggedInUser, PlaylistCreator } from "../../models/user";
import {
    AuthenticationError,
    ConfigError,
    InvalidISRC,
    InvalidUPC,
    LoginTimeoutError,
    ObjectNotFound,
} from "../../utils/errors";
import { Session } from "../session";

const SESSION_INFO = { sessionId: "test-session", countryCode: "US", userId: 9001 };

const DEVICE_AUTHORIZATION = {
    deviceCode: "test-device-code",
    userCode: "ABCDE",
    verificationUri: "link.tidal.com",
    verificationUriComplete: "link.tidal.com/ABCDE",
    expiresIn: 300,
    interval: 0,
};

const EXPIRED = {
    status: 401,
    subStatus: 11003,
    userMessage: "The token has expired. (Expired on time)",
};

const TOKEN = {
    access_token: "test-access-token",
    refresh_token: "test-refresh-token",
    token_type: "Bearer",
    expires_in: 604800,
};

/** Queues the two responses that load session info after a login. */
function queueSessionInfo(): void {
    mockClient.request
        .mockResolvedValueOnce(reply(200, SESSION_INFO))
        .mockResolvedValueOnce(reply(200, fixture("user")));
}

function sentFields(callIndex: number): URLSearchParams {
    const data: unknown = mockClient.request.mock.calls[callIndex][0].data;
    if (!(data instanceof URLSearchParams)) {
        throw new Error(`Call ${callIndex} did not send a form body`);
    }
    return data;
}

function deviceSession(): Session {
    return new Session({ clientId: "test-client-id", clientSecret: "test-secret" });
}

async function loggedInSession(): Promise<Session> {
    const session = deviceSession();
    queueSessionInfo();
    await session.loadOAuthSession("Bearer", "test-access-token", "test-refresh-token");
    return session;
}

describe("session", () => {
    beforeEach(() => {
        jest.clearAllMocks();
        mockClient.request.mockReset();
    });

    describe("device login", () => {
        it("polls until the user approves and loads the account", async () => {
            const session = deviceSession();
            const notify = jest.fn();
            mockClient.request
                .mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION))
                .mockResolvedValueOnce(reply(400, { error: "authorization_pending" }))
                .mockResolvedValueOnce(reply(200, TOKEN));
            queueSessionInfo();

            await session.loginOAuthSimple(notify);

            expect(notify).toHaveBeenCalledWith(
                "Visit https://link.tidal.com/ABCDE to log in, the code will expire in 300 seconds",
            );
            expect(mockClient.request.mock.calls[0][0].url).toBe(
                "https://auth.tidal.com/v1/oauth2/device_authorization",
            );
            expect(sentFields(0).toString()).toBe("client_id=test-client-id&scope=r_usr+w_usr+w_sub");
            expect(sentFields(2).get("grant_type")).toBe(
                "urn:ietf:params:oauth:grant-type:device_code",
            );
            expect(sentFields(2).get("device_code")).toBe("test-device-code");
            expect(sentFields(2).get("client_secret")).toBe("test-secret");

            expect(session.accessToken).toBe("test-access-token");
            expect(session.refreshToken).toBe("test-refresh-token");
            expect(session.sessionId).toBe("test-session");
            expect(session.countryCode).toBe("US");
            expect(session.user).toBeInstanceOf(LoggedInUser);
            expect(session.user?.username).toBe("listener@example.com");
            expect(session.expiryTime?.getTime()).toBeGreaterThan(Date.now());
        });

        it("hands back the link before polling starts", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION))
                .mockResolvedValueOnce(reply(400, { error: "expired_token" }));

            const { link, done } = await session.loginOAuth();

            expect(link).toEqual(DEVICE_AUTHORIZATION);
            await expect(done).rejects.toThrow(LoginTimeoutError);
            await expect(done).rejects.toThrow("You took too long to log in");
        });

        it("stops on a denied login", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION))
                .mockResolvedValueOnce(
                    reply(400, { error: "access_denied", error_description: "User denied access" }),
                );

            await expect(session.loginOAuthSimple(jest.fn())).rejects.toThrow("User denied access");
        });

        it("keeps polling when asked to slow down", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION))
                .mockResolvedValueOnce(reply(400, { error: "slow_down" }))
                .mockResolvedValueOnce(reply(200, TOKEN));
            queueSessionInfo();

            await session.loginOAuthSimple(jest.fn());

            expect(mockClient.request.mock.calls[1][0].url).toBe(
                "https://auth.tidal.com/v1/oauth2/token",
            );
            expect(mockClient.request.mock.calls[2][0].url).toBe(
                "https://auth.tidal.com/v1/oauth2/token",
            );
            expect(session.accessToken).toBe("test-access-token");
        });

        it("times out once the codes expire without approval", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, { ...DEVICE_AUTHORIZATION, expiresIn: 0.05 }))
                .mockResolvedValue(reply(400, { error: "authorization_pending" }));

            await expect(session.loginOAuthSimple(jest.fn())).rejects.toThrow(LoginTimeoutError);

            const urls = mockClient.request.mock.calls.map((call) => call[0].url);
            expect(urls.length).toBeGreaterThanOrEqual(2);
            expect(urls.slice(1).every((url) => url === "https://auth.tidal.com/v1/oauth2/token")).toBe(
                true,
            );
            expect(session.accessToken).toBeNull();
        });

        it("does not start polling when notify throws", async () => {
            const session = deviceSession();
            mockClient.request.mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION));
            const notify = jest.fn(() => {
                throw new Error("notify failed");
            });

            await expect(session.loginOAuthSimple(notify)).rejects.toThrow("notify failed");
            expect(mockClient.request).toHaveBeenCalledTimes(1);
        });

        it("needs a client id", async () => {
            await expect(new Session().loginOAuth()).rejects.toThrow(ConfigError);
            expect(mockClient.request).not.toHaveBeenCalled();
        });

        it("rejects a token whose account is not a full user", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, SESSION_INFO))
                .mockResolvedValueOnce(reply(200, { id: 9001, firstName: "Test" }));

            await expect(session.processAuthToken(TOKEN, false)).rejects.toThrow(
                "The session could not be loaded with the new token",
            );
            expect(session.user).toBeNull();
        });
    });

    describe("PKCE login", () => {
        function pkceSession(): Session {
            return new Session({
                clientIdPkce: "test-pkce-client",
                clientSecretPkce: "test-pkce-secret",
            });
        }

        it("builds the authorize URL and exchanges the code", async () => {
            const session = pkceSession();
            const loginUrl = new URL(session.getPkceUrl());

            expect(`${loginUrl.origin}${loginUrl.pathname}`).toBe("https://login.tidal.com/authorize");
            expect(loginUrl.searchParams.get("response_type")).toBe("code");
            expect(loginUrl.searchParams.get("client_id")).toBe("test-pkce-client");
            expect(loginUrl.searchParams.get("redirect_uri")).toBe(
                "https://tidal.com/android/login/auth",
            );
            expect(loginUrl.searchParams.get("code_challenge_method")).toBe("S256");

            mockClient.request.mockResolvedValueOnce(reply(200, TOKEN));
            const token = await session.pkceGetAuthToken(
                "https://tidal.com/android/login/auth?code=test-code&appMode=android",
            );

            expect(token).toEqual(TOKEN);
            const fields = sentFields(0);
            expect(fields.get("code")).toBe("test-code");
            expect(fields.get("grant_type")).toBe("authorization_code");
            expect(fields.get("scope")).toBe("r_usr+w_usr+w_sub");
            expect(fields.get("client_secret")).toBe("test-pkce-secret");
            expect(fields.get("client_unique_key")).toBe(
                loginUrl.searchParams.get("client_unique_key"),
            );
            const verifier = fields.get("code_verifier") ?? "";
            expect(createHash("sha256").update(verifier).digest("base64url")).toBe(
                loginUrl.searchParams.get("code_challenge"),
            );
        });

        it("logs in through the redirect prompt", async () => {
            const session = pkceSession();
            const promptRedirect = jest.fn(async (_loginUrl: string) =>
                "https://tidal.com/android/login/auth?code=test-code",
            );
            mockClient.request.mockResolvedValueOnce(reply(200, TOKEN));
            queueSessionInfo();

            await session.loginPkce(promptRedirect);

            expect(promptRedirect).toHaveBeenCalledWith(
                expect.stringMatching(/^https:\/\/login\.tidal\.com\/authorize\?/),
            );
            expect(session.isPkce).toBe(true);
            expect(session.user?.id).toBe(9001);
        });

        it("refreshes with the PKCE client", async () => {
            const session = pkceSession();
            session.isPkce = true;
            mockClient.request.mockResolvedValueOnce(reply(200, { access_token: "new-access-token" }));

            await session.tokenRefresh("test-refresh-token");

            expect(sentFields(0).get("client_id")).toBe("test-pkce-client");
            expect(session.accessToken).toBe("new-access-token");
        });

        it("validates the redirect URL", async () => {
            const session = pkceSession();

            await expect(
                session.pkceGetAuthToken("https://tidal.com/android/login/auth?code=test-code"),
            ).rejects.toThrow("No PKCE login in progress, call getPkceUrl() first");

            session.getPkceUrl();
            await expect(session.pkceGetAuthToken("not a url")).rejects.toThrow(AuthenticationError);
            await expect(
                session.pkceGetAuthToken("http://tidal.com/android/login/auth?code=test-code"),
            ).rejects.toThrow("The redirect URL must use https");
            await expect(
                session.pkceGetAuthToken("https://tidal.com/android/login/auth"),
            ).rejects.toThrow("The redirect URL has no authorization code");
            expect(mockClient.request).not.toHaveBeenCalled();
        });
    });

    describe("persistence", () => {
        let dir: string;

        beforeAll(async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), "tidal-session-"));
        });

        afterAll(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it("round-trips the tokens through a file", async () => {
            const session = deviceSession();
            queueSessionInfo();
            await session.loadOAuthSession(
                "Bearer",
                "test-access-token",
                "test-refresh-token",
                new Date("2030-01-01T00:00:00.000Z"),
            );

            const file = path.join(dir, "roundtrip.json");
            await session.saveSessionToFile(file);

            expect(JSON.parse(await readFile(file, "utf8"))).toEqual({
                tokenType: "Bearer",
                accessToken: "test-access-token",
                refreshToken: "test-refresh-token",
                expiryTime: "2030-01-01T00:00:00.000Z",
                sessionId: "test-session",
                isPkce: false,
            });

            const restored = deviceSession();
            queueSessionInfo();
            await expect(restored.loadSessionFromFile(file)).resolves.toBe(true);
            expect(restored.accessToken).toBe("test-access-token");
            expect(restored.expiryTime?.toISOString()).toBe("2030-01-01T00:00:00.000Z");
            expect(restored.user?.id).toBe(9001);
        });

        it("treats a missing file as no session", async () => {
            await expect(deviceSession().loadSessionFromFile(path.join(dir, "absent.json"))).resolves.toBe(
                false,
            );
            expect(mockClient.request).not.toHaveBeenCalled();
        });

        it("warns about a corrupt file", async () => {
            const file = path.join(dir, "corrupt.json");
            await writeFile(file, "{not json", "utf8");

            await expect(deviceSession().loadSessionFromFile(file)).resolves.toBe(false);
            expect(mockLogger.warn).toHaveBeenCalledWith(`Session file ${file} is not valid JSON`, {
                error: expect.any(SyntaxError),
            });
        });

        it("rejects session data with the wrong shape", async () => {
            await expect(deviceSession().loadSessionData({ accessToken: 5 })).resolves.toBe(false);
            expect(mockLogger.warn).toHaveBeenCalledWith("Stored session data is invalid", {
                issues: expect.arrayContaining([expect.stringMatching(/^accessToken: /)]),
            });
        });

        it("reports a rejected token as not loaded", async () => {
            mockClient.request.mockResolvedValueOnce(reply(401, { status: 401, subStatus: 11002 }));

            await expect(
                deviceSession().loadOAuthSession("Bearer", "test-access-token"),
            ).resolves.toBe(false);
        });

        it("reports a session whose user cannot be fetched as not loaded", async () => {
            mockClient.request
                .mockResolvedValueOnce(reply(200, SESSION_INFO))
                .mockResolvedValueOnce(reply(404, { status: 404, userMessage: "User not found" }));

            await expect(
                deviceSession().loadOAuthSession("Bearer", "test-access-token"),
            ).resolves.toBe(false);
        });

        it("logs in again when the stored refresh token was revoked", async () => {
            const file = path.join(dir, "revoked.json");
            await writeFile(
                file,
                JSON.stringify({
                    tokenType: "Bearer",
                    accessToken: "stale-access-token",
                    refreshToken: "revoked-refresh-token",
                    expiryTime: null,
                    sessionId: "old-session",
                    isPkce: false,
                }),
                "utf8",
            );
            mockClient.request
                .mockResolvedValueOnce(reply(401, EXPIRED))
                .mockResolvedValueOnce(reply(400, { error: "invalid_grant" }))
                .mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION))
                .mockResolvedValueOnce(reply(200, TOKEN));
            queueSessionInfo();
            const notify = jest.fn();

            await expect(deviceSession().loginSessionFile(file, { notify })).resolves.toBe(true);

            expect(sentFields(1).get("refresh_token")).toBe("revoked-refresh-token");
            expect(mockClient.request.mock.calls[2][0].url).toBe(
                "https://auth.tidal.com/v1/oauth2/device_authorization",
            );
            expect(notify).toHaveBeenCalledTimes(1);
            const stored = JSON.parse(await readFile(file, "utf8"));
            expect(stored.accessToken).toBe("test-access-token");
            expect(stored.sessionId).toBe("test-session");
        });

        it("cannot serialize a session that never logged in", () => {
            expect(() => deviceSession().toSessionData()).toThrow(AuthenticationError);
        });

        it("reuses a stored session that still works", async () => {
            const file = path.join(dir, "reuse.json");
            await writeFile(
                file,
                JSON.stringify({
                    tokenType: "Bearer",
                    accessToken: "test-access-token",
                    refreshToken: null,
                    expiryTime: null,
                    sessionId: "test-session",
                }),
                "utf8",
            );
            queueSessionInfo();
            mockClient.request.mockResolvedValueOnce(reply(200, { status: "ACTIVE" }));

            await expect(deviceSession().loginSessionFile(file, { notify: jest.fn() })).resolves.toBe(
                true,
            );
            expect(mockClient.request).toHaveBeenCalledTimes(3);
            expect(mockClient.request.mock.calls[2][0].url).toBe(
                "https://api.tidal.com/v1/users/9001/subscription",
            );
        });

        it("logs in and stores the session when there is none", async () => {
            const file = path.join(dir, "fresh.json");
            const notify = jest.fn();
            mockClient.request
                .mockResolvedValueOnce(reply(200, DEVICE_AUTHORIZATION))
                .mockResolvedValueOnce(reply(200, TOKEN));
            queueSessionInfo();

            await expect(deviceSession().loginSessionFile(file, { notify })).resolves.toBe(true);

            expect(notify).toHaveBeenCalledTimes(1);
            const stored = JSON.parse(await readFile(file, "utf8"));
            expect(stored.accessToken).toBe("test-access-token");
            expect(stored.isPkce).toBe(false);
        });
    });

    describe("catalog", () => {
        it("searches every model and picks the top hit", async () => {
            const session = await loggedInSession();
            const track = fixture("track");
            mockClient.request.mockResolvedValueOnce(
                reply(200, {
                    artists: { items: [{ id: 501, name: "The Placeholders" }] },
                    albums: { items: [] },
                    tracks: { items: [track] },
                    playlists: { items: [fixture("playlist")] },
                    topHit: { type: "TRACKS", value: track },
                }),
            );

            const result = await session.search("placeholders");

            expect(mockClient.request.mock.calls[2][0].params).toMatchObject({
                query: "placeholders",
                limit: 50,
                offset: 0,
                types: "artists,albums,tracks,videos,playlists",
            });
            expect(result.artists.map((artist) => artist.name)).toEqual(["The Placeholders"]);
            expect(result.albums).toEqual([]);
            expect(result.videos).toEqual([]);
            expect(result.tracks[0].id).toBe(1001);
            expect(result.playlists[0].name).toBe("Road Trip");
            expect(result.topHit).toBeInstanceOf(Track);
        });

        it("returns no top hit when the service sends none", async () => {
            const session = deviceSession();
            mockClient.request.mockResolvedValueOnce(reply(200, { albums: { items: [] } }));

            const result = await session.search("nothing", ["albums"], 10, 20);

            expect(result.topHit).toBeNull();
            expect(mockClient.request.mock.calls[0][0].params).toMatchObject({
                types: "albums",
                limit: 10,
                offset: 20,
            });
        });

        it("refuses unknown search models", async () => {
            const models = JSON.parse('["songs"]');

            await expect(deviceSession().search("x", models)).rejects.toThrow(
                "Tried to search for an invalid type: songs",
            );
        });

        it("swaps the nested album for the full one on request", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, fixture("track")))
                .mockResolvedValueOnce(reply(200, fixture("album")));

            const track = await session.track(1001, true);

            expect(mockClient.request.mock.calls[1][0].url).toBe("https://api.tidal.com/v1/albums/2001");
            expect(track.album).toBeInstanceOf(Album);
            expect(track.album?.numTracks).toBe(11);
        });

        it("returns editable playlists for the session owner", async () => {
            const session = await loggedInSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, fixture("userPlaylist"), { ETag: "\"7\"" }))
                .mockResolvedValueOnce(reply(200, fixture("playlist")));

            const own = await session.playlist("7d0c3f1a-0000-4000-8000-000000000002");
            const editorial = await session.playlist("7d0c3f1a-0000-4000-8000-000000000001");

            expect(own).toBeInstanceOf(UserPlaylist);
            expect(own.etag).toBe("\"7\"");
            expect(own.creator).toBeInstanceOf(PlaylistCreator);
            expect(own.creator instanceof PlaylistCreator && own.creator.name).toBe("me");
            expect(editorial).toBeInstanceOf(Playlist);
            expect(editorial).not.toBeInstanceOf(UserPlaylist);
            expect(editorial.creator instanceof PlaylistCreator && editorial.creator.name).toBe(
                "TIDAL",
            );
        });

        it("loads pages for browsers by default", async () => {
            const session = deviceSession();
            mockClient.request.mockResolvedValueOnce(reply(200, { title: "Explore", rows: [] }));

            const page = await session.explore();

            expect(page.title).toBe("Explore");
            expect(mockClient.request.mock.calls[0][0]).toMatchObject({
                url: "https://api.tidal.com/v1/pages/explore",
                params: { deviceType: "BROWSER" },
            });
        });

        it("reports whether the stored login still works", async () => {
            await expect(deviceSession().checkLogin()).resolves.toBe(false);

            const session = await loggedInSession();
            mockClient.request.mockResolvedValueOnce(reply(401, {}));
            await expect(session.checkLogin()).resolves.toBe(false);
        });

        it("reports a login whose refresh fails as not working", async () => {
            const session = await loggedInSession();
            mockClient.request
                .mockResolvedValueOnce(reply(401, EXPIRED))
                .mockResolvedValueOnce(reply(400, { error: "invalid_grant" }));

            await expect(session.checkLogin()).resolves.toBe(false);
            expect(mockClient.request).toHaveBeenCalledTimes(4);
        });
    });

    describe("ISRC and barcode lookups", () => {
        it("finds tracks through the open API", async () => {
            const session = await loggedInSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, { data: [{ id: "1001", type: "tracks" }] }))
                .mockResolvedValueOnce(reply(200, fixture("track")));

            const tracks = await session.getTracksByIsrc("zza001700001");

            expect(mockClient.request.mock.calls[2][0]).toMatchObject({
                url: "https://openapi.tidal.com/v2/tracks",
                params: { "filter[isrc]": "ZZA001700001" },
                headers: {
                    Accept: "application/vnd.api+json",
                    Authorization: "Bearer test-access-token",
                },
            });
            expect(tracks.map((track) => track.isrc)).toEqual(["ZZA001700001"]);
        });

        it("rejects malformed codes before calling the service", async () => {
            const session = deviceSession();

            await expect(session.getTracksByIsrc("ZZA0017")).rejects.toThrow(InvalidISRC);
            await expect(session.getAlbumsByBarcode("0060-2557")).rejects.toThrow(InvalidUPC);
            expect(mockClient.request).not.toHaveBeenCalled();
        });

        it("raises ObjectNotFound when nothing matches", async () => {
            const session = deviceSession();
            mockClient.request.mockResolvedValueOnce(reply(200, { data: [] }));

            await expect(session.getAlbumsByBarcode("00602557000001")).rejects.toThrow(
                ObjectNotFound,
            );
        });

        it("finds albums by barcode", async () => {
            const session = deviceSession();
            mockClient.request
                .mockResolvedValueOnce(reply(200, { data: [{ id: "2001", type: "albums" }] }))
                .mockResolvedValueOnce(reply(200, fixture("album")));

            const albums = await session.getAlbumsByBarcode("00602557000001");

            expect(mockClient.request.mock.calls[0][0].params).toMatchObject({
                "filter[barcodeId]": "00602557000001",
            });
            expect(albums[0].universalProductNumber).toBe("00602557000001");
        });
    });
});
