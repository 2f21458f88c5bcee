import axios, { type AxiosInstance } from "axios";
import { addSeconds } from "date-fns";
import { createHash, randomBytes } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import {
    createConfig,
    type Config,
    type ConfigOptions,
    type Quality,
    type VideoQuality,
} from "../config";
import { Album } from "../models/album";
import { Artist } from "../models/artist";
import { Genres } from "../models/genre";
import { Track, Video } from "../models/media";
import { Mix } from "../models/mix";
import { Page } from "../models/page";
import { Playlist, UserPlaylist } from "../models/playlist";
import { LoggedInUser, User } from "../models/user";
import { parseDate } from "../utils/dates";
import {
    AuthenticationError,
    ConfigError,
    InvalidISRC,
    InvalidUPC,
    LoginTimeoutError,
    ObjectNotFound,
    type TidalResponse,
} from "../utils/errors";
import {
    asJsonObject,
    isJsonObject,
    readArray,
    readId,
    readNumber,
    readObject,
    readObjects,
    readString,
    type JsonObject,
} from "../utils/json";
import { logger } from "../utils/logger";
import {
    isOk,
    mapItems,
    Requests,
    toTidalResponse,
    type Parser,
    type QueryParams,
    type RequestSession,
} from "./request";

const log = logger.child("session");

const DEVICE_SCOPE = "r_usr w_usr w_sub";
const PKCE_SCOPE = "r_usr+w_usr+w_sub";
const DEVICE_CODE_GRANT = "urn:ietf:params:oauth:grant-type:device_code";
const ISRC_PATTERN = /^[A-Za-z0-9]{12}$/;
const UPC_PATTERN = /^\d+$/;

export type SearchModel = "artists" | "albums" | "tracks" | "videos" | "playlists";
export const SEARCH_MODELS: readonly SearchModel[] = [
    "artists",
    "albums",
    "tracks",
    "videos",
    "playlists",
];

export type CatalogItem = Track | Video | Album | Artist | Playlist | Mix;

export interface SearchResult {
    artists: Artist[];
    albums: Album[];
    tracks: Track[];
    videos: Video[];
    playlists: Playlist[];
    topHit: CatalogItem | null;
}

/** What the user needs to approve a device login. */
export interface LinkLogin {
    deviceCode: string;
    userCode: string;
    verificationUri: string;
    verificationUriComplete: string;
    /** Seconds until the codes expire. */
    expiresIn: number;
    /** Seconds between token polls. */
    interval: number;
}

export interface DeviceLogin {
    link: LinkLogin;
    /** Settles once the user approved the device or the codes expired. */
    done: Promise<void>;
}

export interface SessionFileOptions {
    pkce?: boolean;
    notify?: (message: string) => void;
    promptRedirect?: (loginUrl: string) => Promise<string>;
}

export const sessionDataSchema = z.object({
    tokenType: z.string().min(1),
    accessToken: z.string().min(1),
    refreshToken: z.string().nullable(),
    expiryTime: z.string().nullable(),
    sessionId: z.string().nullable(),
    isPkce: z.boolean().default(false),
});

export type SessionData = z.infer<typeof sessionDataSchema>;

interface PkceState {
    verifier: string;
    clientUniqueKey: string;
}

interface ClientCredentials {
    clientId: string;
    clientSecret: string | null;
}

function withScheme(uri: string): string {
    return /^https?:\/\//.test(uri) ? uri : `https://${uri}`;
}

function isMissingFile(error: unknown): boolean {
    return isJsonObject(error) && error.code === "ENOENT";
}

/**
 * A logged-in (or anonymous) connection to the API. Owns the tokens, the
 * HTTP client and the parsers every entity uses to build related entities.
 */
export class Session implements RequestSession {
    readonly config: Config;
    readonly request: Requests;
    readonly genre: Genres;
    private readonly http: AxiosInstance;

    tokenType: string | null = null;
    accessToken: string | null = null;
    refreshToken: string | null = null;
    expiryTime: Date | null = null;
    isPkce = false;

    sessionId: string | null = null;
    countryCode: string | null = null;
    user: LoggedInUser | null = null;

    /** Quality requested for track streams; starts at `config.quality`. */
    audioQuality: Quality;
    videoQuality: VideoQuality;

    private pkceState: PkceState | null = null;

    constructor(options: ConfigOptions = {}) {
        this.config = createConfig(options);
        this.audioQuality = this.config.quality;
        this.videoQuality = this.config.videoQuality;
        this.http = axios.create({
            timeout: this.config.timeoutMs,
            validateStatus: () => true,
        });
        this.request = new Requests(this, this.http);
        this.genre = new Genres(this);
    }

    // Parsers are bound so models can pass them around as callbacks.

    parseTrack = (json: JsonObject): Track => new Track(this, json);

    parseVideo = (json: JsonObject): Video => new Video(this, json);

    /** Lists that mix tracks and videos only tag the videos. */
    parseMedia = (json: JsonObject): Track | Video => {
        const type = readString(json, "type");
        return type === null || type === "Track" ? new Track(this, json) : new Video(this, json);
    };

    parseArtist = (json: JsonObject): Artist => new Artist(this, json);

    parseArtists = (entries: unknown[]): Artist[] =>
        entries.filter(isJsonObject).map((entry) => new Artist(this, entry));

    parseAlbum = (json: JsonObject, artist?: Artist | null, artists?: Artist[]): Album =>
        new Album(this, json, artist, artists);

    parsePlaylist = (json: JsonObject): Playlist => new Playlist(this, json);

    parseMix = (json: JsonObject): Mix => new Mix(this, json);

    parseUser = (json: JsonObject): User => User.parse(this, json);

    parsePage = (json: JsonObject): Page => new Page(this, json);

    /** Parses a `{ type, item }` entry; unknown types give null. */
    parseTyped = (type: string, json: JsonObject): CatalogItem | null => {
        switch (type.toUpperCase()) {
            case "TRACK":
                return this.parseTrack(json);
            case "VIDEO":
                return this.parseVideo(json);
            case "ALBUM":
                return this.parseAlbum(json);
            case "ARTIST":
                return this.parseArtist(json);
            case "PLAYLIST":
                return this.parsePlaylist(json);
            case "MIX":
                return this.parseMix(json);
            default:
                log.debug(`No parser for item type ${type}`);
                return null;
        }
    };

    parserFor(model: SearchModel): Parser<CatalogItem> {
        switch (model) {
            case "artists":
                return this.parseArtist;
            case "albums":
                return this.parseAlbum;
            case "tracks":
                return this.parseTrack;
            case "videos":
                return this.parseVideo;
            case "playlists":
                return this.parsePlaylist;
        }
    }

    private credentials(pkce: boolean): ClientCredentials {
        const clientId = pkce ? this.config.clientIdPkce : this.config.clientId;
        const clientSecret = pkce ? this.config.clientSecretPkce : this.config.clientSecret;
        if (!clientId) {
            throw new ConfigError(
                pkce ? "PKCE login needs clientIdPkce" : "Device login needs clientId",
                [pkce ? "TIDAL_CLIENT_ID_PKCE is not set" : "TIDAL_CLIENT_ID is not set"],
            );
        }
        return { clientId, clientSecret };
    }

    private async postAuth(endpoint: string, fields: Record<string, string>): Promise<TidalResponse> {
        const url = new URL(endpoint, this.config.authLocation).toString();
        log.debug(`request: POST ${url}`);
        const response = await this.http.request({
            method: "POST",
            url,
            data: new URLSearchParams(fields),
        });
        return toTidalResponse(response, url);
    }

    /**
     * Adopts tokens obtained elsewhere and loads the session behind them.
     * Returns false when the service rejects the token.
     */
    async loadOAuthSession(
        tokenType: string,
        accessToken: string,
        refreshToken: string | null = null,
        expiryTime: Date | null = null,
        isPkce = false,
    ): Promise<boolean> {
        this.tokenType = tokenType;
        this.accessToken = accessToken;
        this.refreshToken = refreshToken;
        this.expiryTime = expiryTime;
        this.isPkce = isPkce;
        return this.loadSessionInfo();
    }

    private async loadSessionInfo(): Promise<boolean> {
        try {
            const response = await this.request.basicRequest("GET", "sessions");
            if (!isOk(response)) {
                log.debug(`Loading the session failed with status ${response.status}`);
                return false;
            }

            const body = asJsonObject(response.data);
            this.sessionId = readString(body, "sessionId");
            this.countryCode = readString(body, "countryCode");
            const userId = readNumber(body, "userId");
            if (userId === null) {
                return false;
            }

            const user = await this.getUser(userId);
            this.user = user instanceof LoggedInUser ? user : null;
            return this.user !== null;
        } catch (error) {
            if (error instanceof AuthenticationError || error instanceof ObjectNotFound) {
                log.info(`Loading the session failed: ${error.message}`);
                return false;
            }
            throw error;
        }
    }

    /**
     * Starts a device login. Show `link` to the user, then await `done`.
     */
    async loginOAuth(): Promise<DeviceLogin> {
        const link = await this.requestDeviceCode();
        return { link, done: this.pollDeviceToken(link) };
    }

    /** Device login that reports the link through `notify` and waits for approval. */
    async loginOAuthSimple(notify: (message: string) => void): Promise<void> {
        const link = await this.requestDeviceCode();
        notify(
            `Visit ${withScheme(link.verificationUriComplete)} to log in, ` +
                `the code will expire in ${link.expiresIn} seconds`,
        );
        await this.pollDeviceToken(link);
    }

    private async requestDeviceCode(): Promise<LinkLogin> {
        const { clientId } = this.credentials(false);
        const response = await this.postAuth("device_authorization", {
            client_id: clientId,
            scope: DEVICE_SCOPE,
        });
        if (!isOk(response)) {
            throw new AuthenticationError(
                `Device authorization failed with status ${response.status}`,
                response,
            );
        }

        const body = asJsonObject(response.data);
        return {
            deviceCode: readString(body, "deviceCode") ?? "",
            userCode: readString(body, "userCode") ?? "",
            verificationUri: readString(body, "verificationUri") ?? "",
            verificationUriComplete: readString(body, "verificationUriComplete") ?? "",
            expiresIn: readNumber(body, "expiresIn") ?? 0,
            interval: readNumber(body, "interval") ?? 2,
        };
    }

    private async pollDeviceToken(link: LinkLogin): Promise<void> {
        const { clientId, clientSecret } = this.credentials(false);
        const deadline = Date.now() + link.expiresIn * 1000;

        while (Date.now() < deadline) {
            await sleep(link.interval * 1000);

            const fields: Record<string, string> = {
                client_id: clientId,
                device_code: link.deviceCode,
                grant_type: DEVICE_CODE_GRANT,
                scope: DEVICE_SCOPE,
            };
            if (clientSecret) fields.client_secret = clientSecret;

            const response = await this.postAuth("token", fields);
            if (isOk(response)) {
                await this.processAuthToken(asJsonObject(response.data), false);
                return;
            }

            const body = asJsonObject(response.data);
            const error = readString(body, "error");
            if (error === "expired_token") {
                log.info("The device code expired before the login was approved");
                break;
            }
            if (error !== "authorization_pending" && error !== "slow_down") {
                throw new AuthenticationError(
                    readString(body, "error_description") ?? `Device login failed: ${error ?? response.status}`,
                    response,
                );
            }
        }

        throw new LoginTimeoutError();
    }

    /**
     * Stores the tokens from an OAuth token response and loads the session.
     */
    async processAuthToken(json: JsonObject, isPkce: boolean): Promise<void> {
        const accessToken = readString(json, "access_token");
        if (!accessToken) {
            throw new AuthenticationError("Token response has no access token");
        }

        this.accessToken = accessToken;
        this.refreshToken = readString(json, "refresh_token") ?? this.refreshToken;
        this.tokenType = readString(json, "token_type") ?? "Bearer";
        this.expiryTime = addSeconds(new Date(), readNumber(json, "expires_in") ?? 0);
        this.isPkce = isPkce;

        if (!(await this.loadSessionInfo())) {
            throw new AuthenticationError("The session could not be loaded with the new token");
        }
    }

    /**
     * Exchanges a refresh token for a new access token, keeping a rotated
     * refresh token when the service returns one.
     */
    async tokenRefresh(refreshToken: string): Promise<void> {
        const { clientId, clientSecret } = this.credentials(this.isPkce);
        const fields: Record<string, string> = {
            grant_type: "refresh_token",
            refresh_token: refreshToken,
            client_id: clientId,
        };
        if (clientSecret) fields.client_secret = clientSecret;

        const response = await this.postAuth("token", fields);
        if (!isOk(response)) {
            log.info(`Token refresh failed with status ${response.status}`);
            throw new AuthenticationError(
                `Token refresh failed with status ${response.status}`,
                response,
            );
        }

        const body = asJsonObject(response.data);
        const accessToken = readString(body, "access_token");
        if (!accessToken) {
            throw new AuthenticationError("Token refresh response has no access token", response);
        }

        log.debug("Access token refreshed");
        this.accessToken = accessToken;
        this.tokenType = readString(body, "token_type") ?? this.tokenType;
        this.expiryTime = addSeconds(new Date(), readNumber(body, "expires_in") ?? 0);
        const rotated = readString(body, "refresh_token");
        if (rotated) {
            this.refreshToken = rotated;
        }
    }

    /**
     * Builds the URL the user opens to log in with PKCE. The verifier it
     * creates is kept for `pkceGetAuthToken`.
     */
    getPkceUrl(): string {
        const { clientId } = this.credentials(true);
        const verifier = randomBytes(32).toString("base64url");
        const challenge = createHash("sha256").update(verifier).digest("base64url");
        const clientUniqueKey = randomBytes(8).toString("hex");
        this.pkceState = { verifier, clientUniqueKey };

        const params = new URLSearchParams({
            response_type: "code",
            redirect_uri: this.config.pkceRedirectUri,
            client_id: clientId,
            lang: "EN",
            appMode: "android",
            client_unique_key: clientUniqueKey,
            code_challenge: challenge,
            code_challenge_method: "S256",
            restrict_signup: "true",
        });
        return `${this.config.pkceAuthorizeUrl}?${params.toString()}`;
    }

    /**
     * Exchanges the `code` in the URL the login page redirected to for
     * tokens. Returns the raw token response.
     */
    async pkceGetAuthToken(redirectUrl: string): Promise<JsonObject> {
        let url: URL;
        try {
            url = new URL(redirectUrl.trim());
        } catch (error) {
            throw new AuthenticationError(
                `Invalid redirect URL: ${error instanceof Error ? error.message : String(error)}`,
            );
        }
        if (url.protocol !== "https:") {
            throw new AuthenticationError("The redirect URL must use https");
        }
        const code = url.searchParams.get("code");
        if (!code) {
            throw new AuthenticationError("The redirect URL has no authorization code");
        }
        if (!this.pkceState) {
            throw new AuthenticationError("No PKCE login in progress, call getPkceUrl() first");
        }

        const { clientId, clientSecret } = this.credentials(true);
        const fields: Record<string, string> = {
            code,
            client_id: clientId,
            grant_type: "authorization_code",
            redirect_uri: this.config.pkceRedirectUri,
            scope: PKCE_SCOPE,
            code_verifier: this.pkceState.verifier,
            client_unique_key: this.pkceState.clientUniqueKey,
        };
        if (clientSecret) fields.client_secret = clientSecret;

        const response = await this.postAuth("token", fields);
        if (!isOk(response)) {
            throw new AuthenticationError(
                `Authorization code exchange failed with status ${response.status}`,
                response,
            );
        }
        this.pkceState = null;
        return asJsonObject(response.data);
    }

    async loginPkce(promptRedirect: (loginUrl: string) => Promise<string>): Promise<void> {
        const redirectUrl = await promptRedirect(this.getPkceUrl());
        const token = await this.pkceGetAuthToken(redirectUrl);
        await this.processAuthToken(token, true);
    }

    toSessionData(): SessionData {
        if (!this.tokenType || !this.accessToken) {
            throw new AuthenticationError("The session is not logged in");
        }
        return {
            tokenType: this.tokenType,
            accessToken: this.accessToken,
            refreshToken: this.refreshToken,
            expiryTime: this.expiryTime ? this.expiryTime.toISOString() : null,
            sessionId: this.sessionId,
            isPkce: this.isPkce,
        };
    }

    /** Restores a blob from `toSessionData`. False when it is malformed or rejected. */
    async loadSessionData(data: unknown): Promise<boolean> {
        const parsed = sessionDataSchema.safeParse(data);
        if (!parsed.success) {
            log.warn("Stored session data is invalid", {
                issues: parsed.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`),
            });
            return false;
        }
        const blob = parsed.data;
        return this.loadOAuthSession(
            blob.tokenType,
            blob.accessToken,
            blob.refreshToken,
            parseDate(blob.expiryTime),
            blob.isPkce,
        );
    }

    async saveSessionToFile(path: string): Promise<void> {
        await writeFile(path, `${JSON.stringify(this.toSessionData(), null, 4)}\n`, "utf8");
    }

    async loadSessionFromFile(path: string): Promise<boolean> {
        let text: string;
        try {
            text = await readFile(path, "utf8");
        } catch (error) {
            if (isMissingFile(error)) {
                log.debug(`No session file at ${path}`);
                return false;
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(text);
        } catch (error) {
            log.warn(`Session file ${path} is not valid JSON`, { error });
            return false;
        }
        return this.loadSessionData(data);
    }

    /**
     * Reuses the session stored at `path` when it still works, otherwise
     * logs in and stores the new session there.
     */
    async loginSessionFile(path: string, options: SessionFileOptions = {}): Promise<boolean> {
        if ((await this.loadSessionFromFile(path)) && (await this.checkLogin())) {
            return true;
        }

        if (options.pkce) {
            if (!options.promptRedirect) {
                throw new ConfigError("PKCE login needs a promptRedirect callback");
            }
            await this.loginPkce(options.promptRedirect);
        } else {
            if (!options.notify) {
                throw new ConfigError("Device login needs a notify callback");
            }
            await this.loginOAuthSimple(options.notify);
        }

        await this.saveSessionToFile(path);
        return true;
    }

    async checkLogin(): Promise<boolean> {
        if (!this.user || !this.user.id || !this.sessionId) {
            return false;
        }
        try {
            const response = await this.request.basicRequest(
                "GET",
                `users/${this.user.id}/subscription`,
            );
            return isOk(response);
        } catch (error) {
            if (error instanceof AuthenticationError) {
                log.info(`Login check failed: ${error.message}`);
                return false;
            }
            throw error;
        }
    }

    /**
     * Searches the catalog. `topHit` is the single most relevant entry among
     * the requested models.
     */
    async search(
        query: string,
        models: readonly SearchModel[] = SEARCH_MODELS,
        limit = 50,
        offset = 0,
    ): Promise<SearchResult> {
        for (const model of models) {
            if (!SEARCH_MODELS.includes(model)) {
                throw new TypeError(`Tried to search for an invalid type: ${String(model)}`);
            }
        }

        const response = await this.request.request("GET", "search", {
            params: { query, limit, offset, types: models.join(",") },
        });
        const body = asJsonObject(response.data);
        const section = <T>(key: SearchModel, parse: Parser<T>): T[] =>
            mapItems(readArray(readObject(body, key) ?? {}, "items"), parse);

        const topHitJson = readObject(body, "topHit");
        const topHitType = topHitJson ? readString(topHitJson, "type")?.toLowerCase() : undefined;
        const topHitModel = SEARCH_MODELS.find((model) => model === topHitType);
        const topHit =
            topHitJson && topHitModel
                ? this.parserFor(topHitModel)(readObject(topHitJson, "value") ?? {})
                : null;

        return {
            artists: section("artists", this.parseArtist),
            albums: section("albums", this.parseAlbum),
            tracks: section("tracks", this.parseTrack),
            videos: section("videos", this.parseVideo),
            playlists: section("playlists", this.parsePlaylist),
            topHit,
        };
    }

    /** With `withAlbum`, the nested album is replaced by the full album. */
    async track(trackId: number | string, withAlbum = false): Promise<Track> {
        const track = await this.request.mapObject(`tracks/${trackId}`, undefined, this.parseTrack);
        if (withAlbum && track.album) {
            track.album = await this.album(track.album.id);
        }
        return track;
    }

    video(videoId: number | string): Promise<Video> {
        return this.request.mapObject(`videos/${videoId}`, undefined, this.parseVideo);
    }

    artist(artistId: number | string): Promise<Artist> {
        return this.request.mapObject(`artists/${artistId}`, undefined, this.parseArtist);
    }

    album(albumId: number | string): Promise<Album> {
        return this.request.mapObject(`albums/${albumId}`, undefined, this.parseAlbum);
    }

    /** Playlists owned by the logged-in user come back as `UserPlaylist`. */
    async playlist(playlistId: string): Promise<Playlist> {
        const response = await this.request.request("GET", `playlists/${playlistId}`);
        const json = asJsonObject(response.data);
        const playlist = new Playlist(this, json);
        const result = playlist.isOwnedBySessionUser ? new UserPlaylist(this, json) : playlist;
        result.etag = response.headers.etag ?? null;
        return result;
    }

    async userPlaylist(playlistId: string): Promise<UserPlaylist> {
        const response = await this.request.request("GET", `playlists/${playlistId}`);
        const playlist = new UserPlaylist(this, asJsonObject(response.data));
        playlist.etag = response.headers.etag ?? null;
        return playlist;
    }

    mix(mixId: string): Promise<Mix> {
        return new Mix(this, { id: mixId }).get();
    }

    getUser(userId: number | string): Promise<User> {
        return this.request.mapObject(`users/${userId}`, undefined, this.parseUser);
    }

    page(endpoint: string, params: QueryParams = {}): Promise<Page> {
        return Page.get(this, endpoint, params);
    }

    home(): Promise<Page> {
        return this.page("pages/home");
    }

    explore(): Promise<Page> {
        return this.page("pages/explore");
    }

    videos(): Promise<Page> {
        return this.page("pages/videos");
    }

    genres(): Promise<Page> {
        return this.page("pages/genre_page");
    }

    localGenres(): Promise<Page> {
        return this.page("pages/genre_page_local");
    }

    moods(): Promise<Page> {
        return this.page("pages/moods");
    }

    mixes(): Promise<Page> {
        return this.page("pages/my_collection_my_mixes");
    }

    forYou(): Promise<Page> {
        return this.page("pages/for_you");
    }

    private async openApiIds(path: string, params: QueryParams): Promise<string[]> {
        const response = await this.request.request("GET", path, {
            params,
            baseUrl: this.config.openApiV2Location,
            headers: { Accept: "application/vnd.api+json" },
        });
        return readObjects(asJsonObject(response.data), "data")
            .map((entry) => readId(entry))
            .filter((id): id is string => id !== null);
    }

    async getTracksByIsrc(isrc: string): Promise<Track[]> {
        if (!ISRC_PATTERN.test(isrc)) {
            throw new InvalidISRC(isrc);
        }
        const ids = await this.openApiIds("tracks", { "filter[isrc]": isrc.toUpperCase() });
        if (ids.length === 0) {
            throw new ObjectNotFound(`No tracks found for ISRC ${isrc}`);
        }
        const tracks: Track[] = [];
        for (const id of ids) {
            tracks.push(await this.track(id));
        }
        return tracks;
    }

    async getAlbumsByBarcode(upc: string): Promise<Album[]> {
        if (!UPC_PATTERN.test(upc)) {
            throw new InvalidUPC(upc);
        }
        const ids = await this.openApiIds("albums", { "filter[barcodeId]": upc });
        if (ids.length === 0) {
            throw new ObjectNotFound(`No albums found for barcode ${upc}`);
        }
        const albums: Album[] = [];
        for (const id of ids) {
            albums.push(await this.album(id));
        }
        return albums;
    }
}
