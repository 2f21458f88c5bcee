import { formatResourceUrl } from "../config";
import type { Session } from "../services/session";
import { parseDate } from "../utils/dates";
import { MetadataNotAvailable, ObjectNotFound } from "../utils/errors";
import {
    asJsonObject,
    readArray,
    readBoolean,
    readNumber,
    readObject,
    readString,
    type JsonObject,
} from "../utils/json";
import type { Artist } from "./artist";
import type { Track, Video } from "./media";
import type { User } from "./user";

export const PLAYLIST_IMAGE_SIZES = [160, 320, 480, 640, 750, 1080] as const;
export type PlaylistImageSize = (typeof PLAYLIST_IMAGE_SIZES)[number];

export const PLAYLIST_WIDE_IMAGE_SIZES: ReadonlyArray<readonly [number, number]> = [
    [160, 107],
    [480, 320],
    [750, 500],
    [1080, 720],
];

export interface AddOptions {
    /** Adds ids already in the playlist again instead of skipping them. */
    allowDuplicates?: boolean;
    /** Index to insert at; appended when omitted. */
    position?: number;
}

export class Playlist {
    readonly id: string;
    readonly name: string | null;
    readonly numTracks: number;
    readonly numVideos: number;
    readonly creator: Artist | User | null;
    readonly description: string | null;
    readonly duration: number;
    readonly lastUpdated: Date | null;
    readonly created: Date | null;
    readonly type: string | null;
    readonly public: boolean;
    readonly popularity: number;
    readonly promotedArtists: Artist[];
    readonly lastItemAddedAt: Date | null;
    readonly picture: string | null;
    readonly squarePicture: string | null;
    readonly userDateAdded: Date | null;

    /** ETag of the last playlist response, sent back on writes. */
    etag: string | null = null;

    constructor(
        protected readonly session: Session,
        json: JsonObject,
    ) {
        this.id = readString(json, "uuid") ?? "";
        this.name = readString(json, "title");
        this.numTracks = readNumber(json, "numberOfTracks") ?? -1;
        this.numVideos = readNumber(json, "numberOfVideos") ?? -1;
        this.description = readString(json, "description");
        this.duration = readNumber(json, "duration") ?? -1;
        this.lastUpdated = parseDate(json.lastUpdated);
        this.created = parseDate(json.created);
        this.type = readString(json, "type");
        this.public = readBoolean(json, "publicPlaylist");
        this.popularity = readNumber(json, "popularity") ?? -1;
        this.picture = readString(json, "image");
        this.squarePicture = readString(json, "squareImage");
        this.lastItemAddedAt = parseDate(json.lastItemAddedAt);
        this.userDateAdded = parseDate(json.dateAdded);
        this.promotedArtists = session.parseArtists(readArray(json, "promotedArtists"));

        const creator = readObject(json, "creator") ?? {};
        if (this.type === "ARTIST" && readNumber(creator, "id") !== 0) {
            this.creator = session.parseArtist(creator);
        } else {
            this.creator = session.parseUser(creator);
        }
    }

    protected get basePath(): string {
        return `playlists/${this.id}`;
    }

    /** True when the logged-in user created this playlist. */
    get isOwnedBySessionUser(): boolean {
        const user = this.session.user;
        return user !== null && this.creator !== null && this.creator.id === user.id;
    }

    async tracks(limit?: number, offset = 0): Promise<Track[]> {
        const response = await this.session.request.request("GET", `${this.basePath}/tracks`, {
            params: { limit, offset },
        });
        this.etag = response.headers.etag ?? this.etag;
        return this.session.request.mapJsonList(response.data, this.session.parseTrack);
    }

    /** Tracks and videos, up to 100 per call. */
    async items(limit = 100, offset = 0): Promise<Array<Track | Video>> {
        const response = await this.session.request.request("GET", `${this.basePath}/items`, {
            params: { limit, offset },
        });
        this.etag = response.headers.etag ?? this.etag;
        return this.session.request.mapJsonList(response.data, this.session.parseMedia);
    }

    image(dimensions: PlaylistImageSize): string {
        if (!PLAYLIST_IMAGE_SIZES.includes(dimensions)) {
            throw new RangeError(`Invalid resolution ${dimensions} x ${dimensions}`);
        }
        if (!this.squarePicture) {
            throw new MetadataNotAvailable(`Playlist ${this.id} has no square picture`);
        }
        return formatResourceUrl(
            this.session.config.imageUrl,
            this.squarePicture,
            dimensions,
            dimensions,
        );
    }

    wideImage(width = 1080, height = 720): string {
        const supported = PLAYLIST_WIDE_IMAGE_SIZES.some(([w, h]) => w === width && h === height);
        if (!supported) {
            throw new RangeError(`Invalid resolution ${width} x ${height}`);
        }
        if (!this.picture) {
            throw new MetadataNotAvailable(`Playlist ${this.id} has no picture`);
        }
        return formatResourceUrl(this.session.config.imageUrl, this.picture, width, height);
    }

    get listenUrl(): string {
        return `${this.session.config.listenBaseUrl}/playlist/${this.id}`;
    }

    get shareUrl(): string {
        return `${this.session.config.shareBaseUrl}/playlist/${this.id}`;
    }
}

/**
 * A playlist the logged-in user owns and can edit. Writes carry the last
 * seen ETag in `If-None-Match`.
 */
export class UserPlaylist extends Playlist {
    private writeHeaders(): Record<string, string> {
        return this.etag ? { "If-None-Match": this.etag } : {};
    }

    /** Re-fetches the playlist, picking up a fresh ETag. */
    async refresh(): Promise<UserPlaylist> {
        const response = await this.session.request.request("GET", this.basePath);
        const playlist = new UserPlaylist(this.session, asJsonObject(response.data));
        playlist.etag = response.headers.etag ?? null;
        this.etag = playlist.etag;
        return playlist;
    }

    async edit(title?: string, description?: string): Promise<void> {
        const data = new URLSearchParams({
            title: title || this.name || "",
            description: description || this.description || "",
        });
        await this.session.request.request("POST", this.basePath, { data });
    }

    async delete(): Promise<void> {
        await this.session.request.request("DELETE", this.basePath);
    }

    async add(
        mediaIds: Array<number | string>,
        options: AddOptions = {},
    ): Promise<UserPlaylist> {
        const data = new URLSearchParams({
            onDupes: options.allowDuplicates ? "ADD" : "SKIP",
            trackIds: mediaIds.map(String).join(","),
        });
        if (options.position !== undefined) {
            data.set("toIndex", String(options.position));
        }

        await this.session.request.request("POST", `${this.basePath}/items`, {
            params: { limit: 100 },
            data,
            headers: this.writeHeaders(),
        });
        return this.refresh();
    }

    async removeByIndex(index: number): Promise<void> {
        await this.session.request.request("DELETE", `${this.basePath}/items/${index}`, {
            headers: this.writeHeaders(),
        });
    }

    /**
     * Scans the playlist 100 entries at a time for `mediaId` and removes the
     * first match.
     */
    async removeById(mediaId: number): Promise<void> {
        let offset = 0;
        while (offset < this.numTracks + Math.max(this.numVideos, 0)) {
            const items = await this.items(100, offset);
            if (items.length === 0) break;

            const index = items.findIndex((item) => item.id === mediaId);
            if (index >= 0) {
                await this.removeByIndex(offset + index);
                return;
            }
            offset += items.length;
        }
        throw new ObjectNotFound(`Media ${mediaId} is not in playlist ${this.id}`);
    }
}
