import { formatResourceUrl } from "../config";
import type { Session } from "../services/session";
import { parseDate } from "../utils/dates";
import { MetadataNotAvailable, ObjectNotFound } from "../utils/errors";
import {
    asJsonObject,
    readArray,
    readBoolean,
    readId,
    readNumber,
    readObject,
    readString,
    readStrings,
    type JsonObject,
} from "../utils/json";
import type { Artist } from "./artist";
import type { Track, Video } from "./media";
import type { Page } from "./page";

export const ALBUM_IMAGE_SIZES = [80, 160, 320, 640, 1280] as const;
export type AlbumImageSize = (typeof ALBUM_IMAGE_SIZES)[number];

/**
 * An album. Albums nested in tracks only carry id, name, cover and
 * video cover; the counters then hold their `-1` placeholder.
 */
export class Album {
    readonly id: number;
    readonly name: string | null;
    readonly cover: string | null;
    readonly videoCover: string | null;
    readonly type: string | null;

    /** Seconds, -1 when unknown. */
    readonly duration: number;
    readonly available: boolean;
    readonly numTracks: number;
    readonly numVideos: number;
    readonly numVolumes: number;
    readonly releaseDate: Date | null;
    /** When the album became available on the service. */
    readonly tidalReleaseDate: Date | null;
    readonly copyright: string | null;
    readonly version: string | null;
    readonly explicit: boolean;
    readonly universalProductNumber: string | null;
    readonly popularity: number;
    readonly audioQuality: string | null;
    readonly audioModes: string[];
    readonly mediaMetadataTags: string[];
    readonly userDateAdded: Date | null;

    readonly artist: Artist | null;
    readonly artists: Artist[];

    constructor(
        private readonly session: Session,
        json: JsonObject,
        artist?: Artist | null,
        artists?: Artist[],
    ) {
        this.artists = artists ?? session.parseArtists(readArray(json, "artists"));

        const artistJson = readObject(json, "artist");
        if (!artistJson) {
            this.artist = this.artists[0] ?? null;
        } else {
            this.artist = artist ?? session.parseArtist(artistJson);
        }

        this.id = readNumber(json, "id") ?? -1;
        this.name = readString(json, "title");
        this.cover = readString(json, "cover");
        this.videoCover = readString(json, "videoCover");
        this.type = readString(json, "type");

        this.duration = readNumber(json, "duration") ?? -1;
        this.available = readBoolean(json, "streamReady");
        this.numTracks = readNumber(json, "numberOfTracks") ?? -1;
        this.numVideos = readNumber(json, "numberOfVideos") ?? -1;
        this.numVolumes = readNumber(json, "numberOfVolumes") ?? -1;
        this.copyright = readString(json, "copyright");
        this.version = readString(json, "version");
        this.explicit = readBoolean(json, "explicit");
        this.universalProductNumber = readId(json, "upc");
        this.popularity = readNumber(json, "popularity") ?? -1;
        this.audioQuality = readString(json, "audioQuality");
        this.audioModes = readStrings(json, "audioModes");
        this.mediaMetadataTags = readStrings(asJsonObject(json.mediaMetadata), "tags");

        this.releaseDate = parseDate(json.releaseDate);
        this.tidalReleaseDate = parseDate(json.streamStartDate);
        this.userDateAdded = parseDate(json.dateAdded);
    }

    private get basePath(): string {
        return `albums/${this.id}`;
    }

    /** Release year, falling back to the availability date. */
    get year(): number | null {
        const date = this.releaseDate ?? this.tidalReleaseDate;
        return date ? date.getUTCFullYear() : null;
    }

    tracks(limit?: number, offset = 0): Promise<Track[]> {
        return this.session.request.mapList(
            `${this.basePath}/tracks`,
            { limit, offset },
            this.session.parseTrack,
        );
    }

    /** Tracks and videos, up to 100 per call. */
    items(limit = 100, offset = 0): Promise<Array<Track | Video>> {
        return this.session.request.mapList(
            `${this.basePath}/items`,
            { limit, offset },
            this.session.parseMedia,
        );
    }

    async similar(): Promise<Album[]> {
        try {
            return await this.session.request.mapList(
                `${this.basePath}/similar`,
                undefined,
                this.session.parseAlbum,
            );
        } catch (error) {
            if (error instanceof ObjectNotFound) {
                throw new MetadataNotAvailable(`No similar albums exist for album ${this.id}`);
            }
            throw error;
        }
    }

    async review(): Promise<string> {
        try {
            const response = await this.session.request.request("GET", `${this.basePath}/review`);
            const text = readString(asJsonObject(response.data), "text");
            if (text === null) {
                throw new MetadataNotAvailable(`Album ${this.id} has no review`);
            }
            return text;
        } catch (error) {
            if (error instanceof ObjectNotFound) {
                throw new MetadataNotAvailable(`Album ${this.id} has no review`);
            }
            throw error;
        }
    }

    page(): Promise<Page> {
        return this.session.page("pages/album", { albumId: this.id });
    }

    image(dimensions: AlbumImageSize): string {
        if (!ALBUM_IMAGE_SIZES.includes(dimensions)) {
            throw new RangeError(`Invalid resolution ${dimensions} x ${dimensions}`);
        }
        if (!this.cover) {
            throw new MetadataNotAvailable(`Album ${this.id} has no cover`);
        }
        return formatResourceUrl(this.session.config.imageUrl, this.cover, dimensions, dimensions);
    }

    /** URL of the animated mp4 cover. */
    video(dimensions: AlbumImageSize): string {
        if (!this.videoCover) {
            throw new MetadataNotAvailable("This album does not have a video cover.");
        }
        if (!ALBUM_IMAGE_SIZES.includes(dimensions)) {
            throw new RangeError(`Invalid resolution ${dimensions} x ${dimensions}`);
        }
        return formatResourceUrl(this.session.config.videoUrl, this.videoCover, dimensions, dimensions);
    }

    get listenUrl(): string {
        return `${this.session.config.listenBaseUrl}/album/${this.id}`;
    }

    get shareUrl(): string {
        return `${this.session.config.shareBaseUrl}/album/${this.id}`;
    }
}
