import { formatResourceUrl } from "../config";
import type { Session } from "../services/session";
import { parseDate } from "../utils/dates";
import { MetadataNotAvailable } from "../utils/errors";
import {
    asJsonObject,
    readArray,
    readNumber,
    readString,
    toEnum,
    type JsonObject,
} from "../utils/json";
import type { Album } from "./album";
import type { Track, Video } from "./media";
import type { Page } from "./page";

export enum Role {
    main = "MAIN",
    featured = "FEATURED",
    contributor = "CONTRIBUTOR",
    artist = "ARTIST",
}

export const ARTIST_IMAGE_SIZES = [160, 320, 480, 750] as const;
export type ArtistImageSize = (typeof ARTIST_IMAGE_SIZES)[number];

function parseRoles(json: JsonObject): Role[] | null {
    const declared = readArray(json, "artistTypes");
    const raw = declared.length > 0 ? declared : [json.type];
    const roles = raw
        .map((entry) => toEnum(Object.values(Role), entry))
        .filter((role): role is Role => role !== null);
    return roles.length > 0 ? roles : null;
}

export class Artist {
    readonly id: number;
    readonly name: string | null;
    /** Playlist creators carry no roles. */
    readonly roles: Role[] | null;
    readonly role: Role | null;
    picture: string | null;
    /** Set when the artist came from a favorites list. */
    readonly userDateAdded: Date | null;
    /** Only present on artist page headers. */
    bio: string | null = null;

    constructor(
        private readonly session: Session,
        json: JsonObject,
    ) {
        this.id = readNumber(json, "id") ?? -1;
        this.name = readString(json, "name");
        this.roles = parseRoles(json);
        this.role = this.roles?.[0] ?? null;
        this.picture = readString(json, "picture");
        this.userDateAdded = parseDate(json.dateAdded);
    }

    private get basePath(): string {
        return `artists/${this.id}`;
    }

    private albums(filter: string | null, limit?: number, offset = 0): Promise<Album[]> {
        return this.session.request.mapList(
            `${this.basePath}/albums`,
            { filter, limit, offset },
            this.session.parseAlbum,
        );
    }

    getAlbums(limit?: number, offset = 0): Promise<Album[]> {
        return this.albums(null, limit, offset);
    }

    getEpsSingles(limit?: number, offset = 0): Promise<Album[]> {
        return this.albums("EPSANDSINGLES", limit, offset);
    }

    /** Albums the artist appears on, such as compilations. */
    getOtherAlbums(limit?: number, offset = 0): Promise<Album[]> {
        return this.albums("COMPILATIONS", limit, offset);
    }

    /** Tracks sorted by popularity. */
    getTopTracks(limit?: number, offset = 0): Promise<Track[]> {
        return this.session.request.mapList(
            `${this.basePath}/toptracks`,
            { limit, offset },
            this.session.parseTrack,
        );
    }

    getVideos(limit?: number, offset = 0): Promise<Video[]> {
        return this.session.request.mapList(
            `${this.basePath}/videos`,
            { limit, offset },
            this.session.parseVideo,
        );
    }

    /**
     * The biography text. It may contain `[wimpLink ...]` references to
     * other catalog entries.
     */
    async getBio(): Promise<string> {
        const response = await this.session.request.request("GET", `${this.basePath}/bio`);
        const text = readString(asJsonObject(response.data), "text");
        if (text === null) {
            throw new MetadataNotAvailable(`Artist ${this.id} has no biography`);
        }
        return text;
    }

    getSimilar(): Promise<Artist[]> {
        return this.session.request.mapList(
            `${this.basePath}/similar`,
            undefined,
            this.session.parseArtist,
        );
    }

    getRadio(limit = 100): Promise<Track[]> {
        return this.session.request.mapList(
            `${this.basePath}/radio`,
            { limit },
            this.session.parseTrack,
        );
    }

    /**
     * Square picture URL. Fetches the artist first when the picture id is
     * missing, as it is for artists nested in other entities.
     */
    async image(dimensions: ArtistImageSize): Promise<string> {
        if (!ARTIST_IMAGE_SIZES.includes(dimensions)) {
            throw new RangeError(`Invalid resolution ${dimensions} x ${dimensions}`);
        }

        if (!this.picture) {
            const response = await this.session.request.request("GET", this.basePath);
            this.picture = readString(asJsonObject(response.data), "picture");
        }

        if (!this.picture) {
            throw new MetadataNotAvailable(`Artist ${this.id} has no picture`);
        }

        return formatResourceUrl(this.session.config.imageUrl, this.picture, dimensions, dimensions);
    }

    page(): Promise<Page> {
        return this.session.page("pages/artist", { artistId: this.id });
    }

    get listenUrl(): string {
        return `${this.session.config.listenBaseUrl}/artist/${this.id}`;
    }

    get shareUrl(): string {
        return `${this.session.config.shareBaseUrl}/artist/${this.id}`;
    }
}
