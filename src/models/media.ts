import { formatResourceUrl, Quality } from "../config";
import type { Session } from "../services/session";
import { parseDate } from "../utils/dates";
import {
    MetadataNotAvailable,
    ObjectNotFound,
    StreamNotAvailable,
    URLNotAvailable,
} from "../utils/errors";
import {
    asJsonObject,
    readArray,
    readBoolean,
    readNumber,
    readObject,
    readObjects,
    readString,
    readStrings,
    toEnum,
    type JsonObject,
} from "../utils/json";
import type { Album } from "./album";
import type { Artist } from "./artist";
import { AudioMode, MediaMetadataTags, Stream } from "./stream";

export interface ArtistRole {
    categoryId: number;
    category: string;
}

export const VIDEO_IMAGE_SIZES: ReadonlyArray<readonly [number, number]> = [
    [160, 107],
    [480, 320],
    [750, 500],
    [1080, 720],
];

function parseArtistRoles(json: JsonObject): ArtistRole[] | null {
    if (!Array.isArray(json.artistRoles)) return null;
    return readObjects(json, "artistRoles").map((role) => ({
        categoryId: readNumber(role, "categoryId") ?? -1,
        category: readString(role, "category") ?? "",
    }));
}

/**
 * Fields shared by tracks and videos. `userDateAdded` is only set for
 * playlist and favorites entries; use the album for the release date.
 */
export abstract class Media {
    readonly id: number;
    readonly name: string | null;
    /** Seconds. */
    readonly duration: number;
    readonly available: boolean;
    readonly tidalReleaseDate: Date | null;
    readonly userDateAdded: Date | null;
    readonly trackNum: number;
    readonly volumeNum: number;
    readonly explicit: boolean;
    readonly popularity: number;
    readonly artist: Artist | null;
    readonly artists: Artist[];
    /** Replaced with the full album by `session.track(id, true)`. */
    album: Album | null;
    readonly type: string | null;
    /** Credits, for entries listed on an artist's credit page. */
    artistRoles: ArtistRole[] | null;

    protected constructor(
        protected readonly session: Session,
        json: JsonObject,
    ) {
        this.artists = session.parseArtists(readArray(json, "artists"));

        // Some entries omit `artist` and only list `artists`.
        const artistJson = readObject(json, "artist");
        this.artist = artistJson ? session.parseArtist(artistJson) : this.artists[0] ?? null;

        const albumJson = readObject(json, "album");
        this.album = albumJson ? session.parseAlbum(albumJson, this.artist, this.artists) : null;

        this.id = readNumber(json, "id") ?? -1;
        this.name = readString(json, "title");
        this.duration = readNumber(json, "duration") ?? -1;
        this.available = readBoolean(json, "streamReady");
        this.tidalReleaseDate = parseDate(json.streamStartDate);
        this.userDateAdded = parseDate(json.dateAdded);
        this.trackNum = readNumber(json, "trackNumber") ?? -1;
        this.volumeNum = readNumber(json, "volumeNumber") ?? 1;
        this.explicit = readBoolean(json, "explicit");
        this.popularity = readNumber(json, "popularity") ?? -1;
        this.type = readString(json, "type");
        this.artistRoles = parseArtistRoles(json);
    }

    protected abstract get kind(): "track" | "video";

    get listenUrl(): string {
        return `${this.session.config.listenBaseUrl}/${this.kind}/${this.id}`;
    }

    get shareUrl(): string {
        return `${this.session.config.shareBaseUrl}/${this.kind}/${this.id}`;
    }

    protected async fetchUrl(path: string, params: Record<string, string>): Promise<string> {
        const response = await this.session.request.request("GET", path, { params });
        const url = readStrings(asJsonObject(response.data), "urls")[0];
        if (!url) {
            throw new URLNotAvailable();
        }
        return url;
    }
}

export class Lyrics {
    readonly trackId: number;
    readonly provider: string | null;
    readonly providerTrackId: number;
    readonly providerLyricsId: number;
    readonly text: string;
    /** LRC-style, with timestamps. */
    readonly subtitles: string;
    readonly rightToLeft: boolean;

    constructor(json: JsonObject) {
        this.trackId = readNumber(json, "trackId") ?? -1;
        this.provider = readString(json, "lyricsProvider");
        this.providerTrackId = readNumber(json, "providerCommontrackId") ?? -1;
        this.providerLyricsId = readNumber(json, "providerLyricsId") ?? -1;
        this.text = readString(json, "lyrics") ?? "";
        this.subtitles = readString(json, "subtitles") ?? "";
        this.rightToLeft = readBoolean(json, "isRightToLeft");
    }
}

export class Track extends Media {
    readonly replayGain: number | null;
    /** Entries from page modules may lack `peak`, `isrc` and `copyright`. */
    readonly peak: number | null;
    readonly isrc: string | null;
    readonly copyright: string | null;
    readonly audioQuality: Quality | null;
    readonly audioModes: string[];
    readonly mediaMetadataTags: string[];
    readonly version: string | null;

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        this.replayGain = readNumber(json, "replayGain");
        this.peak = readNumber(json, "peak");
        this.isrc = readString(json, "isrc");
        this.copyright = readString(json, "copyright");
        this.audioQuality = toEnum(Object.values(Quality), json.audioQuality);
        this.audioModes = readStrings(json, "audioModes");
        this.mediaMetadataTags = readStrings(asJsonObject(json.mediaMetadata), "tags");
        this.version = readString(json, "version");
    }

    protected get kind(): "track" {
        return "track";
    }

    get fullName(): string {
        const name = this.name ?? "";
        return this.version ? `${name} (${this.version})` : name;
    }

    get isHiRes(): boolean {
        return this.mediaMetadataTags.includes(MediaMetadataTags.hires_lossless);
    }

    get isDolbyAtmos(): boolean {
        return this.audioModes.includes(AudioMode.dolby_atmos);
    }

    getUrl(): Promise<string> {
        return this.fetchUrl(`tracks/${this.id}/urlpostpaywall`, {
            urlusagemode: "STREAM",
            audioquality: this.session.audioQuality,
            assetpresentation: "FULL",
        });
    }

    async lyrics(): Promise<Lyrics> {
        try {
            return await this.session.request.mapObject(
                `tracks/${this.id}/lyrics`,
                undefined,
                (json) => new Lyrics(json),
            );
        } catch (error) {
            if (error instanceof ObjectNotFound) {
                throw new MetadataNotAvailable(`No lyrics exist for track ${this.id}`);
            }
            throw error;
        }
    }

    /** Tracks similar to this one. */
    getTrackRadio(limit = 100): Promise<Track[]> {
        return this.session.request.mapList(
            `tracks/${this.id}/radio`,
            { limit },
            this.session.parseTrack,
        );
    }

    async getStream(): Promise<Stream> {
        try {
            return await this.session.request.mapObject(
                `tracks/${this.id}/playbackinfopostpaywall`,
                {
                    playbackmode: "STREAM",
                    audioquality: this.session.audioQuality,
                    assetpresentation: "FULL",
                },
                (json) => new Stream(json),
            );
        } catch (error) {
            if (error instanceof ObjectNotFound) {
                throw new StreamNotAvailable(`Stream not available for track ${this.id}`);
            }
            throw error;
        }
    }
}

export class Video extends Media {
    readonly releaseDate: Date | null;
    /** Absent on videos listed in page modules. */
    readonly videoQuality: string | null;
    readonly cover: string | null;

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        this.releaseDate = parseDate(json.releaseDate);
        this.cover = readString(json, "imageId");
        this.videoQuality = readString(json, "quality");
    }

    protected get kind(): "video" {
        return "video";
    }

    getUrl(): Promise<string> {
        return this.fetchUrl(`videos/${this.id}/urlpostpaywall`, {
            urlusagemode: "STREAM",
            videoquality: this.session.videoQuality,
            assetpresentation: "FULL",
        });
    }

    image(width = 1080, height = 720): string {
        const supported = VIDEO_IMAGE_SIZES.some(([w, h]) => w === width && h === height);
        if (!supported) {
            throw new RangeError(`Invalid resolution ${width} x ${height}`);
        }
        if (!this.cover) {
            throw new MetadataNotAvailable(`Video ${this.id} has no cover`);
        }
        return formatResourceUrl(this.session.config.imageUrl, this.cover, width, height);
    }
}
