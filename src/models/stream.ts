import { XMLParser, XMLValidator } from "fast-xml-parser";
import { parseDurationSeconds } from "../utils/dates";
import {
    ManifestDecodeError,
    MPDNotAvailableError,
    UnknownManifestFormat,
} from "../utils/errors";
import {
    asJsonObject,
    isJsonObject,
    readNumber,
    readObject,
    readObjects,
    readString,
    readStrings,
    type JsonObject,
} from "../utils/json";

export enum ManifestMimeType {
    MPD = "application/dash+xml",
    BTS = "application/vnd.tidal.bts",
    VIDEO = "video/mp2t",
}

export enum Codec {
    MP3 = "MP3",
    AAC = "AAC",
    MP4A = "MP4A",
    FLAC = "FLAC",
    MQA = "MQA",
    Atmos = "EAC3",
    AC4 = "AC4",
}

export enum MimeType {
    audio_mpeg = "audio/mpeg",
    audio_mp3 = "audio/mp3",
    audio_m4a = "audio/m4a",
    audio_flac = "audio/flac",
    audio_xflac = "audio/x-flac",
    audio_eac3 = "audio/eac3",
    audio_mp4 = "audio/mp4",
    audio_m3u8 = "audio/mpegurl",
    video_mp4 = "video/mp4",
    video_m3u8 = "video/mpegurl",
}

export function mimeTypeFromAudioCodec(codec: string): MimeType {
    switch (codec.toUpperCase()) {
        case Codec.FLAC:
        case Codec.MQA:
            return MimeType.audio_xflac;
        case Codec.AAC:
        case Codec.MP4A:
            return MimeType.audio_m4a;
        case Codec.MP3:
            return MimeType.audio_mp3;
        case Codec.Atmos:
            return MimeType.audio_eac3;
        case Codec.AC4:
            return MimeType.audio_mp4;
        default:
            return MimeType.audio_m4a;
    }
}

export enum AudioMode {
    stereo = "STEREO",
    dolby_atmos = "DOLBY_ATMOS",
    sony_360ra = "SONY_360RA",
}

export enum MediaMetadataTags {
    lossless = "LOSSLESS",
    hires_lossless = "HIRES_LOSSLESS",
    mqa = "MQA",
    dolby_atmos = "DOLBY_ATMOS",
    sony_360ra = "SONY_360RA",
}

const DEFAULT_BIT_DEPTH = 16;
const DEFAULT_SAMPLE_RATE = 44100;

function normalizeCodec(codecs: string): string {
    return codecs.toUpperCase().split(".")[0];
}

/**
 * Playback info for one track: quality, loudness and the encoded manifest.
 */
export class Stream {
    readonly trackId: number;
    readonly audioMode: string | null;
    readonly audioQuality: string | null;
    readonly manifestMimeType: string | null;
    readonly manifestHash: string | null;
    /** Base64-encoded. */
    readonly manifest: string | null;
    readonly assetPresentation: string | null;
    readonly albumReplayGain: number;
    readonly albumPeakAmplitude: number;
    readonly trackReplayGain: number;
    readonly trackPeakAmplitude: number;
    readonly bitDepth: number;
    readonly sampleRate: number;

    constructor(json: JsonObject) {
        this.trackId = readNumber(json, "trackId") ?? -1;
        this.audioMode = readString(json, "audioMode");
        this.audioQuality = readString(json, "audioQuality");
        this.manifestMimeType = readString(json, "manifestMimeType");
        this.manifestHash = readString(json, "manifestHash");
        this.manifest = readString(json, "manifest");
        this.assetPresentation = readString(json, "assetPresentation");
        this.albumReplayGain = readNumber(json, "albumReplayGain") ?? 1.0;
        this.albumPeakAmplitude = readNumber(json, "albumPeakAmplitude") ?? 1.0;
        this.trackReplayGain = readNumber(json, "trackReplayGain") ?? 1.0;
        this.trackPeakAmplitude = readNumber(json, "trackPeakAmplitude") ?? 1.0;
        this.bitDepth = readNumber(json, "bitDepth") ?? DEFAULT_BIT_DEPTH;
        this.sampleRate = readNumber(json, "sampleRate") ?? DEFAULT_SAMPLE_RATE;
    }

    get isMpd(): boolean {
        return this.manifestMimeType === ManifestMimeType.MPD;
    }

    get isBts(): boolean {
        return this.manifestMimeType === ManifestMimeType.BTS;
    }

    getManifestData(): string {
        const encoded = this.manifest?.trim();
        if (!encoded || !/^[A-Za-z0-9+/_-]+={0,2}$/.test(encoded)) {
            throw new ManifestDecodeError();
        }
        return Buffer.from(encoded, "base64").toString("utf8");
    }

    getStreamManifest(): StreamManifest {
        return new StreamManifest(this);
    }

    /** `[bitDepth, sampleRate]` */
    getAudioResolution(): [number, number] {
        return [this.bitDepth, this.sampleRate];
    }
}

/**
 * The decoded manifest of a stream, either a DASH MPD or a BTS document.
 */
export class StreamManifest {
    readonly manifestMimeType: string | null;
    readonly codecs: string;
    readonly mimeType: string;
    readonly urls: string[];
    readonly encryptionType: string;
    readonly keyId: string | null;
    readonly sampleRate: number;
    readonly dashInfo: DashInfo | null;

    constructor(stream: Stream) {
        this.manifestMimeType = stream.manifestMimeType;

        if (stream.isMpd) {
            const dashInfo = DashInfo.fromMpd(stream.getManifestData());
            this.dashInfo = dashInfo;
            this.codecs = normalizeCodec(dashInfo.codecs);
            this.mimeType = dashInfo.mimeType;
            this.urls = dashInfo.urls;
            this.encryptionType = "NONE";
            this.keyId = null;
            this.sampleRate = dashInfo.audioSamplingRate || stream.sampleRate;
            return;
        }

        if (stream.isBts) {
            const manifest = parseBtsManifest(stream.getManifestData());
            this.dashInfo = null;
            this.codecs = normalizeCodec(readString(manifest, "codecs") ?? "");
            this.mimeType = readString(manifest, "mimeType") ?? mimeTypeFromAudioCodec(this.codecs);
            this.urls = readStrings(manifest, "urls");
            this.encryptionType = readString(manifest, "encryptionType") ?? "NONE";
            this.keyId = readString(manifest, "keyId");
            this.sampleRate = stream.sampleRate;
            return;
        }

        throw new UnknownManifestFormat(stream.manifestMimeType);
    }

    getUrls(): string[] {
        return this.urls;
    }

    getCodecs(): string {
        return this.codecs;
    }

    getSamplingRate(): number {
        return this.sampleRate;
    }

    getHls(): string {
        if (!this.dashInfo) {
            throw new MPDNotAvailableError();
        }
        return this.dashInfo.getHls();
    }

    get isMpd(): boolean {
        return this.dashInfo !== null;
    }

    get isEncrypted(): boolean {
        return this.encryptionType !== "NONE";
    }

    get fileExtension(): string {
        const url = this.urls[0] ?? "";
        const codecs = this.codecs.toLowerCase();

        if (url.includes(".flac")) {
            return ".flac";
        }
        if (url.includes(".mp4")) {
            if (codecs.includes("ac4") || codecs.includes("mha1")) {
                return ".mp4";
            }
            if (codecs.includes("flac")) {
                return ".flac";
            }
            return ".m4a";
        }
        if (url.includes(".ts")) {
            return ".ts";
        }
        return ".m4a";
    }
}

function parseBtsManifest(text: string): JsonObject {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new ManifestDecodeError(
            `BTS manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        );
    }
    if (!isJsonObject(parsed)) {
        throw new ManifestDecodeError("BTS manifest is not a JSON object");
    }
    return parsed;
}

const ARRAY_ELEMENTS = new Set(["Period", "AdaptationSet", "Representation", "S"]);

const mpdParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_ELEMENTS.has(name),
});

export interface DashSegment {
    url: string;
    /** Seconds. */
    duration: number;
}

/**
 * What a single-representation MPD says about its segments.
 */
export class DashInfo {
    private constructor(
        readonly duration: number,
        readonly contentType: string,
        readonly mimeType: string,
        readonly codecs: string,
        readonly bitrate: number,
        readonly audioSamplingRate: number,
        readonly timescale: number,
        readonly initialization: string,
        readonly media: string,
        readonly startNumber: number,
        readonly segments: DashSegment[],
    ) {}

    /** Initialization segment followed by every media segment. */
    get urls(): string[] {
        return [this.initialization, ...this.segments.map((segment) => segment.url)];
    }

    static fromMpd(xml: string): DashInfo {
        if (XMLValidator.validate(xml) !== true) {
            throw new ManifestDecodeError("MPD manifest is not valid XML");
        }

        const mpd = readObject(asJsonObject(mpdParser.parse(xml)), "MPD");
        const period = mpd ? readObjects(mpd, "Period")[0] : undefined;
        const adaptationSet = period ? readObjects(period, "AdaptationSet")[0] : undefined;
        const representation = adaptationSet
            ? readObjects(adaptationSet, "Representation")[0]
            : undefined;
        if (!mpd || !adaptationSet || !representation) {
            throw new ManifestDecodeError("MPD manifest has no representation");
        }

        const template =
            readObject(representation, "SegmentTemplate") ??
            readObject(adaptationSet, "SegmentTemplate");
        if (!template) {
            throw new ManifestDecodeError("MPD manifest has no segment template");
        }

        const timescale = readNumber(template, "@_timescale") ?? 1;
        const media = readString(template, "@_media") ?? "";
        const startNumber = readNumber(template, "@_startNumber") ?? 1;
        const timeline = readObject(template, "SegmentTimeline");

        const segments: DashSegment[] = [];
        let number = startNumber;
        for (const entry of timeline ? readObjects(timeline, "S") : []) {
            const length = readNumber(entry, "@_d") ?? 0;
            const repeat = readNumber(entry, "@_r") ?? 0;
            for (let i = 0; i <= repeat; i++) {
                segments.push({
                    url: media.replace("$Number$", String(number)),
                    duration: length / timescale,
                });
                number++;
            }
        }

        return new DashInfo(
            parseDurationSeconds(readString(mpd, "@_mediaPresentationDuration") ?? undefined),
            readString(adaptationSet, "@_contentType") ?? "",
            readString(adaptationSet, "@_mimeType") ?? readString(representation, "@_mimeType") ?? "",
            readString(representation, "@_codecs") ?? readString(adaptationSet, "@_codecs") ?? "",
            readNumber(representation, "@_bandwidth") ?? 0,
            readNumber(representation, "@_audioSamplingRate") ??
                readNumber(adaptationSet, "@_audioSamplingRate") ??
                0,
            timescale,
            readString(template, "@_initialization") ?? "",
            media,
            startNumber,
            segments,
        );
    }

    /** A VOD media playlist over the same segments. */
    getHls(): string {
        const longest = this.segments.reduce(
            (max, segment) => Math.max(max, segment.duration),
            0,
        );
        const lines = [
            "#EXTM3U",
            "#EXT-X-VERSION:7",
            `#EXT-X-TARGETDURATION:${Math.ceil(longest)}`,
            "#EXT-X-PLAYLIST-TYPE:VOD",
            "#EXT-X-MEDIA-SEQUENCE:0",
            `#EXT-X-MAP:URI="${this.initialization}"`,
        ];
        for (const segment of this.segments) {
            lines.push(`#EXTINF:${segment.duration.toFixed(3)},`, segment.url);
        }
        lines.push("#EXT-X-ENDLIST");
        return `${lines.join("\n")}\n`;
    }
}
