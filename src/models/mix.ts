import type { Session } from "../services/session";
import { MetadataNotAvailable } from "../utils/errors";
import { isJsonObject, readObject, readString, toEnum, type JsonObject } from "../utils/json";
import { Track, Video } from "./media";
import { Category } from "./page";

export enum MixType {
    video_daily = "VIDEO_DAILY_MIX",
    daily = "DAILY_MIX",
    discovery = "DISCOVERY_MIX",
    new_release = "NEW_RELEASE_MIX",
    track = "TRACK_MIX",
    artist = "ARTIST_MIX",
    songwriter = "SONGWRITER_MIX",
    producer = "PRODUCER_MIX",
    history_alltime = "HISTORY_ALLTIME_MIX",
    history_monthly = "HISTORY_MONTHLY_MIX",
    history_yearly = "HISTORY_YEARLY_MIX",
}

export const MIX_IMAGE_SIZES = [320, 640, 1500] as const;
export type MixImageSize = (typeof MIX_IMAGE_SIZES)[number];

const MIX_IMAGE_KEYS: Record<MixImageSize, string> = {
    320: "SMALL",
    640: "MEDIUM",
    1500: "LARGE",
};

export interface MixImage {
    width: number;
    height: number;
    url: string;
}

function parseImages(json: JsonObject | null): Record<string, MixImage> {
    const output: Record<string, MixImage> = {};
    if (!json) return output;
    for (const [key, value] of Object.entries(json)) {
        if (!isJsonObject(value)) continue;
        const url = readString(value, "url");
        if (!url) continue;
        output[key] = {
            width: typeof value.width === "number" ? value.width : 0,
            height: typeof value.height === "number" ? value.height : 0,
            url,
        };
    }
    return output;
}

/**
 * A generated mix such as a daily mix, a track radio or listening history.
 */
export class Mix {
    readonly id: string;
    title: string | null;
    subTitle: string | null;
    sharingImages: Record<string, MixImage>;
    images: Record<string, MixImage>;
    mixType: MixType | null;
    contentBehaviour: string | null;
    shortSubtitle: string | null;

    private retrievedItems: Array<Track | Video> | null = null;

    constructor(
        private readonly session: Session,
        json: JsonObject,
    ) {
        this.id = readString(json, "id") ?? "";
        this.title = readString(json, "title");
        this.subTitle = readString(json, "subTitle");
        this.sharingImages = parseImages(readObject(json, "sharingImages"));
        this.images = parseImages(readObject(json, "images"));
        this.mixType = toEnum(Object.values(MixType), json.mixType);
        this.contentBehaviour = readString(json, "contentBehavior");
        this.shortSubtitle = readString(json, "shortSubtitle");
    }

    /**
     * Loads the mix page: the header module refreshes this mix's metadata and
     * the following module holds its tracks and videos.
     */
    async get(): Promise<this> {
        const page = await this.session.page("pages/mix", { mixId: this.id });
        const [header, content] = page.categories;

        if (header instanceof Mix) {
            this.title = header.title;
            this.subTitle = header.subTitle;
            this.sharingImages = header.sharingImages;
            this.images = header.images;
            this.mixType = header.mixType;
            this.contentBehaviour = header.contentBehaviour;
            this.shortSubtitle = header.shortSubtitle;
        }

        this.retrievedItems = [];
        if (content instanceof Category) {
            for (const item of content.items) {
                if (item instanceof Track || item instanceof Video) {
                    this.retrievedItems.push(item);
                }
            }
        }
        return this;
    }

    /** Tracks and videos, fetched on first call. */
    async items(): Promise<Array<Track | Video>> {
        if (this.retrievedItems === null) {
            await this.get();
        }
        return this.retrievedItems ?? [];
    }

    image(dimensions: MixImageSize = 640): string {
        if (!MIX_IMAGE_SIZES.includes(dimensions)) {
            throw new RangeError(`Invalid resolution ${dimensions} x ${dimensions}`);
        }
        const image = this.images[MIX_IMAGE_KEYS[dimensions]];
        if (!image) {
            throw new MetadataNotAvailable(`Mix ${this.id} has no ${dimensions}px image`);
        }
        return image.url;
    }
}
