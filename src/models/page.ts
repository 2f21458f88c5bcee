import type { Parser, QueryParams } from "../services/request";
import { mapItems } from "../services/request";
import type { CatalogItem, Session } from "../services/session";
import {
    isJsonObject,
    readBoolean,
    readObject,
    readObjects,
    readString,
    type JsonObject,
} from "../utils/json";
import { logger } from "../utils/logger";
import type { Album } from "./album";
import type { Artist } from "./artist";
import type { Mix } from "./mix";

const log = logger.child("page");

interface ShowMore {
    title: string | null;
    apiPath: string;
}

function parseShowMore(json: JsonObject): ShowMore | null {
    const more = readObject(json, "showMore");
    const apiPath = more ? readString(more, "apiPath") : null;
    if (!more || !apiPath) return null;
    return { title: readString(more, "title"), apiPath };
}

function notNull<T>(value: T | null): value is T {
    return value !== null;
}

/**
 * One module of a page. `items` holds whatever the module lists.
 */
export abstract class Category {
    readonly type: string;
    readonly title: string | null;
    readonly description: string | null;
    protected readonly more: ShowMore | null;
    abstract readonly items: ReadonlyArray<PageEntry>;

    constructor(
        protected readonly session: Session,
        json: JsonObject,
    ) {
        this.type = readString(json, "type") ?? "";
        this.title = readString(json, "title");
        this.description = readString(json, "description");
        this.more = parseShowMore(json);
    }

    /** The full listing behind "view all", or null when there is none. */
    async showMore(): Promise<Page | null> {
        if (!this.more) return null;
        return this.session.page(this.more.apiPath);
    }
}

export class FeaturedItems extends Category {
    readonly items: PageItem[];

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        this.items = readObjects(json, "items").map((item) => new PageItem(session, item));
    }
}

export class PageLinks extends Category {
    readonly items: PageLink[];

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        const pagedList = readObject(json, "pagedList") ?? {};
        this.items = readObjects(pagedList, "items").map((item) => new PageLink(session, item));
    }
}

const ITEM_LIST_PARSERS = {
    ALBUM_LIST: (session: Session) => session.parseAlbum,
    ARTIST_LIST: (session: Session) => session.parseArtist,
    TRACK_LIST: (session: Session) => session.parseTrack,
    PLAYLIST_LIST: (session: Session) => session.parsePlaylist,
    VIDEO_LIST: (session: Session) => session.parseVideo,
    MIX_LIST: (session: Session) => session.parseMix,
} satisfies Record<string, (session: Session) => (json: JsonObject) => CatalogItem>;

type ItemListType = keyof typeof ITEM_LIST_PARSERS;

function isItemListType(type: string): type is ItemListType {
    return Object.prototype.hasOwnProperty.call(ITEM_LIST_PARSERS, type);
}

const TYPED_ITEM_LISTS = new Set([
    "HIGHLIGHT_MODULE",
    "MIXED_TYPES_LIST",
    "ALBUM_ITEMS",
    "ITEM_LIST_WITH_ROLES",
]);

/**
 * A list of catalog entries: one kind for `*_LIST` modules, mixed for the
 * rest, where every entry is `{ type, item }`.
 */
export class ItemList extends Category {
    readonly items: CatalogItem[];

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        const pagedList = readObject(json, "pagedList") ?? {};

        if (isItemListType(this.type)) {
            const parse: Parser<CatalogItem> = ITEM_LIST_PARSERS[this.type](session);
            this.items = mapItems(readObjects(pagedList, "items"), parse);
            return;
        }

        let entries: JsonObject[];
        if (this.type === "HIGHLIGHT_MODULE") {
            entries = readObjects(json, "highlights")
                .map((highlight) => readObject(highlight, "item"))
                .filter(notNull);
        } else if (this.type === "ITEM_LIST_WITH_ROLES") {
            entries = readObjects(pagedList, "items").map((entry) => {
                const item = readObject(entry, "item");
                return item ? { ...entry, item: { ...item, artistRoles: entry.roles } } : entry;
            });
        } else {
            entries = readObjects(pagedList, "items");
        }

        this.items = mapItems<CatalogItem | null>(
            entries,
            (entry) => session.parseTyped(readString(entry, "type") ?? "", entry),
            session.parseTyped,
        ).filter(notNull);
    }
}

export class TextBlock extends Category {
    readonly text: string;
    readonly icon: string | null;
    readonly items: string[];

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        this.text = readString(json, "text") ?? "";
        this.icon = readString(json, "icon");
        this.items = [this.text];
    }
}

/** Articles or social profile links, kept as raw objects. */
export class LinkList extends Category {
    readonly items: JsonObject[];

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        if (this.type === "SOCIAL") {
            this.items = readObjects(json, "socialProfiles");
        } else {
            this.items = readObjects(readObject(json, "pagedList") ?? {}, "items");
        }
    }
}

/** A module type this library does not know; `raw` keeps its JSON. */
export class UnsupportedCategory extends Category {
    readonly items: never[] = [];

    constructor(
        session: Session,
        readonly raw: JsonObject,
    ) {
        super(session, raw);
    }
}

export type PageModule = Category | Mix | Artist | Album;
export type PageEntry = CatalogItem | PageItem | PageLink | string | JsonObject;

export function parseCategory(session: Session, json: JsonObject): PageModule {
    const type = readString(json, "type") ?? "";

    switch (type) {
        case "PAGE_LINKS_CLOUD":
        case "PAGE_LINKS":
            return new PageLinks(session, json);
        case "FEATURED_PROMOTIONS":
        case "MULTIPLE_TOP_PROMOTIONS":
            return new FeaturedItems(session, json);
        case "MIX_HEADER":
            return session.parseMix(readObject(json, "mix") ?? {});
        case "ARTIST_HEADER": {
            const artist = session.parseArtist(readObject(json, "artist") ?? {});
            artist.bio = readString(asBio(json), "text");
            return artist;
        }
        case "ALBUM_HEADER":
            return session.parseAlbum(readObject(json, "album") ?? {});
        case "TEXT_BLOCK":
            return new TextBlock(session, json);
        case "ARTICLE_LIST":
        case "SOCIAL":
            return new LinkList(session, json);
        default:
            if (isItemListType(type) || TYPED_ITEM_LISTS.has(type)) {
                return new ItemList(session, json);
            }
            log.info(`Page module type ${type || "(none)"} is not supported, skipping its items`);
            return new UnsupportedCategory(session, json);
    }
}

/** The artist header's `bio` is either a string or `{ text }`. */
function asBio(json: JsonObject): JsonObject {
    const bio = json.bio;
    if (typeof bio === "string") return { text: bio };
    return isJsonObject(bio) ? bio : {};
}

/**
 * A browsable page such as home or explore. Iterating yields every entry of
 * every module in reading order; header modules yield themselves.
 */
export class Page implements Iterable<PageEntry | PageModule> {
    readonly title: string | null;
    readonly categories: PageModule[];

    constructor(session: Session, json: JsonObject) {
        this.title = readString(json, "title");
        this.categories = readObjects(json, "rows")
            .map((row) => readObjects(row, "modules")[0])
            .filter((module): module is JsonObject => module !== undefined)
            .map((module) => parseCategory(session, module));
    }

    static get(session: Session, endpoint: string, params: QueryParams = {}): Promise<Page> {
        return session.request.mapObject(
            endpoint,
            { deviceType: "BROWSER", ...params },
            session.parsePage,
        );
    }

    *[Symbol.iterator](): Iterator<PageEntry | PageModule> {
        for (const category of this.categories) {
            if (category instanceof Category) {
                yield* category.items;
            } else {
                yield category;
            }
        }
    }
}

/** A link to another page; `get()` loads it. */
export class PageLink {
    readonly title: string | null;
    readonly icon: string | null;
    readonly apiPath: string;
    readonly imageId: string | null;

    constructor(
        private readonly session: Session,
        json: JsonObject,
    ) {
        this.title = readString(json, "title");
        this.icon = readString(json, "icon");
        this.apiPath = readString(json, "apiPath") ?? "";
        this.imageId = readString(json, "imageId");
    }

    get(): Promise<Page> {
        return this.session.request.mapObject(
            this.apiPath,
            { deviceType: "DESKTOP" },
            this.session.parsePage,
        );
    }
}

/** A promoted entry; `get()` fetches the entity it points at. */
export class PageItem {
    readonly header: string | null;
    readonly shortHeader: string | null;
    readonly shortSubHeader: string | null;
    readonly imageId: string | null;
    readonly type: string | null;
    readonly artifactId: string;
    readonly text: string | null;
    readonly featured: boolean;

    constructor(
        private readonly session: Session,
        json: JsonObject,
    ) {
        this.header = readString(json, "header");
        this.shortHeader = readString(json, "shortHeader");
        this.shortSubHeader = readString(json, "shortSubHeader");
        this.imageId = readString(json, "imageId");
        this.type = readString(json, "type");
        const artifactId = json.artifactId;
        this.artifactId =
            typeof artifactId === "string" || typeof artifactId === "number"
                ? String(artifactId)
                : "";
        this.text = readString(json, "text");
        this.featured = readBoolean(json, "featured");
    }

    get(): Promise<CatalogItem> {
        switch (this.type) {
            case "PLAYLIST":
                return this.session.playlist(this.artifactId);
            case "VIDEO":
                return this.session.video(this.artifactId);
            case "TRACK":
                return this.session.track(this.artifactId);
            case "ARTIST":
                return this.session.artist(this.artifactId);
            case "ALBUM":
                return this.session.album(this.artifactId);
            case "MIX":
                return this.session.mix(this.artifactId);
            default:
                return Promise.reject(
                    new TypeError(`Page item type ${this.type ?? "(none)"} is not supported`),
                );
        }
    }
}
