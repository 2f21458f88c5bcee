import { formatResourceUrl } from "../config";
import type { CatalogItem, SearchModel, Session } from "../services/session";
import { isJsonObject, readBoolean, readString, type JsonObject } from "../utils/json";

const GENRE_IMAGE_WIDTH = 460;
const GENRE_IMAGE_HEIGHT = 306;

export class Genre {
    readonly name: string | null;
    readonly path: string;
    readonly hasPlaylists: boolean;
    readonly hasArtists: boolean;
    readonly hasAlbums: boolean;
    readonly hasTracks: boolean;
    readonly hasVideos: boolean;
    /** URL of the 460x306 banner, when the genre has one. */
    readonly image: string | null;

    constructor(
        private readonly session: Session,
        json: JsonObject,
    ) {
        this.name = readString(json, "name");
        this.path = readString(json, "path") ?? "";
        this.hasPlaylists = readBoolean(json, "hasPlaylists");
        this.hasArtists = readBoolean(json, "hasArtists");
        this.hasAlbums = readBoolean(json, "hasAlbums");
        this.hasTracks = readBoolean(json, "hasTracks");
        this.hasVideos = readBoolean(json, "hasVideos");

        const image = readString(json, "image");
        this.image = image
            ? formatResourceUrl(session.config.imageUrl, image, GENRE_IMAGE_WIDTH, GENRE_IMAGE_HEIGHT)
            : null;
    }

    private has(model: SearchModel): boolean {
        switch (model) {
            case "playlists":
                return this.hasPlaylists;
            case "artists":
                return this.hasArtists;
            case "albums":
                return this.hasAlbums;
            case "tracks":
                return this.hasTracks;
            case "videos":
                return this.hasVideos;
        }
    }

    /** The genre's entries of one kind. */
    items(model: SearchModel): Promise<CatalogItem[]> {
        if (!this.has(model)) {
            return Promise.reject(new TypeError(`This genre does not contain ${model}`));
        }
        return this.session.request.mapList(
            `genres/${this.path}/${model}`,
            undefined,
            this.session.parserFor(model),
        );
    }
}

export class Genres {
    constructor(private readonly session: Session) {}

    async getGenres(): Promise<Genre[]> {
        const response = await this.session.request.request("GET", "genres");
        const entries: unknown[] = Array.isArray(response.data) ? response.data : [];
        return entries.filter(isJsonObject).map((entry) => new Genre(this.session, entry));
    }
}
