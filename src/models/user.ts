import { formatResourceUrl } from "../config";
import type { Session } from "../services/session";
import { isOk } from "../services/request";
import { parseDate } from "../utils/dates";
import { MetadataNotAvailable } from "../utils/errors";
import {
    asJsonObject,
    readBoolean,
    readId,
    readNumber,
    readString,
    type JsonObject,
} from "../utils/json";
import type { Album } from "./album";
import type { Artist } from "./artist";
import type { Track, Video } from "./media";
import type { Playlist, UserPlaylist } from "./playlist";

export const USER_IMAGE_SIZES = [100, 210, 600] as const;
export type UserImageSize = (typeof USER_IMAGE_SIZES)[number];

/**
 * Any account. `id` is the only field every kind carries.
 */
export abstract class User {
    readonly id: number;

    protected constructor(
        protected readonly session: Session,
        json: JsonObject,
    ) {
        this.id = readNumber(json, "id") ?? 0;
    }

    /**
     * Picks the most specific user kind the payload supports: a full
     * account, a public profile, or a bare playlist creator.
     */
    static parse(session: Session, json: JsonObject): User {
        if ("username" in json) {
            return new LoggedInUser(session, json);
        }
        if ("firstName" in json) {
            return new FetchedUser(session, json);
        }
        return new PlaylistCreator(session, json);
    }
}

export class FetchedUser extends User {
    readonly firstName: string | null;
    readonly lastName: string | null;
    readonly pictureId: string | null;

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        this.firstName = readString(json, "firstName");
        this.lastName = readString(json, "lastName");
        this.pictureId = readString(json, "picture");
    }

    image(dimensions: UserImageSize): string {
        if (!USER_IMAGE_SIZES.includes(dimensions)) {
            throw new RangeError(`Invalid resolution ${dimensions} x ${dimensions}`);
        }
        if (!this.pictureId) {
            throw new MetadataNotAvailable(`User ${this.id} has no picture`);
        }
        return formatResourceUrl(this.session.config.imageUrl, this.pictureId, dimensions, dimensions);
    }
}

export class LoggedInUser extends FetchedUser {
    readonly username: string | null;
    readonly email: string | null;
    readonly created: Date | null;
    readonly newsletter: boolean;
    readonly acceptedEula: boolean;
    readonly gender: string | null;
    readonly dateOfBirth: string | null;
    readonly facebookUid: string | null;
    readonly appleUid: string | null;
    readonly favorites: Favorites;

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        this.username = readString(json, "username");
        this.email = readString(json, "email");
        this.created = parseDate(json.created);
        this.newsletter = readBoolean(json, "newsletter");
        this.acceptedEula = readBoolean(json, "acceptedEULA");
        this.gender = readString(json, "gender");
        this.dateOfBirth = readString(json, "dateOfBirth");
        this.facebookUid = readId(json, "facebookUid");
        this.appleUid = readId(json, "appleUid");
        this.favorites = new Favorites(session, this.id);
    }

    /** Playlists this user created. */
    playlists(): Promise<Playlist[]> {
        return this.session.request.mapList(
            `users/${this.id}/playlists`,
            undefined,
            this.session.parsePlaylist,
        );
    }

    /** Created playlists followed by favorited ones. */
    async playlistAndFavoritePlaylists(): Promise<Playlist[]> {
        const own = await this.playlists();
        const favorites = await this.favorites.playlists();
        return [...own, ...favorites];
    }

    async createPlaylist(title: string, description = ""): Promise<UserPlaylist> {
        const response = await this.session.request.request("POST", `users/${this.id}/playlists`, {
            data: new URLSearchParams({ title, description }),
        });
        const uuid = readString(asJsonObject(response.data), "uuid");
        if (!uuid) {
            throw new MetadataNotAvailable("Created playlist response has no uuid");
        }
        return this.session.userPlaylist(uuid);
    }
}

/**
 * The creator of a playlist. `name` is "TIDAL" for editorial playlists, "me"
 * for the logged-in user and "user" for anyone else without a name.
 */
export class PlaylistCreator extends User {
    readonly name: string;

    constructor(session: Session, json: JsonObject) {
        super(session, json);
        const name = readString(json, "name");
        if (this.id === 0) {
            this.name = "TIDAL";
        } else if (name !== null) {
            this.name = name;
        } else if (session.user !== null && this.id === session.user.id) {
            this.name = "me";
        } else {
            this.name = "user";
        }
    }
}

export type FavoriteKind = "albums" | "artists" | "playlists" | "tracks" | "videos";

/**
 * The logged-in user's favorites. Adds and removes report whether the
 * service accepted the change.
 */
export class Favorites {
    private readonly basePath: string;

    constructor(
        private readonly session: Session,
        userId: number,
    ) {
        this.basePath = `users/${userId}/favorites`;
    }

    private async add(kind: FavoriteKind, field: string, id: number | string): Promise<boolean> {
        const response = await this.session.request.basicRequest("POST", `${this.basePath}/${kind}`, {
            data: new URLSearchParams({ [field]: String(id) }),
        });
        return isOk(response);
    }

    private async remove(kind: FavoriteKind, id: number | string): Promise<boolean> {
        const response = await this.session.request.basicRequest(
            "DELETE",
            `${this.basePath}/${kind}/${id}`,
        );
        return isOk(response);
    }

    addAlbum(albumId: number | string): Promise<boolean> {
        return this.add("albums", "albumId", albumId);
    }

    addArtist(artistId: number | string): Promise<boolean> {
        return this.add("artists", "artistId", artistId);
    }

    addPlaylist(playlistId: string): Promise<boolean> {
        return this.add("playlists", "uuids", playlistId);
    }

    addTrack(trackId: number | string): Promise<boolean> {
        return this.add("tracks", "trackId", trackId);
    }

    addVideo(videoId: number | string): Promise<boolean> {
        return this.add("videos", "videoIds", videoId);
    }

    removeAlbum(albumId: number | string): Promise<boolean> {
        return this.remove("albums", albumId);
    }

    removeArtist(artistId: number | string): Promise<boolean> {
        return this.remove("artists", artistId);
    }

    removePlaylist(playlistId: string): Promise<boolean> {
        return this.remove("playlists", playlistId);
    }

    removeTrack(trackId: number | string): Promise<boolean> {
        return this.remove("tracks", trackId);
    }

    removeVideo(videoId: number | string): Promise<boolean> {
        return this.remove("videos", videoId);
    }

    artists(limit?: number, offset = 0): Promise<Artist[]> {
        return this.session.request.mapList(
            `${this.basePath}/artists`,
            { limit, offset },
            this.session.parseArtist,
        );
    }

    albums(limit?: number, offset = 0): Promise<Album[]> {
        return this.session.request.mapList(
            `${this.basePath}/albums`,
            { limit, offset },
            this.session.parseAlbum,
        );
    }

    playlists(limit?: number, offset = 0): Promise<Playlist[]> {
        return this.session.request.mapList(
            `${this.basePath}/playlists`,
            { limit, offset },
            this.session.parsePlaylist,
        );
    }

    tracks(limit?: number, offset = 0): Promise<Track[]> {
        return this.session.request.mapList(
            `${this.basePath}/tracks`,
            { limit, offset },
            this.session.parseTrack,
        );
    }

    /** Every favorite video, fetched 100 at a time. */
    videos(): Promise<Array<Track | Video>> {
        return this.session.request.getItems(`${this.basePath}/videos`, this.session.parseMedia);
    }
}
