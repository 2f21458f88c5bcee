export {
    Quality,
    VideoQuality,
    MAX_ITEM_LIMIT,
    DEFAULT_CONFIG,
    createConfig,
    configFromEnv,
    type Config,
    type ConfigOptions,
} from "./config";
export {
    Session,
    SEARCH_MODELS,
    sessionDataSchema,
    type CatalogItem,
    type DeviceLogin,
    type LinkLogin,
    type SearchModel,
    type SearchResult,
    type SessionData,
    type SessionFileOptions,
} from "./services/session";
export {
    Requests,
    mapJson,
    mapItems,
    isOk,
    PAGE_SIZE,
    type PaginatedResult,
    type Parser,
    type QueryParams,
    type RequestOptions,
    type TypedParser,
} from "./services/request";
export { Album, ALBUM_IMAGE_SIZES, type AlbumImageSize } from "./models/album";
export { Artist, Role, ARTIST_IMAGE_SIZES, type ArtistImageSize } from "./models/artist";
export { Genre, Genres } from "./models/genre";
export { Media, Track, Video, Lyrics, VIDEO_IMAGE_SIZES, type ArtistRole } from "./models/media";
export { Mix, MixType, MIX_IMAGE_SIZES, type MixImage, type MixImageSize } from "./models/mix";
export {
    Page,
    Category,
    FeaturedItems,
    PageLinks,
    ItemList,
    TextBlock,
    LinkList,
    UnsupportedCategory,
    PageLink,
    PageItem,
    type PageEntry,
    type PageModule,
} from "./models/page";
export {
    Playlist,
    UserPlaylist,
    PLAYLIST_IMAGE_SIZES,
    type AddOptions,
    type PlaylistImageSize,
} from "./models/playlist";
export {
    Stream,
    StreamManifest,
    DashInfo,
    ManifestMimeType,
    Codec,
    MimeType,
    AudioMode,
    MediaMetadataTags,
    mimeTypeFromAudioCodec,
    type DashSegment,
} from "./models/stream";
export {
    User,
    FetchedUser,
    LoggedInUser,
    PlaylistCreator,
    Favorites,
    USER_IMAGE_SIZES,
    type FavoriteKind,
    type UserImageSize,
} from "./models/user";
export * from "./utils/errors";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./utils/logger";
