import { z } from "zod";
import { ConfigError } from "./utils/errors";
import { parseEnvInt, parseEnvString } from "./utils/envParsers";
import { logger } from "./utils/logger";

const log = logger.child("config");

export enum Quality {
    low_96k = "LOW",
    low_320k = "HIGH",
    high_lossless = "LOSSLESS",
    /** MQA, superseded by `hi_res_lossless`. */
    hi_res = "HI_RES",
    hi_res_lossless = "HI_RES_LOSSLESS",
}

export enum VideoQuality {
    high = "HIGH",
    medium = "MEDIUM",
    low = "LOW",
    audio_only = "AUDIO_ONLY",
}

/** The service refuses larger pages. */
export const MAX_ITEM_LIMIT = 10000;

export interface Config {
    quality: Quality;
    videoQuality: VideoQuality;
    itemLimit: number;
    timeoutMs: number;

    clientId: string | null;
    clientSecret: string | null;
    clientIdPkce: string | null;
    clientSecretPkce: string | null;

    apiLocation: string;
    openApiV2Location: string;
    authLocation: string;
    pkceAuthorizeUrl: string;
    pkceRedirectUri: string;
    imageUrl: string;
    videoUrl: string;
    listenBaseUrl: string;
    shareBaseUrl: string;
}

export type ConfigOptions = Partial<Config>;

export const DEFAULT_CONFIG: Readonly<Config> = {
    quality: Quality.low_320k,
    videoQuality: VideoQuality.high,
    itemLimit: 1000,
    timeoutMs: 30000,

    clientId: null,
    clientSecret: null,
    clientIdPkce: null,
    clientSecretPkce: null,

    apiLocation: "https://api.tidal.com/v1/",
    openApiV2Location: "https://openapi.tidal.com/v2/",
    authLocation: "https://auth.tidal.com/v1/oauth2/",
    pkceAuthorizeUrl: "https://login.tidal.com/authorize",
    pkceRedirectUri: "https://tidal.com/android/login/auth",
    imageUrl: "https://resources.tidal.com/images/{id}/{width}x{height}.jpg",
    videoUrl: "https://resources.tidal.com/videos/{id}/{width}x{height}.mp4",
    listenBaseUrl: "https://listen.tidal.com",
    shareBaseUrl: "https://tidal.com/browse",
};

export function createConfig(options: ConfigOptions = {}): Config {
    const merged: Config = { ...DEFAULT_CONFIG, ...stripUndefined(options) };

    if (merged.itemLimit > MAX_ITEM_LIMIT) {
        log.warn(
            `Item limit was set above ${MAX_ITEM_LIMIT}, which is not supported, using ${MAX_ITEM_LIMIT}`,
        );
        merged.itemLimit = MAX_ITEM_LIMIT;
    }

    return merged;
}

function stripUndefined(options: ConfigOptions): ConfigOptions {
    const output: ConfigOptions = {};
    for (const [key, value] of Object.entries(options)) {
        if (value !== undefined) {
            Object.assign(output, { [key]: value });
        }
    }
    return output;
}

const envSchema = z.object({
    TIDAL_QUALITY: z.nativeEnum(Quality).optional(),
    TIDAL_VIDEO_QUALITY: z.nativeEnum(VideoQuality).optional(),
    TIDAL_ITEM_LIMIT: z
        .string()
        .regex(/^\d+$/, "TIDAL_ITEM_LIMIT must be a positive integer")
        .optional(),
    TIDAL_TIMEOUT_MS: z
        .string()
        .regex(/^\d+$/, "TIDAL_TIMEOUT_MS must be a positive integer")
        .optional(),
    TIDAL_CLIENT_ID: z.string().optional(),
    TIDAL_CLIENT_SECRET: z.string().optional(),
    TIDAL_CLIENT_ID_PKCE: z.string().optional(),
    TIDAL_CLIENT_SECRET_PKCE: z.string().optional(),
});

/**
 * Builds a config from `TIDAL_*` environment variables, on top of `overrides`.
 */
export function configFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOptions = {},
): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (err) => `${err.path.join(".")}: ${err.message}`,
        );
        throw new ConfigError("Environment validation failed", issues);
    }

    const vars = parsed.data;
    return createConfig({
        quality: vars.TIDAL_QUALITY,
        videoQuality: vars.TIDAL_VIDEO_QUALITY,
        itemLimit: vars.TIDAL_ITEM_LIMIT
            ? parseEnvInt(vars.TIDAL_ITEM_LIMIT, DEFAULT_CONFIG.itemLimit)
            : undefined,
        timeoutMs: vars.TIDAL_TIMEOUT_MS
            ? parseEnvInt(vars.TIDAL_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs)
            : undefined,
        clientId: parseEnvString(vars.TIDAL_CLIENT_ID),
        clientSecret: parseEnvString(vars.TIDAL_CLIENT_SECRET),
        clientIdPkce: parseEnvString(vars.TIDAL_CLIENT_ID_PKCE),
        clientSecretPkce: parseEnvString(vars.TIDAL_CLIENT_SECRET_PKCE),
        ...stripUndefined(overrides),
    });
}

/**
 * Fills an `{id}`, `{width}`, `{height}` template with a resource id whose
 * dashes become path separators.
 */
export function formatResourceUrl(
    template: string,
    resourceId: string,
    width: number,
    height: number,
): string {
    return template
        .replace("{id}", resourceId.replace(/-/g, "/"))
        .replace("{width}", String(width))
        .replace("{height}", String(height));
}
