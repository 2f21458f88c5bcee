import type { AxiosInstance, AxiosResponse, Method } from "axios";
import type { Config } from "../config";
import { errorFromResponse, type TidalResponse } from "../utils/errors";
import { asJsonObject, isJsonObject, type JsonObject } from "../utils/json";
import { logger } from "../utils/logger";

const log = logger.child("request");

/** Token expiry as reported in `userMessage` / `subStatus`. */
const EXPIRED_TOKEN_MESSAGE = "The token has expired.";
const EXPIRED_TOKEN_SUB_STATUS = 11003;

export const PAGE_SIZE = 100;

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
    params?: QueryParams;
    data?: URLSearchParams | JsonObject;
    headers?: Record<string, string>;
    /** Resolves relative paths against this instead of `config.apiLocation`. */
    baseUrl?: string;
}

export type Parser<T> = (json: JsonObject) => T;
export type TypedParser<T> = (type: string, json: JsonObject) => T | null;

export interface PaginatedResult<T> {
    items: T[];
    offset: number;
    limit: number;
    totalNumberOfItems: number;
}

/**
 * The parts of a session the request layer reads and refreshes.
 */
export interface RequestSession {
    readonly config: Config;
    sessionId: string | null;
    countryCode: string | null;
    tokenType: string | null;
    accessToken: string | null;
    refreshToken: string | null;
    tokenRefresh(refreshToken: string): Promise<void>;
}

export function isOk(response: TidalResponse): boolean {
    return response.status >= 200 && response.status < 300;
}

function isExpiredToken(data: unknown): boolean {
    if (!isJsonObject(data)) return false;
    const message = data.userMessage;
    if (typeof message === "string" && message.startsWith(EXPIRED_TOKEN_MESSAGE)) {
        return true;
    }
    return data.subStatus === EXPIRED_TOKEN_SUB_STATUS;
}

function normalizeHeaders(headers: AxiosResponse["headers"] | undefined): Record<string, string> {
    const output: Record<string, string> = {};
    if (!headers) return output;
    for (const [key, value] of Object.entries(headers)) {
        if (typeof value === "string") {
            output[key.toLowerCase()] = value;
        } else if (typeof value === "number") {
            output[key.toLowerCase()] = String(value);
        } else if (Array.isArray(value)) {
            output[key.toLowerCase()] = value.join(", ");
        }
    }
    return output;
}

export function toTidalResponse(response: AxiosResponse, url: string): TidalResponse {
    return {
        status: response.status,
        url,
        headers: normalizeHeaders(response.headers),
        data: response.data,
    };
}

/**
 * Maps a response body onto entities. A body without `items` is a single
 * entity; `{ item }` wrappers are unwrapped, and `{ type, item }` entries go
 * through `dispatch` when one is given.
 */
export function mapJson<T>(
    json: unknown,
    parse: Parser<T>,
    dispatch?: TypedParser<T>,
): T | T[] {
    const body = asJsonObject(json);
    const items = body.items;
    if (!Array.isArray(items)) {
        return parse(body);
    }
    return mapItems(items, parse, dispatch);
}

export function mapItems<T>(
    items: unknown[],
    parse: Parser<T>,
    dispatch?: TypedParser<T>,
): T[] {
    const output: T[] = [];
    for (const entry of items) {
        if (!isJsonObject(entry)) continue;
        const wrapped = entry.item;
        if (!isJsonObject(wrapped)) {
            output.push(parse(entry));
            continue;
        }
        if (dispatch && typeof entry.type === "string") {
            const parsed = dispatch(entry.type, wrapped);
            if (parsed !== null) {
                output.push(parsed);
            }
            continue;
        }
        output.push(parse(wrapped));
    }
    return output;
}

function asList<T>(mapped: T | T[]): T[] {
    return Array.isArray(mapped) ? mapped : [mapped];
}

export class Requests {
    /** The last non-2xx response seen by `request`. */
    latestErrorResponse: TidalResponse | null = null;

    constructor(
        private readonly session: RequestSession,
        private readonly http: AxiosInstance,
    ) {}

    private buildParams(params: QueryParams | undefined): Record<string, string | number | boolean> {
        const output: Record<string, string | number | boolean> = {
            limit: this.session.config.itemLimit,
        };
        if (this.session.sessionId) output.sessionId = this.session.sessionId;
        if (this.session.countryCode) output.countryCode = this.session.countryCode;

        for (const [key, value] of Object.entries(params ?? {})) {
            if (value !== null && value !== undefined) {
                output[key] = value;
            }
        }
        return output;
    }

    private buildHeaders(headers: Record<string, string> | undefined): Record<string, string> {
        const output: Record<string, string> = { ...headers };
        if (this.session.tokenType && this.session.accessToken) {
            output.Authorization = `${this.session.tokenType} ${this.session.accessToken}`;
        }
        return output;
    }

    /**
     * Sends one request and returns the raw response whatever its status.
     * An expired access token is refreshed and the request retried once.
     */
    async basicRequest(
        method: Method,
        path: string,
        options: RequestOptions = {},
    ): Promise<TidalResponse> {
        const url = new URL(path, options.baseUrl ?? this.session.config.apiLocation).toString();
        const response = await this.send(method, url, options);

        const refreshToken = this.session.refreshToken;
        if (!isOk(response) && refreshToken && isExpiredToken(response.data)) {
            log.debug("The access token has expired, trying to refresh it.");
            await this.session.tokenRefresh(refreshToken);
            return this.send(method, url, options);
        }

        return response;
    }

    private async send(
        method: Method,
        url: string,
        options: RequestOptions,
    ): Promise<TidalResponse> {
        const params = this.buildParams(options.params);
        log.debug(`request: ${method} ${url}`, { params });

        const response = await this.http.request({
            method,
            url,
            params,
            data: options.data,
            headers: this.buildHeaders(options.headers),
        });

        if (response.data !== undefined && response.data !== "") {
            log.debug("response:", { status: response.status, data: response.data });
        }

        return toTidalResponse(response, url);
    }

    /**
     * Like `basicRequest`, but throws the matching `TidalError` on non-2xx.
     */
    async request(
        method: Method,
        path: string,
        options: RequestOptions = {},
    ): Promise<TidalResponse> {
        const response = await this.basicRequest(method, path, options);
        if (isOk(response)) {
            return response;
        }

        this.latestErrorResponse = response;
        log.info(`Request to ${response.url} failed with status ${response.status}`, {
            body: response.data,
        });
        throw errorFromResponse(response);
    }

    async mapRequest<T>(
        path: string,
        params: QueryParams | undefined,
        parse: Parser<T>,
        dispatch?: TypedParser<T>,
    ): Promise<T | T[]> {
        const response = await this.request("GET", path, { params });
        return mapJson(response.data, parse, dispatch);
    }

    mapJsonList<T>(json: unknown, parse: Parser<T>, dispatch?: TypedParser<T>): T[] {
        return asList(mapJson(json, parse, dispatch));
    }

    async mapObject<T>(path: string, params: QueryParams | undefined, parse: Parser<T>): Promise<T> {
        const response = await this.request("GET", path, { params });
        return parse(asJsonObject(response.data));
    }

    async mapList<T>(
        path: string,
        params: QueryParams | undefined,
        parse: Parser<T>,
        dispatch?: TypedParser<T>,
    ): Promise<T[]> {
        return asList(await this.mapRequest(path, params, parse, dispatch));
    }

    /**
     * Pages through `path` 100 entries at a time until a short page comes back.
     */
    async getItems<T>(path: string, parse: Parser<T>, params: QueryParams = {}): Promise<T[]> {
        const collected: T[] = [];
        let offset = 0;
        let received = PAGE_SIZE;

        while (received === PAGE_SIZE) {
            const items = await this.mapList(path, { ...params, offset, limit: PAGE_SIZE }, parse);
            received = items.length;
            offset += PAGE_SIZE;
            collected.push(...items);
        }

        return collected;
    }

    async paginate<T>(
        path: string,
        parse: Parser<T>,
        options: { offset?: number; limit?: number; params?: QueryParams } = {},
    ): Promise<PaginatedResult<T>> {
        const offset = options.offset ?? 0;
        const limit = options.limit ?? this.session.config.itemLimit;
        const response = await this.request("GET", path, {
            params: { ...options.params, offset, limit },
        });

        const body = asJsonObject(response.data);
        const rawItems = Array.isArray(body.items) ? body.items : [];
        const items = mapItems(rawItems, parse);
        const total = typeof body.totalNumberOfItems === "number"
            ? body.totalNumberOfItems
            : items.length;

        return {
            items,
            offset: typeof body.offset === "number" ? body.offset : offset,
            limit: typeof body.limit === "number" ? body.limit : limit,
            totalNumberOfItems: total,
        };
    }
}
