/**
 * Narrow readers for loosely typed API payloads.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readObject(source: JsonObject, key: string): JsonObject | null {
    const value = source[key];
    return isJsonObject(value) ? value : null;
}

export function readArray(source: JsonObject, key: string): unknown[] {
    const value = source[key];
    return Array.isArray(value) ? value : [];
}

export function readObjects(source: JsonObject, key: string): JsonObject[] {
    return readArray(source, key).filter(isJsonObject);
}

export function readString(source: JsonObject, key: string): string | null {
    const value = source[key];
    return typeof value === "string" ? value : null;
}

export function readNumber(source: JsonObject, key: string): number | null {
    const value = source[key];
    if (typeof value === "number" && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function readBoolean(source: JsonObject, key: string): boolean {
    return Boolean(source[key]);
}

export function readStrings(source: JsonObject, key: string): string[] {
    return readArray(source, key).filter(
        (entry): entry is string => typeof entry === "string",
    );
}

/** Numeric or string identifiers, normalized to a string. */
export function readId(source: JsonObject, key = "id"): string | null {
    const value = source[key];
    if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value === "string" && value.length > 0) {
        return value;
    }
    return null;
}

export function asJsonObject(value: unknown): JsonObject {
    return isJsonObject(value) ? value : {};
}

/** `value` when it is one of `values`, else null. */
export function toEnum<E extends string>(values: readonly E[], value: unknown): E | null {
    if (typeof value !== "string") return null;
    const index = values.findIndex((candidate) => candidate === value);
    return index >= 0 ? values[index] : null;
}
