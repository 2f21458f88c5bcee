import { readFileSync } from "node:fs";
import path from "node:path";
import { isJsonObject, type JsonObject } from "../utils/json";

export interface MockReply {
    status: number;
    data: unknown;
    headers: Record<string, string>;
    config: Record<string, never>;
}

/** Shape of what the mocked axios instance resolves with. */
export function reply(
    status: number,
    data: unknown,
    headers: Record<string, string> = {},
): MockReply {
    return { status, data, headers, config: {} };
}

export function fixture(name: string): JsonObject {
    const parsed: unknown = JSON.parse(
        readFileSync(path.join(__dirname, "fixtures", `${name}.json`), "utf8"),
    );
    if (!isJsonObject(parsed)) {
        throw new Error(`Fixture ${name} is not a JSON object`);
    }
    return parsed;
}
