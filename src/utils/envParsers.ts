/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value.trim()
            : String(fallback);
    return Number.parseInt(source, 10);
}

export function parseEnvString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
