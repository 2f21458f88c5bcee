import { isValid, parseISO } from "date-fns";

/**
 * ISO-8601 timestamp to Date; missing or unparseable values become null.
 */
export function parseDate(value: unknown): Date | null {
    if (typeof value !== "string" || value.length === 0) {
        return null;
    }
    const parsed = parseISO(value);
    return isValid(parsed) ? parsed : null;
}

const DURATION_PATTERN =
    /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * ISO-8601 duration (as used by MPD `mediaPresentationDuration`) in seconds.
 */
export function parseDurationSeconds(value: string | undefined): number {
    if (!value) return 0;
    const match = value.trim().match(DURATION_PATTERN);
    if (!match) return 0;
    const [, days, hours, minutes, seconds] = match;
    return (
        Number(days ?? 0) * 86400 +
        Number(hours ?? 0) * 3600 +
        Number(minutes ?? 0) * 60 +
        Number(seconds ?? 0)
    );
}
