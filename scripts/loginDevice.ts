/**
 * Logs in with the device flow and stores the session for the other scripts.
 *
 * Usage:
 *   npm run login -- [session-file]
 *
 * Reads TIDAL_CLIENT_ID (and TIDAL_CLIENT_SECRET) from the environment or .env.
 */

import dotenv from "dotenv";
import { configFromEnv, Session } from "../src";

dotenv.config();

const DEFAULT_SESSION_FILE = "tidal-session.json";

async function loginDevice() {
    const sessionFile = process.argv[2] ?? DEFAULT_SESSION_FILE;
    const session = new Session(configFromEnv());

    await session.loginSessionFile(sessionFile, {
        notify: (message) => console.log(message),
    });

    const user = session.user;
    console.log("=".repeat(60));
    console.log(`Logged in as ${user?.username ?? user?.id ?? "unknown user"}`);
    console.log(`Country: ${session.countryCode ?? "unknown"}`);
    console.log(`Token expires: ${session.expiryTime?.toISOString() ?? "unknown"}`);
    console.log(`Session stored in ${sessionFile}`);
    console.log("=".repeat(60));
}

loginDevice().catch((error: unknown) => {
    console.error("Login failed:", error instanceof Error ? error.message : error);
    process.exit(1);
});
