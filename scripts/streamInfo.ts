/**
 * Prints the stream manifest of one track using a stored session.
 *
 * Usage:
 *   npm run stream-info -- <track-id> [session-file]
 *
 * Example:
 *   npm run stream-info -- 1001 tidal-session.json
 */

import dotenv from "dotenv";
import { configFromEnv, Session } from "../src";

dotenv.config();

async function streamInfo() {
    const trackId = process.argv[2];
    const sessionFile = process.argv[3] ?? "tidal-session.json";

    if (!trackId) {
        console.log("Usage: npm run stream-info -- <track-id> [session-file]");
        process.exit(1);
    }

    const session = new Session(configFromEnv());
    if (!(await session.loadSessionFromFile(sessionFile))) {
        console.log(`No usable session in ${sessionFile}, run "npm run login" first`);
        process.exit(1);
    }

    const track = await session.track(trackId);
    const stream = await track.getStream();
    const manifest = stream.getStreamManifest();
    const [bitDepth, sampleRate] = stream.getAudioResolution();

    console.log(`\n${track.artist?.name ?? "Unknown artist"} - ${track.fullName}`);
    console.log(`Quality: ${stream.audioQuality ?? "unknown"} (${bitDepth} bit, ${sampleRate} Hz)`);
    console.log(`Manifest: ${stream.manifestMimeType ?? "unknown"}`);
    console.log(`Codecs: ${manifest.getCodecs()}`);
    console.log(`Extension: ${manifest.fileExtension}`);
    console.log(`Encrypted: ${manifest.isEncrypted ? "yes" : "no"}`);
    console.log(`Segments: ${manifest.getUrls().length}`);
    manifest
        .getUrls()
        .slice(0, 3)
        .forEach((url) => console.log(`  - ${url}`));

    if (manifest.isMpd) {
        console.log("\nHLS playlist:\n");
        console.log(manifest.getHls());
    }
}

streamInfo().catch((error: unknown) => {
    console.error("Stream lookup failed:", error instanceof Error ? error.message : error);
    process.exit(1);
});
