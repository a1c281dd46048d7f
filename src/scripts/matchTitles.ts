/**
 * Match video titles against Spotify tracks and print the classification.
 *
 * Usage:
 *   SPOTIFY_ACCESS_TOKEN=<token> npx ts-node src/scripts/matchTitles.ts titles.txt
 *
 * One title per line; blank lines are ignored. Ctrl-C stops after the
 * current title and prints what was matched so far.
 */

import fs from "fs/promises";
import { loadMatchingConfig } from "../config";
import { createTitleMatcher } from "../index";
import type { TitleMatcher } from "../index";
import { createSpotifySearchProvider } from "../services/spotifySearchProvider";
import { summarizeResults } from "../services/titleMatchingEngine";
import type { MatchBatchResult, MatchResult } from "../types";
import { formatCandidate } from "../utils/candidates";
import { describeError, wrapNodeError } from "../utils/errors";

export function formatResultLine(result: MatchResult): string {
    const candidate = result.candidate ? formatCandidate(result.candidate) : "-";
    const score = result.score !== undefined ? ` (${result.score.toFixed(2)})` : "";
    return `[${result.tier}] ${result.sourceTitle} -> ${candidate}${score}`;
}

export function parseTitles(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

/** Returns the process exit code. */
export async function matchTitlesFromFile(
    filePath: string | undefined,
    env: NodeJS.ProcessEnv = process.env
): Promise<number> {
    if (!filePath) {
        console.error("Usage: matchTitles <titles-file>");
        return 1;
    }

    const token = env.SPOTIFY_ACCESS_TOKEN;
    if (!token) {
        console.error("SPOTIFY_ACCESS_TOKEN is not set");
        return 1;
    }

    let titles: string[];
    try {
        titles = parseTitles(await fs.readFile(filePath, "utf8"));
    } catch (error) {
        console.error(wrapNodeError(error, filePath).message);
        return 1;
    }

    let matcher: TitleMatcher;
    try {
        matcher = createTitleMatcher({ settings: loadMatchingConfig(env) });
    } catch (error) {
        console.error(describeError(error));
        return 1;
    }

    const search = createSpotifySearchProvider({ getAccessToken: () => token });

    let interrupted = false;
    const onSigint = () => {
        interrupted = true;
        console.log("\nStopping after the current title...");
    };
    process.once("SIGINT", onSigint);

    console.log(`Matching ${titles.length} titles (${matcher.settings.matching.matchingMode} mode)`);
    let batch: MatchBatchResult;
    try {
        batch = await matcher.engine.matchAll(titles, search, matcher.settings.matching, {
            onProgress: ({ current, total, label }) =>
                console.log(`(${current}/${total}) ${label}`),
            isCancelled: () => interrupted,
        });
    } finally {
        process.removeListener("SIGINT", onSigint);
    }

    console.log("");
    for (const result of batch.results) {
        console.log(formatResultLine(result));
    }

    const summary = summarizeResults(batch.results);
    console.log(
        `\nMatched: ${summary.matched}, Low confidence: ${summary.lowConfidence}, Not found: ${summary.notFound}`
    );
    if (batch.cancelled) {
        console.log(`Cancelled after ${batch.results.length} of ${titles.length} titles`);
    }
    return 0;
}

if (require.main === module) {
    matchTitlesFromFile(process.argv[2])
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error) => {
            console.error("Match script error:", error);
            process.exit(1);
        });
}
