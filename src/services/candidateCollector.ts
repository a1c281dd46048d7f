import type { Candidate, CancellationPredicate, SearchProvider } from "../types";
import { candidateSchema } from "../utils/candidates";
import { describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("Matching.Search");

const identitySchema = candidateSchema.pick({ id: true });

export const DEFAULT_PER_QUERY_LIMIT = 10;
export const DEFAULT_TOTAL_CAP = 40;

export interface CollectOptions {
    perQueryLimit?: number;
    /** Distinct candidates after which no further queries are issued. */
    totalCap?: number;
    isCancelled?: CancellationPredicate;
}

export interface CollectionResult {
    /** De-duplicated by id, in first-seen order. */
    candidates: Candidate[];
    queriesAttempted: number;
    queriesFailed: number;
    /** True when `isCancelled` stopped collection before the queries ran out. */
    cancelled: boolean;
}

/**
 * Runs each query against the provider in order and merges the results.
 *
 * A failing query is logged and contributes nothing; the rest still run.
 * Once `totalCap` distinct candidates are in hand no more queries are issued,
 * and the merged list is cut back to the cap.
 */
export async function collectCandidates(
    queries: readonly string[],
    search: SearchProvider,
    options: CollectOptions = {}
): Promise<CollectionResult> {
    const perQueryLimit = options.perQueryLimit ?? DEFAULT_PER_QUERY_LIMIT;
    const totalCap = options.totalCap ?? DEFAULT_TOTAL_CAP;

    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    let queriesAttempted = 0;
    let queriesFailed = 0;
    let cancelled = false;

    for (const query of queries) {
        if (candidates.length >= totalCap) break;
        if (options.isCancelled?.()) {
            cancelled = true;
            break;
        }

        queriesAttempted++;
        let results: readonly Candidate[];
        try {
            results = await search(query, perQueryLimit);
        } catch (error) {
            queriesFailed++;
            log.warn(`Search failed for query "${query}": ${describeError(error)}`);
            continue;
        }

        for (const candidate of results) {
            if (!identitySchema.safeParse(candidate).success) {
                log.warn(`Skipping search result without an id for query "${query}"`);
                continue;
            }
            if (seen.has(candidate.id)) continue;
            seen.add(candidate.id);
            candidates.push(candidate);
        }
    }

    return {
        candidates: candidates.slice(0, totalCap),
        queriesAttempted,
        queriesFailed,
        cancelled,
    };
}
