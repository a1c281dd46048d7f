import type {
    CancellationPredicate,
    MatchBatchResult,
    MatchingConfig,
    MatchProgress,
    MatchResult,
    MatchSummary,
    ProgressCallback,
    SearchProvider,
} from "../types";
import { collectCandidates, DEFAULT_PER_QUERY_LIMIT, DEFAULT_TOTAL_CAP } from "./candidateCollector";
import type { EmbeddingModelManager } from "./embeddingModelManager";
import type { MatchClassifier } from "./matchClassifier";
import { formatCandidate } from "../utils/candidates";
import { createLogger } from "../utils/logger";
import { buildSearchQueries } from "../utils/searchQueries";
import type { FieldQueryFormatter } from "../utils/searchQueries";

const log = createLogger("Matching.Engine");

const PROGRESS_LABEL_LENGTH = 50;

export interface TitleMatchingEngineOptions {
    perQueryLimit?: number;
    totalCap?: number;
    /** Provider-specific field query syntax; Spotify's by default. */
    formatFieldQuery?: FieldQueryFormatter;
}

export interface MatchAllOptions {
    onProgress?: ProgressCallback;
    isCancelled?: CancellationPredicate;
}

export function progressLabel(title: string): string {
    return title.length > PROGRESS_LABEL_LENGTH
        ? `${title.slice(0, PROGRESS_LABEL_LENGTH)}...`
        : title;
}

export function summarizeResults(results: readonly MatchResult[]): MatchSummary {
    const summary: MatchSummary = {
        matched: 0,
        lowConfidence: 0,
        notFound: 0,
        total: results.length,
    };
    for (const result of results) {
        if (result.tier === "matched") summary.matched++;
        else if (result.tier === "low_confidence") summary.lowConfidence++;
        else summary.notFound++;
    }
    return summary;
}

/**
 * Matches titles one at a time: queries, candidate collection, scoring,
 * classification. Titles are processed sequentially so provider calls stay
 * paced.
 */
export class TitleMatchingEngine {
    private readonly perQueryLimit: number;
    private readonly totalCap: number;
    private readonly formatFieldQuery?: FieldQueryFormatter;

    constructor(
        private readonly classifier: MatchClassifier,
        private readonly models: EmbeddingModelManager,
        options: TitleMatchingEngineOptions = {}
    ) {
        this.perQueryLimit = options.perQueryLimit ?? DEFAULT_PER_QUERY_LIMIT;
        this.totalCap = options.totalCap ?? DEFAULT_TOTAL_CAP;
        this.formatFieldQuery = options.formatFieldQuery;
    }

    /**
     * One result per finalized title, in input order. When `isCancelled`
     * returns true the batch stops, the in-flight title is dropped and
     * `cancelled` is set. Errors are logged and degrade to "not_found".
     */
    async matchAll(
        titles: readonly string[],
        search: SearchProvider,
        config: MatchingConfig,
        options: MatchAllOptions = {}
    ): Promise<MatchBatchResult> {
        const isCancelled = guardPredicate(options.isCancelled);
        const results: MatchResult[] = [];
        let cancelled = false;

        if (config.matchingMode === "semantic") {
            this.models.configure(config.embeddingModelName);
        }

        for (const [index, title] of titles.entries()) {
            if (isCancelled()) {
                cancelled = true;
                break;
            }

            const result = await this.matchOne(title, search, config, isCancelled);
            if (!result) {
                cancelled = true;
                break;
            }

            results.push(result);
            log.debug(`[${result.tier}] ${title}`, {
                candidate: result.candidate ? formatCandidate(result.candidate) : null,
                score: result.score ?? null,
            });

            reportProgress(options.onProgress, {
                current: index + 1,
                total: titles.length,
                label: progressLabel(title),
            });
        }

        const summary = summarizeResults(results);
        log.info(
            `Matched ${summary.matched}, low confidence ${summary.lowConfidence}, not found ${summary.notFound} of ${titles.length} titles`,
            { cancelled }
        );

        return { results, cancelled };
    }

    /** Null when cancelled part-way through the title. */
    private async matchOne(
        title: string,
        search: SearchProvider,
        config: MatchingConfig,
        isCancelled: CancellationPredicate
    ): Promise<MatchResult | null> {
        try {
            const queries = buildSearchQueries(title, this.formatFieldQuery);
            const collection = await collectCandidates(queries, search, {
                perQueryLimit: this.perQueryLimit,
                totalCap: this.totalCap,
                isCancelled,
            });
            if (collection.cancelled) return null;

            if (queries.length > 0 && collection.queriesFailed === queries.length) {
                log.warn(`All ${queries.length} searches failed for "${title}"`);
            }

            return await this.classifier.classify(
                title,
                collection.candidates,
                config.matchingThreshold,
                config.matchingMode
            );
        } catch (error) {
            log.error(`Matching failed for "${title}"`, { error });
            return { sourceTitle: title, tier: "not_found" };
        }
    }
}

function guardPredicate(predicate?: CancellationPredicate): CancellationPredicate {
    return () => {
        if (!predicate) return false;
        try {
            return predicate();
        } catch (error) {
            log.warn("Cancellation check threw, continuing", { error });
            return false;
        }
    };
}

function reportProgress(
    onProgress: ProgressCallback | undefined,
    progress: MatchProgress
): void {
    if (!onProgress) return;
    try {
        onProgress(progress);
    } catch (error) {
        log.warn("Progress callback threw, ignoring", { error });
    }
}
