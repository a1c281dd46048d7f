// ── Catalog entries ────────────────────────────────────────────────

/** One catalog entry returned by a search provider. Read-only to the matcher. */
export interface Candidate {
    readonly id: string;
    readonly name: string;
    readonly contributors: readonly string[];
}

export type SearchProvider = (
    query: string,
    limit: number
) => Promise<readonly Candidate[]>;

// ── Parsed input ───────────────────────────────────────────────────

export interface ParsedTitle {
    /** Absent when no separator pattern matched. */
    contributor?: string;
    /** Falls back to the normalized title; may be "". */
    work: string;
}

// ── Matching ───────────────────────────────────────────────────────

export type MatchingMode = "lexical" | "semantic";

export type MatchTier = "matched" | "low_confidence" | "not_found";

export interface MatchResult {
    readonly sourceTitle: string;
    readonly candidate?: Candidate;
    readonly tier: MatchTier;
    readonly score?: number;
}

export interface MatchingConfig {
    matchingMode: MatchingMode;
    embeddingModelName: string;
    /** Inclusive lower bound for a "matched" tier, in [0, 1]. */
    matchingThreshold: number;
}

export interface MatchProgress {
    /** 1-based index of the title that just finished. */
    current: number;
    total: number;
    label: string;
}

export type ProgressCallback = (progress: MatchProgress) => void;
export type CancellationPredicate = () => boolean;

export interface MatchBatchResult {
    /** One entry per finalized title, in input order. */
    results: MatchResult[];
    /** True when the cancellation predicate stopped the batch early. */
    cancelled: boolean;
}

export interface MatchSummary {
    matched: number;
    lowConfidence: number;
    notFound: number;
    total: number;
}
