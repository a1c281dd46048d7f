import type { Candidate, MatchingMode } from "../types";
import type { EmbeddingVector, TextEmbedder } from "./embeddingModelManager";
import { formatCandidateLabel, isWellFormedCandidate } from "../utils/candidates";
import { cosineSimilarity, lexicalSimilarity } from "../utils/similarity";
import { normalizeTitle } from "../utils/titleNormalization";
import { parseArtistTitle } from "../utils/titleParser";

/**
 * One way of comparing two strings. Returns null when it cannot score right
 * now, which hands the comparison to the next strategy in line.
 */
export interface ScoringStrategy {
    readonly name: MatchingMode;
    compare(a: string, b: string): Promise<number | null>;
}

export const lexicalStrategy: ScoringStrategy = {
    name: "lexical",
    async compare(a, b) {
        return lexicalSimilarity(a, b);
    },
};

export function semanticStrategy(embedder: TextEmbedder): ScoringStrategy {
    return {
        name: "semantic",
        async compare(a, b) {
            const left = await embedder.encode(a);
            if (!left) return null;
            const right = await embedder.encode(b);
            if (!right) return null;
            return cosineSimilarity(left, right);
        },
    };
}

/** Runs strategies in order; the first one that produces a score wins. */
export async function firstAvailableScore(
    strategies: readonly ScoringStrategy[],
    a: string,
    b: string
): Promise<number> {
    for (const strategy of strategies) {
        const score = await strategy.compare(a, b);
        if (score !== null) return score;
    }
    return 0;
}

/** Memoizes encodings for the duration of one comparison batch. */
function memoizeEmbedder(embedder: TextEmbedder): TextEmbedder {
    const cache = new Map<string, Promise<EmbeddingVector | null>>();
    return {
        encode(text) {
            let pending = cache.get(text);
            if (!pending) {
                pending = embedder.encode(text);
                cache.set(text, pending);
            }
            return pending;
        },
    };
}

export class SimilarityScorer {
    constructor(private readonly embedder: TextEmbedder) {}

    /**
     * Fallback order per mode. Semantic always ends with lexical, so a
     * missing model degrades to string matching instead of failing.
     */
    strategiesFor(
        mode: MatchingMode,
        embedder: TextEmbedder = this.embedder
    ): ScoringStrategy[] {
        return mode === "semantic"
            ? [semanticStrategy(embedder), lexicalStrategy]
            : [lexicalStrategy];
    }

    /** Normalized title against the candidate's "{contributors} {name}" label. */
    async score(title: string, candidate: Candidate, mode: MatchingMode): Promise<number> {
        if (!isWellFormedCandidate(candidate)) return 0;

        return firstAvailableScore(
            this.strategiesFor(mode),
            normalizeTitle(title),
            formatCandidateLabel(candidate)
        );
    }

    /**
     * Best score across comparison granularities:
     *   - normalized title vs full label
     *   - normalized title vs candidate name
     *   - parsed work vs candidate name
     *   - parsed contributor vs candidate contributors
     * Comparisons with an empty side are skipped. Malformed candidates score 0.
     */
    async verify(title: string, candidate: Candidate, mode: MatchingMode): Promise<number> {
        if (!isWellFormedCandidate(candidate)) return 0;

        const strategies = this.strategiesFor(mode, memoizeEmbedder(this.embedder));
        const normalized = normalizeTitle(title);
        const { contributor, work } = parseArtistTitle(title);
        const contributors = candidate.contributors.join(" ");

        const pairs: Array<[string, string]> = [
            [normalized, formatCandidateLabel(candidate)],
            [normalized, candidate.name],
            [work, candidate.name],
        ];
        if (contributor) pairs.push([contributor, contributors]);

        let best = 0;
        for (const [left, right] of pairs) {
            if (!left.trim() || !right.trim()) continue;
            const score = await firstAvailableScore(strategies, left, right);
            if (score > best) best = score;
        }
        return best;
    }
}
