import type { Candidate, MatchingMode, MatchResult } from "../types";
import type { SimilarityScorer } from "./similarityScorer";

export class MatchClassifier {
    constructor(private readonly scorer: SimilarityScorer) {}

    /**
     * Picks the best-scoring candidate, then grades it against `threshold`.
     *
     * Every candidate takes part in best-selection; the threshold only decides
     * between "matched" and "low_confidence". "not_found" means there were no
     * candidates at all. Ties keep the earlier candidate.
     */
    async classify(
        title: string,
        candidates: readonly Candidate[],
        threshold: number,
        mode: MatchingMode
    ): Promise<MatchResult> {
        if (candidates.length === 0) {
            return { sourceTitle: title, tier: "not_found" };
        }

        let best = candidates[0];
        let bestScore = -1;
        for (const candidate of candidates) {
            const score = await this.scorer.verify(title, candidate, mode);
            if (score > bestScore) {
                best = candidate;
                bestScore = score;
            }
        }

        return {
            sourceTitle: title,
            candidate: best,
            tier: bestScore >= threshold ? "matched" : "low_confidence",
            score: bestScore,
        };
    }
}
