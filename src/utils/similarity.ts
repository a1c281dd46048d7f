import * as fuzz from "fuzzball";

function clampUnit(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

/**
 * Case-insensitive sequence similarity in [0, 1]:
 * 2 * (longest common subsequence) / (len(a) + len(b)), unrounded.
 * Lengths count code points, so an emoji is one character.
 */
export function lexicalSimilarity(a: string, b: string): number {
    const left = a.toLowerCase();
    const right = b.toLowerCase();

    if (left === right) return 1;

    const total = [...left].length + [...right].length;

    // Substitution at cost 2 makes this the insert/delete distance,
    // which is total - 2 * LCS
    const indel = fuzz.distance(left, right, {
        subcost: 2,
        astral: true,
        full_process: false,
    });
    return clampUnit(1 - indel / total);
}

/**
 * Cosine similarity clamped to [0, 1]. Anti-correlated vectors carry no
 * useful meaning for title matching, so negative cosines become 0.
 * Mismatched or zero-length vectors score 0.
 */
export function cosineSimilarity(
    a: ArrayLike<number>,
    b: ArrayLike<number>
): number {
    if (a.length === 0 || a.length !== b.length) return 0;

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) return 0;

    return clampUnit(dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}
