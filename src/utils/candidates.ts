import { z } from "zod";
import type { Candidate } from "../types";

/**
 * Shape a candidate must have to be scored. Providers hand back whatever the
 * remote API returned, so this is checked at scoring time rather than trusted.
 */
export const candidateSchema = z.object({
    id: z.string().min(1),
    name: z.string().trim().min(1),
    contributors: z.array(z.string()),
});

export function isWellFormedCandidate(candidate: unknown): candidate is Candidate {
    return candidateSchema.safeParse(candidate).success;
}

/**
 * Label compared against the video title: "{contributors} {name}".
 */
export function formatCandidateLabel(candidate: Candidate): string {
    return [...candidate.contributors, candidate.name]
        .filter((part) => part.length > 0)
        .join(" ");
}

/**
 * Display form for logs and UIs: "A1, A2 - Name".
 */
export function formatCandidate(candidate: Candidate): string {
    const contributors = Array.isArray(candidate.contributors)
        ? candidate.contributors.join(", ")
        : "";
    const name = typeof candidate.name === "string" ? candidate.name : "";
    return contributors ? `${contributors} - ${name}` : name;
}
