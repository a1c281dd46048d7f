/**
 * Title cleanup for free-text video titles.
 *
 * Video catalogs decorate titles with bracketed tags, upload-quality markers
 * and "official video" style labels that never appear in a track catalog.
 * normalizeTitle() strips those so the remaining text can be parsed and
 * searched. The result is stable under repeated application.
 */

import {
    collapseWhitespace,
    normalizeFullwidth,
    normalizeQuotes,
} from "./stringNormalization";

/**
 * Case-insensitive phrases removed as whole words. Multi-word entries match
 * across any run of whitespace.
 */
export const NOISE_PHRASES: readonly string[] = [
    "official music video",
    "official video",
    "official audio",
    "official lyric video",
    "lyric video",
    "music video",
    "full album",
    "full song",
    "lyrics",
    "lyric",
    "visualizer",
    "visualiser",
    "remastered",
    "remaster",
    "official",
    "original",
    "explicit",
    "audio",
    "video",
    "featuring",
    "feat.",
    "ft.",
    "1080p",
    "720p",
    "4k",
    "hd",
    "hq",
];

const WORD_CHAR = "[\\p{L}\\p{N}_]";

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function compileNoisePattern(phrase: string): RegExp {
    const body = phrase
        .trim()
        .split(/\s+/)
        .map(escapeRegExp)
        .join("\\s+");
    return new RegExp(`(?<!${WORD_CHAR})${body}(?!${WORD_CHAR})`, "giu");
}

// Longest first so "official music video" goes before "official".
const NOISE_PATTERNS: readonly RegExp[] = [...NOISE_PHRASES]
    .sort((a, b) => b.length - a.length)
    .map(compileNoisePattern);

const BRACKETED_SPAN = /\[[^\]]*\]/g;
const PARENTHESIZED_SPAN = /\([^)]*\)/g;
const SEPARATOR_CHARS = /[|\u2022\u25CF]/g;

/**
 * Removes noise phrases until none are left. Removing one phrase can join two
 * halves of another ("official hd video"), so a single sweep is not enough.
 */
export function stripNoisePhrases(title: string): string {
    let current = title;

    while (true) {
        let next = current;
        for (const pattern of NOISE_PATTERNS) {
            next = next.replace(pattern, " ");
        }
        if (next === current) return current;
        current = next;
    }
}

/**
 * Strips bracketed/parenthesized spans, noise phrases and separator glyphs
 * from a raw title. Never throws; empty input yields "".
 */
export function normalizeTitle(raw: string): string {
    if (typeof raw !== "string" || raw.length === 0) return "";

    const unified = normalizeFullwidth(normalizeQuotes(raw));
    const withoutSpans = unified
        .replace(BRACKETED_SPAN, " ")
        .replace(PARENTHESIZED_SPAN, " ");
    const withoutNoise = stripNoisePhrases(withoutSpans);

    return collapseWhitespace(withoutNoise.replace(SEPARATOR_CHARS, "-"));
}
