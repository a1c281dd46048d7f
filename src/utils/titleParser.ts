import type { ParsedTitle } from "../types";
import { normalizeTitle } from "./titleNormalization";

type TitlePattern = (title: string) => ParsedTitle | null;

function toParsed(contributor: string, work: string): ParsedTitle | null {
    const trimmedContributor = contributor.trim();
    const trimmedWork = work.trim();
    if (!trimmedContributor || !trimmedWork) return null;
    return { contributor: trimmedContributor, work: trimmedWork };
}

function splitOnce(title: string, separator: string): ParsedTitle | null {
    const index = title.indexOf(separator);
    if (index < 0) return null;
    return toParsed(title.slice(0, index), title.slice(index + separator.length));
}

/**
 * Separator patterns in priority order; the first one that matches wins.
 * A side that comes out empty does not count as a match.
 */
const TITLE_PATTERNS: readonly TitlePattern[] = [
    // "Artist - Song"
    (title) => splitOnce(title, " - "),
    // "Artist: Song"
    (title) => splitOnce(title, ": "),
    // "Song by Artist"
    (title) => {
        const match = title.match(/^(.+?)\s+by\s+(.+)$/i);
        return match ? toParsed(match[2], match[1]) : null;
    },
    // 'Artist "Song"'
    (title) => {
        const match = title.match(/^(.+?)\s+"(.+?)"/);
        return match ? toParsed(match[1], match[2]) : null;
    },
];

/**
 * Best-effort (contributor, work) extraction from a raw video title.
 * The title is normalized first; without a recognizable separator the whole
 * normalized title becomes the work.
 */
export function parseArtistTitle(raw: string): ParsedTitle {
    const normalized = normalizeTitle(raw);

    for (const pattern of TITLE_PATTERNS) {
        const parsed = pattern(normalized);
        if (parsed) return parsed;
    }

    return { work: normalized };
}
