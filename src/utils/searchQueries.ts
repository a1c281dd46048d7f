import { normalizeTitle } from "./titleNormalization";
import { parseArtistTitle } from "./titleParser";

/**
 * Renders a field-scoped query in a provider's own search syntax. The matcher
 * never inspects the result; it only passes it to the provider.
 */
export type FieldQueryFormatter = (contributor: string, work: string) => string;

/** Spotify search syntax: `artist:"A" track:"B"`. */
export const spotifyFieldQuery: FieldQueryFormatter = (contributor, work) =>
    `artist:"${contributor}" track:"${work}"`;

/**
 * Ordered, de-duplicated search queries for a raw title, most specific first:
 *   1. "{contributor} {work}"
 *   2. field-scoped contributor/work query
 *   3. normalized title
 *   4. raw title verbatim
 * Blank entries are skipped, so an empty or whitespace-only raw title yields
 * no queries.
 */
export function buildSearchQueries(
    raw: string,
    formatFieldQuery: FieldQueryFormatter = spotifyFieldQuery
): string[] {
    const queries: string[] = [];
    const push = (query: string) => {
        if (query.trim() && !queries.includes(query)) queries.push(query);
    };

    const { contributor, work } = parseArtistTitle(raw);
    if (contributor && work) {
        push(`${contributor} ${work}`);
        push(formatFieldQuery(contributor, work));
    }

    push(normalizeTitle(raw));
    if (typeof raw === "string") push(raw);

    return queries;
}
