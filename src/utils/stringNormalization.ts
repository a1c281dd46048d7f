/**
 * Normalize typographic quotes/apostrophes to ASCII equivalents.
 */
export function normalizeQuotes(str: string): string {
    return str
        .replace(/[\u2018\u2019\u201A\u201B\u02BC\u02BB\u2032]/g, "'")
        .replace(/[\u201C\u201D\u201E\u201F\u00AB\u00BB\u2033]/g, '"');
}

/**
 * Normalize fullwidth Unicode characters to ASCII equivalents.
 * Example: ＧＨＯＳＴ -> GHOST, ［MV］ -> [MV]
 */
export function normalizeFullwidth(str: string): string {
    return str
        .replace(/[\uFF01-\uFF5E]/g, (char) =>
            String.fromCharCode(char.charCodeAt(0) - 0xfee0)
        )
        .replace(/\u3000/g, " ");
}

/**
 * Collapses every whitespace run (tabs, newlines, NBSP) to one space and trims.
 */
export function collapseWhitespace(str: string): string {
    return str.replace(/\s+/g, " ").trim();
}
