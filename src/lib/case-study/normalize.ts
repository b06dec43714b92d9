/**
 * Case Study Builder — Text Normalization
 *
 * Cleans extracted text so downstream consumers see consistent line
 * structure regardless of the source format.
 */

// ---------------------------------------------------------------------------
// Line-level normalization
// ---------------------------------------------------------------------------

/**
 * Normalize a raw text string while keeping its line structure:
 * 1. Remove null bytes and form-feeds
 * 2. Replace non-breaking spaces / zero-width chars with regular space
 * 3. Unify line endings
 * 4. Collapse horizontal whitespace and trim each line
 * 5. Collapse runs of blank lines into one
 */
export function normalizeText(raw: string): string {
    return raw
        .replace(/[\x00\x0C]/g, "")
        .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, " ")
        .replace(/\r\n?/g, "\n")
        .replace(/[ \t]+/g, " ")
        .split("\n")
        .map((line) => line.trim())
        .join("\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

// ---------------------------------------------------------------------------
// Markup helpers
// ---------------------------------------------------------------------------

const NAMED_ENTITIES: Record<string, string> = {
    amp: "&",
    lt: "<",
    gt: ">",
    quot: '"',
    apos: "'",
    nbsp: " ",
};

/** Decode the named entities above plus decimal / hex character references */
export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
        if (body[0] === "#") {
            const code = body[1] === "x" || body[1] === "X"
                ? parseInt(body.slice(2), 16)
                : parseInt(body.slice(1), 10);
            return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
        }
        return NAMED_ENTITIES[body.toLowerCase()] ?? match;
    });
}

/** Drop every tag, decode entities, collapse whitespace */
export function stripTags(html: string): string {
    return decodeEntities(html.replace(/<[^>]*>/g, " "))
        .replace(/\s+/g, " ")
        .trim();
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export function countWords(text: string): number {
    return text.match(/\b\w+\b/g)?.length ?? 0;
}
