/**
 * Case Study Builder — Heuristic Case Study Generator
 *
 * Deterministic, backend-free narrative built from a document's structured
 * content.  Presentations are bucketed by slide title first; everything
 * else (and presentations where bucketing finds nothing) maps sections to
 * narrative fields by position.
 */

import { selectKeyImages } from "../image-selector";
import type { CaseStudy, ExtractedDocument } from "../types";

export const FALLBACK_TITLE = "Document Analysis Report";

export const DEFAULT_KEY_POINTS: readonly string[] = [
    "Document processed successfully",
    "Content extracted and analyzed",
    "Report generated from content",
];

const PLACEHOLDERS = {
    challenge: "Analysis of the provided document content.",
    approach: "Document processing and content extraction.",
    solution: "Automated extraction of key information from the document.",
    outcomes: "Generated report based on document analysis.",
    summary: "This report was automatically generated from the document content.",
} as const;

const SECTION_BODY_CHARS = 800;
const SLIDE_SUMMARY_CHARS = 400;
const SECTION_SUMMARY_PREFIX_CHARS = 150;
const MAX_FILL_ITEMS = 3;
const MAX_KEY_POINTS = 5;

const FOOTER_MARKERS = ["confidential", "page", "copyright", "©", "all rights reserved", "footer"];
const GENERIC_SLIDE_TITLES = ["agenda", "content", "overview", "thank"];

type NarrativeField = "challenge" | "approach" | "solution" | "outcomes";

const NARRATIVE_FIELDS: readonly NarrativeField[] = ["challenge", "approach", "solution", "outcomes"];

const FIELD_KEYWORDS: Record<NarrativeField, readonly string[]> = {
    challenge: ["challenge", "problem", "issue", "background", "overview", "introduction"],
    approach: ["approach", "methodology", "strategy", "process", "plan"],
    solution: ["solution", "implementation", "platform", "technology", "product"],
    outcomes: ["outcomes", "results", "benefits", "impact", "conclusion", "success"],
};

type Buckets = Record<NarrativeField, string[]>;

interface SlideOutline {
    titles: string[];
    /** Insertion-ordered; a repeated title restarts its content */
    content: Map<string, string[]>;
}

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

function isUpperChar(ch: string): boolean {
    return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLowerChar(ch: string): boolean {
    return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

/** Every word starts with an uppercase letter followed only by lowercase */
function isTitleCase(line: string): boolean {
    let previousCased = false;
    let sawCased = false;

    for (const ch of line) {
        if (isUpperChar(ch)) {
            if (previousCased) return false;
            previousCased = true;
            sawCased = true;
        } else if (isLowerChar(ch)) {
            if (!previousCased) return false;
            previousCased = true;
            sawCased = true;
        } else {
            previousCased = false;
        }
    }
    return sawCased;
}

function isAllCaps(line: string): boolean {
    const chars = [...line];
    return chars.some(isUpperChar) && !chars.some(isLowerChar);
}

export function looksLikeSlideTitle(line: string): boolean {
    if (line.length >= 60 || line.endsWith(".")) {
        return false;
    }

    const words = line.split(/\s+/).filter(Boolean);
    return (
        words.length <= 10 &&
        (isTitleCase(line) || isAllCaps(line) || words.some((word) => word.length > 1 && isUpperChar(word[0])))
    );
}

// ---------------------------------------------------------------------------
// Presentation heuristics
// ---------------------------------------------------------------------------

function outlineSlides(text: string): SlideOutline {
    const titles: string[] = [];
    const content = new Map<string, string[]>();
    let currentTitle: string | null = null;

    for (const rawLine of text.split("\n")) {
        const line = rawLine.trim();
        if (!line) continue;

        const lower = line.toLowerCase();
        if (FOOTER_MARKERS.some((marker) => lower.includes(marker))) {
            continue;
        }

        if (line.length < 60 && !line.endsWith(".")) {
            // Short lines that are not title-like carry no content
            if (looksLikeSlideTitle(line)) {
                titles.push(line);
                currentTitle = line;
                content.set(line, []);
            }
        } else if (currentTitle !== null) {
            content.get(currentTitle)?.push(line);
        }
    }

    return { titles, content };
}

function assignBuckets(outline: SlideOutline): Buckets {
    const buckets: Buckets = { challenge: [], approach: [], solution: [], outcomes: [] };

    for (const [title, lines] of outline.content) {
        const lowerTitle = title.toLowerCase();
        const matched = NARRATIVE_FIELDS.find((field) =>
            FIELD_KEYWORDS[field].some((keyword) => lowerTitle.includes(keyword))
        );

        if (matched) {
            buckets[matched].push(...lines);
            continue;
        }

        // Unmatched slides fill sections in order, three items at a time
        const target = NARRATIVE_FIELDS.find((field) => buckets[field].length < MAX_FILL_ITEMS) ?? "outcomes";
        buckets[target].push(...lines);
    }

    return buckets;
}

function slideKeyPoints(outline: SlideOutline, buckets: Buckets): string[] {
    const candidates: string[] = [];

    if (outline.titles.length > 3) {
        candidates.push(
            ...outline.titles
                .filter((title) => !GENERIC_SLIDE_TITLES.some((generic) => title.toLowerCase().includes(generic)))
                .slice(0, MAX_KEY_POINTS)
        );
    }

    for (const lines of [buckets.challenge, buckets.solution, buckets.outcomes]) {
        for (const line of lines) {
            if (/^[•\-*]/.test(line)) {
                candidates.push(line.replace(/^[•\-* ]+/, ""));
            }
        }
    }

    return candidates;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build a case study from the document alone.  Every narrative field is
 * filled, with a placeholder where nothing better is found.
 */
export function generateFallbackCaseStudy(document: ExtractedDocument, _audience = "general"): CaseStudy {
    const { structuredContent } = document;
    const narrative: Record<NarrativeField | "summary", string> = { ...PLACEHOLDERS };
    let keyPoints = [...structuredContent.keyPoints];
    let bucketed = false;

    if (document.metadata.sourceType === "pptx") {
        const outline = outlineSlides(document.text);
        const buckets = assignBuckets(outline);

        for (const field of NARRATIVE_FIELDS) {
            if (buckets[field].length > 0) {
                narrative[field] = buckets[field].join(" ").slice(0, SECTION_BODY_CHARS);
                bucketed = true;
            }
        }

        const summaryParts = [buckets.challenge, buckets.solution]
            .filter((lines) => lines.length > 0)
            .map((lines) => lines.slice(0, 2).join(" "));
        if (summaryParts.length > 0) {
            narrative.summary = summaryParts.join(" ").slice(0, SLIDE_SUMMARY_CHARS);
        }

        const candidates = slideKeyPoints(outline, buckets);
        if (candidates.length > 0) {
            keyPoints = candidates.filter((point) => point.length > 15 && point.length < 100).slice(0, MAX_KEY_POINTS);
        }
    }

    if (!bucketed) {
        const bodies = structuredContent.sections
            .map((section) => section.content.trim())
            .filter((body) => body.length > 0);

        bodies.slice(0, NARRATIVE_FIELDS.length).forEach((body, index) => {
            narrative[NARRATIVE_FIELDS[index]] = body.slice(0, SECTION_BODY_CHARS);
        });

        if (bodies.length > 0) {
            narrative.summary = bodies
                .slice(0, 3)
                .map((body) => body.slice(0, SECTION_SUMMARY_PREFIX_CHARS))
                .join(" ");
        }
    }

    const images = selectKeyImages(document.images, {
        challenge: narrative.challenge,
        approach: narrative.approach,
        solution: narrative.solution,
        outcomes: narrative.outcomes,
    }).map((image) => ({ ...image, selectedForNarrative: true }));

    return {
        title: structuredContent.title || FALLBACK_TITLE,
        challenge: narrative.challenge,
        approach: narrative.approach,
        solution: narrative.solution,
        outcomes: narrative.outcomes,
        summary: narrative.summary,
        keyPoints: keyPoints.length > 0 ? keyPoints : [...DEFAULT_KEY_POINTS],
        images,
    };
}
