/**
 * Case Study Builder — Structure Extraction
 *
 * Derives a title, sections, key points and coarse entities from raw text
 * with line and regex heuristics.  Pure: identical text always yields an
 * identical `StructuredContent`.
 */

import type { DocumentSection, SourceType, StructuredContent } from "./types";

/** Checked in order against each trimmed line; the first match wins */
const HEADING_PATTERNS: readonly RegExp[] = [
    /^#+\s+(.+)$/, // markdown
    /^(\d+\.[\d.]*\s+.+)$/, // numeric outline (1.1, 1.2.3)
    /^(Chapter \d+:?.*)$/,
    /^(.*:)$/, // trailing colon
    /^([A-Z][A-Z\s]+)$/, // ALL CAPS
];

const DATE_PATTERNS: readonly RegExp[] = [
    /\d{1,2}\/\d{1,2}\/\d{2,4}/g,
    /\d{1,2}-\d{1,2}-\d{2,4}/g,
    /\b(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]* \d{1,2},? \d{4}\b/g,
];

const ORGANIZATION_PATTERN =
    /\b([A-Z][A-Za-z]+ (?:Inc|LLC|Ltd|Corporation|Corp|Company|Co|Group|Partners|Technologies|Solutions|Systems|Associates)\b)/g;

const PERSON_PATTERN = /\b(?:Mr|Ms|Mrs|Dr|Prof)\. ([A-Z][a-z]+ [A-Z][a-z]+)\b/g;

const PRESENTATION_TITLE = /^Title:\s*(.+)$/;

const MAX_KEY_POINTS = 7;
const MIN_KEY_POINTS = 3;
const SENTENCE_FILL_LIMIT = 5;

export const INTRODUCTION_TITLE = "Introduction";

export function emptyStructuredContent(): StructuredContent {
    return {
        sections: [],
        keyPoints: [],
        entities: { organizations: [], people: [], dates: [] },
    };
}

export function isHeadingLine(line: string): boolean {
    const trimmed = line.trim();
    return HEADING_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export function extractStructuredContent(text: string, sourceKind: SourceType): StructuredContent {
    const structured = emptyStructuredContent();

    if (!text || text.trim().length < 10) {
        return structured;
    }

    const lines = text.split("\n");
    structured.title = detectTitle(lines, sourceKind);
    structured.sections = splitSections(lines);
    structured.entities = {
        dates: unique(DATE_PATTERNS.flatMap((pattern) => Array.from(text.matchAll(pattern), (m) => m[0]))),
        organizations: unique(Array.from(text.matchAll(ORGANIZATION_PATTERN), (m) => m[1])),
        people: unique(Array.from(text.matchAll(PERSON_PATTERN), (m) => m[1])),
    };
    structured.keyPoints = deriveKeyPoints(structured.sections);

    return structured;
}

function detectTitle(lines: string[], sourceKind: SourceType): string | undefined {
    const nonEmpty = lines.map((line) => line.trim()).filter((line) => line.length > 0);

    // Decks open with "Slide 1:", so the first slide title says more
    if (sourceKind === "pptx") {
        for (const line of nonEmpty) {
            const match = PRESENTATION_TITLE.exec(line);
            if (match) {
                return match[1].trim();
            }
        }
    }

    return nonEmpty[0];
}

function splitSections(lines: string[]): DocumentSection[] {
    const sections: DocumentSection[] = [];
    let current: DocumentSection = { title: INTRODUCTION_TITLE, content: "" };

    for (const line of lines) {
        if (isHeadingLine(line)) {
            if (current.content.trim()) {
                sections.push(current);
            }
            current = { title: line.trim(), content: "" };
            continue;
        }
        current.content += `${line}\n`;
    }

    if (current.content.trim()) {
        sections.push(current);
    }

    return sections;
}

function deriveKeyPoints(sections: DocumentSection[]): string[] {
    const keyPoints: string[] = [];

    for (const section of sections) {
        const body = section.content.trim();
        if (body.length > 10 && body.length < 200) {
            keyPoints.push(body.replace(/\n/g, " "));
        }
    }

    if (keyPoints.length < MIN_KEY_POINTS) {
        for (const section of sections) {
            if (section.content.length > 200) {
                const [firstSentence] = section.content.split(/(?<=[.!?])\s+/);
                if (firstSentence && firstSentence.length > 10) {
                    keyPoints.push(firstSentence);
                }
            }
            if (keyPoints.length >= SENTENCE_FILL_LIMIT) {
                break;
            }
        }
    }

    return keyPoints.slice(0, MAX_KEY_POINTS);
}

function unique(values: string[]): string[] {
    return Array.from(new Set(values));
}
