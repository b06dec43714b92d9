/**
 * Case Study Builder — Size & Truncation Governor
 *
 * Byte budgets for uploads and character budgets for generation.  Every
 * strategy that drops text leaves `TRUNCATION_MARKER` where it cut.
 */

import type { GenerationLimits, SizeLimits } from "./config";
import { ResourceExhaustedError } from "./errors";
import type { DocumentSection, ExtractedDocument } from "./types";

export const TRUNCATION_MARKER = "[...content truncated...]";

const CUT = `\n\n${TRUNCATION_MARKER}\n\n`;
const MB = 1024 * 1024;

/** Head/tail kept when extracted text exceeds `maxExtractedChars` */
const EXTRACTED_HEAD_CHARS = 200_000;
const EXTRACTED_TAIL_CHARS = 100_000;

// Structured truncation
const MIN_SECTIONS_FOR_STRUCTURED = 6;
const LEADING_SECTIONS = 5;
const TRAILING_SECTIONS = 5;
const MIDDLE_SECTIONS = 3;
const MIDDLE_SECTIONS_THRESHOLD = 15;
const SECTION_BODY_CHARS = 600;
const MIN_COMPACT_CHARS = 1_000;

// Positional truncation
const HEAD_CHARS = 10_000;
const MIDDLE_CHARS = 2_000;
const TAIL_CHARS = 5_000;
const MIDDLE_SLICE_BELOW = 100_000;

const HEAD_SHARE = 0.75;

export type TruncationStrategy = "none" | "structured" | "positional";

export interface PreparedText {
    text: string;
    strategy: TruncationStrategy;
    /** Above the large-text threshold; attempts get the longer timeout */
    isLarge: boolean;
}

export interface SizedFile {
    fileName: string;
    sizeBytes: number;
}

// ---------------------------------------------------------------------------
// Byte budgets
// ---------------------------------------------------------------------------

function toMb(bytes: number): string {
    return (bytes / MB).toFixed(1);
}

export function assertFileWithinBudget(file: SizedFile, limits: SizeLimits): void {
    if (file.sizeBytes > limits.maxFileBytes) {
        throw new ResourceExhaustedError(
            `File ${file.fileName} is ${toMb(file.sizeBytes)}MB, above the ${toMb(limits.maxFileBytes)}MB per-file limit`,
            { fileName: file.fileName, sizeBytes: file.sizeBytes, limit: limits.maxFileBytes }
        );
    }
}

export function assertBatchWithinBudget(files: readonly SizedFile[], limits: SizeLimits): void {
    if (files.length > limits.maxFiles) {
        throw new ResourceExhaustedError(
            `${files.length} files given, at most ${limits.maxFiles} are allowed`,
            { fileCount: files.length, limit: limits.maxFiles }
        );
    }

    for (const file of files) {
        assertFileWithinBudget(file, limits);
    }

    const total = files.reduce((sum, file) => sum + file.sizeBytes, 0);
    if (total > limits.maxTotalBytes) {
        throw new ResourceExhaustedError(
            `Total upload size ${toMb(total)}MB is above the ${toMb(limits.maxTotalBytes)}MB limit`,
            { totalBytes: total, limit: limits.maxTotalBytes }
        );
    }
}

// ---------------------------------------------------------------------------
// Character budgets
// ---------------------------------------------------------------------------

export function capExtractedText(text: string, limits: Pick<SizeLimits, "maxExtractedChars">): string {
    if (text.length <= limits.maxExtractedChars) {
        return text;
    }
    console.warn(`[truncation] Extracted text of ${text.length} chars capped to head and tail`);
    return text.slice(0, EXTRACTED_HEAD_CHARS) + CUT + text.slice(-EXTRACTED_TAIL_CHARS);
}

/** Why a document must skip the backend, or `null` when it may use it */
export function generativeBypassReason(document: ExtractedDocument, limits: GenerationLimits): string | null {
    if (document.metadata.skipGenerative) {
        return "document is flagged to skip generative processing";
    }
    if (document.text.length > limits.hardTextCap) {
        return `text of ${document.text.length} chars exceeds the ${limits.hardTextCap} char cap`;
    }
    if (document.metadata.sizeBytes > limits.fileSizeCap) {
        return `file of ${toMb(document.metadata.sizeBytes)}MB exceeds the ${toMb(limits.fileSizeCap)}MB cap`;
    }
    return null;
}

export function shouldBypassGenerative(document: ExtractedDocument, limits: GenerationLimits): boolean {
    return generativeBypassReason(document, limits) !== null;
}

/**
 * Shrink text above the large threshold before the first backend attempt.
 * Sectioned documents keep the first, some middle, and the last sections;
 * otherwise the head, an optional middle slice and the tail survive.
 */
export function prepareGenerativeText(
    text: string,
    sections: readonly DocumentSection[],
    limits: Pick<GenerationLimits, "largeTextThreshold">
): PreparedText {
    if (text.length <= limits.largeTextThreshold) {
        return { text, strategy: "none", isLarge: false };
    }

    const compact = structuredTruncation(sections);
    if (compact !== null) {
        return { text: compact, strategy: "structured", isLarge: true };
    }

    return { text: positionalTruncation(text), strategy: "positional", isLarge: true };
}

function structuredTruncation(sections: readonly DocumentSection[]): string | null {
    if (sections.length < MIN_SECTIONS_FOR_STRUCTURED) {
        return null;
    }

    const leading = sections.slice(0, LEADING_SECTIONS);
    const groups: DocumentSection[][] = [leading];
    let nextFree = leading.length;

    if (sections.length > MIDDLE_SECTIONS_THRESHOLD) {
        const start = Math.floor(sections.length / 3);
        groups.push(sections.slice(start, start + MIDDLE_SECTIONS));
        nextFree = start + MIDDLE_SECTIONS;
    }

    // Trailing sections never repeat ones already kept
    groups.push(sections.slice(Math.max(nextFree, sections.length - TRAILING_SECTIONS)));

    const rendered = groups
        .map((group) =>
            group
                .filter((section) => section.title && section.content.trim())
                .map((section) => `## ${section.title}\n${section.content.slice(0, SECTION_BODY_CHARS).trim()}`)
                .join("\n\n")
        )
        .filter((group) => group.length > 0);

    if (rendered.length < 2) {
        return null;
    }

    const compact = rendered.join(CUT);
    return compact.length > MIN_COMPACT_CHARS ? compact : null;
}

function positionalTruncation(text: string): string {
    const head = text.slice(0, HEAD_CHARS);
    const tail = text.slice(-TAIL_CHARS);

    if (text.length < MIDDLE_SLICE_BELOW) {
        const middleStart = Math.floor(text.length / 2) - MIDDLE_CHARS / 2;
        const middle = text.slice(middleStart, middleStart + MIDDLE_CHARS);
        return head + CUT + middle + CUT + tail;
    }

    return head + CUT + tail;
}

/** Keep `keepRatio` of the text: 75% of it from the start, 25% from the end */
function keepHeadAndTail(text: string, keepRatio: number): string {
    const keep = Math.floor(text.length * keepRatio);
    const headLength = Math.floor(keep * HEAD_SHARE);
    const tailLength = keep - headLength;
    return text.slice(0, headLength) + CUT + (tailLength > 0 ? text.slice(-tailLength) : "");
}

/** Retry `n` (1-based) keeps 0.7 − 0.1·n of the previous attempt's text */
export function escalateTruncation(text: string, retry: number): string {
    return keepHeadAndTail(text, Math.max(0.7 - 0.1 * retry, 0.1));
}

export function truncateForContextLimit(text: string): string {
    return keepHeadAndTail(text, 0.25);
}
