/**
 * Case Study Builder — DOCX Extractor
 *
 * Uses `mammoth` to convert DOCX files into semantic HTML, then emits one
 * line per heading, paragraph, list item or table-cell paragraph in
 * document order.  Images come straight from the package: every image
 * relationship of the main document part, validated with `sharp`.
 */

import JSZip from "jszip";
import mammoth from "mammoth";
import { stripTags } from "../normalize";
import type { ExtractedImage, ExtractionContext, Extractor, ExtractorOutput, SourceType } from "../types";
import { errorMessage, inspectImage } from "./image";
import { isImageRelationship, readPartBytes, readRelationships } from "./ooxml";

const MAIN_DOCUMENT_PART = "word/document.xml";

/**
 * Block-level elements mammoth emits for body text; table cells contain <p>.
 * A list item ends at its closing tag or where a nested list starts.
 */
const BLOCK_PATTERN =
    /<(h[1-6]|p)(?:\s[^>]*)?>([\s\S]*?)<\/\1>|<li(?:\s[^>]*)?>([\s\S]*?)(?=<\/?(?:ul|ol|li)\b)/gi;

/** One line of text per heading, paragraph or list item, in document order */
export function htmlBlockLines(html: string): string[] {
    const lines: string[] = [];
    for (const match of html.matchAll(BLOCK_PATTERN)) {
        const text = stripTags(match[2] ?? match[3] ?? "");
        if (text.length > 0) {
            lines.push(text);
        }
    }
    return lines;
}

export class DocxExtractor implements Extractor {
    readonly name = "DocxExtractor";

    supports(sourceType: SourceType): boolean {
        return sourceType === "docx" || sourceType === "doc";
    }

    async extract(buffer: Buffer, context: ExtractionContext): Promise<ExtractorOutput> {
        // Skip inlining images as data URIs; they are read from the package below
        const htmlResult = await mammoth.convertToHtml(
            { buffer },
            { convertImage: mammoth.images.imgElement(async () => ({ src: "" })) }
        );

        const lines = htmlBlockLines(htmlResult.value);

        // Fallback: if HTML parsing yielded nothing, use raw text extraction
        if (lines.length === 0) {
            const textResult = await mammoth.extractRawText({ buffer });
            lines.push(
                ...textResult.value
                    .split(/\n+/)
                    .map((line) => line.trim())
                    .filter((line) => line.length > 0)
            );
        }

        const images = context.skipImages ? [] : await this.extractImages(buffer);

        return {
            text: lines.join("\n"),
            images,
            metadata: {
                warnings: htmlResult.messages
                    .filter((m) => m.type === "warning")
                    .map((m) => m.message),
            },
        };
    }

    private async extractImages(buffer: Buffer): Promise<ExtractedImage[]> {
        const zip = await JSZip.loadAsync(buffer);
        const relationships = await readRelationships(zip, MAIN_DOCUMENT_PART);
        const images: ExtractedImage[] = [];

        for (const relationship of relationships.filter(isImageRelationship)) {
            try {
                const bytes = await readPartBytes(zip, relationship.target);
                if (!bytes) {
                    console.warn(`[DocxExtractor] Missing image part ${relationship.target}`);
                    continue;
                }

                // Decoding validates the embed; corrupt ones are skipped
                const info = await inspectImage(bytes);
                images.push({
                    id: `docx_image_${images.length}`,
                    caption: `Image ${images.length + 1}`,
                    mimeSubtype: info.format,
                    bytes,
                    selectedForNarrative: false,
                });
            } catch (error) {
                console.warn(`[DocxExtractor] Skipping image ${relationship.target}: ${errorMessage(error)}`);
            }
        }

        return images;
    }
}
