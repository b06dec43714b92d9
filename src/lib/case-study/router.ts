/**
 * Case Study Builder — Extractor Router
 *
 * Central registry that matches incoming files to the correct extractor
 * based on file extension, then runs extraction, size policy, text
 * normalization and structure extraction.  URLs go to the web extractor.
 *
 * Pre-registers all built-in extractors on construction.
 */

import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { DEFAULT_SIZE_LIMITS, type SizeLimits } from "./config";
import { CaseStudyError, CorruptInputError, UnsupportedFormatError, type CorruptFormat } from "./errors";
import { DocxExtractor } from "./extractors/docx";
import { errorMessage } from "./extractors/image";
import { PdfExtractor } from "./extractors/pdf";
import { PptxExtractor } from "./extractors/pptx";
import { TxtExtractor } from "./extractors/txt";
import { WebExtractor } from "./extractors/web";
import { countWords, normalizeText } from "./normalize";
import { extractStructuredContent } from "./structure";
import { assertBatchWithinBudget, assertFileWithinBudget, capExtractedText, type SizedFile } from "./truncation";
import type { ExtractedDocument, ExtractionContext, Extractor, ExtractorOutput, SourceType } from "./types";

const FILE_SOURCE_TYPES: readonly SourceType[] = ["pdf", "doc", "docx", "pptx", "txt"];

/** Formats whose failed extraction is retried once without images */
const RECOVERABLE: ReadonlySet<SourceType> = new Set<SourceType>(["pdf", "pptx"]);

export interface ExtractorRouterOptions {
    limits?: SizeLimits;
    /** Replaces the built-in file extractors */
    extractors?: Extractor[];
    web?: WebExtractor;
}

export function isUrl(pathOrUrl: string): boolean {
    return /^https?:\/\//i.test(pathOrUrl);
}

export function detectSourceType(fileName: string): SourceType {
    const base = path.basename(fileName);
    const extension = base.includes(".") ? (base.split(".").pop() ?? "").toLowerCase() : "";

    const sourceType = FILE_SOURCE_TYPES.find((type) => type === extension);
    if (!sourceType) {
        throw new UnsupportedFormatError(extension);
    }
    return sourceType;
}

function corruptFormat(sourceType: SourceType): CorruptFormat | null {
    switch (sourceType) {
        case "pdf":
            return "pdf";
        case "doc":
        case "docx":
            return "docx";
        case "pptx":
            return "pptx";
        default:
            return null;
    }
}

export class ExtractorRouter {
    private readonly extractors: Extractor[] = [];
    private readonly limits: SizeLimits;
    private readonly web: WebExtractor;

    constructor(options: ExtractorRouterOptions = {}) {
        this.limits = options.limits ?? DEFAULT_SIZE_LIMITS;
        this.web = options.web ?? new WebExtractor();

        // Register built-in extractors in priority order
        const extractors = options.extractors ?? [
            new PdfExtractor(),
            new DocxExtractor(),
            new PptxExtractor(),
            new TxtExtractor(),
        ];
        extractors.forEach((extractor) => this.register(extractor));
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    /** Add a custom extractor to the registry */
    register(extractor: Extractor): void {
        this.extractors.push(extractor);
    }

    /**
     * Find the first extractor that supports the given source type.
     * @throws UnsupportedFormatError if none is registered for it
     */
    route(sourceType: SourceType): Extractor {
        const extractor = this.extractors.find((e) => e.supports(sourceType));
        if (!extractor) {
            throw new UnsupportedFormatError(sourceType);
        }
        return extractor;
    }

    /**
     * Read a local file or a web page.  Web failures come back as a document
     * with `status: "error"`; file failures throw a `CaseStudyError`.
     */
    async processDocument(pathOrUrl: string): Promise<ExtractedDocument> {
        console.debug(`[ExtractorRouter] Processing document: ${pathOrUrl}`);

        if (isUrl(pathOrUrl)) {
            return this.processUrl(pathOrUrl);
        }

        const fileName = path.basename(pathOrUrl);
        detectSourceType(fileName);
        const { size } = await stat(pathOrUrl);
        assertFileWithinBudget({ fileName, sizeBytes: size }, this.limits);

        return this.processBuffer(await readFile(pathOrUrl), fileName);
    }

    /**
     * End-to-end pipeline for bytes already in memory:
     * route → extract (with recovery) → normalize → structure.
     */
    async processBuffer(buffer: Buffer, fileName: string): Promise<ExtractedDocument> {
        const sourceType = detectSourceType(fileName);
        const sizeBytes = buffer.length;
        assertFileWithinBudget({ fileName, sizeBytes }, this.limits);

        const isLarge = sizeBytes > this.limits.largeFileBytes;
        const isVeryLarge = sizeBytes > this.limits.veryLargeFileBytes;
        if (isLarge) {
            console.info(`[ExtractorRouter] Large file detected (${(sizeBytes / 1024 / 1024).toFixed(1)}MB). Optimizing processing.`);
        }

        const context: ExtractionContext = {
            fileName,
            sizeBytes,
            skipImages: isVeryLarge || (sourceType === "pdf" && isLarge),
        };

        const extractor = this.route(sourceType);
        let output: ExtractorOutput;
        let skipGenerative = isLarge;
        let errorDetail: string | undefined;

        try {
            output = await extractor.extract(buffer, context);
        } catch (error) {
            const format = corruptFormat(sourceType);
            if (error instanceof CaseStudyError || !format) {
                throw error;
            }

            const detail = errorMessage(error);
            console.error(`[${extractor.name}] Error processing ${fileName}: ${detail}`);
            if (!RECOVERABLE.has(sourceType)) {
                throw new CorruptInputError(format, detail, { cause: error });
            }

            output = await this.recover(extractor, buffer, context, format, error);
            skipGenerative = true;
            errorDetail = `Recovered with text-only extraction after: ${detail}`;
        }

        const text = capExtractedText(normalizeText(output.text), this.limits);

        return {
            documentId: uuidv4(),
            text,
            images: output.images,
            structuredContent: extractStructuredContent(text, sourceType),
            metadata: {
                sourceType,
                fileName,
                sizeBytes,
                status: "success",
                ...(errorDetail ? { errorDetail } : {}),
                skipGenerative,
                wordCount: countWords(text),
                ...(output.metadata?.pageCount !== undefined ? { pageCount: output.metadata.pageCount } : {}),
                ...(output.metadata?.slideCount !== undefined ? { slideCount: output.metadata.slideCount } : {}),
                ...(output.metadata?.title ? { title: output.metadata.title } : {}),
                warnings: output.metadata?.warnings ?? [],
            },
        };
    }

    /**
     * Multi-file upload: the first input is primary and its failure
     * propagates; supplementary inputs are merged in when they succeed.
     */
    async processDocuments(pathsOrUrls: readonly string[]): Promise<ExtractedDocument> {
        const [primaryPath, ...supplementary] = pathsOrUrls;
        if (primaryPath === undefined) {
            throw new Error("No documents given");
        }

        // Unreadable files count as empty here; processDocument reports them
        const sized: SizedFile[] = await Promise.all(
            pathsOrUrls.map(async (entry) => ({
                fileName: isUrl(entry) ? entry : path.basename(entry),
                sizeBytes: isUrl(entry) ? 0 : await stat(entry).then((info) => info.size, () => 0),
            }))
        );
        assertBatchWithinBudget(sized, this.limits);

        const merged = await this.processDocument(primaryPath);
        if (supplementary.length > 0) {
            console.debug(`[ExtractorRouter] Processing ${supplementary.length} supplementary documents`);
        }

        let text = merged.text;
        const images = [...merged.images];
        let skipGenerative = merged.metadata.skipGenerative;
        let sizeBytes = merged.metadata.sizeBytes;

        for (let i = 1; i < pathsOrUrls.length; i++) {
            let document: ExtractedDocument;
            try {
                document = await this.processDocument(pathsOrUrls[i]);
            } catch (error) {
                console.warn(`[ExtractorRouter] Skipping supplementary document ${i} (${pathsOrUrls[i]}): ${errorMessage(error)}`);
                continue;
            }

            if (document.metadata.status === "error") {
                console.warn(`[ExtractorRouter] Skipping supplementary document ${i}: ${document.metadata.errorDetail ?? "no content"}`);
                continue;
            }

            if (document.text) {
                text += `\n\n--- Document ${i + 1}: ${document.metadata.fileName} ---\n\n${document.text}`;
            }
            images.push(...document.images.map((image) => ({ ...image, id: `supp_${i}_${image.id}` })));
            skipGenerative ||= document.metadata.skipGenerative;
            sizeBytes += document.metadata.sizeBytes;
        }

        const finalText = capExtractedText(text, this.limits);
        return {
            ...merged,
            text: finalText,
            images,
            metadata: {
                ...merged.metadata,
                sizeBytes,
                skipGenerative,
                wordCount: countWords(finalText),
            },
        };
    }

    // ---------------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------------

    private async recover(
        extractor: Extractor,
        buffer: Buffer,
        context: ExtractionContext,
        format: CorruptFormat,
        originalError: unknown
    ): Promise<ExtractorOutput> {
        console.info(`[${extractor.name}] Attempting recovery with text-only extraction`);
        try {
            const recovered = await extractor.extract(buffer, { ...context, skipImages: true });
            if (!recovered.text.trim()) {
                throw new Error("could not extract text");
            }
            console.info(`[${extractor.name}] Recovery successful with text-only extraction`);
            return { ...recovered, images: [] };
        } catch (recoveryError) {
            console.error(`[${extractor.name}] Recovery failed: ${errorMessage(recoveryError)}`);
            throw new CorruptInputError(format, errorMessage(originalError), { cause: originalError });
        }
    }

    private async processUrl(url: string): Promise<ExtractedDocument> {
        const page = await this.web.read(url);
        const text = capExtractedText(normalizeText(page.text), this.limits);
        const structuredContent = extractStructuredContent(text, "web");
        if (!structuredContent.title && page.title) {
            structuredContent.title = page.title;
        }

        return {
            documentId: uuidv4(),
            text,
            images: [],
            structuredContent,
            metadata: {
                sourceType: "web",
                fileName: page.fileName,
                sizeBytes: page.sizeBytes,
                status: page.status,
                ...(page.errorDetail ? { errorDetail: page.errorDetail } : {}),
                skipGenerative: false,
                wordCount: countWords(text),
                url: page.url,
                domain: page.domain,
                ...(page.title ? { title: page.title } : {}),
                ...(page.date ? { date: page.date } : {}),
                warnings: [],
            },
        };
    }
}
