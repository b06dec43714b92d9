/**
 * Case Study Builder — PDF Extractor
 *
 * Text comes from pdf.js page by page.  Images are read from each page's
 * XObject resources with pdf-lib so the original bytes survive; only when a
 * document has no usable embedded image are whole pages rasterized.
 */

import {
    PDFArray,
    PDFDict,
    PDFDocument,
    PDFName,
    PDFNumber,
    PDFRawStream,
    PDFStream,
    decodePDFRawStream,
    type PDFObject,
    type PDFPage,
} from "pdf-lib";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractedImage, ExtractionContext, Extractor, ExtractorOutput, SourceType } from "../types";
import { errorMessage, rawSamplesToPng } from "./image";
import {
    DEFAULT_RASTER_DPI,
    DEFAULT_RASTER_TIMEOUT_MS,
    PdfjsPageRasterizer,
    type PageRasterizer,
} from "./pdf-rasterizer";

type Channels = 1 | 3 | 4;

const DEVICE_CHANNELS: Record<string, Channels> = {
    DeviceGray: 1,
    DeviceRGB: 3,
    DeviceCMYK: 4,
};

export interface PdfExtractorOptions {
    rasterizer?: PageRasterizer;
    rasterDpi?: number;
    rasterTimeoutMs?: number;
}

export class PdfExtractor implements Extractor {
    readonly name = "PdfExtractor";

    private readonly rasterizer: PageRasterizer;
    private readonly rasterDpi: number;
    private readonly rasterTimeoutMs: number;

    constructor(options: PdfExtractorOptions = {}) {
        this.rasterizer = options.rasterizer ?? new PdfjsPageRasterizer();
        this.rasterDpi = options.rasterDpi ?? DEFAULT_RASTER_DPI;
        this.rasterTimeoutMs = options.rasterTimeoutMs ?? DEFAULT_RASTER_TIMEOUT_MS;
    }

    supports(sourceType: SourceType): boolean {
        return sourceType === "pdf";
    }

    async extract(buffer: Buffer, context: ExtractionContext): Promise<ExtractorOutput> {
        const pageTexts = await this.extractTextPages(buffer);
        const text = pageTexts.join("\n");

        if (context.skipImages) {
            console.info(`[PdfExtractor] Skipping image extraction for ${context.fileName}`);
            return { text, images: [], metadata: { pageCount: pageTexts.length } };
        }

        let images = await this.extractEmbeddedImages(buffer);
        console.debug(`[PdfExtractor] Embedded image extraction complete. Found ${images.length} images.`);

        if (images.length === 0) {
            images = await this.rasterizePages(buffer);
        }

        return { text, images, metadata: { pageCount: pageTexts.length } };
    }

    // ---------------------------------------------------------------------------
    // Text
    // ---------------------------------------------------------------------------

    /** @throws when pdf.js cannot open the document */
    private async extractTextPages(buffer: Buffer): Promise<string[]> {
        // pdf.js takes ownership of the array it is given
        const task = getDocument({
            data: new Uint8Array(buffer),
            isEvalSupported: false,
            verbosity: 0,
        });

        try {
            const document = await task.promise;
            const pageTexts: string[] = [];

            for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
                try {
                    const page = await document.getPage(pageNumber);
                    const content = await page.getTextContent();
                    const raw = content.items
                        .map((item) => ("str" in item ? (item.hasEOL ? `${item.str}\n` : item.str) : ""))
                        .join(" ");

                    pageTexts.push(
                        raw
                            .replace(/\s+\n/g, "\n")
                            .replace(/[ \t]+/g, " ")
                            .replace(/\n{3,}/g, "\n\n")
                            .trim()
                    );
                    page.cleanup();
                } catch (error) {
                    console.warn(`[PdfExtractor] Text extraction failed on page ${pageNumber}: ${errorMessage(error)}`);
                    pageTexts.push("");
                }
            }

            return pageTexts;
        } finally {
            await task.destroy();
        }
    }

    // ---------------------------------------------------------------------------
    // Embedded images
    // ---------------------------------------------------------------------------

    private async extractEmbeddedImages(buffer: Buffer): Promise<ExtractedImage[]> {
        const images: ExtractedImage[] = [];

        try {
            const pdf = await PDFDocument.load(buffer, { ignoreEncryption: true, updateMetadata: false });
            const pages = pdf.getPages();

            for (let index = 0; index < pages.length; index++) {
                const pageNumber = index + 1;
                for (const image of await this.pageImages(pages[index])) {
                    images.push({
                        id: `pdf_embedded_${images.length}`,
                        caption: `Embedded image ${images.length + 1} (Page ${pageNumber})`,
                        mimeSubtype: image.mimeSubtype,
                        bytes: image.bytes,
                        selectedForNarrative: false,
                        source: { kind: "page", index: pageNumber },
                    });
                }
            }
        } catch (error) {
            console.error(`[PdfExtractor] Error during embedded image extraction: ${errorMessage(error)}`);
        }

        return images;
    }

    private async pageImages(page: PDFPage): Promise<Array<{ bytes: Buffer; mimeSubtype: string }>> {
        const resources = page.node.Resources();
        const xObjects = resources?.lookupMaybe(PDFName.of("XObject"), PDFDict);
        if (!resources || !xObjects) {
            return [];
        }

        const results: Array<{ bytes: Buffer; mimeSubtype: string }> = [];
        for (const [key] of xObjects.entries()) {
            try {
                const stream = xObjects.lookupMaybe(key, PDFStream);
                const subtype = stream?.dict.lookupMaybe(PDFName.of("Subtype"), PDFName);
                if (!stream || !subtype || normalizeName(subtype) !== "Image") {
                    continue;
                }

                const converted = await this.convertImageStream(stream, resources);
                if (converted) {
                    results.push(converted);
                }
            } catch (error) {
                console.warn(`[PdfExtractor] Unable to convert image stream ${key.asString()}: ${errorMessage(error)}`);
            }
        }
        return results;
    }

    private async convertImageStream(
        stream: PDFStream,
        resources: PDFDict
    ): Promise<{ bytes: Buffer; mimeSubtype: string } | null> {
        const filters = filterNames(stream.dict.lookup(PDFName.of("Filter")));

        // JPEG data is stored as-is; keep the original bytes
        if (filters.length === 1 && filters[0] === "DCTDecode") {
            return { bytes: Buffer.from(stream.getContents()), mimeSubtype: "jpeg" };
        }

        const samples = decodeSamples(stream);
        if (!samples) {
            return null;
        }

        const channels = resolveChannels(stream.dict.lookup(PDFName.of("ColorSpace")), resources);
        if (!channels) {
            return null;
        }

        const width = stream.dict.lookup(PDFName.of("Width"), PDFNumber).asNumber();
        const height = stream.dict.lookup(PDFName.of("Height"), PDFNumber).asNumber();
        const alpha = softMaskSamples(stream, width, height);

        return { bytes: await rawSamplesToPng(samples, width, height, channels, alpha), mimeSubtype: "png" };
    }

    // ---------------------------------------------------------------------------
    // Page rendering fallback
    // ---------------------------------------------------------------------------

    private async rasterizePages(buffer: Buffer): Promise<ExtractedImage[]> {
        try {
            const pages = await this.rasterizer.rasterize(buffer, {
                dpi: this.rasterDpi,
                timeoutMs: this.rasterTimeoutMs,
            });
            return pages.map((page) => ({
                id: `pdf_page_${page.pageNumber - 1}`,
                caption: `Page ${page.pageNumber}`,
                mimeSubtype: page.mimeSubtype,
                bytes: page.bytes,
                selectedForNarrative: false,
                source: { kind: "page", index: page.pageNumber },
            }));
        } catch (error) {
            console.error(`[PdfExtractor] Error converting PDF pages to images: ${errorMessage(error)}`);
            return [];
        }
    }
}

// ---------------------------------------------------------------------------
// PDF object helpers
// ---------------------------------------------------------------------------

function normalizeName(name: PDFName): string {
    const raw = name.asString();
    return raw.startsWith("/") ? raw.slice(1) : raw;
}

function filterNames(filter: PDFObject | undefined): string[] {
    if (filter instanceof PDFName) {
        return [normalizeName(filter)];
    }

    if (filter instanceof PDFArray) {
        const names: string[] = [];
        for (let index = 0; index < filter.size(); index++) {
            const value = filter.lookupMaybe(index, PDFName);
            if (value) {
                names.push(normalizeName(value));
            }
        }
        return names;
    }

    return [];
}

interface PredictorParams {
    predictor: number;
    colors: number;
    columns: number;
    bitsPerComponent: number;
}

function predictorParams(value: PDFObject | undefined): PredictorParams {
    const dict = value instanceof PDFDict ? value : value instanceof PDFArray ? value.lookupMaybe(0, PDFDict) : undefined;
    const read = (key: string, fallback: number): number =>
        dict?.lookupMaybe(PDFName.of(key), PDFNumber)?.asNumber() ?? fallback;

    return {
        predictor: read("Predictor", 1),
        colors: read("Colors", 1),
        columns: read("Columns", 1),
        bitsPerComponent: read("BitsPerComponent", 8),
    };
}

/**
 * 8-bit samples of an unfiltered or Flate-encoded image stream, with PNG
 * row prediction undone.  `null` for encodings that are not converted
 * (other filters, other bit depths, TIFF prediction).
 */
function decodeSamples(stream: PDFStream): Uint8Array | null {
    const filters = filterNames(stream.dict.lookup(PDFName.of("Filter")));
    const bitsPerComponent = stream.dict.lookupMaybe(PDFName.of("BitsPerComponent"), PDFNumber)?.asNumber();
    if (
        !(stream instanceof PDFRawStream) ||
        bitsPerComponent !== 8 ||
        !filters.every((name) => name === "FlateDecode")
    ) {
        return null;
    }

    const decoded = decodePDFRawStream(stream).decode();
    const params = predictorParams(stream.dict.lookup(PDFName.of("DecodeParms")));

    if (params.predictor === 1) {
        return decoded;
    }
    if (params.predictor >= 10 && params.bitsPerComponent === 8) {
        return undoPngPredictor(decoded, params.colors, params.columns);
    }
    return null;
}

/** Reverses per-row PNG filters (None, Sub, Up, Average, Paeth) on 8-bit samples */
export function undoPngPredictor(data: Uint8Array, colors: number, columns: number): Uint8Array {
    const rowLength = colors * columns;
    const rows = Math.floor(data.length / (rowLength + 1));
    const out = new Uint8Array(rows * rowLength);

    for (let row = 0; row < rows; row++) {
        const source = row * (rowLength + 1);
        const filter = data[source];
        const target = row * rowLength;

        for (let i = 0; i < rowLength; i++) {
            const raw = data[source + 1 + i];
            const left = i >= colors ? out[target + i - colors] : 0;
            const up = row > 0 ? out[target - rowLength + i] : 0;
            const upLeft = row > 0 && i >= colors ? out[target - rowLength + i - colors] : 0;

            let value: number;
            switch (filter) {
                case 0:
                    value = raw;
                    break;
                case 1:
                    value = raw + left;
                    break;
                case 2:
                    value = raw + up;
                    break;
                case 3:
                    value = raw + Math.floor((left + up) / 2);
                    break;
                case 4:
                    value = raw + paeth(left, up, upLeft);
                    break;
                default:
                    throw new Error(`Unknown PNG row filter ${filter} in row ${row}`);
            }
            out[target + i] = value & 0xff;
        }
    }

    return out;
}

function paeth(left: number, up: number, upLeft: number): number {
    const estimate = left + up - upLeft;
    const toLeft = Math.abs(estimate - left);
    const toUp = Math.abs(estimate - up);
    const toUpLeft = Math.abs(estimate - upLeft);
    if (toLeft <= toUp && toLeft <= toUpLeft) return left;
    return toUp <= toUpLeft ? up : upLeft;
}

/** Alpha samples from an image's /SMask when it matches the image size */
function softMaskSamples(stream: PDFStream, width: number, height: number): Uint8Array | undefined {
    const mask = stream.dict.lookupMaybe(PDFName.of("SMask"), PDFStream);
    if (!mask) {
        return undefined;
    }

    const maskWidth = mask.dict.lookupMaybe(PDFName.of("Width"), PDFNumber)?.asNumber();
    const maskHeight = mask.dict.lookupMaybe(PDFName.of("Height"), PDFNumber)?.asNumber();
    const samples = maskWidth === width && maskHeight === height ? decodeSamples(mask) : null;
    if (!samples || samples.length < width * height) {
        console.debug("[PdfExtractor] Ignoring soft mask that cannot be decoded");
        return undefined;
    }
    return samples;
}

/** Component count of a colour space, or null for ones we do not convert (Indexed, Lab, ...) */
function resolveChannels(value: PDFObject | undefined, resources: PDFDict, depth = 0): Channels | null {
    if (depth > 2) {
        return null;
    }

    if (value instanceof PDFName) {
        const name = normalizeName(value);
        if (name in DEVICE_CHANNELS) {
            return DEVICE_CHANNELS[name];
        }

        // Named colour space defined in the page resources
        const named = resources.lookupMaybe(PDFName.of("ColorSpace"), PDFDict)?.lookup(value);
        return resolveChannels(named, resources, depth + 1);
    }

    if (value instanceof PDFArray) {
        const base = value.lookupMaybe(0, PDFName);
        if (!base) {
            return null;
        }

        if (normalizeName(base) === "ICCBased") {
            const profile = value.lookupMaybe(1, PDFStream);
            const components = profile?.dict.lookupMaybe(PDFName.of("N"), PDFNumber)?.asNumber();
            return components === 1 || components === 3 || components === 4 ? components : null;
        }

        return resolveChannels(base, resources, depth + 1);
    }

    return null;
}
