/**
 * Case Study Builder — PDF Page Rasterizer
 *
 * Renders whole pages to JPEG when a PDF has no extractable embedded images.
 * The default implementation draws with pdf.js onto `@napi-rs/canvas`.
 */

import { createCanvas } from "@napi-rs/canvas";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { errorMessage } from "./image";

export const DEFAULT_RASTER_DPI = 150;
export const DEFAULT_RASTER_TIMEOUT_MS = 60_000;

const PDF_POINTS_PER_INCH = 72;
const JPEG_QUALITY = 85;

export interface RasterizedPage {
    /** 1-based */
    pageNumber: number;
    bytes: Buffer;
    mimeSubtype: "jpeg" | "png";
}

export interface RasterizeOptions {
    dpi: number;
    timeoutMs: number;
}

export interface PageRasterizer {
    /** Pages that fail to render are left out; a missed deadline rejects */
    rasterize(pdf: Buffer, options: RasterizeOptions): Promise<RasterizedPage[]>;
}

export class PdfjsPageRasterizer implements PageRasterizer {
    async rasterize(pdf: Buffer, options: RasterizeOptions): Promise<RasterizedPage[]> {
        const task = getDocument({
            data: new Uint8Array(pdf),
            isEvalSupported: false,
            verbosity: 0,
        });

        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () => reject(new Error(`Page rendering exceeded ${options.timeoutMs}ms`)),
                options.timeoutMs
            );
        });

        const render = async (): Promise<RasterizedPage[]> => {
            const document = await task.promise;
            const scale = options.dpi / PDF_POINTS_PER_INCH;
            const pages: RasterizedPage[] = [];

            for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
                try {
                    const page = await document.getPage(pageNumber);
                    const viewport = page.getViewport({ scale });
                    const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
                    await page.render({ canvasContext: canvas.getContext("2d"), viewport }).promise;
                    pages.push({ pageNumber, bytes: await canvas.encode("jpeg", JPEG_QUALITY), mimeSubtype: "jpeg" });
                    page.cleanup();
                } catch (error) {
                    console.warn(`[PdfRasterizer] Error rendering page ${pageNumber}: ${errorMessage(error)}`);
                }
            }

            return pages;
        };

        try {
            return await Promise.race([render(), deadline]);
        } finally {
            clearTimeout(timer);
            await task.destroy();
        }
    }
}
