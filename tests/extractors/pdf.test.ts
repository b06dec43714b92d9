import sharp from "sharp";
import { describe, it, expect } from "vitest";
import { PdfExtractor } from "@/lib/case-study/extractors/pdf";
import type { PageRasterizer, RasterizeOptions, RasterizedPage } from "@/lib/case-study/extractors/pdf-rasterizer";
import { buildPdf, buildPdfWithRawImage, jpegImage } from "../helpers/fixtures";

const context = { fileName: "report.pdf", sizeBytes: 0, skipImages: false };

class StubRasterizer implements PageRasterizer {
    readonly calls: RasterizeOptions[] = [];

    constructor(private readonly result: RasterizedPage[] | Error) {}

    async rasterize(_pdf: Buffer, options: RasterizeOptions): Promise<RasterizedPage[]> {
        this.calls.push(options);
        if (this.result instanceof Error) {
            throw this.result;
        }
        return this.result;
    }
}

const RED = [255, 0, 0];

/** 4x5 solid red, one row per PNG filter type (None, Sub, Up, Average, Paeth) */
const PREDICTED_RED = new Uint8Array([
    0, ...RED, ...RED, ...RED, ...RED,
    1, ...RED, 0, 0, 0, 0, 0, 0, 0, 0, 0,
    2, ...new Array<number>(12).fill(0),
    3, 128, 0, 0, ...new Array<number>(9).fill(0),
    4, ...new Array<number>(12).fill(0),
]);

async function rgbPixels(png: Buffer): Promise<number[]> {
    const { data } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
    return [...data];
}

const renderedPage: RasterizedPage = { pageNumber: 1, bytes: Buffer.from("jpeg-bytes"), mimeSubtype: "jpeg" };

describe("PdfExtractor", () => {
    it("extracts the text of every page", async () => {
        const buffer = await buildPdf([{ lines: ["Quarterly review", "Costs fell"] }, { lines: ["Next steps"] }]);
        const extractor = new PdfExtractor({ rasterizer: new StubRasterizer([]) });

        const output = await extractor.extract(buffer, context);

        expect(output.text).toContain("Quarterly review");
        expect(output.text).toContain("Costs fell");
        expect(output.text).toContain("Next steps");
        expect(output.metadata).toEqual({ pageCount: 2 });
    });

    it("keeps embedded JPEG bytes and skips page rendering", async () => {
        const jpeg = await jpegImage(120, 90);
        const rasterizer = new StubRasterizer([renderedPage]);
        const buffer = await buildPdf([{ lines: ["Cover"] }, { lines: ["Diagram"], jpeg }]);

        const output = await new PdfExtractor({ rasterizer }).extract(buffer, context);

        expect(output.images).toHaveLength(1);
        expect(output.images[0]).toMatchObject({
            id: "pdf_embedded_0",
            caption: "Embedded image 1 (Page 2)",
            mimeSubtype: "jpeg",
            source: { kind: "page", index: 2 },
        });
        expect(output.images[0].bytes.equals(jpeg)).toBe(true);
        expect(rasterizer.calls).toEqual([]);
    });

    it("renders pages when nothing is embedded", async () => {
        const rasterizer = new StubRasterizer([renderedPage]);
        const buffer = await buildPdf([{ lines: ["Text only"] }]);

        const output = await new PdfExtractor({ rasterizer, rasterDpi: 100, rasterTimeoutMs: 5000 }).extract(
            buffer,
            context
        );

        expect(rasterizer.calls).toEqual([{ dpi: 100, timeoutMs: 5000 }]);
        expect(output.images).toEqual([
            {
                id: "pdf_page_0",
                caption: "Page 1",
                mimeSubtype: "jpeg",
                bytes: renderedPage.bytes,
                selectedForNarrative: false,
                source: { kind: "page", index: 1 },
            },
        ]);
    });

    it("returns no images when page rendering fails", async () => {
        const rasterizer = new StubRasterizer(new Error("canvas unavailable"));
        const buffer = await buildPdf([{ lines: ["Text only"] }]);

        const output = await new PdfExtractor({ rasterizer }).extract(buffer, context);

        expect(output.images).toEqual([]);
        expect(output.text).toContain("Text only");
    });

    it("does not look for images when asked to skip them", async () => {
        const rasterizer = new StubRasterizer([renderedPage]);
        const buffer = await buildPdf([{ lines: ["Text only"] }]);

        const output = await new PdfExtractor({ rasterizer }).extract(buffer, { ...context, skipImages: true });

        expect(output.images).toEqual([]);
        expect(rasterizer.calls).toEqual([]);
        expect(output.metadata).toEqual({ pageCount: 1 });
    });

    it("rejects data that is not a PDF", async () => {
        const extractor = new PdfExtractor({ rasterizer: new StubRasterizer([]) });
        await expect(extractor.extract(Buffer.from("plain text, not a PDF"), context)).rejects.toThrow();
    });

    it("undoes PNG row prediction in Flate images", async () => {
        const rasterizer = new StubRasterizer([renderedPage]);
        const buffer = await buildPdfWithRawImage({
            width: 4,
            height: 5,
            colorSpace: "DeviceRGB",
            data: PREDICTED_RED,
            decodeParms: { Predictor: 15, Colors: 3, Columns: 4 },
        });

        const output = await new PdfExtractor({ rasterizer }).extract(buffer, context);

        expect(output.images).toHaveLength(1);
        expect(output.images[0]).toMatchObject({ id: "pdf_embedded_0", mimeSubtype: "png" });
        expect(await rgbPixels(output.images[0].bytes)).toEqual(new Array<number[]>(20).fill(RED).flat());
        expect(rasterizer.calls).toEqual([]);
    });

    it("skips images with a prediction it cannot undo", async () => {
        const rasterizer = new StubRasterizer([renderedPage]);
        const buffer = await buildPdfWithRawImage({
            width: 4,
            height: 5,
            colorSpace: "DeviceRGB",
            data: new Uint8Array(new Array<number[]>(20).fill(RED).flat()),
            decodeParms: { Predictor: 2, Colors: 3, Columns: 4 },
        });

        const output = await new PdfExtractor({ rasterizer }).extract(buffer, context);

        expect(output.images.map((image) => image.id)).toEqual(["pdf_page_0"]);
        expect(rasterizer.calls).toHaveLength(1);
    });

    it("composites soft masks onto white", async () => {
        const buffer = await buildPdfWithRawImage({
            width: 2,
            height: 1,
            colorSpace: "DeviceRGB",
            data: new Uint8Array([0, 0, 0, 0, 0, 0]),
            softMask: new Uint8Array([0, 255]),
        });

        const output = await new PdfExtractor({ rasterizer: new StubRasterizer([]) }).extract(buffer, context);

        expect(output.images).toHaveLength(1);
        expect(await rgbPixels(output.images[0].bytes)).toEqual([255, 255, 255, 0, 0, 0]);
    });
});
