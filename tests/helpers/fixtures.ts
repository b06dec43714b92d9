import JSZip from "jszip";
import { PDFDocument, PDFName, StandardFonts } from "pdf-lib";
import sharp from "sharp";
import type { GenerativeBackend, StructuredCompletionRequest, TextCompletionRequest } from "@/lib/case-study/generation/backend";
import type { CaseStudy, ExtractedDocument, ExtractedImage, StructuredContent } from "@/lib/case-study/types";

// ── Images ──

export async function pngImage(width: number, height: number, color = { r: 40, g: 90, b: 160 }): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

export async function jpegImage(width: number, height: number): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 60, b: 30 } } })
        .jpeg()
        .toBuffer();
}

export function makeImage(overrides: Partial<ExtractedImage> = {}): ExtractedImage {
    return {
        id: "img_0",
        caption: "Image",
        mimeSubtype: "png",
        bytes: Buffer.from("not-really-an-image"),
        selectedForNarrative: false,
        ...overrides,
    };
}

// ── Documents ──

export function makeStructured(overrides: Partial<StructuredContent> = {}): StructuredContent {
    return {
        sections: [],
        keyPoints: [],
        entities: { organizations: [], people: [], dates: [] },
        ...overrides,
    };
}

export function makeDocument(overrides: Partial<ExtractedDocument> = {}): ExtractedDocument {
    return {
        documentId: "doc-1",
        text: "Some document text",
        images: [],
        structuredContent: makeStructured(),
        metadata: {
            sourceType: "txt",
            fileName: "notes.txt",
            sizeBytes: 18,
            status: "success",
            skipGenerative: false,
            wordCount: 3,
            warnings: [],
        },
        ...overrides,
    };
}

export function makeCaseStudy(overrides: Partial<CaseStudy> = {}): CaseStudy {
    return {
        title: "Warehouse Automation",
        challenge: "Manual picking was slow.",
        approach: "Mapped the picking routes.",
        solution: "Deployed guided picking carts.",
        outcomes: "Throughput doubled.",
        summary: "A warehouse doubled throughput.",
        keyPoints: ["Throughput doubled", "Errors fell"],
        images: [],
        ...overrides,
    };
}

// ── Office packages ──

const RELS_NS = "http://schemas.openxmlformats.org/package/2006/relationships";
const IMAGE_REL = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image";

function escapeXml(text: string): string {
    return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function relationshipsXml(entries: Array<{ id: string; type: string; target: string }>): string {
    const body = entries
        .map((entry) => `<Relationship Id="${entry.id}" Type="${entry.type}" Target="${entry.target}"/>`)
        .join("");
    return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><Relationships xmlns="${RELS_NS}">${body}</Relationships>`;
}

export async function buildDocx(paragraphs: string[], images: Buffer[] = []): Promise<Buffer> {
    const zip = new JSZip();
    zip.file(
        "[Content_Types].xml",
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
            `<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">` +
            `<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>` +
            `<Default Extension="xml" ContentType="application/xml"/>` +
            `<Default Extension="png" ContentType="image/png"/>` +
            `<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>` +
            `</Types>`
    );
    zip.file(
        "_rels/.rels",
        relationshipsXml([
            {
                id: "rId1",
                type: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument",
                target: "word/document.xml",
            },
        ])
    );

    const body = paragraphs.map((text) => `<w:p><w:r><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r></w:p>`).join("");
    zip.file(
        "word/document.xml",
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
            `<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`
    );

    images.forEach((bytes, index) => zip.file(`word/media/image${index + 1}.png`, bytes));
    zip.file(
        "word/_rels/document.xml.rels",
        relationshipsXml(images.map((_, index) => ({ id: `rId${index + 10}`, type: IMAGE_REL, target: `media/image${index + 1}.png` })))
    );

    return zip.generateAsync({ type: "nodebuffer" });
}

export interface SlideSpec {
    title?: string;
    /** Each entry becomes one body text box; `\n` separates paragraphs */
    bodies?: string[];
    pictures?: Array<{ bytes: Buffer; description?: string }>;
    /** Shapes whose fill is a picture */
    fills?: Buffer[];
    /** Pictures wrapped in a group shape */
    groupedPictures?: Array<{ bytes: Buffer; description?: string }>;
}

const SLIDE_NS =
    'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" ' +
    'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main" ' +
    'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"';

function textShape(id: number, text: string, placeholder?: string): string {
    const ph = placeholder ? `<p:ph type="${placeholder}"/>` : "";
    const paragraphs = text
        .split("\n")
        .map((line) => `<a:p><a:r><a:t>${escapeXml(line)}</a:t></a:r></a:p>`)
        .join("");
    return (
        `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="Shape ${id}"/><p:cNvSpPr/><p:nvPr>${ph}</p:nvPr></p:nvSpPr>` +
        `<p:spPr/><p:txBody><a:bodyPr/>${paragraphs}</p:txBody></p:sp>`
    );
}

function filledShape(id: number, embedId: string): string {
    return (
        `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="Shape ${id}"/><p:cNvSpPr/><p:nvPr/></p:nvSpPr>` +
        `<p:spPr><a:blipFill><a:blip r:embed="${embedId}"/><a:stretch><a:fillRect/></a:stretch></a:blipFill></p:spPr></p:sp>`
    );
}

function pictureShape(id: number, embedId: string, description?: string): string {
    const descr = description ? ` descr="${escapeXml(description)}"` : "";
    return (
        `<p:pic><p:nvPicPr><p:cNvPr id="${id}" name="Picture ${id}"${descr}/><p:cNvPicPr/><p:nvPr/></p:nvPicPr>` +
        `<p:blipFill><a:blip r:embed="${embedId}"/></p:blipFill><p:spPr/></p:pic>`
    );
}

export async function buildPptx(slides: SlideSpec[]): Promise<Buffer> {
    const zip = new JSZip();
    zip.file("ppt/presentation.xml", `<?xml version="1.0" encoding="UTF-8"?><p:presentation ${SLIDE_NS}/>`);

    let mediaCount = 0;
    slides.forEach((slide, slideIndex) => {
        let shapeId = 2;
        const shapes: string[] = [];
        const relationships: Array<{ id: string; type: string; target: string }> = [];

        const addMedia = (bytes: Buffer): string => {
            mediaCount++;
            const relId = `rId${relationships.length + 1}`;
            zip.file(`ppt/media/image${mediaCount}.png`, bytes);
            relationships.push({ id: relId, type: IMAGE_REL, target: `../media/image${mediaCount}.png` });
            return relId;
        };

        if (slide.title !== undefined) {
            shapes.push(textShape(shapeId++, slide.title, "title"));
        }
        for (const body of slide.bodies ?? []) {
            shapes.push(textShape(shapeId++, body));
        }
        for (const fill of slide.fills ?? []) {
            shapes.push(filledShape(shapeId++, addMedia(fill)));
        }
        for (const picture of slide.pictures ?? []) {
            shapes.push(pictureShape(shapeId++, addMedia(picture.bytes), picture.description));
        }
        if (slide.groupedPictures?.length) {
            const members = slide.groupedPictures
                .map((picture) => pictureShape(shapeId++, addMedia(picture.bytes), picture.description))
                .join("");
            shapes.push(
                `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="${shapeId++}" name="Group"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
                    `<p:grpSpPr/>${members}</p:grpSp>`
            );
        }

        const number = slideIndex + 1;
        zip.file(
            `ppt/slides/slide${number}.xml`,
            `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><p:sld ${SLIDE_NS}><p:cSld><p:spTree>` +
                `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>` +
                `${shapes.join("")}</p:spTree></p:cSld></p:sld>`
        );
        zip.file(`ppt/slides/_rels/slide${number}.xml.rels`, relationshipsXml(relationships));
    });

    return zip.generateAsync({ type: "nodebuffer" });
}

// ── PDF ──

export interface PdfPageSpec {
    lines: string[];
    jpeg?: Buffer;
}

export async function buildPdf(pages: PdfPageSpec[]): Promise<Buffer> {
    const pdf = await PDFDocument.create();
    const font = await pdf.embedFont(StandardFonts.Helvetica);

    for (const pageSpec of pages) {
        const page = pdf.addPage([612, 792]);
        pageSpec.lines.forEach((line, index) => {
            page.drawText(line, { x: 72, y: 720 - index * 20, size: 12, font });
        });
        if (pageSpec.jpeg) {
            const image = await pdf.embedJpg(pageSpec.jpeg);
            page.drawImage(image, { x: 72, y: 300, width: 200, height: 150 });
        }
    }

    return Buffer.from(await pdf.save());
}

export interface RawImageSpec {
    width: number;
    height: number;
    colorSpace: "DeviceGray" | "DeviceRGB";
    /** Stream contents before Flate compression */
    data: Uint8Array;
    decodeParms?: { Predictor: number; Colors: number; Columns: number };
    /** Gray alpha samples, one per pixel */
    softMask?: Uint8Array;
}

/** One page whose only resource is a Flate-encoded image XObject */
export async function buildPdfWithRawImage(image: RawImageSpec): Promise<Buffer> {
    const pdf = await PDFDocument.create();
    const page = pdf.addPage([612, 792]);

    const stream = pdf.context.flateStream(image.data, {
        Type: "XObject",
        Subtype: "Image",
        Width: image.width,
        Height: image.height,
        ColorSpace: image.colorSpace,
        BitsPerComponent: 8,
    });
    if (image.decodeParms) {
        stream.dict.set(PDFName.of("DecodeParms"), pdf.context.obj(image.decodeParms));
    }
    if (image.softMask) {
        const mask = pdf.context.flateStream(image.softMask, {
            Type: "XObject",
            Subtype: "Image",
            Width: image.width,
            Height: image.height,
            ColorSpace: "DeviceGray",
            BitsPerComponent: 8,
        });
        stream.dict.set(PDFName.of("SMask"), pdf.context.register(mask));
    }

    page.node.newXObject("Im1", pdf.context.register(stream));
    return Buffer.from(await pdf.save());
}

// ── Generative backend stand-in ──

type StructuredHandler = (request: StructuredCompletionRequest<unknown>, call: number) => Promise<unknown>;
type TextHandler = (request: TextCompletionRequest, call: number) => Promise<string>;

/** Records every request; structured responses are validated with the caller's schema */
export class FakeBackend implements GenerativeBackend {
    readonly name = "fake";
    readonly structuredRequests: Array<StructuredCompletionRequest<unknown>> = [];
    readonly textRequests: TextCompletionRequest[] = [];

    constructor(
        private readonly onStructured: StructuredHandler = async () => {
            throw new Error("unexpected structured call");
        },
        private readonly onText: TextHandler = async () => {
            throw new Error("unexpected text call");
        }
    ) {}

    async completeStructured<T>(request: StructuredCompletionRequest<T>): Promise<T> {
        this.structuredRequests.push(request);
        const raw = await this.onStructured(request, this.structuredRequests.length);
        return request.schema.parse(raw);
    }

    async completeText(request: TextCompletionRequest): Promise<string> {
        this.textRequests.push(request);
        return this.onText(request, this.textRequests.length);
    }
}

export const instantSleep = async (_ms: number): Promise<void> => {};
