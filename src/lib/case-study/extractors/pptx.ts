/**
 * Case Study Builder — PPTX Extractor
 *
 * Uses `jszip` to open .pptx archives and `xml2js` to walk each slide's
 * shape tree.  Text is emitted per slide (`Slide N:` header, `Title:` line,
 * then every other shape's text); images come from pictures, pictures
 * nested in groups, and picture-filled shapes on the first slides.
 *
 * Slides are handled in fixed-size batches so only one batch of parsed
 * XML is alive at a time.
 */

import JSZip from "jszip";
import type { ExtractedImage, ExtractionContext, Extractor, ExtractorOutput, SourceType } from "../types";
import { errorMessage, normalizeImage } from "./image";
import {
    attribute,
    children,
    childrenNamed,
    drawingText,
    firstDescendant,
    parseXml,
    readPartBytes,
    readRelationships,
    type Relationship,
    type XmlElement,
} from "./ooxml";

export const MAX_PPTX_IMAGES = 100;
export const SLIDE_BATCH_SIZE = 30;

/** Above this many slides, only a sample of slides is searched for images */
const SAMPLING_THRESHOLD = 50;
const SAMPLE_EDGE = 10;
const SAMPLE_STRIDE = 5;

/** Picture fills are only looked for on the first slides */
const FILL_SLIDE_LIMIT = 20;

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/i;
const TITLE_PLACEHOLDERS = new Set(["title", "ctrTitle"]);

type ShapeNode =
    | { kind: "picture"; element: XmlElement }
    | { kind: "group"; element: XmlElement }
    | { kind: "filled"; element: XmlElement; embedId: string }
    | { kind: "other" };

interface PendingShape {
    element: XmlElement;
    parentTitle?: string;
}

interface SlideContext {
    /** 1-based */
    number: number;
    title: string;
    relationships: Map<string, Relationship>;
}

/** 0-based indices of the slides whose images are extracted */
export function selectImageSlides(totalSlides: number): Set<number> {
    const indices = new Set<number>();
    if (totalSlides <= SAMPLING_THRESHOLD) {
        for (let i = 0; i < totalSlides; i++) indices.add(i);
        return indices;
    }

    for (let i = 0; i < SAMPLE_EDGE; i++) indices.add(i);
    for (let i = totalSlides - SAMPLE_EDGE; i < totalSlides; i++) indices.add(i);
    for (let i = SAMPLE_EDGE; i < totalSlides - SAMPLE_EDGE; i += SAMPLE_STRIDE) indices.add(i);
    return indices;
}

export class PptxExtractor implements Extractor {
    readonly name = "PptxExtractor";

    supports(sourceType: SourceType): boolean {
        return sourceType === "pptx";
    }

    async extract(buffer: Buffer, context: ExtractionContext): Promise<ExtractorOutput> {
        const zip = await JSZip.loadAsync(buffer);
        if (!zip.file("ppt/presentation.xml")) {
            throw new Error("Archive is not a PowerPoint presentation");
        }

        // Collect slide entries sorted numerically (slide1.xml, slide2.xml, …)
        const slideEntries = Object.keys(zip.files)
            .filter((name) => SLIDE_PATH.test(name))
            .sort((a, b) => slideNumber(a) - slideNumber(b));

        const totalSlides = slideEntries.length;
        const imageSlides = context.skipImages ? new Set<number>() : selectImageSlides(totalSlides);
        if (totalSlides > SAMPLING_THRESHOLD && !context.skipImages) {
            console.debug(
                `[PptxExtractor] Large presentation: searching ${imageSlides.size} of ${totalSlides} slides for images`
            );
        }

        let text = "";
        const images: ExtractedImage[] = [];

        for (let batchStart = 0; batchStart < totalSlides; batchStart += SLIDE_BATCH_SIZE) {
            const batchEnd = Math.min(batchStart + SLIDE_BATCH_SIZE, totalSlides);
            console.debug(`[PptxExtractor] Processing slides ${batchStart + 1} to ${batchEnd}`);

            for (let index = batchStart; index < batchEnd; index++) {
                const entry = slideEntries[index];
                const root = await parseXml(await zip.files[entry].async("text"));
                const shapes = shapeTree(root);
                const titleShape = shapes.find(isTitleShape);
                const title = titleShape ? drawingText(titleShape).trim() : "";

                text += `Slide ${index + 1}:\n`;
                if (title) {
                    text += `Title: ${title}\n`;
                }
                for (const shape of shapes) {
                    if (shape === titleShape || shape["#name"] !== "p:sp") continue;
                    const shapeText = drawingText(shape);
                    if (shapeText.trim()) {
                        text += `${shapeText}\n`;
                    }
                }
                text += "\n";

                if (imageSlides.has(index) && images.length < MAX_PPTX_IMAGES) {
                    const slide: SlideContext = {
                        number: index + 1,
                        title: title || `Slide ${index + 1}`,
                        relationships: new Map(
                            (await readRelationships(zip, entry)).map((rel) => [rel.id, rel])
                        ),
                    };
                    await this.collectImages(zip, shapes, slide, images);
                }
            }
        }

        if (!context.skipImages) {
            this.reportImportantSlides(totalSlides, imageSlides, images);
        }

        return {
            text,
            images,
            metadata: { slideCount: totalSlides },
        };
    }

    // ---------------------------------------------------------------------------
    // Images
    // ---------------------------------------------------------------------------

    /** Walks the shape tree with an explicit worklist; groups push their members */
    private async collectImages(
        zip: JSZip,
        shapes: XmlElement[],
        slide: SlideContext,
        images: ExtractedImage[]
    ): Promise<void> {
        const pending: PendingShape[] = shapes.map((element) => ({ element })).reverse();

        while (pending.length > 0 && images.length < MAX_PPTX_IMAGES) {
            const next = pending.pop();
            if (!next) break;

            const node = classifyShape(next.element, slide.number);
            const ownerTitle = next.parentTitle ?? slide.title;

            try {
                switch (node.kind) {
                    case "group":
                        pending.push(
                            ...children(node.element)
                                .map((element) => ({ element, parentTitle: next.parentTitle }))
                                .reverse()
                        );
                        break;
                    case "picture": {
                        const embedId = blipEmbedId(node.element);
                        const alt = attribute(firstDescendant(node.element, "p:cNvPr") ?? node.element, "descr")?.trim();
                        if (!embedId) break;
                        await this.addImage(zip, slide, embedId, images, {
                            id: `pptx_image_${images.length}`,
                            caption: alt || `Image from ${ownerTitle}`,
                        });
                        break;
                    }
                    case "filled":
                        await this.addImage(zip, slide, node.embedId, images, {
                            id: `pptx_fill_image_${images.length}`,
                            caption: `Background image from ${ownerTitle}`,
                        });
                        break;
                    case "other":
                        break;
                }
            } catch (error) {
                console.warn(
                    `[PptxExtractor] Skipping ${node.kind} shape on slide ${slide.number}: ${errorMessage(error)}`
                );
            }
        }
    }

    private async addImage(
        zip: JSZip,
        slide: SlideContext,
        embedId: string,
        images: ExtractedImage[],
        label: { id: string; caption: string }
    ): Promise<void> {
        const relationship = slide.relationships.get(embedId);
        if (!relationship || relationship.external) {
            return;
        }

        const bytes = await readPartBytes(zip, relationship.target);
        if (!bytes) {
            throw new Error(`missing media part ${relationship.target}`);
        }

        const normalized = await normalizeImage(bytes);
        if (!normalized) {
            console.debug(`[PptxExtractor] Skipping small image on slide ${slide.number}`);
            return;
        }

        images.push({
            id: label.id,
            caption: label.caption,
            mimeSubtype: normalized.mimeSubtype,
            bytes: normalized.bytes,
            selectedForNarrative: false,
            source: { kind: "slide", index: slide.number },
        });
    }

    private reportImportantSlides(totalSlides: number, imageSlides: Set<number>, images: ExtractedImage[]): void {
        const withImages = new Set(
            images.flatMap((image) => (image.source?.kind === "slide" ? [image.source.index] : []))
        );
        const important = new Set([1, 2, 3, totalSlides].filter((n) => n >= 1 && n <= totalSlides));

        for (const slideNumber of important) {
            if (imageSlides.has(slideNumber - 1) && !withImages.has(slideNumber)) {
                console.debug(`[PptxExtractor] No images found on important slide ${slideNumber}`);
            }
        }
    }
}

// ---------------------------------------------------------------------------
// Shape helpers
// ---------------------------------------------------------------------------

function slideNumber(entry: string): number {
    return parseInt(SLIDE_PATH.exec(entry)?.[1] ?? "0", 10);
}

/** Top-level shapes of a slide (`p:cSld/p:spTree`), excluding its own properties */
function shapeTree(root: XmlElement): XmlElement[] {
    const tree = firstDescendant(root, "p:spTree");
    return tree
        ? children(tree).filter((child) => child["#name"] !== "p:nvGrpSpPr" && child["#name"] !== "p:grpSpPr")
        : [];
}

function isTitleShape(shape: XmlElement): boolean {
    if (shape["#name"] !== "p:sp") return false;
    const nonVisual = childrenNamed(shape, "p:nvSpPr")[0];
    const placeholder = nonVisual ? firstDescendant(nonVisual, "p:ph") : undefined;
    const type = placeholder ? attribute(placeholder, "type") : undefined;
    return type !== undefined && TITLE_PLACEHOLDERS.has(type);
}

function blipEmbedId(element: XmlElement): string | undefined {
    const blip = firstDescendant(element, "a:blip");
    return blip ? attribute(blip, "r:embed") : undefined;
}

function classifyShape(element: XmlElement, slideNumber: number): ShapeNode {
    switch (element["#name"]) {
        case "p:pic":
            return { kind: "picture", element };
        case "p:grpSp":
            return { kind: "group", element };
        case "p:sp": {
            if (slideNumber > FILL_SLIDE_LIMIT) return { kind: "other" };
            const properties = childrenNamed(element, "p:spPr")[0];
            const fill = properties ? childrenNamed(properties, "a:blipFill")[0] : undefined;
            const embedId = fill ? blipEmbedId(fill) : undefined;
            return embedId ? { kind: "filled", element, embedId } : { kind: "other" };
        }
        default:
            return { kind: "other" };
    }
}
