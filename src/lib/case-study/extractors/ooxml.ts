/**
 * Case Study Builder — OOXML Package Helpers
 *
 * Shared by the DOCX and PPTX extractors: relationship lookup inside the
 * zip package and an order-preserving XML tree from `xml2js`.
 */

import path from "node:path";
import type JSZip from "jszip";
import { parseStringPromise } from "xml2js";

export const IMAGE_RELATIONSHIP_SUFFIX = "/image";

// ---------------------------------------------------------------------------
// XML tree
// ---------------------------------------------------------------------------

/**
 * Element as produced by xml2js with `explicitChildren` +
 * `preserveChildrenOrder`: `#name` is the tag, `$` the attributes, `$$` the
 * children in document order and `_` the character data.
 */
export interface XmlElement {
    "#name": string;
    [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isXmlElement(value: unknown): value is XmlElement {
    return isRecord(value) && typeof value["#name"] === "string";
}

export async function parseXml(xml: string): Promise<XmlElement> {
    const parsed: unknown = await parseStringPromise(xml, {
        explicitChildren: true,
        preserveChildrenOrder: true,
        explicitCharkey: true,
    });

    const root = isRecord(parsed) ? Object.values(parsed)[0] : undefined;
    if (!isXmlElement(root)) {
        throw new Error("XML document has no root element");
    }
    return root;
}

export function children(element: XmlElement): XmlElement[] {
    const list = element.$$;
    return Array.isArray(list) ? list.filter(isXmlElement) : [];
}

export function childrenNamed(element: XmlElement, name: string): XmlElement[] {
    return children(element).filter((child) => child["#name"] === name);
}

export function attribute(element: XmlElement, name: string): string | undefined {
    const attributes = element.$;
    if (!isRecord(attributes)) return undefined;
    const value = attributes[name];
    return typeof value === "string" ? value : undefined;
}

export function ownText(element: XmlElement): string {
    return typeof element._ === "string" ? element._ : "";
}

/** Every descendant with the given tag, in document order */
export function descendants(root: XmlElement, name: string): XmlElement[] {
    const found: XmlElement[] = [];
    const stack = [...children(root)].reverse();

    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        if (current["#name"] === name) {
            found.push(current);
        }
        stack.push(...children(current).reverse());
    }

    return found;
}

export function firstDescendant(root: XmlElement, name: string): XmlElement | undefined {
    const stack = [...children(root)].reverse();

    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        if (current["#name"] === name) {
            return current;
        }
        stack.push(...children(current).reverse());
    }

    return undefined;
}

/** DrawingML text: runs concatenated per paragraph, paragraphs joined by newlines */
export function drawingText(element: XmlElement): string {
    return descendants(element, "a:p")
        .map((paragraph) => descendants(paragraph, "a:t").map(ownText).join(""))
        .join("\n");
}

// ---------------------------------------------------------------------------
// Package relationships
// ---------------------------------------------------------------------------

export interface Relationship {
    id: string;
    type: string;
    /** Zip entry path, already resolved against the owning part */
    target: string;
    external: boolean;
}

/** `ppt/slides/slide1.xml` → `ppt/slides/_rels/slide1.xml.rels` */
export function relationshipsPath(partPath: string): string {
    return path.posix.join(path.posix.dirname(partPath), "_rels", `${path.posix.basename(partPath)}.rels`);
}

export function resolvePartTarget(partPath: string, target: string): string {
    if (target.startsWith("/")) {
        return target.slice(1);
    }
    return path.posix.normalize(path.posix.join(path.posix.dirname(partPath), target));
}

/** Relationships of one part; a missing `.rels` entry means none */
export async function readRelationships(zip: JSZip, partPath: string): Promise<Relationship[]> {
    const entry = zip.file(relationshipsPath(partPath));
    if (!entry) {
        return [];
    }

    const root = await parseXml(await entry.async("text"));
    const relationships: Relationship[] = [];

    for (const node of childrenNamed(root, "Relationship")) {
        const id = attribute(node, "Id");
        const type = attribute(node, "Type");
        const target = attribute(node, "Target");
        if (!id || !type || !target) continue;

        const external = attribute(node, "TargetMode") === "External";
        relationships.push({
            id,
            type,
            target: external ? target : resolvePartTarget(partPath, target),
            external,
        });
    }

    return relationships;
}

export function isImageRelationship(relationship: Relationship): boolean {
    return !relationship.external && relationship.type.endsWith(IMAGE_RELATIONSHIP_SUFFIX);
}

export async function readPartBytes(zip: JSZip, partPath: string): Promise<Buffer | null> {
    const entry = zip.file(partPath);
    return entry ? entry.async("nodebuffer") : null;
}
