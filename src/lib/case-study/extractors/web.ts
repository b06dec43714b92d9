/**
 * Case Study Builder — Web Page Extractor
 *
 * Fetches a URL, drops scripts, navigation, headers and footers with
 * regular expressions, and keeps the text of the main content container.
 *
 * Never throws: network failures and pages without readable text come back
 * as a result with empty text and `status: "error"`.
 */

import { decodeEntities } from "../normalize";
import type { ExtractionStatus } from "../types";

export const DEFAULT_WEB_TIMEOUT_MS = 30_000;

const USER_AGENT = "Mozilla/5.0 (compatible; CaseStudyBuilder/1.0)";

/** Removed with their content before the main-content search */
const BOILERPLATE_ELEMENTS = ["script", "style", "noscript", "svg", "nav", "header", "footer", "aside", "iframe"];

export interface WebPageContent {
    text: string;
    title?: string;
    date?: string;
}

export interface WebReadResult extends WebPageContent {
    url: string;
    domain: string;
    /** Last URL path segment, or the domain for root URLs */
    fileName: string;
    sizeBytes: number;
    status: ExtractionStatus;
    errorDetail?: string;
}

export interface WebExtractorOptions {
    fetch?: typeof fetch;
    timeoutMs?: number;
}

export class WebExtractor {
    readonly name = "WebExtractor";

    private readonly fetchImpl: typeof fetch;
    private readonly timeoutMs: number;

    constructor(options: WebExtractorOptions = {}) {
        this.fetchImpl = options.fetch ?? fetch;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_WEB_TIMEOUT_MS;
    }

    async read(url: string): Promise<WebReadResult> {
        let location: URL;
        try {
            location = new URL(url);
        } catch {
            return failed(url, url, url, `Invalid URL: ${url}`);
        }

        const domain = location.host;
        const segments = location.pathname.split("/").filter(Boolean);
        const fileName = segments[segments.length - 1] ?? domain;

        try {
            const response = await this.fetchImpl(url, {
                headers: { "User-Agent": USER_AGENT, Accept: "text/html,application/xhtml+xml" },
                signal: AbortSignal.timeout(this.timeoutMs),
            });

            if (!response.ok) {
                return failed(url, domain, fileName, `Failed to download content (HTTP ${response.status})`);
            }

            const html = await response.text();
            const content = extractMainContent(html);
            if (!content.text) {
                return failed(url, domain, fileName, "No readable content found on the page");
            }

            return {
                ...content,
                url,
                domain,
                fileName,
                sizeBytes: Buffer.byteLength(html, "utf-8"),
                status: "success",
            };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[WebExtractor] Error processing web content from ${url}: ${message}`);
            return failed(url, domain, fileName, message);
        }
    }
}

function failed(url: string, domain: string, fileName: string, errorDetail: string): WebReadResult {
    return { text: "", url, domain, fileName, sizeBytes: 0, status: "error", errorDetail };
}

// ---------------------------------------------------------------------------
// HTML processing
// ---------------------------------------------------------------------------

export function extractMainContent(rawHtml: string): WebPageContent {
    const title = metaContent(rawHtml, "og:title") ?? elementText(rawHtml, "title");
    const date =
        metaContent(rawHtml, "article:published_time") ??
        metaContent(rawHtml, "date") ??
        /<time\b[^>]*\bdatetime\s*=\s*["']([^"']+)["']/i.exec(rawHtml)?.[1];

    // ── Step 1: Remove elements that carry no readable content ──
    let html = rawHtml.replace(/<!--[\s\S]*?-->/g, "");
    for (const tag of BOILERPLATE_ELEMENTS) {
        html = html.replace(new RegExp(`<${tag}\\b[\\s\\S]*?<\\/${tag}>`, "gi"), "");
    }

    // ── Step 2: Prefer the most specific content container ──
    html = innerHtml(html, "article") ?? innerHtml(html, "main") ?? innerHtml(html, "body") ?? html;

    // ── Step 3: Convert structural tags into newlines ──
    html = html
        .replace(/<\/?(p|div|br|hr|section|li|blockquote|pre|table|tr|ul|ol|dl|dt|dd|figcaption|figure)\b[^>]*>/gi, "\n\n")
        .replace(/<\/?(h[1-6])\b[^>]*>/gi, "\n\n");

    // ── Step 4: Strip remaining tags and decode entities ──
    const text = decodeEntities(html.replace(/<[^>]*>/g, " "))
        .split(/\n{2,}/)
        .map((p) => p.replace(/\s+/g, " ").trim())
        .filter((p) => p.length > 0)
        .join("\n");

    return {
        text,
        ...(title ? { title } : {}),
        ...(date ? { date } : {}),
    };
}

function innerHtml(html: string, tag: string): string | undefined {
    return new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)<\\/${tag}>`, "i").exec(html)?.[1];
}

function elementText(html: string, tag: string): string | undefined {
    const inner = innerHtml(html, tag);
    const text = inner === undefined ? "" : decodeEntities(inner.replace(/<[^>]*>/g, " ")).replace(/\s+/g, " ").trim();
    return text || undefined;
}

/** `content` of the first `<meta>` whose `property` or `name` equals `key` */
function metaContent(html: string, key: string): string | undefined {
    for (const [tag] of html.matchAll(/<meta\b[^>]*>/gi)) {
        const attributes = new Map<string, string>();
        for (const match of tag.matchAll(/([a-zA-Z:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
            attributes.set(match[1].toLowerCase(), match[2] ?? match[3] ?? "");
        }

        const name = attributes.get("property") ?? attributes.get("name");
        const content = attributes.get("content")?.trim();
        if (name?.toLowerCase() === key && content) {
            return decodeEntities(content);
        }
    }
    return undefined;
}
