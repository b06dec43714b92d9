/**
 * Case Study Builder — Plain Text Extractor
 *
 * UTF-16 is recognised by its byte-order mark; everything else is tried
 * against an ordered list of encodings with strict decoders.
 */

import { DecodeFailureError } from "../errors";
import type { ExtractionContext, Extractor, ExtractorOutput, SourceType } from "../types";

/** windows-1252 decodes every byte, so the default list never fails */
export const DEFAULT_TEXT_ENCODINGS: readonly string[] = ["utf-8", "windows-1252"];

export interface TxtExtractorOptions {
    encodings?: readonly string[];
}

export class TxtExtractor implements Extractor {
    readonly name = "TxtExtractor";

    private readonly encodings: readonly string[];

    constructor(options: TxtExtractorOptions = {}) {
        this.encodings = options.encodings ?? DEFAULT_TEXT_ENCODINGS;
    }

    supports(sourceType: SourceType): boolean {
        return sourceType === "txt";
    }

    async extract(buffer: Buffer, _context: ExtractionContext): Promise<ExtractorOutput> {
        return { text: this.decode(buffer), images: [] };
    }

    decode(buffer: Buffer): string {
        const utf16 = decodeUtf16WithBom(buffer);
        if (utf16 !== null) {
            return utf16;
        }

        for (const encoding of this.encodings) {
            try {
                const text = new TextDecoder(encoding, { fatal: true }).decode(buffer);
                if (encoding !== this.encodings[0]) {
                    console.info(`[TxtExtractor] Decoded text file with fallback encoding: ${encoding}`);
                }
                return text;
            } catch (error) {
                console.warn(
                    `[TxtExtractor] Decoding as ${encoding} failed: ${error instanceof Error ? error.message : String(error)}`
                );
            }
        }

        console.error("[TxtExtractor] Failed to decode text file with any encoding");
        throw new DecodeFailureError(this.encodings);
    }
}

function decodeUtf16WithBom(buffer: Buffer): string | null {
    if (buffer.length < 2) {
        return null;
    }

    const bom = (buffer[0] << 8) | buffer[1];
    const body = Buffer.from(buffer.subarray(2, 2 + ((buffer.length - 2) & ~1)));

    if (bom === 0xfeff) {
        return body.swap16().toString("utf16le");
    }
    if (bom === 0xfffe) {
        return body.toString("utf16le");
    }
    return null;
}
