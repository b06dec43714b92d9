import { describe, it, expect } from "vitest";
import { DecodeFailureError } from "@/lib/case-study/errors";
import { TxtExtractor } from "@/lib/case-study/extractors/txt";

const context = { fileName: "notes.txt", sizeBytes: 0, skipImages: false };

describe("TxtExtractor", () => {
    const extractor = new TxtExtractor();

    it("decodes UTF-8", async () => {
        const output = await extractor.extract(Buffer.from("Café résumé", "utf-8"), context);
        expect(output).toEqual({ text: "Café résumé", images: [] });
    });

    it("falls back to a single-byte encoding for invalid UTF-8", () => {
        expect(extractor.decode(Buffer.from([0x48, 0xe9, 0x6c, 0x6c, 0x6f]))).toBe("Héllo");
    });

    it("decodes bytes windows-1252 leaves unassigned as control characters", () => {
        expect(extractor.decode(Buffer.from([0x41, 0x81, 0x42]))).toBe("A\u0081B");
    });

    it("decodes UTF-16 with either byte-order mark", () => {
        const littleEndian = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from("Hi there", "utf16le")]);
        const bigEndian = Buffer.concat([Buffer.from([0xfe, 0xff]), Buffer.from("Hi there", "utf16le").swap16()]);

        expect(extractor.decode(littleEndian)).toBe("Hi there");
        expect(extractor.decode(bigEndian)).toBe("Hi there");
    });

    it("throws when no encoding fits", () => {
        const strict = new TxtExtractor({ encodings: ["utf-8"] });
        expect(() => strict.decode(Buffer.from([0x48, 0xc3]))).toThrow(DecodeFailureError);
    });
});
