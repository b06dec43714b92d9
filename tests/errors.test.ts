import { describe, it, expect } from "vitest";
import {
    AttemptDeadlineError,
    BackendConnectionError,
    CaseStudyError,
    CorruptInputError,
    DecodeFailureError,
    ResourceExhaustedError,
    UnsupportedFormatError,
    describeFailure,
} from "@/lib/case-study/errors";

describe("error types", () => {
    it("carries a code, a name and context", () => {
        const error = new UnsupportedFormatError("csv");

        expect(error).toBeInstanceOf(CaseStudyError);
        expect(error.name).toBe("UnsupportedFormatError");
        expect(error.code).toBe("UNSUPPORTED_FORMAT");
        expect(error.context).toEqual({ extension: "csv" });
        expect(error.message).toBe("Unsupported file extension: csv");
    });

    it("names the format of corrupt input", () => {
        const cause = new Error("bad xref");
        const error = new CorruptInputError("pdf", "bad xref", { cause });

        expect(error.message).toBe("Failed to process PDF: bad xref");
        expect(error.format).toBe("pdf");
        expect(error.cause).toBe(cause);
    });
});

describe("describeFailure", () => {
    it("maps each failure to a category", () => {
        expect(describeFailure(new ResourceExhaustedError("too big")).category).toBe("size-limit");
        expect(describeFailure(new UnsupportedFormatError("")).category).toBe("unsupported-format");
        expect(describeFailure(new CorruptInputError("docx", "x")).category).toBe("corrupt-docx");
        expect(describeFailure(new CorruptInputError("pptx", "x")).category).toBe("corrupt-pptx");
        expect(describeFailure(new DecodeFailureError(["utf-8"])).category).toBe("decode");
        expect(describeFailure(new AttemptDeadlineError(30_000)).category).toBe("timeout");
        expect(describeFailure(new BackendConnectionError()).category).toBe("connection");
    });

    it("suggests smaller uploads for size limits", () => {
        expect(describeFailure(new ResourceExhaustedError("too big")).message).toBe(
            "Size limit exceeded: too big. Try with smaller files or fewer documents."
        );
    });

    it("falls back to the technical detail", () => {
        expect(describeFailure("something odd")).toEqual({
            category: "unknown",
            message: "An error occurred while processing your documents. Technical details: something odd",
        });
    });
});
