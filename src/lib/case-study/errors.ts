/**
 * Case Study Builder — Error Types
 *
 * Reader-level failures are thrown to callers; backend failures are thrown
 * by `GenerativeBackend` implementations and absorbed by the generator.
 */

export type CaseStudyErrorCode =
    | "UNSUPPORTED_FORMAT"
    | "CORRUPT_INPUT"
    | "DECODE_FAILURE"
    | "RESOURCE_EXHAUSTED"
    | "BACKEND_TIMEOUT"
    | "BACKEND_CONNECTION"
    | "BACKEND_RATE_LIMITED"
    | "BACKEND_INVALID_RESPONSE"
    | "BACKEND_CONTEXT_LIMIT"
    | "BACKEND_FAILURE";

export class CaseStudyError extends Error {
    readonly code: CaseStudyErrorCode;
    readonly context?: Record<string, unknown>;

    constructor(message: string, code: CaseStudyErrorCode, context?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        this.context = context;
    }
}

// ---------------------------------------------------------------------------
// Reader errors
// ---------------------------------------------------------------------------

export class UnsupportedFormatError extends CaseStudyError {
    constructor(extension: string) {
        super(
            extension ? `Unsupported file extension: ${extension}` : "File has no extension",
            "UNSUPPORTED_FORMAT",
            { extension }
        );
    }
}

export type CorruptFormat = "pdf" | "docx" | "pptx";

const FORMAT_LABELS: Record<CorruptFormat, string> = {
    pdf: "PDF",
    docx: "Word document",
    pptx: "PowerPoint presentation",
};

export class CorruptInputError extends CaseStudyError {
    readonly format: CorruptFormat;

    constructor(format: CorruptFormat, detail: string, options?: { cause?: unknown }) {
        super(`Failed to process ${FORMAT_LABELS[format]}: ${detail}`, "CORRUPT_INPUT", { format }, options);
        this.format = format;
    }
}

export class DecodeFailureError extends CaseStudyError {
    constructor(encodings: readonly string[]) {
        super("Failed to decode text file with any encoding", "DECODE_FAILURE", {
            encodings: [...encodings],
        });
    }
}

export class ResourceExhaustedError extends CaseStudyError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "RESOURCE_EXHAUSTED", context);
    }
}

// ---------------------------------------------------------------------------
// Backend errors
// ---------------------------------------------------------------------------

export class BackendError extends CaseStudyError {
    constructor(message: string, code: CaseStudyErrorCode = "BACKEND_FAILURE", options?: { cause?: unknown }) {
        super(message, code, undefined, options);
    }
}

export class BackendTimeoutError extends BackendError {
    constructor(message = "Generative backend timed out", options?: { cause?: unknown }) {
        super(message, "BACKEND_TIMEOUT", options);
    }
}

/** A generation attempt outlived its deadline and was abandoned */
export class AttemptDeadlineError extends BackendTimeoutError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Generation attempt exceeded ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

export class BackendConnectionError extends BackendError {
    constructor(message = "Could not reach the generative backend", options?: { cause?: unknown }) {
        super(message, "BACKEND_CONNECTION", options);
    }
}

export class BackendRateLimitedError extends BackendError {
    constructor(message = "Generative backend rate limit exceeded", options?: { cause?: unknown }) {
        super(message, "BACKEND_RATE_LIMITED", options);
    }
}

export class BackendInvalidResponseError extends BackendError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "BACKEND_INVALID_RESPONSE", options);
    }
}

/** The prompt did not fit the model's context window */
export class BackendContextLimitError extends BackendError {
    constructor(message = "Prompt exceeds the model's context length", options?: { cause?: unknown }) {
        super(message, "BACKEND_CONTEXT_LIMIT", options);
    }
}

// ---------------------------------------------------------------------------
// User-facing categories
// ---------------------------------------------------------------------------

export type FailureCategory =
    | "size-limit"
    | "unsupported-format"
    | "corrupt-pdf"
    | "corrupt-docx"
    | "corrupt-pptx"
    | "decode"
    | "timeout"
    | "connection"
    | "unknown";

export interface FailureDescription {
    category: FailureCategory;
    message: string;
}

/**
 * Map any failure to a category and a message a person can act on
 * (resubmit with a smaller or different file).
 */
export function describeFailure(error: unknown): FailureDescription {
    if (error instanceof ResourceExhaustedError) {
        return {
            category: "size-limit",
            message: `Size limit exceeded: ${error.message}. Try with smaller files or fewer documents.`,
        };
    }

    if (error instanceof UnsupportedFormatError) {
        return {
            category: "unsupported-format",
            message: `${error.message}. Allowed types: pdf, doc, docx, pptx, txt.`,
        };
    }

    if (error instanceof CorruptInputError) {
        switch (error.format) {
            case "pdf":
                return {
                    category: "corrupt-pdf",
                    message: `${error.message}. The PDF may be corrupted, password-protected, or in an unsupported format.`,
                };
            case "docx":
                return {
                    category: "corrupt-docx",
                    message: `${error.message}. The document may be corrupted or in an unsupported format.`,
                };
            case "pptx":
                return {
                    category: "corrupt-pptx",
                    message: `${error.message}. The presentation may be corrupted or in an unsupported format.`,
                };
        }
    }

    if (error instanceof DecodeFailureError) {
        return {
            category: "decode",
            message: "The text file could not be decoded. Save it as UTF-8 and try again.",
        };
    }

    if (error instanceof BackendTimeoutError) {
        return {
            category: "timeout",
            message: "Processing timed out. The document may be too large or complex.",
        };
    }

    if (error instanceof BackendConnectionError) {
        return {
            category: "connection",
            message: "The processing was interrupted due to a network or server problem.",
        };
    }

    const detail = error instanceof Error ? error.message : String(error);
    return {
        category: "unknown",
        message: `An error occurred while processing your documents. Technical details: ${detail}`,
    };
}
