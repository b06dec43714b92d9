/**
 * Case Study Builder — Public API
 *
 * Barrel export: import everything from `@/lib/case-study`.
 */

export { CaseStudyPipeline, createPipeline, createPipelineFromEnv } from "./pipeline";
export type { PipelineDependencies } from "./pipeline";
export { ExtractorRouter, detectSourceType, isUrl } from "./router";
export { DEFAULT_GENERATION_LIMITS, DEFAULT_MODEL, DEFAULT_SIZE_LIMITS, loadConfig } from "./config";
export type { BackendConfig, GenerationLimits, PipelineConfig, SizeLimits } from "./config";
export {
    AttemptDeadlineError,
    BackendConnectionError,
    BackendContextLimitError,
    BackendError,
    BackendInvalidResponseError,
    BackendRateLimitedError,
    BackendTimeoutError,
    CaseStudyError,
    CorruptInputError,
    DecodeFailureError,
    ResourceExhaustedError,
    UnsupportedFormatError,
    describeFailure,
} from "./errors";
export type { CaseStudyErrorCode, FailureCategory, FailureDescription } from "./errors";
export { normalizeText } from "./normalize";
export { extractStructuredContent } from "./structure";
export { selectKeyImages } from "./image-selector";
export {
    TRUNCATION_MARKER,
    escalateTruncation,
    prepareGenerativeText,
    shouldBypassGenerative,
    truncateForContextLimit,
} from "./truncation";
export { NarrativeGenerator } from "./generation/narrative-generator";
export type { GenerationOutcome, GenerationState } from "./generation/narrative-generator";
export { generateFallbackCaseStudy } from "./generation/fallback";
export { improveText } from "./generation/improve";
export { OpenAIBackend } from "./generation/openai-backend";
export type { GenerativeBackend, StructuredCompletionRequest, TextCompletionRequest } from "./generation/backend";
export { fromStoredImage, parseAdditionalData, toCaseStudyRecord, toStoredImage } from "./serialize";
export type { CaseStudyRecord, StoredImage } from "./serialize";
export type {
    CaseStudy,
    CaseStudyDraft,
    DocumentMetadata,
    ExtractedDocument,
    ExtractedImage,
    Extractor,
    ImprovementMode,
    SourceType,
    StructuredContent,
} from "./types";
