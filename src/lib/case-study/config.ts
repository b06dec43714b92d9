/**
 * Case Study Builder — Configuration
 *
 * Size budgets, generation limits and the generative backend settings,
 * built from environment variables.  A `null` backend means generation
 * always uses the heuristic generator.
 */

const MB = 1024 * 1024;

export interface SizeLimits {
    /** Per-file upload cap */
    maxFileBytes: number;
    /** Aggregate cap across one multi-file request */
    maxTotalBytes: number;
    maxFiles: number;
    /** Above this, generation skips the backend (and PDFs skip images) */
    largeFileBytes: number;
    /** Above this, every format skips image extraction */
    veryLargeFileBytes: number;
    /** Extracted text above this is cut to head + tail */
    maxExtractedChars: number;
}

export interface GenerationLimits {
    /** Text above this never reaches the backend */
    hardTextCap: number;
    /** Text above this is truncated before the first attempt */
    largeTextThreshold: number;
    /** Source files above this never reach the backend */
    fileSizeCap: number;
    maxAttempts: number;
    timeoutMs: number;
    largeInputTimeoutMs: number;
    backoffBaseMs: number;
}

export interface BackendConfig {
    apiKey: string;
    model: string;
    baseUrl?: string;
}

export interface PipelineConfig {
    backend: BackendConfig | null;
    limits: SizeLimits;
    generation: GenerationLimits;
}

export const DEFAULT_SIZE_LIMITS: SizeLimits = {
    maxFileBytes: 100 * MB,
    maxTotalBytes: 200 * MB,
    maxFiles: 10,
    largeFileBytes: 15 * MB,
    veryLargeFileBytes: 25 * MB,
    maxExtractedChars: 1_000_000,
};

export const DEFAULT_GENERATION_LIMITS: GenerationLimits = {
    hardTextCap: 200_000,
    largeTextThreshold: 20_000,
    fileSizeCap: 100 * MB,
    maxAttempts: 3,
    timeoutMs: 30_000,
    largeInputTimeoutMs: 60_000,
    backoffBaseMs: 1_000,
};

export const DEFAULT_MODEL = "gpt-4o";

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const num = parseInt(value, 10);
    return isNaN(num) || num <= 0 ? defaultValue : num;
}

/** Blank keys and template placeholders count as "not configured" */
function resolveApiKey(value: string | undefined): string | null {
    const trimmed = value?.trim();
    if (!trimmed) return null;
    if (trimmed.startsWith("your_") || trimmed.includes("your_openai_api_key_here")) {
        console.warn("[config] OPENAI_API_KEY is still a placeholder. Generative features are disabled.");
        return null;
    }
    return trimmed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const apiKey = resolveApiKey(env.OPENAI_API_KEY);
    const baseUrl = env.OPENAI_BASE_URL?.trim();

    const backend: BackendConfig | null = apiKey
        ? {
              apiKey,
              model: env.OPENAI_MODEL?.trim() || DEFAULT_MODEL,
              ...(baseUrl ? { baseUrl } : {}),
          }
        : null;

    if (!backend) {
        console.warn("[config] OpenAI API key not found. Case studies will use heuristic generation.");
    }

    return {
        backend,
        limits: {
            ...DEFAULT_SIZE_LIMITS,
            maxFileBytes: parseNumericEnv(env.CASE_STUDY_MAX_FILE_MB, DEFAULT_SIZE_LIMITS.maxFileBytes / MB) * MB,
            maxTotalBytes: parseNumericEnv(env.CASE_STUDY_MAX_TOTAL_MB, DEFAULT_SIZE_LIMITS.maxTotalBytes / MB) * MB,
        },
        generation: {
            ...DEFAULT_GENERATION_LIMITS,
            timeoutMs: parseNumericEnv(env.CASE_STUDY_GENERATION_TIMEOUT_MS, DEFAULT_GENERATION_LIMITS.timeoutMs),
            maxAttempts: parseNumericEnv(env.CASE_STUDY_MAX_ATTEMPTS, DEFAULT_GENERATION_LIMITS.maxAttempts),
        },
    };
}
