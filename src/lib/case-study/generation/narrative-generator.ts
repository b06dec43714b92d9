/**
 * Case Study Builder — Narrative Generator
 *
 * Turns an extracted document into a case study.  The generative backend is
 * tried first (bounded attempts, each under its own deadline); every failure
 * path ends in the heuristic generator, so `generate` never rejects.
 *
 * States: init → size-check → fallback-direct | attempt-generative →
 * success | retry-generative | fallback-after-failure → done
 */

import { z } from "zod";
import { DEFAULT_GENERATION_LIMITS, type GenerationLimits } from "../config";
import {
    AttemptDeadlineError,
    BackendConnectionError,
    BackendContextLimitError,
    BackendError,
    BackendRateLimitedError,
    BackendTimeoutError,
} from "../errors";
import { errorMessage } from "../extractors/image";
import { selectKeyImages } from "../image-selector";
import {
    escalateTruncation,
    generativeBypassReason,
    prepareGenerativeText,
    truncateForContextLimit,
} from "../truncation";
import type { CaseStudy, ExtractedDocument, ExtractedImage } from "../types";
import { runWithDeadline, type GenerativeBackend } from "./backend";
import { generateFallbackCaseStudy } from "./fallback";
import {
    CASE_STUDY_SYSTEM_PROMPT,
    CASE_STUDY_TEMPERATURE,
    buildCaseStudyPrompt,
    caseStudyMaxTokens,
} from "./prompts";

export type GenerationState =
    | "init"
    | "size-check"
    | "fallback-direct"
    | "attempt-generative"
    | "retry-generative"
    | "success"
    | "fallback-after-failure"
    | "done";

export type GenerationPath = "generative" | "fallback";

export interface GenerationOutcome {
    caseStudy: CaseStudy;
    path: GenerationPath;
    /** Every state visited, in order */
    trace: GenerationState[];
    /** Backend calls made */
    attempts: number;
    /** Why the backend was skipped or abandoned */
    reason?: string;
}

export type Sleeper = (ms: number) => Promise<void>;

export interface NarrativeGeneratorOptions {
    /** `null` when no backend is configured */
    backend: GenerativeBackend | null;
    limits?: GenerationLimits;
    sleep?: Sleeper;
}

export const caseStudyResponseSchema = z.object({
    title: z.string().min(1),
    challenge: z.string(),
    approach: z.string(),
    solution: z.string(),
    outcomes: z.string(),
    summary: z.string().default(""),
    key_points: z.array(z.string()).default([]),
});

export type CaseStudyResponse = z.infer<typeof caseStudyResponseSchema>;

const defaultSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function markSelected(images: ExtractedImage[]): ExtractedImage[] {
    return images.map((image) => ({ ...image, selectedForNarrative: true }));
}

export class NarrativeGenerator {
    private readonly backend: GenerativeBackend | null;
    private readonly limits: GenerationLimits;
    private readonly sleep: Sleeper;

    constructor(options: NarrativeGeneratorOptions) {
        this.backend = options.backend;
        this.limits = options.limits ?? DEFAULT_GENERATION_LIMITS;
        this.sleep = options.sleep ?? defaultSleep;
    }

    async generateCaseStudy(document: ExtractedDocument, audience = "general"): Promise<CaseStudy> {
        const outcome = await this.generate(document, audience);
        return outcome.caseStudy;
    }

    async generate(document: ExtractedDocument, audience = "general"): Promise<GenerationOutcome> {
        const trace: GenerationState[] = ["init", "size-check"];

        const backend = this.backend;
        const bypass = backend ? this.bypassReason(document) : "no generative backend configured";
        if (bypass !== null || !backend) {
            const reason = bypass ?? "no generative backend configured";
            console.info(`[NarrativeGenerator] Using heuristic generation: ${reason}`);
            trace.push("fallback-direct");
            return this.fallback(document, audience, trace, 0, reason);
        }

        const prepared = prepareGenerativeText(document.text, document.structuredContent.sections, this.limits);
        if (prepared.strategy !== "none") {
            console.info(
                `[NarrativeGenerator] Large text (${document.text.length} chars) reduced to ${prepared.text.length} chars with ${prepared.strategy} truncation`
            );
        }

        const timeoutMs = prepared.isLarge ? this.limits.largeInputTimeoutMs : this.limits.timeoutMs;
        let text = prepared.text;
        let attempts = 0;
        let reason = "generation failed";

        while (attempts < this.limits.maxAttempts) {
            trace.push(attempts === 0 ? "attempt-generative" : "retry-generative");
            attempts++;

            try {
                const response = await runWithDeadline(timeoutMs, (signal) =>
                    this.requestCaseStudy(backend, text, audience, prepared.isLarge, signal)
                );
                trace.push("success", "done");
                console.info(`[NarrativeGenerator] Case study generated on attempt ${attempts}`);
                return {
                    caseStudy: this.toCaseStudy(response, document.images),
                    path: "generative",
                    trace,
                    attempts,
                };
            } catch (error) {
                const failure =
                    error instanceof BackendError
                        ? error
                        : new BackendError(errorMessage(error), "BACKEND_FAILURE", { cause: error });
                reason = failure.message;

                if (failure instanceof AttemptDeadlineError) {
                    console.error(`[NarrativeGenerator] ${failure.message}; abandoning the backend`);
                    break;
                }
                if (failure instanceof BackendRateLimitedError) {
                    console.error(`[NarrativeGenerator] Rate limit exceeded: ${failure.message}`);
                    break;
                }
                if (attempts >= this.limits.maxAttempts) {
                    console.error(`[NarrativeGenerator] Max retries reached: ${failure.message}`);
                    break;
                }

                text = this.nextAttemptText(failure, text, attempts, prepared.isLarge);
                await this.sleep(this.backoffMs(failure, attempts));
            }
        }

        trace.push("fallback-after-failure");
        return this.fallback(document, audience, trace, attempts, reason);
    }

    // ---------------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------------

    private bypassReason(document: ExtractedDocument): string | null {
        if (!document.text.trim()) {
            return "document has no text";
        }
        return generativeBypassReason(document, this.limits);
    }

    private async requestCaseStudy(
        backend: GenerativeBackend,
        text: string,
        audience: string,
        isLarge: boolean,
        signal: AbortSignal
    ): Promise<CaseStudyResponse> {
        const prompt = buildCaseStudyPrompt(text, audience, isLarge);
        return backend.completeStructured({
            system: CASE_STUDY_SYSTEM_PROMPT,
            prompt,
            schema: caseStudyResponseSchema,
            maxTokens: caseStudyMaxTokens(prompt),
            temperature: CASE_STUDY_TEMPERATURE,
            signal,
        });
    }

    private isTransient(failure: BackendError): boolean {
        return failure instanceof BackendTimeoutError || failure instanceof BackendConnectionError;
    }

    /** Text for the attempt after `retry` (1-based) failed with `failure` */
    private nextAttemptText(failure: BackendError, text: string, retry: number, isLarge: boolean): string {
        if (this.isTransient(failure)) {
            if (isLarge) {
                console.warn(`[NarrativeGenerator] ${failure.message}; retrying with more aggressive truncation`);
                return escalateTruncation(text, retry);
            }
            console.warn(`[NarrativeGenerator] ${failure.message}; retrying`);
            return text;
        }

        if (failure instanceof BackendContextLimitError) {
            console.warn("[NarrativeGenerator] Context length exceeded; retrying with 25% of the text");
            return truncateForContextLimit(text);
        }

        console.warn(`[NarrativeGenerator] Generation attempt ${retry} failed: ${failure.message}`);
        return text;
    }

    /** Exponential for transient failures, linear otherwise */
    private backoffMs(failure: BackendError, retry: number): number {
        const base = this.limits.backoffBaseMs;
        return this.isTransient(failure) ? base * 2 ** retry : base * 2 * retry;
    }

    private toCaseStudy(response: CaseStudyResponse, images: ExtractedImage[]): CaseStudy {
        return {
            title: response.title,
            challenge: response.challenge,
            approach: response.approach,
            solution: response.solution,
            outcomes: response.outcomes,
            summary: response.summary,
            keyPoints: response.key_points,
            images: markSelected(selectKeyImages(images, response)),
        };
    }

    /** Always given the original document, never the truncated text */
    private fallback(
        document: ExtractedDocument,
        audience: string,
        trace: GenerationState[],
        attempts: number,
        reason: string
    ): GenerationOutcome {
        const caseStudy = generateFallbackCaseStudy(document, audience);
        trace.push("done");
        return { caseStudy, path: "fallback", trace, attempts, reason };
    }
}
