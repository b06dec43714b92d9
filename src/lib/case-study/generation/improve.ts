/**
 * Case Study Builder — Text Improvement
 *
 * One-shot rewrite of a passage in one of three modes.  Any failure returns
 * the input unchanged.
 */

import { DEFAULT_GENERATION_LIMITS } from "../config";
import { errorMessage } from "../extractors/image";
import type { ImprovementMode } from "../types";
import { runWithDeadline, type GenerativeBackend } from "./backend";
import { CASE_STUDY_TEMPERATURE, IMPROVEMENT_MAX_TOKENS, buildImprovementPrompt } from "./prompts";

export interface ImproveTextOptions {
    backend: GenerativeBackend | null;
    timeoutMs?: number;
}

export async function improveText(
    text: string,
    mode: ImprovementMode,
    options: ImproveTextOptions
): Promise<string> {
    const { backend } = options;
    if (!backend) {
        console.warn("[improveText] No generative backend configured. Returning original text without improvements.");
        return text;
    }
    if (!text.trim()) {
        return text;
    }

    const { system, prompt } = buildImprovementPrompt(text, mode);
    try {
        const improved = await runWithDeadline(options.timeoutMs ?? DEFAULT_GENERATION_LIMITS.timeoutMs, (signal) =>
            backend.completeText({
                system,
                prompt,
                maxTokens: IMPROVEMENT_MAX_TOKENS,
                temperature: CASE_STUDY_TEMPERATURE,
                signal,
            })
        );
        return improved.trim() || text;
    } catch (error) {
        console.error(`[improveText] Error improving text (${mode}): ${errorMessage(error)}`);
        return text;
    }
}
