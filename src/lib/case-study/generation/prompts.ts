/**
 * Case Study Builder — Prompt Templates
 */

import type { ImprovementMode } from "../types";

export const CASE_STUDY_SYSTEM_PROMPT =
    "You are a professional case study writer who creates compelling business narratives.";

export const CASE_STUDY_TEMPERATURE = 0.7;

/** Prompts shorter than this get the larger completion budget */
const LONG_PROMPT_CHARS = 30_000;

const JSON_FORMAT = `Format your response as a JSON object with the following keys:
- title: A compelling title for the case study
- challenge: The business challenge or problem addressed
- approach: The methodology or strategy used
- solution: The specific solution implemented
- outcomes: The results and benefits achieved
- summary: A brief summary of the entire case study (2-3 sentences)
- key_points: An array of 3-5 key takeaways`;

function audienceLine(audience: string): string {
    return audience && audience !== "general" ? `Target audience: ${audience}. ` : "";
}

/**
 * User prompt for one case study.  Large inputs have already been truncated
 * and get a shorter, extraction-focused instruction.
 */
export function buildCaseStudyPrompt(text: string, audience: string, isLarge: boolean): string {
    if (isLarge) {
        return `Extract key information from this document to create a concise case study (300-400 words total). ${audienceLine(audience)}
Focus on the most important points only.

${JSON_FORMAT}

Here is the document content (may be truncated):
${text}`;
    }

    return `Based on the following content, generate a professional case study. ${audienceLine(audience)}
The case study should be:
- Between 300-500 words total
- Based exclusively on the information provided
- Clear, concise and persuasive

${JSON_FORMAT}

Here is the extracted text:
${text}`;
}

export function caseStudyMaxTokens(prompt: string): number {
    return prompt.length < LONG_PROMPT_CHARS ? 3000 : 2000;
}

// ---------------------------------------------------------------------------
// Text improvement
// ---------------------------------------------------------------------------

export const IMPROVEMENT_MAX_TOKENS = 1000;

interface ImprovementPrompt {
    system: string;
    instruction: string;
}

const IMPROVEMENT_PROMPTS: Record<ImprovementMode, ImprovementPrompt> = {
    simplify: {
        system: "You are an editor who specializes in simplifying complex language while retaining meaning.",
        instruction: "Simplify the following text to make it more accessible while preserving key information:",
    },
    extend: {
        system: "You are an editor who specializes in expanding content with relevant details.",
        instruction: "Expand the following text with more details and context while maintaining the professional tone:",
    },
    improve: {
        system: "You are an expert editor who improves professional writing.",
        instruction: "Improve the following text to make it more professional, impactful, and persuasive:",
    },
};

export function buildImprovementPrompt(text: string, mode: ImprovementMode): { system: string; prompt: string } {
    const { system, instruction } = IMPROVEMENT_PROMPTS[mode];
    return { system, prompt: `${instruction}\n\n${text}` };
}
