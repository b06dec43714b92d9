/**
 * Case Study Builder — Image Selector
 *
 * Ranks a document's images against a narrative by caption heuristics and
 * returns the top few.
 */

import type { CaseStudyDraft, ExtractedImage } from "./types";

export const DEFAULT_MAX_IMAGES = 3;

const VALUABLE_KEYWORDS = ["diagram", "chart", "graph", "figure", "process", "workflow", "infographic", "results"];
const DECORATIVE_KEYWORDS = ["icon", "bullet", "background", "decoration"];

const FIRST_POSITION = /\b(?:slide|page) 1\b|cover/;
const SECOND_POSITION = /\b(?:slide|page) 2\b/;
const EARLY_POSITION = /\b(?:slide|page) [3-5]\b/;

function narrativeText(draft: CaseStudyDraft): string {
    return [draft.title, draft.challenge, draft.approach, draft.solution, draft.outcomes, draft.summary]
        .map((part) => part ?? "")
        .join(" ")
        .toLowerCase();
}

export function scoreImage(image: ExtractedImage, index: number, narrative: string): number {
    const caption = image.caption.toLowerCase();

    // Earlier images are usually more important
    let score = Math.max(0, 100 - index) * 0.5;

    if (FIRST_POSITION.test(caption)) {
        score += 100;
    } else if (SECOND_POSITION.test(caption)) {
        score += 80;
    } else if (EARLY_POSITION.test(caption)) {
        score += 60;
    }

    if (narrative.trim() && caption) {
        for (const word of caption.split(/\s+/)) {
            if (word.length > 4 && narrative.includes(word)) {
                score += 10;
            }
        }
    }

    if (VALUABLE_KEYWORDS.some((keyword) => caption.includes(keyword))) {
        score += 50;
    }
    if (DECORATIVE_KEYWORDS.some((keyword) => caption.includes(keyword))) {
        score -= 50;
    }

    return score;
}

/**
 * Top `maxImages` images by score, ties kept in their original order.
 * Inputs no longer than `maxImages` come back unchanged.
 */
export function selectKeyImages(
    images: readonly ExtractedImage[],
    draft: CaseStudyDraft,
    maxImages = DEFAULT_MAX_IMAGES
): ExtractedImage[] {
    if (images.length <= maxImages) {
        return [...images];
    }

    const narrative = narrativeText(draft);
    const selected = images
        .map((image, index) => ({ image, score: scoreImage(image, index, narrative) }))
        .sort((a, b) => b.score - a.score)
        .slice(0, maxImages)
        .map(({ image }) => image);

    console.debug(`[ImageSelector] Selected ${selected.length} images from ${images.length} available images`);
    return selected;
}
