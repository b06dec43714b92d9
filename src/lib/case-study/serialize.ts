/**
 * Case Study Builder — Record Serialization
 *
 * Snake-cased shapes a storage layer persists: one record per case study
 * and one per image, images carried as base64.
 */

import { z } from "zod";
import type { CaseStudy, ExtractedImage } from "./types";

export interface CaseStudyRecord {
    title: string;
    audience: string;
    challenge: string;
    approach: string;
    solution: string;
    outcomes: string;
    summary: string;
    additional_data: {
        key_points: string[];
        /** Ids of the selected images, in rank order */
        images: string[];
    };
}

export interface StoredImage {
    image_id: string;
    caption: string;
    image_type: string;
    /** base64 */
    image_data: string;
    selected: boolean;
}

const additionalDataSchema = z.object({
    key_points: z.array(z.string()).catch([]),
    images: z.array(z.string()).catch([]),
});

const storedImageSchema = z.object({
    image_id: z.string().min(1),
    caption: z.string(),
    image_type: z.string().min(1),
    image_data: z.string(),
    selected: z.boolean(),
});

export function toCaseStudyRecord(caseStudy: CaseStudy, audience = "general"): CaseStudyRecord {
    return {
        title: caseStudy.title,
        audience,
        challenge: caseStudy.challenge,
        approach: caseStudy.approach,
        solution: caseStudy.solution,
        outcomes: caseStudy.outcomes,
        summary: caseStudy.summary,
        additional_data: {
            key_points: [...caseStudy.keyPoints],
            images: caseStudy.images.map((image) => image.id),
        },
    };
}

/** Reads `additional_data` from a JSON string or an already-parsed value; anything malformed yields empty lists */
export function parseAdditionalData(value: unknown): { keyPoints: string[]; imageIds: string[] } {
    let raw = value;
    if (typeof value === "string") {
        try {
            raw = JSON.parse(value);
        } catch {
            console.warn("[serialize] additional_data is not valid JSON");
            return { keyPoints: [], imageIds: [] };
        }
    }

    const result = additionalDataSchema.safeParse(raw);
    if (!result.success) {
        return { keyPoints: [], imageIds: [] };
    }
    return { keyPoints: result.data.key_points, imageIds: result.data.images };
}

export function toStoredImage(image: ExtractedImage): StoredImage {
    return {
        image_id: image.id,
        caption: image.caption,
        image_type: image.mimeSubtype,
        image_data: image.bytes.toString("base64"),
        selected: image.selectedForNarrative,
    };
}

/** @throws ZodError when the record is missing fields */
export function fromStoredImage(record: unknown): ExtractedImage {
    const stored = storedImageSchema.parse(record);
    return {
        id: stored.image_id,
        caption: stored.caption,
        mimeSubtype: stored.image_type,
        bytes: Buffer.from(stored.image_data, "base64"),
        selectedForNarrative: stored.selected,
    };
}
