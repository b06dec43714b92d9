/**
 * Case Study Builder — Pipeline
 *
 * Wires the router, the narrative generator and text improvement around
 * one configuration and one (optional) generative backend.
 */

import dotenv from "dotenv";
import { loadConfig, type PipelineConfig } from "./config";
import type { GenerativeBackend } from "./generation/backend";
import { improveText } from "./generation/improve";
import { NarrativeGenerator, type GenerationOutcome, type Sleeper } from "./generation/narrative-generator";
import { OpenAIBackend } from "./generation/openai-backend";
import { selectKeyImages } from "./image-selector";
import { ExtractorRouter } from "./router";
import type { CaseStudy, CaseStudyDraft, ExtractedDocument, ExtractedImage, ImprovementMode } from "./types";

export interface PipelineDependencies {
    /** Overrides the backend built from config; `null` forces heuristic generation */
    backend?: GenerativeBackend | null;
    router?: ExtractorRouter;
    sleep?: Sleeper;
}

export class CaseStudyPipeline {
    readonly router: ExtractorRouter;
    readonly backend: GenerativeBackend | null;

    private readonly config: PipelineConfig;
    private readonly generator: NarrativeGenerator;

    constructor(config: PipelineConfig, deps: PipelineDependencies = {}) {
        this.config = config;
        this.router = deps.router ?? new ExtractorRouter({ limits: config.limits });
        this.backend =
            deps.backend !== undefined ? deps.backend : config.backend ? new OpenAIBackend(config.backend) : null;
        this.generator = new NarrativeGenerator({
            backend: this.backend,
            limits: config.generation,
            ...(deps.sleep ? { sleep: deps.sleep } : {}),
        });
    }

    processDocument(pathOrUrl: string): Promise<ExtractedDocument> {
        return this.router.processDocument(pathOrUrl);
    }

    processDocuments(pathsOrUrls: readonly string[]): Promise<ExtractedDocument> {
        return this.router.processDocuments(pathsOrUrls);
    }

    generateCaseStudy(document: ExtractedDocument, audience = "general"): Promise<CaseStudy> {
        return this.generator.generateCaseStudy(document, audience);
    }

    /** Same as `generateCaseStudy`, with the path taken and the state trace */
    generateWithTrace(document: ExtractedDocument, audience = "general"): Promise<GenerationOutcome> {
        return this.generator.generate(document, audience);
    }

    improveText(text: string, mode: ImprovementMode = "improve"): Promise<string> {
        return improveText(text, mode, { backend: this.backend, timeoutMs: this.config.generation.timeoutMs });
    }

    selectKeyImages(images: readonly ExtractedImage[], draft: CaseStudyDraft, maxImages?: number): ExtractedImage[] {
        return selectKeyImages(images, draft, maxImages);
    }
}

export function createPipeline(config: PipelineConfig, deps: PipelineDependencies = {}): CaseStudyPipeline {
    return new CaseStudyPipeline(config, deps);
}

/** Loads `.env` (when present) into `process.env`, then builds the pipeline from it */
export function createPipelineFromEnv(deps: PipelineDependencies = {}): CaseStudyPipeline {
    dotenv.config();
    return createPipeline(loadConfig(process.env), deps);
}
