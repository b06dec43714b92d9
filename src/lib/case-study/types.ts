/**
 * Case Study Builder — Type Definitions
 *
 * Shared types for the extraction pipeline and the case study generator.
 * Every extractor conforms to the `Extractor` interface; the router turns
 * its output into an `ExtractedDocument`, the only input to generation.
 */

// ---------------------------------------------------------------------------
// Source kinds
// ---------------------------------------------------------------------------

/** Where a document came from, by file extension or URL */
export type SourceType = "pdf" | "doc" | "docx" | "pptx" | "txt" | "web";

export type ExtractionStatus = "success" | "error";

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

/** Page or slide an image was taken from (1-indexed) */
export interface ImageSource {
  kind: "page" | "slide";
  index: number;
}

export interface ExtractedImage {
  /** Unique within the owning document, e.g. `pptx_image_3` */
  id: string;
  caption: string;
  /** Image subtype without the `image/` prefix ("jpeg", "png", ...) */
  mimeSubtype: string;
  bytes: Buffer;
  /** The only field that may change after extraction */
  selectedForNarrative: boolean;
  source?: ImageSource;
}

// ---------------------------------------------------------------------------
// Structured content
// ---------------------------------------------------------------------------

export interface DocumentSection {
  title: string;
  content: string;
}

export interface DocumentEntities {
  organizations: string[];
  people: string[];
  dates: string[];
}

/** Heuristic outline of a document's text */
export interface StructuredContent {
  title?: string;
  /** Order-preserving partition of the text by detected heading lines */
  sections: DocumentSection[];
  /** At most 7 entries */
  keyPoints: string[];
  entities: DocumentEntities;
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export interface DocumentMetadata {
  sourceType: SourceType;
  /** File name, or the last URL path segment for web pages */
  fileName: string;
  sizeBytes: number;
  status: ExtractionStatus;
  /** Set on failure, or when a recovery pass was needed to produce the text */
  errorDetail?: string;
  /** Generation must go straight to the heuristic generator */
  skipGenerative: boolean;
  wordCount: number;
  pageCount?: number;
  slideCount?: number;
  url?: string;
  domain?: string;
  title?: string;
  date?: string;
  warnings: string[];
}

/** Normalized result of reading one file or URL */
export interface ExtractedDocument {
  /** UUID v4 */
  documentId: string;
  text: string;
  images: ExtractedImage[];
  structuredContent: StructuredContent;
  metadata: DocumentMetadata;
}

// ---------------------------------------------------------------------------
// Extractor interface
// ---------------------------------------------------------------------------

export interface ExtractionContext {
  fileName: string;
  sizeBytes: number;
  /** Skip every image-related step and return text only */
  skipImages: boolean;
}

/** Raw extractor result, before structure extraction and size policy */
export interface ExtractorOutput {
  text: string;
  images: ExtractedImage[];
  metadata?: Partial<Pick<DocumentMetadata, "pageCount" | "slideCount" | "title" | "warnings">>;
}

/**
 * Contract that every file-format extractor implements.
 *
 * `supports` lets the router pick an extractor by source type; `extract`
 * must swallow per-item failures (one image, one shape) and throw only when
 * nothing usable can be read.
 */
export interface Extractor {
  /** Human-readable name (for logging) */
  readonly name: string;

  supports(sourceType: SourceType): boolean;

  extract(buffer: Buffer, context: ExtractionContext): Promise<ExtractorOutput>;
}

// ---------------------------------------------------------------------------
// Case studies
// ---------------------------------------------------------------------------

export interface CaseStudy {
  title: string;
  challenge: string;
  approach: string;
  solution: string;
  outcomes: string;
  summary: string;
  keyPoints: string[];
  /** At most 3, ranked */
  images: ExtractedImage[];
}

/** Narrative fields used to rank images before a case study is complete */
export type CaseStudyDraft = Partial<
  Pick<CaseStudy, "title" | "challenge" | "approach" | "solution" | "outcomes" | "summary">
>;

export type ImprovementMode = "improve" | "simplify" | "extend";
