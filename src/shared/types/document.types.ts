export type DocumentFormat = "pdf" | "docx" | "text" | "unknown";

export type ExtractionMethod = "digital-text" | "ocr" | "word-processor" | "plain-text";

export const SUPPORTED_MIME_TYPES: Record<Exclude<DocumentFormat, "unknown">, string> = {
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  text: "text/plain",
};

export interface RawDocument {
  readonly content: Buffer;
  readonly declaredMimeType?: string;
  readonly fileName?: string;
  readonly sizeBytes?: number;
}

export interface ExtractedText {
  readonly text: string;
  readonly method: ExtractionMethod;
  readonly confidence: number;
  readonly characters: number;
  readonly pageCount?: number;
  readonly encoding?: string;
}
