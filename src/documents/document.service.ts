import type { EnvConfig } from "../config/env";
import { errorMessage, Logger } from "../config/logger";
import { PipelineStageError } from "../shared/errors";
import type { ExtractedText, RawDocument } from "../shared/types/document.types";
import { abortReason, raceWithSignal } from "../shared/utils/abort";
import { normalizeExtractedText } from "../shared/utils/text";
import { DocxText, extractDocxText } from "./extractors/docx.extractor";
import { OcrExtractor, OcrText } from "./extractors/ocr.extractor";
import { extractPdfText, PdfTextLayer } from "./extractors/pdf.extractor";
import { decodePlainText, DecodedText } from "./extractors/text.extractor";
import { isFormatConfusion, sniffFormat } from "./format-sniffer";

export interface DocumentExtractors {
  extractPdf(buffer: Buffer): Promise<PdfTextLayer>;
  extractOcr(buffer: Buffer, signal?: AbortSignal): Promise<OcrText>;
  extractDocx(buffer: Buffer): Promise<DocxText>;
  decodeText(buffer: Buffer): DecodedText;
}

export type IngestionSettings = Pick<
  EnvConfig,
  "maxUploadBytes" | "minExtractedChars" | "minDirectTextChars"
>;

const DIGITAL_CHARS_PER_PAGE = 200;
const OCR_CHARS_PER_PAGE = 150;
const OCR_MAX_CONFIDENCE = 0.8;
const DOCX_CONFIDENCE = 0.95;
const TEXT_MAX_CONFIDENCE = 0.95;
const TEXT_FALLBACK_CONFIDENCE = 0.5;

export function createDocumentExtractors(ocr: OcrExtractor): DocumentExtractors {
  return {
    extractPdf: extractPdfText,
    extractOcr: (buffer, signal) => ocr.extract(buffer, signal),
    extractDocx: extractDocxText,
    decodeText: decodePlainText,
  };
}

export class DocumentIngestionService {
  constructor(
    private readonly settings: IngestionSettings,
    private readonly extractors: DocumentExtractors,
    private readonly logger: Logger,
  ) {}

  async ingest(raw: RawDocument, signal?: AbortSignal): Promise<ExtractedText> {
    const sizeBytes = Math.max(raw.sizeBytes ?? 0, raw.content.length);
    if (sizeBytes > this.settings.maxUploadBytes) {
      throw new PipelineStageError(
        "ingestion",
        "FILE_TOO_LARGE",
        `Document is ${sizeBytes} bytes; the limit is ${this.settings.maxUploadBytes} bytes.`,
        { sizeBytes, maxUploadBytes: this.settings.maxUploadBytes },
      );
    }

    const format = sniffFormat(raw.content);
    if (format === "unknown") {
      throw new PipelineStageError(
        "ingestion",
        "UNSUPPORTED_FORMAT",
        "Unsupported document type. Please upload PDF, DOCX or plain text.",
        { declaredMimeType: raw.declaredMimeType, fileName: raw.fileName },
      );
    }
    if (isFormatConfusion(format, raw.declaredMimeType)) {
      throw new PipelineStageError(
        "ingestion",
        "UNSUPPORTED_FORMAT",
        `Document content is ${format} but was declared as ${raw.declaredMimeType ?? "unknown"}.`,
        { sniffedFormat: format, declaredMimeType: raw.declaredMimeType },
      );
    }

    if (format === "pdf") {
      return this.ingestPdf(raw.content, signal);
    }
    if (format === "docx") {
      return this.ingestDocx(raw.content, signal);
    }
    return this.ingestPlainText(raw.content);
  }

  fromDirectText(text: string): ExtractedText {
    const normalized = normalizeExtractedText(text);
    if (normalized.length < this.settings.minDirectTextChars) {
      throw new PipelineStageError(
        "ingestion",
        "INSUFFICIENT_TEXT",
        `Resume text has ${normalized.length} characters; at least ${this.settings.minDirectTextChars} are required.`,
        { characters: normalized.length },
      );
    }
    return {
      text: normalized,
      method: "plain-text",
      confidence: 1,
      characters: normalized.length,
    };
  }

  private async ingestPdf(content: Buffer, signal?: AbortSignal): Promise<ExtractedText> {
    let digitalChars = 0;
    try {
      const layer = await raceWithSignal(this.extractors.extractPdf(content), signal);
      const text = normalizeExtractedText(layer.text);
      digitalChars = text.length;
      if (text.length >= this.settings.minExtractedChars) {
        const pages = Math.max(1, layer.pageCount);
        this.logger.info("ingestion.completed", {
          extraction_method: "digital-text",
          chars: text.length,
          pages,
        });
        return {
          text,
          method: "digital-text",
          confidence: Math.min(1, text.length / (pages * DIGITAL_CHARS_PER_PAGE)),
          characters: text.length,
          pageCount: pages,
        };
      }
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      this.logger.warn("ingestion.pdf.text_layer_failed", { error: errorMessage(error) });
    }

    this.logger.info("ingestion.ocr.fallback", {
      digitalChars,
      minExtractedChars: this.settings.minExtractedChars,
    });

    let ocr: OcrText;
    try {
      ocr = await raceWithSignal(this.extractors.extractOcr(content, signal), signal);
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      throw new PipelineStageError(
        "ingestion",
        "INSUFFICIENT_TEXT",
        "Could not extract text from document.",
        { digitalChars, ocrError: errorMessage(error) },
      );
    }

    const text = normalizeExtractedText(ocr.text);
    if (text.length < this.settings.minExtractedChars) {
      throw new PipelineStageError(
        "ingestion",
        "INSUFFICIENT_TEXT",
        "Could not extract enough text from document.",
        { digitalChars, ocrChars: text.length },
      );
    }

    const pages = Math.max(1, ocr.pageCount);
    this.logger.info("ingestion.completed", {
      extraction_method: "ocr",
      chars: text.length,
      pages,
    });
    return {
      text,
      method: "ocr",
      confidence: Math.min(OCR_MAX_CONFIDENCE, text.length / (pages * OCR_CHARS_PER_PAGE)),
      characters: text.length,
      pageCount: pages,
    };
  }

  private async ingestDocx(content: Buffer, signal?: AbortSignal): Promise<ExtractedText> {
    let raw: DocxText;
    try {
      raw = await raceWithSignal(this.extractors.extractDocx(content), signal);
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      throw new PipelineStageError(
        "ingestion",
        "INSUFFICIENT_TEXT",
        "Could not extract text from document.",
        { error: errorMessage(error) },
      );
    }

    if (raw.warnings.length > 0) {
      this.logger.warn("ingestion.docx.warnings", { count: raw.warnings.length, first: raw.warnings[0] });
    }
    const text = normalizeExtractedText(raw.text);
    if (!text) {
      throw new PipelineStageError("ingestion", "INSUFFICIENT_TEXT", "Could not extract text from document.");
    }

    this.logger.info("ingestion.completed", {
      extraction_method: "word-processor",
      chars: text.length,
    });
    return {
      text,
      method: "word-processor",
      confidence: DOCX_CONFIDENCE,
      characters: text.length,
    };
  }

  private ingestPlainText(content: Buffer): ExtractedText {
    const decoded = this.extractors.decodeText(content);
    const text = normalizeExtractedText(decoded.text);
    if (!text) {
      throw new PipelineStageError("ingestion", "INSUFFICIENT_TEXT", "Document contains no text.");
    }

    if (decoded.usedFallback) {
      this.logger.warn("ingestion.text.encoding_fallback", { encoding: decoded.encoding });
    }
    this.logger.info("ingestion.completed", {
      extraction_method: "plain-text",
      chars: text.length,
      encoding: decoded.encoding,
    });
    return {
      text,
      method: "plain-text",
      confidence: decoded.usedFallback
        ? TEXT_FALLBACK_CONFIDENCE
        : Math.min(TEXT_MAX_CONFIDENCE, decoded.encodingConfidence + 0.1),
      characters: text.length,
      encoding: decoded.encoding,
    };
  }
}
