import { DocumentFormat, SUPPORTED_MIME_TYPES } from "../shared/types/document.types";

const PDF_MAGIC = Buffer.from("%PDF-", "latin1");
const ZIP_LOCAL_HEADER = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const DOCX_ENTRY_MARKER = Buffer.from("word/", "latin1");
const PDF_SEARCH_BYTES = 1024;
const TEXT_SAMPLE_BYTES = 8192;

const TEXT_BOMS: ReadonlyArray<Buffer> = [
  Buffer.from([0xef, 0xbb, 0xbf]),
  Buffer.from([0xff, 0xfe]),
  Buffer.from([0xfe, 0xff]),
];

export function sniffFormat(content: Buffer): DocumentFormat {
  if (content.length === 0) {
    return "unknown";
  }
  if (content.subarray(0, PDF_SEARCH_BYTES).includes(PDF_MAGIC)) {
    return "pdf";
  }
  if (content.subarray(0, ZIP_LOCAL_HEADER.length).equals(ZIP_LOCAL_HEADER)) {
    return content.includes(DOCX_ENTRY_MARKER) ? "docx" : "unknown";
  }
  if (hasTextBom(content)) {
    return "text";
  }
  return content.subarray(0, TEXT_SAMPLE_BYTES).includes(0x00) ? "unknown" : "text";
}

export function formatFromMimeType(mimeType?: string): DocumentFormat | undefined {
  if (!mimeType) {
    return undefined;
  }
  const normalized = mimeType.split(";")[0]?.trim().toLowerCase() ?? "";
  for (const [format, supported] of Object.entries(SUPPORTED_MIME_TYPES)) {
    if (supported === normalized && isSupportedFormat(format)) {
      return format;
    }
  }
  return undefined;
}

function isSupportedFormat(value: string): value is Exclude<DocumentFormat, "unknown"> {
  return value === "pdf" || value === "docx" || value === "text";
}

export function isFormatConfusion(sniffed: DocumentFormat, declaredMimeType?: string): boolean {
  const declared = formatFromMimeType(declaredMimeType);
  return declared !== undefined && declared !== sniffed;
}

function hasTextBom(content: Buffer): boolean {
  return TEXT_BOMS.some((bom) => content.subarray(0, bom.length).equals(bom));
}
