import pdfParse from "pdf-parse";

export interface PdfTextLayer {
  text: string;
  pageCount: number;
}

export async function extractPdfText(buffer: Buffer): Promise<PdfTextLayer> {
  const result = await pdfParse(buffer);
  return {
    text: result.text.trim(),
    pageCount: result.numpages,
  };
}
