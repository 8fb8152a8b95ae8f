import mammoth from "mammoth";

export interface DocxText {
  text: string;
  warnings: string[];
}

export async function extractDocxText(buffer: Buffer): Promise<DocxText> {
  const result = await mammoth.extractRawText({ buffer });
  return {
    text: result.value.trim(),
    warnings: result.messages.map((message) => message.message),
  };
}
