import { analyse } from "chardet";
import iconv from "iconv-lite";

export interface DecodedText {
  text: string;
  encoding: string;
  encodingConfidence: number;
  usedFallback: boolean;
}

const FALLBACK_ENCODING = "utf-8";

export function decodePlainText(buffer: Buffer): DecodedText {
  const best = analyse(buffer)[0];
  if (!best || !iconv.encodingExists(best.name)) {
    return decodeAsUtf8(buffer);
  }

  try {
    return {
      text: iconv.decode(buffer, best.name),
      encoding: best.name.toLowerCase(),
      encodingConfidence: Math.min(1, Math.max(0, best.confidence / 100)),
      usedFallback: false,
    };
  } catch {
    return decodeAsUtf8(buffer);
  }
}

function decodeAsUtf8(buffer: Buffer): DecodedText {
  return {
    text: buffer.toString("utf8").replace(/^\uFEFF/, ""),
    encoding: FALLBACK_ENCODING,
    encodingConfidence: 0,
    usedFallback: true,
  };
}
