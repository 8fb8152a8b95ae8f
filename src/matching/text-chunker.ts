export interface ChunkingOptions {
  chunkWords: number;
  overlapWords: number;
}

export function chunkByWords(text: string, options: ChunkingOptions): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length <= options.chunkWords) {
    return [words.join(" ")];
  }

  const step = Math.max(1, options.chunkWords - options.overlapWords);
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += step) {
    chunks.push(words.slice(start, start + options.chunkWords).join(" "));
    if (start + options.chunkWords >= words.length) {
      break;
    }
  }
  return chunks;
}

export function meanPool(vectors: ReadonlyArray<ReadonlyArray<number>>): number[] {
  const first = vectors[0];
  if (!first) {
    throw new Error("Cannot pool an empty set of vectors");
  }
  const dimension = first.length;
  const sum = new Array<number>(dimension).fill(0);
  for (const vector of vectors) {
    if (vector.length !== dimension) {
      throw new Error(`Embedding dimension mismatch: ${vector.length} vs ${dimension}`);
    }
    for (let i = 0; i < dimension; i += 1) {
      sum[i] = (sum[i] ?? 0) + (vector[i] ?? 0);
    }
  }
  return sum.map((value) => value / vectors.length);
}
