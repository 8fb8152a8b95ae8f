export interface TokenPrediction {
  readonly label: string;
  readonly score: number;
  readonly word: string;
  readonly start: number;
  readonly end: number;
}

export interface EmbeddingModel {
  readonly modelName: string;
  embed(inputs: ReadonlyArray<string>, signal?: AbortSignal): Promise<number[][]>;
}

export interface TokenClassifier {
  readonly modelName: string;
  readonly maxInputChars: number;
  classify(text: string, signal?: AbortSignal): Promise<TokenPrediction[]>;
}

export interface ModelRegistry {
  readonly embeddings: EmbeddingModel;
  readonly tokenClassifier: TokenClassifier | null;
}
