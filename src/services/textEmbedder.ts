import { clamp } from "../utils/normalize.js";

export class EmbedderLifecycleError extends Error {
  constructor(
    message: string,
    readonly code: "already_fitted" | "not_fitted"
  ) {
    super(message);
    this.name = "EmbedderLifecycleError";
  }
}

export type Vocabulary = {
  readonly dimension: number;
  readonly wordToIndex: ReadonlyMap<string, number>;
};

export type EmbedderInfo = {
  modelName: string;
  modelType: "bag_of_words";
  embeddingDimension: number;
  vocabSize: number;
};

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Keeps the `dimension` most frequent words of the corpus. Words with equal
 * counts keep the order in which they were first seen.
 */
export function fitVocabulary(corpus: readonly string[], dimension: number): Vocabulary {
  const frequencies = new Map<string, number>();
  for (const text of corpus) {
    for (const word of tokenize(text)) {
      frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
    }
  }

  const ranked = Array.from(frequencies.entries()).sort((left, right) => right[1] - left[1]);
  const wordToIndex = new Map<string, number>();
  for (const [word] of ranked.slice(0, Math.max(0, dimension))) {
    wordToIndex.set(word, wordToIndex.size);
  }

  return Object.freeze({ dimension, wordToIndex });
}

export function encodeText(vocabulary: Vocabulary, text: string): number[] {
  const vector = new Array<number>(vocabulary.dimension).fill(0);
  for (const word of tokenize(text)) {
    const index = vocabulary.wordToIndex.get(word);
    if (index !== undefined) {
      vector[index] = (vector[index] ?? 0) + 1;
    }
  }

  const norm = vectorNorm(vector);
  return norm > 0 ? vector.map((value) => value / norm) : vector;
}

export function encode(vocabulary: Vocabulary, input: string | readonly string[]): number[][] {
  const texts = typeof input === "string" ? [input] : input;
  return texts.map((text) => encodeText(vocabulary, text));
}

export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Vectors of unequal length are compared as if the shorter one were
 * zero-padded.
 */
export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  const length = Math.min(left.length, right.length);
  let dot = 0;
  for (let i = 0; i < length; i++) {
    dot += (left[i] ?? 0) * (right[i] ?? 0);
  }

  const leftNorm = vectorNorm(left);
  const rightNorm = vectorNorm(right);
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  // rounding can push identical directions just past 1
  return clamp(dot / (leftNorm * rightNorm), -1, 1);
}

export class TextEmbedder {
  private vocabulary: Vocabulary | null = null;

  constructor(readonly dimension: number = 100) {}

  get isFitted(): boolean {
    return this.vocabulary !== null;
  }

  fitAndEncode(texts: readonly string[]): number[][] {
    if (this.vocabulary) {
      throw new EmbedderLifecycleError("Vocabulary is already fitted for this embedder", "already_fitted");
    }
    const vocabulary = fitVocabulary(texts, this.dimension);
    this.vocabulary = vocabulary;
    return encode(vocabulary, texts);
  }

  encode(input: string | readonly string[]): number[][] {
    return encode(this.requireVocabulary(), input);
  }

  encodeQuery(query: string): number[] {
    return encodeText(this.requireVocabulary(), query);
  }

  info(): EmbedderInfo {
    return {
      modelName: "bag_of_words_embedder",
      modelType: "bag_of_words",
      embeddingDimension: this.dimension,
      vocabSize: this.vocabulary?.wordToIndex.size ?? 0
    };
  }

  private requireVocabulary(): Vocabulary {
    if (!this.vocabulary) {
      throw new EmbedderLifecycleError("Vocabulary has not been fitted yet", "not_fitted");
    }
    return this.vocabulary;
  }
}
