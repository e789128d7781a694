import { randomUUID } from "node:crypto";
import type { RecipeMetadata } from "../types/contracts.js";
import { cosineSimilarity } from "./textEmbedder.js";
import { isIn, matchesFilter, type MetadataFilter } from "./filterPredicate.js";

export type IndexHits = {
  ids: string[];
  documents: string[];
  metadatas: RecipeMetadata[];
  distances: number[];
};

export type IndexEntry = {
  id: string;
  text: string;
  metadata: RecipeMetadata;
  embedding: number[];
};

export type VectorIndexStats = {
  totalDocuments: number;
  dimension: number | null;
  collectionName: string;
};

export class VectorIndex {
  private readonly documents: string[] = [];
  private readonly metadatas: RecipeMetadata[] = [];
  private readonly embeddings: number[][] = [];
  private readonly ids: string[] = [];
  private dimension: number | null = null;

  constructor(readonly collectionName: string = "recipes") {}

  add(texts: string[], metadata: RecipeMetadata[] | undefined, embeddings: number[][]): string[] {
    if (embeddings.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, received ${embeddings.length}`);
    }

    const ids = texts.map(() => randomUUID());
    texts.forEach((text, index) => {
      const embedding = embeddings[index] ?? [];
      if (this.dimension === null) {
        this.dimension = embedding.length;
      }
      this.documents.push(text);
      this.metadatas.push(metadata?.[index] ?? { text });
      this.embeddings.push(reconcileDimension(embedding, this.dimension));
      this.ids.push(ids[index] ?? randomUUID());
    });

    return ids;
  }

  search(queryEmbedding: number[], k: number, filter?: MetadataFilter): IndexHits {
    const hits: IndexHits = { ids: [], documents: [], metadatas: [], distances: [] };
    if (this.ids.length === 0 || k <= 0) {
      return hits;
    }

    const query = reconcileDimension(queryEmbedding, this.dimension ?? queryEmbedding.length);
    const ranked: Array<{ index: number; similarity: number }> = [];
    this.embeddings.forEach((embedding, index) => {
      const metadata = this.metadatas[index] ?? {};
      if (!matchesFilter(metadata, filter)) return;
      ranked.push({ index, similarity: cosineSimilarity(query, embedding) });
    });

    ranked.sort((left, right) => right.similarity - left.similarity);

    for (const { index, similarity } of ranked.slice(0, k)) {
      hits.ids.push(this.ids[index] ?? "");
      hits.documents.push(this.documents[index] ?? "");
      hits.metadatas.push(this.metadatas[index] ?? {});
      hits.distances.push(1 - similarity);
    }

    return hits;
  }

  filterByDietaryRestriction(restriction: string, k: number = 5): IndexHits {
    return this.search([], k, { dietary_tags: isIn([restriction]) });
  }

  filterByHealthBenefit(benefit: string, k: number = 5): IndexHits {
    return this.search([], k, { health_benefits: isIn([benefit]) });
  }

  getById(id: string): IndexEntry | null {
    const index = this.ids.indexOf(id);
    if (index < 0) {
      return null;
    }
    return {
      id,
      text: this.documents[index] ?? "",
      metadata: this.metadatas[index] ?? {},
      embedding: this.embeddings[index] ?? []
    };
  }

  size(): number {
    return this.ids.length;
  }

  stats(): VectorIndexStats {
    return {
      totalDocuments: this.ids.length,
      dimension: this.dimension,
      collectionName: this.collectionName
    };
  }

  clear(): void {
    this.documents.length = 0;
    this.metadatas.length = 0;
    this.embeddings.length = 0;
    this.ids.length = 0;
    this.dimension = null;
  }
}

export function reconcileDimension(vector: number[], dimension: number): number[] {
  if (vector.length === dimension) {
    return vector;
  }
  if (vector.length > dimension) {
    return vector.slice(0, dimension);
  }
  return [...vector, ...new Array<number>(dimension - vector.length).fill(0)];
}
