import type { DocumentInterface } from "@langchain/core/documents";
import type { SearchFilter, SearchHit, SimilarityIndex } from "./types.js";

/** The slice of a LangChain vector store the index needs. */
export interface ScoredSearchStore {
  similaritySearchWithScore(
    query: string,
    k?: number,
    filter?: Record<string, unknown>
  ): Promise<[DocumentInterface, number][]>;
}

export class VectorStoreIndex implements SimilarityIndex {
  constructor(private readonly store: ScoredSearchStore) {}

  async search(query: string, filter: SearchFilter, k: number): Promise<SearchHit[]> {
    const results = await this.store.similaritySearchWithScore(query, k, { department: filter.department });
    return results.map(([doc, score]) => {
      const { department, seq } = doc.metadata;
      return {
        text: doc.pageContent,
        score,
        department: typeof department === "string" ? department : "",
        ...(typeof seq === "number" ? { seq } : {})
      };
    });
  }
}
