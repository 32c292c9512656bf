export interface SearchHit {
  text: string;
  score: number;
  /** Department label the fragment was ingested under. */
  department: string;
  /** Position of the fragment in the ingestion run. */
  seq?: number;
}

export interface SearchFilter {
  department: string;
}

export interface SimilarityIndex {
  search(query: string, filter: SearchFilter, k: number): Promise<SearchHit[]>;
}
