import type { RunnableConfig } from "@langchain/core/runnables";
import type { DepartmentCatalog } from "../departments/catalog.js";
import type { DepartmentName } from "../departments/types.js";
import { logger } from "../logger.js";
import type { SearchHit, SimilarityIndex } from "./types.js";

const log = logger.getSubLogger({ name: "retriever" });

export interface ContextRetriever {
  retrieve(query: string, department: DepartmentName, k?: number, config?: RunnableConfig): Promise<string[]>;
}

export class ScopedRetriever implements ContextRetriever {
  constructor(
    private readonly index: SimilarityIndex,
    private readonly catalog: DepartmentCatalog,
    private readonly defaultK: number
  ) {
    assertTopK(defaultK);
  }

  async retrieve(
    query: string,
    department: DepartmentName,
    k = this.defaultK,
    config?: RunnableConfig
  ): Promise<string[]> {
    assertTopK(k);
    config?.signal?.throwIfAborted();
    const key = this.catalog.require(department).retrievalKey;
    const hits = await this.index.search(query, { department: key }, k);
    config?.signal?.throwIfAborted();

    const scoped = hits
      .map((hit, position) => ({ hit, position }))
      .filter(({ hit }) => hit.department === key);
    if (scoped.length !== hits.length) {
      log.warn("Index returned fragments from another department", {
        department,
        dropped: hits.length - scoped.length
      });
    }
    const fragments = scoped
      .sort((a, b) => compareHits(a.hit, b.hit) || a.position - b.position)
      .slice(0, k)
      .map(({ hit }) => hit.text);
    log.debug("Retrieved context", { department, fragments: fragments.length });
    return fragments;
  }
}

function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return (a.seq ?? Number.MAX_SAFE_INTEGER) - (b.seq ?? Number.MAX_SAFE_INTEGER);
}

function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`Retrieval k must be a positive integer, got ${k}.`);
  }
}
