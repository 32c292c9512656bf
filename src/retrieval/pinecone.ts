import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { PineconeStore } from "@langchain/pinecone";
import { Pinecone } from "@pinecone-database/pinecone";
import type { Index } from "@pinecone-database/pinecone";
import type { AppConfig } from "../config.js";

const indexes = new Map<string, Index>();

/** One client and index handle per account, host and index name. */
export function resolvePineconeIndex(config: AppConfig["pinecone"]): Index {
  if (!config.apiKey || !config.index) {
    throw new Error("Pinecone configuration missing. Set PINECONE_API_KEY and PINECONE_INDEX.");
  }
  const key = JSON.stringify([config.apiKey, config.controllerHost ?? "", config.index]);
  let index = indexes.get(key);
  if (!index) {
    const pinecone = new Pinecone({
      apiKey: config.apiKey,
      ...(config.controllerHost ? { controllerHostUrl: config.controllerHost } : {})
    });
    index = pinecone.index(config.index);
    indexes.set(key, index);
  }
  return index;
}

export async function openDepartmentStore(
  embeddings: EmbeddingsInterface,
  config: AppConfig["pinecone"]
): Promise<PineconeStore> {
  const pineconeIndex = resolvePineconeIndex(config);
  return PineconeStore.fromExistingIndex(embeddings, {
    pineconeIndex,
    namespace: config.namespace
  });
}
