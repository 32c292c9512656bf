import { ChatOpenAI, OpenAIEmbeddings } from "@langchain/openai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { LlmDepartmentClassifier } from "./agents/classifier.js";
import { DomainRagAgent } from "./agents/domain_agent.js";
import { MergeSynthesizer } from "./agents/merge_agent.js";
import { DepartmentRouter } from "./agents/router.js";
import type { AppConfig } from "./config.js";
import { DepartmentCatalog } from "./departments/catalog.js";
import { DepartmentPipeline } from "./pipeline.js";
import { openDepartmentStore } from "./retrieval/pinecone.js";
import { ScopedRetriever } from "./retrieval/scoped_retriever.js";
import type { SimilarityIndex } from "./retrieval/types.js";
import { VectorStoreIndex } from "./retrieval/vector_store_index.js";

export function createChatModel(config: AppConfig): ChatOpenAI {
  return new ChatOpenAI({
    temperature: 0,
    model: config.llm.model,
    apiKey: config.llm.apiKey,
    timeout: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
    configuration: {
      baseURL: config.llm.baseUrl
    }
  });
}

export function createEmbeddings(config: AppConfig): OpenAIEmbeddings {
  return new OpenAIEmbeddings({
    apiKey: config.llm.apiKey,
    model: config.llm.embeddingModel,
    dimensions: config.llm.embeddingDimensions,
    configuration: {
      baseURL: config.llm.baseUrl
    }
  });
}

export interface PipelineParts {
  llm: BaseChatModel;
  index: SimilarityIndex;
}

/** Wires the routing pipeline from a chat model and a similarity index. */
export function assemblePipeline(config: AppConfig, { llm, index }: PipelineParts): DepartmentPipeline {
  const catalog = DepartmentCatalog.fromOrder(config.departmentOrder);
  return new DepartmentPipeline({
    catalog,
    router: new DepartmentRouter(new LlmDepartmentClassifier(llm, catalog), catalog),
    retriever: new ScopedRetriever(index, catalog, config.retrievalK),
    responder: new DomainRagAgent(llm, catalog),
    merger: new MergeSynthesizer(llm),
    mergeFailurePolicy: config.mergeFailurePolicy
  });
}

export async function buildLivePipeline(config: AppConfig): Promise<DepartmentPipeline> {
  const store = await openDepartmentStore(createEmbeddings(config), config.pinecone);
  return assemblePipeline(config, {
    llm: createChatModel(config),
    index: new VectorStoreIndex(store)
  });
}
