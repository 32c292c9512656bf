import { existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { Document } from "@langchain/core/documents";
import type { DocumentInterface } from "@langchain/core/documents";
import { DirectoryLoader } from "langchain/document_loaders/fs/directory";
import { TextLoader } from "langchain/document_loaders/fs/text";
import { RecursiveCharacterTextSplitter } from "langchain/text_splitter";
import type { DepartmentCatalog } from "../departments/catalog.js";
import type { DepartmentProfile } from "../departments/types.js";
import { logger } from "../logger.js";

const log = logger.getSubLogger({ name: "seed" });

export const DEFAULT_DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "data");

export interface SeedableStore {
  delete(params: { deleteAll: boolean; namespace?: string }): Promise<void>;
  addDocuments(documents: DocumentInterface[], options: { ids: string[]; namespace?: string }): Promise<unknown>;
}

export interface SeedOptions {
  dataDir?: string;
  namespace?: string;
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface SeedSummary {
  chunks: number;
  perDepartment: Partial<Record<DepartmentProfile["name"], number>>;
}

async function loadDepartmentDocuments(dataDir: string, profile: DepartmentProfile): Promise<DocumentInterface[]> {
  const folderPath = path.join(dataDir, profile.dataFolder);
  if (!existsSync(folderPath)) {
    log.warn(`No source folder for ${profile.name} at ${folderPath}. Skipping.`);
    return [];
  }
  const loader = new DirectoryLoader(folderPath, {
    ".md": (filePath: string) => new TextLoader(filePath),
    ".txt": (filePath: string) => new TextLoader(filePath)
  });
  return loader.load();
}

/**
 * Rebuilds the department index: every chunk is tagged with its department's
 * retrieval key and a global ingestion sequence used to break score ties.
 */
export async function seedDepartmentIndex(
  catalog: DepartmentCatalog,
  store: SeedableStore,
  options: SeedOptions = {}
): Promise<SeedSummary> {
  const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: options.chunkSize ?? 250,
    chunkOverlap: options.chunkOverlap ?? 40
  });

  const chunks: DocumentInterface[] = [];
  const ids: string[] = [];
  const perDepartment: SeedSummary["perDepartment"] = {};
  for (const profile of catalog.profiles) {
    const docs = await loadDepartmentDocuments(dataDir, profile);
    const splitDocs = await splitter.splitDocuments(docs);
    splitDocs.forEach((doc, idx) => {
      const source = doc.metadata.source;
      chunks.push(
        new Document({
          pageContent: doc.pageContent,
          metadata: {
            source: typeof source === "string" ? path.relative(dataDir, source) : profile.dataFolder,
            department: profile.retrievalKey,
            seq: chunks.length
          }
        })
      );
      ids.push(`${profile.dataFolder}-${idx}`);
    });
    perDepartment[profile.name] = splitDocs.length;
  }

  try {
    await store.delete({ deleteAll: true, namespace: options.namespace });
  } catch (error) {
    if (error instanceof Error && error.message.includes("404")) {
      log.warn(`Namespace ${options.namespace ?? "(default)"} not found yet. Skipping delete.`);
    } else {
      throw error;
    }
  }
  if (chunks.length) {
    await store.addDocuments(chunks, { ids, namespace: options.namespace });
  }
  log.info("Seeded department index", { chunks: chunks.length, perDepartment });
  return { chunks: chunks.length, perDepartment };
}
