import "dotenv/config";
import { createEmbeddings } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { DepartmentCatalog } from "./departments/catalog.js";
import { logger } from "./logger.js";
import { openDepartmentStore } from "./retrieval/pinecone.js";
import { seedDepartmentIndex } from "./retrieval/seed.js";

async function seed() {
  const config = loadConfig();
  const store = await openDepartmentStore(createEmbeddings(config), config.pinecone);
  const summary = await seedDepartmentIndex(DepartmentCatalog.fromOrder(config.departmentOrder), store, {
    namespace: config.pinecone.namespace
  });
  logger.info(`Indexed ${summary.chunks} chunks`, summary.perDepartment);
}

seed().catch((error) => {
  logger.fatal("Failed to seed the department index", error);
  process.exitCode = 1;
});
