import type { RunnableConfig } from "@langchain/core/runnables";
import type { DepartmentCatalog } from "../departments/catalog.js";
import { ClassificationUnavailable } from "../errors.js";
import { logger } from "../logger.js";
import type { ClassificationOutcome, DepartmentClassifier, RoutingDecision } from "./types.js";

const log = logger.getSubLogger({ name: "router" });

export class DepartmentRouter {
  constructor(
    private readonly classifier: DepartmentClassifier,
    private readonly catalog: DepartmentCatalog
  ) {}

  async route(query: string, config?: RunnableConfig): Promise<RoutingDecision> {
    let outcome: ClassificationOutcome;
    try {
      outcome = await this.classifier.classify(query, config);
    } catch (error) {
      if (!(error instanceof ClassificationUnavailable)) {
        throw error;
      }
      // Never leave a query unanswered because the classifier is down.
      log.warn("Classifier unavailable, routing to every department", {
        transient: error.transient,
        reason: error.message
      });
      return { state: "fallback_all", departments: this.catalog.names };
    }

    if (outcome.kind === "malformed") {
      log.warn("Classifier returned no parseable department list", { raw: outcome.raw });
      return { state: "empty", departments: [] };
    }
    if (outcome.rejected.length) {
      log.debug("Dropped unknown department labels", { rejected: outcome.rejected });
    }
    const departments = this.catalog.canonicalize(outcome.departments);
    if (!departments.length) {
      return { state: "empty", departments: [] };
    }
    return { state: "routed", departments };
  }
}
