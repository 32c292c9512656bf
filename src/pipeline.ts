import type { RunnableConfig } from "@langchain/core/runnables";
import type { DepartmentRouter } from "./agents/router.js";
import type {
  AnswerMerger,
  DepartmentAnswer,
  DepartmentResponder,
  LabelledAnswer,
  RoutingDecision,
  RoutingState
} from "./agents/types.js";
import type { MergeFailurePolicy } from "./config.js";
import type { DepartmentCatalog } from "./departments/catalog.js";
import type { DepartmentName } from "./departments/types.js";
import { EmptyQueryError, GenerationFailed } from "./errors.js";
import { logger } from "./logger.js";
import type { ContextRetriever } from "./retrieval/scoped_retriever.js";

const log = logger.getSubLogger({ name: "pipeline" });

export type PipelineOutcome = "clarification" | "single" | "merged";

export interface PipelineResult {
  query: string;
  routing: RoutingState;
  /** Departments the router selected, in catalog order, even when all of them refused. */
  departments: DepartmentName[];
  answer: string;
  outcome: PipelineOutcome;
  answers: DepartmentAnswer[];
}

export interface PipelineDeps {
  catalog: DepartmentCatalog;
  router: Pick<DepartmentRouter, "route">;
  retriever: ContextRetriever;
  responder: DepartmentResponder;
  merger: AnswerMerger;
  mergeFailurePolicy?: MergeFailurePolicy;
}

export class DepartmentPipeline {
  private readonly mergeFailurePolicy: MergeFailurePolicy;

  constructor(private readonly deps: PipelineDeps) {
    this.mergeFailurePolicy = deps.mergeFailurePolicy ?? "fail";
  }

  async routeOnly(query: string, config?: RunnableConfig): Promise<RoutingDecision> {
    return this.deps.router.route(normalizeQuery(query), config);
  }

  async run(rawQuery: string, config?: RunnableConfig): Promise<PipelineResult> {
    const query = normalizeQuery(rawQuery);
    const decision = await this.deps.router.route(query, config);
    log.info("Routed query", { state: decision.state, departments: decision.departments });

    if (decision.state === "empty") {
      return this.clarify(query, decision, []);
    }

    const answers = await this.answerAll(query, decision.departments, config);
    const substantive: LabelledAnswer[] = answers.flatMap((answer) =>
      answer.kind === "answer" ? [{ department: answer.department, text: answer.text }] : []
    );

    if (!substantive.length) {
      log.info("Every routed department declined", { departments: decision.departments });
      return this.clarify(query, decision, answers);
    }

    if (substantive.length === 1) {
      return {
        query,
        routing: decision.state,
        departments: decision.departments,
        answer: substantive[0].text,
        outcome: "single",
        answers
      };
    }

    config?.signal?.throwIfAborted();
    return {
      query,
      routing: decision.state,
      departments: decision.departments,
      answer: await this.mergeAnswers(query, substantive, config),
      outcome: "merged",
      answers
    };
  }

  /**
   * Retrieves and answers for every department concurrently. Each task fills its own
   * slot so the result keeps catalog order; the first failure aborts the rest.
   */
  private async answerAll(
    query: string,
    departments: readonly DepartmentName[],
    config?: RunnableConfig
  ): Promise<DepartmentAnswer[]> {
    const controller = new AbortController();
    const parentSignal = config?.signal;
    const forwardAbort = () => controller.abort(parentSignal?.reason);
    if (parentSignal?.aborted) {
      controller.abort(parentSignal.reason);
    } else {
      parentSignal?.addEventListener("abort", forwardAbort, { once: true });
    }
    const taskConfig: RunnableConfig = { ...config, signal: controller.signal };

    try {
      return await Promise.all(
        departments.map(async (department) => {
          try {
            const context = await this.deps.retriever.retrieve(query, department, undefined, taskConfig);
            return await this.deps.responder.answer(query, department, context, taskConfig);
          } catch (error) {
            controller.abort(error);
            throw error;
          }
        })
      );
    } finally {
      parentSignal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async mergeAnswers(query: string, answers: LabelledAnswer[], config?: RunnableConfig): Promise<string> {
    try {
      return await this.deps.merger.merge(query, answers, config);
    } catch (error) {
      if (!(error instanceof GenerationFailed) || this.mergeFailurePolicy !== "concatenate") {
        throw error;
      }
      log.warn("Merge failed, returning department answers side by side", { reason: error.message });
      return answers.map(({ department, text }) => `${department}:\n${text}`).join("\n\n");
    }
  }

  private clarify(query: string, decision: RoutingDecision, answers: DepartmentAnswer[]): PipelineResult {
    return {
      query,
      routing: decision.state,
      departments: decision.departments,
      answer: this.deps.catalog.clarificationPrompt(),
      outcome: "clarification",
      answers
    };
  }
}

function normalizeQuery(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new EmptyQueryError();
  }
  return trimmed;
}
