import type { RunnableConfig } from "@langchain/core/runnables";
import type { DepartmentName } from "../departments/types.js";

export const REFUSAL_PHRASE = "This query does not fall under my department.";
export const RECORDS_MISSING_ANSWER = "The requested information is not available in company records.";

export type ClassificationOutcome =
  | { kind: "parsed"; departments: DepartmentName[]; rejected: string[] }
  | { kind: "malformed"; raw: string };

export type RoutingState = "routed" | "empty" | "fallback_all";

export interface RoutingDecision {
  state: RoutingState;
  departments: DepartmentName[];
}

export type DepartmentAnswer =
  | { kind: "answer"; department: DepartmentName; text: string; recordsFound: boolean }
  | { kind: "refusal"; department: DepartmentName; text: string };

export interface DepartmentClassifier {
  classify(query: string, config?: RunnableConfig): Promise<ClassificationOutcome>;
}

export interface DepartmentResponder {
  answer(
    query: string,
    department: DepartmentName,
    context: readonly string[],
    config?: RunnableConfig
  ): Promise<DepartmentAnswer>;
}

export interface LabelledAnswer {
  department: DepartmentName;
  text: string;
}

export interface AnswerMerger {
  merge(query: string, answers: readonly LabelledAnswer[], config?: RunnableConfig): Promise<string>;
}
