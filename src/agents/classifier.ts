import { ChatPromptTemplate } from "@langchain/core/prompts";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { RunnableConfig } from "@langchain/core/runnables";
import { StructuredOutputParser } from "langchain/output_parsers";
import { z } from "zod";
import type { DepartmentCatalog } from "../departments/catalog.js";
import type { DepartmentName } from "../departments/types.js";
import { ClassificationUnavailable, isAbortError } from "../errors.js";
import { jsonCandidates } from "./json_candidates.js";
import { extractText } from "./message_text.js";
import type { ClassificationOutcome, DepartmentClassifier } from "./types.js";

const outputSchema = z.object({
  departments: z
    .array(z.string())
    .describe("Names of every department the query belongs to, or an empty list when unclear")
});

const payloadSchema = z.union([z.object({ departments: z.array(z.unknown()) }), z.array(z.string())]);

const classifierParser = StructuredOutputParser.fromZodSchema(outputSchema);

export class LlmDepartmentClassifier implements DepartmentClassifier {
  private readonly parser = classifierParser;
  private readonly prompt: ChatPromptTemplate;

  constructor(
    private readonly llm: BaseChatModel,
    private readonly catalog: DepartmentCatalog
  ) {
    this.prompt = ChatPromptTemplate.fromMessages([
      [
        "system",
        "You are the internal routing system for the company helpdesk. Decide which departments a query belongs to. " +
          "A query may belong to several departments.\n\nAvailable departments:\n{departments}\n\n" +
          "Rules:\n1. Return ONLY valid JSON.\n2. Do not explain your reasoning.\n3. Do not answer the user.\n" +
          "4. If the query is unclear, return an empty departments list."
      ],
      ["human", "User query:\n{query}\n\nReturn JSON that follows: {format_instructions}"]
    ]);
  }

  async classify(query: string, config?: RunnableConfig): Promise<ClassificationOutcome> {
    const messages = await this.prompt.formatMessages({
      query,
      departments: this.describeDepartments(),
      format_instructions: this.parser.getFormatInstructions()
    });
    let raw: string;
    try {
      raw = extractText(await this.llm.invoke(messages, config));
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new ClassificationUnavailable(error);
    }
    return parseClassifierOutput(raw, this.catalog);
  }

  private describeDepartments(): string {
    return this.catalog.profiles
      .map((profile) => `${profile.name}:\n${profile.responsibilities.map((item) => `- ${item}`).join("\n")}`)
      .join("\n\n");
  }
}

/**
 * Reads the first JSON array of labels, or object with a `departments` array, out of free-form
 * model output. Labels that name no department in the catalog end up in `rejected`.
 */
export function parseClassifierOutput(raw: string, catalog: DepartmentCatalog): ClassificationOutcome {
  for (const candidate of jsonCandidates(raw)) {
    const payload = payloadSchema.safeParse(candidate);
    if (!payload.success) {
      continue;
    }
    const labels = Array.isArray(payload.data) ? payload.data : payload.data.departments;
    const departments: DepartmentName[] = [];
    const rejected: string[] = [];
    for (const label of labels) {
      const profile = typeof label === "string" ? catalog.resolve(label) : undefined;
      if (!profile) {
        rejected.push(typeof label === "string" ? label : JSON.stringify(label));
      } else if (!departments.includes(profile.name)) {
        departments.push(profile.name);
      }
    }
    return { kind: "parsed", departments, rejected };
  }
  return { kind: "malformed", raw };
}
