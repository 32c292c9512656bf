import type { RunnableConfig } from "@langchain/core/runnables";
import { ChatPromptTemplate } from "@langchain/core/prompts";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { OutputParserException } from "@langchain/core/output_parsers";
import { StructuredOutputParser } from "langchain/output_parsers";
import { z } from "zod";
import type { DepartmentCatalog } from "../departments/catalog.js";
import type { DepartmentName, DepartmentProfile } from "../departments/types.js";
import { GenerationFailed, isAbortError } from "../errors.js";
import { logger } from "../logger.js";
import { jsonCandidates } from "./json_candidates.js";
import { extractText } from "./message_text.js";
import { RECORDS_MISSING_ANSWER, REFUSAL_PHRASE } from "./types.js";
import type { DepartmentAnswer, DepartmentResponder } from "./types.js";

const log = logger.getSubLogger({ name: "responder" });

const answerSchema = z.object({
  in_scope: z.boolean().describe("false when the query is outside the department's responsibilities"),
  answer: z.string()
});

const looseAnswerSchema = z.object({
  in_scope: z.unknown().transform(readInScope),
  answer: z.unknown().transform((value) => (typeof value === "string" ? value.trim() : ""))
});

/**
 * Answers a query on behalf of one department, grounded only in the retrieved
 * fragments. The model reports scope through `in_scope`; the refusal phrase is still
 * requested in `answer` so transcripts stay readable.
 */
export class DomainRagAgent implements DepartmentResponder {
  private readonly parser = StructuredOutputParser.fromZodSchema(answerSchema);
  private readonly prompt: ChatPromptTemplate;

  constructor(
    private readonly llm: BaseChatModel,
    private readonly catalog: DepartmentCatalog
  ) {
    this.prompt = ChatPromptTemplate.fromMessages([
      [
        "system",
        "You are the {title} of the company. Your responsibilities:\n{responsibilities}\n\n" +
          "Style guide: {style_guide}\n\n" +
          "Rules:\n" +
          "1. Only answer questions within your responsibilities.\n" +
          '2. If the query is outside your responsibilities, set in_scope to false and answer exactly "{refusal}"\n' +
          "3. Use ONLY the company policy information provided. Never add facts that are not in it.\n" +
          '4. If the answer is not present in the provided information, answer exactly "{records_missing}"\n' +
          "5. Do not mention other departments."
      ],
      [
        "human",
        "Company policy information:\n{context}\n\nUser query:\n{query}\n\nAdhere to: {format_instructions}"
      ]
    ]);
  }

  async answer(
    query: string,
    department: DepartmentName,
    context: readonly string[],
    config?: RunnableConfig
  ): Promise<DepartmentAnswer> {
    const profile = this.catalog.require(department);
    if (!context.length) {
      return { kind: "answer", department, text: RECORDS_MISSING_ANSWER, recordsFound: false };
    }

    const messages = await this.prompt.formatMessages({
      title: profile.title,
      responsibilities: formatResponsibilities(profile),
      style_guide: profile.styleGuide,
      refusal: REFUSAL_PHRASE,
      records_missing: RECORDS_MISSING_ANSWER,
      context: context.join("\n\n---\n\n"),
      query,
      format_instructions: this.parser.getFormatInstructions()
    });

    let raw: string;
    try {
      raw = extractText(await this.llm.invoke(messages, config));
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new GenerationFailed("respond", error, department);
    }
    return this.interpret(raw, department);
  }

  private async interpret(raw: string, department: DepartmentName): Promise<DepartmentAnswer> {
    let inScope: boolean;
    let text: string;
    try {
      const parsed = await this.parser.parse(raw);
      inScope = parsed.in_scope;
      text = parsed.answer.trim();
    } catch (error) {
      if (!(error instanceof OutputParserException)) {
        throw error;
      }
      const loose = readLooseAnswer(raw);
      if (loose) {
        log.debug("Responder output did not match the answer schema, reading its fields loosely", { department });
        inScope = loose.inScope;
        text = loose.text;
      } else {
        log.debug("Responder output was not structured, reading it as plain text", { department });
        inScope = true;
        text = raw;
      }
    }

    if (!inScope || isRefusalPhrase(text)) {
      log.info("Department declined the query", { department });
      return { kind: "refusal", department, text: REFUSAL_PHRASE };
    }
    if (!text) {
      throw new GenerationFailed("respond", new Error("model returned an empty answer"), department);
    }
    return { kind: "answer", department, text, recordsFound: true };
  }
}

/** Reads the first JSON object in the output whatever its field types; undefined when there is none. */
function readLooseAnswer(raw: string): { inScope: boolean; text: string } | undefined {
  for (const candidate of jsonCandidates(raw)) {
    const loose = looseAnswerSchema.safeParse(candidate);
    if (loose.success) {
      return { inScope: loose.data.in_scope, text: loose.data.answer };
    }
  }
  return undefined;
}

function readInScope(value: unknown): boolean {
  if (typeof value === "string") {
    return !["false", "no", "0"].includes(value.trim().toLowerCase());
  }
  return value !== false && value !== 0;
}

export function isRefusalPhrase(text: string): boolean {
  return normalizePhrase(text) === normalizePhrase(REFUSAL_PHRASE);
}

function normalizePhrase(text: string): string {
  return text
    .replace(/["“”]/g, "")
    .replace(/[.!\s]+$/, "")
    .trim()
    .toLowerCase();
}

function formatResponsibilities(profile: DepartmentProfile): string {
  return profile.responsibilities.map((item) => `- ${item}`).join("\n");
}
