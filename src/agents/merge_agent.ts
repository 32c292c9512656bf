import type { RunnableConfig } from "@langchain/core/runnables";
import { ChatPromptTemplate } from "@langchain/core/prompts";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { GenerationFailed, isAbortError } from "../errors.js";
import { extractText } from "./message_text.js";
import { RECORDS_MISSING_ANSWER } from "./types.js";
import type { AnswerMerger, LabelledAnswer } from "./types.js";

const mergePrompt = ChatPromptTemplate.fromMessages([
  [
    "system",
    "You are a senior manager of the company. Combine the department responses you are given into ONE clear, " +
      "professional and non-repetitive final answer to the user's query.\n\n" +
      "Rules:\n" +
      "1. Keep every distinct fact from every response.\n" +
      "2. State facts that several responses share only once.\n" +
      "3. Do not add information that none of the responses contain.\n" +
      "4. Do not mention departments. Answer in a single voice with a logical flow.\n" +
      '5. If every response says the information is unavailable, return exactly "{records_missing}"'
  ],
  ["human", "User query:\n{query}\n\nDepartment responses:\n\n{responses}"]
]);

export class MergeSynthesizer implements AnswerMerger {
  constructor(private readonly llm: BaseChatModel) {}

  async merge(query: string, answers: readonly LabelledAnswer[], config?: RunnableConfig): Promise<string> {
    if (answers.length < 2) {
      throw new RangeError(`Merging needs at least two answers, got ${answers.length}.`);
    }
    const messages = await mergePrompt.formatMessages({
      query,
      records_missing: RECORDS_MISSING_ANSWER,
      responses: formatLabelledAnswers(answers)
    });
    let merged: string;
    try {
      merged = extractText(await this.llm.invoke(messages, config));
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new GenerationFailed("merge", error);
    }
    if (!merged) {
      throw new GenerationFailed("merge", new Error("model returned an empty merge"));
    }
    return merged;
  }
}

export function formatLabelledAnswers(answers: readonly LabelledAnswer[]): string {
  return answers.map(({ department, text }) => `[${department}]\n${text}`).join("\n\n");
}
