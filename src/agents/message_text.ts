import type { BaseMessage } from "@langchain/core/messages";

export function extractText(message: BaseMessage): string {
  const content = message.content;
  if (typeof content === "string") {
    return content.trim();
  }
  if (Array.isArray(content)) {
    return content
      .map((chunk) => {
        if (typeof chunk === "string") {
          return chunk;
        }
        if ("text" in chunk && typeof chunk.text === "string") {
          return chunk.text;
        }
        return "";
      })
      .join("")
      .trim();
  }
  return "";
}
