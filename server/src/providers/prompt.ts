import type { ChatMessage } from "./types.js";

export function buildPrompt(input: {
  systemPrompt: string;
  history: readonly ChatMessage[];
  message: string;
}): string {
  let prompt = `${input.systemPrompt}\n\n`;

  if (input.history.length > 0) {
    prompt += "Previous conversation:\n";
    for (const entry of input.history) {
      const speaker = entry.role === "user" ? "User" : "Assistant";
      prompt += `${speaker}: ${entry.content}\n\n`;
    }
  }

  return `${prompt}User: ${input.message}`;
}
