import { generateText, type ModelMessage } from "ai";
import {
  createClaudeCode,
  type ClaudeCodeSettings,
} from "ai-sdk-provider-claude-code";
import { AssistantTimeoutError, UpstreamError } from "../errors.js";
import { credentialEnv } from "./credentials.js";
import { toAssistantFailure } from "./failure.js";
import type {
  AssistantGateway,
  ChatMessage,
  CompletionOptions,
  CompletionRequest,
} from "./types.js";

export interface GenerateReplyInput {
  readonly system: string;
  readonly messages: ModelMessage[];
  readonly abortSignal: AbortSignal;
  readonly credential?: string;
}

export type GenerateReply = (input: GenerateReplyInput) => Promise<string>;

export interface ClaudeCodeSdkAssistantOptions {
  readonly model?: string;
  readonly generate?: GenerateReply;
}

/**
 * The same turn as the print-mode CLI, driven through the AI SDK's Claude
 * Code provider. History goes over as real model messages instead of being
 * flattened into a single prompt.
 */
export class ClaudeCodeSdkAssistant implements AssistantGateway {
  readonly kind = "claude-code-sdk" as const;

  private readonly generate: GenerateReply;

  constructor(options: ClaudeCodeSdkAssistantOptions = {}) {
    this.generate = options.generate ?? createClaudeCodeGenerate(options.model ?? "sonnet");
  }

  async complete(
    request: CompletionRequest,
    options: CompletionOptions,
  ): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      options.timeoutSeconds * 1000,
    );

    let reply: string;
    try {
      reply = await this.generate({
        system: options.systemPrompt,
        messages: toModelMessages([
          ...request.history,
          { role: "user", content: request.message },
        ]),
        abortSignal: controller.signal,
        ...(request.credential ? { credential: request.credential } : {}),
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AssistantTimeoutError();
      }
      throw toAssistantFailure(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeout);
    }

    const trimmed = reply.trim();
    if (trimmed.length === 0) {
      throw new UpstreamError("Claude Code returned an empty reply");
    }
    return trimmed;
  }
}

export function toModelMessages(messages: readonly ChatMessage[]): ModelMessage[] {
  return messages.map((message) =>
    message.role === "user"
      ? { role: "user", content: message.content }
      : { role: "assistant", content: message.content },
  );
}

function createClaudeCodeGenerate(model: string): GenerateReply {
  const provider = createClaudeCode();

  return async (input) => {
    const settings: ClaudeCodeSettings = {
      env: credentialEnv(input.credential),
    };
    const result = await generateText({
      model: provider(model, settings),
      system: input.system,
      messages: input.messages,
      abortSignal: input.abortSignal,
    });
    return result.text;
  };
}
