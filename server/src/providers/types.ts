import type { MessageRole } from "../repositories/conversation-repository.js";

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export interface CompletionRequest {
  /** Prior turns, oldest first. */
  readonly history: readonly ChatMessage[];
  readonly message: string;
  /** Provider credential of the logged-in user, exported to the assistant. */
  readonly credential?: string;
}

export interface CompletionOptions {
  readonly timeoutSeconds: number;
  readonly systemPrompt: string;
}

/**
 * Turns a conversation plus a new message into one reply. Fails with
 * `AssistantTimeoutError`, `InvalidCredentialError` or `UpstreamError`;
 * a failed attempt is never retried.
 */
export interface AssistantGateway {
  readonly kind: AssistantKind;
  complete(
    request: CompletionRequest,
    options: CompletionOptions,
  ): Promise<string>;
}

export type AssistantKind = "claude-cli" | "claude-code-sdk";
