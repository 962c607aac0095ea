import type { CredentialVerifier } from "../../src/auth/anthropic-credential-verifier.js";
import type { Logger } from "../../src/observability/logger.js";
import type {
  AssistantGateway,
  CompletionOptions,
  CompletionRequest,
} from "../../src/providers/types.js";
import type { CredentialIdentity } from "../../src/repositories/user-repository.js";

export function createSilentLogger(): Logger {
  const logger: Logger = {
    child: () => logger,
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
  return logger;
}

/** Accepts exactly the credentials it was given, mapped to their account ids. */
export class StubCredentialVerifier implements CredentialVerifier {
  readonly calls: string[] = [];

  constructor(private readonly accounts: Readonly<Record<string, string>>) {}

  async verify(token: string): Promise<CredentialIdentity | null> {
    this.calls.push(token);
    const accountId = this.accounts[token];
    return accountId ? { accountId, email: null, name: null } : null;
  }
}

export type ScriptedReply = string | Error;

/**
 * Answers from a script, one entry per call; once the script runs out it
 * echoes the message back.
 */
export class ScriptedAssistant implements AssistantGateway {
  readonly kind = "claude-cli" as const;
  readonly requests: CompletionRequest[] = [];
  readonly options: CompletionOptions[] = [];

  constructor(private readonly script: ScriptedReply[] = []) {}

  async complete(
    request: CompletionRequest,
    options: CompletionOptions,
  ): Promise<string> {
    this.requests.push(request);
    this.options.push(options);
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? `echo: ${request.message}`;
  }
}
