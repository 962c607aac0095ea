import { createHash } from "node:crypto";
import { UpstreamError } from "../errors.js";
import { isOAuthToken, type CredentialKind } from "../providers/credentials.js";
import type { CredentialIdentity } from "../repositories/user-repository.js";

export interface CredentialVerifier {
  /**
   * Resolves the identity behind a provider credential, or `null` when the
   * provider rejects it. Throws `UpstreamError` when the provider cannot be
   * asked at all.
   */
  verify(token: string): Promise<CredentialIdentity | null>;
}

export interface AnthropicCredentialVerifierOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly probeModel?: string;
}

const ANTHROPIC_VERSION = "2023-06-01";
const OAUTH_BETA = "oauth-2025-04-20";

/**
 * Checks a credential with a one-token Messages API call. API keys go in
 * `x-api-key`; OAuth tokens as a bearer token with the OAuth beta header.
 */
export class AnthropicCredentialVerifier implements CredentialVerifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly probeModel: string;

  constructor(options: AnthropicCredentialVerifierOptions = {}) {
    this.baseUrl = (options.baseUrl ?? "https://api.anthropic.com").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.probeModel = options.probeModel ?? "claude-sonnet-4-20250514";
  }

  async verify(token: string): Promise<CredentialIdentity | null> {
    const trimmed = token.trim();
    if (!trimmed) {
      return null;
    }

    if (isOAuthToken(trimmed)) {
      return this.probe(trimmed, "oauth");
    }
    if (trimmed.startsWith("sk-ant-")) {
      return this.probe(trimmed, "api-key");
    }
    return (await this.probe(trimmed, "api-key")) ?? this.probe(trimmed, "oauth");
  }

  private async probe(
    token: string,
    kind: CredentialKind,
  ): Promise<CredentialIdentity | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    try {
      const response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "anthropic-version": ANTHROPIC_VERSION,
          ...(kind === "oauth"
            ? { authorization: `Bearer ${token}`, "anthropic-beta": OAUTH_BETA }
            : { "x-api-key": token }),
        },
        body: JSON.stringify({
          model: this.probeModel,
          max_tokens: 1,
          messages: [{ role: "user", content: "hi" }],
        }),
        signal: controller.signal,
      });
      status = response.status;
      await response.body?.cancel();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Could not reach the assistant provider: ${reason}`);
    } finally {
      clearTimeout(timeout);
    }

    if (status === 200) {
      return toIdentity(token, kind);
    }
    if (status === 429 || status >= 500) {
      throw new UpstreamError(`Assistant provider unavailable (status ${status})`);
    }
    return null;
  }
}

/** Stable account id: the credential is never stored, only its digest. */
export function toIdentity(
  token: string,
  kind: CredentialKind,
): CredentialIdentity {
  const digest = createHash("sha256").update(token).digest("hex");
  return {
    accountId: kind === "oauth" ? `oauth_${digest.slice(0, 28)}` : digest.slice(0, 32),
    email: null,
    name: null,
  };
}
