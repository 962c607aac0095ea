import { randomBytes } from "node:crypto";

export type StorageKind = "memory" | "postgres";
export type AssistantDriver = "cli" | "sdk";

export interface ChatServerConfig {
  readonly host: string;
  readonly port: number;
  readonly debug: boolean;
  readonly assistantTimeoutSeconds: number;
  readonly systemPrompt: string;
  readonly secretKey: string;
  readonly sessionDurationHours: number;
  readonly storage: StorageKind;
  readonly assistantDriver: AssistantDriver;
  readonly claudeBinary: string;
  readonly claudeModel?: string;
  readonly anthropicApiBase: string;
  readonly portalDistDir?: string;
  readonly conversationListLimit: number;
  /** Largest JSON request body, in body-parser's size notation. */
  readonly jsonBodyLimit: string;
}

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Be concise and clear.";

type Env = Readonly<Record<string, string | undefined>>;

export function loadConfig(env: Env = process.env): ChatServerConfig {
  return {
    host: nonEmpty(env.HOST) ?? "0.0.0.0",
    port: parsePositiveInteger(env.PORT, 5007),
    debug: parseFlag(env.DEBUG),
    assistantTimeoutSeconds: parsePositiveInteger(env.CLAUDE_TIMEOUT, 120),
    systemPrompt: nonEmpty(env.SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
    secretKey: nonEmpty(env.SECRET_KEY) ?? randomBytes(24).toString("hex"),
    sessionDurationHours: parsePositiveNumber(env.SESSION_DURATION_HOURS, 24),
    storage: env.STORAGE === "postgres" ? "postgres" : "memory",
    assistantDriver: env.ASSISTANT_DRIVER === "sdk" ? "sdk" : "cli",
    claudeBinary: nonEmpty(env.CLAUDE_BINARY) ?? "claude",
    claudeModel: nonEmpty(env.CLAUDE_MODEL),
    anthropicApiBase: (
      nonEmpty(env.ANTHROPIC_API_BASE) ?? "https://api.anthropic.com"
    ).replace(/\/+$/, ""),
    portalDistDir: nonEmpty(env.PORTAL_DIST_DIR),
    conversationListLimit: parsePositiveInteger(env.CONVERSATION_LIST_LIMIT, 50),
    jsonBodyLimit: nonEmpty(env.JSON_BODY_LIMIT) ?? "2mb",
  };
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

function parseFlag(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() === "true";
}

function parsePositiveNumber(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  const value = parsePositiveNumber(raw, fallback);
  return Number.isInteger(value) ? value : fallback;
}
