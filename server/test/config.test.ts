import { describe, expect, test } from "vitest";
import { DEFAULT_SYSTEM_PROMPT, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  test("should apply defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      host: "0.0.0.0",
      port: 5007,
      debug: false,
      assistantTimeoutSeconds: 120,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      sessionDurationHours: 24,
      storage: "memory",
      assistantDriver: "cli",
      claudeBinary: "claude",
      anthropicApiBase: "https://api.anthropic.com",
      conversationListLimit: 50,
      jsonBodyLimit: "2mb",
    });
    expect(config.claudeModel).toBeUndefined();
    expect(config.portalDistDir).toBeUndefined();
    expect(config.secretKey).toMatch(/^[0-9a-f]{48}$/);
  });

  test("should read overrides from the environment", () => {
    const config = loadConfig({
      HOST: "127.0.0.1",
      PORT: "8080",
      DEBUG: "True",
      CLAUDE_TIMEOUT: "45",
      SYSTEM_PROMPT: "Answer in haiku.",
      SECRET_KEY: "test-secret",
      SESSION_DURATION_HOURS: "1.5",
      STORAGE: "postgres",
      ASSISTANT_DRIVER: "sdk",
      CLAUDE_BINARY: "/opt/bin/claude",
      CLAUDE_MODEL: "opus",
      ANTHROPIC_API_BASE: "http://127.0.0.1:9000//",
      PORTAL_DIST_DIR: "portal/dist",
      CONVERSATION_LIST_LIMIT: "10",
      JSON_BODY_LIMIT: "512kb",
    });

    expect(config).toEqual({
      host: "127.0.0.1",
      port: 8080,
      debug: true,
      assistantTimeoutSeconds: 45,
      systemPrompt: "Answer in haiku.",
      secretKey: "test-secret",
      sessionDurationHours: 1.5,
      storage: "postgres",
      assistantDriver: "sdk",
      claudeBinary: "/opt/bin/claude",
      claudeModel: "opus",
      anthropicApiBase: "http://127.0.0.1:9000",
      portalDistDir: "portal/dist",
      conversationListLimit: 10,
      jsonBodyLimit: "512kb",
    });
  });

  test("should fall back on invalid numbers", () => {
    const config = loadConfig({
      PORT: "not-a-port",
      CLAUDE_TIMEOUT: "-5",
      SESSION_DURATION_HOURS: "0",
      CONVERSATION_LIST_LIMIT: "2.5",
    });

    expect(config.port).toBe(5007);
    expect(config.assistantTimeoutSeconds).toBe(120);
    expect(config.sessionDurationHours).toBe(24);
    expect(config.conversationListLimit).toBe(50);
  });
});
