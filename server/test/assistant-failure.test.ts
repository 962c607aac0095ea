import { describe, expect, test } from "vitest";
import { InvalidCredentialError, UpstreamError } from "../src/errors.js";
import { credentialEnv, isOAuthToken } from "../src/providers/credentials.js";
import { isAuthFailure, toAssistantFailure } from "../src/providers/failure.js";

describe("assistant failures", () => {
  test.each([
    "Invalid API key · Please run /login",
    "API Error: 401 {\"type\":\"error\"}",
    "authentication_error: invalid x-api-key",
    "OAuth token has expired",
    "permission_error: not allowed",
  ])("should treat %j as a rejected credential", (text) => {
    expect(isAuthFailure(text)).toBe(true);
    const failure = toAssistantFailure(text);
    expect(failure).toBeInstanceOf(InvalidCredentialError);
    expect(failure.message).toBe(
      "The assistant rejected your credential. Please log in again.",
    );
  });

  test("should pass other failures through as upstream errors", () => {
    const failure = toAssistantFailure("  model overloaded, retry later \n");
    expect(failure).toBeInstanceOf(UpstreamError);
    expect(failure.message).toBe("model overloaded, retry later");
    expect(isAuthFailure("status 4010 received")).toBe(false);
  });

  test("should describe a silent failure", () => {
    expect(toAssistantFailure("   ").message).toBe("Claude Code failed");
  });
});

describe("credentialEnv", () => {
  test("should route oauth tokens and api keys to their variables", () => {
    expect(isOAuthToken("sk-ant-oat01-test")).toBe(true);
    expect(isOAuthToken("ant-oa-test")).toBe(true);
    expect(credentialEnv("sk-ant-oat01-test")).toEqual({
      CLAUDE_CODE_OAUTH_TOKEN: "sk-ant-oat01-test",
    });
    expect(credentialEnv("sk-ant-api03-test")).toEqual({
      ANTHROPIC_API_KEY: "sk-ant-api03-test",
    });
    expect(credentialEnv(undefined)).toEqual({});
  });
});
