import { InvalidCredentialError, UpstreamError } from "../errors.js";

const AUTH_FAILURE_PATTERN =
  /invalid api key|invalid x-api-key|authentication[_ ]error|unauthorized|\b401\b|\b403\b|oauth token (?:has )?expired|please run \/login|permission[_ ]error/i;

export function isAuthFailure(text: string): boolean {
  return AUTH_FAILURE_PATTERN.test(text);
}

export function toAssistantFailure(
  text: string,
): InvalidCredentialError | UpstreamError {
  const detail = text.trim() || "Claude Code failed";
  if (isAuthFailure(detail)) {
    return new InvalidCredentialError(
      "The assistant rejected your credential. Please log in again.",
    );
  }
  return new UpstreamError(detail);
}
