export type CredentialKind = "api-key" | "oauth";

export function isOAuthToken(token: string): boolean {
  return token.startsWith("ant-oa-") || token.startsWith("sk-ant-oa");
}

/** Environment variables that make Claude Code run under `credential`. */
export function credentialEnv(
  credential: string | undefined,
): Record<string, string> {
  if (!credential) {
    return {};
  }
  return isOAuthToken(credential)
    ? { CLAUDE_CODE_OAUTH_TOKEN: credential }
    : { ANTHROPIC_API_KEY: credential };
}
