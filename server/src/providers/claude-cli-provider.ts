import { AssistantTimeoutError, UpstreamError } from "../errors.js";
import { runCommand, type CommandRunner } from "./command-runner.js";
import { credentialEnv } from "./credentials.js";
import { toAssistantFailure } from "./failure.js";
import { buildPrompt } from "./prompt.js";
import type {
  AssistantGateway,
  CompletionOptions,
  CompletionRequest,
} from "./types.js";

export interface ClaudeCliAssistantOptions {
  readonly binary?: string;
  readonly model?: string;
  readonly baseEnv?: NodeJS.ProcessEnv;
  readonly runner?: CommandRunner;
}

/** Claude Code in print mode: one process per turn, prompt as argument. */
export class ClaudeCliAssistant implements AssistantGateway {
  readonly kind = "claude-cli" as const;

  private readonly binary: string;
  private readonly model?: string;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly runner: CommandRunner;

  constructor(options: ClaudeCliAssistantOptions = {}) {
    this.binary = options.binary ?? "claude";
    this.model = options.model;
    this.baseEnv = options.baseEnv ?? process.env;
    this.runner = options.runner ?? runCommand;
  }

  async complete(
    request: CompletionRequest,
    options: CompletionOptions,
  ): Promise<string> {
    const prompt = buildPrompt({
      systemPrompt: options.systemPrompt,
      history: request.history,
      message: request.message,
    });

    const args = ["-p", prompt];
    if (this.model) {
      args.push("--model", this.model);
    }

    const result = await this.runner({
      file: this.binary,
      args,
      env: {
        ...this.baseEnv,
        ...credentialEnv(request.credential),
      },
      timeoutMs: options.timeoutSeconds * 1000,
    });

    if (result.timedOut) {
      throw new AssistantTimeoutError();
    }

    if (result.spawnErrorCode === "ENOENT") {
      throw new UpstreamError("Claude Code CLI not found. Please install it first.");
    }

    if (result.spawnErrorCode || result.exitCode !== 0) {
      throw toAssistantFailure(result.stderr || result.stdout);
    }

    const reply = result.stdout.trim();
    if (reply.length === 0) {
      throw new UpstreamError("Claude Code returned an empty reply");
    }
    return reply;
  }
}
