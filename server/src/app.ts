import path from "node:path";
import express, { type Express } from "express";
import {
  AnthropicCredentialVerifier,
  type CredentialVerifier,
} from "./auth/anthropic-credential-verifier.js";
import { SessionStore } from "./auth/session-store.js";
import { loadConfig, type ChatServerConfig } from "./config.js";
import {
  createErrorHandler,
  createNotFoundHandler,
} from "./middleware/error-handler.js";
import { createRequestLogger } from "./middleware/request-logger.js";
import { createSessionAuth } from "./middleware/session-auth.js";
import { createLogger, type Logger } from "./observability/logger.js";
import { ClaudeCliAssistant } from "./providers/claude-cli-provider.js";
import { ClaudeCodeSdkAssistant } from "./providers/claude-code-provider.js";
import type { AssistantGateway } from "./providers/types.js";
import type { ConversationRepository } from "./repositories/conversation-repository.js";
import { InMemoryConversationRepository } from "./repositories/in-memory-conversation-repository.js";
import { InMemoryUserRepository } from "./repositories/in-memory-user-repository.js";
import type { UserRepository } from "./repositories/user-repository.js";
import { createAuthRouter } from "./routes/auth.js";
import { createChatRouter } from "./routes/chat.js";
import { createConversationsRouter } from "./routes/conversations.js";
import { createHealthRouter } from "./routes/health.js";
import { AccountService } from "./services/account-service.js";
import { ChatService } from "./services/chat-service.js";

export interface CreateChatServerAppOptions {
  readonly config?: ChatServerConfig;
  readonly logger?: Logger;
  readonly sessionStore?: SessionStore;
  readonly userRepository?: UserRepository;
  readonly conversationRepository?: ConversationRepository;
  readonly credentialVerifier?: CredentialVerifier;
  readonly assistant?: AssistantGateway;
}

export interface ChatServerApp {
  readonly app: Express;
  readonly sessionStore: SessionStore;
  readonly accounts: AccountService;
}

export function createChatServerApp(
  options: CreateChatServerAppOptions = {},
): ChatServerApp {
  const config = options.config ?? loadConfig();
  const logger =
    options.logger ??
    createLogger({ component: "chat-server" }, { debug: config.debug });

  const sessionStore =
    options.sessionStore ??
    new SessionStore({
      ttlMs: config.sessionDurationHours * 60 * 60 * 1000,
      secret: config.secretKey,
    });

  let conversationRepository = options.conversationRepository;
  let userRepository = options.userRepository;
  if (!conversationRepository || !userRepository) {
    const memoryConversations = new InMemoryConversationRepository({
      listLimit: config.conversationListLimit,
    });
    conversationRepository ??= memoryConversations;
    userRepository ??= new InMemoryUserRepository(memoryConversations);
  }

  const credentialVerifier =
    options.credentialVerifier ??
    new AnthropicCredentialVerifier({ baseUrl: config.anthropicApiBase });
  const assistant = options.assistant ?? createAssistant(config);

  const accounts = new AccountService(
    userRepository,
    sessionStore,
    credentialVerifier,
    logger.child({ component: "accounts" }),
  );
  const chat = new ChatService(
    conversationRepository,
    assistant,
    {
      timeoutSeconds: config.assistantTimeoutSeconds,
      systemPrompt: config.systemPrompt,
    },
    logger.child({ component: "chat" }),
  );
  const auth = createSessionAuth(accounts);

  const app = express();
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(createRequestLogger(logger.child({ component: "http" })));

  app.use(createHealthRouter(sessionStore));
  app.use("/api", createAuthRouter({ accounts, auth }));
  app.use(
    "/api",
    createConversationsRouter({
      conversations: conversationRepository,
      requireSession: auth.requireSession,
    }),
  );
  app.use(
    "/api",
    createChatRouter({ chat, requireSession: auth.requireSession }),
  );
  app.use("/api", createNotFoundHandler());

  if (config.portalDistDir) {
    const root = path.resolve(config.portalDistDir);
    app.use(express.static(root));
    app.get("/{*path}", (_req, res) => {
      res.sendFile(path.join(root, "index.html"));
    });
  }

  app.use(createErrorHandler(logger.child({ component: "http" })));

  return { app, sessionStore, accounts };
}

export function createAssistant(config: ChatServerConfig): AssistantGateway {
  if (config.assistantDriver === "sdk") {
    return new ClaudeCodeSdkAssistant({ model: config.claudeModel });
  }
  return new ClaudeCliAssistant({
    binary: config.claudeBinary,
    model: config.claudeModel,
  });
}
