import type { z } from "zod";
import {
  chatResponseSchema,
  conversationDetailResponseSchema,
  conversationListResponseSchema,
  conversationResponseSchema,
  errorBodySchema,
  loginResponseSchema,
  meResponseSchema,
  successResponseSchema,
  type ChatReply,
  type ConversationDetail,
  type ConversationSummary,
  type UserSummary,
} from "./types";

export const SESSION_TOKEN_KEY = "session_token";

export const CONNECTION_ERROR_MESSAGE = "Connection error. Please try again.";

/** The part of `Storage` the client needs; `window.localStorage` fits. */
export interface TokenStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** The server answered with `{ success: false, error }` or an unusable body. */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/** The server could not be reached at all. */
export class ConnectionError extends Error {
  constructor(options?: { cause?: unknown }) {
    super(CONNECTION_ERROR_MESSAGE, options);
    this.name = "ConnectionError";
  }
}

export function isUnauthorized(error: unknown): boolean {
  return error instanceof ApiError && error.status === 401;
}

export interface ChatApi {
  hasSession(): boolean;
  login(credential: string): Promise<UserSummary>;
  logout(): Promise<void>;
  me(): Promise<UserSummary | null>;
  listConversations(): Promise<ConversationSummary[]>;
  createConversation(title?: string): Promise<ConversationSummary>;
  getConversation(id: string): Promise<ConversationDetail>;
  renameConversation(id: string, title: string): Promise<ConversationSummary>;
  deleteConversation(id: string): Promise<void>;
  sendMessage(message: string, conversationId: string | null): Promise<ChatReply>;
}

export interface ApiClientOptions {
  readonly baseUrl?: string;
  readonly storage: TokenStorage;
  readonly fetch?: FetchLike;
}

interface RequestOptions {
  readonly method?: "GET" | "POST" | "PATCH" | "DELETE";
  readonly body?: unknown;
}

export function createApiClient(options: ApiClientOptions): ChatApi {
  const baseUrl = (options.baseUrl ?? "").replace(/\/+$/, "");
  const storage = options.storage;
  const fetchImpl: FetchLike =
    options.fetch ?? ((input, init) => globalThis.fetch(input, init));

  async function request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: RequestOptions = {},
  ): Promise<z.infer<S>> {
    const headers: Record<string, string> = {};
    const token = storage.getItem(SESSION_TOKEN_KEY);
    if (token) {
      headers.authorization = `Bearer ${token}`;
    }
    if (init.body !== undefined) {
      headers["content-type"] = "application/json";
    }

    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}${path}`, {
        method: init.method ?? "GET",
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
      });
    } catch (error) {
      throw new ConnectionError({ cause: error });
    }

    if (response.status === 401) {
      storage.removeItem(SESSION_TOKEN_KEY);
    }

    const payload = await readJson(response);
    if (!response.ok) {
      const failure = errorBodySchema.safeParse(payload);
      throw new ApiError(
        failure.success ? failure.data.error : `Request failed (${response.status})`,
        response.status,
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ApiError("Unexpected response from server", response.status);
    }
    return parsed.data;
  }

  return {
    hasSession: () => Boolean(storage.getItem(SESSION_TOKEN_KEY)),

    async login(credential) {
      const body = await request("/api/auth/login", loginResponseSchema, {
        method: "POST",
        body: { token: credential },
      });
      storage.setItem(SESSION_TOKEN_KEY, body.session_token);
      return body.user;
    },

    async logout() {
      try {
        await request("/api/auth/logout", successResponseSchema, { method: "POST" });
      } finally {
        storage.removeItem(SESSION_TOKEN_KEY);
      }
    },

    async me() {
      if (!storage.getItem(SESSION_TOKEN_KEY)) {
        return null;
      }
      const body = await request("/api/auth/me", meResponseSchema);
      if (!body.authenticated || !body.user) {
        storage.removeItem(SESSION_TOKEN_KEY);
        return null;
      }
      return body.user;
    },

    async listConversations() {
      const body = await request("/api/conversations", conversationListResponseSchema);
      return body.conversations;
    },

    async createConversation(title) {
      const body = await request("/api/conversations", conversationResponseSchema, {
        method: "POST",
        body: title === undefined ? {} : { title },
      });
      return body.conversation;
    },

    async getConversation(id) {
      const body = await request(
        `/api/conversations/${encodeURIComponent(id)}`,
        conversationDetailResponseSchema,
      );
      return body.conversation;
    },

    async renameConversation(id, title) {
      const body = await request(
        `/api/conversations/${encodeURIComponent(id)}`,
        conversationResponseSchema,
        { method: "PATCH", body: { title } },
      );
      return body.conversation;
    },

    async deleteConversation(id) {
      await request(`/api/conversations/${encodeURIComponent(id)}`, successResponseSchema, {
        method: "DELETE",
      });
    },

    async sendMessage(message, conversationId) {
      const body = await request("/api/chat", chatResponseSchema, {
        method: "POST",
        body: { message, conversation_id: conversationId },
      });
      return { reply: body.response, conversationId: body.conversation_id };
    },
  };
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
