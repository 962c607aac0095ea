import type { Server } from "node:http";
import type { Express } from "express";

export async function withHttpServer(
  app: Express,
  run: (baseUrl: string) => Promise<void>,
): Promise<void> {
  const server = await listenOnRandomPort(app);
  const address = server.address();
  if (!address || typeof address === "string") {
    await closeServer(server);
    throw new Error("failed to resolve http server address");
  }

  const baseUrl = `http://127.0.0.1:${address.port}`;
  try {
    await run(baseUrl);
  } finally {
    await closeServer(server);
  }
}

export interface ApiRequest {
  readonly method?: "GET" | "POST" | "PATCH" | "DELETE";
  readonly token?: string;
  readonly body?: unknown;
}

/** JSON request against the API; `body` is sent verbatim when it is a string. */
export function apiRequest(
  baseUrl: string,
  path: string,
  request: ApiRequest = {},
): Promise<Response> {
  const headers: Record<string, string> = {};
  if (request.token) {
    headers.authorization = `Bearer ${request.token}`;
  }
  let body: string | undefined;
  if (request.body !== undefined) {
    headers["content-type"] = "application/json";
    body =
      typeof request.body === "string" ? request.body : JSON.stringify(request.body);
  }
  return fetch(`${baseUrl}${path}`, {
    method: request.method ?? (body === undefined ? "GET" : "POST"),
    headers,
    body,
  });
}

function listenOnRandomPort(app: Express): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", () => resolve(server));
    server.on("error", reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
