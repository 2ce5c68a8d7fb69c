// Liveness endpoint for hosts that put idle processes to sleep

import { createServer, type Server, type ServerResponse } from "node:http";
import { log } from "./log.js";
import type { StoreStatus } from "./model.js";

export interface KeepAliveOptions {
  port: number;
  host?: string;
  service?: string;
  /** Knowledge store status included in /health. */
  status?: () => StoreStatus;
}

function sendJson(res: ServerResponse, code: number, body: unknown): void {
  res.writeHead(code, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body, null, 2));
}

export function createKeepAliveServer(options: Omit<KeepAliveOptions, "port" | "host">): Server {
  const service = options.service ?? "Employee Knowledge Bot";
  const startedAt = Date.now();

  return createServer((req, res) => {
    const timestamp = new Date().toISOString();
    const path = (req.url ?? "/").split("?")[0];
    log.debug(`keep-alive ${req.method ?? "GET"} ${path}`);

    if (req.method !== "GET" && req.method !== "HEAD") {
      sendJson(res, 405, { error: "Method Not Allowed", timestamp });
    } else if (path === "/") {
      sendJson(res, 200, {
        status: "alive",
        service,
        timestamp,
        message: "Bot is running",
      });
    } else if (path === "/health") {
      const body: Record<string, unknown> = {
        status: "healthy",
        timestamp,
        uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      };
      if (options.status) body["knowledge"] = options.status();
      sendJson(res, 200, body);
    } else {
      sendJson(res, 404, { error: "Not Found", timestamp });
    }
  });
}

/** Resolves once the server is listening. */
export function startKeepAlive(options: KeepAliveOptions): Promise<Server> {
  const server = createKeepAliveServer(options);
  const host = options.host ?? "0.0.0.0";
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, host, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : options.port;
      log.info(`keep-alive server listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}
