/**
 * Gateway HTTP Server
 * Adapts Node's http server to the web Request/Response route handlers
 */

import http from "http";
import { errorMessage, type Logger } from "../../lib/logging/logger.js";
import type { ServerConfig } from "../../lib/config/env.js";
import type { RouteHandler } from "./router.js";

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

export class GatewayServer {
  private server: http.Server;

  constructor(
    private readonly handler: RouteHandler,
    private readonly config: ServerConfig,
    private readonly logger: Logger
  ) {
    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        this.logger.error("Failed to write response", { error: errorMessage(error) });
        if (res.headersSent) {
          res.destroy();
          return;
        }
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ detail: "Internal server error" }));
      });
    });
  }

  listen(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(this.config.port, this.config.host, () => {
        this.logger.info(`HTTP server listening on http://${this.config.host}:${this.port}`);
        resolve();
      });
    });
  }

  /**
   * Bound port, which differs from the configured one when that is 0
   */
  get port(): number {
    const address = this.server.address();
    return typeof address === "object" && address !== null ? address.port : this.config.port;
  }

  /**
   * Handle an HTTP request
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    // Abort the provider call if the client goes away before we answer
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    let body: Buffer | undefined;
    try {
      body = await this.readBody(req);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        res.writeHead(413, {
          "Content-Type": "application/json",
          "Access-Control-Allow-Origin": this.config.corsOrigin,
        });
        res.end(JSON.stringify({ detail: error.message }));
        return;
      }
      throw error;
    }

    const request = new Request(`http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`, {
      method: req.method ?? "GET",
      headers: toHeaders(req.headers),
      body,
      signal: controller.signal,
    });

    const response = await this.handler(request);
    // Client already gone
    if (controller.signal.aborted) {
      return;
    }

    res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
    res.end(Buffer.from(await response.arrayBuffer()));
  }

  private readBody(req: http.IncomingMessage): Promise<Buffer | undefined> {
    if (req.method === "GET" || req.method === "HEAD" || req.method === "OPTIONS") {
      req.resume();
      return Promise.resolve(undefined);
    }

    const limit = this.config.maxUploadBytes;
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      return Promise.reject(new PayloadTooLargeError(limit));
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let received = 0;
      let rejected = false;
      req.on("data", (chunk: Buffer) => {
        if (rejected) return;
        received += chunk.length;
        if (received > limit) {
          rejected = true;
          reject(new PayloadTooLargeError(limit));
          return;
        }
        chunks.push(chunk);
      });
      req.on("end", () => {
        if (!rejected) resolve(Buffer.concat(chunks));
      });
      req.on("error", reject);
    });
  }

  /**
   * Close the server
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function toHeaders(incoming: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }
  return headers;
}
