import http from "http";
import { afterEach, describe, expect, it } from "vitest";
import { quietLogger } from "../../lib/testing/providerStubs.js";
import { GatewayServer } from "./GatewayServer.js";
import { jsonResponse } from "./responses.js";
import type { RouteHandler } from "./router.js";

const serverConfig = {
  port: 0,
  host: "127.0.0.1",
  corsOrigin: "https://client.test",
  maxUploadBytes: 10,
};

interface RawReply {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

/**
 * POST without a Content-Length, so the body arrives chunked
 */
function postChunked(port: number, chunks: string[]): Promise<RawReply> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: "127.0.0.1", port, method: "POST", path: "/echo" },
      (res) => {
        const parts: Buffer[] = [];
        res.on("data", (chunk: Buffer) => parts.push(chunk));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(parts).toString("utf8"),
          })
        );
      }
    );
    req.on("error", reject);
    for (const chunk of chunks) req.write(chunk);
    req.end();
  });
}

describe("GatewayServer", () => {
  let server: GatewayServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  async function start(handler: RouteHandler): Promise<string> {
    server = new GatewayServer(handler, serverConfig, quietLogger());
    await server.listen();
    return `http://127.0.0.1:${server.port}`;
  }

  it("passes a JSON body through to the handler and writes its response", async () => {
    const base = await start(async (request) => jsonResponse(await request.json(), 201));

    const response = await fetch(`${base}/echo`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"a":1}',
    });

    expect(response.status).toBe(201);
    expect(response.headers.get("content-type")).toBe("application/json");
    expect(await response.json()).toEqual({ a: 1 });
  });

  it("answers 413 when the declared body is too large", async () => {
    let called = false;
    const base = await start(async () => {
      called = true;
      return jsonResponse({});
    });

    const response = await fetch(`${base}/echo`, { method: "POST", body: "x".repeat(20) });

    expect(response.status).toBe(413);
    expect(response.headers.get("access-control-allow-origin")).toBe("https://client.test");
    expect(await response.json()).toEqual({ detail: "Request body exceeds 10 bytes" });
    expect(called).toBe(false);
  });

  it("answers 413 when a chunked body grows past the limit", async () => {
    const base = await start(async () => jsonResponse({}));
    const port = Number(new URL(base).port);

    const reply = await postChunked(port, ["0123456789", "abcdef"]);

    expect(reply.status).toBe(413);
    expect(reply.headers["access-control-allow-origin"]).toBe("https://client.test");
    expect(JSON.parse(reply.body)).toEqual({ detail: "Request body exceeds 10 bytes" });
  });

  it("answers 500 when the handler itself fails", async () => {
    const base = await start(async () => {
      throw new Error("handler crashed");
    });

    const response = await fetch(`${base}/echo`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Internal server error" });
  });

  it("drops the connection when the body fails after the status line is committed", async () => {
    const base = await start(
      async () =>
        new Response(
          new ReadableStream({
            start(controller) {
              controller.error(new Error("stream broke"));
            },
          }),
          { status: 200 }
        )
    );

    await expect(fetch(`${base}/broken`)).rejects.toThrow();
  });

  it("aborts the request signal when the client disconnects", async () => {
    let entered: () => void = () => undefined;
    const handlerEntered = new Promise<void>((resolve) => {
      entered = resolve;
    });
    let aborted: (reason: string) => void = () => undefined;
    const signalAborted = new Promise<string>((resolve) => {
      aborted = resolve;
    });

    const base = await start(
      (request) =>
        new Promise<Response>((resolve) => {
          request.signal.addEventListener("abort", () => {
            aborted("aborted");
            resolve(jsonResponse({ late: true }));
          });
          entered();
        })
    );
    const port = Number(new URL(base).port);

    const clientErrors: Error[] = [];
    const req = http.request({ host: "127.0.0.1", port, method: "GET", path: "/slow" });
    req.on("error", (error) => clientErrors.push(error));
    req.end();

    await handlerEntered;
    req.destroy();

    await expect(signalAborted).resolves.toBe("aborted");
  });
});
