/**
 * Route dispatch over web-standard Request/Response
 *
 * Applies CORS headers, answers preflight requests and turns unknown routes and
 * escaped exceptions into `{ detail }` error bodies.
 */

import { errorMessage, type Logger } from "../../lib/logging/logger.js";
import { errorResponse } from "./responses.js";

export type RouteHandler = (request: Request) => Promise<Response>;

export interface Route {
  method: "GET" | "POST";
  path: string;
  handler: RouteHandler;
}

export interface RouterOptions {
  corsOrigin: string;
  logger: Logger;
}

export function createRouter(routes: Route[], options: RouterOptions): RouteHandler {
  const { corsOrigin, logger } = options;

  return async (request) => {
    const startedAt = Date.now();
    const { pathname } = new URL(request.url);
    let response: Response;

    if (request.method === "OPTIONS") {
      response = new Response(null, { status: 204 });
    } else {
      const route = routes.find((r) => r.method === request.method && r.path === pathname);
      if (!route) {
        response = routes.some((r) => r.path === pathname)
          ? errorResponse(405, "Method not allowed")
          : errorResponse(404, "Not found");
      } else {
        try {
          response = await route.handler(request);
        } catch (error) {
          logger.error("Unhandled route error", { path: pathname, error: errorMessage(error) });
          response = errorResponse(500, errorMessage(error));
        }
      }
    }

    response.headers.set("Access-Control-Allow-Origin", corsOrigin);
    response.headers.set("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    response.headers.set("Access-Control-Allow-Headers", "Content-Type, X-Session-Id");
    response.headers.set("Access-Control-Expose-Headers", "X-Session-Id");

    logger.log("http_request", {
      method: request.method,
      path: pathname,
      status: response.status,
      elapsedMs: Date.now() - startedAt,
    });
    return response;
  };
}
