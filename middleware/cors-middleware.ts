import type { Context, MiddlewareHandler, Next } from "hono";

/**
 * CORS middleware for Hono that handles preflight requests and sets CORS
 * headers for the configured origins. Requests from other origins get no
 * Allow-Origin header, so browsers block them.
 */
export function corsMiddleware(allowedOrigins: readonly string[]): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin");

    if (origin && allowedOrigins.includes(origin)) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Access-Control-Allow-Credentials", "true");
      c.header("Vary", "Origin");
    }

    c.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    c.header(
      "Access-Control-Allow-Headers",
      c.req.header("Access-Control-Request-Headers") ??
        "Content-Type, Authorization, Accept"
    );
    c.header("Access-Control-Max-Age", "86400"); // 24 hours

    // Handle preflight OPTIONS requests
    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  };
}
