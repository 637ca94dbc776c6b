import type { FastifyInstance, FastifyRequest } from "fastify";
import { config } from "../config.js";
import { findUserById, type User } from "../users/service.js";

declare module "fastify" {
  interface FastifyRequest {
    currentUser: User | null;
  }
}

// Matched route patterns that need no session (exact match)
const PUBLIC_ROUTES = new Set(["/", "/login", "/logout", "/health", "/ready"]);

// Route pattern prefixes that need no session
const PUBLIC_PREFIXES = ["/static/"];

// Any signed-in user. Every other matched route needs a restaurant account.
const CUSTOMER_PREFIX = "/customer/";

type Access = "public" | "user" | "restaurant";

/**
 * Access level of a matched route pattern (e.g. `/restaurant/users/delete/:id`).
 * Patterns are what the router matched after decoding, so percent-escapes in
 * the raw URL cannot move a request into a more permissive bucket.
 */
export function routeAccess(pattern: string): Access {
  if (PUBLIC_ROUTES.has(pattern)) return "public";
  if (PUBLIC_PREFIXES.some((prefix) => pattern.startsWith(prefix))) return "public";
  if (pattern.startsWith(CUSTOMER_PREFIX)) return "user";
  return "restaurant";
}

/** Session token from the signed cookie, or null when missing or tampered with. */
export function readSessionToken(req: FastifyRequest): string | null {
  const raw = req.cookies[config.sessionCookieName];
  if (!raw) return null;
  const unsigned = req.unsignCookie(raw);
  return unsigned.valid && unsigned.value ? unsigned.value : null;
}

/** A token pointing at a deleted user resolves to no identity. */
export function resolveUser(app: FastifyInstance, req: FastifyRequest): User | null {
  const token = readSessionToken(req);
  if (!token) return null;
  const userId = app.sessions.resolve(token);
  return userId === null ? null : findUserById(userId);
}

function isAllowed(access: Access, user: User | null): boolean {
  switch (access) {
    case "public":
      return true;
    case "user":
      return user !== null;
    case "restaurant":
      return user?.isRestaurant === true;
  }
}

/**
 * Fastify onRequest hook: resolves the session cookie to req.currentUser and
 * sends anonymous or under-privileged requests back to the login page.
 */
export function registerAuthMiddleware(app: FastifyInstance) {
  app.decorateRequest("currentUser", null);

  app.addHook("onRequest", async (req, reply) => {
    req.currentUser = resolveUser(app, req);

    // No route matched: the not-found handler answers, no handler runs
    const pattern = req.routeOptions.url;
    if (pattern === undefined) return;

    if (!isAllowed(routeAccess(pattern), req.currentUser)) {
      req.log.debug({ route: pattern, userId: req.currentUser?.id ?? null }, "unauthorized, redirecting to login");
      return reply.redirect("/", 303);
    }
  });
}

/**
 * The authenticated user inside a guarded route. The onRequest hook has
 * already redirected anonymous requests, so reaching here without one is a bug.
 */
export function requireUser(req: FastifyRequest): User {
  if (!req.currentUser) {
    throw new Error(`No authenticated user on guarded route ${req.url}`);
  }
  return req.currentUser;
}
