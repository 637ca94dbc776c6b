import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config.js";
import { readForm, usernameField } from "./forms.js";
import { readSessionToken } from "../middleware/auth.js";
import { createUser, findUserByUsername, type User } from "../users/service.js";
import { LOGIN_ERROR, renderLogin } from "../views/pages.js";

const loginForm = z.object({
  username: usernameField,
  password: z.string().min(1),
  // "true" marks a customer login; anything else is treated as a restaurant login
  is_student: z.string().optional(),
});

/**
 * Customer logins with an unknown username sign the customer up on the spot.
 * Every other failure is reported the same way.
 */
function authenticate(username: string, password: string, isCustomerLogin: boolean): User | null {
  const existing = findUserByUsername(username);

  if (!existing) {
    if (!isCustomerLogin) return null;
    // Lost a signup race for the same name: fall back to a normal login
    return createUser(username, password, false) ?? authenticate(username, password, false);
  }

  return existing.password === password ? existing : null;
}

export function registerAuthRoutes(app: FastifyInstance) {
  app.get("/", async (_req, reply) => {
    return reply.type("text/html").send(renderLogin());
  });

  app.post("/login", async (req, reply) => {
    const { fields } = await readForm(req);
    const parsed = loginForm.safeParse(fields);

    const user = parsed.success
      ? authenticate(parsed.data.username, parsed.data.password, parsed.data.is_student === "true")
      : null;

    if (!user) {
      req.log.info({ username: fields.username ?? null }, "login failed");
      return reply.type("text/html").send(renderLogin({ error: LOGIN_ERROR }));
    }

    const previous = readSessionToken(req);
    if (previous) app.sessions.destroy(previous);

    const token = app.sessions.create(user.id);
    reply.setCookie(config.sessionCookieName, token, {
      path: "/",
      httpOnly: true,
      sameSite: "lax",
      signed: true,
      secure: config.nodeEnv === "production",
    });

    req.log.info({ userId: user.id, isRestaurant: user.isRestaurant }, "login succeeded");
    return reply.redirect(user.isRestaurant ? "/restaurant/dashboard" : "/customer/menu", 303);
  });

  app.get("/logout", async (req, reply) => {
    const token = readSessionToken(req);
    if (token) app.sessions.destroy(token);
    reply.clearCookie(config.sessionCookieName, { path: "/" });
    return reply.redirect("/", 303);
  });
}
