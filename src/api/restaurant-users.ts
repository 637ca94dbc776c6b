import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config.js";
import { readForm, parseId, usernameField } from "./forms.js";
import { requireUser } from "../middleware/auth.js";
import { createUser, deleteUser, listUsers, updatePassword } from "../users/service.js";
import { renderUsers } from "../views/pages.js";

const addUserForm = z.object({
  username: usernameField,
  password: z.string().min(1),
  is_restaurant: z.string().default("false"),
});

const passwordForm = z.object({
  password: z.string().min(1),
  confirm_password: z.string(),
});

const USERS_PAGE = "/restaurant/users";

export function registerRestaurantUserRoutes(app: FastifyInstance) {
  app.get("/restaurant/users", async (req, reply) => {
    const user = requireUser(req);
    return reply.type("text/html").send(renderUsers({ user, users: listUsers() }));
  });

  app.post("/restaurant/users/add", async (req, reply) => {
    const { fields } = await readForm(req);
    const parsed = addUserForm.safeParse(fields);
    if (!parsed.success) {
      return reply.redirect(USERS_PAGE, 303);
    }

    const isRestaurant = parsed.data.is_restaurant.toLowerCase() === "true";
    const created = createUser(parsed.data.username, parsed.data.password, isRestaurant);
    if (created) {
      req.log.info({ userId: created.id, isRestaurant }, "user created");
    } else {
      req.log.info({ username: parsed.data.username }, "user not created, username taken");
    }
    return reply.redirect(USERS_PAGE, 303);
  });

  // Mismatched confirmation is a silent no-op
  app.post("/restaurant/users/update/:id", async (req, reply) => {
    const id = parseId(req.params);
    const { fields } = await readForm(req);
    const parsed = passwordForm.safeParse(fields);

    if (id !== null && parsed.success && parsed.data.password === parsed.data.confirm_password) {
      if (updatePassword(id, parsed.data.password)) {
        req.log.info({ userId: id }, "password updated");
      }
    }
    return reply.redirect(USERS_PAGE, 303);
  });

  app.get("/restaurant/users/delete/:id", async (req, reply) => {
    const id = parseId(req.params);
    if (id !== null && deleteUser(id, config.deletePolicy)) {
      req.log.info({ userId: id, policy: config.deletePolicy }, "user deleted");
    }
    return reply.redirect(USERS_PAGE, 303);
  });
}
