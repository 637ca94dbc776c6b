import type { FastifyInstance } from "fastify";
import { requireUser } from "../middleware/auth.js";
import { getMenuSettings, listMenuItems } from "../menu/service.js";
import { renderCustomerMenu } from "../views/pages.js";

export function registerCustomerMenuRoutes(app: FastifyInstance) {
  // Open to both roles
  app.get("/customer/menu", async (req, reply) => {
    const user = requireUser(req);
    const settings = getMenuSettings();
    return reply.type("text/html").send(
      renderCustomerMenu({ user, items: listMenuItems(), fullMenuImage: settings.fullMenuImage }),
    );
  });
}
