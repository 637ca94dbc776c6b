import type { FastifyInstance } from "fastify";
import { readForm } from "./forms.js";
import { requireUser } from "../middleware/auth.js";
import { parseOrderRequest } from "../orders/request.js";
import { listOrders, placeOrder } from "../orders/service.js";
import { renderDashboard, renderOrderHistory } from "../views/pages.js";

export function registerOrderRoutes(app: FastifyInstance) {
  // All orders from all customers, most recent first
  app.get("/restaurant/dashboard", async (req, reply) => {
    const user = requireUser(req);
    return reply.type("text/html").send(renderDashboard({ user, orders: listOrders() }));
  });

  app.post("/customer/order", async (req, reply) => {
    const user = requireUser(req);
    const { fields } = await readForm(req);

    const order = placeOrder(user.id, parseOrderRequest(fields));
    if (!order) {
      return reply.redirect("/customer/menu", 303);
    }

    req.log.info(
      { orderId: order.id, userId: user.id, lines: order.lines.length, totalPrice: order.totalPrice },
      "order placed",
    );
    return reply.redirect("/customer/orders", 303);
  });

  app.get("/customer/orders", async (req, reply) => {
    const user = requireUser(req);
    return reply.type("text/html").send(renderOrderHistory({ user, orders: listOrders({ userId: user.id }) }));
  });
}
