import type { FastifyInstance } from "fastify";
import { getDb, isDatabaseOpen } from "../db/index.js";

export const SERVICE_NAME = "restaurant-ordering-server";
export const SERVICE_VERSION = "0.1.0";

export function registerHealthRoutes(app: FastifyInstance) {
  app.get("/health", async () => {
    return {
      status: "ok",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
    };
  });

  app.get("/ready", async (_req, reply) => {
    if (!isDatabaseOpen()) {
      reply.status(503);
      return { ready: false };
    }
    getDb().prepare("SELECT 1").get();
    return { ready: true };
  });
}
