import Fastify from "fastify";
import cookie from "@fastify/cookie";
import formbody from "@fastify/formbody";
import multipart from "@fastify/multipart";
import fastifyStatic from "@fastify/static";
import { join, resolve } from "path";
import { initDatabase, closeDatabase } from "./db/index.js";
import { seedDatabase } from "./db/seed.js";
import { config } from "./config.js";
import { createSessionStore, type SessionStore } from "./session/store.js";
import { ImageStore } from "./images/store.js";

// API route imports
import { registerHealthRoutes } from "./api/health.js";
import { registerAuthRoutes } from "./api/auth.js";
import { registerOrderRoutes } from "./api/orders.js";
import { registerCustomerMenuRoutes } from "./api/customer-menu.js";
import { registerRestaurantMenuRoutes } from "./api/restaurant-menu.js";
import { registerRestaurantUserRoutes } from "./api/restaurant-users.js";
import { registerAuthMiddleware } from "./middleware/auth.js";

declare module "fastify" {
  interface FastifyInstance {
    sessions: SessionStore;
    images: ImageStore;
  }
}

export const STATIC_PREFIX = "/static";

export async function createServer() {
  // Initialize database first
  initDatabase();
  if (config.seedData) {
    seedDatabase();
  }

  const app = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === "development"
          ? { target: "pino-pretty", options: { colorize: true } }
          : undefined,
    },
  });

  await app.register(cookie, { secret: config.sessionSecret });
  await app.register(formbody);
  await app.register(multipart, { limits: { fileSize: config.maxUploadBytes } });

  const publicDir = resolve(config.publicDir);
  const images = new ImageStore(join(publicDir, "images"), `${STATIC_PREFIX}/images`);
  images.ensureDir();
  await app.register(fastifyStatic, { root: publicDir, prefix: `${STATIC_PREFIX}/` });

  app.decorate("sessions", createSessionStore(config.sessionBackend));
  app.decorate("images", images);

  // --- Auth middleware (session cookie → req.currentUser, prefix guards) ---
  registerAuthMiddleware(app);

  // --- Register all routes ---
  registerHealthRoutes(app);
  registerAuthRoutes(app);
  registerOrderRoutes(app);
  registerCustomerMenuRoutes(app);
  registerRestaurantMenuRoutes(app);
  registerRestaurantUserRoutes(app);

  app.addHook("onClose", async () => {
    closeDatabase();
  });

  return app;
}
