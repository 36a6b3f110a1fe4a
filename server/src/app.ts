/**
 * Collector HTTP App
 *
 * Builds the Hono app from its collaborators so tests can drive it through
 * `app.request()` without a listening socket.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { nanoid } from "nanoid";
import type { CollectorConfig } from "./config.js";
import type { AppEnv } from "./http/types.js";
import type { CleaningService } from "./ingest/cleaner-client.js";
import { createComponentLogger } from "./logging.js";
import { registerAdminAuthMiddleware, registerAdminRoutes, registerAuthEventRoutes } from "./routes/admin.js";
import { registerIngestRoutes } from "./routes/ingest.js";
import { registerStatusRoutes } from "./routes/status.js";

const log = createComponentLogger("http");

export interface AppDeps {
  config: Pick<CollectorConfig, "authSecretKey" | "compatibilityMode" | "allowedIps" | "trustProxy" | "adminApiKey">;
  cleaner: CleaningService;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", cors());

  // Request-scoped logger
  app.use("*", async (c, next) => {
    const requestId = nanoid(10);
    c.set("requestId", requestId);
    c.set("log", log.child({ correlationId: requestId }));
    const started = Date.now();
    await next();
    c.get("log").debug("Request handled", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Date.now() - started,
    });
  });

  registerStatusRoutes(app, { cleaner: deps.cleaner });
  registerIngestRoutes(app, {
    auth: {
      secretKey: deps.config.authSecretKey,
      compatibilityMode: deps.config.compatibilityMode,
      allowedIps: deps.config.allowedIps,
      trustProxy: deps.config.trustProxy,
    },
    cleaner: deps.cleaner,
  });
  registerAdminAuthMiddleware(app, deps.config.adminApiKey);
  registerAdminRoutes(app);
  registerAuthEventRoutes(app);

  app.notFound((c) => c.json({ detail: "Not Found" }, 404));

  app.onError((err, c) => {
    log.error("Unhandled request error", err, { path: c.req.path });
    return c.json({ detail: `Processing failed: ${err.message}` }, 500);
  });

  return app;
}
