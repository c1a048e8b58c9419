import {
  createStorefrontHooks,
  createUrlSigner,
  deriveSecret,
  staticSecret,
  type PaymentStore,
  type UrlSigner,
} from "@urlseal/sdk";
import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { logger as honoLogger } from "hono/logger";
import { createDownloadRouter } from "./routes/download.js";
import { createLinksRouter } from "./routes/links.js";
import type { AppEnv, RouteDependencies } from "./types.js";
import type { AppConfig } from "./utils/config.js";
import { createErrorResponse } from "./utils/validation.js";

export interface AppOptions {
  config: AppConfig;
  payments: PaymentStore;
  signer?: UrlSigner;
  now?: () => number;
}

const QUIET_PREFIXES = ["/health"];

export function createApp(options: AppOptions): Hono<AppEnv> {
  const { config, payments } = options;
  const signer = options.signer ?? createUrlSigner({
    secret: staticSecret(deriveSecret(config.installationKey)),
    ordering: config.canonicalOrder,
  });
  const hooks = createStorefrontHooks({
    signer,
    payments,
    homeUrl: config.homeUrl,
    options: config.linkOptions,
    onInvalidRequest: ({ url }) => {
      console.warn(`[Download Service] Rejected download request: ${url}`);
    },
  });
  const deps: RouteDependencies = {
    config,
    payments,
    hooks,
    now: options.now ?? Date.now,
  };

  const app = new Hono<AppEnv>();

  // ─── Middleware ───────────────────────────────────────────────────────────

  // Request ID tracing
  app.use("*", async (c, next) => {
    const requestId = c.req.header("X-Request-ID") || randomUUID();
    await next();
    c.header("X-Request-ID", requestId);
  });

  app.use("*", async (c, next) => {
    if (QUIET_PREFIXES.some((p) => c.req.path.startsWith(p))) {
      return next();
    }
    return honoLogger()(c, next);
  });

  // ─── Health Check ─────────────────────────────────────────────────────────

  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // ─── Routes ───────────────────────────────────────────────────────────────

  app.route("/v1/links", createLinksRouter(deps));
  app.route(new URL(config.homeUrl).pathname, createDownloadRouter(deps));

  // ─── 404 ──────────────────────────────────────────────────────────────────

  app.notFound((c) => {
    return c.json(createErrorResponse("Not found", "NOT_FOUND"), 404);
  });

  // ─── Error Handler ────────────────────────────────────────────────────────

  app.onError((err, c) => {
    console.error("[Download Service] Unhandled error:", err);
    return c.json(createErrorResponse("Internal server error", "INTERNAL_ERROR"), 500);
  });

  return app;
}
