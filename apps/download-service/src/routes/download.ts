import { Hono } from "hono";
import type { AppEnv, RouteDependencies } from "../types.js";
import { requestContextFor } from "../utils/request-context.js";
import { createErrorResponse } from "../utils/validation.js";

function isExpired(expire: string | undefined, nowMs: number): boolean {
  const expiresAt = Number(expire);
  return !Number.isFinite(expiresAt) || expiresAt * 1000 <= nowMs;
}

export function createDownloadRouter(deps: RouteDependencies) {
  const downloadRouter = new Hono<AppEnv>();

  /**
   * GET <home path>?eddfile=...&ttl=...&token=...
   * Verify a signed link and return the dispatch decision.
   */
  downloadRouter.get("/", async (c) => {
    const query = new URL(c.req.url).searchParams;
    const outcome = await deps.hooks.processDownloadArgs(
      {},
      query,
      requestContextFor(c, deps.config.trustProxy),
    );

    switch (outcome.kind) {
      case "passthrough":
        return c.json(
          createErrorResponse("Download links need eddfile, ttl and token parameters", "MISSING_PARAMETERS"),
          400,
        );
      case "invalid":
        // One code for every failure; the reason stays in the server log.
        return c.json(createErrorResponse("Invalid download request", "INVALID_DOWNLOAD_REQUEST"), 403);
      case "valid": {
        const { args } = outcome;
        if (isExpired(args.expire, deps.now())) {
          return c.json(createErrorResponse("Download link has expired", "LINK_EXPIRED"), 410);
        }
        return c.json({
          download: args.download,
          file_key: args.file_key,
          email: args.email,
          expire: args.expire,
        });
      }
    }
  });

  return downloadRouter;
}
