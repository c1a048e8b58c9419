import { encodeExpire, tokensEqual, type RequestContext } from "@urlseal/sdk";
import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv, RouteDependencies } from "../types.js";
import { requestContextFor } from "../utils/request-context.js";
import { createErrorResponse } from "../utils/validation.js";

/** Upper bound on a link's lifetime: one year. */
export const MAX_LINK_TTL_SECONDS = 31_536_000;

const idSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const createLinkSchema = z.object({
  download_key: z.string().min(1).max(255),
  download: z.union([
    idSchema,
    z.string().regex(/^\d+$/).refine((value) => Number.isSafeInteger(Number(value)), "Number too large"),
  ]),
  file: z.union([idSchema, z.string().regex(/^[A-Za-z0-9_-]+$/)]),
  expires_in_seconds: z.number().int().positive().max(MAX_LINK_TTL_SECONDS).optional(),
  // The buyer's address and user agent, for admin callers issuing links on their behalf.
  client_address: z.string().trim().min(1).max(255).optional(),
  user_agent: z.string().min(1).max(1024).optional(),
});

type CreateLinkBody = z.infer<typeof createLinkSchema>;

function linkRequestContext(body: CreateLinkBody, caller: RequestContext): RequestContext {
  return {
    clientAddress: () => body.client_address ?? caller.clientAddress(),
    userAgent: () => body.user_agent ?? caller.userAgent(),
  };
}

export function createLinksRouter(deps: RouteDependencies) {
  const linksRouter = new Hono<AppEnv>();

  /**
   * POST /v1/links
   * Issue a signed download link for one file of a purchase.
   */
  linksRouter.post("/", async (c) => {
    const adminToken = deps.config.adminToken;
    if (adminToken) {
      const authHeader = c.req.header("Authorization");
      if (!authHeader?.startsWith("Bearer ")) {
        return c.json(createErrorResponse("Missing or invalid Authorization header", "UNAUTHORIZED"), 401);
      }
      if (!tokensEqual(authHeader.slice(7).trim(), adminToken)) {
        return c.json(createErrorResponse("Invalid admin token", "FORBIDDEN"), 403);
      }
    }

    let body: CreateLinkBody;
    try {
      body = createLinkSchema.parse(JSON.parse(await c.req.text()));
    } catch (err) {
      if (err instanceof z.ZodError) {
        const fields = err.issues.map((e) => ({
          field: e.path.join("."),
          message: e.message,
        }));
        return c.json(createErrorResponse("Validation failed", "VALIDATION_ERROR", fields), 400);
      }
      return c.json(createErrorResponse("Invalid request body", "INVALID_JSON"), 400);
    }

    if (!adminToken && (body.client_address !== undefined || body.user_agent !== undefined)) {
      return c.json(
        createErrorResponse("client_address and user_agent require an admin token", "FORBIDDEN"),
        403,
      );
    }

    const paymentId = await deps.payments.findPaymentIdByPurchaseKey(body.download_key);
    if (paymentId === null) {
      return c.json(createErrorResponse("No payment matches this purchase key", "PAYMENT_NOT_FOUND"), 404);
    }

    const ttlSeconds = body.expires_in_seconds ?? deps.config.linkTtlSeconds;
    const expiresAt = Math.floor(deps.now() / 1000) + ttlSeconds;
    const url = await deps.hooks.buildDownloadUrl(
      {
        download_key: body.download_key,
        download: String(body.download),
        file: String(body.file),
        expire: encodeExpire(expiresAt),
      },
      linkRequestContext(body, requestContextFor(c, deps.config.trustProxy)),
    );
    if (!url) {
      return c.json(
        createErrorResponse("The link could not be signed for this request", "LINK_NOT_SIGNABLE"),
        422,
      );
    }

    return c.json(
      {
        url,
        payment_id: paymentId,
        expires_at: new Date(expiresAt * 1000).toISOString(),
      },
      201,
    );
  });

  return linksRouter;
}
