import { getConnInfo } from "@hono/node-server/conninfo";
import type { RequestContext } from "@urlseal/sdk";
import type { Context } from "hono";
import type { AppEnv } from "../types.js";

function forwardedFor(c: Context<AppEnv>): string | undefined {
  const first = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  return first || undefined;
}

export function requestContextFor(c: Context<AppEnv>, trustProxy: boolean): RequestContext {
  return {
    clientAddress() {
      if (trustProxy) {
        return forwardedFor(c);
      }
      // No socket when the app is driven through app.request().
      if (!c.env?.incoming) {
        return undefined;
      }
      return getConnInfo(c).remote.address;
    },
    userAgent() {
      return c.req.header("user-agent");
    },
  };
}
