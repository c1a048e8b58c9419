import type { HttpBindings } from "@hono/node-server";
import type { PaymentStore, StorefrontHooks } from "@urlseal/sdk";
import type { AppConfig } from "./utils/config.js";

export type AppEnv = { Bindings: HttpBindings };

export interface RouteDependencies {
  config: AppConfig;
  payments: PaymentStore;
  hooks: StorefrontHooks;
  now: () => number;
}
