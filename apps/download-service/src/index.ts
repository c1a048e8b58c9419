import { serve } from "@hono/node-server";
import { MemoryPaymentStore } from "./adapters/memory-payment-store.js";
import { createApp } from "./app.js";
import { getConfig } from "./utils/config.js";

const config = getConfig(process.env);
const payments = MemoryPaymentStore.fromFile(config.paymentsFile);
const app = createApp({ config, payments });

const server = serve({ fetch: app.fetch, port: config.port });

console.log(`
╔══════════════════════════════════════════╗
║         urlseal Download Service         ║
║      Signed, time-bounded file links     ║
╠══════════════════════════════════════════╣
║  http://localhost:${config.port}                  ║
╚══════════════════════════════════════════╝

Download URL: ${config.homeUrl}
Link bindings: ${config.linkOptions.length > 0 ? config.linkOptions.join(", ") : "none"}
Canonical order: ${config.canonicalOrder}
Payments loaded: ${payments.size}
`);

process.on("SIGTERM", () => {
  server.close();
  process.exit(0);
});
