/**
 * Service configuration with environment variable fallbacks
 */
import { fileURLToPath } from "node:url";
import { parseOptionFlags, type CanonicalOrdering, type OptionFlag } from "@urlseal/sdk";
import { z } from "zod";

const DEFAULT_PORT = 11000;
const DEFAULT_LINK_TTL_SECONDS = 86_400;
const DEFAULT_PAYMENTS_FILE = fileURLToPath(new URL("../../data/payments.json", import.meta.url));

export interface AppConfig {
  port: number;
  installationKey: string;
  /** Links are built on this URL and its path serves downloads. */
  homeUrl: string;
  linkOptions: OptionFlag[];
  linkTtlSeconds: number;
  canonicalOrder: CanonicalOrdering;
  /** Take the client address from X-Forwarded-For instead of the socket. */
  trustProxy: boolean;
  /** Bearer token required to issue links; issuing is open when unset. */
  adminToken: string | undefined;
  paymentsFile: string;
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return fallback;
  }
}

// Routes are mounted on the raw path, so it must not need percent-encoding.
function hasPlainPath(value: string): boolean {
  try {
    return !new URL(value).pathname.includes("%");
  } catch {
    return true;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(DEFAULT_PORT),
  URLSEAL_INSTALLATION_KEY: z.string({ required_error: "is required" }).trim().min(1, "is required"),
  URLSEAL_HOME_URL: z
    .string()
    .url()
    .refine(hasPlainPath, "path must not contain percent-encoded characters")
    .optional(),
  URLSEAL_LINK_OPTIONS: z.string().default(""),
  URLSEAL_LINK_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_LINK_TTL_SECONDS),
  URLSEAL_CANONICAL_ORDER: z.enum(["sorted", "insertion"]).default("sorted"),
  URLSEAL_TRUST_PROXY: z.string().optional(),
  URLSEAL_ADMIN_TOKEN: z.string().trim().min(1).optional(),
  URLSEAL_PAYMENTS_FILE: z.string().min(1).optional(),
});

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid download service configuration: ${problems}`);
  }
  const values = parsed.data;

  let linkOptions: OptionFlag[];
  try {
    linkOptions = parseOptionFlags(values.URLSEAL_LINK_OPTIONS);
  } catch (error) {
    throw new Error(
      `Invalid download service configuration: URLSEAL_LINK_OPTIONS ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return {
    port: values.PORT,
    installationKey: values.URLSEAL_INSTALLATION_KEY,
    homeUrl: values.URLSEAL_HOME_URL ?? `http://localhost:${values.PORT}/download`,
    linkOptions,
    linkTtlSeconds: values.URLSEAL_LINK_TTL_SECONDS,
    canonicalOrder: values.URLSEAL_CANONICAL_ORDER,
    trustProxy: parseBool(values.URLSEAL_TRUST_PROXY, false),
    adminToken: values.URLSEAL_ADMIN_TOKEN,
    paymentsFile: values.URLSEAL_PAYMENTS_FILE ?? DEFAULT_PAYMENTS_FILE,
  };
}
