import { hkdf } from "@noble/hashes/hkdf.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { utf8ToBytes } from "@noble/hashes/utils.js";
import { SecretUnavailableError } from "./errors.js";

export const DEFAULT_SECRET_VARIABLE = "URLSEAL_INSTALLATION_KEY";

const DERIVATION_INFO = utf8ToBytes("urlseal/download-token/v1");
const DERIVED_SECRET_BYTES = 32;

/**
 * Source of the signing key. Read on every sign and verify call, so rotating
 * the underlying value takes effect immediately and invalidates issued tokens.
 */
export interface SecretProvider {
  getSecret(): Uint8Array;
}

function toBytes(value: string | Uint8Array): Uint8Array {
  return typeof value === "string" ? utf8ToBytes(value) : value;
}

export function staticSecret(value: string | Uint8Array): SecretProvider {
  const bytes = toBytes(value);
  if (bytes.length === 0) {
    throw new SecretUnavailableError("Secret must not be empty");
  }
  return {
    getSecret: () => bytes,
  };
}

export function deriveSecret(installationKey: string | Uint8Array): Uint8Array {
  const keyMaterial = toBytes(installationKey);
  if (keyMaterial.length === 0) {
    throw new SecretUnavailableError("Installation key must not be empty");
  }
  return hkdf(sha256, keyMaterial, undefined, DERIVATION_INFO, DERIVED_SECRET_BYTES);
}

export interface EnvSecretOptions {
  env?: NodeJS.ProcessEnv;
  variable?: string;
}

export function envSecret(options: EnvSecretOptions = {}): SecretProvider {
  const variable = options.variable ?? DEFAULT_SECRET_VARIABLE;
  return {
    getSecret() {
      const env = options.env ?? process.env;
      const installationKey = env[variable]?.trim();
      if (!installationKey) {
        throw new SecretUnavailableError(`${variable} must be set to sign or verify download URLs`);
      }
      return deriveSecret(installationKey);
    },
  };
}
