import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  InvalidConfigError,
  ReservedParameterError,
  SecretUnavailableError,
  UnknownOptionError,
} from "../errors.js";
import { silentLogger } from "../logger.js";
import { staticRequestContext, type AttributeBinder } from "../options.js";
import { envSecret, staticSecret } from "../secret.js";
import {
  computeToken,
  createUrlSigner,
  signUrl,
  tokensEqual,
  verifyUrl,
  type UrlSignerConfig,
} from "../signer.js";

const BASE_URL = "https://shop.example.com/download";
const secret = staticSecret("test-secret");
const anonymous = staticRequestContext();

function makeSigner(overrides: Partial<UrlSignerConfig> = {}) {
  return createUrlSigner({ secret, logger: silentLogger, ...overrides });
}

function hmacHex(key: string, message: string): string {
  return createHmac("sha256", key).update(message).digest("hex");
}

function withParam(url: string, name: string, value: string): string {
  const parsed = new URL(url);
  parsed.searchParams.set(name, value);
  return parsed.toString();
}

describe("createUrlSigner", () => {
  const params = { eddfile: "42:7:3", ttl: "1700000000" };

  it("signs and verifies a URL", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);

    expect(signed.token).toMatch(/^[0-9a-f]{64}$/);
    expect(signed.url).toBe(`${BASE_URL}?eddfile=42%3A7%3A3&ttl=1700000000&token=${signed.token}`);
    expect(signed.params).toEqual([["eddfile", "42:7:3"], ["ttl", "1700000000"]]);
    expect(signer.verify(signed.url, anonymous)).toBe(true);
  });

  it("computes the token as an HMAC-SHA256 of the canonical string", () => {
    const signed = makeSigner().sign({ baseUrl: BASE_URL, params }, anonymous);
    expect(signed.token).toBe(hmacHex("test-secret", "/download?eddfile=42%3A7%3A3&ttl=1700000000"));
  });

  it("produces the same token for the same input", () => {
    const signer = makeSigner();
    const first = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    const second = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    expect(second.token).toBe(first.token);
  });

  it("ignores the host and fragment of the URL", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: `${BASE_URL}#files`, params }, anonymous);
    const moved = signed.url.replace("https://shop.example.com", "http://127.0.0.1:8080");

    expect(signed.url).not.toContain("#files");
    expect(signer.verify(moved, anonymous)).toBe(true);
  });

  it("re-signing a signed URL replaces its token with the same value", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    const resigned = signer.sign({ baseUrl: signed.url }, anonymous);

    expect(resigned.url).toBe(signed.url);
    expect(new URL(resigned.url).searchParams.getAll("token")).toEqual([signed.token]);
  });

  it.each([
    ["eddfile", "42:7:4"],
    ["ttl", "1800000000"],
    ["o", "ua"],
    ["extra", "1"],
  ])("rejects a URL whose %s parameter was changed", (name, value) => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    expect(signer.verify(withParam(signed.url, name, value), anonymous)).toBe(false);
  });

  it("rejects a URL whose path was changed", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    expect(signer.verify(signed.url.replace("/download", "/downloads"), anonymous)).toBe(false);
  });

  it("rejects a URL signed with another secret", () => {
    const signed = makeSigner({ secret: staticSecret("other-secret") }).sign(
      { baseUrl: BASE_URL, params },
      anonymous,
    );
    expect(makeSigner().verify(signed.url, anonymous)).toBe(false);
  });

  it("accepts a reordered query string with sorted canonicalization", () => {
    const signer = makeSigner();
    const { token } = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    const reordered = `${BASE_URL}?token=${token}&ttl=1700000000&eddfile=42%3A7%3A3`;
    expect(signer.verify(reordered, anonymous)).toBe(true);
  });

  it("rejects a reordered query string with insertion canonicalization", () => {
    const signer = makeSigner({ ordering: "insertion" });
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);
    const reordered = `${BASE_URL}?ttl=1700000000&eddfile=42%3A7%3A3&token=${signed.token}`;

    expect(signer.verify(signed.url, anonymous)).toBe(true);
    expect(signer.verify(reordered, anonymous)).toBe(false);
  });

  it("treats equivalent wire encodings of a value alike", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params: { name: "spring sale" } }, anonymous);
    expect(signed.url).toContain("name=spring%20sale");
    expect(signer.verify(signed.url.replace("spring%20sale", "spring+sale"), anonymous)).toBe(true);
  });

  it("fails closed on missing, duplicated or malformed input", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);

    expect(signer.inspect(`${BASE_URL}?eddfile=42%3A7%3A3&ttl=1700000000`, anonymous)).toEqual({
      valid: false,
      reason: "TOKEN_MISSING",
    });
    expect(signer.inspect(BASE_URL, anonymous)).toEqual({ valid: false, reason: "TOKEN_MISSING" });
    expect(signer.inspect(`${signed.url}&token=${signed.token}`, anonymous)).toEqual({
      valid: false,
      reason: "TOKEN_DUPLICATED",
    });
    expect(signer.inspect("not a url", anonymous)).toEqual({ valid: false, reason: "URL_INVALID" });
    expect(signer.inspect(withParam(signed.url, "token", "deadbeef"), anonymous)).toEqual({
      valid: false,
      reason: "TOKEN_MISMATCH",
    });
    expect(signer.inspect(withParam(signed.url, "o", "bad flag"), anonymous)).toEqual({
      valid: false,
      reason: "OPTIONS_INVALID",
    });
  });
});

describe("contextual bindings", () => {
  const params = { eddfile: "42:7:3" };
  const visitor = staticRequestContext({ clientAddress: "203.0.113.5", userAgent: "Storefront/1.0" });

  it("binds the client address without exposing it", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params, options: ["ip"] }, visitor);

    expect(signed.url).toBe(`${BASE_URL}?eddfile=42%3A7%3A3&o=ip&token=${signed.token}`);
    expect(signed.token).toBe(
      hmacHex("test-secret", "/download?eddfile=42%3A7%3A3&ip=203.0.113.5&o=ip"),
    );
    expect(signer.verify(signed.url, visitor)).toBe(true);
    expect(
      signer.verify(signed.url, staticRequestContext({ clientAddress: "198.51.100.7" })),
    ).toBe(false);
    expect(signer.inspect(signed.url, anonymous)).toEqual({
      valid: false,
      reason: "BINDING_UNAVAILABLE",
    });
  });

  it("binds the user agent", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params, options: ["ua"] }, visitor);

    expect(signer.verify(signed.url, staticRequestContext({ userAgent: "Storefront/1.0" }))).toBe(true);
    expect(signer.verify(signed.url, staticRequestContext({ userAgent: "curl/8.0" }))).toBe(false);
  });

  it("binds several attributes at once", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: BASE_URL, params, options: ["ip", "ua"] }, visitor);

    expect(signed.url).toContain("o=ip%3Aua");
    expect(signer.verify(signed.url, visitor)).toBe(true);
    expect(
      signer.verify(
        signed.url,
        staticRequestContext({ clientAddress: "203.0.113.5", userAgent: "curl/8.0" }),
      ),
    ).toBe(false);
  });

  it("reads the options already in the URL when none are given", () => {
    const signer = makeSigner();
    const signed = signer.sign({ baseUrl: `${BASE_URL}?o=ip`, params }, visitor);

    expect(signed.params).toEqual([["o", "ip"], ["eddfile", "42:7:3"]]);
    expect(
      signer.verify(signed.url, staticRequestContext({ clientAddress: "198.51.100.7" })),
    ).toBe(false);
  });

  it("removes existing options when given an empty list", () => {
    const signed = makeSigner().sign({ baseUrl: `${BASE_URL}?o=ip`, params, options: [] }, anonymous);
    expect(signed.url).toBe(`${BASE_URL}?eddfile=42%3A7%3A3&token=${signed.token}`);
  });

  it("refuses to sign when a bound attribute is unavailable", () => {
    expect(() => makeSigner().sign({ baseUrl: BASE_URL, params, options: ["ip"] }, anonymous)).toThrow(
      /client-address/,
    );
  });

  it("runs custom binders on sign and verify", () => {
    let tenant = "acme";
    const tenantBinder: AttributeBinder = { name: "tenant", bind: () => ({ tenant }) };
    const signer = makeSigner({ binders: [tenantBinder] });
    const signed = signer.sign({ baseUrl: BASE_URL, params }, anonymous);

    expect(signed.url).not.toContain("tenant");
    expect(signer.verify(signed.url, anonymous)).toBe(true);

    tenant = "globex";
    expect(signer.verify(signed.url, anonymous)).toBe(false);
  });

  it("requires a binder for every option", () => {
    const regionBinder: AttributeBinder = {
      name: "region",
      option: "region",
      bind: () => ({ region: "eu" }),
    };
    const withRegion = makeSigner({ binders: [regionBinder] });
    const signed = withRegion.sign({ baseUrl: BASE_URL, params, options: ["region"] }, anonymous);

    expect(withRegion.verify(signed.url, anonymous)).toBe(true);
    expect(makeSigner().inspect(signed.url, anonymous)).toEqual({
      valid: false,
      reason: "OPTION_UNKNOWN",
    });
    expect(() =>
      makeSigner().sign({ baseUrl: BASE_URL, params, options: ["region"] }, anonymous),
    ).toThrow(UnknownOptionError);
  });

  it("refuses bound names that collide with visible parameters", () => {
    const shadowBinder: AttributeBinder = { name: "shadow", bind: () => ({ eddfile: "1:1:1" }) };
    const signer = makeSigner({ binders: [shadowBinder] });

    expect(() => signer.sign({ baseUrl: BASE_URL, params }, anonymous)).toThrow(ReservedParameterError);
    expect(() => makeSigner().sign({ baseUrl: `${BASE_URL}?ip=1.2.3.4`, params, options: ["ip"] }, visitor))
      .toThrow(ReservedParameterError);
  });

  it("refuses two binders for one option", () => {
    expect(() =>
      makeSigner({ binders: [{ name: "ua-hash", option: "ua", bind: () => ({ ua_hash: "x" }) }] }),
    ).toThrow(InvalidConfigError);
  });
});

describe("secret rotation", () => {
  it("invalidates issued tokens when the installation key changes", () => {
    const env: NodeJS.ProcessEnv = { URLSEAL_INSTALLATION_KEY: "test-installation-key" };
    const signer = makeSigner({ secret: envSecret({ env }) });
    const signed = signer.sign({ baseUrl: BASE_URL, params: { eddfile: "1:2:3" } }, anonymous);

    expect(signer.verify(signed.url, anonymous)).toBe(true);

    env.URLSEAL_INSTALLATION_KEY = "rotated-installation-key";
    expect(signer.verify(signed.url, anonymous)).toBe(false);

    delete env.URLSEAL_INSTALLATION_KEY;
    expect(signer.inspect(signed.url, anonymous)).toEqual({
      valid: false,
      reason: "SECRET_UNAVAILABLE",
    });
    expect(() => signer.sign({ baseUrl: BASE_URL }, anonymous)).toThrow(SecretUnavailableError);
  });
});

describe("signUrl / verifyUrl", () => {
  it("round-trips with the default configuration", () => {
    const signed = signUrl({ baseUrl: BASE_URL, params: { eddfile: "42:7:3" } }, secret, anonymous);
    expect(verifyUrl(signed.url, secret, anonymous)).toBe(true);
    expect(verifyUrl(withParam(signed.url, "eddfile", "42:7:4"), secret, anonymous)).toBe(false);
  });
});

describe("computeToken / tokensEqual", () => {
  it("matches a reference HMAC", () => {
    expect(computeToken(secret.getSecret(), "/download?a=1")).toBe(hmacHex("test-secret", "/download?a=1"));
  });

  it("compares tokens exactly", () => {
    const token = computeToken(secret.getSecret(), "/download?a=1");
    expect(tokensEqual(token, token)).toBe(true);
    expect(tokensEqual(token, token.toUpperCase())).toBe(false);
    expect(tokensEqual(token, token.slice(1))).toBe(false);
    expect(tokensEqual("", "")).toBe(true);
  });
});
