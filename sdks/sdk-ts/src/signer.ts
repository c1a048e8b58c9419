import { hmac } from "@noble/hashes/hmac.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils.js";
import { timingSafeEqual } from "node:crypto";
import { canonicalize, TOKEN_PARAM, type CanonicalOrdering, type CanonicalString } from "./canonicalize.js";
import {
  BindingUnavailableError,
  OptionFormatError,
  ReservedParameterError,
  SignedUrlError,
  UnknownOptionError,
  toErrorMessage,
  type SignedUrlErrorCode,
} from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import {
  OPTIONS_PARAM,
  parseOptionFlags,
  registerBinders,
  serializeOptionFlags,
  type AttributeBinder,
  type BindingContext,
  type OptionFlag,
  type RequestContext,
} from "./options.js";
import {
  getAllParams,
  mergeParams,
  readQuery,
  serializeQuery,
  toQueryParams,
  withoutParam,
  type QueryParam,
  type QueryParams,
  type QueryParamsInput,
} from "./query.js";
import type { SecretProvider } from "./secret.js";

export interface SigningRequest {
  baseUrl: string | URL;
  params?: QueryParamsInput;
  /** Replaces any `o` already in the URL; an empty list removes it. */
  options?: readonly OptionFlag[];
}

export interface SignedUrl {
  /** Visible URL with `token` as its final parameter. */
  url: string;
  token: string;
  /** Visible parameters, without the token. */
  params: QueryParams;
}

export type VerificationFailureReason =
  | "URL_INVALID"
  | "TOKEN_MISSING"
  | "TOKEN_DUPLICATED"
  | "TOKEN_MISMATCH"
  | "OPTIONS_INVALID"
  | "OPTION_UNKNOWN"
  | "BINDING_UNAVAILABLE"
  | "RESERVED_PARAMETER"
  | "SECRET_UNAVAILABLE"
  | "INTERNAL_ERROR";

export type VerificationResult =
  | { valid: true }
  | { valid: false; reason: VerificationFailureReason };

export interface UrlSignerConfig {
  secret: SecretProvider;
  /** Custom binders, run after the built-in `ip` and `ua` binders. */
  binders?: readonly AttributeBinder[];
  ordering?: CanonicalOrdering;
  logger?: Logger;
}

export interface UrlSigner {
  readonly ordering: CanonicalOrdering;
  sign(request: SigningRequest, context: RequestContext): SignedUrl;
  verify(url: string | URL, context: RequestContext): boolean;
  /** Failure reasons are for server-side logs; never echo them to a client. */
  inspect(url: string | URL, context: RequestContext): VerificationResult;
}

const FAILURE_REASON_BY_CODE: Record<SignedUrlErrorCode, VerificationFailureReason> = {
  DESCRIPTOR_FORMAT: "INTERNAL_ERROR",
  OPTION_FORMAT: "OPTIONS_INVALID",
  UNKNOWN_OPTION: "OPTION_UNKNOWN",
  BINDING_UNAVAILABLE: "BINDING_UNAVAILABLE",
  RESERVED_PARAMETER: "RESERVED_PARAMETER",
  SECRET_UNAVAILABLE: "SECRET_UNAVAILABLE",
  INVALID_CONFIG: "INTERNAL_ERROR",
};

export function computeToken(secret: Uint8Array, canonical: CanonicalString): string {
  return bytesToHex(hmac(sha256, secret, utf8ToBytes(canonical)));
}

export function tokensEqual(presented: string, expected: string): boolean {
  const presentedBytes = Buffer.from(presented, "utf8");
  const expectedBytes = Buffer.from(expected, "utf8");
  if (presentedBytes.length !== expectedBytes.length) {
    return false;
  }
  return timingSafeEqual(presentedBytes, expectedBytes);
}

function normalizeUrl(input: string | URL): URL {
  const url = new URL(input.toString());
  url.hash = "";
  return url;
}

function readOptions(params: QueryParams): OptionFlag[] {
  const values = getAllParams(params, OPTIONS_PARAM);
  if (values.length > 1) {
    throw new OptionFormatError(`Expected at most one "${OPTIONS_PARAM}" parameter`);
  }
  return parseOptionFlags(values[0]);
}

export function createUrlSigner(config: UrlSignerConfig): UrlSigner {
  const binders = registerBinders(config.binders);
  const ordering = config.ordering ?? "sorted";
  const logger = config.logger ?? consoleLogger;

  function bindAttributes(context: BindingContext): QueryParams {
    for (const option of context.options) {
      if (!binders.some((binder) => binder.option === option)) {
        throw new UnknownOptionError(option);
      }
    }

    const bound: QueryParam[] = [];
    for (const binder of binders) {
      if (binder.option !== undefined && !context.options.includes(binder.option)) {
        continue;
      }
      const attributes = binder.bind(context);
      if (attributes === null) {
        throw new BindingUnavailableError(binder.name);
      }
      bound.push(...toQueryParams(attributes));
    }
    return bound;
  }

  // `url` must already carry exactly the visible parameters.
  function buildDigestInput(
    url: URL,
    visible: QueryParams,
    options: readonly OptionFlag[],
    request: RequestContext,
  ): CanonicalString {
    const bound = bindAttributes({ request, url, options });
    for (const [name] of bound) {
      if (name === TOKEN_PARAM || visible.some(([key]) => key === name)) {
        throw new ReservedParameterError(name);
      }
    }
    return canonicalize(url.pathname, [...visible, ...bound], ordering);
  }

  function sign(request: SigningRequest, context: RequestContext): SignedUrl {
    const url = normalizeUrl(request.baseUrl);
    let visible = withoutParam(
      mergeParams(readQuery(url), toQueryParams(request.params)),
      TOKEN_PARAM,
    );

    let options: OptionFlag[];
    if (request.options !== undefined) {
      const serialized = serializeOptionFlags(request.options);
      visible = withoutParam(visible, OPTIONS_PARAM);
      if (serialized) {
        visible = [...visible, [OPTIONS_PARAM, serialized]];
      }
      options = parseOptionFlags(serialized);
    } else {
      options = readOptions(visible);
    }

    url.search = serializeQuery(visible);
    const canonical = buildDigestInput(url, visible, options, context);
    const token = computeToken(config.secret.getSecret(), canonical);
    url.search = serializeQuery([...visible, [TOKEN_PARAM, token]]);

    return {
      url: url.toString(),
      token,
      params: visible,
    };
  }

  function inspect(input: string | URL, context: RequestContext): VerificationResult {
    const invalid = (reason: VerificationFailureReason, detail?: string): VerificationResult => {
      if (reason === "SECRET_UNAVAILABLE" || reason === "INTERNAL_ERROR") {
        logger.error(`URL verification could not run (${reason})`, detail ?? "");
      } else {
        logger.debug(`URL verification failed (${reason})`, detail ?? "");
      }
      return { valid: false, reason };
    };

    let url: URL;
    try {
      url = normalizeUrl(input);
    } catch (error) {
      return invalid("URL_INVALID", toErrorMessage(error));
    }

    try {
      const params = readQuery(url);
      const tokens = getAllParams(params, TOKEN_PARAM);
      const presented = tokens[0];
      if (presented === undefined) {
        return invalid("TOKEN_MISSING");
      }
      if (tokens.length > 1) {
        return invalid("TOKEN_DUPLICATED");
      }

      const visible = withoutParam(params, TOKEN_PARAM);
      url.search = serializeQuery(visible);
      const canonical = buildDigestInput(url, visible, readOptions(visible), context);
      const expected = computeToken(config.secret.getSecret(), canonical);
      if (!tokensEqual(presented, expected)) {
        return invalid("TOKEN_MISMATCH");
      }
      return { valid: true };
    } catch (error) {
      if (error instanceof SignedUrlError) {
        return invalid(FAILURE_REASON_BY_CODE[error.code], error.message);
      }
      return invalid("INTERNAL_ERROR", toErrorMessage(error));
    }
  }

  return {
    ordering,
    sign,
    inspect,
    verify: (url, context) => inspect(url, context).valid,
  };
}

/** One-off signing with the built-in binders and sorted canonicalization. */
export function signUrl(
  request: SigningRequest,
  secret: SecretProvider,
  context: RequestContext,
): SignedUrl {
  return createUrlSigner({ secret }).sign(request, context);
}

export function verifyUrl(
  url: string | URL,
  secret: SecretProvider,
  context: RequestContext,
): boolean {
  return createUrlSigner({ secret }).verify(url, context);
}
