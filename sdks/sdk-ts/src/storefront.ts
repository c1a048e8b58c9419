import { TOKEN_PARAM } from "./canonicalize.js";
import {
  DESCRIPTOR_PARAM,
  decodeDescriptor,
  encodeDescriptor,
  parseDescriptorId,
  type DownloadDescriptor,
} from "./descriptor.js";
import { DescriptorFormatError, SignedUrlError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { OptionFlag, RequestContext } from "./options.js";
import { getParam, serializeQuery, toQueryParams, type QueryParamsInput } from "./query.js";
import type { SignedUrl, UrlSigner } from "./signer.js";

export const TTL_PARAM = "ttl";

/**
 * The storefront's own download arguments: `download_key`, `download`,
 * `file` and `expire` on the way out; `download`, `email`, `expire`,
 * `file_key` and `key` once a request has been verified.
 */
export type DownloadArgs = Readonly<Record<string, string>>;

export interface PaymentMetadata {
  email: string;
  purchaseKey: string;
}

export interface PaymentStore {
  findPaymentIdByPurchaseKey(purchaseKey: string): Promise<number | null>;
  getPaymentMetadata(paymentId: number): Promise<PaymentMetadata | null>;
}

export interface ExtendArgsContext {
  paymentId: number;
  sourceArgs: DownloadArgs;
}

export interface DownloadRequestEvent {
  url: string;
  args: DownloadArgs;
}

export interface StorefrontConfig {
  signer: UrlSigner;
  payments: PaymentStore;
  /** Base URL every download link is built on and verified against. */
  homeUrl: string;
  /** Bindings for newly issued links, e.g. `["ip"]`. */
  options?: readonly OptionFlag[];
  /** Adds visible arguments to a link before it is signed. */
  extendArgs?: (args: DownloadArgs, context: ExtendArgsContext) => DownloadArgs;
  onValidRequest?: (event: DownloadRequestEvent) => void;
  onInvalidRequest?: (event: DownloadRequestEvent) => void;
  logger?: Logger;
}

export type DispatchOutcome =
  | { kind: "passthrough"; args: DownloadArgs }
  | { kind: "invalid"; url: string; args: DownloadArgs }
  | { kind: "valid"; url: string; args: DownloadArgs; descriptor: DownloadDescriptor };

export interface StorefrontHooks {
  buildDownloadUrlArgs(args: DownloadArgs, context: RequestContext): Promise<DownloadArgs>;
  buildDownloadUrl(args: DownloadArgs, context: RequestContext): Promise<string | null>;
  processDownloadArgs(
    args: DownloadArgs,
    query: QueryParamsInput,
    context: RequestContext,
  ): Promise<DispatchOutcome>;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function encodeExpire(expiresAt: number | string): string {
  return Buffer.from(String(expiresAt), "utf8").toString("base64");
}

/** Reverses the storefront's `rawurlencode(base64(expiry))`; `null` if malformed. */
export function decodeExpire(value: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(value);
  } catch {
    return null;
  }
  if (!decoded || decoded.length % 4 !== 0 || !BASE64_PATTERN.test(decoded)) {
    return null;
  }
  return Buffer.from(decoded, "base64").toString("utf8");
}

export function createStorefrontHooks(config: StorefrontConfig): StorefrontHooks {
  const logger = config.logger ?? consoleLogger;
  const homeUrl = new URL(config.homeUrl);
  const homeParamNames = new Set(homeUrl.searchParams.keys());

  async function signCompactArgs(
    args: DownloadArgs,
    context: RequestContext,
  ): Promise<SignedUrl | null> {
    const purchaseKey = args.download_key;
    if (!purchaseKey) {
      return null;
    }

    const paymentId = await config.payments.findPaymentIdByPurchaseKey(purchaseKey);
    if (paymentId === null) {
      logger.debug("No payment found for purchase key; leaving download args unsigned");
      return null;
    }

    try {
      let compact: DownloadArgs = {
        [DESCRIPTOR_PARAM]: encodeDescriptor({
          paymentId,
          downloadId: parseDescriptorId("download", args.download ?? ""),
          fileKey: args.file ?? "",
        }),
      };

      if (args.expire !== undefined) {
        const ttl = decodeExpire(args.expire);
        if (ttl === null) {
          logger.warn("Download args carry an undecodable expire value; leaving them unsigned");
          return null;
        }
        compact = { ...compact, [TTL_PARAM]: ttl };
      }

      if (config.extendArgs) {
        compact = { ...compact, ...config.extendArgs(compact, { paymentId, sourceArgs: args }) };
      }

      return config.signer.sign(
        { baseUrl: homeUrl, params: compact, options: config.options },
        context,
      );
    } catch (error) {
      if (error instanceof SignedUrlError) {
        logger.warn(`Could not sign download URL (${error.code}): ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  async function buildDownloadUrlArgs(
    args: DownloadArgs,
    context: RequestContext,
  ): Promise<DownloadArgs> {
    const signed = await signCompactArgs(args, context);
    if (!signed) {
      return args;
    }
    const visible = signed.params.filter(([name]) => !homeParamNames.has(name));
    return Object.fromEntries([...visible, [TOKEN_PARAM, signed.token]]);
  }

  async function buildDownloadUrl(
    args: DownloadArgs,
    context: RequestContext,
  ): Promise<string | null> {
    const signed = await signCompactArgs(args, context);
    return signed ? signed.url : null;
  }

  async function processDownloadArgs(
    args: DownloadArgs,
    query: QueryParamsInput,
    context: RequestContext,
  ): Promise<DispatchOutcome> {
    const params = toQueryParams(query);
    const descriptorValue = getParam(params, DESCRIPTOR_PARAM);
    const ttl = getParam(params, TTL_PARAM);
    const token = getParam(params, TOKEN_PARAM);
    if (descriptorValue === undefined || ttl === undefined || token === undefined) {
      return { kind: "passthrough", args };
    }

    // Rebuild the link from the request's own query, in its own order.
    const target = new URL(homeUrl);
    target.search = serializeQuery(params);
    const url = target.toString();

    const reject = (): DispatchOutcome => {
      config.onInvalidRequest?.({ url, args });
      return { kind: "invalid", url, args };
    };

    if (!config.signer.verify(target, context)) {
      return reject();
    }

    let descriptor: DownloadDescriptor;
    try {
      descriptor = decodeDescriptor(descriptorValue);
    } catch (error) {
      if (error instanceof DescriptorFormatError) {
        logger.warn(`Signed download URL carries a malformed descriptor: ${error.message}`);
        return reject();
      }
      throw error;
    }

    const payment = await config.payments.getPaymentMetadata(descriptor.paymentId);
    if (!payment) {
      logger.warn(`Signed download URL references unknown payment ${descriptor.paymentId}`);
      return reject();
    }

    const resolved: DownloadArgs = {
      ...args,
      download: String(descriptor.downloadId),
      email: payment.email,
      expire: ttl,
      file_key: descriptor.fileKey,
      key: payment.purchaseKey,
    };
    config.onValidRequest?.({ url, args: resolved });
    return { kind: "valid", url, args: resolved, descriptor };
  }

  return {
    buildDownloadUrlArgs,
    buildDownloadUrl,
    processDownloadArgs,
  };
}
