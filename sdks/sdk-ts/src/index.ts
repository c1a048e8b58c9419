export { canonicalize, TOKEN_PARAM } from "./canonicalize.js";
export {
  computeToken,
  createUrlSigner,
  signUrl,
  tokensEqual,
  verifyUrl,
} from "./signer.js";
export {
  BUILT_IN_BINDERS,
  clientAddressBinder,
  OPTIONS_PARAM,
  parseOptionFlags,
  serializeOptionFlags,
  staticRequestContext,
  userAgentBinder,
} from "./options.js";
export {
  DEFAULT_SECRET_VARIABLE,
  deriveSecret,
  envSecret,
  staticSecret,
} from "./secret.js";
export {
  DESCRIPTOR_PARAM,
  decodeDescriptor,
  encodeDescriptor,
} from "./descriptor.js";
export {
  createStorefrontHooks,
  decodeExpire,
  encodeExpire,
  TTL_PARAM,
} from "./storefront.js";
export {
  encodeQueryComponent,
  serializeQuery,
  toQueryParams,
} from "./query.js";
export {
  BindingUnavailableError,
  DescriptorFormatError,
  InvalidConfigError,
  OptionFormatError,
  ReservedParameterError,
  SecretUnavailableError,
  SignedUrlError,
  UnknownOptionError,
} from "./errors.js";
export { consoleLogger, silentLogger } from "./logger.js";

export type { CanonicalOrdering, CanonicalString } from "./canonicalize.js";
export type {
  SignedUrl,
  SigningRequest,
  UrlSigner,
  UrlSignerConfig,
  VerificationFailureReason,
  VerificationResult,
} from "./signer.js";
export type {
  AttributeBinder,
  BindingContext,
  BoundAttributes,
  OptionFlag,
  RequestContext,
} from "./options.js";
export type { EnvSecretOptions, SecretProvider } from "./secret.js";
export type { DownloadDescriptor } from "./descriptor.js";
export type {
  DispatchOutcome,
  DownloadArgs,
  DownloadRequestEvent,
  ExtendArgsContext,
  PaymentMetadata,
  PaymentStore,
  StorefrontConfig,
  StorefrontHooks,
} from "./storefront.js";
export type { QueryParam, QueryParams, QueryParamsInput } from "./query.js";
export type { SignedUrlErrorCode } from "./errors.js";
export type { Logger } from "./logger.js";
