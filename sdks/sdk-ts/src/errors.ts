export type SignedUrlErrorCode =
  | "DESCRIPTOR_FORMAT"
  | "OPTION_FORMAT"
  | "UNKNOWN_OPTION"
  | "BINDING_UNAVAILABLE"
  | "RESERVED_PARAMETER"
  | "SECRET_UNAVAILABLE"
  | "INVALID_CONFIG";

export class SignedUrlError extends Error {
  readonly code: SignedUrlErrorCode;

  constructor(code: SignedUrlErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DescriptorFormatError extends SignedUrlError {
  constructor(message: string) {
    super("DESCRIPTOR_FORMAT", message);
  }
}

export class OptionFormatError extends SignedUrlError {
  constructor(message: string) {
    super("OPTION_FORMAT", message);
  }
}

export class UnknownOptionError extends SignedUrlError {
  readonly option: string;

  constructor(option: string) {
    super("UNKNOWN_OPTION", `No attribute binder is registered for option "${option}"`);
    this.option = option;
  }
}

export class BindingUnavailableError extends SignedUrlError {
  readonly binder: string;

  constructor(binder: string) {
    super("BINDING_UNAVAILABLE", `Attribute binder "${binder}" could not resolve a value for this request`);
    this.binder = binder;
  }
}

export class ReservedParameterError extends SignedUrlError {
  readonly parameter: string;

  constructor(parameter: string) {
    super(
      "RESERVED_PARAMETER",
      `Query parameter "${parameter}" is reserved for a bound attribute and cannot appear in the URL`,
    );
    this.parameter = parameter;
  }
}

export class SecretUnavailableError extends SignedUrlError {
  constructor(message: string) {
    super("SECRET_UNAVAILABLE", message);
  }
}

export class InvalidConfigError extends SignedUrlError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
