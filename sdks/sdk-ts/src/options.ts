import { InvalidConfigError, OptionFormatError } from "./errors.js";
import type { QueryParams } from "./query.js";

export const OPTIONS_PARAM = "o";

/** `ip` and `ua` are built in; anything else needs a custom binder. */
export type OptionFlag = "ip" | "ua" | (string & {});

const OPTION_FLAG_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface RequestContext {
  clientAddress(): string | undefined;
  userAgent(): string | undefined;
}

export interface BindingContext {
  request: RequestContext;
  url: URL;
  options: readonly OptionFlag[];
}

export type BoundAttributes = QueryParams | Readonly<Record<string, string>>;

/**
 * Contributes hidden name/value pairs to the digest input. Binders must be
 * deterministic: verification reruns them and compares the result.
 */
export interface AttributeBinder {
  name: string;
  /** Run only when the URL's `o` list carries this flag; omit to run always. */
  option?: OptionFlag;
  /** `null` when the attribute cannot be resolved for this request. */
  bind(context: BindingContext): BoundAttributes | null;
}

function assertOptionFlag(flag: string): void {
  if (!OPTION_FLAG_PATTERN.test(flag)) {
    throw new OptionFormatError(`Invalid option flag: "${flag}"`);
  }
}

export function parseOptionFlags(raw: string | undefined): OptionFlag[] {
  if (!raw) {
    return [];
  }
  const flags: OptionFlag[] = [];
  for (const entry of raw.split(":")) {
    if (!entry) continue;
    assertOptionFlag(entry);
    if (!flags.includes(entry)) {
      flags.push(entry);
    }
  }
  return flags;
}

export function serializeOptionFlags(flags: readonly OptionFlag[]): string {
  const unique: OptionFlag[] = [];
  for (const flag of flags) {
    assertOptionFlag(flag);
    if (!unique.includes(flag)) {
      unique.push(flag);
    }
  }
  return unique.join(":");
}

export const clientAddressBinder: AttributeBinder = {
  name: "client-address",
  option: "ip",
  bind({ request }) {
    const address = request.clientAddress()?.trim();
    return address ? { ip: address } : null;
  },
};

export const userAgentBinder: AttributeBinder = {
  name: "user-agent",
  option: "ua",
  bind({ request }) {
    const userAgent = request.userAgent();
    return userAgent ? { user_agent: userAgent } : null;
  },
};

export const BUILT_IN_BINDERS: readonly AttributeBinder[] = [clientAddressBinder, userAgentBinder];

/** Built-in binders first, then custom ones in registration order. */
export function registerBinders(custom: readonly AttributeBinder[] = []): readonly AttributeBinder[] {
  const binders = [...BUILT_IN_BINDERS];
  for (const binder of custom) {
    if (!binder.name.trim()) {
      throw new InvalidConfigError("Attribute binders must have a name");
    }
    if (binders.some((existing) => existing.name === binder.name)) {
      throw new InvalidConfigError(`Duplicate attribute binder name: "${binder.name}"`);
    }
    if (binder.option !== undefined) {
      assertOptionFlag(binder.option);
      if (binders.some((existing) => existing.option === binder.option)) {
        throw new InvalidConfigError(`Option "${binder.option}" already has an attribute binder`);
      }
    }
    binders.push(binder);
  }
  return binders;
}

export function staticRequestContext(values: {
  clientAddress?: string;
  userAgent?: string;
} = {}): RequestContext {
  return {
    clientAddress: () => values.clientAddress,
    userAgent: () => values.userAgent,
  };
}
