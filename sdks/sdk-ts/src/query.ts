export type QueryParam = readonly [name: string, value: string];

/** Ordered query parameters; a name may repeat. */
export type QueryParams = ReadonlyArray<QueryParam>;

export type QueryParamsInput =
  | QueryParams
  | URLSearchParams
  | Readonly<Record<string, string | number>>;

function isQueryParams(input: QueryParamsInput): input is QueryParams {
  return Array.isArray(input);
}

export function toQueryParams(input: QueryParamsInput | undefined): QueryParams {
  if (input == null) {
    return [];
  }
  if (input instanceof URLSearchParams) {
    return Array.from(input.entries());
  }
  if (isQueryParams(input)) {
    return input.map(([name, value]) => [name, value] as const);
  }
  return Object.entries(input).map(([name, value]) => [name, String(value)] as const);
}

/**
 * Percent-encodes per RFC 3986: unreserved characters pass through, everything
 * else (including `!'()*`, which encodeURIComponent leaves alone) is escaped.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export function serializeQuery(params: QueryParams): string {
  return params
    .map(([name, value]) => `${encodeQueryComponent(name)}=${encodeQueryComponent(value)}`)
    .join("&");
}

export function readQuery(url: URL): QueryParams {
  return Array.from(url.searchParams.entries());
}

export function getParam(params: QueryParams, name: string): string | undefined {
  return params.find(([key]) => key === name)?.[1];
}

export function getAllParams(params: QueryParams, name: string): string[] {
  return params.filter(([key]) => key === name).map(([, value]) => value);
}

export function withoutParam(params: QueryParams, name: string): QueryParams {
  return params.filter(([key]) => key !== name);
}

/** Drops every earlier occurrence of `name` and appends the new value last. */
export function setParam(params: QueryParams, name: string, value: string): QueryParams {
  return [...withoutParam(params, name), [name, value]];
}

export function mergeParams(base: QueryParams, overrides: QueryParams): QueryParams {
  let merged = base;
  for (const [name, value] of overrides) {
    merged = setParam(merged, name, value);
  }
  return merged;
}
