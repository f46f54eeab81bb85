const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001f\u007f]/;
const BAD_ESCAPE_PATTERN = /%(?![0-9a-fA-F]{2})/;
const PORT_PATTERN = /^:\d*$/;

export class UrlParseError extends Error {
  constructor(
    public readonly input: string,
    public readonly reason: string,
  ) {
    super(`parse ${JSON.stringify(input)}: ${reason}`);
    this.name = "UrlParseError";
  }
}

/**
 * Components of a URL as written, before any normalization.
 *
 * Unlike WHATWG `URL`, this accepts scheme-less references
 * (`github.com/org/repo`) and scp-like ones (`github.com:org/repo.git`), the
 * latter landing in `scheme` and `opaque`.
 */
export interface RawUrl {
  scheme: string;
  opaque: string;
  userinfo?: string;
  host: string;
  /** Path exactly as written, percent escapes included. */
  rawPath: string;
  rawQuery: string;
  rawFragment: string;
}

function splitScheme(input: string, value: string): [string, string] {
  for (let index = 0; index < value.length; index += 1) {
    const character = value[index] ?? "";
    if (/[a-zA-Z]/.test(character)) {
      continue;
    }
    if (/[0-9+.-]/.test(character)) {
      if (index === 0) {
        return ["", value];
      }
      continue;
    }
    if (character === ":") {
      if (index === 0) {
        throw new UrlParseError(input, "missing protocol scheme");
      }
      return [value.slice(0, index), value.slice(index + 1)];
    }
    return ["", value];
  }
  return ["", value];
}

function validateEscapes(input: string, value: string): void {
  if (BAD_ESCAPE_PATTERN.test(value)) {
    throw new UrlParseError(input, `invalid URL escape in ${JSON.stringify(value)}`);
  }
}

function validateHost(input: string, host: string): void {
  if (host.startsWith("[")) {
    const closing = host.lastIndexOf("]");
    if (closing === -1) {
      throw new UrlParseError(input, "missing ']' in host");
    }
    const port = host.slice(closing + 1);
    if (port !== "" && !PORT_PATTERN.test(port)) {
      throw new UrlParseError(input, `invalid port ${JSON.stringify(port)} after host`);
    }
  } else {
    const colon = host.lastIndexOf(":");
    if (colon !== -1 && !PORT_PATTERN.test(host.slice(colon))) {
      throw new UrlParseError(
        input,
        `invalid port ${JSON.stringify(host.slice(colon))} after host`,
      );
    }
  }
  validateEscapes(input, host);
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

/**
 * Percent-decodes `value` byte by byte. Escapes that do not form valid UTF-8
 * (`%FF`) decode to U+FFFD instead of failing.
 */
export function decodeUrlComponent(input: string, value: string): string {
  validateEscapes(input, value);

  const bytes: number[] = [];
  let index = 0;
  while (index < value.length) {
    if (value[index] === "%") {
      bytes.push(Number.parseInt(value.slice(index + 1, index + 3), 16));
      index += 3;
      continue;
    }
    const character = String.fromCodePoint(value.codePointAt(index) ?? 0);
    bytes.push(...utf8Encoder.encode(character));
    index += character.length;
  }
  return utf8Decoder.decode(Uint8Array.from(bytes));
}

export function splitUrl(input: string): RawUrl {
  if (CONTROL_CHARACTER_PATTERN.test(input)) {
    throw new UrlParseError(input, "invalid control character in URL");
  }

  let rest = input;
  let rawFragment = "";
  const hashIndex = rest.indexOf("#");
  if (hashIndex !== -1) {
    rawFragment = rest.slice(hashIndex + 1);
    rest = rest.slice(0, hashIndex);
  }

  const [scheme, afterScheme] = splitScheme(input, rest);
  rest = afterScheme;

  let rawQuery = "";
  const queryIndex = rest.indexOf("?");
  if (queryIndex !== -1) {
    rawQuery = rest.slice(queryIndex + 1);
    rest = rest.slice(0, queryIndex);
  }

  const url: RawUrl = {
    scheme: scheme.toLowerCase(),
    opaque: "",
    host: "",
    rawPath: "",
    rawQuery,
    rawFragment,
  };

  if (!rest.startsWith("/")) {
    if (scheme !== "") {
      url.opaque = rest;
      return url;
    }
    const colon = rest.indexOf(":");
    const slash = rest.indexOf("/");
    if (colon !== -1 && (slash === -1 || colon < slash)) {
      throw new UrlParseError(input, "first path segment in URL cannot contain colon");
    }
  }

  if (rest.startsWith("//") && (scheme !== "" || !rest.startsWith("///"))) {
    const authorityAndPath = rest.slice(2);
    const slash = authorityAndPath.indexOf("/");
    const authority =
      slash === -1 ? authorityAndPath : authorityAndPath.slice(0, slash);
    rest = slash === -1 ? "" : authorityAndPath.slice(slash);

    const at = authority.lastIndexOf("@");
    if (at !== -1) {
      url.userinfo = authority.slice(0, at);
    }
    url.host = authority.slice(at + 1);
    validateHost(input, url.host);
  }

  validateEscapes(input, rest);
  url.rawPath = rest;
  return url;
}

export function formatUrl(url: RawUrl): string {
  let result = url.scheme !== "" ? `${url.scheme}:` : "";

  if (url.opaque !== "") {
    result += url.opaque;
  } else {
    if (url.scheme !== "" || url.host !== "" || url.userinfo !== undefined) {
      if (url.host !== "" || url.rawPath !== "" || url.userinfo !== undefined) {
        result += "//";
      }
      if (url.userinfo !== undefined) {
        result += `${url.userinfo}@`;
      }
      result += url.host;
    }
    if (url.rawPath !== "" && !url.rawPath.startsWith("/") && url.host !== "") {
      result += "/";
    }
    result += url.rawPath;
  }

  if (url.rawQuery !== "") {
    result += `?${url.rawQuery}`;
  }
  if (url.rawFragment !== "") {
    result += `#${url.rawFragment}`;
  }
  return result;
}

export function getQueryParam(url: RawUrl, name: string): string {
  return new URLSearchParams(url.rawQuery).get(name) ?? "";
}
