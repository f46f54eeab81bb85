import path from "node:path";

import {
  InvalidModuleSourceError,
  UnsupportedModuleSourceError,
} from "./errors";
import {
  decodeUrlComponent,
  formatUrl,
  getQueryParam,
  RawUrl,
  splitUrl,
  UrlParseError,
} from "./raw-url";

/** A module source resolved into the pieces needed to fetch and store it. */
export interface ModuleSource {
  /** The source string exactly as given. */
  readonly raw: string;
  /** Git URL the module is fetched from. */
  readonly url: string;
  /** Path of the source including its domain, eg. `github.com/org/example`. */
  readonly path: string;
  /** Directory inside the repository holding the module, or "". */
  readonly subdir: string;
  /** Tag, branch or commit pinned by the `ref` query parameter, or "". */
  readonly ref: string;
}

export type ModuleSourceKind = "github" | "git-ssh" | "git";

const SOURCE_PREFIXES: ReadonlyArray<readonly [ModuleSourceKind, string]> = [
  ["github", "github.com"],
  ["git-ssh", "git@"],
  ["git", "git::"],
];

export function classifySource(raw: string): ModuleSourceKind | null {
  for (const [kind, prefix] of SOURCE_PREFIXES) {
    if (raw.startsWith(prefix)) {
      return kind;
    }
  }
  return null;
}

/**
 * Splits `value` at its first `//` into the part before and the subdir after.
 * Only the first `//` separates the package from the subdir, any later one is
 * kept inside the subdir.
 */
export function splitSubdir(value: string): [string, string] {
  const index = value.indexOf("//");
  if (index === -1) {
    return [value, ""];
  }

  const subdir = value.slice(index + 2);
  if (subdir.length === 0) {
    return [value.slice(0, index), ""];
  }
  return [value.slice(0, index), `/${subdir}`];
}

function splitUrlSubdir(raw: string, url: RawUrl): [RawUrl, string] {
  const [rawPath, rawSubdir] = splitSubdir(url.rawPath);
  return [{ ...url, rawPath }, decodeSourcePart(raw, rawSubdir)];
}

function trimGitSuffix(value: string): string {
  return value.endsWith(".git") ? value.slice(0, -".git".length) : value;
}

// Joins path elements skipping empty ones and cleans the result.
function joinPath(...elements: string[]): string {
  const nonEmpty = elements.filter((element) => element.length > 0);
  if (nonEmpty.length === 0) {
    return "";
  }

  const joined = path.posix.normalize(nonEmpty.join("/"));
  return joined.length > 1 && joined.endsWith("/") ? joined.slice(0, -1) : joined;
}

function splitSourceUrl(raw: string, input: string, detail: string): RawUrl {
  try {
    return splitUrl(input);
  } catch (error) {
    if (error instanceof UrlParseError) {
      throw new InvalidModuleSourceError(raw, detail, error);
    }
    throw error;
  }
}

function decodeSourcePart(raw: string, value: string): string {
  try {
    return decodeUrlComponent(raw, value);
  } catch (error) {
    if (error instanceof UrlParseError) {
      throw new InvalidModuleSourceError(raw, `${raw} has an invalid escape`, error);
    }
    throw error;
  }
}

function missingPath(raw: string): InvalidModuleSourceError {
  return new InvalidModuleSourceError(
    raw,
    `source ${JSON.stringify(raw)} is missing the path component`,
  );
}

function parseGithubSource(raw: string): ModuleSource {
  const parsed = splitSourceUrl(raw, raw, `${raw} is not a URL`);
  const ref = getQueryParam(parsed, "ref");
  const [withoutSubdir, subdir] = splitUrlSubdir(raw, parsed);

  const cleaned: RawUrl = {
    ...withoutSubdir,
    scheme: "https",
    rawQuery: "",
    rawFragment: "",
    rawPath: trimGitSuffix(withoutSubdir.rawPath),
  };
  const modulePath = joinPath(cleaned.host, decodeSourcePart(raw, cleaned.rawPath));
  if (cleaned.opaque !== "" || modulePath === "") {
    throw missingPath(raw);
  }

  return {
    raw,
    url: `${formatUrl(cleaned)}.git`,
    path: modulePath,
    subdir,
    ref,
  };
}

// GitHub over ssh is always git@host:path. This is not a URL, but splitting it
// as one yields the host as the scheme and the repository path as the opaque
// part, which is all that is needed here.
function parseGitSshSource(raw: string): ModuleSource {
  const remainder = raw.slice("git@".length);
  const parsed = splitSourceUrl(raw, remainder, `invalid URL inside ${raw}`);
  if (parsed.scheme === "") {
    throw new InvalidModuleSourceError(
      raw,
      `source ${JSON.stringify(raw)} is not of the form git@host:path`,
    );
  }

  const ref = getQueryParam(parsed, "ref");
  const [opaque, subdir] = splitSubdir(parsed.opaque);
  if (opaque === "") {
    throw missingPath(raw);
  }

  const cleaned: RawUrl = { ...parsed, opaque, rawQuery: "", rawFragment: "" };
  return {
    raw,
    url: `git@${formatUrl(cleaned)}`,
    path: trimGitSuffix(joinPath(cleaned.scheme, opaque)),
    subdir,
    ref,
  };
}

function parseGitSource(raw: string): ModuleSource {
  const remainder = raw.slice("git::".length);
  const parsed = splitSourceUrl(raw, remainder, `${raw} is not a valid git URL`);
  if (parsed.rawPath === "") {
    throw missingPath(raw);
  }

  const [withoutSubdir, subdir] = splitUrlSubdir(raw, parsed);
  // A host port would put a ":" on the path.
  const modulePath = trimGitSuffix(
    joinPath(
      withoutSubdir.host.replaceAll(":", "-"),
      decodeSourcePart(raw, withoutSubdir.rawPath),
    ),
  );
  // "git::file:////sub" has nothing left once the subdir is split off
  if (withoutSubdir.rawPath === "" || modulePath === "") {
    throw missingPath(raw);
  }
  const ref = getQueryParam(parsed, "ref");

  return {
    raw,
    url: formatUrl({ ...withoutSubdir, rawQuery: "", rawFragment: "" }),
    path: modulePath,
    subdir,
    ref,
  };
}

/**
 * Parses a Git or GitHub module source:
 *
 * - `github.com/org/repo//subdir?ref=v1`: fetched over https, `.git` appended.
 * - `git@github.com:org/repo.git?ref=v1`: fetched over ssh, kept in scp form.
 * - `git::<url>`: any git transport, the scheme is kept as given.
 *
 * Any other form (registry addresses, local paths, archives) throws an
 * {@link UnsupportedModuleSourceError}. A recognized form that fails to parse
 * throws an {@link InvalidModuleSourceError}.
 *
 * Parsing normalizes (https is forced on GitHub sources, fragments and
 * queries are dropped), so a source built from a returned `url` does not in
 * general parse back to the same value.
 */
export function parseSource(raw: string): ModuleSource {
  const kind = classifySource(raw);
  switch (kind) {
    case "github":
      return Object.freeze(parseGithubSource(raw));
    case "git-ssh":
      return Object.freeze(parseGitSshSource(raw));
    case "git":
      return Object.freeze(parseGitSource(raw));
    case null:
      throw new UnsupportedModuleSourceError(raw);
  }
}
