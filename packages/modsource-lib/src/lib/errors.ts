/** A module source string matched none of the supported source forms. */
export const ErrUnsupportedModSrc = "unsupported module source";

/** A module source string matched a supported form but could not be parsed. */
export const ErrInvalidModSrc = "invalid module source";

export type ModuleSourceErrorKind =
  | typeof ErrUnsupportedModSrc
  | typeof ErrInvalidModSrc;

export abstract class ModuleSourceError extends Error {
  abstract readonly kind: ModuleSourceErrorKind;

  protected constructor(
    public readonly raw: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export class UnsupportedModuleSourceError extends ModuleSourceError {
  readonly kind = ErrUnsupportedModSrc;

  constructor(raw: string) {
    super(
      raw,
      `${ErrUnsupportedModSrc}: ${JSON.stringify(raw)} is not a Git or GitHub source`,
    );
    this.name = "UnsupportedModuleSourceError";
  }
}

export class InvalidModuleSourceError extends ModuleSourceError {
  readonly kind = ErrInvalidModSrc;

  constructor(raw: string, detail: string, cause?: Error) {
    super(
      raw,
      cause
        ? `${ErrInvalidModSrc}: ${detail}: ${cause.message}`
        : `${ErrInvalidModSrc}: ${detail}`,
      cause,
    );
    this.name = "InvalidModuleSourceError";
  }
}

export function isModuleSourceError(
  value: unknown,
  kind?: ModuleSourceErrorKind,
): value is ModuleSourceError {
  if (!(value instanceof ModuleSourceError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}
