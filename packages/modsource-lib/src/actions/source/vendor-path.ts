import path from "node:path";

import { getConfigSync } from "../../lib/config";
import { InvalidModuleSourceError } from "../../lib/errors";
import { ModuleSource } from "../../lib/module-source";

/**
 * Directory a fetched module is vendored into: `<vendorDir>/<path>/<ref>`.
 * Sources without a ref land directly under their path.
 *
 * Throws an {@link InvalidModuleSourceError} when `..` segments in the path or
 * ref would place the module at or above `vendorDir`.
 */
export function vendorPathFor(
  source: ModuleSource,
  vendorDir: string = getConfigSync().MODSOURCE_VENDOR_DIR,
): string {
  const target = path.posix.join(vendorDir, source.path, source.ref);
  const relative = path.posix.relative(vendorDir, target);
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith("../") ||
    path.posix.isAbsolute(relative)
  ) {
    throw new InvalidModuleSourceError(
      source.raw,
      `source ${JSON.stringify(source.raw)} resolves to ${target}, outside ${vendorDir}`,
    );
  }
  return target;
}
