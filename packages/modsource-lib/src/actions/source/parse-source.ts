import { isModuleSourceError } from "../../lib/errors";
import { backendLogger } from "../../lib/logger";
import { ModuleSource, parseSource } from "../../lib/module-source";
import { Result } from "../../lib/types";

export function tryParseSource(raw: string): Result<ModuleSource> {
  try {
    return { data: parseSource(raw) };
  } catch (error) {
    if (isModuleSourceError(error)) {
      backendLogger.debug(`Rejected module source ${JSON.stringify(raw)}`, {
        meta: { kind: error.kind },
      });
      return { error: error.message };
    }
    throw error;
  }
}
