import { ModuleSource } from "../../lib/module-source";
import { Result } from "../../lib/types";
import { tryParseSource } from "./parse-source";

/**
 * Parses every source in order, stopping at the first one that fails.
 */
export function parseSources(raws: readonly string[]): Result<ModuleSource[]> {
  const sources: ModuleSource[] = [];
  for (const [index, raw] of raws.entries()) {
    const source = tryParseSource(raw);
    if ("error" in source) {
      return { error: `Source #${index + 1}: ${source.error}` };
    }
    sources.push(source.data);
  }
  return { data: sources };
}
