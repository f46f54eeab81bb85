import { z } from "zod";

import type { ModuleSource } from "../lib/module-source";
import type { Result } from "../lib/types";

export const moduleSourceSchema = z.object({
  raw: z.string(),
  url: z.string().min(1, "url must not be empty"),
  path: z
    .string()
    .min(1, "path must not be empty")
    .refine((value) => !value.includes("?"), "path must not carry a query"),
  subdir: z
    .string()
    .refine(
      (value) => value === "" || value.startsWith("/"),
      "subdir must be empty or start with /",
    ),
  ref: z.string(),
});

/**
 * Checks a value read back from elsewhere (a lock file, a manifest) against
 * the invariants every parsed source holds.
 */
export function validateModuleSource(value: unknown): Result<ModuleSource> {
  const parsed = moduleSourceSchema.safeParse(value);
  if (!parsed.success) {
    return {
      error: `Invalid module source record: ${parsed.error.issues
        .map((issue) => issue.message)
        .join("; ")}`,
    };
  }
  return { data: Object.freeze(parsed.data) };
}

export function formatModuleSource(source: ModuleSource): string {
  let description = source.url;
  if (source.ref) {
    description += ` ref ${source.ref}`;
  }
  if (source.subdir) {
    description += ` subdir ${source.subdir}`;
  }
  return description;
}
