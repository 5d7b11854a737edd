import type { SchemaRegistry } from "../schema/registry.js";
import type { ResolutionResult } from "../types/resolution.js";

/**
 * Check a resolved config against the config-document schema. Only the
 * document shape is checked; slicer semantics of the values are not.
 */
export async function validateResolved(registry: SchemaRegistry, result: ResolutionResult): Promise<string[]> {
  const validate = await registry.getValidator("config-document");
  if (validate({ config: result.resolved_config })) return [];
  return registry.errorsText(validate.errors, { separator: "\n", dataVar: "config" }).split("\n");
}
