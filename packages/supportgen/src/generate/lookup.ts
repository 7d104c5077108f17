import { GenerationError } from "../errors";

/** Per-category parameter lookup; a missing category is a configuration bug. */
export function lookupParams<T>(table: Record<string, T>, key: string, tableName: string, stage: string): T {
  if (!Object.hasOwn(table, key)) {
    throw new GenerationError(stage, `No ${tableName} entry for "${key}"`);
  }
  return table[key];
}
