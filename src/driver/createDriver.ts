import type { ArrayId } from "../core/index.ts";
import { DEFAULT_ARRAY_ID, findArrayByName } from "../core/index.ts";
import type { GameDriver } from "./gameDriver.ts";
import { LocalDriver } from "./localDriver.ts";

/**
 * Pick the starting array: an explicit request wins over the
 * ENOCHIAN_ARRAY environment variable, which wins over the default.
 */
export function selectArrayId(args: { requested?: string | undefined; envArray?: string | undefined }): ArrayId {
  for (const name of [args.requested, args.envArray]) {
    if (!name || !name.trim()) continue;
    const found = findArrayByName(name);
    if (!found) throw new Error(`Unknown array: ${name}`);
    return found.arrayId;
  }
  return DEFAULT_ARRAY_ID;
}

export function createDriver(args: { requested?: string | undefined; envArray?: string | undefined } = {}): GameDriver {
  const envArray = "envArray" in args ? args.envArray : process.env.ENOCHIAN_ARRAY;
  return LocalDriver.fromArray(selectArrayId({ requested: args.requested, envArray }));
}
