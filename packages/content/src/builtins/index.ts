import { fileURLToPath } from "node:url";
import type { BattleLogger } from "@emberfall/battle-engine";
import { loadContentDirectory, type InMemoryContentProvider } from "../provider.js";

/** Starter regions, activities, items and enemies shipped with the package. */
export const BUILTIN_CONTENT_ROOT = fileURLToPath(new URL("../../data", import.meta.url));

let builtin: InMemoryContentProvider | undefined;

export function loadBuiltinContent(logger?: BattleLogger): InMemoryContentProvider {
  if (!builtin) {
    builtin = loadContentDirectory(BUILTIN_CONTENT_ROOT, { logger });
  }
  return builtin;
}
