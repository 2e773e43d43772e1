/**
 * packages/node/src/input/keymapFile.ts — Load a key map from a JSON file.
 */

import { readFile } from "node:fs/promises";
import {
  KeyMap,
  type KeyMapOptions,
  type Result,
  TermlineError,
  err,
  ok,
  parseKeyMapConfig,
} from "@termline/core";

export async function loadKeyMapFile(
  path: string,
  opts: Omit<KeyMapOptions, "defaults"> = {},
): Promise<Result<KeyMap, TermlineError>> {
  let doc: unknown;
  try {
    doc = JSON.parse(await readFile(path, "utf8"));
  } catch (cause: unknown) {
    return err(new TermlineError("INVALID_ARGUMENT", `cannot load key map: ${path}`, { cause }));
  }
  const parsed = parseKeyMapConfig(doc);
  if (!parsed.ok) return parsed;
  return ok(KeyMap.fromConfig(parsed.value, opts));
}
