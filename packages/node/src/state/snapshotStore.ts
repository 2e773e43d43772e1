/**
 * packages/node/src/state/snapshotStore.ts — Snapshots on disk.
 *
 * Writes go to `<path>.tmp` and are renamed over `path`, so a reader (or a
 * crash mid-write) never sees a truncated document.
 */

import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { type Result, type Snapshot, TermlineError, deserializeSnapshot, err, serializeSnapshot } from "@termline/core";

export async function saveSnapshot(path: string, snapshot: Snapshot): Promise<void> {
  const text = serializeSnapshot(snapshot);
  const tmp = `${path}.tmp`;
  try {
    await writeFile(tmp, `${text}\n`, "utf8");
    await rename(tmp, path);
  } catch (error: unknown) {
    await rm(tmp, { force: true });
    throw error;
  }
}

/** File read failures and malformed documents both come back as SERIALIZE_ERROR results. */
export async function loadSnapshot(path: string): Promise<Result<Snapshot, TermlineError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (cause: unknown) {
    return err(new TermlineError("SERIALIZE_ERROR", `cannot read snapshot: ${path}`, { cause }));
  }
  return deserializeSnapshot(text);
}
