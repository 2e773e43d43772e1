/**
 * packages/node/src/diagnostics/fileLogSink.ts — Append log records to a file.
 *
 * A full-screen app owns stdout and stderr shares the same terminal, so log
 * lines go to a file instead. Writes are synchronous: the logger's sink is a
 * plain function and records must be on disk before a crash exits.
 */

import { closeSync, openSync, writeSync } from "node:fs";
import type { LogSink } from "@termline/core";

export type FileLogSink = Readonly<{
  sink: LogSink;
  path: string;
  /** Idempotent. Records written after close are dropped. */
  close: () => void;
}>;

export function createFileLogSink(path: string): FileLogSink {
  let fd: number | null = openSync(path, "a");
  return Object.freeze({
    path,
    sink: (line: string) => {
      if (fd === null) return;
      writeSync(fd, `${line}\n`);
    },
    close: () => {
      if (fd === null) return;
      const open = fd;
      fd = null;
      closeSync(open);
    },
  });
}
