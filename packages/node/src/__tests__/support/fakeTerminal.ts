import { EventEmitter } from "node:events";
import { PassThrough, Writable } from "node:stream";

/** stdin stand-in that reports a TTY and records raw-mode switches. */
export class FakeTtyInput extends PassThrough {
  isTTY = true;
  isRaw: boolean;
  readonly rawModes: boolean[] = [];

  constructor(isRaw = false) {
    super();
    this.isRaw = isRaw;
  }

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    this.isRaw = mode;
    return this;
  }
}

/** stdout stand-in that keeps everything written to it. */
export class RecordingOutput extends Writable {
  text = "";
  columns: number | undefined;
  rows: number | undefined;

  constructor(size?: { columns: number; rows: number }) {
    super();
    this.columns = size?.columns;
    this.rows = size?.rows;
  }

  override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += String(chunk);
    callback();
  }
}

export class FakeProcess extends EventEmitter {
  exitCode: number | string | undefined;
}

export function text(chunk: Uint8Array | null): string | null {
  return chunk === null ? null : new TextDecoder().decode(chunk);
}
