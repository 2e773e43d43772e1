/**
 * packages/core/src/runtime/cellBuffer.ts — 2-D grid of styled cells.
 *
 * Components paint into a CellBuffer; the runtime serializes it into one
 * full-frame write. Coordinates outside the grid are ignored, never thrown.
 * `style` is an SGR parameter string ("1;31"), "" for the terminal default.
 */

export type Cell = Readonly<{ ch: string; style: string }>;

export const BLANK_CELL: Cell = Object.freeze({ ch: " ", style: "" });

function cellOf(ch: string, style: string): Cell {
  return ch === " " && style === "" ? BLANK_CELL : Object.freeze({ ch, style });
}

export class CellBuffer {
  #width: number;
  #height: number;
  #cells: Cell[];

  constructor(width: number, height: number) {
    this.#width = Math.max(0, Math.floor(width));
    this.#height = Math.max(0, Math.floor(height));
    this.#cells = new Array<Cell>(this.#width * this.#height).fill(BLANK_CELL);
  }

  get width(): number {
    return this.#width;
  }

  get height(): number {
    return this.#height;
  }

  #inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.#width && y < this.#height
    );
  }

  getCell(x: number, y: number): Cell | null {
    if (!this.#inBounds(x, y)) return null;
    return this.#cells[y * this.#width + x] ?? null;
  }

  setCell(x: number, y: number, ch: string, style = ""): boolean {
    if (!this.#inBounds(x, y)) return false;
    this.#cells[y * this.#width + x] = cellOf(ch, style);
    return true;
  }

  /**
   * Writes one cell per code point, clipped to the row and to `maxWidth`.
   * Returns the number of cells written.
   */
  writeText(x: number, y: number, text: string, style = "", maxWidth = Number.POSITIVE_INFINITY): number {
    let written = 0;
    let cx = x;
    for (const ch of text) {
      if (written >= maxWidth) break;
      if (cx >= this.#width) break;
      if (this.setCell(cx, y, ch, style)) written++;
      cx++;
    }
    return written;
  }

  fill(x: number, y: number, w: number, h: number, ch = " ", style = ""): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.#width, x + w);
    const y1 = Math.min(this.#height, y + h);
    const cell = cellOf(ch, style);
    for (let row = y0; row < y1; row++) {
      for (let col = x0; col < x1; col++) this.#cells[row * this.#width + col] = cell;
    }
  }

  clear(): void {
    this.#cells.fill(BLANK_CELL);
  }

  /** Resizes in place, keeping the overlapping top-left region. */
  resize(width: number, height: number): void {
    const w = Math.max(0, Math.floor(width));
    const h = Math.max(0, Math.floor(height));
    if (w === this.#width && h === this.#height) return;
    const next = new Array<Cell>(w * h).fill(BLANK_CELL);
    for (let row = 0; row < Math.min(h, this.#height); row++) {
      for (let col = 0; col < Math.min(w, this.#width); col++) {
        next[row * w + col] = this.#cells[row * this.#width + col] ?? BLANK_CELL;
      }
    }
    this.#width = w;
    this.#height = h;
    this.#cells = next;
  }

  /** Plain text rows, styles dropped. */
  toLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this.#height; row++) {
      let line = "";
      for (let col = 0; col < this.#width; col++) line += (this.#cells[row * this.#width + col] ?? BLANK_CELL).ch;
      lines.push(line);
    }
    return lines;
  }

  /** Rows with SGR transitions; every styled run is reset before the row ends. */
  toAnsiLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this.#height; row++) {
      let line = "";
      let active = "";
      for (let col = 0; col < this.#width; col++) {
        const cell = this.#cells[row * this.#width + col] ?? BLANK_CELL;
        if (cell.style !== active) {
          line += cell.style === "" ? "\u001b[0m" : `\u001b[0;${cell.style}m`;
          active = cell.style;
        }
        line += cell.ch;
      }
      if (active !== "") line += "\u001b[0m";
      lines.push(line);
    }
    return lines;
  }
}
