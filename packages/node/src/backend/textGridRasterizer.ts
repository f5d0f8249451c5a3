/**
 * packages/node/src/backend/textGridRasterizer.ts — Terminal-cell rasterizer.
 *
 * Why: the core draws in pixels; a terminal shows cells. This backend maps
 * pixel coordinates onto a cols × rows grid (x / cellWidth, y / cellHeight),
 * draws into an off-screen grid and copies it to the front frame in one
 * step on present(), so a half-drawn frame is never observable.
 *
 * Wide graphemes occupy their cell plus a continuation cell (empty `ch`).
 */

import {
  type OffscreenBuffer,
  type Rasterizer,
  type Rect,
  type Rgb24,
  type Size,
  StripbarError,
  type TextMetrics,
  type TextStyle,
  rgbB,
  rgbG,
  rgbR,
} from "@stripbar/core";
import { graphemeWidth, measureTextCells, splitGraphemes } from "./textWidth.js";

export type GridCell = Readonly<{
  /** One grapheme, " " for blank, "" for the continuation of a wide grapheme. */
  ch: string;
  fg: Rgb24;
  bg: Rgb24;
  bold: boolean;
  dim: boolean;
}>;

export type GridFrame = Readonly<{
  cols: number;
  rows: number;
  /** Row-major, `cols * rows` cells. */
  cells: readonly GridCell[];
  /** Present counter, starting at 1. */
  seq: number;
}>;

export type TextGridRasterizerOptions = Readonly<{
  cellWidth?: number;
  cellHeight?: number;
  /** createBuffer() fails above this many cells. */
  maxCells?: number;
  onPresent?: (frame: GridFrame) => void;
}>;

const DEFAULT_CELL_WIDTH = 8;
const DEFAULT_CELL_HEIGHT = 16;
const DEFAULT_MAX_CELLS = 1_000_000;
const BLANK_FG: Rgb24 = 0xffffff;
const BLANK_BG: Rgb24 = 0x000000;
const ICON_FG: Rgb24 = 0xffffff;

function blankCell(bg: Rgb24): GridCell {
  return Object.freeze({ ch: " ", fg: BLANK_FG, bg, bold: false, dim: false });
}

function clampInt(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

function requireCellSize(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) {
    throw new StripbarError("STRIPBAR_INVALID_CONFIG", `${name} must be a positive integer (got ${String(v)})`);
  }
  return v;
}

class GridBuffer implements OffscreenBuffer {
  readonly size: Size;
  readonly cols: number;
  readonly rows: number;
  private cells: GridCell[];
  private disposed = false;

  constructor(
    size: Size,
    private readonly cellWidth: number,
    private readonly cellHeight: number,
  ) {
    this.size = size;
    this.cols = Math.max(1, Math.floor(size.w / cellWidth));
    this.rows = Math.max(1, Math.floor(size.h / cellHeight));
    this.cells = new Array<GridCell>(this.cols * this.rows).fill(blankCell(BLANK_BG));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  snapshotCells(): readonly GridCell[] {
    return Object.freeze([...this.cells]);
  }

  clear(color: Rgb24): void {
    this.assertLive();
    this.cells.fill(blankCell(color));
  }

  fillRect(rect: Rect, color: Rgb24): void {
    this.assertLive();
    const c0 = clampInt(Math.floor(rect.x / this.cellWidth), 0, this.cols);
    const c1 = clampInt(Math.ceil((rect.x + rect.w) / this.cellWidth), 0, this.cols);
    const r0 = clampInt(Math.floor(rect.y / this.cellHeight), 0, this.rows);
    const r1 = clampInt(Math.ceil((rect.y + rect.h) / this.cellHeight), 0, this.rows);
    for (let r = r0; r < r1; r++) {
      for (let c = c0; c < c1; c++) {
        const i = r * this.cols + c;
        const prev = this.cells[i];
        if (prev === undefined) continue;
        this.cells[i] = Object.freeze({ ...prev, bg: color });
      }
    }
  }

  drawText(x: number, y: number, text: string, style: TextStyle): void {
    this.assertLive();
    const row = clampInt(Math.round(y / this.cellHeight), 0, this.rows - 1);
    let col = Math.round(x / this.cellWidth);
    for (const g of splitGraphemes(text)) {
      const w = graphemeWidth(g);
      if (w === 0) continue;
      if (col + w > this.cols) break;
      if (col >= 0) {
        this.put(row, col, g, style);
        if (w === 2) this.put(row, col + 1, "", style);
      }
      col += w;
    }
  }

  drawLine(x0: number, y0: number, x1: number, y1: number, color: Rgb24, _thickness: number): void {
    this.assertLive();
    const style: TextStyle = { fg: color };
    if (Math.round(x0 / this.cellWidth) === Math.round(x1 / this.cellWidth)) {
      const col = Math.floor(x0 / this.cellWidth);
      if (col < 0 || col >= this.cols) return;
      const r0 = clampInt(Math.floor(Math.min(y0, y1) / this.cellHeight), 0, this.rows - 1);
      const r1 = clampInt(Math.floor(Math.max(y0, y1) / this.cellHeight), 0, this.rows - 1);
      for (let r = r0; r <= r1; r++) this.put(r, col, "│", style);
      return;
    }
    const row = clampInt(Math.floor(y0 / this.cellHeight), 0, this.rows - 1);
    const c0 = clampInt(Math.floor(Math.min(x0, x1) / this.cellWidth), 0, this.cols - 1);
    const c1 = clampInt(Math.floor(Math.max(x0, x1) / this.cellWidth), 0, this.cols - 1);
    for (let c = c0; c <= c1; c++) this.put(row, c, "─", style);
  }

  drawIcon(x: number, y: number, icon: string, _size: number): void {
    this.drawText(x, y, icon, { fg: ICON_FG });
  }

  dispose(): void {
    this.disposed = true;
    this.cells = [];
  }

  private put(row: number, col: number, ch: string, style: TextStyle): void {
    const i = row * this.cols + col;
    const prev = this.cells[i];
    if (prev === undefined) return;
    this.cells[i] = Object.freeze({
      ch,
      fg: style.fg,
      bg: style.bg ?? prev.bg,
      bold: style.bold === true,
      dim: style.dim === true,
    });
  }

  private assertLive(): void {
    if (this.disposed) throw new StripbarError("STRIPBAR_DISPOSED", "grid buffer is disposed");
  }
}

export class TextGridRasterizer implements Rasterizer {
  readonly cellWidth: number;
  readonly cellHeight: number;
  private readonly maxCells: number;
  private readonly onPresent: ((frame: GridFrame) => void) | undefined;
  private front: GridFrame | null = null;
  private seq = 0;

  constructor(opts: TextGridRasterizerOptions = {}) {
    this.cellWidth = requireCellSize("cellWidth", opts.cellWidth ?? DEFAULT_CELL_WIDTH);
    this.cellHeight = requireCellSize("cellHeight", opts.cellHeight ?? DEFAULT_CELL_HEIGHT);
    this.maxCells = opts.maxCells ?? DEFAULT_MAX_CELLS;
    this.onPresent = opts.onPresent;
  }

  measureText(text: string): TextMetrics {
    return { w: measureTextCells(text) * this.cellWidth, h: this.cellHeight };
  }

  createBuffer(size: Size): OffscreenBuffer {
    const cols = Math.max(1, Math.floor(size.w / this.cellWidth));
    const rows = Math.max(1, Math.floor(size.h / this.cellHeight));
    if (cols * rows > this.maxCells) {
      throw new StripbarError(
        "STRIPBAR_DRAW_FAILURE",
        `grid of ${String(cols)}x${String(rows)} cells exceeds the limit of ${String(this.maxCells)}`,
      );
    }
    return new GridBuffer(size, this.cellWidth, this.cellHeight);
  }

  present(buffer: OffscreenBuffer): void {
    if (!(buffer instanceof GridBuffer) || buffer.isDisposed) {
      throw new StripbarError("STRIPBAR_DRAW_FAILURE", "present() needs a live buffer from this rasterizer");
    }
    this.seq++;
    this.front = Object.freeze({
      cols: buffer.cols,
      rows: buffer.rows,
      cells: buffer.snapshotCells(),
      seq: this.seq,
    });
    this.onPresent?.(this.front);
  }

  /** The most recently presented frame. */
  frontFrame(): GridFrame | null {
    return this.front;
  }
}

/** Plain text of a frame, one line per row, continuation cells skipped. */
export function gridFrameToText(frame: GridFrame): string {
  const lines: string[] = [];
  for (let r = 0; r < frame.rows; r++) {
    let line = "";
    for (let c = 0; c < frame.cols; c++) line += frame.cells[r * frame.cols + c]?.ch ?? "";
    lines.push(line);
  }
  return lines.join("\n");
}

function sgr(cell: GridCell): string {
  const parts = ["0"];
  if (cell.bold) parts.push("1");
  if (cell.dim) parts.push("2");
  parts.push(`38;2;${String(rgbR(cell.fg))};${String(rgbG(cell.fg))};${String(rgbB(cell.fg))}`);
  parts.push(`48;2;${String(rgbR(cell.bg))};${String(rgbG(cell.bg))};${String(rgbB(cell.bg))}`);
  return `\u001b[${parts.join(";")}m`;
}

/** Frame as 24-bit ANSI text; SGR codes are emitted only when the style changes. */
export function gridFrameToAnsi(frame: GridFrame): string {
  const lines: string[] = [];
  for (let r = 0; r < frame.rows; r++) {
    let line = "";
    let current = "";
    for (let c = 0; c < frame.cols; c++) {
      const cell = frame.cells[r * frame.cols + c];
      if (cell === undefined || cell.ch === "") continue;
      const code = sgr(cell);
      if (code !== current) {
        line += code;
        current = code;
      }
      line += cell.ch;
    }
    lines.push(`${line}\u001b[0m`);
  }
  return lines.join("\n");
}
