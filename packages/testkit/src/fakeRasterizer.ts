/**
 * Deterministic in-memory rasterizer for tests.
 *
 * Every code point is `charWidth` pixels wide and every line `lineHeight`
 * pixels tall. Buffers record their draw calls; present() snapshots the
 * recorded calls as one frame.
 */

import type { OffscreenBuffer, Rasterizer, Rect, Rgb24, Size, TextMetrics, TextStyle } from "@stripbar/core";

export type FakeDrawOp =
  | Readonly<{ op: "clear"; color: Rgb24 }>
  | Readonly<{ op: "fillRect"; rect: Rect; color: Rgb24 }>
  | Readonly<{ op: "drawText"; x: number; y: number; text: string; style: TextStyle }>
  | Readonly<{
      op: "drawLine";
      x0: number;
      y0: number;
      x1: number;
      y1: number;
      color: Rgb24;
      thickness: number;
    }>
  | Readonly<{ op: "drawIcon"; x: number; y: number; icon: string; size: number }>;

export type FakeFrame = Readonly<{ size: Size; ops: readonly FakeDrawOp[] }>;

export type FakeRasterizerOptions = Readonly<{
  charWidth?: number;
  lineHeight?: number;
  /** Texts whose measurement throws. */
  failMeasure?: readonly string[];
}>;

class FakeBuffer implements OffscreenBuffer {
  readonly size: Size;
  ops: FakeDrawOp[] = [];
  disposed = false;

  constructor(size: Size) {
    this.size = Object.freeze({ w: size.w, h: size.h });
  }

  clear(color: Rgb24): void {
    this.ops = [{ op: "clear", color }];
  }

  fillRect(rect: Rect, color: Rgb24): void {
    this.ops.push({ op: "fillRect", rect: { x: rect.x, y: rect.y, w: rect.w, h: rect.h }, color });
  }

  drawText(x: number, y: number, text: string, style: TextStyle): void {
    this.ops.push({ op: "drawText", x, y, text, style });
  }

  drawLine(x0: number, y0: number, x1: number, y1: number, color: Rgb24, thickness: number): void {
    this.ops.push({ op: "drawLine", x0, y0, x1, y1, color, thickness });
  }

  drawIcon(x: number, y: number, icon: string, size: number): void {
    this.ops.push({ op: "drawIcon", x, y, icon, size });
  }

  dispose(): void {
    this.disposed = true;
  }
}

export class FakeRasterizer implements Rasterizer {
  readonly charWidth: number;
  readonly lineHeight: number;
  readonly frames: FakeFrame[] = [];
  createdBuffers = 0;
  measureCalls = 0;
  private allocationFailures = 0;
  private presentFailures = 0;
  private readonly failMeasure: ReadonlySet<string>;

  constructor(opts: FakeRasterizerOptions = {}) {
    this.charWidth = opts.charWidth ?? 7;
    this.lineHeight = opts.lineHeight ?? 14;
    this.failMeasure = new Set(opts.failMeasure ?? []);
  }

  measureText(text: string): TextMetrics {
    this.measureCalls++;
    if (this.failMeasure.has(text)) throw new Error(`measure failed: ${text}`);
    return { w: [...text].length * this.charWidth, h: this.lineHeight };
  }

  createBuffer(size: Size): OffscreenBuffer {
    if (this.allocationFailures > 0) {
      this.allocationFailures--;
      throw new Error("out of buffer memory");
    }
    this.createdBuffers++;
    return new FakeBuffer(size);
  }

  present(buffer: OffscreenBuffer): void {
    if (this.presentFailures > 0) {
      this.presentFailures--;
      throw new Error("present failed");
    }
    if (!(buffer instanceof FakeBuffer)) throw new Error("foreign buffer");
    this.frames.push(Object.freeze({ size: buffer.size, ops: Object.freeze([...buffer.ops]) }));
  }

  /** Make the next `count` createBuffer() calls throw. */
  failNextAllocations(count: number): void {
    this.allocationFailures = count;
  }

  /** Make the next `count` present() calls throw. */
  failNextPresents(count: number): void {
    this.presentFailures = count;
  }

  lastFrame(): FakeFrame | null {
    return this.frames[this.frames.length - 1] ?? null;
  }

  /** Texts drawn in the last presented frame, in draw order. */
  lastTexts(): readonly string[] {
    const frame = this.lastFrame();
    if (frame === null) return [];
    const out: string[] = [];
    for (const op of frame.ops) if (op.op === "drawText") out.push(op.text);
    return out;
  }
}

export function createFakeRasterizer(opts?: FakeRasterizerOptions): FakeRasterizer {
  return new FakeRasterizer(opts);
}
