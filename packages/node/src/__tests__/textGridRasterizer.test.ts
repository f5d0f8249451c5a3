import assert from "node:assert/strict";
import test from "node:test";
import { StripbarError } from "@stripbar/core";
import { TextGridRasterizer, gridFrameToAnsi, gridFrameToText } from "../backend/textGridRasterizer.js";

function isCode(code: string) {
  return (err: unknown) => err instanceof StripbarError && err.code === code;
}

test("measureText scales cell counts by the cell size", () => {
  const r = new TextGridRasterizer();
  assert.deepEqual(r.measureText("ab"), { w: 16, h: 16 });
  assert.deepEqual(r.measureText("日"), { w: 16, h: 16 });
});

test("drawText maps pixels to cells and present exposes the frame", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 80, h: 16 });
  buf.clear(0x111111);
  buf.drawText(8, 0, "hi", { fg: 0xffffff });
  r.present(buf);

  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(frame.cols, 10);
  assert.equal(frame.rows, 1);
  assert.equal(frame.seq, 1);
  assert.equal(gridFrameToText(frame), " hi       ");
  assert.deepEqual(frame.cells[1], { ch: "h", fg: 0xffffff, bg: 0x111111, bold: false, dim: false });
});

test("wide graphemes take a continuation cell", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 80, h: 16 });
  buf.clear(0);
  buf.drawText(0, 0, "日x", { fg: 1 });
  r.present(buf);
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(frame.cells[1]?.ch, "");
  assert.equal(frame.cells[2]?.ch, "x");
  assert.equal(gridFrameToText(frame), "日x       ");
});

test("text past the last column is cut at a grapheme boundary", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 24, h: 16 });
  buf.clear(0);
  buf.drawText(8, 0, "a日", { fg: 1 });
  r.present(buf);
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(gridFrameToText(frame), " a ");
});

test("fillRect colors every cell the rectangle touches", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 80, h: 16 });
  buf.clear(0);
  buf.fillRect({ x: 12, y: 2, w: 10, h: 12 }, 0x222222);
  r.present(buf);
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.deepEqual(
    frame.cells.map((c) => c.bg),
    [0, 0x222222, 0x222222, 0, 0, 0, 0, 0, 0, 0],
  );
});

test("text rows round from the pixel y", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 24, h: 34 });
  buf.clear(0);
  buf.drawText(0, 10, "ab", { fg: 1 });
  r.present(buf);
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(frame.rows, 2);
  assert.equal(gridFrameToText(frame), "   \nab ");
});

test("a vertical line becomes a box-drawing column", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 40, h: 16 });
  buf.clear(0);
  buf.drawLine(16, 6, 16, 10, 0xff0000, 2);
  r.present(buf);
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(gridFrameToText(frame), "  │  ");
  assert.equal(frame.cells[2]?.fg, 0xff0000);
});

test("the presented frame does not change when the buffer is drawn again", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 16, h: 16 });
  buf.clear(0);
  buf.drawText(0, 0, "a", { fg: 1 });
  r.present(buf);
  buf.drawText(0, 0, "b", { fg: 1 });
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(gridFrameToText(frame), "a ");
});

test("onPresent receives each frame", () => {
  const seen: number[] = [];
  const r = new TextGridRasterizer({ onPresent: (f) => seen.push(f.seq) });
  const buf = r.createBuffer({ w: 16, h: 16 });
  r.present(buf);
  r.present(buf);
  assert.deepEqual(seen, [1, 2]);
});

test("createBuffer fails above the cell limit", () => {
  const r = new TextGridRasterizer({ maxCells: 5 });
  assert.throws(() => r.createBuffer({ w: 80, h: 16 }), isCode("STRIPBAR_DRAW_FAILURE"));
});

test("present rejects a disposed buffer", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 16, h: 16 });
  buf.dispose();
  assert.throws(() => r.present(buf), isCode("STRIPBAR_DRAW_FAILURE"));
  assert.equal(r.frontFrame(), null);
});

test("invalid cell sizes are rejected", () => {
  assert.throws(() => new TextGridRasterizer({ cellWidth: 0 }), isCode("STRIPBAR_INVALID_CONFIG"));
});

test("gridFrameToAnsi emits 24-bit SGR codes", () => {
  const r = new TextGridRasterizer();
  const buf = r.createBuffer({ w: 8, h: 16 });
  buf.clear(0);
  buf.drawText(0, 0, "a", { fg: 0xff0000, bold: true });
  r.present(buf);
  const frame = r.frontFrame();
  assert.ok(frame !== null);
  assert.equal(gridFrameToAnsi(frame), "\u001b[0;1;38;2;255;0;0;48;2;0;0;0ma\u001b[0m");
});
