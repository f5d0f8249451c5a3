/**
 * packages/node/src/backend/textWidth.ts — Terminal cell width of bar text.
 *
 * Width rules:
 *   - controls and combining marks: 0 cells
 *   - emoji-presented graphemes and East Asian wide/fullwidth: 2 cells
 *   - everything else: 1 cell per grapheme
 *
 * Graphemes come from Intl.Segmenter, so ZWJ sequences, flags and keycaps
 * count once.
 */

/** Maximum number of cached measurements before eviction. */
const TEXT_CACHE_MAX_SIZE = 4096;
/** Longer strings are measured every time. */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const EMOJI_PRESENTATION = /\p{Emoji_Presentation}/u;
const EXTENDED_PICTOGRAPHIC = /\p{Extended_Pictographic}/u;
const REGIONAL_INDICATOR = /\p{Regional_Indicator}/u;
const ZERO_WIDTH = /^[\p{Mn}\p{Me}\p{Cf}\p{Cc}]+$/u;
const VARIATION_SELECTOR_16 = "\u{fe0f}";
const COMBINING_ENCLOSING_KEYCAP = "\u{20e3}";

function evictOldestEntry(): void {
  const oldest = textWidthCache.keys().next();
  if (oldest.done === true) return;
  textWidthCache.delete(oldest.value);
}

export function clearTextWidthCache(): void {
  textWidthCache.clear();
}

export function getTextWidthCacheSize(): number {
  return textWidthCache.size;
}

/** East Asian Wide and Fullwidth blocks (the ranges a status bar meets in practice). */
function isEastAsianWide(cp: number): boolean {
  return (
    (cp >= 0x1100 && cp <= 0x115f) ||
    (cp >= 0x2e80 && cp <= 0x303e) ||
    (cp >= 0x3041 && cp <= 0x33ff) ||
    (cp >= 0x3400 && cp <= 0x4dbf) ||
    (cp >= 0x4e00 && cp <= 0x9fff) ||
    (cp >= 0xa000 && cp <= 0xa4cf) ||
    (cp >= 0xac00 && cp <= 0xd7a3) ||
    (cp >= 0xf900 && cp <= 0xfaff) ||
    (cp >= 0xfe30 && cp <= 0xfe4f) ||
    (cp >= 0xff00 && cp <= 0xff60) ||
    (cp >= 0xffe0 && cp <= 0xffe6) ||
    (cp >= 0x20000 && cp <= 0x3fffd)
  );
}

/** Width of one grapheme cluster. */
export function graphemeWidth(grapheme: string): 0 | 1 | 2 {
  if (grapheme.length === 0 || ZERO_WIDTH.test(grapheme)) return 0;
  if (grapheme.includes(COMBINING_ENCLOSING_KEYCAP)) return 2;
  if (REGIONAL_INDICATOR.test(grapheme)) return 2;
  if (EMOJI_PRESENTATION.test(grapheme)) return 2;
  if (EXTENDED_PICTOGRAPHIC.test(grapheme) && grapheme.includes(VARIATION_SELECTOR_16)) return 2;
  const first = grapheme.codePointAt(0);
  if (first !== undefined && isEastAsianWide(first)) return 2;
  return 1;
}

export function splitGraphemes(text: string): readonly string[] {
  const out: string[] = [];
  for (const s of segmenter.segment(text)) out.push(s.segment);
  return out;
}

function computeWidth(text: string): number {
  let w = 0;
  for (const s of segmenter.segment(text)) w += graphemeWidth(s.segment);
  return w;
}

/** Display width of `text` in terminal cells. */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;
  if (text.length > TEXT_CACHE_MAX_KEY_LENGTH) return computeWidth(text);

  const cached = textWidthCache.get(text);
  if (cached !== undefined) return cached;

  const w = computeWidth(text);
  if (textWidthCache.size >= TEXT_CACHE_MAX_SIZE) evictOldestEntry();
  textWidthCache.set(text, w);
  return w;
}
