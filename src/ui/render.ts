import { BOLD_GLYPHS, GLYPH_HEIGHT, NORMAL_GLYPHS } from './glyphs.js';
import type { GlyphRows } from './glyphs.js';

/**
 * Draws `text` as four rows of large digits. Characters without a glyph are
 * dropped. Rows are left-aligned; centering happens when the frame is laid out.
 */
export function renderGlyphs(text: string, bold: boolean): string[] {
  const table = bold ? BOLD_GLYPHS : NORMAL_GLYPHS;
  const glyphs: GlyphRows[] = [];
  for (const char of text) {
    const glyph = table[char];
    if (glyph) {
      glyphs.push(glyph);
    }
  }

  const rows: string[] = [];
  for (let row = 0; row < GLYPH_HEIGHT; row++) {
    rows.push(glyphs.map((glyph) => glyph[row]).join(' '));
  }
  return rows;
}
