import { describe, it, expect } from 'vitest';
import { renderGlyphs } from './render.js';

describe('renderGlyphs', () => {
  it('draws four rows joined with one column between glyphs', () => {
    expect(renderGlyphs('12:34', false)).toEqual([
      '    ┐ ┌───┐   ┌───┐ ┐   ┐',
      '    │     │ ●     │ └───┤',
      '    │ ┌───┘ ●   ──┤     │',
      '    ┴ └───┘   └───┘     ┘',
    ]);
  });

  it('gives every row the summed glyph width plus separators', () => {
    // four 5-wide digits, a 1-wide colon, four separators
    for (const row of renderGlyphs('12:34', false)) {
      expect(row).toHaveLength(25);
    }
    // bold digits are 7 wide
    for (const row of renderGlyphs('12:34', true)) {
      expect(row).toHaveLength(33);
    }
  });

  it('uses the bold table when asked', () => {
    expect(renderGlyphs('1', true)).toEqual(['      ║', '      ║', '      ║', '      ║']);
  });

  it('skips characters without a glyph', () => {
    expect(renderGlyphs('1x', false)).toEqual(renderGlyphs('1', false));
    expect(renderGlyphs('x', false)).toEqual(['', '', '', '']);
  });

  it('renders spaces as blank glyphs', () => {
    expect(renderGlyphs(' ', false)).toEqual(['     ', '     ', '     ', '     ']);
  });
});
