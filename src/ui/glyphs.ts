// Box-drawing glyphs, 4 rows each. Every row of a glyph has the same width.

export type GlyphRows = readonly [string, string, string, string];

export const GLYPH_HEIGHT = 4;

export const NORMAL_GLYPHS: Readonly<Record<string, GlyphRows>> = {
  '0': ['┌───┐', '│   │', '│   │', '└───┘'],
  '1': ['    ┐', '    │', '    │', '    ┴'],
  '2': ['┌───┐', '    │', '┌───┘', '└───┘'],
  '3': ['┌───┐', '    │', '  ──┤', '└───┘'],
  '4': ['┐   ┐', '└───┤', '    │', '    ┘'],
  '5': ['┌───┐', '└───┐', '┌   │', '└───┘'],
  '6': ['┌───┐', '├───┐', '│   │', '└───┘'],
  '7': ['┌───┐', '    │', '    │', '    ┘'],
  '8': ['┌───┐', '├───┤', '│   │', '└───┘'],
  '9': ['┌───┐', '└───┤', '    │', '    ┘'],
  ':': [' ', '●', '●', ' '],
  ' ': ['     ', '     ', '     ', '     '],
};

export const BOLD_GLYPHS: Readonly<Record<string, GlyphRows>> = {
  '0': ['╔═════╗', '║     ║', '║     ║', '╚═════╝'],
  '1': ['      ║', '      ║', '      ║', '      ║'],
  '2': ['╔═════╗', '      ║', '╔═════╝', '╚═════╝'],
  '3': ['╔═════╗', '      ║', ' ═════╣', '╚═════╝'],
  '4': ['╗     ║', '║     ║', '╚═════╣', '      ║'],
  '5': ['╔═════╗', '║      ', '╚═════╗', '╚═════╝'],
  '6': ['╔═════╗', '║      ', '╠═════╗', '╚═════╝'],
  '7': ['╔═════╗', '      ║', '      ║', '      ║'],
  '8': ['╔═════╗', '║     ║', '╠═════╣', '╚═════╝'],
  '9': ['╔═════╗', '║     ║', '╚═════╣', '╚═════╝'],
  ':': [' ', '●', '●', ' '],
  ' ': ['       ', '       ', '       ', '       '],
};
