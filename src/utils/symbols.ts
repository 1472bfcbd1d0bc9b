// Display forms for whitespace graphemes in tables and previews.

export const LINE_BREAK_SYMBOL = '↵';
export const TAB_SYMBOL = '⇥';
export const SPACE_SYMBOL = '␣';
export const EMPTY_SYMBOL = '<empty>';

const VISIBLE: Readonly<Record<string, string>> = {
  '\n': LINE_BREAK_SYMBOL,
  '\r': LINE_BREAK_SYMBOL,
  '\t': TAB_SYMBOL,
  ' ': SPACE_SYMBOL,
};

/** Makes whitespace visible; `emptyAs` stands in for ''. */
export function visibleSymbol(symbol: string, emptyAs = EMPTY_SYMBOL): string {
  if (symbol === '') return emptyAs;
  return VISIBLE[symbol] ?? symbol;
}
