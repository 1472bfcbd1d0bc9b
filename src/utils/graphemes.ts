const segmenter = new Intl.Segmenter('de', { granularity: 'grapheme' });

/** NFC form, so decomposed umlauts match what the layout produces. */
export function composeText(text: string): string {
  return text.normalize('NFC');
}

export function splitGraphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (segment) => segment.segment);
}

export function graphemeLength(text: string): number {
  return splitGraphemes(text).length;
}
