import { describe, it, expect } from 'vitest';
import { joinTextItems } from '../../src/server/extraction/pdf/PdfParseTextSource.js';

function item(str: string, y: number) {
  return { str, transform: [1, 0, 0, 1, 0, y] };
}

describe('joinTextItems', () => {
  it('joins items on the same baseline and breaks lines when it changes', () => {
    expect(joinTextItems([item('مادة ', 700), item('١', 700), item('نص المادة', 680), item('تتمة', 660)])).toBe(
      'مادة ١\nنص المادة\nتتمة'
    );
  });

  it('returns an empty string for a page without text', () => {
    expect(joinTextItems([])).toBe('');
  });
});
