import { describe, it, expect } from 'vitest';
import { dpiToScale } from '../PdfRenderer';

describe('dpiToScale', () => {
  it('should map 72 DPI to the PDF native scale', () => {
    expect(dpiToScale(72)).toBe(1);
  });

  it('should scale pages up for OCR resolution', () => {
    expect(dpiToScale(300)).toBe(300 / 72);
    expect(dpiToScale(144)).toBe(2);
  });
});
