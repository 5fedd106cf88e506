import { describe, it, expect } from 'vitest';
import { VariantCatalog, getDefaultVariantCatalog } from '../variantCatalog';
import { SLIDE_CLASSIFICATIONS } from '../../models';

describe('VariantCatalog', () => {
  it('registers at least one variant for every classification', () => {
    const registered = new Set(getDefaultVariantCatalog().list().flatMap((entry) => entry.classifications));

    for (const classification of SLIDE_CLASSIFICATIONS) {
      expect(registered.has(classification)).toBe(true);
    }
  });

  it('resolves the mapping only for registered pairs', () => {
    const catalog = getDefaultVariantCatalog();

    expect(catalog.resolveMapping('title_slide', 'hero_opening_centered')).toBe('hero');
    expect(catalog.resolveMapping('matrix_2x2', 'matrix_2x3')).toBe('content');
    expect(catalog.resolveMapping('closing_slide', 'hero_opening_centered')).toBeUndefined();
    expect(catalog.resolveMapping('matrix_2x2', 'unknown_variant')).toBeUndefined();
  });

  it('rejects malformed catalog documents', () => {
    expect(() => VariantCatalog.fromJson({ version: 'v1.2', variants: [{ variantId: 'x', mapping: 'chart' }] })).toThrow();
  });

  it('rejects duplicate variant ids', () => {
    expect(
      () =>
        new VariantCatalog('v1.2', [
          { variantId: 'table_2col', mapping: 'content', classifications: ['styled_table'] },
          { variantId: 'table_2col', mapping: 'content', classifications: ['styled_table'] },
        ])
    ).toThrow('Duplicate variant in catalog: table_2col');
  });
});
