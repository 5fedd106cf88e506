// Variant Catalog - known text service variants and the mapping family each one uses
// Entries live in data/variantCatalog.json so new variants need no code change
import { z } from 'zod';
import catalogJson from '../data/variantCatalog.json';
import type { MappingKind } from '../models';

const VariantEntrySchema = z.object({
  variantId: z.string().min(1),
  mapping: z.enum(['hero', 'content']),
  classifications: z.array(z.string().min(1)).min(1),
});

const VariantCatalogSchema = z.object({
  version: z.string(),
  variants: z.array(VariantEntrySchema),
});

export type IVariantEntry = z.infer<typeof VariantEntrySchema>;

export class VariantCatalog {
  private readonly entries: Map<string, IVariantEntry>;

  constructor(public readonly version: string, variants: IVariantEntry[]) {
    this.entries = new Map();
    for (const entry of variants) {
      if (this.entries.has(entry.variantId)) {
        throw new Error(`Duplicate variant in catalog: ${entry.variantId}`);
      }
      this.entries.set(entry.variantId, entry);
    }
  }

  /**
   * Parse a raw catalog document (throws on schema violations)
   */
  static fromJson(raw: unknown): VariantCatalog {
    const parsed = VariantCatalogSchema.parse(raw);
    return new VariantCatalog(parsed.version, parsed.variants);
  }

  get(variantId: string): IVariantEntry | undefined {
    return this.entries.get(variantId);
  }

  /**
   * Mapping family for a (classification, variant) pair, or undefined when the
   * pair is not registered
   */
  resolveMapping(classification: string, variantId: string): MappingKind | undefined {
    const entry = this.entries.get(variantId);
    if (!entry || !entry.classifications.includes(classification)) {
      return undefined;
    }
    return entry.mapping;
  }

  list(): IVariantEntry[] {
    return Array.from(this.entries.values());
  }
}

let defaultCatalog: VariantCatalog | null = null;

/**
 * Catalog bundled with the service (parsed once)
 */
export const getDefaultVariantCatalog = (): VariantCatalog => {
  if (!defaultCatalog) {
    defaultCatalog = VariantCatalog.fromJson(catalogJson);
  }
  return defaultCatalog;
};
