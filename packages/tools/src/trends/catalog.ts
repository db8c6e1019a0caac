import { z } from 'zod';
import catalogJson from './catalog.json' with { type: 'json' };

const TrendCategorySchema = z.object({
  name: z.string().min(1),
  /** Volume multiplier in the listed months (1-12), and outside them. */
  seasonal: z.object({
    months: z.array(z.number().int().min(1).max(12)),
    inSeason: z.number().positive(),
    offSeason: z.number().positive(),
  }),
  errors: z.array(z.string().min(1)).min(1),
});

export const TrendCatalogSchema = z.object({
  categories: z.array(TrendCategorySchema),
});

export type TrendCategory = z.infer<typeof TrendCategorySchema>;
export type TrendCatalog = z.infer<typeof TrendCatalogSchema>;

export function loadDefaultTrendCatalog(): TrendCatalog {
  return TrendCatalogSchema.parse(catalogJson);
}

/** `month` is 1-based. */
export function seasonalWeight(category: TrendCategory, month: number): number {
  return category.seasonal.months.includes(month) ? category.seasonal.inSeason : category.seasonal.offSeason;
}
