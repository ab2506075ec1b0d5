// src/extractors/schemas.ts
import { z } from 'zod';

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? '' : String(value).trim()));

/**
 * Raw `/v1/articulos` record. Unknown fields are ignored.
 */
export const ArticleRecordSchema = z.object({
  sku: text,
  nombre: text,
  tipo: text,
  marca: text,
  grupo: text,
  estado: text
});

/**
 * Raw `/v1/articulos/precios` record. Price fields are checked by the extractor.
 */
export const PriceRecordSchema = z.object({
  sku: text,
  precio_unitario: z.unknown(),
  iva_tasa: z.unknown()
});

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;
export type PriceRecord = z.infer<typeof PriceRecordSchema>;

/**
 * Numeric value of a JSON number or numeric string, null otherwise.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
