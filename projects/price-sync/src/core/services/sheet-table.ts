// src/core/services/sheet-table.ts
import { UnifiedRow } from '../../types/catalog';

export type SheetCell = string | number;

export interface ColumnLayout {
  skuColumn: number;
  priceColumns: number[];
  taxColumns: number[];
}

export interface SheetTable {
  header: string[];
  rows: SheetCell[][];
  layout: ColumnLayout;
}

export const BASE_HEADERS = ['Código', 'Tipo', 'Artículo', 'Grupo', 'Marca'] as const;

export const TAX_COLUMN_SUFFIX = ' IVA';

/**
 * Column name of a price list, `Lista <id>` when the catalog does not know it
 */
export function priceListColumnName(priceListId: number, catalog: Readonly<Record<string, string>>): string {
  return catalog[String(priceListId)] ?? `Lista ${priceListId}`;
}

function blankIfNull(value: number | null): SheetCell {
  return value === null ? '' : value;
}

/**
 * Flatten unified rows into the spreadsheet layout: article columns,
 * then one price and one tax column per list in `priceListOrder`.
 * Missing values become empty cells.
 */
export function buildSheetTable(
  rows: readonly UnifiedRow[],
  priceListOrder: readonly number[],
  catalog: Readonly<Record<string, string>>
): SheetTable {
  const header: string[] = [...BASE_HEADERS];
  const priceColumns: number[] = [];
  const taxColumns: number[] = [];

  for (const priceListId of priceListOrder) {
    const name = priceListColumnName(priceListId, catalog);
    priceColumns.push(header.length);
    header.push(name);
    taxColumns.push(header.length);
    header.push(`${name}${TAX_COLUMN_SUFFIX}`);
  }

  const body = rows.map((row) => {
    const cells: SheetCell[] = [row.sku, row.type, row.name, row.group, row.brand];
    for (const priceListId of priceListOrder) {
      const cell = row.prices.find((price) => price.priceListId === priceListId);
      cells.push(blankIfNull(cell?.unitPrice ?? null), blankIfNull(cell?.taxRate ?? null));
    }
    return cells;
  });

  return {
    header,
    rows: body,
    layout: { skuColumn: 0, priceColumns, taxColumns }
  };
}

/**
 * Header followed by the data rows, ready for a single bulk write
 */
export function toSheetValues(table: SheetTable): SheetCell[][] {
  return [table.header, ...table.rows];
}
