// Tests for flattening unified rows into the spreadsheet layout
import { BASE_HEADERS, buildSheetTable, priceListColumnName, toSheetValues } from '../../core/services/sheet-table';
import { UnifiedRow } from '../../types/catalog';

const catalog = { '1': 'Minorista Ars', '12': 'Sub Distribuidor Usd' };

const row: UnifiedRow = {
  sku: 'A1',
  name: 'Foo',
  type: 'Producto',
  brand: 'Acme',
  group: 'Tools',
  prices: [
    { priceListId: 12, unitPrice: 9.5, taxRate: 0.105 },
    { priceListId: 1, unitPrice: null, taxRate: null }
  ]
};

describe('buildSheetTable', () => {
  it('should follow the configured list order, not numeric order', () => {
    const table = buildSheetTable([row], [12, 1], catalog);

    expect(table.header).toEqual([
      'Código', 'Tipo', 'Artículo', 'Grupo', 'Marca',
      'Sub Distribuidor Usd', 'Sub Distribuidor Usd IVA',
      'Minorista Ars', 'Minorista Ars IVA'
    ]);
  });

  it('should write article columns first and blank cells for missing prices', () => {
    const table = buildSheetTable([row], [12, 1], catalog);

    expect(table.rows).toEqual([['A1', 'Producto', 'Foo', 'Tools', 'Acme', 9.5, 0.105, '', '']]);
  });

  it('should keep a zero price as a number', () => {
    const free: UnifiedRow = { ...row, prices: [{ priceListId: 1, unitPrice: 0, taxRate: 0 }] };

    const table = buildSheetTable([free], [1], catalog);

    expect(table.rows[0].slice(5)).toEqual([0, 0]);
  });

  it('should describe where price and tax columns are', () => {
    const table = buildSheetTable([], [12, 1], catalog);

    expect(table.layout).toEqual({ skuColumn: 0, priceColumns: [5, 7], taxColumns: [6, 8] });
    expect(table.rows).toEqual([]);
  });

  it('should produce only the base headers without price lists', () => {
    expect(buildSheetTable([], [], catalog).header).toEqual([...BASE_HEADERS]);
  });
});

describe('priceListColumnName', () => {
  it('should fall back to the list ID for unknown lists', () => {
    expect(priceListColumnName(99, catalog)).toBe('Lista 99');
    expect(priceListColumnName(1, catalog)).toBe('Minorista Ars');
  });
});

describe('toSheetValues', () => {
  it('should put the header before the data rows', () => {
    const table = buildSheetTable([row], [1], catalog);

    expect(toSheetValues(table)).toEqual([
      ['Código', 'Tipo', 'Artículo', 'Grupo', 'Marca', 'Minorista Ars', 'Minorista Ars IVA'],
      ['A1', 'Producto', 'Foo', 'Tools', 'Acme', '', '']
    ]);
  });
});
