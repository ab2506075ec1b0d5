// src/infrastructure/sheets/sheet-writer.ts
import { SheetWriteMode } from '../../config';
import { ColumnLayout, SheetCell, SheetTable, toSheetValues } from '../../core/services/sheet-table';
import { Logger } from '../logging';
import { AppError, WriteFailure, errorMessage, serializeError } from '../../utils/error';
import { SheetProperties, SheetRequest, SpreadsheetGateway } from './spreadsheet-gateway';

export interface SheetWriterOptions {
  sheetName: string;
  mode: SheetWriteMode;
  applyFormats: boolean;
  logger: Logger;
}

export interface SheetWriteResult {
  sheetName: string;
  mode: SheetWriteMode;
  rowsWritten: number;
  columns: number;
}

export interface TableWriter {
  write(table: SheetTable): Promise<SheetWriteResult>;
}

export const STAGING_SUFFIX = '__staging';

const PRICE_PATTERN = '#,##0.00';
const TAX_PATTERN = '0.0%';

/**
 * Replaces the content of one tab with a table.
 *
 * `direct` clears the tab and writes all values in one call.
 * `staged` writes a staging tab first and swaps it in with a single atomic
 * batch update, so readers never see an empty tab.
 */
export class SheetWriter implements TableWriter {
  constructor(
    private readonly gateway: SpreadsheetGateway,
    private readonly options: SheetWriterOptions
  ) {}

  private get logger(): Logger {
    return this.options.logger;
  }

  async write(table: SheetTable): Promise<SheetWriteResult> {
    const { sheetName, mode } = this.options;
    const values = toSheetValues(table);
    const columns = table.header.length;

    try {
      const target = mode === 'staged'
        ? await this.writeStaged(values, columns)
        : await this.writeDirect(values, columns);

      this.logger.info(`Updated ${values.length} rows in worksheet ${sheetName}`, {
        spreadsheetId: this.gateway.spreadsheetId,
        mode
      });

      if (this.options.applyFormats) {
        await this.applyFormats(target.sheetId, table.layout);
      }

      return {
        sheetName,
        mode,
        rowsWritten: table.rows.length,
        columns
      };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new WriteFailure(`Error updating Google Sheet: ${errorMessage(error)}`, {
        spreadsheetId: this.gateway.spreadsheetId,
        sheetName,
        mode,
        originalError: serializeError(error)
      });
    }
  }

  private async writeDirect(values: SheetCell[][], columns: number): Promise<SheetProperties> {
    const { sheetName } = this.options;
    const existing = await this.findSheet(sheetName);

    if (existing) {
      this.logger.info(`Found existing worksheet: ${sheetName}`);
      await this.gateway.clearValues(sheetName);
      await this.gateway.updateValues(sheetName, values);
      return existing;
    }

    const created = await this.gateway.addSheet(sheetName, values.length, Math.max(1, columns));
    this.logger.info(`Created new worksheet: ${sheetName}`);
    await this.gateway.updateValues(sheetName, values);
    return created;
  }

  private async writeStaged(values: SheetCell[][], columns: number): Promise<SheetProperties> {
    const { sheetName } = this.options;
    const stagingName = `${sheetName}${STAGING_SUFFIX}`;

    const leftover = await this.findSheet(stagingName);
    if (leftover) {
      this.logger.warn(`Removing leftover staging worksheet ${stagingName}`);
      await this.gateway.batchUpdate([{ deleteSheet: { sheetId: leftover.sheetId } }]);
    }

    const staging = await this.gateway.addSheet(stagingName, values.length, Math.max(1, columns));
    await this.gateway.updateValues(stagingName, values);

    const existing = await this.findSheet(sheetName);
    const swap: SheetRequest[] = [];
    if (existing) {
      swap.push({ deleteSheet: { sheetId: existing.sheetId } });
    }
    swap.push({
      updateSheetProperties: {
        properties: { sheetId: staging.sheetId, title: sheetName },
        fields: 'title'
      }
    });
    await this.gateway.batchUpdate(swap);

    this.logger.info(`Swapped staging worksheet into ${sheetName}`);
    return { sheetId: staging.sheetId, title: sheetName };
  }

  /**
   * SKU as plain text, prices with two decimals, tax rates as percentages.
   * The data is already written, so a failure here only logs a warning.
   */
  private async applyFormats(sheetId: number, layout: ColumnLayout): Promise<void> {
    const requests: SheetRequest[] = [
      formatColumn(sheetId, layout.skuColumn, { type: 'TEXT' }),
      ...layout.priceColumns.map((column) => formatColumn(sheetId, column, { type: 'NUMBER', pattern: PRICE_PATTERN })),
      ...layout.taxColumns.map((column) => formatColumn(sheetId, column, { type: 'PERCENT', pattern: TAX_PATTERN }))
    ];

    try {
      await this.gateway.batchUpdate(requests);
      this.logger.info('Applied column formats (SKU as text, prices as number)');
    } catch (error) {
      this.logger.warn(`Could not apply formats: ${errorMessage(error)}`, {
        sheetName: this.options.sheetName,
        error: serializeError(error)
      });
    }
  }

  private async findSheet(title: string): Promise<SheetProperties | undefined> {
    const sheets = await this.gateway.listSheets();
    return sheets.find((sheet) => sheet.title === title);
  }
}

function formatColumn(
  sheetId: number,
  column: number,
  numberFormat: { type: string; pattern?: string }
): SheetRequest {
  return {
    repeatCell: {
      range: { sheetId, startRowIndex: 1, startColumnIndex: column, endColumnIndex: column + 1 },
      cell: { userEnteredFormat: { numberFormat } },
      fields: 'userEnteredFormat.numberFormat'
    }
  };
}
