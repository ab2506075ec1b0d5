// src/infrastructure/sheets/spreadsheet-gateway.ts
import { google, sheets_v4 } from 'googleapis';
import { SheetCell } from '../../core/services/sheet-table';

export const SHEETS_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive'
];

export interface SheetProperties {
  sheetId: number;
  title: string;
}

export type SheetRequest = sheets_v4.Schema$Request;

/**
 * The spreadsheet operations the writer needs
 */
export interface SpreadsheetGateway {
  readonly spreadsheetId: string;
  listSheets(): Promise<SheetProperties[]>;
  addSheet(title: string, rowCount: number, columnCount: number): Promise<SheetProperties>;
  clearValues(title: string): Promise<void>;
  updateValues(title: string, values: SheetCell[][]): Promise<void>;
  /** All requests are applied atomically */
  batchUpdate(requests: SheetRequest[]): Promise<void>;
}

export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

/**
 * Google Sheets API v4 implementation. Authenticates with Application Default
 * Credentials (workload identity on the job platform, a key file locally).
 */
export class GoogleSheetsGateway implements SpreadsheetGateway {
  private readonly sheets: sheets_v4.Sheets;

  constructor(public readonly spreadsheetId: string, sheets?: sheets_v4.Sheets) {
    this.sheets = sheets ?? google.sheets({
      version: 'v4',
      auth: new google.auth.GoogleAuth({ scopes: SHEETS_SCOPES })
    });
  }

  async listSheets(): Promise<SheetProperties[]> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties(sheetId,title)'
    });

    return (response.data.sheets ?? []).flatMap((sheet) => {
      const properties = sheet.properties;
      if (properties?.sheetId == null || !properties.title) {
        return [];
      }
      return [{ sheetId: properties.sheetId, title: properties.title }];
    });
  }

  async addSheet(title: string, rowCount: number, columnCount: number): Promise<SheetProperties> {
    const response = await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{
          addSheet: {
            properties: { title, gridProperties: { rowCount, columnCount } }
          }
        }]
      }
    });

    const sheetId = response.data.replies?.[0]?.addSheet?.properties?.sheetId;
    if (sheetId == null) {
      throw new Error(`Sheets API did not return an ID for the new sheet ${title}`);
    }
    return { sheetId, title };
  }

  async clearValues(title: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range: quoteSheetTitle(title),
      requestBody: {}
    });
  }

  async updateValues(title: string, values: SheetCell[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteSheetTitle(title)}!A1`,
      valueInputOption: 'RAW',
      requestBody: { values }
    });
  }

  async batchUpdate(requests: SheetRequest[]): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: { requests }
    });
  }
}
