/**
 * Excel analyzer backed by SheetJS
 *
 * The first row of each sheet is treated as the header; the remaining
 * non-blank rows are data rows.
 */

import { promises as fs } from 'node:fs';
import type { DocumentMetadata } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { canLoad, lazyModule, pickStrings } from './base.js';
import type { Analyzer } from './types.js';

const loadXlsx = lazyModule(() => import('xlsx'));

const SAMPLE_ROWS = 5;

const PROPERTY_FIELDS: Record<string, string> = {
  Title: 'title',
  Author: 'creator',
  Subject: 'subject',
  Keywords: 'keywords',
  Comments: 'description',
  CreatedDate: 'created',
  ModifiedDate: 'modified',
  LastAuthor: 'lastModifiedBy',
};

type Cell = string | number | boolean | Date | null;

interface SheetTable {
  name: string;
  columns: string[];
  rows: Cell[][];
}

function isCellRow(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function toCell(value: unknown): Cell {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return value === undefined ? null : String(value);
}

function formatCell(value: Cell): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function columnName(value: Cell, index: number): string {
  return value === null || value === '' ? `Unnamed: ${index}` : formatCell(value);
}

async function readWorkbook(filePath: string) {
  const XLSX = await loadXlsx();
  const data = await fs.readFile(filePath);
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });

  const sheets: SheetTable[] = workbook.SheetNames.map((name) => {
    const worksheet = workbook.Sheets[name];
    const raw: unknown[] = worksheet
      ? XLSX.utils.sheet_to_json(worksheet, { header: 1, defval: null, blankrows: false })
      : [];
    const grid = raw.filter(isCellRow).map((row) => row.map(toCell));
    const [header = [], ...rows] = grid;
    return { name, columns: header.map(columnName), rows };
  });

  return { workbook, sheets };
}

/**
 * Render one sheet as the text block used for previews and word counts
 */
export function renderSheet(sheet: SheetTable): string[] {
  const lines = [
    `\n--- Sheet: ${sheet.name} ---`,
    `Dimensions: ${sheet.rows.length} rows x ${sheet.columns.length} columns`,
  ];

  if (sheet.rows.length > 0 && sheet.columns.length > 0) {
    lines.push('Columns: ' + sheet.columns.join(', '));
    lines.push('Sample data:');
    for (const row of sheet.rows.slice(0, SAMPLE_ROWS)) {
      const rowText = row
        .filter((value): value is Exclude<Cell, null> => value !== null && value !== '')
        .map(formatCell)
        .join(' | ');
      if (rowText.trim()) {
        lines.push(`  ${rowText}`);
      }
    }
  }

  return lines;
}

export class ExcelAnalyzer implements Analyzer {
  readonly format = 'Excel';
  readonly library = 'xlsx';

  constructor(private readonly logger: Logger = silentLogger) {}

  async extractText(filePath: string): Promise<string> {
    try {
      const { sheets } = await readWorkbook(filePath);
      return sheets.flatMap(renderSheet).join('\n');
    } catch (error) {
      this.logger.error('analyze', `Error reading Excel file ${filePath}: ${errorMessage(error)}`);
      return `Error reading Excel file: ${errorMessage(error)}`;
    }
  }

  async extractMetadata(filePath: string): Promise<DocumentMetadata> {
    try {
      const { workbook, sheets } = await readWorkbook(filePath);
      const props: Record<string, unknown> = { ...workbook.Props };

      const sheetInfo: Record<string, DocumentMetadata> = {};
      for (const sheet of sheets) {
        const hasData = sheet.rows.length > 0 && sheet.columns.length > 0;
        sheetInfo[sheet.name] = {
          dataRows: sheet.rows.length,
          dataColumns: sheet.columns.length,
          hasData,
          columnNames: hasData ? sheet.columns : [],
        };
      }

      return {
        fileType: 'excel',
        sheetCount: workbook.SheetNames.length,
        sheetNames: [...workbook.SheetNames],
        ...pickStrings(props, PROPERTY_FIELDS),
        sheets: sheetInfo,
      };
    } catch (error) {
      this.logger.error('analyze', `Error extracting Excel metadata from ${filePath}: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  checkAvailability(): Promise<boolean> {
    return canLoad(loadXlsx);
  }
}
