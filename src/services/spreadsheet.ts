import * as XLSX from 'xlsx';
import { ApplicantRecord, CANONICAL_FIELDS, RawCell, RawRow, RawTable, toDisplayRow } from '../types/applicant_types';
import { UploadRejectedError } from '../utils/errors';

const SUPPORTED_EXTENSIONS = ['.xlsx', '.xls', '.csv'] as const;
type SpreadsheetExtension = typeof SUPPORTED_EXTENSIONS[number];

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];
const OLE_MAGIC = [0xd0, 0xcf, 0x11, 0xe0];

export const EXPORT_SHEET_NAME = 'Applicants';

function extensionOf(filename: string): SpreadsheetExtension | null {
    const lower = filename.toLowerCase();
    return SUPPORTED_EXTENSIONS.find(ext => lower.endsWith(ext)) ?? null;
}

function startsWith(bytes: Buffer, magic: readonly number[]): boolean {
    return bytes.length >= magic.length && magic.every((b, i) => bytes[i] === b);
}

const pad = (n: number) => String(n).padStart(2, '0');

function formatDateCell(value: Date): string {
    const date = `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
    return `${date} ${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
}

/**
 * Cell -> text without numeric coercion: integers are written out in full
 * (no `1.23457E+11`), dates as `YYYY-MM-DD HH:MM:SS`, blanks become null.
 */
export function cellToText(value: unknown): RawCell {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') {
        if (Number.isInteger(value) && Number.isSafeInteger(value)) return BigInt(value).toString();
        return String(value);
    }
    if (value instanceof Date) return formatDateCell(value);
    const text = String(value);
    return text.trim() === '' ? null : text;
}

/**
 * Header cells -> unique column names. Blank headers become `column_<n>`,
 * repeats get a `_<n>` suffix.
 */
export function normalizeHeaders(headerCells: readonly unknown[]): string[] {
    const seen = new Map<string, number>();
    return headerCells.map((cell, i) => {
        const base = cellToText(cell)?.trim() || `column_${i + 1}`;
        const count = seen.get(base) ?? 0;
        seen.set(base, count + 1);
        return count === 0 ? base : `${base}_${count}`;
    });
}

function readWorkbook(fileBytes: Buffer, ext: SpreadsheetExtension): XLSX.WorkBook {
    if (ext === '.xlsx' && !startsWith(fileBytes, ZIP_MAGIC)) {
        throw new UploadRejectedError('File is not a valid .xlsx workbook.');
    }
    if (ext === '.xls' && !startsWith(fileBytes, OLE_MAGIC) && !startsWith(fileBytes, ZIP_MAGIC)) {
        throw new UploadRejectedError('File is not a valid .xls workbook.');
    }

    try {
        // raw: CSV cells stay text instead of being guessed into numbers/dates.
        // cellDates: date-formatted cells arrive as Date, not as serial numbers.
        return XLSX.read(fileBytes, { type: 'buffer', raw: ext === '.csv', cellDates: true, dense: false });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new UploadRejectedError(`Could not read spreadsheet: ${message}`);
    }
}

/**
 * Reads the first sheet of an uploaded workbook. Row 1 is the header; every
 * other non-blank row becomes one `RawRow` keyed by header name.
 */
export function readSpreadsheet(fileBytes: Buffer, filename: string): RawTable {
    const ext = extensionOf(filename);
    if (!ext) {
        throw new UploadRejectedError(`Unsupported file type for "${filename}". Expected ${SUPPORTED_EXTENSIONS.join(', ')}.`);
    }

    const workbook = readWorkbook(fileBytes, ext);
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        throw new UploadRejectedError('Workbook contains no sheets.');
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
    const [headerCells, ...body] = grid;
    if (!headerCells || headerCells.length === 0) {
        throw new UploadRejectedError('Spreadsheet has no header row.');
    }

    const columns = normalizeHeaders(headerCells);
    const rows: RawRow[] = body.map(cells => {
        const row: RawRow = {};
        columns.forEach((column, i) => {
            row[column] = cellToText(cells[i]);
        });
        return row;
    });

    return { columns, rows };
}

/**
 * Repaired records -> .xlsx bytes, one `Applicants` sheet with the canonical header.
 */
export function writeApplicantsWorkbook(records: readonly ApplicantRecord[]): Buffer {
    const header = [...CANONICAL_FIELDS];
    const body = records.map(record => {
        const display = toDisplayRow(record);
        return header.map(field => display[field]);
    });

    const sheet = XLSX.utils.aoa_to_sheet([header, ...body]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, EXPORT_SHEET_NAME);

    const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(out)) {
        throw new Error('xlsx writer did not return a Buffer');
    }
    return out;
}
