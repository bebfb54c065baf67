import * as XLSX from 'xlsx';
import { MappingOracle } from '../services/mapping_oracle';
import { AdvisoryMapping } from '../types/applicant_types';

/**
 * Builds an .xlsx upload from an array-of-arrays grid (first row = header).
 */
export function buildWorkbook(grid: unknown[][], sheetName = 'Sheet1'): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(grid), sheetName);
    const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(out)) throw new Error('expected a Buffer');
    return out;
}

export function stubOracle(reply: unknown): MappingOracle {
    return {
        provider: 'none',
        requestMapping: async () => reply,
    };
}

export function mappingOracle(mapping: AdvisoryMapping): MappingOracle {
    return stubOracle({ result: { result: mapping } });
}

export function failingOracle(message = 'oracle unavailable'): MappingOracle {
    return {
        provider: 'http',
        requestMapping: async () => {
            throw new Error(message);
        },
    };
}
