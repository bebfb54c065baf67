import {
    isEmploymentType,
    isLoanPurpose,
    validAadhaar,
    validEmail,
    validId,
    validPan,
    validPhone,
} from './field_registry';
import { RawCell } from '../types/applicant_types';
import { isNull, normalizeNumber, toTitleCase } from '../utils/normalization';

export type BucketName = 'id' | 'email' | 'pan' | 'aadhaar' | 'phone' | 'employment' | 'purpose' | 'name' | 'numeric';

export interface ValueBuckets {
    id: string[];
    email: string[];
    pan: string[];
    aadhaar: string[];
    phone: string[];
    employment: string[];
    purpose: string[];
    name: string[];
    numeric: bigint[];
}

export type Classification =
    | { bucket: Exclude<BucketName, 'numeric'>; value: string }
    | { bucket: 'numeric'; value: bigint };

export function emptyBuckets(): ValueBuckets {
    return { id: [], email: [], pan: [], aadhaar: [], phone: [], employment: [], purpose: [], name: [], numeric: [] };
}

/**
 * Decides which bucket a single value belongs to. Order matters: the first rule
 * that matches wins, so a 10-digit phone never reaches the numeric bucket and a
 * PAN never reaches the name bucket. Returns null for values no rule accepts.
 */
export function classifyValue(value: string): Classification | null {
    const lowered = value.toLowerCase();

    if (validId(value)) return { bucket: 'id', value };
    if (validEmail(value)) return { bucket: 'email', value };
    if (validPan(value)) return { bucket: 'pan', value: value.toUpperCase() };
    if (validAadhaar(value)) return { bucket: 'aadhaar', value };
    if (validPhone(value)) return { bucket: 'phone', value };
    if (isEmploymentType(lowered)) return { bucket: 'employment', value: toTitleCase(lowered) };
    if (isLoanPurpose(lowered)) return { bucket: 'purpose', value: toTitleCase(lowered) };
    if (/^\d+$/.test(value)) return { bucket: 'numeric', value: BigInt(value) };
    if (value.length >= 3 && /^[A-Za-z ]+$/.test(value)) return { bucket: 'name', value: toTitleCase(value) };

    return null;
}

/**
 * Trims every cell of a row, expands scientific notation and drops placeholders.
 */
export function gatherRawValues(cells: Iterable<RawCell>): string[] {
    const values: string[] = [];
    for (const cell of cells) {
        if (cell === null || isNull(cell)) continue;
        values.push(normalizeNumber(cell.trim()));
    }
    return values;
}

/**
 * Partitions values into typed buckets, keeping input order inside each bucket.
 */
export function classifyValues(values: readonly string[]): ValueBuckets {
    const buckets = emptyBuckets();
    for (const v of values) {
        const hit = classifyValue(v);
        if (!hit) continue;
        if (hit.bucket === 'numeric') {
            buckets.numeric.push(hit.value);
        } else {
            buckets[hit.bucket].push(hit.value);
        }
    }
    return buckets;
}
