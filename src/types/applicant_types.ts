/**
 * Canonical applicant schema shared by the repair engine, the store and the HTTP layer.
 */
export const CANONICAL_FIELDS = [
    'applicant_id',
    'applicant_name',
    'phone_number',
    'email',
    'aadhaar_number',
    'pan_number',
    'loan_amount',
    'loan_purpose',
    'employment_type',
    'monthly_income',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

export type ApplicantRecord = Record<CanonicalField, string | null>;

export type DisplayRow = Record<CanonicalField, string>;

// A cell as it comes off the spreadsheet: text, or null for an empty cell
export type RawCell = string | null;

export type RawRow = Record<string, RawCell>;

export interface RawTable {
    columns: string[];
    rows: RawRow[];
}

/**
 * Source column -> canonical field, as suggested by the mapping oracle.
 * Not trusted to be complete, injective or correct.
 */
export type AdvisoryMapping = Record<string, string>;

export type BatchStage = 'CLEARED' | 'MAPPING_APPLIED' | 'INVALIDATED' | 'REPAIRED';

export interface PersistFailure {
    applicantId: string | null;
    error: string;
}

export interface PersistSummary {
    inserted: number;
    updated: number;
    failed: PersistFailure[];
}

export interface PreviewResult {
    status: 'validated';
    batchId: string;
    totalRows: number;
    mapping: AdvisoryMapping;
    mappingConfidence: number;
    unmappedColumns: string[];
    preview: DisplayRow[];
}

export interface PersistResult extends PersistSummary {
    status: 'success';
    batchId: string;
    totalRows: number;
}

export function isCanonicalField(value: string): value is CanonicalField {
    return CANONICAL_FIELDS.some((field) => field === value);
}

export function emptyApplicantRecord(): ApplicantRecord {
    return {
        applicant_id: null,
        applicant_name: null,
        phone_number: null,
        email: null,
        aadhaar_number: null,
        pan_number: null,
        loan_amount: null,
        loan_purpose: null,
        employment_type: null,
        monthly_income: null,
    };
}

// Preview/export view: nulls rendered as empty strings
export function toDisplayRow(record: ApplicantRecord): DisplayRow {
    return {
        applicant_id: record.applicant_id ?? '',
        applicant_name: record.applicant_name ?? '',
        phone_number: record.phone_number ?? '',
        email: record.email ?? '',
        aadhaar_number: record.aadhaar_number ?? '',
        pan_number: record.pan_number ?? '',
        loan_amount: record.loan_amount ?? '',
        loan_purpose: record.loan_purpose ?? '',
        employment_type: record.employment_type ?? '',
        monthly_income: record.monthly_income ?? '',
    };
}
