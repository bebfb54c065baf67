import {
    AdvisoryMapping,
    ApplicantRecord,
    BatchStage,
    CANONICAL_FIELDS,
    CanonicalField,
    RawTable,
    emptyApplicantRecord,
    isCanonicalField,
} from '../types/applicant_types';
import { FIELD_SPECS, LOAN_AMOUNT_RANGE, isColumnTrustedAmount, validId, validPhone } from './field_registry';
import { BatchContext, IdAllocator } from './id_allocator';
import { ValueBuckets, classifyValues, gatherRawValues } from './value_classifier';
import { isNull, normalizeNumber } from '../utils/normalization';

// Incomes sit below the split point, loans above it; the point itself goes to neither
const NUMERIC_SPLIT = BigInt(LOAN_AMOUNT_RANGE.min);

// Buckets copied straight onto a field when they have a member
const BUCKET_FIELDS: ReadonlyArray<[Exclude<keyof ValueBuckets, 'id' | 'numeric'>, CanonicalField]> = [
    ['email', 'email'],
    ['pan', 'pan_number'],
    ['aadhaar', 'aadhaar_number'],
    ['phone', 'phone_number'],
    ['employment', 'employment_type'],
    ['purpose', 'loan_purpose'],
    ['name', 'applicant_name'],
];

/**
 * Picks the income and loan out of a row's loose integers.
 * Ascending walk: first value below the split is the income, first above it is the loan.
 * Values that read as phone numbers are ignored; a third number, or one equal to the
 * split point, is dropped.
 */
export function splitNumericValues(values: readonly bigint[]): { monthlyIncome: bigint | null; loanAmount: bigint | null } {
    let monthlyIncome: bigint | null = null;
    let loanAmount: bigint | null = null;

    const ascending = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    for (const n of ascending) {
        if (validPhone(String(n))) continue;

        if (n < NUMERIC_SPLIT) {
            if (monthlyIncome === null) monthlyIncome = n;
        } else if (n > NUMERIC_SPLIT && loanAmount === null) {
            loanAmount = n;
        }
    }

    return { monthlyIncome, loanAmount };
}

/**
 * Builds the mapped view of one row: every source column renamed through the
 * advisory mapping (unmapped columns keep their own name), first column to land
 * on a canonical field wins, absent fields null.
 */
export function applyMappingToRow(columns: readonly string[], row: Record<string, string | null>, mapping: AdvisoryMapping): ApplicantRecord {
    const record = emptyApplicantRecord();
    const filled = new Set<CanonicalField>();

    for (const column of columns) {
        const target = mapping[column] ?? column;
        if (!isCanonicalField(target) || filled.has(target)) continue;
        filled.add(target);
        record[target] = row[column] ?? null;
    }

    return record;
}

/**
 * Nulls every field that fails its format rule, except the overlapping amount
 * fields, which are left for the numeric split. Survivors are normalized.
 */
export function invalidateRecord(record: ApplicantRecord): ApplicantRecord {
    const out = { ...record };
    for (const field of CANONICAL_FIELDS) {
        if (isColumnTrustedAmount(field)) continue;
        const value = out[field];
        const spec = FIELD_SPECS[field];
        out[field] = value === null || isNull(value) || !spec.validate(value) ? null : spec.normalize(value);
    }
    return out;
}

/**
 * An amount the split left alone survives from its mapped column when it is
 * an integer inside that field's range.
 */
function keepMappedAmount(field: 'loan_amount' | 'monthly_income', value: string | null): string | null {
    if (value === null || isNull(value)) return null;
    const normalized = normalizeNumber(value);
    const spec = FIELD_SPECS[field];
    return spec.validate(normalized) ? spec.normalize(normalized) : null;
}

/**
 * One batch of rows moving through CLEARED -> MAPPING_APPLIED -> INVALIDATED -> REPAIRED.
 * The batch owns its records and its identifier context until `repair` returns.
 */
export class RepairBatch {
    private stage: BatchStage = 'CLEARED';
    private records: ApplicantRecord[] = [];
    private readonly batch: BatchContext;
    private readonly allocator: IdAllocator;

    constructor(private readonly table: RawTable, storeIds: Iterable<string> = []) {
        this.batch = new BatchContext();
        this.allocator = new IdAllocator(this.batch, storeIds);
    }

    get currentStage(): BatchStage {
        return this.stage;
    }

    get currentRecords(): readonly ApplicantRecord[] {
        return this.records;
    }

    applyMapping(mapping: AdvisoryMapping): this {
        this.expectStage('CLEARED', 'applyMapping');
        this.records = this.table.rows.map(row => applyMappingToRow(this.table.columns, row, mapping));
        this.stage = 'MAPPING_APPLIED';
        return this;
    }

    invalidate(): this {
        this.expectStage('MAPPING_APPLIED', 'invalidate');
        this.records = this.records.map(invalidateRecord);
        this.stage = 'INVALIDATED';
        return this;
    }

    repair(): ApplicantRecord[] {
        this.expectStage('INVALIDATED', 'repair');

        const buckets = this.table.rows.map(row =>
            classifyValues(gatherRawValues(this.table.columns.map(column => row[column] ?? null)))
        );

        // Reserve every identifier already present in the input before allocating any new one
        for (const [i, record] of this.records.entries()) {
            if (record.applicant_id !== null && validId(record.applicant_id)) this.batch.register(record.applicant_id);
            for (const id of buckets[i].id) this.batch.register(id);
        }

        this.records = this.records.map((record, i) => this.repairRow(record, buckets[i]));
        this.stage = 'REPAIRED';
        return this.records;
    }

    private repairRow(mapped: ApplicantRecord, bucket: ValueBuckets): ApplicantRecord {
        const record = { ...mapped };

        record.applicant_id = bucket.id.length > 0 ? bucket.id[0] : this.allocator.allocateNext();
        this.batch.register(record.applicant_id);

        for (const [name, field] of BUCKET_FIELDS) {
            const members = bucket[name];
            if (members.length > 0) record[field] = members[0];
        }

        const { monthlyIncome, loanAmount } = splitNumericValues(bucket.numeric);
        record.monthly_income = monthlyIncome !== null
            ? String(monthlyIncome)
            : keepMappedAmount('monthly_income', record.monthly_income);
        record.loan_amount = loanAmount !== null
            ? String(loanAmount)
            : keepMappedAmount('loan_amount', record.loan_amount);

        return record;
    }

    private expectStage(expected: BatchStage, step: string): void {
        if (this.stage !== expected) {
            throw new Error(`RepairBatch.${step}() called in stage ${this.stage}, expected ${expected}`);
        }
    }
}

/**
 * Runs a whole table through every stage with a fresh batch context.
 */
export function repairTable(table: RawTable, mapping: AdvisoryMapping, storeIds: Iterable<string> = []): ApplicantRecord[] {
    return new RepairBatch(table, storeIds).applyMapping(mapping).invalidate().repair();
}
