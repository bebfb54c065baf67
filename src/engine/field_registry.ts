import { CanonicalField } from '../types/applicant_types';
import { isNull, toTitleCase } from '../utils/normalization';

export const LOAN_PURPOSES = ['education', 'home renovation', 'car', 'business', 'personal', 'medical'] as const;
export const EMPLOYMENT_TYPES = ['salaried', 'self employed', 'unemployed'] as const;

export const LOAN_AMOUNT_RANGE = { min: 500_000, max: 10_000_000 } as const;
export const MONTHLY_INCOME_RANGE = { min: 25_000, max: 1_000_000 } as const;

export type FieldKind = 'identifier' | 'text' | 'contact' | 'document' | 'amount' | 'category';

export interface FieldSpec {
    kind: FieldKind;
    validate(value: string): boolean;
    normalize(value: string): string;
}

// --- Validators (all take untrimmed input and fail on placeholders) ---

export function validId(value: string): boolean {
    return !isNull(value) && /^A\d+$/.test(value.trim());
}

export function validName(value: string): boolean {
    if (isNull(value)) return false;
    const trimmed = value.trim();
    const parts = trimmed.split(/\s+/);
    return parts.length >= 2 && /^[A-Za-z ]+$/.test(trimmed) && parts.every(p => p.length >= 2);
}

export function validPhone(value: string): boolean {
    return !isNull(value) && /^[6-9]\d{9}$/.test(value.trim());
}

export function validEmail(value: string): boolean {
    return !isNull(value) && /^[^@\s]+@[^@\s]+\.[^@\s]{2,}$/.test(value.trim());
}

export function validAadhaar(value: string): boolean {
    return !isNull(value) && /^\d{12}$/.test(value.trim());
}

export function validPan(value: string): boolean {
    return !isNull(value) && /^[A-Z]{5}[0-9]{4}[A-Z]$/.test(value.trim().toUpperCase());
}

function inIntegerRange(value: string, range: { min: number; max: number }): boolean {
    if (isNull(value)) return false;
    const trimmed = value.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) return false;
    const n = Number.parseInt(trimmed, 10);
    return n >= range.min && n <= range.max;
}

export function validLoanAmount(value: string): boolean {
    return inIntegerRange(value, LOAN_AMOUNT_RANGE);
}

export function validMonthlyIncome(value: string): boolean {
    return inIntegerRange(value, MONTHLY_INCOME_RANGE);
}

export function isLoanPurpose(value: string): boolean {
    const lowered = value.trim().toLowerCase();
    return LOAN_PURPOSES.some(p => p === lowered);
}

export function isEmploymentType(value: string): boolean {
    const lowered = value.trim().toLowerCase();
    return EMPLOYMENT_TYPES.some(t => t === lowered);
}

const trim = (value: string) => value.trim();

/**
 * Every canonical field with its format rule and storage normalizer.
 * Typed as a full record so a new field cannot be added without its rules.
 */
export const FIELD_SPECS: Record<CanonicalField, FieldSpec> = {
    applicant_id: { kind: 'identifier', validate: validId, normalize: trim },
    applicant_name: { kind: 'text', validate: validName, normalize: (v) => toTitleCase(v.trim()) },
    phone_number: { kind: 'contact', validate: validPhone, normalize: trim },
    email: { kind: 'contact', validate: validEmail, normalize: trim },
    aadhaar_number: { kind: 'document', validate: validAadhaar, normalize: trim },
    pan_number: { kind: 'document', validate: validPan, normalize: (v) => v.trim().toUpperCase() },
    loan_amount: { kind: 'amount', validate: validLoanAmount, normalize: (v) => String(Number.parseInt(v.trim(), 10)) },
    loan_purpose: { kind: 'category', validate: isLoanPurpose, normalize: (v) => toTitleCase(v.trim()) },
    employment_type: { kind: 'category', validate: isEmploymentType, normalize: (v) => toTitleCase(v.trim()) },
    monthly_income: { kind: 'amount', validate: validMonthlyIncome, normalize: (v) => String(Number.parseInt(v.trim(), 10)) },
};

/**
 * Fields whose ranges overlap; they skip invalidation and are settled by the numeric split.
 */
export function isColumnTrustedAmount(field: CanonicalField): boolean {
    return FIELD_SPECS[field].kind === 'amount';
}
