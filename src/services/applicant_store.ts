import { Pool, type PoolClient } from 'pg';
import { env } from '../config/env';
import { FieldKind, FIELD_SPECS } from '../engine/field_registry';
import { ApplicantRecord, CANONICAL_FIELDS, CanonicalField } from '../types/applicant_types';

export type UpsertOutcome = 'inserted' | 'updated';

export interface StoredApplicant extends ApplicantRecord {
    created_at: Date;
}

/**
 * Durable home of applicant records, keyed by `applicant_id`.
 */
export interface ApplicantStore {
    readonly kind: 'postgres' | 'memory';
    ensureSchema(): Promise<void>;
    listApplicantIds(): Promise<string[]>;
    /**
     * Inserts or overwrites one record in its own transaction.
     */
    upsert(record: ApplicantRecord): Promise<UpsertOutcome>;
    findById(applicantId: string): Promise<StoredApplicant | null>;
    close(): Promise<void>;
}

function columnType(kind: FieldKind): string {
    switch (kind) {
        case 'identifier': return 'VARCHAR(50)';
        case 'text': return 'VARCHAR(255)';
        case 'contact': return 'VARCHAR(255)';
        case 'document': return 'VARCHAR(20)';
        case 'amount': return 'NUMERIC(12,2)';
        case 'category': return 'VARCHAR(100)';
        default: {
            const unreachable: never = kind;
            throw new Error(`Unhandled field kind: ${String(unreachable)}`);
        }
    }
}

export function createTableSql(table: string): string {
    const columns = CANONICAL_FIELDS.map(field =>
        field === 'applicant_id'
            ? `    ${field} ${columnType(FIELD_SPECS[field].kind)} PRIMARY KEY`
            : `    ${field} ${columnType(FIELD_SPECS[field].kind)}`
    );
    return `CREATE TABLE IF NOT EXISTS ${table} (\n${columns.join(',\n')},\n    created_at TIMESTAMPTZ DEFAULT now()\n)`;
}

const NON_KEY_FIELDS = CANONICAL_FIELDS.filter((f): f is Exclude<CanonicalField, 'applicant_id'> => f !== 'applicant_id');

interface ApplicantRow {
    applicant_id: string;
    applicant_name: string | null;
    phone_number: string | null;
    email: string | null;
    aadhaar_number: string | null;
    pan_number: string | null;
    loan_amount: string | null;
    loan_purpose: string | null;
    employment_type: string | null;
    monthly_income: string | null;
    created_at: Date;
}

// NUMERIC comes back as "450000.00"; store values are whole rupees
function amountFromDb(value: string | null): string | null {
    return value === null ? null : String(Math.trunc(Number(value)));
}

export class PgApplicantStore implements ApplicantStore {
    readonly kind = 'postgres' as const;
    private pool: Pool;

    constructor(connectionString: string, private readonly table: string = env.APPLICANT_TABLE) {
        this.pool = new Pool({
            connectionString,
            max: 10,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
        });

        this.pool.on('error', (err: Error) => {
            console.error('[ApplicantStore] Unexpected PostgreSQL pool error:', err.message);
        });
    }

    async ensureSchema(): Promise<void> {
        await this.pool.query(createTableSql(this.table));
    }

    async listApplicantIds(): Promise<string[]> {
        const result = await this.pool.query<{ applicant_id: string }>(`SELECT applicant_id FROM ${this.table}`);
        return result.rows.map(r => r.applicant_id);
    }

    async upsert(record: ApplicantRecord): Promise<UpsertOutcome> {
        return this.withTransaction(async (client) => {
            const existing = await client.query(
                `SELECT 1 FROM ${this.table} WHERE applicant_id = $1 FOR UPDATE`,
                [record.applicant_id]
            );

            if ((existing.rowCount ?? 0) > 0) {
                const assignments = NON_KEY_FIELDS.map((field, i) => `${field} = $${i + 2}`).join(', ');
                await client.query(
                    `UPDATE ${this.table} SET ${assignments} WHERE applicant_id = $1`,
                    [record.applicant_id, ...NON_KEY_FIELDS.map(f => record[f])]
                );
                return 'updated';
            }

            const placeholders = CANONICAL_FIELDS.map((_, i) => `$${i + 1}`).join(', ');
            await client.query(
                `INSERT INTO ${this.table} (${CANONICAL_FIELDS.join(', ')}, created_at) VALUES (${placeholders}, now())`,
                CANONICAL_FIELDS.map(f => record[f])
            );
            return 'inserted';
        });
    }

    async findById(applicantId: string): Promise<StoredApplicant | null> {
        const result = await this.pool.query<ApplicantRow>(
            `SELECT ${CANONICAL_FIELDS.join(', ')}, created_at FROM ${this.table} WHERE applicant_id = $1`,
            [applicantId]
        );
        const row = result.rows[0];
        if (!row) return null;
        return {
            ...row,
            loan_amount: amountFromDb(row.loan_amount),
            monthly_income: amountFromDb(row.monthly_income),
        };
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    private async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            const result = await fn(client);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                console.error('[ApplicantStore] Rollback failed:', rollbackError);
            }
            throw error;
        } finally {
            client.release();
        }
    }
}

/**
 * Process-local store used when no database is configured, and by the tests.
 */
export class InMemoryApplicantStore implements ApplicantStore {
    readonly kind = 'memory' as const;
    private rows = new Map<string, StoredApplicant>();

    constructor(seed: ApplicantRecord[] = []) {
        for (const record of seed) {
            if (record.applicant_id !== null) {
                this.rows.set(record.applicant_id, { ...record, created_at: new Date() });
            }
        }
    }

    async ensureSchema(): Promise<void> {
        // nothing to create
    }

    async listApplicantIds(): Promise<string[]> {
        return [...this.rows.keys()];
    }

    async upsert(record: ApplicantRecord): Promise<UpsertOutcome> {
        if (record.applicant_id === null) {
            throw new Error('applicant_id is required');
        }
        const existing = this.rows.get(record.applicant_id);
        if (existing) {
            this.rows.set(record.applicant_id, { ...record, created_at: existing.created_at });
            return 'updated';
        }
        this.rows.set(record.applicant_id, { ...record, created_at: new Date() });
        return 'inserted';
    }

    async findById(applicantId: string): Promise<StoredApplicant | null> {
        const row = this.rows.get(applicantId);
        return row ? { ...row } : null;
    }

    async close(): Promise<void> {
        this.rows.clear();
    }
}

export function createApplicantStore(): ApplicantStore {
    if (!env.DATABASE_URL) {
        console.warn('⚠️ DATABASE_URL missing. Applicants will be kept in memory only.');
        return new InMemoryApplicantStore();
    }
    return new PgApplicantStore(env.DATABASE_URL);
}
