import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { ApplicantStore } from '../services/applicant_store';
import { MappingOracle, buildMappingRequest, resolveAdvisoryMapping } from '../services/mapping_oracle';
import { readSpreadsheet, writeApplicantsWorkbook } from '../services/spreadsheet';
import {
    AdvisoryMapping,
    ApplicantRecord,
    CANONICAL_FIELDS,
    PersistResult,
    PreviewResult,
    RawTable,
    toDisplayRow,
} from '../types/applicant_types';
import { persistenceEngine } from './persistence_engine';
import { repairTable } from './repair_engine';

export interface UploadedFile {
    buffer: Buffer;
    originalname: string;
}

export interface OrchestratorOptions {
    store: ApplicantStore;
    oracle: MappingOracle;
    previewRows?: number;
    oracleTimeoutMs?: number;
    oracleSampleRows?: number;
}

export interface RepairedBatch {
    batchId: string;
    table: RawTable;
    mapping: AdvisoryMapping;
    records: ApplicantRecord[];
}

/**
 * Percentage of canonical fields that the mapping points at, two decimals.
 */
export function mappingConfidence(mapping: AdvisoryMapping): number {
    const targets = new Set(Object.values(mapping));
    const covered = CANONICAL_FIELDS.filter(f => targets.has(f)).length;
    return Math.round((covered / CANONICAL_FIELDS.length) * 10000) / 100;
}

export function unmappedColumns(columns: readonly string[], mapping: AdvisoryMapping): string[] {
    return columns.filter(c => !(c in mapping));
}

/**
 * Upload -> advisory mapping -> repair, then preview, persist or export.
 */
export class IngestionOrchestrator {
    private readonly store: ApplicantStore;
    private readonly oracle: MappingOracle;
    private readonly previewRows: number;
    private readonly oracleTimeoutMs: number;
    private readonly oracleSampleRows: number;
    private schemaReady: Promise<void> | null = null;

    constructor(options: OrchestratorOptions) {
        this.store = options.store;
        this.oracle = options.oracle;
        this.previewRows = options.previewRows ?? env.PREVIEW_ROWS;
        this.oracleTimeoutMs = options.oracleTimeoutMs ?? env.MAPPING_ORACLE_TIMEOUT_MS;
        this.oracleSampleRows = options.oracleSampleRows ?? env.MAPPING_ORACLE_SAMPLE_ROWS;
    }

    get storeKind(): ApplicantStore['kind'] {
        return this.store.kind;
    }

    get oracleProvider(): MappingOracle['provider'] {
        return this.oracle.provider;
    }

    async preview(file: UploadedFile): Promise<PreviewResult> {
        const batch = await this.prepare(file);
        return {
            status: 'validated',
            batchId: batch.batchId,
            totalRows: batch.table.rows.length,
            mapping: batch.mapping,
            mappingConfidence: mappingConfidence(batch.mapping),
            unmappedColumns: unmappedColumns(batch.table.columns, batch.mapping),
            preview: batch.records.slice(0, this.previewRows).map(toDisplayRow),
        };
    }

    async persist(file: UploadedFile): Promise<PersistResult> {
        const batch = await this.prepare(file);
        const summary = await persistenceEngine.upsertApplicants(batch.records, this.store, batch.batchId);
        return {
            status: 'success',
            batchId: batch.batchId,
            totalRows: batch.table.rows.length,
            ...summary,
        };
    }

    async exportCleaned(file: UploadedFile): Promise<Buffer> {
        const batch = await this.prepare(file);
        return writeApplicantsWorkbook(batch.records);
    }

    /**
     * Reads the file, snapshots existing ids once, asks the oracle and repairs every row.
     * A malformed file rejects here; nothing after the read can fail the batch.
     */
    async prepare(file: UploadedFile): Promise<RepairedBatch> {
        const batchId = uuidv4();
        const table = readSpreadsheet(file.buffer, file.originalname);
        console.log(`[Ingestion] ${batchId}: ${file.originalname} -> ${table.rows.length} rows, ${table.columns.length} columns.`);

        const storeIds = await this.seedFromStore(batchId);

        const request = buildMappingRequest(table.columns, table.rows, this.oracleSampleRows);
        const { mapping } = await resolveAdvisoryMapping(this.oracle, request, this.oracleTimeoutMs, batchId);

        const records = repairTable(table, mapping, storeIds);
        console.log(`[RepairEngine] ${batchId}: repaired ${records.length} rows with ${Object.keys(mapping).length} mapped columns.`);

        return { batchId, table, mapping, records };
    }

    private async seedFromStore(batchId: string): Promise<string[]> {
        try {
            await this.ensureSchema();
            return await this.store.listApplicantIds();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Ingestion] ${batchId}: could not read existing applicant ids (${message}). Allocating from batch only.`);
            return [];
        }
    }

    private ensureSchema(): Promise<void> {
        if (!this.schemaReady) {
            this.schemaReady = this.store.ensureSchema().catch((error: unknown) => {
                this.schemaReady = null;
                throw error;
            });
        }
        return this.schemaReady;
    }
}
