import { ApplicantStore } from '../services/applicant_store';
import { ApplicantRecord, CANONICAL_FIELDS, PersistSummary } from '../types/applicant_types';
import { isNull } from '../utils/normalization';

/**
 * Placeholder strings become real NULLs before they reach the store.
 */
export function toStorageRecord(record: ApplicantRecord): ApplicantRecord {
    const out = { ...record };
    for (const field of CANONICAL_FIELDS) {
        const value = out[field];
        out[field] = value === null || isNull(value) ? null : value.trim();
    }
    return out;
}

export const persistenceEngine = {
    /**
     * Inserts new applicant ids and overwrites existing ones, one transaction per record.
     * A record that fails is rolled back and reported; the rest of the batch still runs.
     */
    async upsertApplicants(records: readonly ApplicantRecord[], store: ApplicantStore, batchId = 'adhoc'): Promise<PersistSummary> {
        const summary: PersistSummary = { inserted: 0, updated: 0, failed: [] };

        for (const record of records) {
            const row = toStorageRecord(record);
            try {
                const outcome = await store.upsert(row);
                if (outcome === 'inserted') summary.inserted++;
                else summary.updated++;
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.error(`[Persistence] ${batchId}: upsert failed for ${row.applicant_id ?? '<no id>'}: ${message}`);
                summary.failed.push({ applicantId: row.applicant_id, error: message });
            }
        }

        console.log(`[Persistence] ${batchId}: ${summary.inserted} inserted, ${summary.updated} updated, ${summary.failed.length} failed.`);
        return summary;
    },
};
