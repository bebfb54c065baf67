import type { Server } from 'http';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { IngestionOrchestrator } from '../engine/orchestration_engine';
import { InMemoryApplicantStore } from '../services/applicant_store';
import { buildWorkbook, mappingOracle } from '../__tests__/fixtures';
import { EXPORT_FILENAME } from './applicants';

const GRID: unknown[][] = [
    ['Applicant', 'Name', 'Phone', 'Email', 'Income', 'Loan'],
    ['A301', 'asha rao', 9876543210, 'asha@example.com', 45000, 750000],
];

function formWith(bytes: Buffer, filename: string): FormData {
    const form = new FormData();
    form.append('file', new Blob([bytes]), filename);
    return form;
}

describe('applicant routes', () => {
    let server: Server;
    let baseUrl: string;
    let store: InMemoryApplicantStore;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});

        store = new InMemoryApplicantStore();
        const orchestrator = new IngestionOrchestrator({
            store,
            oracle: mappingOracle({ Applicant: 'applicant_id', Name: 'applicant_name', Income: 'monthly_income' }),
        });
        const app = createApp(orchestrator);

        server = await new Promise<Server>((resolve) => {
            const s = app.listen(0, '127.0.0.1', () => resolve(s));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
        vi.restoreAllMocks();
    });

    it('reports health', async () => {
        const res = await fetch(`${baseUrl}/health`);
        const body = await res.json();

        expect(res.status).toBe(200);
        expect(body).toMatchObject({ status: 'ok', env: 'test', mapping_oracle: 'none', store: 'memory' });
    });

    it('validates an upload without writing it', async () => {
        const res = await fetch(`${baseUrl}/api/applicants/validate`, {
            method: 'POST',
            body: formWith(buildWorkbook(GRID), 'applicants.xlsx'),
        });
        const body = await res.json();

        expect(res.status).toBe(200);
        expect(body).toMatchObject({
            status: 'validated',
            totalRows: 1,
            mapping: { Applicant: 'applicant_id', Name: 'applicant_name', Income: 'monthly_income' },
            mappingConfidence: 30,
            unmappedColumns: ['Phone', 'Email', 'Loan'],
            preview: [{
                applicant_id: 'A301',
                applicant_name: 'Asha Rao',
                phone_number: '9876543210',
                email: 'asha@example.com',
                aadhaar_number: '',
                pan_number: '',
                loan_amount: '750000',
                loan_purpose: '',
                employment_type: '',
                monthly_income: '45000',
            }],
        });
        expect(await store.listApplicantIds()).toEqual([]);
    });

    it('upserts the same file idempotently', async () => {
        const send = () => fetch(`${baseUrl}/api/applicants/upload`, {
            method: 'POST',
            body: formWith(buildWorkbook(GRID), 'applicants.xlsx'),
        });

        const first = await (await send()).json();
        const second = await (await send()).json();

        expect(first).toMatchObject({ status: 'success', inserted: 1, updated: 0, failed: [] });
        expect(second).toMatchObject({ status: 'success', inserted: 0, updated: 1, failed: [] });
        expect((await store.findById('A301'))?.loan_amount).toBe('750000');
    });

    it('returns the cleaned workbook as an attachment', async () => {
        const res = await fetch(`${baseUrl}/api/applicants/export`, {
            method: 'POST',
            body: formWith(buildWorkbook(GRID), 'applicants.xlsx'),
        });

        expect(res.status).toBe(200);
        expect(res.headers.get('content-disposition')).toBe(`attachment; filename="${EXPORT_FILENAME}"`);

        const workbook = XLSX.read(Buffer.from(await res.arrayBuffer()), { type: 'buffer' });
        expect(workbook.SheetNames).toEqual(['Applicants']);
        const sheet = workbook.Sheets['Applicants'];
        expect(sheet['A2']?.v).toBe('A301');
        expect(sheet['B2']?.v).toBe('Asha Rao');
    });

    it('answers 400 when no file is attached', async () => {
        const res = await fetch(`${baseUrl}/api/applicants/validate`, { method: 'POST' });
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "No spreadsheet uploaded in 'file' field." });
    });

    it('answers 422 for an unreadable spreadsheet', async () => {
        const res = await fetch(`${baseUrl}/api/applicants/upload`, {
            method: 'POST',
            body: formWith(Buffer.from('not a workbook'), 'broken.xlsx'),
        });

        expect(res.status).toBe(422);
        expect(await res.json()).toEqual({ error: 'File is not a valid .xlsx workbook.' });
        expect(await store.listApplicantIds()).toEqual([]);
    });
});
