import express from 'express';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    HttpMappingOracle,
    MappingOracle,
    buildMappingRequest,
    decodeOracleResponse,
    resolveAdvisoryMapping,
} from './mapping_oracle';
import { CANONICAL_FIELDS } from '../types/applicant_types';
import { failingOracle, stubOracle } from '../__tests__/fixtures';

const request = buildMappingRequest(['Name'], [{ Name: 'asha rao' }], 0);

describe('decodeOracleResponse', () => {
    it('reads a root-level mapping', () => {
        expect(decodeOracleResponse({ mapping: { Name: 'applicant_name' } })).toEqual({ ok: true, mapping: { Name: 'applicant_name' } });
    });

    it('reads a mapping nested under result.result', () => {
        expect(decodeOracleResponse({ result: { result: { Mobile: 'phone_number' } } })).toEqual({ ok: true, mapping: { Mobile: 'phone_number' } });
    });

    it('parses a mapping sent as a JSON string', () => {
        const raw = { result: { mapping: '{"Mail":"email"}' } };
        expect(decodeOracleResponse(raw)).toEqual({ ok: true, mapping: { Mail: 'email' } });
    });

    it('parses a response body that is a JSON string', () => {
        expect(decodeOracleResponse('{"mapping":{"PAN":"pan_number"}}')).toEqual({ ok: true, mapping: { PAN: 'pan_number' } });
    });

    it('prefers the root mapping over a nested one', () => {
        const raw = { result: { mapping: { A: 'email' } }, mapping: { B: 'email' } };
        expect(decodeOracleResponse(raw)).toEqual({ ok: true, mapping: { B: 'email' } });
    });

    it('drops the is_valid flag and non-string targets', () => {
        const raw = { mapping: { Name: 'applicant_name', is_valid: 'true', Count: 3 } };
        expect(decodeOracleResponse(raw)).toEqual({ ok: true, mapping: { Name: 'applicant_name' } });
    });

    it('falls back to an empty mapping for unusable replies', () => {
        expect(decodeOracleResponse(null)).toEqual({ ok: false, mapping: {}, reason: 'response is not an object' });
        expect(decodeOracleResponse('<html>')).toEqual({ ok: false, mapping: {}, reason: 'response body is not JSON' });
        expect(decodeOracleResponse({ result: 'garbage' })).toEqual({ ok: false, mapping: {}, reason: 'no mapping in response' });
        expect(decodeOracleResponse({ mapping: 'not json' })).toEqual({ ok: false, mapping: {}, reason: 'mapping string is not JSON' });
        expect(decodeOracleResponse({ mapping: ['email'] })).toEqual({ ok: false, mapping: {}, reason: 'mapping is not an object' });
    });
});

describe('buildMappingRequest', () => {
    const rows = [{ a: '1' }, { a: '2' }, { a: '3' }];

    it('limits the rows sent to the sample size', () => {
        expect(buildMappingRequest(['a'], rows, 2).data_rows).toEqual([{ a: '1' }, { a: '2' }]);
    });

    it('sends every row when the sample size is 0', () => {
        const req = buildMappingRequest(['a'], rows, 0);
        expect(req.data_rows).toHaveLength(3);
        expect(req.database_fields).toEqual([...CANONICAL_FIELDS]);
        expect(req.excel_columns).toEqual(['a']);
    });
});

describe('resolveAdvisoryMapping', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('returns the decoded mapping', async () => {
        const result = await resolveAdvisoryMapping(stubOracle({ mapping: { Name: 'applicant_name' } }), request, 1000);
        expect(result).toEqual({ ok: true, mapping: { Name: 'applicant_name' } });
    });

    it('falls back to an empty mapping when the oracle throws', async () => {
        const result = await resolveAdvisoryMapping(failingOracle('503 Service Unavailable'), request, 1000);
        expect(result).toEqual({ ok: false, mapping: {}, reason: '503 Service Unavailable' });
    });

    it('gives up on an oracle that never answers', async () => {
        const stuck: MappingOracle = {
            provider: 'http',
            requestMapping: () => new Promise<unknown>(() => {}),
        };

        const result = await resolveAdvisoryMapping(stuck, request, 20);

        expect(result).toEqual({ ok: false, mapping: {}, reason: 'mapping oracle timed out after 20ms' });
    });
});

describe('HttpMappingOracle', () => {
    let server: Server;
    let url: string;
    const received: Array<{ authorization: string | undefined; task: unknown }> = [];

    beforeEach(async () => {
        received.length = 0;
        const fake = express();
        fake.use(express.urlencoded({ extended: false }));
        fake.post('/map', (req, res) => {
            received.push({ authorization: req.headers.authorization, task: JSON.parse(String(req.body.task)) });
            res.json({ result: { mapping: JSON.stringify({ Name: 'applicant_name' }) } });
        });

        server = await new Promise<Server>((resolve) => {
            const s = fake.listen(0, '127.0.0.1', () => resolve(s));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
        url = `http://127.0.0.1:${address.port}/map`;
    });

    afterEach(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('posts the task as a form field with a bearer token', async () => {
        const oracle = new HttpMappingOracle(url, 'test-token');

        const raw = await oracle.requestMapping(request, 2000);

        expect(decodeOracleResponse(raw)).toEqual({ ok: true, mapping: { Name: 'applicant_name' } });
        expect(received).toEqual([{ authorization: 'Bearer test-token', task: request }]);
    });
});
