import axios from 'axios';
import OpenAI from 'openai';
import { env } from '../config/env';
import { AdvisoryMapping, CANONICAL_FIELDS, RawRow } from '../types/applicant_types';

export interface MappingRequest {
    excel_columns: string[];
    database_fields: string[];
    data_rows: RawRow[];
}

/**
 * Anything that can suggest which spreadsheet column holds which canonical field.
 * The reply is untrusted and goes through `decodeOracleResponse`.
 */
export interface MappingOracle {
    readonly provider: 'http' | 'openai' | 'none';
    requestMapping(request: MappingRequest, timeoutMs: number): Promise<unknown>;
}

export type OracleDecodeResult =
    | { ok: true; mapping: AdvisoryMapping }
    | { ok: false; mapping: AdvisoryMapping; reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch (e) {
        return { ok: false };
    }
}

/**
 * Digs the column mapping out of whatever the oracle returned. Accepted shapes:
 * `{ mapping }`, `{ result: { mapping } }`, `{ result: { result } }`, any of those
 * as a JSON string, and a mapping that is itself a JSON string. Never throws.
 */
export function decodeOracleResponse(raw: unknown): OracleDecodeResult {
    let body = raw;
    if (typeof body === 'string') {
        const parsed = parseJson(body);
        if (!parsed.ok) return { ok: false, mapping: {}, reason: 'response body is not JSON' };
        body = parsed.value;
    }

    if (!isPlainObject(body)) {
        return { ok: false, mapping: {}, reason: 'response is not an object' };
    }

    let candidate: unknown = undefined;
    const result = body.result;
    if (isPlainObject(result)) {
        if ('mapping' in result) candidate = result.mapping;
        else if ('result' in result) candidate = result.result;
    }
    if ('mapping' in body) candidate = body.mapping;

    if (candidate === undefined) {
        return { ok: false, mapping: {}, reason: 'no mapping in response' };
    }

    if (typeof candidate === 'string') {
        const parsed = parseJson(candidate);
        if (!parsed.ok) return { ok: false, mapping: {}, reason: 'mapping string is not JSON' };
        candidate = parsed.value;
    }

    if (!isPlainObject(candidate)) {
        return { ok: false, mapping: {}, reason: 'mapping is not an object' };
    }

    const mapping: AdvisoryMapping = {};
    for (const [column, field] of Object.entries(candidate)) {
        if (column === 'is_valid' || typeof field !== 'string') continue;
        mapping[column] = field;
    }
    return { ok: true, mapping };
}

export class HttpMappingOracle implements MappingOracle {
    readonly provider = 'http' as const;

    constructor(private readonly url: string, private readonly token?: string) {}

    async requestMapping(request: MappingRequest, timeoutMs: number): Promise<unknown> {
        const form = new URLSearchParams({ task: JSON.stringify(request) });
        const response = await axios.post<unknown>(this.url, form, {
            headers: this.token ? { Authorization: `Bearer ${this.token}` } : {},
            timeout: timeoutMs,
            signal: AbortSignal.timeout(timeoutMs),
        });
        return response.data;
    }
}

export class OpenAIMappingOracle implements MappingOracle {
    readonly provider = 'openai' as const;
    private client: OpenAI;

    constructor(apiKey: string, private readonly model: string = env.OPENAI_MODEL) {
        this.client = new OpenAI({ apiKey, maxRetries: 0 });
    }

    async requestMapping(request: MappingRequest, timeoutMs: number): Promise<unknown> {
        const completion = await this.client.chat.completions.create(
            {
                model: this.model,
                temperature: 0,
                response_format: { type: 'json_object' },
                messages: [
                    {
                        role: 'system',
                        content: `You map spreadsheet columns onto database fields for loan applicant records.
                        Allowed database fields: ${request.database_fields.join(', ')}.
                        Look at the column names AND the sample values. Leave out columns that match no field.
                        Reply with JSON only: {"mapping": {"<excel column>": "<database field>"}}`,
                    },
                    {
                        role: 'user',
                        content: JSON.stringify(request),
                    },
                ],
            },
            { timeout: timeoutMs }
        );

        return completion.choices[0]?.message?.content ?? '';
    }
}

export class NoMappingOracle implements MappingOracle {
    readonly provider = 'none' as const;

    async requestMapping(): Promise<unknown> {
        return { mapping: {} };
    }
}

export function createMappingOracle(): MappingOracle {
    if (env.MAPPING_ORACLE_URL) {
        return new HttpMappingOracle(env.MAPPING_ORACLE_URL, env.MAPPING_ORACLE_TOKEN);
    }
    if (env.OPENAI_API_KEY) {
        return new OpenAIMappingOracle(env.OPENAI_API_KEY);
    }
    console.warn('⚠️ No mapping oracle configured (MAPPING_ORACLE_URL / OPENAI_API_KEY). Columns will be repaired from values alone.');
    return new NoMappingOracle();
}

export function buildMappingRequest(columns: string[], rows: RawRow[], sampleRows: number): MappingRequest {
    return {
        excel_columns: columns,
        database_fields: [...CANONICAL_FIELDS],
        data_rows: sampleRows > 0 ? rows.slice(0, sampleRows) : rows,
    };
}

/**
 * Asks the oracle for a mapping, bounded by `timeoutMs`. Errors, timeouts and
 * malformed replies all come back as an empty mapping.
 */
export async function resolveAdvisoryMapping(
    oracle: MappingOracle,
    request: MappingRequest,
    timeoutMs: number,
    batchId = 'adhoc'
): Promise<OracleDecodeResult> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`mapping oracle timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
        const raw = await Promise.race([oracle.requestMapping(request, timeoutMs), deadline]);
        const decoded = decodeOracleResponse(raw);
        if (!decoded.ok) {
            console.warn(`[MappingOracle] ${batchId}: unusable ${oracle.provider} response (${decoded.reason}). Using empty mapping.`);
        }
        return decoded;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[MappingOracle] ${batchId}: ${oracle.provider} oracle failed: ${message}. Using empty mapping.`);
        return { ok: false, mapping: {}, reason: message };
    } finally {
        clearTimeout(timer);
    }
}
