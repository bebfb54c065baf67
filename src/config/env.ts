import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Blank entries in .env count as unset
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
    PORT: z.string().default('3001'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),
    DATABASE_URL: z.preprocess(blankAsUnset, z.string().optional()),
    APPLICANT_TABLE: z.string().regex(/^[a-z_][a-z0-9_]*$/, 'APPLICANT_TABLE must be a plain SQL identifier').default('loan_applicants'),
    MAPPING_ORACLE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
    MAPPING_ORACLE_TOKEN: z.preprocess(blankAsUnset, z.string().optional()),
    MAPPING_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    // 0 sends every row to the oracle
    MAPPING_ORACLE_SAMPLE_ROWS: z.coerce.number().int().nonnegative().default(50),
    OPENAI_API_KEY: z.preprocess(blankAsUnset, z.string().optional()),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    PREVIEW_ROWS: z.coerce.number().int().positive().default(20),
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
