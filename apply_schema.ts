import { Client } from 'pg';
import { env } from './src/config/env';
import { createTableSql } from './src/services/applicant_store';

if (!env.DATABASE_URL) {
  console.error("No DATABASE_URL found. Please ensure the Postgres connection URL is available in the environment.");
  process.exit(1);
}

const client = new Client({
  connectionString: env.DATABASE_URL,
});

async function runPgMigration() {
  console.log("Connecting to PostgreSQL...");
  await client.connect();

  const sqlScript = createTableSql(env.APPLICANT_TABLE);

  try {
    console.log(`Creating table ${env.APPLICANT_TABLE} if missing...`);
    await client.query(sqlScript);
    console.log("Schema applied successfully.");
  } catch (e) {
    console.error("Schema execution failed:", e);
    process.exitCode = 1;
  } finally {
    await client.end();
  }
}

runPgMigration().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
