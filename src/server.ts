import { createApp } from './app';
import { env } from './config/env';
import { IngestionOrchestrator } from './engine/orchestration_engine';
import { createApplicantStore } from './services/applicant_store';
import { createMappingOracle } from './services/mapping_oracle';

const store = createApplicantStore();
const orchestrator = new IngestionOrchestrator({
    store,
    oracle: createMappingOracle(),
});

const app = createApp(orchestrator);

const server = app.listen(Number(env.PORT), () => {
    console.log(`Applicant ingestion service running on port ${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
    console.log(`Store: ${orchestrator.storeKind} | Mapping oracle: ${orchestrator.oracleProvider}`);
});

function shutdown(signal: string) {
    console.log(`[Server] ${signal} received, shutting down.`);
    server.close(() => {
        store.close()
            .catch((error: unknown) => console.error('[Server] Store close failed:', error))
            .finally(() => process.exit(0));
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
