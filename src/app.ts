import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import { env } from './config/env';
import { IngestionOrchestrator } from './engine/orchestration_engine';
import { createApplicantRouter } from './routes/applicants';

export function createApp(orchestrator: IngestionOrchestrator) {
    const app = express();

    // Trust Proxy for load balancers in front of the service
    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 100,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    if (env.NODE_ENV !== 'test') {
        app.use(morgan('dev'));
    }

    const allowedOrigins = env.CORS_ORIGIN.split(',').map(o => o.trim()).filter(Boolean);
    app.use(cors({
        origin: allowedOrigins.includes('*') ? true : allowedOrigins,
    }));

    app.get('/', (req, res) => {
        res.json({ msg: 'Loan Applicant Ingestion Service' });
    });

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: env.NODE_ENV,
            mapping_oracle: orchestrator.oracleProvider,
            store: orchestrator.storeKind,
            timestamp: new Date().toISOString(),
        });
    });

    app.use('/api/applicants', limiter, createApplicantRouter(orchestrator));

    // Error Handling
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (err instanceof multer.MulterError) {
            const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
            return res.status(status).json({ error: err.message });
        }
        console.error('[Server] Unhandled error:', err);
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}
