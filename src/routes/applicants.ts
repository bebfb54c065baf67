import express, { Request, Response } from 'express';
import multer from 'multer';
import { env } from '../config/env';
import { IngestionOrchestrator, UploadedFile } from '../engine/orchestration_engine';
import { UploadRejectedError } from '../utils/errors';

export const EXPORT_FILENAME = 'cleaned_loan_applicants.xlsx';

function requireFile(req: Request): UploadedFile {
    if (!req.file) {
        throw new UploadRejectedError("No spreadsheet uploaded in 'file' field.", 400);
    }
    console.log(`[Ingestion] Received ${req.file.originalname} (${req.file.size} bytes)`);
    return { buffer: req.file.buffer, originalname: req.file.originalname };
}

function sendError(res: Response, error: unknown) {
    if (error instanceof UploadRejectedError) {
        return res.status(error.statusCode).json({ error: error.message });
    }
    console.error('[Ingestion] Request failed:', error);
    const message = error instanceof Error ? error.message : 'Internal Server Error';
    return res.status(500).json({ error: message });
}

export function createApplicantRouter(orchestrator: IngestionOrchestrator) {
    const router = express.Router();
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: env.UPLOAD_MAX_BYTES, files: 1 },
    });

    // Preview only: nothing is written
    router.post('/validate', upload.single('file'), async (req, res) => {
        try {
            const result = await orchestrator.preview(requireFile(req));
            res.json(result);
        } catch (error) {
            sendError(res, error);
        }
    });

    router.post('/upload', upload.single('file'), async (req, res) => {
        try {
            const result = await orchestrator.persist(requireFile(req));
            res.json(result);
        } catch (error) {
            sendError(res, error);
        }
    });

    router.post('/export', upload.single('file'), async (req, res) => {
        try {
            const workbook = await orchestrator.exportCleaned(requireFile(req));
            res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
            res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILENAME}"`);
            res.send(workbook);
        } catch (error) {
            sendError(res, error);
        }
    });

    return router;
}
