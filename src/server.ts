import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import multer from 'multer';
import { env } from './config/env';
import rateLimit from 'express-rate-limit';

import { createExtractionChain } from './engine/extraction/extraction_chain';
import type { DocumentExtractor } from './engine/ingestion_pipeline';
import { getDefaultCatalogue } from './engine/verification_engine';
import { createReportStore, type ReportStore } from './services/report_store';
import { createVerificationRouter } from './routes/verification';
import { createReportsRouter } from './routes/reports';
import jobsRoutes from './routes/jobs';

export interface AppDependencies {
    extractor: DocumentExtractor;
    reportStore: ReportStore;
}

function corsOrigins(): string[] | '*' {
    if (env.CORS_ORIGIN.trim() === '*') return '*';
    return env.CORS_ORIGIN.split(',').map(o => o.trim()).filter(o => o.length > 0);
}

export function createApp({ extractor, reportStore }: AppDependencies) {
    const app = express();

    // Trust the first proxy hop (load balancer)
    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 100, // Limit each IP to 100 requests per windowMs
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    app.use(helmet());
    app.use(express.json({ limit: '10mb' }));
    app.use(morgan('dev'));

    const allowedOrigins = corsOrigins();
    app.use(cors({
        origin: (origin, callback) => {
            // Allow curl and server-to-server calls (no origin)
            if (!origin || allowedOrigins === '*') return callback(null, true);
            if (allowedOrigins.includes(origin)) {
                callback(null, true);
            } else {
                console.warn(`[Server] Blocked CORS origin: ${origin}`);
                callback(new Error('Not allowed by CORS'));
            }
        },
        credentials: true
    }));

    app.use(limiter);

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: env.NODE_ENV,
            ruleCatalogue: env.RULE_CATALOGUE,
            rules: getDefaultCatalogue().map(r => r.ruleId),
            timestamp: new Date().toISOString()
        });
    });

    app.use('/api/verification', createVerificationRouter(extractor));
    app.use('/api/jobs', jobsRoutes);
    app.use('/api/reports', createReportsRouter(reportStore));

    // Final error handler (multer limits, malformed JSON, CORS rejections)
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        console.error(`[Server] Unhandled error on ${req.method} ${req.originalUrl}:`, err);
        if (err instanceof multer.MulterError) {
            return res.status(400).json({ error: err.message, code: err.code });
        }
        if (err instanceof SyntaxError) {
            return res.status(400).json({ error: 'Malformed request body' });
        }
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

if (require.main === module) {
    // A malformed rule catalogue must stop the process before it accepts traffic
    getDefaultCatalogue();

    const reportStore = createReportStore();
    reportStore.attach();

    const app = createApp({ extractor: createExtractionChain(env), reportStore });
    const PORT = env.PORT || 3001;

    app.listen(PORT, () => {
        console.log(`Document verification backend running on port ${PORT}`);
    });
}
