import express from 'express';
import { requireAuth } from '../middleware/auth_middleware';
import type { ReportStore } from '../services/report_store';

export function createReportsRouter(store: ReportStore) {
    const router = express.Router();

    router.get('/', requireAuth, async (req, res) => {
        try {
            res.json({ personIds: await store.list() });
        } catch (error) {
            console.error('[Reports] List Error:', error);
            res.status(500).json({ error: 'Could not list reports.' });
        }
    });

    router.get('/:personId', requireAuth, async (req, res) => {
        try {
            const report = await store.get(req.params.personId);
            if (!report) return res.status(404).json({ error: 'Report not found.' });
            res.json(report);
        } catch (error) {
            console.error('[Reports] Retrieval Error:', error);
            res.status(500).json({ error: 'Could not load report.' });
        }
    });

    return router;
}
