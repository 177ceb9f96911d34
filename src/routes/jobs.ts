import express from 'express';
import { requireAuth } from '../middleware/auth_middleware';
import { jobService } from '../services/job_service';

const router = express.Router();

router.get('/:id', requireAuth, (req, res) => {
    const job = jobService.getJob(req.params.id);
    if (job) {
        res.json(job);
    } else {
        res.status(404).json({ error: 'Job not found' });
    }
});

router.get('/', requireAuth, (req, res) => {
    res.json(jobService.listJobs().map(({ id, type, status, createdAt, updatedAt }) => ({ id, type, status, createdAt, updatedAt })));
});

export default router;
