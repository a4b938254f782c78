import { Router } from 'express';
import * as syncController from '../controllers/sync.controller';

const router = Router();

// Trigger a sync run
router.post('/run', syncController.runSync);

// Update sync configuration
router.put('/config', syncController.updateSyncConfig);

export default router;
