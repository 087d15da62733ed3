/**
 * Cloud Router
 *
 * Endpoints:
 * - POST /configure/:provider   Save credentials for s3, gdrive or rclone
 * - GET  /status                Configured and default flags per provider
 */

import { Router } from 'express';
import { configureProvider, getStatus } from './handlers.js';

const router = Router();

// Bodies differ per provider, so configureProvider validates after reading :provider
router.post('/configure/:provider', configureProvider);
router.get('/status', getStatus);

export default router;
