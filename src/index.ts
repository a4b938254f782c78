import express, { Request, Response, NextFunction } from 'express';
import config from './utils/config';
import logger from './utils/logger';
import syncRoutes from './routes/sync.routes';
import { startCheckinSyncJob } from './jobs/checkin-sync.job';

const app = express();

// Middleware
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Request logging
app.use((req: Request, res: Response, next: NextFunction) => {
    logger.info(`${req.method} ${req.path}`, {
        ip: req.ip,
        userAgent: req.get('user-agent'),
    });
    next();
});

// Routes
app.use('/sync', syncRoutes);

// Root endpoint
app.get('/', (req: Request, res: Response) => {
    res.json({
        name: 'Checkin Sync Bridge',
        version: '1.0.0',
        status: 'running',
        endpoints: {
            run: 'POST /sync/run',
            config: 'PUT /sync/config',
        },
    });
});

// Error handling middleware
app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled error', {
        error: err.message,
        stack: err.stack,
        path: req.path,
    });

    res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: config.nodeEnv === 'development' ? err.message : undefined,
    });
});

// 404 handler
app.use((req: Request, res: Response) => {
    res.status(404).json({
        success: false,
        error: 'Not found',
    });
});

// Start server
const PORT = config.port;

app.listen(PORT, () => {
    logger.info(`Checkin Sync Bridge started on port ${PORT}`, {
        nodeEnv: config.nodeEnv,
        hrUrl: config.hr.url,
        deviceIp: config.device.ip,
    });

    startCheckinSyncJob();
});

// Graceful shutdown
process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully...');
    process.exit(0);
});

process.on('SIGINT', () => {
    logger.info('SIGINT received, shutting down gracefully...');
    process.exit(0);
});

// Unhandled rejection handler
process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
});

export default app;
