import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { globalLimiter } from './middlewares/rateLimiter';
import healthRoutes from './routes/health';
import { authRoutes } from './auth';
import { walletRoutes } from './services/wallet';
import { escrowRoutes, ledgerRoutes } from './services/escrow';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(cors(config.isProduction ? { origin: config.api.corsOrigins } : undefined));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', healthRoutes);
  app.use('/auth', authRoutes);
  app.use('/wallets', walletRoutes);
  app.use('/escrows', escrowRoutes);
  app.use('/ledger', ledgerRoutes);

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Timelock Escrow API',
      version: '1.0.0',
      description: 'Custodial time-locked escrow ledger',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
