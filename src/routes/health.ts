import { Router, Request, Response } from 'express';
import { getDatabaseStatus } from '../config/database';
import { eventBus } from '../events/eventBus';
import { escrowService } from '../services/escrow/escrow.service';

const router = Router();

const componentStatus = () => {
  const dbStatus = getDatabaseStatus();
  const eventBusStatus = eventBus.getStatus();
  const ledgerLoaded = escrowService.isReady();

  return {
    healthy: dbStatus.connected && eventBusStatus.connected && ledgerLoaded,
    services: {
      database: {
        connected: dbStatus.connected,
        readyState: dbStatus.readyState,
      },
      eventBus: {
        connected: eventBusStatus.connected,
      },
      ledger: {
        loaded: ledgerLoaded,
      },
    },
  };
};

router.get('/', (_req: Request, res: Response) => {
  const { healthy, services } = componentStatus();

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    services,
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

router.get('/ready', (_req: Request, res: Response) => {
  const { healthy } = componentStatus();

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'ready' : 'not ready',
    timestamp: new Date().toISOString(),
  });
});

export default router;
