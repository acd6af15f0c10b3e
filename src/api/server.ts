// ============================================================
// HTTP Server
// ============================================================
// POST /webhook is authenticated by the shared secret in the
// body; everything under /api needs the bearer token.
// ============================================================

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { ApiHandlers, ApiResponse } from './handlers.js';
import { authGuard, errorHandler, requestLogger } from './middleware.js';

type Handler = (req: Request) => ApiResponse | Promise<ApiResponse>;

function send(res: Response, response: ApiResponse): void {
  if (response.contentType) {
    res.status(response.status).type(response.contentType);
    if (response.filename) res.setHeader('Content-Disposition', `attachment;filename=${response.filename}`);
    res.send(response.body);
    return;
  }
  res.status(response.status).json(response.body);
}

/** Adapt a handler to express, forwarding rejections to the error handler. */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req))
      .then((response) => send(res, response), next);
  };
}

export function createApp(handlers: ApiHandlers, apiToken: string): Express {
  const app = express();

  app.use(cors());
  app.use(requestLogger);
  app.use(express.json({ limit: '100kb' }));

  // Public
  app.get('/health', route(() => handlers.health()));
  app.post('/webhook', route((req) => handlers.webhook(req.body)));

  // Secured
  app.use('/api', authGuard(apiToken));

  app.post('/api/trade', route((req) => handlers.trade(req.body)));
  app.post('/api/limit-order', route((req) => handlers.limitOrder(req.body)));
  app.post('/api/twap-order', route((req) => handlers.twapOrder(req.body)));
  app.post('/api/twap-cancel', route((req) => handlers.twapCancel(req.body)));
  app.post('/api/scale-order', route((req) => handlers.scaleOrder(req.body)));
  app.post('/api/batch-trade', route((req) => handlers.batchTrade(req.body)));

  app.post('/api/close', route((req) => handlers.close(req.body)));
  app.post('/api/close-all', route(() => handlers.closeAll()));
  app.post('/api/cancel-order', route((req) => handlers.cancelOrder(req.body)));
  app.post('/api/modify-order', route((req) => handlers.modifyOrder(req.body)));

  app.post('/api/bot/toggle', route((req) => handlers.botToggle(req.body)));
  app.get('/api/settings/risk', route(() => handlers.getRiskSettings()));
  app.post('/api/settings/risk', route((req) => handlers.updateRiskSettings(req.body)));
  app.get('/api/risk/state', route(() => handlers.riskState()));
  app.post('/api/risk/resume', route(() => handlers.riskResume()));
  app.post('/api/risk/pause', route((req) => handlers.riskPause(req.body)));
  app.get('/api/coins', route((req) => handlers.listCoins(req.query)));
  app.put('/api/coins', route((req) => handlers.upsertCoin(req.body)));

  app.get('/api/trades', route((req) => handlers.listTrades(req.query)));
  app.get('/api/trades/export', route(() => handlers.exportTrades()));
  app.get('/api/stats/daily', route(() => handlers.dailyStats()));
  app.get('/api/activity', route(() => handlers.recentActivity()));

  app.use(errorHandler);
  return app;
}
