import express, { type Express, type Request, type Response } from 'express';
import type { ServerConfig } from './config.js';
import { type ApiResponse, advise, equity, evaluate, rangeEquity, respond } from './handlers.js';

/**
 * Build the express app. Kept apart from `listen` so the routes can be
 * mounted elsewhere.
 */
export function createApp(config: ServerConfig): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Classify a 5-7 card hand
  app.post('/api/evaluate', (req: Request, res: Response) => {
    send(res, 'Evaluate', () => respond(() => evaluate(req.body)));
  });

  // Equity against random opponents
  app.post('/api/equity', (req: Request, res: Response) => {
    send(res, 'Equity', () => respond(() => equity(req.body, config)));
  });

  // Equity against a fixed range
  app.post('/api/range-equity', (req: Request, res: Response) => {
    send(res, 'Range equity', () => respond(() => rangeEquity(req.body, config)));
  });

  // Call/fold/check recommendation
  app.post('/api/advise', (req: Request, res: Response) => {
    send(res, 'Advise', () => respond(() => advise(req.body, config)));
  });

  return app;
}

function send(res: Response, label: string, handle: () => ApiResponse): void {
  try {
    const { status, body } = handle();
    if (status === 200) {
      console.log(`${label}: ok`);
    } else {
      console.log(`${label}: rejected (${status})`);
    }
    res.status(status).json(body);
  } catch (error) {
    console.error(`${label} error:`, error);
    res.status(500).json({ error: `${label} failed`, details: String(error) });
  }
}
