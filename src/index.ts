import 'dotenv/config';
import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import jwt from 'jsonwebtoken';
import { generateMonthCalendar, getMonthCalendar, clearMonthCalendar } from './api/calendar/calendar';
import { getCalendarDay, editCalendarDay } from './api/calendar/day';
import { importExpenses, exportCalendar } from './api/calendar/expenses';
import { redistribute } from './api/calendar/redistribute';
import { checkStreakEligibility, runStreakAuto, claimStreak } from './api/challenges/streak';
import {
  getChallenges,
  updateChallenges,
  evaluateChallenges,
  recordChallengeOutcomes,
} from './api/challenges/challenges';
import { logProgress, getProgress, compareProgress, getProgressSummary } from './api/progress/progress';
import { getIncomeClass } from './api/profile/incomeClass';
import { getAnalyticsSummary } from './api/analytics/analytics';
import { loadConfig } from './utils/config/config';
import { createServices, Services } from './utils/context/services';
import { ApiError } from './utils/errors/errors';
import { err, log } from './utils/logger';
import { logToFile } from './utils/log';

declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

type Handler<T> = (req: Request, services: Services) => T | Promise<T>;

/**
 * User id carried by a valid token, or false
 */
export const isTokenValid = (token: string | undefined, secret: string): string | false => {
  if (!token || !secret) {
    return false;
  }
  const raw = token.startsWith('Bearer ') ? token.slice('Bearer '.length) : token;
  try {
    const decoded = jwt.verify(raw, secret);
    if (typeof decoded === 'string') {
      return false;
    }
    const userId: unknown = decoded.userId;
    if (typeof userId === 'string' && userId !== '') {
      return userId;
    }
    if (typeof userId === 'number') {
      return String(userId);
    }
    return false;
  } catch {
    return false;
  }
};

export const verifyToken = (secret: string) => (req: Request, res: Response, next: NextFunction) => {
  const userId = isTokenValid(req.headers.authorization, secret);
  if (!userId) {
    res.status(401).json({ message: 'Invalid token' });
    return;
  }
  req.userId = userId;
  next();
};

/**
 * Maps ApiError subclasses to their status; anything else is a logged 500
 */
export const sendError = (services: Services, req: Request, res: Response, error: unknown) => {
  if (error instanceof ApiError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }
  err('Request failed', `${req.method} ${req.path}`, { userId: req.userId ?? 'anonymous', error });
  if (services.config.logFile) {
    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    logToFile(services.config.logFile, `${new Date().toISOString()} ${req.method} ${req.path} ${message}`);
  }
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(services: Services): Express {
  const app: Express = express();
  const auth = verifyToken(services.config.jwtSecret);

  const handle =
    <T>(handler: Handler<T>) =>
    async (req: Request, res: Response) => {
      try {
        res.json(await handler(req, services));
      } catch (error) {
        sendError(services, req, res, error);
      }
    };

  // Middleware
  app.use(express.json());
  app.use(bodyParser.text({ type: 'text/csv' }));

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  // Calendar routes
  app.post('/api/calendar/redistribute', auth, handle(redistribute));
  app
    .route('/api/calendar/:year/:month')
    .get(auth, handle(getMonthCalendar))
    .delete(auth, handle(clearMonthCalendar));
  app.post('/api/calendar/:year/:month/generate', auth, handle(generateMonthCalendar));
  app
    .route('/api/calendar/:year/:month/day/:day')
    .get(auth, handle(getCalendarDay))
    .patch(auth, handle(editCalendarDay));
  app.post('/api/calendar/:year/:month/expenses', auth, handle(importExpenses));
  app.get('/api/calendar/:year/:month/export', auth, async (req: Request, res: Response) => {
    try {
      const csv = await exportCalendar(req, services);
      res.type('text/csv').send(csv);
    } catch (error) {
      sendError(services, req, res, error);
    }
  });

  // Challenge routes
  app.post('/api/challenges/eligibility', auth, handle(checkStreakEligibility));
  app.post('/api/challenges/streak/auto', auth, handle(runStreakAuto));
  app.post('/api/challenges/streak/claim', auth, handle(claimStreak));
  app.route('/api/challenges').get(auth, handle(getChallenges)).put(auth, handle(updateChallenges));
  app.get('/api/challenges/:year/:month', auth, handle(evaluateChallenges));
  app.post('/api/challenges/:year/:month/outcomes', auth, handle(recordChallengeOutcomes));

  // Progress routes
  app
    .route('/api/progress/:year/:month')
    .get(auth, handle(getProgress))
    .post(auth, handle(logProgress));
  app.get('/api/progress/:year/:month/compare', auth, handle(compareProgress));
  app.get('/api/progress/:year/:month/summary', auth, handle(getProgressSummary));

  // Profile and analytics routes
  app.get('/api/profile/income-class', auth, handle(getIncomeClass));
  app.get('/api/analytics/summary', auth, handle(getAnalyticsSummary));

  return app;
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const app = createApp(createServices(config));
  app.listen(config.port, () => {
    log(`Server is running on port ${config.port}`, { store: config.store });
  });
}
