import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'http';
import type { z } from 'zod';

import { login, logout, register, verifyToken } from './auth.js';
import type { ResetScope } from './ai/binding-store.js';
import { reviewPurchase } from './ai/purchase-review.js';
import { redactPii } from './ai/redact.js';
import type { AiServices } from './ai/services.js';
import { HISTORY_DEFAULT_LIMIT, HISTORY_MAX_LIMIT } from './config.js';
import {
  completeOnboarding,
  getStressLogs,
  getTransactions,
  getUserById,
  recordStressLevel,
  saveSurvey,
} from './db.js';
import { AppError, NotFoundError, UnauthorizedError, ValidationError } from './errors.js';
import { logger } from './logger.js';
import { addIncome, evaluatePurchase } from './rule-engine.js';
import {
  chatSchema,
  credentialsSchema,
  describeIssue,
  incomeSchema,
  onboardingSchema,
  purchaseSchema,
  resetSchema,
  stressSchema,
  surveySchema,
} from './schemas.js';
import { isTopic, type SurveyProfile, type Topic, type User } from './types.js';

interface AuthRequest extends Request {
  user?: User;
  token?: string;
}

export interface AppOptions {
  ai: AiServices;
  resetScope: 'user' | 'global';
  redactPii: boolean;
  corsOrigin: string;
}

type Handler = (req: AuthRequest, res: Response) => unknown;

// Express 4 does not forward rejected promises, so every handler goes
// through here.
function route(handler: Handler) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(describeIssue(parsed.error));
  }
  return parsed.data;
}

// Authentication middleware
function authMiddleware(req: AuthRequest, res: Response, next: NextFunction) {
  const token = req.headers.authorization?.replace('Bearer ', '').trim();
  const user = token ? verifyToken(token) : undefined;

  if (!token || !user) {
    return res.status(401).json({ error: 'Unauthorized' });
  }

  req.user = user;
  req.token = token;
  next();
}

function currentUser(req: AuthRequest): User {
  if (!req.user) throw new UnauthorizedError('Unauthorized');
  // Re-read so balance and stress reflect writes made since the token check
  const fresh = getUserById(req.user.id);
  if (!fresh) throw new UnauthorizedError('Unauthorized');
  return fresh;
}

function topicParam(req: Request): Topic {
  const { topic } = req.params;
  if (!topic || !isTopic(topic)) {
    throw new NotFoundError(`Unknown topic "${topic ?? ''}"`);
  }
  return topic;
}

/** Survey answers plus the live balance and stress figures. */
function profileFor(user: User): SurveyProfile {
  return { ...user.survey, balance: user.balance, stress_level: user.stress_level };
}

function historyLimit(raw: unknown): number {
  if (typeof raw !== 'string' || raw === '') return HISTORY_DEFAULT_LIMIT;
  const limit = parseInt(raw, 10);
  if (isNaN(limit) || limit <= 0) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Math.min(limit, HISTORY_MAX_LIMIT);
}

export function createApp(options: AppOptions): express.Express {
  const { ai } = options;
  const app = express();

  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', options.corsOrigin);
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // --- Accounts ---

  app.post(
    '/api/register',
    route((req, res) => {
      const { username, password } = parseBody(credentialsSchema, req.body);
      const session = register(username, password);
      res.status(201).json(session);
    }),
  );

  app.post(
    '/api/login',
    route((req, res) => {
      const { username, password } = parseBody(credentialsSchema, req.body);
      res.json(login(username, password));
    }),
  );

  app.post(
    '/api/logout',
    authMiddleware,
    route((req, res) => {
      logout(currentUser(req).id);
      res.json({ success: true });
    }),
  );

  app.get(
    '/api/me',
    authMiddleware,
    route((req, res) => {
      res.json({ user: currentUser(req) });
    }),
  );

  // --- Survey ---

  app.post(
    '/api/onboarding',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      const body = parseBody(onboardingSchema, req.body);
      completeOnboarding(user.id, body.survey, body.balance, body.stress_level);
      logger.info({ userId: user.id }, 'Onboarding completed');
      res.json({ user: currentUser(req) });
    }),
  );

  app.get(
    '/api/survey',
    authMiddleware,
    route((req, res) => {
      res.json({ survey: currentUser(req).survey });
    }),
  );

  app.put(
    '/api/survey',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      const update = parseBody(surveySchema, req.body);
      const survey = { ...user.survey, ...update };
      saveSurvey(user.id, survey);
      res.json({ survey });
    }),
  );

  // --- Money ---

  app.get(
    '/api/balance',
    authMiddleware,
    route((req, res) => {
      res.json({ balance: currentUser(req).balance });
    }),
  );

  app.post(
    '/api/income',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      const { amount, source } = parseBody(incomeSchema, req.body);
      res.json({ balance: addIncome(user.id, amount, source) });
    }),
  );

  app.post(
    ['/api/purchase', '/api/purchase/execute'],
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      const { item_name, amount } = parseBody(purchaseSchema, req.body);
      res.json(evaluatePurchase(user.id, amount, item_name));
    }),
  );

  app.post(
    '/api/purchase/evaluate',
    authMiddleware,
    route(async (req, res) => {
      const user = currentUser(req);
      const { item_name, amount } = parseBody(purchaseSchema, req.body);
      const reviewer = { ...user, survey: profileFor(user) };
      res.json(await reviewPurchase(ai.sessions, reviewer, item_name, amount));
    }),
  );

  app.get(
    '/api/history',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      res.json({ transactions: getTransactions(user.id, historyLimit(req.query.limit)) });
    }),
  );

  // --- Stress ---

  app.put(
    '/api/stress',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      const { stress_level } = parseBody(stressSchema, req.body);
      const entry = recordStressLevel(user.id, stress_level);
      res.json({ stress_level, log: entry });
    }),
  );

  app.get(
    '/api/stress/history',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      res.json({ logs: getStressLogs(user.id, historyLimit(req.query.limit)) });
    }),
  );

  // --- AI ---

  app.post(
    '/api/ai/reset',
    authMiddleware,
    route((req, res) => {
      const user = currentUser(req);
      const { topic } = parseBody(resetSchema, req.body);
      const scope: ResetScope =
        options.resetScope === 'global'
          ? { kind: 'global' }
          : { kind: 'user', userId: user.id, topic };
      res.json({ success: true, scope: scope.kind, cleared: ai.sessions.reset(scope) });
    }),
  );

  app.get(
    '/api/ai/insight',
    authMiddleware,
    route(async (req, res) => {
      res.json({ insight: await ai.insights.forUser(currentUser(req)) });
    }),
  );

  app.post(
    '/api/ai/:topic/chat',
    authMiddleware,
    route(async (req, res) => {
      const user = currentUser(req);
      const topic = topicParam(req);
      const { message } = parseBody(chatSchema, req.body);
      const outbound = options.redactPii ? redactPii(message) : message;
      const reply = await ai.sessions.chat(user.id, topic, outbound, profileFor(user));
      res.json({ reply });
    }),
  );

  app.get(
    '/api/ai/:topic/brief',
    authMiddleware,
    route(async (req, res) => {
      const user = currentUser(req);
      const topic = topicParam(req);
      const force = req.query.force === 'true' || req.query.force === '1';
      res.json(await ai.briefs.generate(user.id, topic, profileFor(user), force));
    }),
  );

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      return res.status(err.status).json({ error: err.message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body' });
    }
    logger.error({ err, path: req.path }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startWebServer(port: number, options: AppOptions): http.Server {
  const server = http.createServer(createApp(options));

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error({ port }, `Port ${port} already in use, stop the old process or change WEB_PORT`);
      process.exit(1);
    }
    throw err;
  });

  server.listen(port, '0.0.0.0', () => {
    logger.info({ port }, 'Web server started');
  });

  return server;
}
