import express from 'express';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { AttemptRunner } from '../agent.js';
import { portalDomain } from '../services/execution-engine.js';
import type { AttemptOutcome } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type WorkerAttemptStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

type Listener = { send: (event: string, data: string) => void; end: () => void };

type WorkerAttempt = {
  id: string;
  jobUrl: string;
  status: WorkerAttemptStatus;
  logs: string[];
  listeners: Set<Listener>;
  controller: AbortController;
  outcome?: AttemptOutcome;
  error?: string;
};

const startSchema = z.object({
  jobUrl: z
    .string({ required_error: 'jobUrl is required.' })
    .url('jobUrl must be an absolute URL.')
    .refine((value) => /^https?:/i.test(value), 'jobUrl must use http or https.'),
});

const TERMINAL: ReadonlySet<WorkerAttemptStatus> = new Set(['succeeded', 'failed', 'cancelled']);

export type WorkerOptions = {
  /** Attempts waiting behind the running one before new requests get 429. */
  maxQueued?: number;
  /** Finished attempts kept for status and stream requests; older ones are dropped. */
  maxFinished?: number;
};

/**
 * HTTP front for the agent. Attempts are queued and run one at a time; each
 * attempt's log lines are kept and streamed over SSE.
 */
export function createWorkerApp(runner: AttemptRunner, options: WorkerOptions = {}): express.Express {
  const maxQueued = options.maxQueued ?? 20;
  const maxFinished = options.maxFinished ?? 100;
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  const attempts = new Map<string, WorkerAttempt>();
  const queue: WorkerAttempt[] = [];
  const finished: string[] = [];
  let draining = false;

  function pushLog(attempt: WorkerAttempt, line: string): void {
    attempt.logs.push(line);
    for (const listener of attempt.listeners) {
      listener.send('log', line);
    }
  }

  function setStatus(attempt: WorkerAttempt, status: WorkerAttemptStatus): void {
    attempt.status = status;
    for (const listener of attempt.listeners) {
      listener.send('status', status);
      if (TERMINAL.has(status)) {
        listener.end();
      }
    }
    if (TERMINAL.has(status)) {
      finished.push(attempt.id);
      while (finished.length > maxFinished) {
        const evicted = finished.shift();
        if (evicted) attempts.delete(evicted);
      }
    }
  }

  async function execute(attempt: WorkerAttempt): Promise<void> {
    const sink = (entry: { message: string }) => pushLog(attempt, entry.message);
    logger.addLogSink(attempt.id, sink);
    setStatus(attempt, 'running');

    try {
      const outcome = await runner(attempt.jobUrl, { signal: attempt.controller.signal, attemptId: attempt.id });
      attempt.outcome = outcome;
      if (outcome.success) {
        pushLog(attempt, 'Application submitted.');
        setStatus(attempt, 'succeeded');
      } else {
        const diagnostic = outcome.diagnostic;
        pushLog(attempt, diagnostic ? `Attempt failed in ${diagnostic.state}: ${diagnostic.message}` : 'Attempt failed.');
        setStatus(attempt, diagnostic?.errorKind === 'AttemptCancelled' ? 'cancelled' : 'failed');
      }
    } catch (error) {
      attempt.error = errorMessage(error);
      pushLog(attempt, `Attempt crashed: ${attempt.error}`);
      setStatus(attempt, attempt.controller.signal.aborted ? 'cancelled' : 'failed');
    } finally {
      logger.removeLogSink(attempt.id, sink);
    }
  }

  async function drain(): Promise<void> {
    if (draining) return;
    draining = true;
    try {
      let next = queue.shift();
      while (next) {
        if (next.status === 'queued') {
          await execute(next);
        }
        next = queue.shift();
      }
    } finally {
      draining = false;
    }
  }

  app.get('/health', (_req, res) => {
    res.json({ ok: true, queued: queue.length });
  });

  app.post('/applications', (req, res) => {
    const parsed = startSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request.' });
    }
    const { jobUrl } = parsed.data;
    try {
      portalDomain(jobUrl);
    } catch (error) {
      return res.status(400).json({ error: errorMessage(error) });
    }

    if (queue.length >= maxQueued) {
      return res.status(429).json({ error: `Worker queue is full (${maxQueued} waiting).` });
    }

    const attempt: WorkerAttempt = {
      id: randomUUID(),
      jobUrl,
      status: 'queued',
      logs: [],
      listeners: new Set(),
      controller: new AbortController(),
    };
    attempts.set(attempt.id, attempt);
    queue.push(attempt);
    pushLog(attempt, `Queued ${jobUrl}`);

    drain().catch((error) => {
      logger.error(`Worker queue stopped: ${errorMessage(error)}`);
    });

    return res.status(202).json({ attemptId: attempt.id });
  });

  app.get('/applications/:id', (req, res) => {
    const attempt = attempts.get(req.params.id);
    if (!attempt) {
      return res.status(404).json({ error: 'Attempt not found.' });
    }
    return res.json({
      attemptId: attempt.id,
      jobUrl: attempt.jobUrl,
      status: attempt.status,
      state: attempt.outcome?.attempt.state,
      retryCount: attempt.outcome?.attempt.retryCount,
      diagnostic: attempt.outcome?.diagnostic,
      error: attempt.error,
    });
  });

  app.get('/applications/:id/stream', (req, res) => {
    const attempt = attempts.get(req.params.id);
    if (!attempt) {
      return res.status(404).end();
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');

    const send = (event: string, data: string) => {
      res.write(`event: ${event}\n`);
      res.write(`data: ${data.replace(/\n/g, '\\n')}\n\n`);
    };

    for (const line of attempt.logs) {
      send('log', line);
    }
    send('status', attempt.status);

    if (TERMINAL.has(attempt.status)) {
      return res.end();
    }

    let ended = false;
    const listener: Listener = {
      send,
      end: () => {
        if (ended) return;
        ended = true;
        attempt.listeners.delete(listener);
        res.end();
      },
    };
    attempt.listeners.add(listener);

    req.on('close', () => {
      if (!ended) {
        attempt.listeners.delete(listener);
      }
    });
  });

  app.post('/applications/:id/end', (req, res) => {
    const attempt = attempts.get(req.params.id);
    if (!attempt) {
      return res.status(404).json({ error: 'Attempt not found.' });
    }
    if (TERMINAL.has(attempt.status)) {
      return res.status(409).json({ error: `Attempt is ${attempt.status}.` });
    }

    attempt.controller.abort();
    pushLog(attempt, 'Cancellation requested.');
    if (attempt.status === 'queued') {
      setStatus(attempt, 'cancelled');
    }
    return res.status(202).json({ ok: true });
  });

  return app;
}
