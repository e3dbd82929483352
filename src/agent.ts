import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { AgentConfig, AttemptOutcome } from './types/index.js';
import { logger } from './utils/logger.js';
import type { LogSink } from './utils/logger.js';
import { humanBreakBetweenApplications } from './utils/human.js';
import { ProviderAICapability } from './services/ai.js';
import { createCompletionProvider } from './services/providers.js';
import { PlaywrightBrowser } from './services/browser.js';
import { MemoryStore } from './services/memory-store.js';
import { ExecutionEngine } from './services/execution-engine.js';
import { enrichProfileFromResume } from './services/resume-parser.js';

export type AttemptRunOptions = {
  signal?: AbortSignal;
  attemptId?: string;
};

/** Runs one job URL to a terminal outcome. */
export type AttemptRunner = (jobUrl: string, options: AttemptRunOptions) => Promise<AttemptOutcome>;

export type AgentSession = {
  engine: ExecutionEngine;
  memory: MemoryStore;
  close: () => Promise<void>;
};

export async function createAgentSession(config: AgentConfig): Promise<AgentSession> {
  const { profile, resumeText } = await enrichProfileFromResume(config.profile);
  const ai = new ProviderAICapability(createCompletionProvider(config.ai), config.ai.timeoutMs);
  const memory = MemoryStore.open(config.memoryFile);
  const browser = await PlaywrightBrowser.launch(config.browser);

  const engine = new ExecutionEngine({
    browser,
    ai,
    memory,
    profile,
    config: config.engine,
    artifactsDir: config.artifactsDir,
    resumeText,
  });

  return {
    engine,
    memory,
    close: () => browser.close(),
  };
}

/** Appends every log line of one attempt to `file`. */
export function createFileLogSink(file: string): LogSink {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  return (entry) => {
    fs.appendFileSync(file, `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.message}\n`, 'utf8');
  };
}

export async function runAttempt(
  session: AgentSession,
  config: AgentConfig,
  jobUrl: string,
  options: AttemptRunOptions = {}
): Promise<AttemptOutcome> {
  const attemptId = options.attemptId ?? randomUUID();
  const fileSink = config.saveLogs ? createFileLogSink(path.join(config.logDir, `${attemptId}.log`)) : undefined;
  if (fileSink) {
    logger.addLogSink(attemptId, fileSink);
  }

  try {
    return await logger.withAttemptContext(attemptId, () =>
      session.engine.run(jobUrl, { signal: options.signal, attemptId })
    );
  } finally {
    if (fileSink) {
      logger.removeLogSink(attemptId, fileSink);
    }
  }
}

/** Opens a browser session per attempt; used by the worker. */
export function createAttemptRunner(config: AgentConfig): AttemptRunner {
  return async (jobUrl, options) => {
    const session = await createAgentSession(config);
    try {
      return await runAttempt(session, config, jobUrl, options);
    } finally {
      await session.close();
    }
  };
}

/**
 * Applies to each URL in turn on one browser session, pausing between
 * applications. Stops early once `signal` aborts.
 */
export async function runApplications(
  config: AgentConfig,
  jobUrls: string[],
  options: { signal?: AbortSignal } = {}
): Promise<AttemptOutcome[]> {
  logger.banner();
  logger.info(`AI provider: ${config.ai.provider} (${config.ai.model ?? 'default model'})`);
  logger.info(`Memory file: ${path.resolve(config.memoryFile)}`);

  const outcomes: AttemptOutcome[] = [];

  logger.divider('Browser Setup');
  const session = await createAgentSession(config);

  try {
    for (const [index, jobUrl] of jobUrls.entries()) {
      if (options.signal?.aborted) {
        logger.warn('Run cancelled, skipping remaining applications');
        break;
      }
      if (index > 0) {
        await humanBreakBetweenApplications();
      }

      logger.divider(`Application ${index + 1}/${jobUrls.length}`);
      outcomes.push(await runAttempt(session, config, jobUrl, options));
    }
  } finally {
    await session.close();
  }

  logger.summary({
    attempted: outcomes.length,
    applied: outcomes.filter((outcome) => outcome.success).length,
    failed: outcomes.filter((outcome) => !outcome.success).length,
    retries: outcomes.reduce((total, outcome) => total + outcome.attempt.retryCount, 0),
  });

  return outcomes;
}
