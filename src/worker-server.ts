import { createAttemptRunner } from './agent.js';
import { DEFAULT_CONFIG_PATH, loadAgentConfig } from './config.js';
import { logger } from './utils/logger.js';
import { createWorkerApp } from './worker/app.js';

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

const config = loadAgentConfig(process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH);
// The worker has no display to show a browser on
const app = createWorkerApp(createAttemptRunner({ ...config, browser: { ...config.browser, headless: true } }), {
  maxQueued: positiveInt(process.env.MAX_QUEUED_APPLICATIONS, 20),
  maxFinished: positiveInt(process.env.MAX_FINISHED_APPLICATIONS, 100),
});

const port = positiveInt(process.env.PORT, 8787);
app.listen(port, () => {
  logger.info(`Worker listening on :${port}`);
});
