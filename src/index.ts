#!/usr/bin/env node

import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadAgentConfig } from './config.js';
import { runApplications } from './agent.js';
import { MemoryStore, effectiveConfidence } from './services/memory-store.js';
import { checkOllamaAvailable } from './services/providers.js';
import { portalDomain } from './services/execution-engine.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('apply-agent')
  .description('AI-assisted job application agent that learns each portal it applies on')
  .version('1.0.0');

program
  .command('apply', { isDefault: true })
  .description('Apply to a job posting')
  .argument('<job_url>', 'Job application URL')
  .argument('[config_path]', 'Path to the JSON config file', DEFAULT_CONFIG_PATH)
  .option('--headless', 'Run browser in headless mode', false)
  .option('--debug', 'Verbose logging', false)
  .action(apply);

program
  .command('memory')
  .description('Show what the agent has learned per portal')
  .argument('[config_path]', 'Path to the JSON config file', DEFAULT_CONFIG_PATH)
  .action(showMemory);

async function apply(jobUrl: string, configPath: string, options: { headless: boolean; debug: boolean }): Promise<void> {
  try {
    portalDomain(jobUrl);
    const loaded = loadAgentConfig(configPath);
    const config = {
      ...loaded,
      debug: options.debug || loaded.debug,
      browser: { ...loaded.browser, headless: options.headless || loaded.browser.headless },
    };
    if (config.debug) {
      logger.setLevel('debug');
    }
    if (config.ai.provider === 'ollama') {
      await checkOllamaAvailable(config.ai.baseUrl);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted, cancelling the attempt...');
      controller.abort();
    });

    const [outcome] = await runApplications(config, [jobUrl], { signal: controller.signal });
    if (outcome?.success) {
      logger.success('Application submitted');
      process.exitCode = 0;
    } else {
      if (outcome?.diagnostic) {
        logger.error(`Failed in ${outcome.diagnostic.state} (${outcome.diagnostic.errorKind}): ${outcome.diagnostic.message}`);
      }
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
}

function showMemory(configPath: string): void {
  try {
    const config = loadAgentConfig(configPath);
    const snapshot = MemoryStore.open(config.memoryFile).snapshot();
    const domains = Object.keys(snapshot).sort();
    if (domains.length === 0) {
      logger.info('No portals learned yet');
      return;
    }

    for (const domain of domains) {
      const entry = snapshot[domain];
      logger.divider(domain);
      logger.info(
        `${entry.successfulPatterns.length} success(es), ${entry.failedPatterns.length} failure(s), ` +
          `boost ${entry.confidenceBoost.toFixed(2)}`
      );
      for (const mapping of Object.values(entry.fieldMappings)) {
        logger.mapping(mapping.labelKey, mapping.attribute, effectiveConfidence(mapping, entry.confidenceBoost), mapping.source);
      }
      const lastFailure = entry.failedPatterns[entry.failedPatterns.length - 1];
      if (lastFailure) {
        logger.warn(`Last failure: ${lastFailure.state} ${lastFailure.errorKind} - ${lastFailure.message}`);
      }
    }
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
}

program.parseAsync().catch((error) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
