import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import type {
  ApplicationAttempt,
  AttemptOutcome,
  AttemptState,
  EngineConfig,
  FailureRecord,
  FieldMapping,
  FormField,
  MappedField,
  PageSnapshot,
  Profile,
  Strategy,
  StrategyStep,
} from '../types/index.js';
import {
  ApplyError,
  AttemptCancelled,
  AuthenticationFailure,
  FieldDetectionFailure,
  MappingUnresolved,
  SubmissionFailure,
  UploadFailure,
  errorMessage,
  toApplyError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AICapability } from './ai.js';
import { pageClassificationShape, submissionCheckShape } from './ai.js';
import type { BrowserCapability } from './browser.js';
import type { MappingResult } from './field-mapper.js';
import { FieldMapper } from './field-mapper.js';
import type { MemoryStore } from './memory-store.js';
import {
  PageInspector,
  describeSnapshot,
  findOpenFormControl,
  findSignInControl,
  findSubmitControl,
  isConsentField,
} from './page-inspector.js';

const LOGIN_ATTRIBUTES = ['email', 'username', 'password'];
const SIGNUP_ATTRIBUTES = [...LOGIN_ATTRIBUTES, 'first_name', 'last_name', 'full_name', 'phone'];
const TRUTHY = new Set(['true', 'yes', 'y', '1', 'on', 'checked']);

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface ExecutionEngineDeps {
  browser: BrowserCapability;
  ai: AICapability;
  memory: MemoryStore;
  profile: Profile;
  config: EngineConfig;
  /** Where failure screenshots go when `config.saveScreenshots` is set. */
  artifactsDir?: string;
  /** Plain resume text offered to the AI when mapping is broadened. */
  resumeText?: string;
  mapper?: FieldMapper;
  sleep?: Sleep;
}

export interface RunOptions {
  signal?: AbortSignal;
  attemptId?: string;
}

interface RunContext {
  attempt: ApplicationAttempt;
  signal?: AbortSignal;
  strategy?: Strategy;
  snapshot?: PageSnapshot;
  mapping?: MappingResult;
  authMode?: 'login' | 'signup';
  broaden: boolean;
  steps: Map<AttemptState, StrategyStep[]>;
  accepted: Map<string, FieldMapping>;
}

/** Portal key for a job URL: lower-case host without a leading `www.`. */
export function portalDomain(jobUrl: string): string {
  let url: URL;
  try {
    url = new URL(jobUrl);
  } catch {
    throw new RangeError(`Invalid job URL: ${jobUrl}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RangeError(`Job URL must use http or https: ${jobUrl}`);
  }
  return url.hostname.toLowerCase().replace(/^www\./, '');
}

export function retryDelay(config: EngineConfig, retryCount: number): number {
  return Math.min(config.retryDelayMs * config.backoffFactor ** retryCount, config.maxRetryDelayMs);
}

function isTruthy(value: string): boolean {
  return TRUTHY.has(value.trim().toLowerCase());
}

/**
 * Drives one application attempt through
 * INIT → AUTH → ANALYZE → MAP → FILL → UPLOAD → SUBMIT → DONE, retrying the
 * failed state on recoverable errors. The memory store is written only when
 * the attempt ends in DONE or FAILED, and never for a cancelled attempt.
 */
export class ExecutionEngine {
  private readonly inspector: PageInspector;
  private readonly mapper: FieldMapper;
  private readonly sleep: Sleep;

  constructor(private readonly deps: ExecutionEngineDeps) {
    this.inspector = new PageInspector(deps.browser);
    this.mapper = deps.mapper ?? new FieldMapper(deps.ai, deps.config.confidenceThreshold);
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(jobUrl: string, options: RunOptions = {}): Promise<AttemptOutcome> {
    const ctx: RunContext = {
      attempt: {
        attemptId: options.attemptId ?? randomUUID(),
        jobUrl,
        domain: portalDomain(jobUrl),
        state: 'INIT',
        retryCount: 0,
        errorHistory: [],
        transitions: ['INIT'],
      },
      signal: options.signal,
      broaden: false,
      steps: new Map(),
      accepted: new Map(),
    };
    const { attempt } = ctx;
    const { maxRetries } = this.deps.config;

    logger.attempt(jobUrl, 'applying');

    let failure: ApplyError | undefined;
    let failedState: AttemptState = 'INIT';

    while (attempt.state !== 'DONE' && attempt.state !== 'FAILED') {
      const state = attempt.state;
      try {
        if (ctx.signal?.aborted) throw new AttemptCancelled();
        this.transition(ctx, await this.runState(state, ctx));
        continue;
      } catch (error) {
        failure = ctx.signal?.aborted ? new AttemptCancelled() : toApplyError(error);
        failedState = state;
      }

      attempt.errorHistory.push({
        state,
        kind: failure.kind,
        message: failure.message,
        retryable: failure.recoverable,
        at: new Date().toISOString(),
      });
      logger.warn(`${state} failed (${failure.kind}): ${failure.message}`);

      if (!failure.recoverable || attempt.retryCount >= maxRetries) {
        this.transition(ctx, 'FAILED');
        break;
      }

      this.transition(ctx, 'RETRYING');
      const wait = retryDelay(this.deps.config, attempt.retryCount);
      logger.info(`Retry ${attempt.retryCount + 1}/${maxRetries} of ${state} in ${wait}ms`);
      try {
        await this.sleep(wait, ctx.signal);
      } catch (error) {
        if (!ctx.signal?.aborted) throw error;
        failure = new AttemptCancelled();
        attempt.errorHistory.push({
          state: 'RETRYING',
          kind: failure.kind,
          message: failure.message,
          retryable: false,
          at: new Date().toISOString(),
        });
        this.transition(ctx, 'FAILED');
        break;
      }
      attempt.retryCount += 1;
      this.transition(ctx, state);
    }

    if (attempt.state === 'DONE') {
      this.recordSuccess(ctx);
      logger.attempt(jobUrl, 'success');
      return { success: true, attempt: structuredClone(attempt) };
    }

    const finalError = failure ?? new ApplyError('UnexpectedError', 'Attempt ended without an error', false);
    if (finalError instanceof AttemptCancelled) {
      logger.attempt(jobUrl, 'cancelled');
    } else {
      await this.recordFailure(ctx, failedState, finalError);
      logger.attempt(jobUrl, 'failed');
    }

    return {
      success: false,
      attempt: structuredClone(attempt),
      diagnostic: { state: failedState, errorKind: finalError.kind, message: finalError.message },
    };
  }

  private transition(ctx: RunContext, to: AttemptState): void {
    logger.state(ctx.attempt.state, to);
    ctx.attempt.state = to;
    ctx.attempt.transitions.push(to);
  }

  private runState(state: AttemptState, ctx: RunContext): Promise<AttemptState> {
    switch (state) {
      case 'INIT':
        return this.init(ctx);
      case 'AUTH':
        return this.authenticate(ctx);
      case 'ANALYZE':
        return this.analyze(ctx);
      case 'MAP':
        return this.mapFields(ctx);
      case 'FILL':
        return this.fill(ctx);
      case 'UPLOAD':
        return this.upload(ctx);
      case 'SUBMIT':
        return this.submit(ctx);
      default:
        throw new ApplyError('UnexpectedError', `No handler for state ${state}`, false);
    }
  }

  private async init(ctx: RunContext): Promise<AttemptState> {
    const { attempt } = ctx;
    ctx.strategy = this.deps.memory.load(attempt.domain);
    attempt.strategyUsed = ctx.strategy;
    if (ctx.strategy) {
      logger.info(
        `Known portal ${attempt.domain}: ${ctx.strategy.fieldMappings.length} stored mapping(s), ` +
          `boost ${ctx.strategy.confidenceBoost.toFixed(2)}`
      );
    }

    await this.deps.browser.navigate(attempt.jobUrl);
    ctx.steps.set('INIT', [{ action: 'navigate' }]);

    const snapshot = await this.inspector.inspect();
    ctx.snapshot = snapshot;

    const authExpected =
      snapshot.hasPasswordField || (ctx.strategy?.steps.some((step) => step.action === 'authenticate') ?? false);
    if (!authExpected) return 'ANALYZE';

    const answer = await this.deps.ai.ask(
      describeSnapshot(snapshot),
      'Is this page a login form, an account sign-up form, a job application form, a submission confirmation or something else?',
      pageClassificationShape
    );
    if ((answer.pageType === 'login' || answer.pageType === 'signup') && answer.confidence >= this.threshold) {
      ctx.authMode = answer.pageType;
      return 'AUTH';
    }
    return 'ANALYZE';
  }

  private async authenticate(ctx: RunContext): Promise<AttemptState> {
    const { browser, profile } = this.deps;
    if (!profile.password) {
      throw new AuthenticationFailure('The portal asks for a login but the profile has no password');
    }

    const snapshot = await this.inspector.inspect();
    const result = await this.mapper.map(profile, snapshot.fields, ctx.strategy, {
      attributes: ctx.authMode === 'signup' ? SIGNUP_ATTRIBUTES : LOGIN_ATTRIBUTES,
    });
    if (!result.mapped.some(({ mapping }) => mapping.attribute === 'password')) {
      throw new AuthenticationFailure('No password field could be matched on the sign-in page');
    }

    const control = findSignInControl(snapshot.buttons);
    if (!control) {
      throw new AuthenticationFailure('No sign-in control found');
    }

    const steps: StrategyStep[] = [];
    await this.fillFields(result.mapped, steps);
    await this.tickConsent(snapshot.fields);
    await browser.click(control.selector, { expectNavigation: true });
    steps.push({ action: 'authenticate' });

    const after = await this.inspector.inspect();
    if (after.hasPasswordField) {
      throw new AuthenticationFailure(`Still on the sign-in page after submitting credentials (${after.url})`);
    }
    this.accept(ctx, result.mapped);

    if (after.url !== ctx.attempt.jobUrl) {
      await browser.navigate(ctx.attempt.jobUrl);
      steps.push({ action: 'navigate' });
    }
    ctx.steps.set('AUTH', steps);
    return 'ANALYZE';
  }

  private async analyze(ctx: RunContext): Promise<AttemptState> {
    let snapshot = await this.inspector.inspect();
    const steps: StrategyStep[] = [];

    if (snapshot.fields.length === 0) {
      const control = findOpenFormControl(snapshot.buttons);
      if (control) {
        logger.action(`Opening the application form via "${control.text}"`);
        await this.deps.browser.click(control.selector, { expectNavigation: true });
        steps.push({ action: 'open-form' });
        snapshot = await this.inspector.inspect();
      }
    }

    if (snapshot.fields.length === 0) {
      throw new FieldDetectionFailure(`No form fields found on ${snapshot.url}`);
    }

    logger.info(`Found ${snapshot.fields.length} form field(s)`);
    ctx.snapshot = snapshot;
    ctx.steps.set('ANALYZE', steps);
    return 'MAP';
  }

  private async mapFields(ctx: RunContext): Promise<AttemptState> {
    const snapshot = ctx.snapshot;
    if (!snapshot) {
      throw new FieldDetectionFailure('The form has not been inspected');
    }

    const broadened = ctx.broaden;
    const pageText = broadened ? await this.inspector.pageText() : undefined;
    const result = await this.mapper.map(this.deps.profile, snapshot.fields, ctx.strategy, {
      broadened,
      pageText,
      resumeText: this.deps.resumeText,
    });

    if (result.blocking.length > 0) {
      ctx.broaden = true;
      throw new MappingUnresolved(result.blocking.map((field) => field.label || field.selector));
    }

    ctx.mapping = result;
    this.accept(ctx, result.mapped);
    return 'FILL';
  }

  // Current values come from a fresh read, not the ANALYZE snapshot
  private async fill(ctx: RunContext): Promise<AttemptState> {
    const { mapping } = this.requireMapping(ctx);
    const current = await this.inspector.inspect();
    const bySelector = new Map(current.fields.map((field) => [field.selector, field]));
    const steps: StrategyStep[] = [];
    await this.fillFields(
      mapping.mapped
        .filter(({ field }) => field.kind !== 'file')
        .map(({ field, mapping: fieldMapping }) => ({ field: bySelector.get(field.selector) ?? field, mapping: fieldMapping })),
      steps
    );
    await this.tickConsent(current.fields);
    ctx.steps.set('FILL', steps);
    return 'UPLOAD';
  }

  private async upload(ctx: RunContext): Promise<AttemptState> {
    const { mapping } = this.requireMapping(ctx);
    const steps: StrategyStep[] = [];

    for (const { field, mapping: fieldMapping } of mapping.mapped) {
      if (field.kind !== 'file') continue;
      const filePath = this.deps.profile[fieldMapping.attribute];
      try {
        await this.deps.browser.upload(field.selector, filePath);
      } catch (error) {
        if (error instanceof ApplyError) throw error;
        throw new UploadFailure(`Could not upload ${fieldMapping.attribute} to "${field.label}": ${errorMessage(error)}`);
      }
      steps.push({ action: 'upload', label: fieldMapping.labelKey, attribute: fieldMapping.attribute });
    }

    ctx.steps.set('UPLOAD', steps);
    return 'SUBMIT';
  }

  private async submit(ctx: RunContext): Promise<AttemptState> {
    const { browser, ai } = this.deps;
    const snapshot = await this.inspector.inspect();
    const control = findSubmitControl(snapshot.buttons);
    if (!control) {
      throw new SubmissionFailure('No submit control found');
    }

    const before = await browser.currentUrl();
    logger.action(`Submitting via "${control.text || control.selector}"`);
    await browser.click(control.selector, { expectNavigation: true });
    ctx.steps.set('SUBMIT', [{ action: 'click-submit' }]);

    const after = await browser.currentUrl();
    if (after !== before) {
      logger.success(`Page moved to ${after} after submitting`);
      return 'DONE';
    }

    const text = await this.inspector.pageText();
    const answer = await ai.ask(
      `URL: ${after}\n\nPage text:\n${text}`,
      'Does this page confirm that the job application was submitted?',
      submissionCheckShape
    );
    if (answer.submitted && answer.confidence >= this.threshold) {
      logger.success('Submission confirmed by page content');
      return 'DONE';
    }
    throw new SubmissionFailure(
      answer.reason ? `No submission confirmation: ${answer.reason}` : 'No submission confirmation after submitting'
    );
  }

  private async fillFields(mapped: MappedField[], steps: StrategyStep[]): Promise<void> {
    for (const { field, mapping } of mapped) {
      const value = this.deps.profile[mapping.attribute];
      try {
        await this.setField(field, value);
      } catch (error) {
        if (!(error instanceof FieldDetectionFailure) || field.kind !== 'select' || field.required) throw error;
        logger.warn(`Skipping optional "${field.label}": ${error.message}`);
        continue;
      }
      steps.push({ action: 'fill', label: mapping.labelKey, attribute: mapping.attribute });
    }
  }

  private async setField(field: FormField, value: string): Promise<void> {
    const { browser } = this.deps;
    switch (field.kind) {
      case 'select':
        await browser.select(field.selector, value);
        return;
      case 'checkbox':
        if (isTruthy(value) !== (field.currentValue === 'true')) {
          await browser.click(field.selector);
        }
        return;
      default:
        if (field.currentValue === value) return;
        await browser.type(field.selector, value);
    }
  }

  private async tickConsent(fields: FormField[]): Promise<void> {
    for (const field of fields) {
      if (isConsentField(field) && field.currentValue !== 'true') {
        logger.action(`Ticking "${field.label}"`);
        await this.deps.browser.click(field.selector);
      }
    }
  }

  private requireMapping(ctx: RunContext): { mapping: MappingResult; snapshot: PageSnapshot } {
    if (!ctx.mapping || !ctx.snapshot) {
      throw new ApplyError('UnexpectedError', 'Fields were not mapped before filling', false);
    }
    return { mapping: ctx.mapping, snapshot: ctx.snapshot };
  }

  // Memory hits keep their stored confidence so the boost is not folded in twice
  private accept(ctx: RunContext, mapped: MappedField[]): void {
    const stored = new Map((ctx.strategy?.fieldMappings ?? []).map((mapping) => [mapping.labelKey, mapping]));
    for (const { mapping } of mapped) {
      const original = mapping.source === 'memory' ? stored.get(mapping.labelKey) : undefined;
      ctx.accepted.set(mapping.labelKey, original ? { ...original } : { ...mapping });
    }
  }

  private recordSuccess(ctx: RunContext): void {
    const { attempt } = ctx;
    const strategy: Strategy = {
      domain: attempt.domain,
      steps: [...ctx.steps.values()].flat(),
      fieldMappings: [...ctx.accepted.values()],
      confidenceBoost: ctx.strategy?.confidenceBoost ?? 0,
      recordedAt: new Date().toISOString(),
    };
    this.deps.memory.recordSuccess(attempt.domain, strategy);
    this.deps.memory.flush();
    attempt.strategyUsed = strategy;
  }

  private async recordFailure(ctx: RunContext, state: AttemptState, error: ApplyError): Promise<void> {
    const { attempt } = ctx;
    const record: FailureRecord = {
      recordedAt: new Date().toISOString(),
      state,
      errorKind: error.kind,
      message: error.message,
    };
    try {
      record.url = await this.deps.browser.currentUrl();
    } catch (urlError) {
      logger.debug(`Could not read the page URL for the failure record: ${errorMessage(urlError)}`);
    }
    this.deps.memory.recordFailure(attempt.domain, record);
    this.deps.memory.flush();

    if (this.deps.config.saveScreenshots && this.deps.artifactsDir) {
      try {
        const files = await this.deps.browser.captureArtifacts(this.deps.artifactsDir, `${attempt.domain}-${attempt.attemptId}`);
        logger.info(`Failure artifacts: ${files.join(', ')}`);
      } catch (captureError) {
        logger.warn(`Could not capture failure artifacts: ${errorMessage(captureError)}`);
      }
    }
  }

  private get threshold(): number {
    return this.deps.config.confidenceThreshold;
  }
}
