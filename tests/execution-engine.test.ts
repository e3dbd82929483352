import { describe, expect, it } from 'vitest';
import { ExecutionEngine, portalDomain, retryDelay } from '../src/services/execution-engine.js';
import type { Sleep } from '../src/services/execution-engine.js';
import { MemoryStore } from '../src/services/memory-store.js';
import type { EngineConfig, Profile } from '../src/types/index.js';
import { AIProviderError, BrowserTimeout, FieldDetectionFailure, UploadFailure } from '../src/utils/errors.js';
import {
  FakeAI,
  FakeBrowser,
  InMemoryPersistence,
  always,
  button,
  control,
  testEngineConfig,
} from './helpers/fakes.js';

const JOB_URL = 'https://jobs.acme.test/apply/1';
const THANKS_URL = 'https://jobs.acme.test/apply/1/thanks';

const profile: Profile = Object.freeze({
  email: 'ada@example.com',
  first_name: 'Ada',
  resume_path: '/tmp/resume.pdf',
});

function recordingSleep(): { sleep: Sleep; waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms) => {
      waits.push(ms);
    },
  };
}

function acmeBrowser(): FakeBrowser {
  const browser = new FakeBrowser({
    [JOB_URL]: {
      controls: [
        control('#email', 'Work Email', { type: 'email', required: true }),
        control('#resume', 'Resume (PDF)', { type: 'file', required: true, visible: false }),
      ],
      buttons: [button('#submit', 'Submit application', 'submit')],
    },
    [THANKS_URL]: { text: 'Thanks for applying' },
  });
  browser.clickHandlers.set('#submit', (current) => {
    current.url = THANKS_URL;
  });
  return browser;
}

function engineFor(
  browser: FakeBrowser,
  ai: FakeAI,
  memory: MemoryStore,
  overrides: { profile?: Profile; config?: Partial<EngineConfig>; sleep?: Sleep } = {}
): ExecutionEngine {
  return new ExecutionEngine({
    browser,
    ai,
    memory,
    profile: overrides.profile ?? profile,
    config: { ...testEngineConfig, ...overrides.config },
    sleep: overrides.sleep ?? recordingSleep().sleep,
    artifactsDir: '/tmp/artifacts',
  });
}

describe('portalDomain', () => {
  it('uses the lower-case host without www', () => {
    expect(portalDomain('https://www.Example.com/jobs/1?ref=x')).toBe('example.com');
  });

  it('rejects non-http URLs', () => {
    expect(() => portalDomain('ftp://example.com/file')).toThrow(RangeError);
    expect(() => portalDomain('not a url')).toThrow('Invalid job URL: not a url');
  });
});

describe('retryDelay', () => {
  it('grows by the backoff factor up to the cap', () => {
    const config = { ...testEngineConfig, retryDelayMs: 5000, backoffFactor: 2, maxRetryDelayMs: 30000 };
    expect([0, 1, 2, 3].map((count) => retryDelay(config, count))).toEqual([5000, 10000, 20000, 30000]);
  });
});

describe('ExecutionEngine', () => {
  it('learns an AI mapping on the first attempt and skips the AI on the second', async () => {
    const persistence = new InMemoryPersistence();
    const ai = new FakeAI({ field_match: always({ attribute: 'email', confidence: 0.9 }) });

    const first = await engineFor(acmeBrowser(), ai, new MemoryStore(persistence)).run(JOB_URL, { attemptId: 'a1' });

    expect(first.success).toBe(true);
    expect(first.attempt.state).toBe('DONE');
    expect(first.attempt.transitions).toEqual(['INIT', 'ANALYZE', 'MAP', 'FILL', 'UPLOAD', 'SUBMIT', 'DONE']);
    expect(ai.asked('field_match')).toBe(1);

    const stored = new MemoryStore(persistence).load('jobs.acme.test');
    expect(stored?.fieldMappings).toEqual([
      { labelKey: 'work email', attribute: 'email', confidence: 0.9, source: 'ai' },
      { labelKey: 'resume pdf', attribute: 'resume_path', confidence: 0.95, source: 'heuristic' },
    ]);
    expect(stored?.steps).toEqual([
      { action: 'navigate' },
      { action: 'fill', label: 'work email', attribute: 'email' },
      { action: 'upload', label: 'resume pdf', attribute: 'resume_path' },
      { action: 'click-submit' },
    ]);

    const secondAI = new FakeAI();
    const browser = acmeBrowser();
    const second = await engineFor(browser, secondAI, new MemoryStore(persistence)).run(JOB_URL);

    expect(second.success).toBe(true);
    expect(secondAI.questions).toEqual([]);
    expect(browser.callsOf('type')).toEqual(['type #email=ada@example.com']);
    expect(browser.callsOf('upload')).toEqual(['upload #resume=/tmp/resume.pdf']);

    const memory = new MemoryStore(persistence).snapshot()['jobs.acme.test'];
    expect(memory.successfulPatterns).toHaveLength(2);
    expect(memory.fieldMappings['work email'].confidence).toBe(0.9);
    expect(memory.confidenceBoost).toBeCloseTo(0.2);
  });

  it('retries a timing-out navigation exactly max_retries times, then fails and records it', async () => {
    const persistence = new InMemoryPersistence();
    const browser = acmeBrowser();
    browser.failures.set('navigate', () => new BrowserTimeout('Loading timed out'));
    const { sleep, waits } = recordingSleep();

    const outcome = await engineFor(browser, new FakeAI(), new MemoryStore(persistence), { sleep }).run(JOB_URL);

    expect(outcome.success).toBe(false);
    expect(outcome.attempt.retryCount).toBe(3);
    expect(outcome.attempt.transitions).toEqual([
      'INIT',
      'RETRYING',
      'INIT',
      'RETRYING',
      'INIT',
      'RETRYING',
      'INIT',
      'FAILED',
    ]);
    expect(waits).toEqual([100, 200, 400]);
    expect(outcome.attempt.errorHistory).toHaveLength(4);
    expect(outcome.diagnostic).toEqual({ state: 'INIT', errorKind: 'BrowserTimeout', message: 'Loading timed out' });

    const failures = new MemoryStore(persistence).snapshot()['jobs.acme.test'].failedPatterns;
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({
      state: 'INIT',
      errorKind: 'BrowserTimeout',
      message: 'Loading timed out',
      url: 'about:blank',
    });
  });

  it('never submits while a required field is unmapped and broadens the retry', async () => {
    const browser = new FakeBrowser({
      [JOB_URL]: {
        controls: [control('#colour', 'Favourite colour', { required: true })],
        buttons: [button('#submit', 'Submit', 'submit')],
        text: 'Tell us about yourself',
      },
    });
    const ai = new FakeAI({ field_match: always({ attribute: null, confidence: 0 }) });
    const persistence = new InMemoryPersistence();

    const outcome = await engineFor(browser, ai, new MemoryStore(persistence), { config: { maxRetries: 2 } }).run(
      JOB_URL
    );

    expect(outcome.success).toBe(false);
    expect(outcome.diagnostic).toEqual({
      state: 'MAP',
      errorKind: 'MappingUnresolved',
      message: 'No confident mapping for required field(s): Favourite colour',
    });
    expect(browser.callsOf('click')).toEqual([]);
    expect(ai.asked('field_match')).toBe(3);
    expect(ai.questions[0].context).not.toContain('Page text (excerpt):');
    expect(ai.questions[1].context).toContain('Page text (excerpt):\nTell us about yourself');
    expect(new MemoryStore(persistence).snapshot()['jobs.acme.test'].failedPatterns[0].state).toBe('MAP');
  });

  it('fails a cancelled attempt without writing memory', async () => {
    const persistence = new InMemoryPersistence();
    const memory = new MemoryStore(persistence);
    const controller = new AbortController();
    controller.abort();

    const outcome = await engineFor(acmeBrowser(), new FakeAI(), memory).run(JOB_URL, { signal: controller.signal });

    expect(outcome.success).toBe(false);
    expect(outcome.attempt.transitions).toEqual(['INIT', 'FAILED']);
    expect(outcome.diagnostic?.errorKind).toBe('AttemptCancelled');
    expect(persistence.writes).toBe(0);
    expect(memory.hasPendingWrites()).toBe(false);
  });

  it('stops waiting for a retry once cancelled', async () => {
    const persistence = new InMemoryPersistence();
    const browser = acmeBrowser();
    browser.failures.set('navigate', () => new BrowserTimeout('Loading timed out'));
    const controller = new AbortController();
    const sleep: Sleep = async () => {
      controller.abort();
      throw new Error('The operation was aborted');
    };

    const outcome = await engineFor(browser, new FakeAI(), new MemoryStore(persistence), { sleep }).run(JOB_URL, {
      signal: controller.signal,
    });

    expect(outcome.attempt.transitions).toEqual(['INIT', 'RETRYING', 'FAILED']);
    expect(outcome.attempt.retryCount).toBe(0);
    expect(outcome.diagnostic?.errorKind).toBe('AttemptCancelled');
    expect(persistence.writes).toBe(0);
  });

  it('signs in, returns to the job and opens the form', async () => {
    const jobUrl = 'https://careers.beta.test/jobs/7';
    const loginUrl = 'https://careers.beta.test/login';
    const formUrl = 'https://careers.beta.test/jobs/7/apply';
    const doneUrl = 'https://careers.beta.test/jobs/7/done';

    const browser = new FakeBrowser({
      [loginUrl]: {
        controls: [
          control('#login-email', 'Email', { type: 'email' }),
          control('#login-password', 'Password', { type: 'password' }),
        ],
        buttons: [button('#signin', 'Sign in', 'submit')],
      },
      'https://careers.beta.test/dashboard': { text: 'Welcome back' },
      [jobUrl]: { buttons: [button('#open', 'Apply now')] },
      [formUrl]: {
        controls: [
          control('#name', 'Full name', { required: true }),
          control('#terms', 'I agree to the terms', { type: 'checkbox', required: true, checked: false }),
        ],
        buttons: [button('#send', 'Submit', 'submit')],
      },
    });
    browser.redirects.set(jobUrl, loginUrl);
    browser.clickHandlers.set('#signin', (current) => {
      current.redirects.delete(jobUrl);
      current.url = 'https://careers.beta.test/dashboard';
    });
    browser.clickHandlers.set('#open', (current) => {
      current.url = formUrl;
    });
    browser.clickHandlers.set('#send', (current) => {
      current.url = doneUrl;
    });

    const ai = new FakeAI({ page_classification: always({ pageType: 'login', confidence: 0.9 }) });
    const persistence = new InMemoryPersistence();
    const applicant: Profile = Object.freeze({
      email: 'ada@example.com',
      password: 'test-password',
      full_name: 'Ada Lovelace',
    });

    const outcome = await engineFor(browser, ai, new MemoryStore(persistence), { profile: applicant }).run(jobUrl);

    expect(outcome.success).toBe(true);
    expect(outcome.attempt.transitions).toEqual(['INIT', 'AUTH', 'ANALYZE', 'MAP', 'FILL', 'UPLOAD', 'SUBMIT', 'DONE']);
    expect(browser.calls).toEqual([
      `navigate ${jobUrl}`,
      'type #login-email=ada@example.com',
      'type #login-password=test-password',
      'click #signin',
      `navigate ${jobUrl}`,
      'click #open',
      'type #name=Ada Lovelace',
      'click #terms',
      'click #send',
    ]);
    expect(ai.questions.map((entry) => entry.shape)).toEqual(['page_classification']);
    expect(new MemoryStore(persistence).load('careers.beta.test')?.steps).toEqual([
      { action: 'navigate' },
      { action: 'fill', label: 'email', attribute: 'email' },
      { action: 'fill', label: 'password', attribute: 'password' },
      { action: 'authenticate' },
      { action: 'navigate' },
      { action: 'open-form' },
      { action: 'fill', label: 'full name', attribute: 'full_name' },
      { action: 'click-submit' },
    ]);
  });

  it('fails authentication when the password field is still shown', async () => {
    const loginUrl = 'https://careers.gamma.test/login';
    const browser = new FakeBrowser({
      [loginUrl]: {
        controls: [control('#user', 'Email', { type: 'email' }), control('#pw', 'Password', { type: 'password' })],
        buttons: [button('#signin', 'Log in', 'submit')],
      },
    });
    const ai = new FakeAI({ page_classification: always({ pageType: 'login', confidence: 0.8 }) });
    const applicant: Profile = Object.freeze({ email: 'ada@example.com', password: 'test-password' });

    const outcome = await engineFor(browser, ai, new MemoryStore(new InMemoryPersistence()), {
      profile: applicant,
      config: { maxRetries: 1 },
    }).run(loginUrl);

    expect(outcome.success).toBe(false);
    expect(outcome.attempt.transitions).toEqual(['INIT', 'AUTH', 'RETRYING', 'AUTH', 'FAILED']);
    expect(outcome.diagnostic).toEqual({
      state: 'AUTH',
      errorKind: 'AuthenticationFailure',
      message: `Still on the sign-in page after submitting credentials (${loginUrl})`,
    });
  });

  it('asks the AI to confirm a submission when the URL does not change', async () => {
    const browser = new FakeBrowser({
      [JOB_URL]: {
        controls: [control('#email', 'Email', { type: 'email', required: true })],
        buttons: [button('#submit', 'Send application', 'submit')],
        text: 'Your application has been received',
      },
    });
    const ai = new FakeAI({ submission_check: always({ submitted: true, confidence: 0.8 }) });

    const outcome = await engineFor(browser, ai, new MemoryStore(new InMemoryPersistence())).run(JOB_URL);

    expect(outcome.success).toBe(true);
    expect(ai.questions.map((entry) => entry.shape)).toEqual(['submission_check']);
    expect(ai.questions[0].context).toBe(`URL: ${JOB_URL}\n\nPage text:\nYour application has been received`);
  });

  it('retries a transient AI error and then succeeds', async () => {
    const ai = new FakeAI({
      field_match: (_context, _question, call) => {
        if (call === 0) throw new AIProviderError('openai request timed out after 30000ms');
        return { attribute: 'email', confidence: 0.9 };
      },
    });
    const { sleep, waits } = recordingSleep();

    const outcome = await engineFor(acmeBrowser(), ai, new MemoryStore(new InMemoryPersistence()), { sleep }).run(
      JOB_URL
    );

    expect(outcome.success).toBe(true);
    expect(outcome.attempt.retryCount).toBe(1);
    expect(outcome.attempt.errorHistory.map((entry) => [entry.state, entry.kind])).toEqual([
      ['MAP', 'AIProviderError'],
    ]);
    expect(waits).toEqual([100]);
  });

  it('fails at once on an error outside the taxonomy', async () => {
    const browser = acmeBrowser();
    browser.failures.set('type', () => new Error('Target closed'));
    const ai = new FakeAI({ field_match: always({ attribute: 'email', confidence: 0.9 }) });
    const persistence = new InMemoryPersistence();

    const outcome = await engineFor(browser, ai, new MemoryStore(persistence)).run(JOB_URL);

    expect(outcome.attempt.retryCount).toBe(0);
    expect(outcome.diagnostic).toEqual({ state: 'FILL', errorKind: 'UnexpectedError', message: 'Target closed' });
    expect(new MemoryStore(persistence).snapshot()['jobs.acme.test'].failedPatterns).toHaveLength(1);
  });

  it('captures artifacts on failure when enabled', async () => {
    const browser = acmeBrowser();
    browser.failures.set('navigate', () => new BrowserTimeout('Loading timed out'));

    await engineFor(browser, new FakeAI(), new MemoryStore(new InMemoryPersistence()), {
      config: { maxRetries: 0, saveScreenshots: true },
    }).run(JOB_URL, { attemptId: 'a9' });

    expect(browser.callsOf('capture')).toEqual(['capture /tmp/artifacts/jobs.acme.test-a9']);
  });

  it('re-reads field values before a retried fill so ticked boxes stay ticked', async () => {
    const browser = new FakeBrowser({
      [JOB_URL]: {
        controls: [
          control('#relocate', 'Relocate', { type: 'checkbox', checked: false }),
          control('#email', 'Email', { type: 'email', required: true }),
          control('#terms', 'I agree to the terms', { type: 'checkbox', required: true, checked: false }),
        ],
        buttons: [button('#submit', 'Submit', 'submit')],
      },
      [THANKS_URL]: { text: 'Thanks' },
    });
    browser.clickHandlers.set('#submit', (current) => {
      current.url = THANKS_URL;
    });
    browser.failures.set('type', () => {
      browser.failures.delete('type');
      return new BrowserTimeout('Typing into #email timed out');
    });
    const applicant: Profile = Object.freeze({ email: 'ada@example.com', relocate: 'yes' });

    const outcome = await engineFor(browser, new FakeAI(), new MemoryStore(new InMemoryPersistence()), {
      profile: applicant,
    }).run(JOB_URL);

    expect(outcome.success).toBe(true);
    expect(outcome.attempt.transitions).toEqual([
      'INIT',
      'ANALYZE',
      'MAP',
      'FILL',
      'RETRYING',
      'FILL',
      'UPLOAD',
      'SUBMIT',
      'DONE',
    ]);
    expect(browser.calls).toEqual([
      `navigate ${JOB_URL}`,
      'click #relocate',
      'type #email=ada@example.com',
      'type #email=ada@example.com',
      'click #terms',
      'click #submit',
    ]);
    expect(browser.pages[JOB_URL].controls?.[0].checked).toBe(true);
    expect(browser.navigatingClicks).toEqual(['#submit']);
  });

  it('retries a failed upload', async () => {
    const browser = acmeBrowser();
    browser.failures.set('upload', () => {
      browser.failures.delete('upload');
      return new UploadFailure('Uploading to #resume timed out');
    });
    const ai = new FakeAI({ field_match: always({ attribute: 'email', confidence: 0.9 }) });

    const outcome = await engineFor(browser, ai, new MemoryStore(new InMemoryPersistence())).run(JOB_URL);

    expect(outcome.success).toBe(true);
    expect(outcome.attempt.transitions).toEqual([
      'INIT',
      'ANALYZE',
      'MAP',
      'FILL',
      'UPLOAD',
      'RETRYING',
      'UPLOAD',
      'SUBMIT',
      'DONE',
    ]);
    expect(outcome.attempt.errorHistory.map((entry) => [entry.state, entry.kind])).toEqual([['UPLOAD', 'UploadFailure']]);
    expect(browser.callsOf('upload')).toEqual(['upload #resume=/tmp/resume.pdf', 'upload #resume=/tmp/resume.pdf']);
  });

  it('fails field detection when the page has no fields and no way to open the form', async () => {
    const browser = new FakeBrowser({ [JOB_URL]: { buttons: [button('#save', 'Save job')] } });

    const outcome = await engineFor(browser, new FakeAI(), new MemoryStore(new InMemoryPersistence()), {
      config: { maxRetries: 1 },
    }).run(JOB_URL);

    expect(outcome.attempt.transitions).toEqual(['INIT', 'ANALYZE', 'RETRYING', 'ANALYZE', 'FAILED']);
    expect(outcome.diagnostic).toEqual({
      state: 'ANALYZE',
      errorKind: 'FieldDetectionFailure',
      message: `No form fields found on ${JOB_URL}`,
    });
    expect(browser.callsOf('click')).toEqual([]);
  });

  it('leaves an optional select alone when no option fits the profile value', async () => {
    const browser = new FakeBrowser({
      [JOB_URL]: {
        controls: [
          control('#email', 'Email', { type: 'email', required: true }),
          control('#country', 'Country', { tag: 'select', options: ['United States'] }),
        ],
        buttons: [button('#submit', 'Submit', 'submit')],
      },
      [THANKS_URL]: { text: 'Thanks' },
    });
    browser.clickHandlers.set('#submit', (current) => {
      current.url = THANKS_URL;
    });
    const ai = new FakeAI();
    const applicant: Profile = Object.freeze({ email: 'ada@example.com', country: 'USA' });

    const outcome = await engineFor(browser, ai, new MemoryStore(new InMemoryPersistence()), { profile: applicant }).run(
      JOB_URL
    );

    expect(outcome.success).toBe(true);
    expect(outcome.attempt.transitions).toEqual(['INIT', 'ANALYZE', 'MAP', 'FILL', 'UPLOAD', 'SUBMIT', 'DONE']);
    expect(browser.callsOf('select')).toEqual([]);
    expect(ai.questions).toEqual([]);
  });

  it('skips an optional select the browser cannot set instead of failing the attempt', async () => {
    const browser = new FakeBrowser({
      [JOB_URL]: {
        controls: [
          control('#email', 'Email', { type: 'email', required: true }),
          control('#country', 'Country', { tag: 'select', options: ['USA', 'Canada'] }),
        ],
        buttons: [button('#submit', 'Submit', 'submit')],
      },
      [THANKS_URL]: { text: 'Thanks' },
    });
    browser.clickHandlers.set('#submit', (current) => {
      current.url = THANKS_URL;
    });
    browser.failures.set('select', () => new FieldDetectionFailure('No option of #country matches "USA"'));
    const persistence = new InMemoryPersistence();
    const applicant: Profile = Object.freeze({ email: 'ada@example.com', country: 'USA' });

    const outcome = await engineFor(browser, new FakeAI(), new MemoryStore(persistence), { profile: applicant }).run(
      JOB_URL
    );

    expect(outcome.success).toBe(true);
    expect(outcome.attempt.retryCount).toBe(0);
    expect(browser.callsOf('select')).toEqual(['select #country=USA']);
    expect(new MemoryStore(persistence).load('jobs.acme.test')?.steps).toEqual([
      { action: 'navigate' },
      { action: 'fill', label: 'email', attribute: 'email' },
      { action: 'click-submit' },
    ]);
  });
});
