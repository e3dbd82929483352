import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { DomainMemory, FailureRecord, FieldMapping, Strategy } from '../types/index.js';
import { LEARNING_CONFIG } from '../config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/** Key-value persistence for the serialized store. */
export interface MemoryPersistence {
  read(): string | undefined;
  write(contents: string): void;
  describe(): string;
}

export class FileMemoryPersistence implements MemoryPersistence {
  constructor(readonly filePath: string) {}

  read(): string | undefined {
    if (!fs.existsSync(this.filePath)) return undefined;
    return fs.readFileSync(this.filePath, 'utf8');
  }

  write(contents: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    // Rename over the old file so readers never see a half-written store
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, contents, 'utf8');
    fs.renameSync(tmpPath, this.filePath);
  }

  describe(): string {
    return this.filePath;
  }
}

const fieldMappingSchema = z.object({
  labelKey: z.string(),
  attribute: z.string(),
  confidence: z.number().min(0).max(1),
  source: z.enum(['memory', 'ai', 'heuristic']),
});

const strategySchema = z.object({
  domain: z.string(),
  steps: z.array(
    z.object({
      action: z.enum(['navigate', 'authenticate', 'open-form', 'fill', 'upload', 'click-submit']),
      label: z.string().optional(),
      attribute: z.string().optional(),
    })
  ),
  fieldMappings: z.array(fieldMappingSchema),
  confidenceBoost: z.number(),
  recordedAt: z.string(),
});

const failureSchema = z.object({
  recordedAt: z.string(),
  state: z.enum(['INIT', 'AUTH', 'ANALYZE', 'MAP', 'FILL', 'UPLOAD', 'SUBMIT', 'RETRYING', 'DONE', 'FAILED']),
  errorKind: z.enum([
    'AuthenticationFailure',
    'FieldDetectionFailure',
    'MappingUnresolved',
    'UploadFailure',
    'SubmissionFailure',
    'AIProviderError',
    'BrowserTimeout',
    'AttemptCancelled',
    'UnexpectedError',
  ]),
  message: z.string(),
  url: z.string().optional(),
});

const storeFileSchema = z.object({
  version: z.literal(1),
  domains: z.record(
    z.object({
      successfulPatterns: z.array(strategySchema),
      failedPatterns: z.array(failureSchema),
      fieldMappings: z.record(fieldMappingSchema),
      confidenceBoost: z.number(),
      updatedAt: z.string(),
    })
  ),
});

interface StoredDomain extends DomainMemory {
  updatedAt: string;
}

type StoreState = Record<string, StoredDomain>;

type MemoryOp =
  | { type: 'success'; domain: string; strategy: Strategy; at: string }
  | { type: 'failure'; domain: string; record: FailureRecord; at: string }
  | { type: 'mapping'; domain: string; labelKey: string; mapping: FieldMapping; at: string };

export type LearningConfig = typeof LEARNING_CONFIG;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Stored confidence adjusted by the domain's learned boost. */
export function effectiveConfidence(mapping: FieldMapping, boost: number): number {
  return clamp(mapping.confidence + boost, 0, 1);
}

function assertConfidence(mapping: FieldMapping): void {
  if (!Number.isFinite(mapping.confidence) || mapping.confidence < 0 || mapping.confidence > 1) {
    throw new RangeError(`Mapping confidence must be within [0, 1], got ${mapping.confidence} for "${mapping.labelKey}"`);
  }
}

function domainEntry(state: StoreState, domain: string, at: string): StoredDomain {
  let entry = state[domain];
  if (!entry) {
    entry = { successfulPatterns: [], failedPatterns: [], fieldMappings: {}, confidenceBoost: 0, updatedAt: at };
    state[domain] = entry;
  }
  return entry;
}

function applyOp(state: StoreState, op: MemoryOp, learning: LearningConfig): void {
  const entry = domainEntry(state, op.domain, op.at);
  entry.updatedAt = op.at;

  switch (op.type) {
    case 'success':
      entry.successfulPatterns.push(structuredClone(op.strategy));
      for (const mapping of op.strategy.fieldMappings) {
        entry.fieldMappings[mapping.labelKey] = { ...mapping };
      }
      entry.confidenceBoost = Math.min(learning.maxBoost, entry.confidenceBoost + learning.successBoost);
      break;
    case 'failure':
      entry.failedPatterns.push({ ...op.record });
      entry.confidenceBoost = Math.max(learning.minBoost, entry.confidenceBoost - learning.failurePenalty);
      break;
    case 'mapping':
      entry.fieldMappings[op.labelKey] = { ...op.mapping, labelKey: op.labelKey };
      break;
  }
}

/**
 * Per-portal knowledge base. Writes are journaled in memory and reach the
 * persistence layer only on `flush()`, which replays them over whatever is
 * persisted at that moment so separate instances sharing a file keep each
 * other's history.
 */
export class MemoryStore {
  private state: StoreState;
  private pending: MemoryOp[] = [];

  constructor(
    private readonly persistence: MemoryPersistence,
    private readonly learning: LearningConfig = LEARNING_CONFIG
  ) {
    this.state = this.readPersisted();
  }

  static open(filePath: string): MemoryStore {
    return new MemoryStore(new FileMemoryPersistence(path.resolve(filePath)));
  }

  load(domain: string): Strategy | undefined {
    const entry = this.state[domain];
    if (!entry) return undefined;

    const mappings = Object.values(entry.fieldMappings);
    const latest = entry.successfulPatterns[entry.successfulPatterns.length - 1];
    if (!latest && mappings.length === 0) return undefined;

    return {
      domain,
      steps: latest ? latest.steps.map((step) => ({ ...step })) : [],
      fieldMappings: mappings.map((mapping) => ({ ...mapping })),
      confidenceBoost: entry.confidenceBoost,
      recordedAt: latest ? latest.recordedAt : entry.updatedAt,
    };
  }

  recordSuccess(domain: string, strategy: Strategy): void {
    strategy.fieldMappings.forEach(assertConfidence);
    this.record({ type: 'success', domain, strategy: structuredClone(strategy), at: new Date().toISOString() });
  }

  recordFailure(domain: string, record: FailureRecord): void {
    this.record({ type: 'failure', domain, record: { ...record }, at: new Date().toISOString() });
  }

  upsertFieldMapping(domain: string, labelKey: string, mapping: FieldMapping): void {
    assertConfidence(mapping);
    this.record({ type: 'mapping', domain, labelKey, mapping: { ...mapping }, at: new Date().toISOString() });
  }

  hasPendingWrites(): boolean {
    return this.pending.length > 0;
  }

  /**
   * Writes pending records. Returns false when the write failed; the
   * records stay queued for the next flush.
   */
  flush(): boolean {
    if (this.pending.length === 0) return true;

    const merged = this.readPersisted();
    for (const op of this.pending) {
      applyOp(merged, op, this.learning);
    }

    try {
      this.persistence.write(JSON.stringify({ version: 1, domains: merged }, null, 2));
    } catch (error) {
      logger.error(`Could not write memory store ${this.persistence.describe()}: ${errorMessage(error)}`);
      return false;
    }

    this.state = merged;
    this.pending = [];
    return true;
  }

  domains(): string[] {
    return Object.keys(this.state);
  }

  snapshot(): Record<string, DomainMemory> {
    const copy: Record<string, DomainMemory> = {};
    for (const [domain, entry] of Object.entries(this.state)) {
      copy[domain] = {
        successfulPatterns: structuredClone(entry.successfulPatterns),
        failedPatterns: structuredClone(entry.failedPatterns),
        fieldMappings: structuredClone(entry.fieldMappings),
        confidenceBoost: entry.confidenceBoost,
      };
    }
    return copy;
  }

  private record(op: MemoryOp): void {
    applyOp(this.state, op, this.learning);
    this.pending.push(op);
  }

  private readPersisted(): StoreState {
    const source = this.persistence.describe();
    let raw: string | undefined;
    try {
      raw = this.persistence.read();
    } catch (error) {
      logger.warn(`Memory store ${source} is unreadable, starting empty: ${errorMessage(error)}`);
      return {};
    }
    if (raw === undefined || raw.trim() === '') return {};

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Memory store ${source} is not valid JSON, starting empty: ${errorMessage(error)}`);
      return {};
    }

    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(`Memory store ${source} has an unexpected shape, starting empty: ${parsed.error.issues[0]?.message}`);
      return {};
    }
    return parsed.data.domains;
  }
}
