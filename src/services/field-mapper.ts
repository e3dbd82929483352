import fs from 'node:fs';
import { z } from 'zod';
import type { FieldMapping, FormField, MappedField, Profile, Strategy } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { AICapability } from './ai.js';
import { fieldMatchShape } from './ai.js';
import { effectiveConfidence } from './memory-store.js';
import { isConsentField, matchOption } from './page-inspector.js';
import { isFileAttribute } from './profile.js';

const SYNONYMS_FILE = new URL('../../data/field-synonyms.json', import.meta.url);

const EXACT_CONFIDENCE = 0.95;
const SYNONYM_CONFIDENCE = 0.85;
const EXCERPT_LENGTH = 2000;

// Words that carry no meaning for matching a label to an attribute
const NOISE_WORDS = new Set([
  'a',
  'an',
  'the',
  'your',
  'please',
  'enter',
  'provide',
  'optional',
  'required',
  'pdf',
  'doc',
  'docx',
  'upload',
  'attach',
  'file',
  'here',
  'url',
  'link',
]);

const synonymsSchema = z.record(z.array(z.string()));

export type SynonymTable = Record<string, string[]>;

export function loadSynonyms(file: URL | string = SYNONYMS_FILE): SynonymTable {
  const parsed = synonymsSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
  const table: SynonymTable = {};
  for (const [attribute, phrases] of Object.entries(parsed)) {
    table[attribute] = phrases.map(normalizeLabel);
  }
  return table;
}

/** Lower-case, accents removed, punctuation turned into spaces, whitespace collapsed. */
export function normalizeLabel(label: string): string {
  return label
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** `first_name` → "first name", `resume_path` → "resume", `linkedin_url` → "linkedin". */
export function attributePhrase(attribute: string): string {
  return normalizeLabel(attribute.replace(/_(path|url)$/, ''));
}

function stripNoise(key: string): string {
  return key
    .split(' ')
    .filter((word) => word && !NOISE_WORDS.has(word))
    .join(' ');
}

export function labelKeyOf(field: FormField): string {
  return normalizeLabel(field.label) || normalizeLabel(field.selector);
}

/** File fields take file attributes only; password fields take only `password`. */
export function isCompatible(field: FormField, attribute: string): boolean {
  if (field.kind === 'file') return isFileAttribute(attribute);
  if (isFileAttribute(attribute)) return false;
  if (field.kind === 'password') return attribute === 'password';
  return attribute !== 'password';
}

/** A select only takes a value one of its options can represent. */
export function fitsOptions(field: FormField, value: string): boolean {
  if (field.kind !== 'select' || !field.options?.length) return true;
  return matchOption(field.options.map((option) => ({ value: option, label: option })), value) !== undefined;
}

export interface MapOptions {
  /** Re-query with page text, resume text and every attribute on offer. */
  broadened?: boolean;
  /** Restrict the candidate attributes (e.g. credentials only). */
  attributes?: readonly string[];
  pageText?: string;
  resumeText?: string;
}

export interface MappingResult {
  mapped: MappedField[];
  unmapped: FormField[];
  blocking: FormField[];
}

interface Candidate extends MappedField {
  order: number;
}

export class FieldMapper {
  constructor(
    private readonly ai: AICapability,
    private readonly threshold = 0.5,
    private readonly synonyms: SynonymTable = loadSynonyms()
  ) {}

  async map(profile: Profile, fields: FormField[], strategy?: Strategy, options: MapOptions = {}): Promise<MappingResult> {
    const allowed = options.attributes ? new Set(options.attributes) : undefined;
    const available = Object.keys(profile).filter((attribute) => profile[attribute] && (!allowed || allowed.has(attribute)));
    const stored = new Map((strategy?.fieldMappings ?? []).map((mapping) => [mapping.labelKey, mapping]));
    const boost = strategy?.confidenceBoost ?? 0;

    const mappable = fields.filter((field) => !isConsentField(field));
    const candidates: Candidate[] = [];
    const unresolved: Array<{ field: FormField; order: number }> = [];

    mappable.forEach((field, order) => {
      const key = labelKeyOf(field);
      const usable = available.filter((attribute) => fitsOptions(field, profile[attribute]));
      const mapping = this.fromMemory(key, field, stored, boost, usable) ?? this.fromHeuristics(key, field, usable);
      if (mapping) {
        candidates.push({ field, mapping, order });
      } else {
        unresolved.push({ field, order });
      }
    });

    for (const { field, order } of unresolved) {
      const claimed = new Set(candidates.map((candidate) => candidate.mapping.attribute));
      const offered = available.filter(
        (attribute) =>
          isCompatible(field, attribute) &&
          fitsOptions(field, profile[attribute]) &&
          (options.broadened || !claimed.has(attribute))
      );
      if (offered.length === 0) continue;

      const mapping = await this.fromAI(field, offered, profile, mappable, options);
      if (mapping) {
        candidates.push({ field, mapping, order });
      }
    }

    const winners = resolveConflicts(candidates);
    const mapped = winners.map(({ field, mapping }) => ({ field, mapping }));
    for (const { field, mapping } of mapped) {
      logger.mapping(field.label, mapping.attribute, mapping.confidence, mapping.source);
    }

    const mappedSelectors = new Set(mapped.map(({ field }) => field.selector));
    const unmapped = mappable.filter((field) => !mappedSelectors.has(field.selector));
    const blocking = unmapped.filter((field) => field.required);
    for (const field of blocking) {
      logger.warn(`No confident mapping for required field "${field.label}"`);
    }

    return { mapped, unmapped, blocking };
  }

  private fromMemory(
    key: string,
    field: FormField,
    stored: Map<string, FieldMapping>,
    boost: number,
    available: string[]
  ): FieldMapping | undefined {
    const mapping = stored.get(key);
    if (!mapping || !available.includes(mapping.attribute) || !isCompatible(field, mapping.attribute)) {
      return undefined;
    }
    const confidence = effectiveConfidence(mapping, boost);
    if (confidence < this.threshold) return undefined;
    return { labelKey: key, attribute: mapping.attribute, confidence, source: 'memory' };
  }

  private fromHeuristics(key: string, field: FormField, available: string[]): FieldMapping | undefined {
    const phrase = stripNoise(key);
    if (!phrase) return undefined;

    const matches: FieldMapping[] = [];
    for (const attribute of available) {
      if (!isCompatible(field, attribute)) continue;
      if (phrase === attributePhrase(attribute)) {
        matches.push({ labelKey: key, attribute, confidence: EXACT_CONFIDENCE, source: 'heuristic' });
      } else if (this.synonyms[attribute]?.includes(phrase)) {
        matches.push({ labelKey: key, attribute, confidence: SYNONYM_CONFIDENCE, source: 'heuristic' });
      }
    }

    // Two attributes claiming the same label is left to the AI
    if (matches.length !== 1) return undefined;
    const [match] = matches;
    return match.confidence >= this.threshold ? match : undefined;
  }

  private async fromAI(
    field: FormField,
    offered: string[],
    profile: Profile,
    siblings: FormField[],
    options: MapOptions
  ): Promise<FieldMapping | undefined> {
    const context = buildFieldContext(field, offered, profile, siblings, options);
    const question =
      `Which profile attribute should fill the form field "${field.label || field.selector}"? ` +
      'Answer null when none of the listed attributes fits.';

    const answer = await this.ai.ask(context, question, fieldMatchShape);
    if (!answer.attribute || !offered.includes(answer.attribute)) return undefined;
    if (answer.confidence < this.threshold) {
      logger.debug(`Rejected AI mapping "${field.label}" → ${answer.attribute} (${answer.confidence})`);
      return undefined;
    }
    return { labelKey: labelKeyOf(field), attribute: answer.attribute, confidence: answer.confidence, source: 'ai' };
  }
}

function previewValue(attribute: string, value: string): string {
  if (attribute === 'password') return '(hidden)';
  return value.length > 60 ? `${value.slice(0, 57)}...` : value;
}

function buildFieldContext(
  field: FormField,
  offered: string[],
  profile: Profile,
  siblings: FormField[],
  options: MapOptions
): string {
  const lines = [
    'Form field:',
    `- label: ${field.label || '(none)'}`,
    `- kind: ${field.kind}`,
    `- required: ${field.required ? 'yes' : 'no'}`,
  ];
  if (field.options?.length) {
    lines.push(`- options: ${field.options.join(' | ')}`);
  }
  lines.push('', 'Profile attributes:');
  for (const attribute of offered) {
    lines.push(`- ${attribute}: ${previewValue(attribute, profile[attribute])}`);
  }

  if (options.broadened) {
    const others = siblings.filter((other) => other.selector !== field.selector).map((other) => other.label);
    lines.push('', `Other fields on this form: ${others.join('; ') || 'none'}`);
    if (options.pageText) {
      lines.push('', 'Page text (excerpt):', options.pageText.slice(0, EXCERPT_LENGTH));
    }
    if (options.resumeText) {
      lines.push('', 'Resume (excerpt):', options.resumeText.slice(0, EXCERPT_LENGTH));
    }
  }
  return lines.join('\n');
}

/**
 * One field per attribute: the higher confidence keeps it, ties go to the
 * field that appears first. Result keeps page order.
 */
export function resolveConflicts<T extends MappedField & { order: number }>(candidates: T[]): T[] {
  const best = new Map<string, T>();
  for (const candidate of candidates) {
    const current = best.get(candidate.mapping.attribute);
    if (
      !current ||
      candidate.mapping.confidence > current.mapping.confidence ||
      (candidate.mapping.confidence === current.mapping.confidence && candidate.order < current.order)
    ) {
      best.set(candidate.mapping.attribute, candidate);
    }
  }
  return [...best.values()].sort((a, b) => a.order - b.order);
}
