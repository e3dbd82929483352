import path from 'node:path';
import type { Profile } from '../types/index.js';

export const FILE_ATTRIBUTE_SUFFIX = '_path';

export function isFileAttribute(attribute: string): boolean {
  return attribute.endsWith(FILE_ATTRIBUTE_SUFFIX);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    const items = value.map((item) => (isPlainObject(item) ? Object.values(item).map(stringify).filter(Boolean).join(' ') : stringify(item)));
    const separator = value.some(isPlainObject) ? '; ' : ', ';
    return items.filter((item): item is string => Boolean(item)).join(separator);
  }
  return undefined;
}

function flatten(raw: Record<string, unknown>, prefix: string, into: Record<string, string>): void {
  for (const [key, value] of Object.entries(raw)) {
    const name = prefix ? `${prefix}_${key}` : key;
    if (isPlainObject(value)) {
      flatten(value, name, into);
      continue;
    }
    const text = stringify(value);
    if (text) {
      into[name] = text;
    }
  }
}

/**
 * Builds the frozen attribute bag used for every attempt. File attributes
 * resolve against `baseDir`; `full_name` is derived when only the parts are given.
 */
export function createProfile(raw: Record<string, unknown>, baseDir = process.cwd()): Profile {
  const attributes: Record<string, string> = {};
  flatten(raw, '', attributes);

  for (const [name, value] of Object.entries(attributes)) {
    if (isFileAttribute(name)) {
      attributes[name] = path.resolve(baseDir, value);
    }
  }

  if (!attributes.full_name && attributes.first_name && attributes.last_name) {
    attributes.full_name = `${attributes.first_name} ${attributes.last_name}`;
  }

  return Object.freeze(attributes);
}

/** Returns a new profile with `extra` attributes added where the profile has none. */
export function withFallbacks(profile: Profile, extra: Record<string, string | undefined>): Profile {
  const merged: Record<string, string> = { ...profile };
  for (const [name, value] of Object.entries(extra)) {
    if (value && !merged[name]) {
      merged[name] = value;
    }
  }
  return Object.freeze(merged);
}
