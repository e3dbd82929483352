import type { FieldKind, FormField, PageButton, PageSnapshot, RawControl } from '../types/index.js';
import type { BrowserCapability } from './browser.js';

const IGNORED_INPUT_TYPES = new Set(['hidden', 'submit', 'button', 'reset', 'image', 'radio', 'search', 'range', 'color']);

const INPUT_KINDS: Record<string, FieldKind> = {
  text: 'text',
  email: 'email',
  tel: 'tel',
  password: 'password',
  url: 'url',
  number: 'number',
  date: 'date',
  checkbox: 'checkbox',
  file: 'file',
};

// Button texts in priority order
const SUBMIT_TEXTS = ['submit application', 'send application', 'submit', 'apply', 'send', 'finish', 'complete'];
const OPEN_FORM_TEXTS = ['apply now', 'start application', 'apply for this job', 'easy apply', 'apply'];
const SIGN_IN_TEXTS = ['sign in', 'log in', 'login', 'create account', 'sign up', 'register', 'continue', 'submit'];

const CONSENT_TERMS = ['agree', 'terms', 'privacy', 'consent'];

function humanize(identifier: string): string {
  return identifier
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/[_\-[\].]+/g, ' ')
    .trim();
}

function kindOf(control: RawControl): FieldKind | undefined {
  const tag = control.tag.toLowerCase();
  if (tag === 'textarea') return 'textarea';
  if (tag === 'select') return 'select';
  if (tag !== 'input') return undefined;

  const type = (control.type ?? 'text').toLowerCase();
  if (IGNORED_INPUT_TYPES.has(type)) return undefined;
  return INPUT_KINDS[type] ?? 'text';
}

function labelOf(control: RawControl): string {
  const candidates = [control.labelText, control.ariaLabel, control.placeholder];
  for (const candidate of candidates) {
    const text = candidate?.replace(/\s+/g, ' ').trim();
    if (text) return text;
  }
  if (control.name) return humanize(control.name);
  if (control.id) return humanize(control.id);
  return '';
}

/**
 * Turns raw browser controls into the fields an attempt works with:
 * visible, enabled, one entry per selector. File inputs count as visible
 * because portals routinely hide them behind styled buttons.
 */
export function normalizeControls(controls: RawControl[]): FormField[] {
  const fields: FormField[] = [];
  const seen = new Set<string>();

  for (const control of controls) {
    const kind = kindOf(control);
    if (!kind || control.disabled || seen.has(control.selector)) continue;
    if (!control.visible && kind !== 'file') continue;
    seen.add(control.selector);

    const field: FormField = {
      selector: control.selector,
      kind,
      label: labelOf(control),
      required: control.required,
      currentValue: kind === 'checkbox' ? String(Boolean(control.checked)) : control.value,
    };
    if (kind === 'select' && control.options) {
      field.options = control.options;
    }
    fields.push(field);
  }

  return fields;
}

// Third-party sign-in buttons are never the form's own control
const SSO_TEXT = /\b(google|linkedin|apple|microsoft|facebook|github)\b/;

function buttonText(button: PageButton): string {
  return button.text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function isSubmitType(button: PageButton): boolean {
  return button.type?.toLowerCase() === 'submit';
}

/**
 * Exact text first, then submit-type buttons containing the text, then (when
 * asked) any submit-type button, then other native buttons containing the
 * text, then links and other clickables containing the text.
 */
function findButton(buttons: PageButton[], texts: string[], submitFallback = false): PageButton | undefined {
  const candidates = buttons.filter((button) => button.visible && !SSO_TEXT.test(buttonText(button)));
  const containing = (pool: PageButton[]) => {
    for (const target of texts) {
      const match = pool.find((button) => buttonText(button).includes(target));
      if (match) return match;
    }
    return undefined;
  };

  for (const target of texts) {
    const exact = candidates.find((button) => buttonText(button) === target);
    if (exact) return exact;
  }
  const submits = candidates.filter(isSubmitType);
  return (
    containing(submits) ??
    (submitFallback ? submits[0] : undefined) ??
    containing(candidates.filter((button) => button.type !== undefined)) ??
    containing(candidates)
  );
}

export function findSubmitControl(buttons: PageButton[]): PageButton | undefined {
  return findButton(buttons, SUBMIT_TEXTS, true);
}

export function findOpenFormControl(buttons: PageButton[]): PageButton | undefined {
  return findButton(buttons, OPEN_FORM_TEXTS);
}

export function findSignInControl(buttons: PageButton[]): PageButton | undefined {
  return findButton(buttons, SIGN_IN_TEXTS, true);
}

/** Option value for a profile value: exact label or value first, then a label containing it. */
export function matchOption(options: Array<{ value: string; label: string }>, value: string): string | undefined {
  const wanted = value.trim().toLowerCase();
  if (!wanted) return undefined;
  const exact = options.find(
    (option) => option.label.trim().toLowerCase() === wanted || option.value.trim().toLowerCase() === wanted
  );
  if (exact) return exact.value;
  const partial = options.find((option) => option.label.toLowerCase().includes(wanted));
  return partial?.value;
}

/** Terms/privacy checkboxes are ticked by the engine instead of mapped. */
export function isConsentField(field: FormField): boolean {
  if (field.kind !== 'checkbox') return false;
  const label = field.label.toLowerCase();
  return CONSENT_TERMS.some((term) => label.includes(term));
}

export class PageInspector {
  constructor(private readonly browser: BrowserCapability) {}

  async inspect(): Promise<PageSnapshot> {
    const fields = normalizeControls(await this.browser.findFields());
    const buttons = await this.browser.findButtons();
    const url = await this.browser.currentUrl();
    return {
      url,
      fields,
      buttons,
      hasPasswordField: fields.some((field) => field.kind === 'password'),
    };
  }

  async pageText(maxLength = 4000): Promise<string> {
    const text = await this.browser.pageText();
    return text.replace(/\s+/g, ' ').trim().slice(0, maxLength);
  }
}

/** Compact page description for AI questions. */
export function describeSnapshot(snapshot: PageSnapshot): string {
  const fieldLines = snapshot.fields.map(
    (field) => `- ${field.label || '(unlabelled)'} [${field.kind}${field.required ? ', required' : ''}]`
  );
  const buttonLines = snapshot.buttons.filter((button) => button.visible && button.text).map((button) => `- ${button.text}`);
  return [
    `URL: ${snapshot.url}`,
    'Fields:',
    ...(fieldLines.length ? fieldLines : ['- none']),
    'Buttons:',
    ...(buttonLines.length ? buttonLines : ['- none']),
  ].join('\n');
}
