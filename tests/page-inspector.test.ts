import { describe, expect, it } from 'vitest';
import {
  PageInspector,
  describeSnapshot,
  findOpenFormControl,
  findSignInControl,
  findSubmitControl,
  isConsentField,
  matchOption,
  normalizeControls,
} from '../src/services/page-inspector.js';
import { FakeBrowser, button, control } from './helpers/fakes.js';

describe('normalizeControls', () => {
  it('keeps visible enabled inputs and hidden file inputs', () => {
    const fields = normalizeControls([
      control('#token', '', { type: 'hidden' }),
      control('#gender-f', 'Female', { type: 'radio' }),
      control('#ghost', 'Ghost', { visible: false }),
      control('#locked', 'Locked', { disabled: true }),
      control('#cv', 'CV', { type: 'file', visible: false }),
      control('#email', 'Email', { type: 'email', required: true }),
      control('#email', 'Email again', { type: 'email' }),
    ]);

    expect(fields).toEqual([
      { selector: '#cv', kind: 'file', label: 'CV', required: false, currentValue: '' },
      { selector: '#email', kind: 'email', label: 'Email', required: true, currentValue: '' },
    ]);
  });

  it('falls back from label text to aria label, placeholder, name and id', () => {
    const fields = normalizeControls([
      control('#a', '', { ariaLabel: 'Phone number' }),
      control('#b', '', { placeholder: '  Your   city ' }),
      control('#c', '', { name: 'linkedin_url' }),
      control('#d', '', { id: 'postalCode' }),
      control('#e', ''),
    ]);

    expect(fields.map((item) => item.label)).toEqual(['Phone number', 'Your city', 'linkedin url', 'postal Code', '']);
  });

  it('reports checkbox state and select options', () => {
    const fields = normalizeControls([
      control('#remote', 'Open to remote', { type: 'checkbox', checked: true }),
      { selector: '#country', tag: 'SELECT', labelText: 'Country', required: false, value: '', visible: true, options: ['Chile', 'Peru'] },
      { selector: '#about', tag: 'textarea', labelText: 'About you', required: false, value: 'Hi', visible: true },
      control('#age', 'Age', { type: 'weird' }),
    ]);

    expect(fields).toEqual([
      { selector: '#remote', kind: 'checkbox', label: 'Open to remote', required: false, currentValue: 'true' },
      { selector: '#country', kind: 'select', label: 'Country', required: false, currentValue: '', options: ['Chile', 'Peru'] },
      { selector: '#about', kind: 'textarea', label: 'About you', required: false, currentValue: 'Hi' },
      { selector: '#age', kind: 'text', label: 'Age', required: false, currentValue: '' },
    ]);
  });
});

describe('button lookup', () => {
  it('prefers the most specific submit text', () => {
    const buttons = [button('#apply', 'Apply'), button('#send', 'Submit  Application')];
    expect(findSubmitControl(buttons)?.selector).toBe('#send');
  });

  it('falls back to a submit-type button and skips hidden ones', () => {
    const hidden = { ...button('#hidden', 'Submit'), visible: false };
    expect(findSubmitControl([hidden, button('#go', 'Go', 'submit')])?.selector).toBe('#go');
    expect(findSubmitControl([hidden])).toBeUndefined();
  });

  it('finds open-form and sign-in controls', () => {
    expect(findOpenFormControl([button('#x', 'Save job'), button('#y', 'Easy Apply')])?.selector).toBe('#y');
    expect(findOpenFormControl([button('#x', 'Save job')])).toBeUndefined();
    expect(findSignInControl([button('#help', 'Help'), button('#login', 'Log in')])?.selector).toBe('#login');
  });

  it('passes over third-party sign-in buttons', () => {
    const buttons = [button('#google', 'Sign in with Google'), button('#signin', 'Sign in', 'submit')];
    expect(findSignInControl(buttons)?.selector).toBe('#signin');
    expect(findSignInControl([button('#li', 'Continue with LinkedIn')])).toBeUndefined();
  });

  it('prefers a submit button over a link that merely mentions applying', () => {
    const nav = { selector: '#nav', text: 'Apply for other roles', visible: true };
    expect(findSubmitControl([nav, button('#next', 'Next', 'submit')])?.selector).toBe('#next');
    expect(findOpenFormControl([nav, button('#start', 'Apply to this role')])?.selector).toBe('#start');
  });
});

describe('matchOption', () => {
  const countries = [
    { value: '', label: 'Select...' },
    { value: 'us', label: 'United States' },
    { value: 'gb', label: 'United Kingdom' },
  ];

  it('prefers an exact label or value', () => {
    expect(matchOption(countries, 'united kingdom')).toBe('gb');
    expect(matchOption(countries, ' US ')).toBe('us');
  });

  it('falls back to the first label containing the value', () => {
    expect(matchOption(countries, 'United')).toBe('us');
  });

  it('returns undefined when nothing matches', () => {
    expect(matchOption(countries, 'USA')).toBeUndefined();
    expect(matchOption(countries, '  ')).toBeUndefined();
  });
});

describe('isConsentField', () => {
  it('matches checkboxes that ask for agreement', () => {
    const base = { selector: '#x', required: true, currentValue: 'false' };
    expect(isConsentField({ ...base, kind: 'checkbox', label: 'I accept the Privacy Policy' })).toBe(true);
    expect(isConsentField({ ...base, kind: 'checkbox', label: 'Open to relocation' })).toBe(false);
    expect(isConsentField({ ...base, kind: 'text', label: 'Terms you prefer' })).toBe(false);
  });
});

describe('PageInspector', () => {
  it('snapshots the current page', async () => {
    const browser = new FakeBrowser({
      'https://portal.test/login': {
        controls: [control('#user', 'Email', { type: 'email' }), control('#pw', 'Password', { type: 'password' })],
        buttons: [button('#signin', 'Sign in', 'submit'), { ...button('#sso', 'Use SSO'), visible: false }],
        text: '  Welcome\n\n back  ',
      },
    });
    browser.url = 'https://portal.test/login';
    const inspector = new PageInspector(browser);

    const snapshot = await inspector.inspect();

    expect(snapshot.url).toBe('https://portal.test/login');
    expect(snapshot.hasPasswordField).toBe(true);
    expect(snapshot.fields.map((item) => item.kind)).toEqual(['email', 'password']);
    expect(await inspector.pageText(7)).toBe('Welcome');
    expect(describeSnapshot(snapshot)).toBe(
      [
        'URL: https://portal.test/login',
        'Fields:',
        '- Email [email]',
        '- Password [password]',
        'Buttons:',
        '- Sign in',
      ].join('\n')
    );
  });
});
