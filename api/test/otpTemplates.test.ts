import { describe, expect, it } from 'vitest';
import { assertTemplate, defaultTemplate, renderMessage, renderTemplate } from '../src/otpTemplates.js';
import { OTP_PURPOSES } from '../src/store.js';

describe('renderTemplate', () => {
  it('substitutes both placeholders', () => {
    expect(renderTemplate('{{purpose}}: {{code}}', { code: '123456', purposeLabel: 'Login' })).toBe('Login: 123456');
  });

  it('does not expand placeholders that appear in substituted values', () => {
    expect(renderTemplate('[{{purpose}}] {{code}}', { code: '{{purpose}}', purposeLabel: '{{code}}' })).toBe(
      '[{{code}}] {{purpose}}'
    );
  });

  it('leaves other braces alone', () => {
    expect(renderTemplate('{{name}} {{code}} {{purpose}}', { code: '1', purposeLabel: 'P' })).toBe('{{name}} 1 P');
  });
});

describe('defaultTemplate', () => {
  it.each(OTP_PURPOSES)('is valid for %s', (purpose) => {
    expect(() => assertTemplate(defaultTemplate(purpose))).not.toThrow();
  });

  it('names the purpose in the subject', () => {
    expect(defaultTemplate('verification').subject).toBe('Your Email Verification code');
  });
});

describe('assertTemplate', () => {
  it('requires a subject', () => {
    expect(() => assertTemplate({ subject: '  ', html: '{{code}}{{purpose}}', text: '{{code}}{{purpose}}' })).toThrow(
      'Email subject is required'
    );
  });
});

describe('renderMessage', () => {
  it('renders html and text with the purpose label', () => {
    expect(
      renderMessage({ subject: 'S', html: '<b>{{code}}</b> {{purpose}}', text: '{{code}} {{purpose}}' }, '000042', 'registration')
    ).toEqual({ subject: 'S', html: '<b>000042</b> Registration', text: '000042 Registration' });
  });
});
