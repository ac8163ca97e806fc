import { AppError } from './errors.js';
import { PURPOSE_LABELS, type OtpPurpose, type OtpTemplate } from './store.js';

export const CODE_PLACEHOLDER = '{{code}}';
export const PURPOSE_PLACEHOLDER = '{{purpose}}';

const DEFAULT_HTML = `<!doctype html>
<html>
  <body style="font-family: Arial, sans-serif; color: #1f2933;">
    <h2>Your {{purpose}} code</h2>
    <p>Use the code below to continue. It expires shortly and can only be used once.</p>
    <p style="font-size: 28px; font-weight: bold; letter-spacing: 6px;">{{code}}</p>
    <p style="color: #7b8794;">If you did not request this, you can ignore this email.</p>
  </body>
</html>`;

const DEFAULT_TEXT = `Your {{purpose}} code is {{code}}.
It expires shortly and can only be used once. If you did not request this, you can ignore this email.`;

export function defaultTemplate(purpose: OtpPurpose): OtpTemplate {
  return {
    subject: `Your ${PURPOSE_LABELS[purpose]} code`,
    html: DEFAULT_HTML,
    text: DEFAULT_TEXT
  };
}

function occurrences(haystack: string, needle: string) {
  return haystack.split(needle).length - 1;
}

export function assertTemplate(template: OtpTemplate) {
  for (const [name, body] of [['html', template.html], ['text', template.text]] as const) {
    for (const placeholder of [CODE_PLACEHOLDER, PURPOSE_PLACEHOLDER]) {
      const n = occurrences(body, placeholder);
      if (n !== 1) {
        throw new AppError('InvalidRequest', `The ${name} template must contain ${placeholder} exactly once (found ${n})`);
      }
    }
  }
  if (!template.subject.trim()) {
    throw new AppError('InvalidRequest', 'Email subject is required');
  }
}

// Single pass: substituted values are never scanned for placeholders again.
export function renderTemplate(body: string, values: { code: string; purposeLabel: string }) {
  return body
    .split(CODE_PLACEHOLDER)
    .map((chunk) => chunk.split(PURPOSE_PLACEHOLDER).join(values.purposeLabel))
    .join(values.code);
}

export function renderMessage(template: OtpTemplate, code: string, purpose: OtpPurpose) {
  const values = { code, purposeLabel: PURPOSE_LABELS[purpose] };
  return {
    subject: template.subject,
    html: renderTemplate(template.html, values),
    text: renderTemplate(template.text, values)
  };
}
