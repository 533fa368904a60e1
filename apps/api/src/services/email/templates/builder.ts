import type { z } from 'zod';
import { BRAND_NAME, SUPPORT_EMAIL, wrapInBaseTemplate } from './base.js';

export interface EmailContent {
  subject: string;
  html: string;
  text: string;
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

function replacePlaceholders(
  template: string,
  values: Record<string, string>,
  escape: boolean
): string {
  return template.replaceAll(/\{\{(\w+)\}\}/g, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new Error(`Missing template placeholder: {{${key}}}`);
    }
    return escape ? escapeHtml(value) : value;
  });
}

const TEXT_FOOTER = `
---
Questions? ${SUPPORT_EMAIL}
`;

/**
 * Define an email from a params schema and two bodies with `{{name}}`
 * placeholders. Values are HTML-escaped in the HTML body only.
 */
export function defineEmailTemplate<T extends z.ZodType>(config: {
  subject: string;
  schema: T;
  prepare: (params: z.output<T>) => Record<string, string>;
  html: string;
  text: string;
}): (params: z.input<T>) => EmailContent {
  return (params) => {
    const validated = config.schema.parse(params);
    const values = config.prepare(validated);
    return {
      subject: config.subject,
      html: wrapInBaseTemplate(replacePlaceholders(config.html, values, true)),
      text: `${BRAND_NAME}\n\n${replacePlaceholders(config.text, values, false)}${TEXT_FOOTER}`,
    };
  };
}

export function greetingFor(userName: string | null | undefined): string {
  return userName ? `Hi ${userName},` : 'Hi,';
}
