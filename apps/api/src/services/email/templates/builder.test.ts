import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { escapeHtml, defineEmailTemplate, greetingFor } from './builder.js';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;'
    );
  });

  it('returns plain text unchanged', () => {
    expect(escapeHtml('Hello World')).toBe('Hello World');
  });
});

describe('greetingFor', () => {
  it('uses the name when present', () => {
    expect(greetingFor('Ada')).toBe('Hi Ada,');
  });

  it('falls back to a generic greeting', () => {
    expect(greetingFor(null)).toBe('Hi,');
    expect(greetingFor('')).toBe('Hi,');
  });
});

describe('defineEmailTemplate', () => {
  const template = defineEmailTemplate({
    subject: 'Greetings',
    schema: z.object({ message: z.string() }),
    prepare: (params) => ({ message: params.message }),
    html: '<p>{{message}}</p>',
    text: '{{message}}',
  });

  it('wraps html in the base layout', () => {
    const result = template({ message: 'Test' });

    expect(result.subject).toBe('Greetings');
    expect(result.html).toContain('<!DOCTYPE html>');
    expect(result.html).toContain('<p>Test</p>');
  });

  it('escapes values in html but not in text', () => {
    const result = template({ message: '<b>Hi</b>' });

    expect(result.html).toContain('<p>&lt;b&gt;Hi&lt;/b&gt;</p>');
    expect(result.text).toBe('LeadScout\n\n<b>Hi</b>\n---\nQuestions? support@leadscout.dev\n');
  });

  it('throws on a missing placeholder', () => {
    const broken = defineEmailTemplate({
      subject: 'Broken',
      schema: z.object({ name: z.string() }),
      prepare: (params) => ({ name: params.name }),
      html: '<p>{{greeting}}</p>',
      text: '{{greeting}}',
    });

    expect(() => broken({ name: 'Alice' })).toThrow('Missing template placeholder: {{greeting}}');
  });

  it('rejects params that fail the schema', () => {
    const strict = defineEmailTemplate({
      subject: 'Strict',
      schema: z.object({ url: z.string().url() }),
      prepare: (params) => ({ url: params.url }),
      html: '{{url}}',
      text: '{{url}}',
    });

    expect(() => strict({ url: 'not a url' })).toThrow();
  });
});
