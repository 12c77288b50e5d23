/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';

import { parseModelReply } from '../responseParser.js';

describe('parseModelReply', () => {
  test('parses a plain JSON reply directly', () => {
    expect(parseModelReply(' {"answer": "ok"} ')).toEqual({
      ok: true,
      value: { answer: 'ok' },
      strategy: 'direct',
    });
  });

  test('recovers JSON from a fenced code block', () => {
    const raw = 'Here you go:\n```json\n{"need_more_data": false}\n```';

    expect(parseModelReply(raw)).toEqual({
      ok: true,
      value: { need_more_data: false },
      strategy: 'code_fence',
    });
  });

  test('recovers the first balanced object surrounded by prose', () => {
    const raw = 'Sure! {"a": {"b": [1, "}"]}} hope that helps';

    expect(parseModelReply(raw)).toEqual({
      ok: true,
      value: { a: { b: [1, '}'] } },
      strategy: 'balanced_slice',
    });
  });

  test('escapes bare line breaks inside string values', () => {
    const raw = '{"answer": "line one\nline two"}';

    expect(parseModelReply(raw)).toEqual({
      ok: true,
      value: { answer: 'line one\nline two' },
      strategy: 'escaped_newlines',
    });
  });

  test('reports an empty reply', () => {
    expect(parseModelReply('   ')).toEqual({ ok: false, error: 'Response was empty.', attempts: [] });
  });

  test('reports the direct parse error when nothing can be recovered', () => {
    const result = parseModelReply('not json at all');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith('Invalid JSON: ')).toBe(true);
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0]?.strategy).toBe('direct');
    }
  });
});
