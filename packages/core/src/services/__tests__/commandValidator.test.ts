/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';

import {
  POLICY_PRESETS,
  RejectionKind,
  createCommandPolicy,
  validateCommand,
} from '../commandValidator.js';

const echoPolicy = createCommandPolicy({
  allowedCommands: ['echo'],
  allowedPipedCommands: ['grep'],
});

const kubectlPolicy = createCommandPolicy(POLICY_PRESETS.kubernetes);

describe('validateCommand', () => {
  test('rejects the empty string', () => {
    expect(validateCommand('', echoPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.EmptyCommand,
      message: 'command is empty',
    });
  });

  test('rejects whitespace-only input as empty', () => {
    expect(validateCommand('   ', echoPolicy)).toMatchObject({ kind: RejectionKind.EmptyCommand });
  });

  test('accepts an allowed pipeline and returns its stages', () => {
    expect(validateCommand('echo hi | grep h', echoPolicy)).toEqual({
      ok: true,
      stages: [
        ['echo', 'hi'],
        ['grep', 'h'],
      ],
    });
  });

  test('keeps a quoted pipe inside the first stage', () => {
    const result = validateCommand('echo "a | b" | grep a', echoPolicy);
    expect(result).toEqual({
      ok: true,
      stages: [
        ['echo', '"a | b"'],
        ['grep', 'a'],
      ],
    });
  });

  test.each([
    ['echo hi; rm -rf /'],
    ['echo hi && echo there'],
    ['echo hi &'],
    ['echo hi\nrm -rf /'],
  ])('rejects chaining in %j', (command) => {
    expect(validateCommand(command, echoPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.CommandChaining,
      message: 'command chaining is not allowed',
    });
  });

  test.each([['echo `id`'], ['echo $(id)'], ['echo a$(id)b']])(
    'rejects substitution in %j',
    (command) => {
      expect(validateCommand(command, echoPolicy)).toMatchObject({
        ok: false,
        kind: RejectionKind.CommandSubstitution,
      });
    },
  );

  test('accepts substitution syntax inside double quotes by default', () => {
    expect(validateCommand('echo "$(date)"', echoPolicy)).toEqual({
      ok: true,
      stages: [['echo', '"$(date)"']],
    });
    expect(validateCommand('echo "`date`"', echoPolicy)).toEqual({
      ok: true,
      stages: [['echo', '"`date`"']],
    });
  });

  test('rejects substitution inside double quotes when the policy asks for it', () => {
    const strictPolicy = createCommandPolicy({
      allowedCommands: ['echo'],
      allowedPipedCommands: ['grep'],
      rejectQuotedSubstitution: true,
    });

    expect(validateCommand('echo "$(date)"', strictPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.CommandSubstitution,
      message: 'command substitution is not allowed',
    });
    expect(validateCommand('echo "`date`"', strictPolicy)).toMatchObject({
      kind: RejectionKind.CommandSubstitution,
    });
    expect(validateCommand("echo '$(date)'", strictPolicy)).toMatchObject({ ok: true });
  });

  test('treats substitution syntax inside single quotes as literal text', () => {
    expect(validateCommand("echo '$(id) `id`'", echoPolicy)).toEqual({
      ok: true,
      stages: [['echo', "'$(id) `id`'"]],
    });
  });

  test.each([['echo hi > /tmp/out'], ['echo hi>/tmp/out'], ['echo hi < /etc/hosts']])(
    'rejects redirection in %j',
    (command) => {
      expect(validateCommand(command, echoPolicy)).toMatchObject({
        kind: RejectionKind.Redirection,
      });
    },
  );

  test('allows metacharacters that are quoted or escaped', () => {
    expect(validateCommand(`echo "a;b" 'c&d' e\\>f`, echoPolicy)).toEqual({
      ok: true,
      stages: [['echo', '"a;b"', "'c&d'", 'e\\>f']],
    });
  });

  test('rejects an unterminated quote', () => {
    expect(validateCommand('echo "abc', echoPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.UnmatchedQuote,
      message: 'unmatched quote in argument',
    });
  });

  test('lets a backslash escape a quote inside single quotes', () => {
    expect(validateCommand("echo 'it\\'s'", echoPolicy)).toEqual({
      ok: true,
      stages: [['echo', "'it\\'s'"]],
    });
  });

  test('rejects a primary command outside the allow-list', () => {
    expect(validateCommand('rm -rf /', echoPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.CommandNotAllowed,
      message: 'command is not allowed: rm',
      subject: 'rm',
    });
  });

  test('rejects a piped command outside the piped allow-list', () => {
    expect(validateCommand('kubectl get pods | xargs kubectl delete pod', kubectlPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.CommandNotAllowed,
      message: 'command is not allowed: xargs',
      subject: 'xargs',
    });
  });

  test('does not accept the primary command as a piped command', () => {
    expect(validateCommand('echo hi | echo there', echoPolicy)).toMatchObject({
      kind: RejectionKind.CommandNotAllowed,
      subject: 'echo',
    });
  });

  test('rejects a subcommand outside the subcommand allow-list', () => {
    expect(validateCommand('kubectl delete pod web-1', kubectlPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.SubCommandNotAllowed,
      message: 'sub command is not allowed: delete',
      subject: 'delete',
    });
  });

  test('requires a subcommand when a subcommand allow-list is configured', () => {
    expect(validateCommand('kubectl', kubectlPolicy)).toEqual({
      ok: false,
      kind: RejectionKind.SubCommandNotAllowed,
      message: 'sub command is required',
    });
  });

  test('accepts a multi-stage kubectl pipeline', () => {
    const result = validateCommand('kubectl get pods -A | grep web | wc -l', kubectlPolicy);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.stages).toHaveLength(3);
    }
  });

  test.each([['echo hi || echo there'], ['echo hi |']])('rejects the empty stage in %j', (command) => {
    expect(validateCommand(command, echoPolicy)).toMatchObject({
      kind: RejectionKind.EmptyCommand,
    });
  });

  test('reports the first violation in token order', () => {
    expect(validateCommand('echo a > b ; echo c', echoPolicy)).toMatchObject({
      kind: RejectionKind.Redirection,
    });
  });

  test('checks the allow-list of a stage before scanning its tokens', () => {
    expect(validateCommand('cat /etc/passwd; echo', echoPolicy)).toMatchObject({
      kind: RejectionKind.CommandNotAllowed,
      subject: 'cat',
    });
  });
});

describe('createCommandPolicy', () => {
  test('freezes the policy and copies its allow-lists', () => {
    const allowedCommands = ['echo'];
    const policy = createCommandPolicy({ allowedCommands });
    allowedCommands.push('rm');

    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.allowedCommands)).toBe(true);
    expect(policy.allowedCommands).toEqual(['echo']);
    expect(policy.allowedPipedCommands).toEqual([]);
    expect(policy.allowedSubCommands).toBeUndefined();
  });
});
