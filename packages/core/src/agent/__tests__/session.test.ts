/* eslint-env jest */
import { describe, expect, jest, test } from '@jest/globals';

import { INCOMPLETE_ANALYSIS_MESSAGE, NEXT_STEP_PROMPT } from '../../constants.js';
import { createCommandPolicy } from '../../services/commandValidator.js';
import type { ApprovalVerdict, CommandApprover } from '../approvalManager.js';
import { startSession } from '../session.js';
import {
  RecordingExecuter,
  ScriptedTransport,
  finalAnswer,
  needCommand,
  reply,
} from '../__testUtils__/fakes.js';

const policy = createCommandPolicy({ allowedCommands: ['echo'], allowedPipedCommands: ['grep'] });

const liveSignal = (): AbortSignal => new AbortController().signal;

const approverReturning = (verdict: ApprovalVerdict) => {
  const review = jest.fn<CommandApprover['review']>(async () => verdict);
  return { review };
};

describe('startSession', () => {
  test('feeds command output back until the model answers', async () => {
    const transport = new ScriptedTransport([needCommand('echo hi'), finalAnswer('all good')]);
    const executer = new RecordingExecuter();

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer,
      policy,
      query: 'Is everything fine?',
    });

    expect(outcome).toEqual({ status: 'answer', answer: 'all good', iterations: 2 });
    expect(transport.prompts).toEqual(['Is everything fine?', 'ran echo hi']);
    expect(executer.calls).toEqual(['echo hi']);
  });

  test('treats a reply without need_more_data as the answer', async () => {
    const transport = new ScriptedTransport([reply({ answer: 'fine', reason_for_command: '' })]);

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer: new RecordingExecuter(),
      policy,
      query: 'q',
    });

    expect(outcome).toEqual({ status: 'answer', answer: 'fine', iterations: 1 });
  });

  test('stops after exactly the maximum number of model calls', async () => {
    const replies = Array.from({ length: 10 }, (_, index) => needCommand(`echo ${index}`));
    const transport = new ScriptedTransport(replies);
    const executer = new RecordingExecuter();

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer,
      policy,
      query: 'q',
    });

    expect(outcome).toEqual({
      status: 'max-iterations',
      answer: INCOMPLETE_ANALYSIS_MESSAGE,
      iterations: 7,
    });
    expect(transport.prompts).toHaveLength(7);
    expect(executer.calls).toHaveLength(6);
  });

  test('honors a custom iteration limit', async () => {
    const transport = new ScriptedTransport([needCommand('echo hi')]);
    const executer = new RecordingExecuter();

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer,
      policy,
      query: 'q',
      maxIterations: 1,
    });

    expect(outcome).toMatchObject({ status: 'max-iterations', iterations: 1 });
    expect(executer.calls).toEqual([]);
  });

  test('sends the approver reason verbatim and never executes the command', async () => {
    const transport = new ScriptedTransport([needCommand('echo hi'), finalAnswer('done')]);
    const executer = new RecordingExecuter();
    const approver = approverReturning({ approved: false, reason: 'Not during business hours.' });

    await startSession({ signal: liveSignal(), transport, executer, policy, approver, query: 'q' });

    expect(transport.prompts[1]).toBe('Not during business hours.');
    expect(approver.review).toHaveBeenCalledWith('echo hi', expect.any(AbortSignal));
    expect(executer.calls).toEqual([]);
  });

  test('sends the validation message verbatim and skips the approver', async () => {
    const transport = new ScriptedTransport([needCommand('rm -rf /'), finalAnswer('done')]);
    const executer = new RecordingExecuter();
    const approver = approverReturning({ approved: true });

    await startSession({ signal: liveSignal(), transport, executer, policy, approver, query: 'q' });

    expect(transport.prompts[1]).toBe('command is not allowed: rm');
    expect(approver.review).not.toHaveBeenCalled();
    expect(executer.calls).toEqual([]);
  });

  test('rejects chaining even when an approver would allow it', async () => {
    const transport = new ScriptedTransport([needCommand('echo hi; rm -rf /'), finalAnswer('done')]);
    const approver = approverReturning({ approved: true });

    await startSession({
      signal: liveSignal(),
      transport,
      executer: new RecordingExecuter(),
      policy,
      approver,
      query: 'q',
    });

    expect(transport.prompts[1]).toBe('command chaining is not allowed');
    expect(approver.review).not.toHaveBeenCalled();
  });

  test('reuses the stored result of a repeated command', async () => {
    const transport = new ScriptedTransport([
      needCommand('echo hi'),
      needCommand('echo hi'),
      finalAnswer('done'),
    ]);
    const executer = new RecordingExecuter();
    const approver = approverReturning({ approved: true });

    await startSession({ signal: liveSignal(), transport, executer, policy, approver, query: 'q' });

    expect(executer.calls).toEqual(['echo hi']);
    expect(approver.review).toHaveBeenCalledTimes(1);
    expect(transport.prompts).toEqual(['q', 'ran echo hi', 'ran echo hi']);
  });

  test('reports empty output with the sentinel', async () => {
    const transport = new ScriptedTransport([needCommand('echo'), finalAnswer('done')]);
    const executer = new RecordingExecuter(() => ({ ok: true, output: '' }));

    await startSession({ signal: liveSignal(), transport, executer, policy, query: 'q' });

    expect(transport.prompts[1]).toBe('No output');
  });

  test('reports failures with their output and retries them when asked again', async () => {
    const transport = new ScriptedTransport([
      needCommand('echo hi | grep x'),
      needCommand('echo hi | grep x'),
      finalAnswer('done'),
    ]);
    const executer = new RecordingExecuter(() => ({
      ok: false,
      kind: 'failure',
      message: 'exit status 1',
      output: 'grep: no match',
      exitCode: 1,
      signal: null,
    }));

    await startSession({ signal: liveSignal(), transport, executer, policy, query: 'q' });

    expect(transport.prompts[1]).toBe('Command failed: exit status 1\ngrep: no match');
    expect(executer.calls).toEqual(['echo hi | grep x', 'echo hi | grep x']);
  });

  test('asks for a command when the model needs data but proposes none', async () => {
    const transport = new ScriptedTransport([
      reply({ reason_for_command: 'thinking', need_more_data: true, run_command: '' }),
      finalAnswer('done'),
    ]);

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer: new RecordingExecuter(),
      policy,
      query: 'q',
    });

    expect(transport.prompts[1]).toBe(NEXT_STEP_PROMPT);
    expect(outcome).toMatchObject({ status: 'answer', iterations: 2 });
  });

  test('turns an approver error into the next prompt', async () => {
    const transport = new ScriptedTransport([needCommand('echo hi'), finalAnswer('done')]);
    const approver: CommandApprover = {
      review: async () => {
        throw new Error('review model unavailable');
      },
    };

    await startSession({
      signal: liveSignal(),
      transport,
      executer: new RecordingExecuter(),
      policy,
      approver,
      query: 'q',
    });

    expect(transport.prompts[1]).toBe('Failed to validate command: review model unavailable');
  });

  test('ends with a transport error', async () => {
    const failure = new Error('503 from upstream');
    const transport = new ScriptedTransport([failure]);

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer: new RecordingExecuter(),
      policy,
      query: 'q',
    });

    expect(outcome).toEqual({
      status: 'error',
      error: { kind: 'transport', message: '503 from upstream', cause: failure },
      iterations: 1,
    });
  });

  test('ends with a schema error after the correction attempts', async () => {
    const transport = new ScriptedTransport(['a', 'b']);

    const outcome = await startSession({
      signal: liveSignal(),
      transport,
      executer: new RecordingExecuter(),
      policy,
      query: 'q',
      correctionAttempts: 2,
    });

    expect(outcome).toEqual({
      status: 'error',
      error: { kind: 'schema', message: 'Failed to get a valid agent response after 2 attempts' },
      iterations: 1,
    });
  });

  test('does not call the model once the signal is canceled', async () => {
    const controller = new AbortController();
    const reason = new Error('user quit');
    controller.abort(reason);
    const transport = new ScriptedTransport([finalAnswer('too late')]);

    const outcome = await startSession({
      signal: controller.signal,
      transport,
      executer: new RecordingExecuter(),
      policy,
      query: 'q',
    });

    expect(outcome).toEqual({
      status: 'error',
      error: { kind: 'canceled', message: 'session canceled: user quit', cause: reason },
      iterations: 0,
    });
    expect(transport.prompts).toEqual([]);
  });

  test('reports a deadline that passes mid-session', async () => {
    const controller = new AbortController();
    const deadline = new Error('The operation was aborted due to timeout');
    deadline.name = 'TimeoutError';
    const transport = new ScriptedTransport([
      () => {
        controller.abort(deadline);
        return needCommand('echo hi');
      },
      finalAnswer('too late'),
    ]);

    const outcome = await startSession({
      signal: controller.signal,
      transport,
      executer: new RecordingExecuter(),
      policy,
      query: 'q',
    });

    expect(outcome).toEqual({
      status: 'error',
      error: { kind: 'deadline-exceeded', message: 'session deadline exceeded', cause: deadline },
      iterations: 1,
    });
    expect(transport.prompts).toHaveLength(1);
  });
});
