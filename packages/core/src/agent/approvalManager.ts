/**
 * Command approvers.
 *
 * Responsibilities:
 * - Define the {@link CommandApprover} seam the session consults after policy validation.
 * - Ask a human through an injected prompt function and normalize the answer.
 * - Ask a secondary review model whether a command is read-only.
 */
import { DEFAULT_CORRECTION_ATTEMPTS } from '../constants.js';
import { CommandReviewSchema } from '../contracts/index.js';
import { guidedAsk } from './guidedAsk.js';
import type { ModelTransport } from './modelTransport.js';
import { silentLogger, type SessionLogger } from '../utils/logger.js';

export type ApprovalVerdict = { approved: true } | { approved: false; reason: string };

export interface CommandApprover {
  /** Resolves with a verdict; rejects when no verdict could be reached. */
  review(command: string, signal?: AbortSignal): Promise<ApprovalVerdict>;
}

export const HUMAN_DECLINE_REASON =
  'The user declined to run this command. Suggest a different command or end the session.';

export interface HumanApproverOptions {
  askHuman: (prompt: string) => Promise<string | undefined>;
  logger?: SessionLogger;
}

type HumanAnswer = 'yes' | 'no';

export function parseHumanAnswer(raw: string): HumanAnswer | null {
  const input = raw.trim().toLowerCase();
  if (input === 'y' || input === 'yes') {
    return 'yes';
  }
  if (input === 'n' || input === 'no') {
    return 'no';
  }
  return null;
}

export class HumanApprover implements CommandApprover {
  private readonly askHuman: HumanApproverOptions['askHuman'];

  private readonly logger: SessionLogger;

  constructor({ askHuman, logger = silentLogger }: HumanApproverOptions) {
    this.askHuman = askHuman;
    this.logger = logger;
  }

  async review(command: string): Promise<ApprovalVerdict> {
    const prompt = `Run this command?\n  $ ${command}\n(y/n): `;

    while (true) {
      const raw = await this.askHuman(prompt);
      // Closed input: nobody is there to approve.
      if (raw === undefined) {
        this.logger.warn('No answer received; treating the command as declined.');
        return { approved: false, reason: HUMAN_DECLINE_REASON };
      }

      const answer = parseHumanAnswer(raw);
      if (answer === 'yes') {
        this.logger.success('Approved.');
        return { approved: true };
      }
      if (answer === 'no') {
        this.logger.warn('Declined.');
        return { approved: false, reason: HUMAN_DECLINE_REASON };
      }

      this.logger.warn('Please answer y or n.');
    }
  }
}

export interface ModelApproverOptions {
  transport: ModelTransport;
  correctionAttempts?: number;
  logger?: SessionLogger;
}

export class ModelApprover implements CommandApprover {
  private readonly transport: ModelTransport;

  private readonly correctionAttempts: number;

  private readonly logger: SessionLogger;

  constructor({
    transport,
    correctionAttempts = DEFAULT_CORRECTION_ATTEMPTS,
    logger = silentLogger,
  }: ModelApproverOptions) {
    this.transport = transport;
    this.correctionAttempts = correctionAttempts;
    this.logger = logger;
  }

  async review(command: string, signal?: AbortSignal): Promise<ApprovalVerdict> {
    // Each verdict stands alone; earlier reviews must not sway this one.
    this.transport.reset();

    const result = await guidedAsk(
      this.transport,
      `Command: ${command}`,
      this.correctionAttempts,
      CommandReviewSchema,
      { signal, logger: this.logger },
    );

    if (result.status !== 'success') {
      throw new Error(result.message);
    }

    const { is_read_only: readOnly, reason } = result.value;
    this.logger.debug(`Review model: read-only=${String(readOnly)} (${reason})`);
    return readOnly ? { approved: true } : { approved: false, reason };
  }
}

export default {
  HumanApprover,
  ModelApprover,
  parseHumanAnswer,
};
