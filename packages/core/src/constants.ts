/**
 * Shared runtime defaults for the diagnostic session.
 *
 * Keep these values in a single module so the session controller, the CLI and
 * the tests stay aligned when defaults change.
 */

export const DEFAULT_MAX_ITERATIONS = 7;
export const DEFAULT_CORRECTION_ATTEMPTS = 3;
export const DEFAULT_SESSION_TIMEOUT_SEC = 120;
export const DEFAULT_COMMAND_TIMEOUT_SEC = 60;
export const DEFAULT_REQUEST_TIMEOUT_MS = 45_000;

// Grace period between SIGTERM and SIGKILL for commands that outlive their budget.
export const COMMAND_FORCE_KILL_DELAY_MS = 1000;

export const NO_OUTPUT_SENTINEL = 'No output';
export const NEXT_STEP_PROMPT = 'Please suggest a command to run or end the session.';
export const INCOMPLETE_ANALYSIS_MESSAGE = 'Analysis incomplete. Reached maximum number of queries.';
export const COMMAND_FAILED_PREFIX = 'Command failed: ';
export const APPROVAL_FAILED_PREFIX = 'Failed to validate command: ';
