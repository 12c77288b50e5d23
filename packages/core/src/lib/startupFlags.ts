import { POLICY_PRESET_NAMES, isPolicyPresetName, type PolicyPresetName } from '../services/commandValidator.js';

export interface StartupFlags {
  debug: boolean;
  /** Skip the approver; the policy alone gates execution. */
  autoApprove: boolean;
  /** Print token usage and cost when the CLI exits. */
  usage: boolean;
  /** Let the validation model approve commands instead of the user. */
  modelReview: boolean;
  showVersion: boolean;
  configPath?: string;
  policyPreset?: PolicyPresetName;
  /** Positional words joined by spaces; empty for the interactive mode. */
  query: string;
}

export class StartupFlagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StartupFlagError';
  }
}

const createDefaultFlags = (): StartupFlags => ({
  debug: false,
  autoApprove: false,
  usage: false,
  modelReview: false,
  showVersion: false,
  query: '',
});

function splitInlineValue(arg: string): [string, string | undefined] {
  const equalsIndex = arg.indexOf('=');
  if (equalsIndex === -1) {
    return [arg, undefined];
  }
  return [arg.slice(0, equalsIndex), arg.slice(equalsIndex + 1)];
}

function parsePolicyPreset(value: string): PolicyPresetName {
  if (!isPolicyPresetName(value)) {
    throw new StartupFlagError(
      `Unknown policy preset "${value}". Expected one of: ${POLICY_PRESET_NAMES.join(', ')}.`,
    );
  }
  return value;
}

/** Parses `process.argv`-shaped input; the first two entries are skipped. */
export function parseStartupFlags(argv: readonly string[] = process.argv): StartupFlags {
  const args = argv.slice(2);
  const flags = createDefaultFlags();
  const positional: string[] = [];

  const takeValue = (name: string, inlineValue: string | undefined, index: number): [string, number] => {
    if (inlineValue !== undefined) {
      return [inlineValue, index];
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new StartupFlagError(`${name} requires a value.`);
    }
    return [next, index + 1];
  };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];

    if (arg === '--') {
      positional.push(...args.slice(index + 1));
      break;
    }

    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const [name, inlineValue] = splitInlineValue(arg);
    switch (name) {
      case '--debug':
        flags.debug = true;
        break;
      case '--auto-approve':
        flags.autoApprove = true;
        break;
      case '--usage':
        flags.usage = true;
        break;
      case '--model-review':
        flags.modelReview = true;
        break;
      case '--version':
        flags.showVersion = true;
        break;
      case '--config': {
        const [value, nextIndex] = takeValue(name, inlineValue, index);
        flags.configPath = value;
        index = nextIndex;
        break;
      }
      case '--policy': {
        const [value, nextIndex] = takeValue(name, inlineValue, index);
        flags.policyPreset = parsePolicyPreset(value);
        index = nextIndex;
        break;
      }
      default:
        throw new StartupFlagError(`Unknown flag: ${name}`);
    }
  }

  if (flags.autoApprove && flags.modelReview) {
    throw new StartupFlagError('--auto-approve and --model-review cannot be combined.');
  }

  if (positional.length === 1 && positional[0] === 'version') {
    flags.showVersion = true;
  } else {
    flags.query = positional.join(' ').trim();
  }

  return flags;
}

export default {
  parseStartupFlags,
};
