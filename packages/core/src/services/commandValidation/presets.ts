import type { CommandPolicy } from './types.js';

const READ_ONLY_FILTERS = ['grep', 'awk', 'sort', 'uniq', 'head', 'tail', 'cut', 'wc'];

export const POLICY_PRESETS = {
  kubernetes: {
    allowedCommands: ['kubectl'],
    allowedSubCommands: ['get', 'describe', 'logs', 'top', 'explain'],
    allowedPipedCommands: READ_ONLY_FILTERS,
  },
  linux: {
    allowedCommands: [
      'uptime',
      'uname',
      'hostname',
      'whoami',
      'id',
      'df',
      'du',
      'free',
      'ps',
      'ls',
      'cat',
      'stat',
      'ss',
      'ip',
      'lsblk',
      'journalctl',
      'dmesg',
    ],
    allowedPipedCommands: READ_ONLY_FILTERS,
  },
} satisfies Record<string, CommandPolicy>;

export type PolicyPresetName = keyof typeof POLICY_PRESETS;

export const POLICY_PRESET_NAMES: readonly PolicyPresetName[] = ['kubernetes', 'linux'];

export function isPolicyPresetName(value: string): value is PolicyPresetName {
  return Object.prototype.hasOwnProperty.call(POLICY_PRESETS, value);
}
