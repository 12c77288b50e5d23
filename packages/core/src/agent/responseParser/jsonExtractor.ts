/** Pulls a JSON document out of model replies that wrap it in prose or code fences. */

export const escapeBareLineBreaks = (input: string): string | null => {
  if (!/(?:\r\n|\n|\r)/.test(input)) {
    return null;
  }

  return input.replace(/\r?\n/g, '\\n');
};

export const extractFromCodeFence = (input: string): string | null => {
  const fenceMatch = input.match(/```(?:json)?\s*([\s\S]+?)```/i);
  if (!fenceMatch) {
    return null;
  }

  return fenceMatch[1]?.trim() || null;
};

const CLOSING_BRACKETS = new Map<string, string>([
  ['{', '}'],
  ['[', ']'],
]);

const isClosingBracket = (char: string): boolean => char === '}' || char === ']';

/** Returns the first balanced `{…}` or `[…]` slice, skipping brackets inside JSON strings. */
export const extractBalancedJson = (input: string): string | null => {
  let inString = false;
  let escaped = false;
  const stack: string[] = [];
  let startIndex = -1;

  for (let index = 0; index < input.length; index += 1) {
    const char = input[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      continue;
    }

    const closer = CLOSING_BRACKETS.get(char);
    if (closer !== undefined) {
      if (stack.length === 0) {
        startIndex = index;
      }
      stack.push(closer);
      continue;
    }

    if (isClosingBracket(char) && stack.length > 0) {
      if (char !== stack.pop()) {
        return null;
      }
      if (stack.length === 0) {
        return input.slice(startIndex, index + 1);
      }
    }
  }

  return null;
};
