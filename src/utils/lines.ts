export const SEA_HEADER_PREFIX = 'SEA :';
export const BLOCK_DIVIDER_PREFIX = '+--';

export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter(token => token !== '');
}

/** True for table rules such as `-------         -------------`. */
export function isSeparatorRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== '' && /^[-\s]+$/.test(trimmed);
}

export function isBlank(line: string): boolean {
  return line.trim() === '';
}

export function isSeaHeader(line: string): boolean {
  return line.trim().startsWith(SEA_HEADER_PREFIX);
}

export function startsWithAny(line: string, prefixes: readonly string[]): boolean {
  return prefixes.some(prefix => line.startsWith(prefix));
}

/**
 * `key: value` rule. The first colon splits; everything after it, further
 * colons included, belongs to the value.
 */
export function splitProperty(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (trimmed.startsWith('+')) return null;

  const colon = trimmed.indexOf(':');
  if (colon === -1) return null;

  return {
    key: trimmed.slice(0, colon).trim(),
    value: trimmed.slice(colon + 1).trim(),
  };
}

export function findLine(
  lines: readonly string[],
  from: number,
  end: number,
  predicate: (line: string) => boolean
): number | null {
  for (let i = from; i < end; i++) {
    const line = lines[i];
    if (line !== undefined && predicate(line)) return i;
  }
  return null;
}
