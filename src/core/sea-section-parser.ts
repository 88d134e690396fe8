import {
  BLOCK_DIVIDER_PREFIX,
  findLine,
  isBlank,
  isSeaHeader,
  splitProperty,
  startsWithAny,
} from '../utils/lines.js';
import {
  ETHERCHANNEL_MARKER,
  REAL_ADAPTERS_MARKER,
  SECTION_MARKERS,
  VIRTUAL_ADAPTERS_MARKER,
  parseEtherchannel,
  parseRealAdapters,
  parseVirtualAdapters,
} from './adapter-sections.js';
import type {
  AdapterRef,
  EtherchannelGroup,
  ParseOptions,
  SeaRecord,
  Section,
} from '../types/topology.js';

const SEA_NAME_PATTERN = /^\s*SEA\s*:\s*(\S+)/;

/**
 * Finds the next `SEA :` header at or after `from` that carries a name.
 * A header without a name token does not open a SEA block.
 */
export function findSeaHeader(
  lines: readonly string[],
  from: number
): Section<string> | null {
  for (let i = from; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!isSeaHeader(line)) continue;

    const seaName = SEA_NAME_PATTERN.exec(line)?.[1];
    if (seaName !== undefined) {
      return { value: seaName, next: i + 1 };
    }
  }
  return null;
}

function endsPropertyBlock(line: string): boolean {
  return (
    isBlank(line) ||
    isSeaHeader(line) ||
    startsWithAny(line, [BLOCK_DIVIDER_PREFIX, ...SECTION_MARKERS])
  );
}

export function parseProperties(
  lines: readonly string[],
  from: number
): Section<Map<string, string>> {
  const properties = new Map<string, string>();
  let cursor = from;

  while (cursor < lines.length) {
    const line = (lines[cursor] ?? '').trim();
    if (endsPropertyBlock(line)) break;

    const property = splitProperty(line);
    if (property) {
      properties.set(property.key, property.value);
    }
    cursor++;
  }

  return { value: properties, next: cursor };
}

/**
 * Locates `marker` in [from, end) and hands the marker line to `parse`.
 * Absence is not an error: the cursor simply stays where it was.
 */
function parseOptionalSection<T>(
  lines: readonly string[],
  from: number,
  end: number,
  marker: string,
  parse: (lines: readonly string[], markerIndex: number, end: number) => Section<T>
): Section<T> | null {
  const markerIndex = findLine(lines, from, end, line => line.includes(marker));
  if (markerIndex === null) return null;
  return parse(lines, markerIndex, end);
}

/**
 * Parses the SEA block whose header is the first named `SEA :` line at or
 * after `start`.
 *
 * Returns the record together with the index of the first line past the
 * block, or `null` when no header exists from `start` on. The function keeps
 * no state between calls; the same input always yields the same result.
 */
export function parseSeaSection(
  lines: readonly string[],
  start: number,
  options: ParseOptions = {}
): Section<SeaRecord> | null {
  const header = findSeaHeader(lines, start);
  if (!header) return null;

  const properties = parseProperties(lines, header.next);
  let cursor = properties.next;

  const end = options.sectionScope === 'file'
    ? lines.length
    : findLine(lines, cursor, lines.length, isSeaHeader) ?? lines.length;

  let etherchannel: EtherchannelGroup | null = null;
  const etherchannelSection = parseOptionalSection(lines, cursor, end, ETHERCHANNEL_MARKER, parseEtherchannel);
  if (etherchannelSection) {
    etherchannel = etherchannelSection.value;
    cursor = etherchannelSection.next;
  }

  let realAdapters: AdapterRef[] = [];
  const realSection = parseOptionalSection(lines, cursor, end, REAL_ADAPTERS_MARKER, parseRealAdapters);
  if (realSection) {
    realAdapters = realSection.value;
    cursor = realSection.next;
  }

  let virtualAdapters: AdapterRef[] = [];
  const virtualSection = parseOptionalSection(lines, cursor, end, VIRTUAL_ADAPTERS_MARKER, parseVirtualAdapters);
  if (virtualSection) {
    virtualAdapters = virtualSection.value;
    cursor = virtualSection.next;
  }

  return {
    value: {
      seaName: header.value,
      properties: properties.value,
      etherchannel,
      realAdapters,
      virtualAdapters,
    },
    next: cursor,
  };
}
