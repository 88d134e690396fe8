import {
  BLOCK_DIVIDER_PREFIX,
  isBlank,
  isSeparatorRow,
  startsWithAny,
  tokenize,
} from '../utils/lines.js';
import type { AdapterRef, EtherchannelGroup, Section } from '../types/topology.js';

export const ETHERCHANNEL_MARKER = 'ETHERCHANNEL';
export const REAL_ADAPTERS_MARKER = 'REAL ADAPTERS';
export const VIRTUAL_ADAPTERS_MARKER = 'VIRTUAL ADAPTERS';
export const NO_CONTROL_CHANNEL_MARKER = 'NO CONTROL CHANNEL';

export const SECTION_MARKERS = [
  ETHERCHANNEL_MARKER,
  REAL_ADAPTERS_MARKER,
  VIRTUAL_ADAPTERS_MARKER,
] as const;

const ADAPTER_PREFIX = 'ent';
const COLUMN_HEADER_PREFIX = 'adapter';

const ETHERCHANNEL_STOPS = [REAL_ADAPTERS_MARKER, VIRTUAL_ADAPTERS_MARKER, BLOCK_DIVIDER_PREFIX];
const REAL_ADAPTER_STOPS = [VIRTUAL_ADAPTERS_MARKER, BLOCK_DIVIDER_PREFIX, NO_CONTROL_CHANNEL_MARKER];
const VIRTUAL_ADAPTER_STOPS = [BLOCK_DIVIDER_PREFIX, NO_CONTROL_CHANNEL_MARKER];

interface TableScan<T> {
  stops: readonly string[];
  readRow: (tokens: string[]) => T | null;
}

/**
 * Reads the adapter table that follows a section marker line. Column
 * headers and rules right after the marker are skipped; the table ends at a
 * stop prefix, a blank line or `end`. Rows that `readRow` rejects are
 * skipped without ending the table.
 */
function scanTable<T>(
  lines: readonly string[],
  markerIndex: number,
  end: number,
  scan: TableScan<T>
): Section<T[]> {
  const rows: T[] = [];
  let cursor = markerIndex + 1;

  while (cursor < end) {
    const line = (lines[cursor] ?? '').trim();
    if (!isSeparatorRow(line) && !line.startsWith(COLUMN_HEADER_PREFIX)) break;
    cursor++;
  }

  while (cursor < end) {
    const line = (lines[cursor] ?? '').trim();
    if (isBlank(line) || startsWithAny(line, scan.stops)) break;

    if (!isSeparatorRow(line)) {
      const row = scan.readRow(tokenize(line));
      if (row !== null) rows.push(row);
    }
    cursor++;
  }

  return { value: rows, next: cursor };
}

function readAdapterName(tokens: string[]): string | null {
  const [name] = tokens;
  return name !== undefined && name.startsWith(ADAPTER_PREFIX) ? name : null;
}

function readAdapterRef(tokens: string[]): AdapterRef | null {
  const [adapterName, , hardwarePath] = tokens;
  if (adapterName === undefined || hardwarePath === undefined) return null;
  if (!adapterName.startsWith(ADAPTER_PREFIX)) return null;
  return { adapterName, hardwarePath };
}

export function parseEtherchannel(
  lines: readonly string[],
  markerIndex: number,
  end: number = lines.length
): Section<EtherchannelGroup> {
  const { value, next } = scanTable(lines, markerIndex, end, {
    stops: ETHERCHANNEL_STOPS,
    readRow: readAdapterName,
  });
  return { value: { adapters: value }, next };
}

export function parseRealAdapters(
  lines: readonly string[],
  markerIndex: number,
  end: number = lines.length
): Section<AdapterRef[]> {
  return scanTable(lines, markerIndex, end, {
    stops: REAL_ADAPTER_STOPS,
    readRow: readAdapterRef,
  });
}

export function parseVirtualAdapters(
  lines: readonly string[],
  markerIndex: number,
  end: number = lines.length
): Section<AdapterRef[]> {
  return scanTable(lines, markerIndex, end, {
    stops: VIRTUAL_ADAPTER_STOPS,
    readRow: readAdapterRef,
  });
}
