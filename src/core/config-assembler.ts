import * as fs from 'fs';
import { extractHostname } from './hostname-extractor.js';
import { parseSeaSection } from './sea-section-parser.js';
import { isSeaHeader, splitLines } from '../utils/lines.js';
import { ErrorCode, FileAccessError, toError } from '../utils/errors.js';
import type { HostConfig, ParseOptions, SeaRecord } from '../types/topology.js';

// Invalid byte sequences become U+FFFD instead of failing the read
const permissiveDecoder = new TextDecoder('utf-8', { fatal: false });

export function assembleHostConfig(text: string, options: ParseOptions = {}): HostConfig {
  const lines = splitLines(text);
  const hostname = extractHostname(lines);

  const seaSections: SeaRecord[] = [];
  let cursor = 0;

  while (cursor < lines.length) {
    const section = isSeaHeader(lines[cursor] ?? '')
      ? parseSeaSection(lines, cursor, options)
      : null;

    if (section) {
      seaSections.push(section.value);
      cursor = section.next;
    } else {
      cursor++;
    }
  }

  return { hostname, seaSections };
}

export function readLogFile(filePath: string): string {
  try {
    return permissiveDecoder.decode(fs.readFileSync(filePath));
  } catch (err) {
    const cause = toError(err);
    throw new FileAccessError(
      ErrorCode.FILE_READ_FAILED,
      `Error reading file ${filePath}: ${cause.message}`,
      { cause, context: { filePath } }
    );
  }
}

export function extractFromFile(filePath: string, options: ParseOptions = {}): HostConfig {
  return assembleHostConfig(readLogFile(filePath), options);
}
