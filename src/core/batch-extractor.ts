import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs';
import * as path from 'path';
import { extractFromFile } from './config-assembler.js';
import { createChildLogger, logFileOutcome } from '../utils/logger.js';
import { ErrorCode, FileAccessError, TopologyError, toError } from '../utils/errors.js';
import type { HostConfig, ParseOptions } from '../types/topology.js';

const logger = createChildLogger('batch-extractor');

export interface FileSummary {
  file: string;
  hostname: string | null;
  seaCount: number;
}

export interface FileFailure {
  file: string;
  error: string;
  code: ErrorCode;
}

export interface BatchResult {
  configs: HostConfig[];
  processed: FileSummary[];
  failed: FileFailure[];
}

export interface BatchExtractorEvents {
  fileProcessed: (summary: FileSummary, config: HostConfig) => void;
  fileFailed: (failure: FileFailure) => void;
}

/**
 * Lists `<prefix>*<suffix>` files directly inside `inputDir`, sorted by name.
 */
export function discoverLogFiles(inputDir: string, prefix: string, suffix: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(inputDir, { withFileTypes: true });
  } catch (err) {
    const cause = toError(err);
    throw new FileAccessError(
      ErrorCode.INPUT_DIR_MISSING,
      `Directory '${inputDir}' does not exist or cannot be read`,
      { cause, context: { inputDir } }
    );
  }

  return entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .filter(name => name.length >= prefix.length + suffix.length)
    .filter(name => name.startsWith(prefix) && name.endsWith(suffix))
    .sort()
    .map(name => path.join(inputDir, name));
}

export class BatchExtractor extends EventEmitter<BatchExtractorEvents> {
  private readonly options: ParseOptions;

  constructor(options: ParseOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Extracts every file in the given order. A file that cannot be read or
   * parsed is reported and left out; the others are unaffected.
   */
  run(files: readonly string[]): BatchResult {
    const result: BatchResult = { configs: [], processed: [], failed: [] };
    logger.info({ fileCount: files.length }, 'Starting extraction');

    for (const filePath of files) {
      const file = path.basename(filePath);

      try {
        const config = extractFromFile(filePath, this.options);
        const summary: FileSummary = {
          file,
          hostname: config.hostname,
          seaCount: config.seaSections.length,
        };

        result.configs.push(config);
        result.processed.push(summary);
        logFileOutcome(file, 'processed', { hostname: summary.hostname, seaCount: summary.seaCount });
        this.emit('fileProcessed', summary, config);
      } catch (err) {
        const error = TopologyError.fromError(toError(err));
        const failure: FileFailure = { file, error: error.message, code: error.code };

        result.failed.push(failure);
        logFileOutcome(file, 'failed', { err: error, code: error.code });
        this.emit('fileFailed', failure);
      }
    }

    logger.info(
      { processed: result.processed.length, failed: result.failed.length },
      'Extraction finished'
    );
    return result;
  }
}
