import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, OutputError, toError } from '../utils/errors.js';
import { deserializeHostConfigs, serializeHostConfigs } from './serialization.js';
import { parseJson, stringifyJson } from './json-codec.js';
import type { HostConfig } from '../types/topology.js';

const logger = createChildLogger('config-store');

export function saveConfigs(filePath: string, configs: readonly HostConfig[]): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, stringifyJson(serializeHostConfigs(configs)), 'utf-8');
    logger.info({ filePath, hostCount: configs.length }, 'Network configuration saved');
  } catch (err) {
    const cause = toError(err);
    throw new OutputError(
      ErrorCode.OUTPUT_WRITE_FAILED,
      `Error saving configuration to ${filePath}: ${cause.message}`,
      { cause, context: { filePath } }
    );
  }
}

export function loadConfigs(filePath: string): HostConfig[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const cause = toError(err);
    throw new OutputError(
      ErrorCode.PERSISTED_DATA_INVALID,
      `Error reading configuration from ${filePath}: ${cause.message}`,
      { cause, context: { filePath } }
    );
  }

  try {
    const configs = deserializeHostConfigs(parseJson(raw));
    logger.debug({ filePath, hostCount: configs.length }, 'Network configuration loaded');
    return configs;
  } catch (err) {
    const cause = toError(err);
    const issues = err instanceof ZodError ? err.issues.map(issue => issue.path.join('.')) : undefined;
    throw new OutputError(
      ErrorCode.PERSISTED_DATA_INVALID,
      `Invalid network configuration in ${filePath}: ${cause.message}`,
      { cause, context: { filePath, issues } }
    );
  }
}

export function writeTextFile(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
    logger.info({ filePath }, 'Text written');
  } catch (err) {
    const cause = toError(err);
    throw new OutputError(
      ErrorCode.OUTPUT_WRITE_FAILED,
      `Error writing ${filePath}: ${cause.message}`,
      { cause, context: { filePath } }
    );
  }
}
