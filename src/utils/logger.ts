import { pino, destination, multistream, type Logger, type DestinationStream, type Level } from 'pino';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export type UtilLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly UtilLogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLogLevel(value: string | undefined): UtilLogLevel {
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

const logLevel = resolveLogLevel(process.env['LOG_LEVEL']);

const defaultLogDir = path.join(os.homedir(), '.lssea-topology', 'logs');
const logDir = process.env['LSSEA_LOG_DIR'] ?? defaultLogDir;
// Opt-in: LSSEA_LOG_FILE=true
const logToFile = process.env['LSSEA_LOG_FILE'] === 'true';

let fileLoggingActive = false;
let resolvedLogPath = '';

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0];
  return path.join(logDir, `lssea-topology-${date}.log`);
}

// stdout carries the CLI's JSON responses, so log lines go to stderr
// Streams accept everything; the logger level does the filtering
const streams: Array<{ stream: DestinationStream; level: Level }> = [
  { stream: process.stderr, level: 'trace' },
];

if (logToFile) {
  try {
    fs.mkdirSync(logDir, { recursive: true });
    resolvedLogPath = getLogFilePath();
    streams.push({
      stream: destination({ dest: resolvedLogPath, sync: true, mkdir: true }),
      level: 'trace',
    });
    fileLoggingActive = true;
  } catch (err) {
    process.stderr.write(`File logging disabled: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

logger.debug({
  logFile: fileLoggingActive ? resolvedLogPath : 'stderr only',
  logDir,
  nodeVersion: process.version,
  pid: process.pid,
}, 'Logger initialized');

const childLoggers: Logger[] = [];

export function createChildLogger(module: string): Logger {
  const child = logger.child({ module });
  childLoggers.push(child);
  return child;
}

/**
 * Children copy their level when created, so module loggers are updated
 * alongside the root.
 */
export function setLogLevel(level: UtilLogLevel): void {
  logger.level = level;
  for (const child of childLoggers) {
    child.level = level;
  }
}

const fileLogger = createChildLogger('file-outcome');

/**
 * Log one per-file outcome of an extraction run.
 */
export function logFileOutcome(
  file: string,
  result: 'processed' | 'failed',
  details?: Record<string, unknown>
): void {
  const entry = { file, result, ...details };

  if (result === 'failed') {
    fileLogger.error(entry, `Failed to extract configuration from ${file}`);
  } else {
    fileLogger.info(entry, `Processed ${file}`);
  }
}
