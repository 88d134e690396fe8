#!/usr/bin/env node
import { parseTopologyAction, type TopologyAction } from './commands/actions.js';
import { TopologyCommands } from './commands/topology-commands.js';
import { loadConfigFromEnv, type Config } from './config/index.js';
import { setLogLevel } from './utils/logger.js';
import { ErrorCode, getErrorCode } from './utils/errors.js';

function printUsage(): void {
  console.log(`
Usage: lssea-topology <action> [params-json]

Actions:
  extract [json]    Parse lssea*log files and save network_config.json
                    (params: inputDir, outputFile, diagramFile)
  render [json]     Render a saved configuration as a text diagram
                    (params: inputFile, outputFile)
  summary [json]    List hosts and SEAs of a saved configuration
                    (params: inputFile)

Examples:
  lssea-topology extract
  lssea-topology extract '{"inputDir":"./logs","diagramFile":"network_diagram.txt"}'
  lssea-topology render '{"inputFile":"network_config.json"}'

Environment:
  LSSEA_INPUT_DIR       Directory holding the log files (default: inputfile)
  LSSEA_FILE_PREFIX     Log file name prefix (default: lssea)
  LSSEA_FILE_SUFFIX     Log file name suffix (default: log)
  LSSEA_OUTPUT_FILE     JSON output path (default: network_config.json)
  LSSEA_DIAGRAM_FILE    Text diagram path written by extract (optional)
  LSSEA_SECTION_SCOPE   block|file, how far section markers are searched (default: block)
  LOG_LEVEL             trace|debug|info|warn|error|fatal|silent (default: info)
`);
}

function fail(payload: Record<string, unknown>): never {
  console.error(JSON.stringify({ success: false, ...payload }, null, 2));
  process.exit(1);
}

function main(): void {
  const action = process.argv[2];
  const paramsRaw = process.argv[3];

  if (!action || action === '--help' || action === '-h') {
    printUsage();
    process.exit(action ? 0 : 1);
  }

  let config: Config;
  try {
    config = loadConfigFromEnv();
  } catch (err) {
    fail({ error: err instanceof Error ? err.message : String(err), code: getErrorCode(err) });
  }
  setLogLevel(config.logging.level);

  let params: unknown;
  if (paramsRaw) {
    try {
      params = JSON.parse(paramsRaw);
    } catch {
      fail({ error: `Invalid JSON params: ${paramsRaw}`, code: ErrorCode.INVALID_PARAMETER });
    }
  }

  let parsed: TopologyAction;
  try {
    parsed = parseTopologyAction(action, params);
  } catch (err) {
    fail({
      error: err instanceof Error ? err.message : String(err),
      code: getErrorCode(err),
      action,
      params,
    });
  }

  const result = new TopologyCommands(config).execute(parsed);
  console.log(JSON.stringify(result, null, 2));
  process.exit(result.success ? 0 : 1);
}

try {
  main();
} catch (err) {
  fail({ error: `Unexpected error: ${err instanceof Error ? err.message : String(err)}` });
}
