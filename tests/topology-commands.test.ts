import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { TopologyCommands } from '../src/commands/topology-commands.js';
import { TopologyActionSchema, parseTopologyAction } from '../src/commands/actions.js';
import { ErrorCode, TopologyError } from '../src/utils/errors.js';
import { loadConfigFromEnv } from '../src/config/index.js';
import { HOST_A_LOG, HOST_B_LOG, createTempDir, removeTempDir, writeLogs } from './helpers.js';

const EXPECTED_DIAGRAM = [
  'NETWORK CONFIGURATION DIAGRAM',
  '='.repeat(50),
  '',
  'HOSTNAME: vios-a',
  '-'.repeat(30),
  '',
  'SEA 1: ent10',
  '  └── REAL ADAPTERS:',
  '      ├── ent0 (P1)',
  '',
  'HOSTNAME: vios-b',
  '-'.repeat(30),
  '',
  'SEA 1: ent20',
  '',
  'SEA 2: ent21',
  '',
].join('\n') + '\n';

describe('TopologyCommands', () => {
  let tempDir: string;
  let inputDir: string;
  let outputFile: string;
  let commands: TopologyCommands;

  beforeEach(() => {
    tempDir = createTempDir();
    inputDir = path.join(tempDir, 'inputfile');
    outputFile = path.join(tempDir, 'out', 'network_config.json');
    fs.mkdirSync(inputDir);
    writeLogs(inputDir, { 'lssea_b.log': HOST_B_LOG, 'lssea_a.log': HOST_A_LOG });
    commands = new TopologyCommands(loadConfigFromEnv({
      LSSEA_INPUT_DIR: inputDir,
      LSSEA_OUTPUT_FILE: outputFile,
    }));
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  describe('extract', () => {
    it('should save the batch in the persisted shape', () => {
      const diagramFile = path.join(tempDir, 'out', 'network_diagram.txt');
      const response = commands.execute({ action: 'extract', params: { diagramFile } });

      expect(response).toEqual({
        success: true,
        action: 'extract',
        data: {
          files: [
            { file: 'lssea_a.log', hostname: 'vios-a', seaCount: 1 },
            { file: 'lssea_b.log', hostname: 'vios-b', seaCount: 2 },
          ],
          failed: [],
          outputFile,
          diagramFile,
        },
        timestamp: expect.any(String),
      });

      const emptySea = { properties: {}, etherchannel: null, real_adapters: [], virtual_adapters: [] };
      expect(JSON.parse(fs.readFileSync(outputFile, 'utf-8'))).toEqual([
        {
          hostname: 'vios-a',
          sea_sections: [{
            sea_name: 'ent10',
            properties: { State: 'PRIMARY' },
            etherchannel: null,
            real_adapters: [{ adapter_name: 'ent0', hardware_path: 'P1' }],
            virtual_adapters: [],
          }],
        },
        {
          hostname: 'vios-b',
          sea_sections: [
            { sea_name: 'ent20', ...emptySea },
            { sea_name: 'ent21', ...emptySea },
          ],
        },
      ]);
      expect(fs.readFileSync(diagramFile, 'utf-8')).toBe(EXPECTED_DIAGRAM);
    });

    it('should fail when no log files match', () => {
      const emptyDir = path.join(tempDir, 'empty');
      fs.mkdirSync(emptyDir);

      const response = commands.execute({ action: 'extract', params: { inputDir: emptyDir } });

      expect(response.success).toBe(false);
      expect(response.error).toBe(`No lssea*log files found in '${emptyDir}'`);
      expect(response.code).toBe(ErrorCode.NO_INPUT_FILES);
      expect(fs.existsSync(outputFile)).toBe(false);
    });

    it('should fail when the input directory is missing', () => {
      const missing = path.join(tempDir, 'missing');

      const response = commands.execute({ action: 'extract', params: { inputDir: missing } });

      expect(response.success).toBe(false);
      expect(response.error).toBe(`Directory '${missing}' does not exist or cannot be read`);
      expect(response.code).toBe(ErrorCode.INPUT_DIR_MISSING);
    });
  });

  describe('render', () => {
    it('should render a saved configuration', () => {
      commands.execute({ action: 'extract' });

      const response = commands.execute({ action: 'render' });

      expect(response.success).toBe(true);
      expect(response.data).toEqual({ diagram: EXPECTED_DIAGRAM });
    });

    it('should report an invalid configuration file', () => {
      fs.mkdirSync(path.dirname(outputFile), { recursive: true });
      fs.writeFileSync(outputFile, JSON.stringify([{ hostname: 'vios-a', sea_sections: null }]));

      const response = commands.execute({ action: 'render' });

      expect(response.success).toBe(false);
      expect(response.error?.startsWith(`Invalid network configuration in ${outputFile}: `)).toBe(true);
      expect(response.code).toBe(ErrorCode.PERSISTED_DATA_INVALID);
    });
  });

  describe('summary', () => {
    it('should list hosts with their SEAs and adapter counts', () => {
      commands.execute({ action: 'extract' });

      const response = commands.execute({ action: 'summary', params: { inputFile: outputFile } });

      expect(response.data).toEqual({
        hosts: [
          { hostname: 'vios-a', seaNames: ['ent10'], realAdapterCount: 1, virtualAdapterCount: 0 },
          { hostname: 'vios-b', seaNames: ['ent20', 'ent21'], realAdapterCount: 0, virtualAdapterCount: 0 },
        ],
      });
    });
  });
});

describe('TopologyActionSchema', () => {
  it('should accept an action without params', () => {
    expect(TopologyActionSchema.parse({ action: 'render' })).toEqual({ action: 'render' });
  });

  it('should reject unknown actions and empty paths', () => {
    expect(TopologyActionSchema.safeParse({ action: 'draw' }).success).toBe(false);
    expect(TopologyActionSchema.safeParse({ action: 'extract', params: { inputDir: '' } }).success).toBe(false);
  });
});

describe('parseTopologyAction', () => {
  it('should return the validated action', () => {
    expect(parseTopologyAction('summary', { inputFile: 'network_config.json' })).toEqual({
      action: 'summary',
      params: { inputFile: 'network_config.json' },
    });
  });

  it('should raise INVALID_PARAMETER for bad params', () => {
    let caught: unknown;
    try {
      parseTopologyAction('extract', { inputDir: '' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TopologyError);
    if (caught instanceof TopologyError) {
      expect(caught.code).toBe(ErrorCode.INVALID_PARAMETER);
      expect(caught.message).toBe('Invalid action or params: params.inputDir: Path must not be empty');
    }
  });

  it('should raise INVALID_PARAMETER for an unknown action', () => {
    expect(() => parseTopologyAction('draw', undefined)).toThrow(TopologyError);
  });
});
