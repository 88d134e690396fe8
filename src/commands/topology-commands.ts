import { BatchExtractor, discoverLogFiles } from '../core/batch-extractor.js';
import { renderTextDiagram } from '../core/text-diagram.js';
import { loadConfigs, saveConfigs, writeTextFile } from '../infra/config-store.js';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, TopologyError, getErrorCode, toError } from '../utils/errors.js';
import type { Config } from '../config/index.js';
import type { CommandResponse, TopologyAction } from './actions.js';

const logger = createChildLogger('topology-commands');

export class TopologyCommands {
  private readonly config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  execute(action: TopologyAction): CommandResponse {
    logger.info({ action: action.action, params: action.params ?? {} }, 'Executing action');

    try {
      switch (action.action) {
        case 'extract':
          return this.handleExtract(action.params ?? {});
        case 'render':
          return this.handleRender(action.params ?? {});
        case 'summary':
          return this.handleSummary(action.params ?? {});
      }
    } catch (err) {
      const error = TopologyError.fromError(toError(err));
      return this.errorResponse(action.action, error);
    }
  }

  private handleExtract(params: {
    inputDir?: string | undefined;
    outputFile?: string | undefined;
    diagramFile?: string | undefined;
  }): CommandResponse {
    const inputDir = params.inputDir ?? this.config.input.dir;
    const outputFile = params.outputFile ?? this.config.output.configFile;
    const diagramFile = params.diagramFile ?? this.config.output.diagramFile;

    const files = discoverLogFiles(inputDir, this.config.input.filePrefix, this.config.input.fileSuffix);
    if (files.length === 0) {
      return this.errorResponse('extract', new TopologyError(
        ErrorCode.NO_INPUT_FILES,
        `No ${this.config.input.filePrefix}*${this.config.input.fileSuffix} files found in '${inputDir}'`,
        { context: { inputDir } }
      ));
    }

    const extractor = new BatchExtractor({ sectionScope: this.config.parsing.sectionScope });
    const result = extractor.run(files);

    saveConfigs(outputFile, result.configs);
    if (diagramFile !== undefined) {
      writeTextFile(diagramFile, renderTextDiagram(result.configs));
    }

    return this.successResponse('extract', {
      files: result.processed,
      failed: result.failed,
      outputFile,
      diagramFile: diagramFile ?? null,
    });
  }

  private handleRender(params: {
    inputFile?: string | undefined;
    outputFile?: string | undefined;
  }): CommandResponse {
    const inputFile = params.inputFile ?? this.config.output.configFile;
    const diagram = renderTextDiagram(loadConfigs(inputFile));

    if (params.outputFile !== undefined) {
      writeTextFile(params.outputFile, diagram);
      return this.successResponse('render', { outputFile: params.outputFile });
    }
    return this.successResponse('render', { diagram });
  }

  private handleSummary(params: { inputFile?: string | undefined }): CommandResponse {
    const inputFile = params.inputFile ?? this.config.output.configFile;
    const configs = loadConfigs(inputFile);

    return this.successResponse('summary', {
      hosts: configs.map(c => ({
        hostname: c.hostname,
        seaNames: c.seaSections.map(s => s.seaName),
        realAdapterCount: c.seaSections.reduce((n, s) => n + s.realAdapters.length, 0),
        virtualAdapterCount: c.seaSections.reduce((n, s) => n + s.virtualAdapters.length, 0),
      })),
    });
  }

  private successResponse(action: string, data: unknown): CommandResponse {
    return {
      success: true,
      action,
      data,
      timestamp: new Date().toISOString(),
    };
  }

  private errorResponse(action: string, error: Error): CommandResponse {
    logger.error({ action, err: error }, 'Action failed');
    return {
      success: false,
      action,
      error: error.message,
      code: getErrorCode(error),
      timestamp: new Date().toISOString(),
    };
  }
}
