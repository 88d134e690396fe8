import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const SectionScopeSchema = z.enum(['block', 'file']);

export const ConfigSchema = z.object({
  input: z.object({
    dir: z.string().min(1).default('inputfile'),
    filePrefix: z.string().default('lssea'),
    fileSuffix: z.string().default('log'),
  }),
  output: z.object({
    configFile: z.string().min(1).default('network_config.json'),
    diagramFile: z.string().min(1).optional(),
  }),
  parsing: z.object({
    sectionScope: SectionScopeSchema.default('block'),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse({
    input: {
      dir: emptyToUndefined(env['LSSEA_INPUT_DIR']),
      filePrefix: env['LSSEA_FILE_PREFIX'],
      fileSuffix: env['LSSEA_FILE_SUFFIX'],
    },
    output: {
      configFile: emptyToUndefined(env['LSSEA_OUTPUT_FILE']),
      diagramFile: emptyToUndefined(env['LSSEA_DIAGRAM_FILE']),
    },
    parsing: {
      sectionScope: emptyToUndefined(env['LSSEA_SECTION_SCOPE']),
    },
    logging: {
      level: emptyToUndefined(env['LOG_LEVEL']),
    },
  });

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      { cause: result.error }
    );
  }
  return result.data;
}
