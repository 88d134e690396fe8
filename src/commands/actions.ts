import { z } from 'zod';
import { ErrorCode, TopologyError } from '../utils/errors.js';

const filePathSchema = z.string().min(1, 'Path must not be empty');

export const TopologyActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('extract'),
    params: z.object({
      inputDir: filePathSchema.optional(),
      outputFile: filePathSchema.optional(),
      diagramFile: filePathSchema.optional(),
    }).optional(),
  }),
  z.object({
    action: z.literal('render'),
    params: z.object({
      inputFile: filePathSchema.optional(),
      outputFile: filePathSchema.optional(),
    }).optional(),
  }),
  z.object({
    action: z.literal('summary'),
    params: z.object({
      inputFile: filePathSchema.optional(),
    }).optional(),
  }),
]);

export type TopologyAction = z.infer<typeof TopologyActionSchema>;

export function parseTopologyAction(action: unknown, params: unknown): TopologyAction {
  const result = TopologyActionSchema.safeParse({ action, params });
  if (!result.success) {
    throw new TopologyError(
      ErrorCode.INVALID_PARAMETER,
      `Invalid action or params: ${result.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')}`,
      { cause: result.error, context: { action } }
    );
  }
  return result.data;
}

export interface CommandResponse {
  success: boolean;
  action: string;
  data?: unknown;
  error?: string | undefined;
  code?: ErrorCode | undefined;
  timestamp: string;
}
