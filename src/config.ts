/**
 * Pipeline configuration validation
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

export const PipelineConfigSchema = z.object({
  inputDir: z.string().min(1).default('data'),
  outputDir: z.string().min(1).default('transformed-data'),
  processes: z.coerce.number().int().positive().default(5),
  pathContains: z.string().min(1).optional(),
  skipExisting: z.boolean().default(false)
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze(PipelineConfigSchema.parse({}));

/**
 * Validate raw options (e.g. from the CLI) and fill in defaults
 * @throws ConfigurationError listing every invalid option
 */
export function loadPipelineConfig(raw: unknown = {}): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(issues.join('; '));
  }
  return result.data;
}
