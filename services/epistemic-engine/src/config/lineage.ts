/**
 * Source lineage configuration: which upstream providers each source
 * ultimately derives its data from.
 */
import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigValidationError } from '../errors';

export const LineageConfigSchema = z
  .object({
    sources: z.record(z.string().trim().min(1), z.array(z.string().trim().min(1))),
  })
  .strict();

export type LineageMap = Readonly<Record<string, readonly string[]>>;

export function parseLineageConfig(data: unknown): LineageMap {
  const result = LineageConfigSchema.safeParse(data);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(result.error, 'lineage config');
  }
  return result.data.sources;
}

/**
 * @throws ConfigValidationError if the file is missing, not JSON, or invalid
 */
export function loadLineageFile(filePath: string): LineageMap {
  if (!existsSync(filePath)) {
    throw new ConfigValidationError(`lineage file not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`lineage file ${filePath} is not valid JSON: ${reason}`);
  }
  return parseLineageConfig(data);
}
