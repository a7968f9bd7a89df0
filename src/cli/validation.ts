/**
 * CLI argument validation
 *
 * Namespace and deployment names become directory names under the okteto
 * folder, so the CLI only accepts single, plain path segments.
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../utils/errors.js';

export const PathSegmentSchema = z
  .string()
  .min(1, 'must not be empty')
  .refine((value) => value !== '.' && value !== '..', 'must not be "." or ".."')
  .refine((value) => !/[\\/]/.test(value), 'must not contain path separators')
  .refine((value) => !value.includes('\0'), 'must not contain NUL characters');

export const OutputFormatSchema = z.enum(['table', 'json']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const PathsReportSchema = z.object({
  home: z.string(),
  appHome: z.string(),
  kubeconfig: z.string(),
  timeout: z.string(),
  namespace: z.string().optional(),
  deployment: z.string().optional()
});

export type PathsReport = z.infer<typeof PathsReportSchema>;

/**
 * Validate a namespace or deployment name
 *
 * @param argument - Argument name used in the error message
 * @throws InvalidArgumentError with the first failing rule
 */
export function parsePathSegment(argument: string, value: string): string {
  const result = PathSegmentSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(argument, `"${value}" ${result.error.issues[0].message}`);
  }
  return result.data;
}

export function parseOutputFormat(value: string): OutputFormat {
  const result = OutputFormatSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError('output format', `"${value}" (expected one of: ${OutputFormatSchema.options.join(', ')})`);
  }
  return result.data;
}
