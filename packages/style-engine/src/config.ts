import { z } from 'zod';
import { LOG_LEVELS, StyleError } from '@docstyle/contracts';

export const DEFAULT_MAX_STYLE_NAME_LENGTH = 255;
/** Points that a 100% table width resolves to in style definitions. */
export const DEFAULT_TABLE_WIDTH_REFERENCE = 400;

export const StyleManagerConfigSchema = z
  .object({
    maxStyleNameLength: z.number().int().positive().default(DEFAULT_MAX_STYLE_NAME_LENGTH),
    logLevel: z.enum(LOG_LEVELS).default('warn'),
  })
  .strict();

export type StyleManagerConfig = z.infer<typeof StyleManagerConfigSchema>;
export type StyleManagerConfigInput = z.input<typeof StyleManagerConfigSchema>;

export const DefinitionParserOptionsSchema = z
  .object({
    tableWidthReference: z.number().positive().default(DEFAULT_TABLE_WIDTH_REFERENCE),
  })
  .strict();

export type DefinitionParserOptions = z.infer<typeof DefinitionParserOptionsSchema>;
export type DefinitionParserOptionsInput = z.input<typeof DefinitionParserOptionsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Parses configuration with defaults applied. Invalid configuration is a programming
 * error and throws an `INVALID_ARGUMENT` {@link StyleError}.
 */
export function parseConfig<T extends z.ZodTypeAny>(schema: T, input: unknown, operation: string): z.infer<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new StyleError('INVALID_ARGUMENT', `Invalid configuration: ${formatIssues(parsed.error)}`, {
      operation,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
