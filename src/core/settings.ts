import { z } from 'zod';
import { DEFAULT_ATTRIBUTE_PREFIX, DEFAULT_CONTENT_PREFIX } from './encoder';
import { SettingsError } from './errors';

export const conversionOptionsSchema = z.object({
  /** Prepended to `content`, the key that holds a container's own text. */
  contentPrefix: z.string().default(DEFAULT_CONTENT_PREFIX),
  /** Prepended to attribute names when they become labels. */
  attributePrefix: z.string().default(DEFAULT_ATTRIBUTE_PREFIX),
  /** Indent unit; empty for compact output. */
  indent: z.string().default(''),
  singleLine: z.boolean().default(false),
});

export type ConversionOptions = z.infer<typeof conversionOptionsSchema>;
export type ConversionOptionsInput = z.input<typeof conversionOptionsSchema>;

export const DEFAULT_OPTIONS: ConversionOptions = conversionOptionsSchema.parse({});

/**
 * Validates options that arrive untyped (workspace settings, a config file).
 * `undefined` and `null` mean "all defaults".
 */
export function parseConversionOptions(value: unknown, source: string): ConversionOptions {
  const result = conversionOptionsSchema.safeParse(value ?? {});
  if (!result.success) {
    throw new SettingsError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
