import { z } from 'zod';

const DelimiterSchema = z
  .string()
  .min(1, 'Delimiter cannot be empty')
  .refine(value => !/[\s=]/.test(value), 'Delimiter cannot contain whitespace or "="');

// Partial file lookup
export const PartialsConfigSchema = z.object({
  directory: z.string().min(1).optional(),
  extension: z.string().default('mustache')
});

// Complete render configuration schema
export const RenderConfigSchema = z.object({
  escapeHtml: z.boolean().default(true),
  onMissingKey: z.enum(['ignore', 'warn', 'error']).default('ignore'),
  keepUnresolved: z.boolean().default(false),
  delimiters: z.tuple([DelimiterSchema, DelimiterSchema]).default(['{{', '}}']),
  maxDepth: z.number().int().positive().default(100),
  enableCache: z.boolean().default(true),
  partials: PartialsConfigSchema.default({})
});

// Overrides carry no defaults, so absent nested fields never mask lower sources
export const RenderConfigOverrideSchema = RenderConfigSchema.extend({
  partials: z.object({
    directory: z.string().min(1).optional(),
    extension: z.string().optional()
  })
}).partial();

// Type exports
export type RenderConfigOverride = z.infer<typeof RenderConfigOverrideSchema>;
export type PartialsConfig = z.infer<typeof PartialsConfigSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type RenderConfigInput = z.input<typeof RenderConfigSchema>;

// Validation error class
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
