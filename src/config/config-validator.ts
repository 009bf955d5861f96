import { z } from 'zod';
import {
  RenderConfigSchema,
  RenderConfigOverrideSchema,
  ConfigValidationError,
  RenderConfig,
  RenderConfigOverride
} from './config-schema';

export class ConfigValidator {
  /**
   * Validate complete configuration, filling in defaults
   */
  validate(config: unknown): RenderConfig {
    try {
      return RenderConfigSchema.parse(config ?? {});
    } catch (error) {
      if (error instanceof z.ZodError) {
        const details = this.formatZodErrors(error);
        throw new ConfigValidationError(
          `Configuration validation failed: ${details}`,
          details
        );
      }
      throw error;
    }
  }

  /**
   * Validate an override without applying defaults for absent fields
   */
  validatePartial(config: unknown): RenderConfigOverride {
    try {
      return RenderConfigOverrideSchema.parse(config ?? {});
    } catch (error) {
      if (error instanceof z.ZodError) {
        const details = this.formatZodErrors(error);
        throw new ConfigValidationError(
          `Partial configuration validation failed: ${details}`,
          details
        );
      }
      throw error;
    }
  }

  /**
   * Check if a configuration is valid without throwing
   */
  isValid(config: unknown): boolean {
    return RenderConfigSchema.safeParse(config ?? {}).success;
  }

  /**
   * Get validation errors without throwing
   */
  getValidationErrors(config: unknown): string[] | null {
    const result = RenderConfigSchema.safeParse(config ?? {});
    if (result.success) {
      return null;
    }
    return this.formatZodErrors(result.error).split('\n');
  }

  /**
   * Format Zod validation errors into readable messages
   */
  private formatZodErrors(error: z.ZodError): string {
    const errors = error.errors.map(err => {
      const path = err.path.join('.');
      let message = err.message;

      if (err.code === 'invalid_type') {
        message = `Expected ${err.expected}, received ${err.received}`;
      } else if (err.code === 'invalid_enum_value') {
        message = `Expected one of ${err.options.join(', ')}, received '${String(err.received)}'`;
      } else if (err.code === 'too_small' && err.type === 'number') {
        message = Number(err.minimum) === 0 && !err.inclusive
          ? 'Number must be positive'
          : `Number must be greater than or equal to ${err.minimum}`;
      }

      return path ? `${path}: ${message}` : message;
    });

    return errors.join('\n');
  }
}
