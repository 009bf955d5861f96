import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { EventEmitter } from 'events';
import { ConfigValidator } from './config-validator';
import { RenderConfig, ConfigValidationError } from './config-schema';
import { deepmerge, isPlainObject, PlainObject, setNestedValue } from '../shared/utils';
import { Logger, PartialSource, RenderOptions } from '../shared/types';
import { FilePartialSource, toPartialSource } from '../template/partials';

export interface ConfigLoaderOptions {
  searchPaths?: string[];
  configFiles?: string[];
  envPrefix?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigLoader extends EventEmitter {
  private config: RenderConfig | null = null;
  private validator: ConfigValidator;
  private options: Required<ConfigLoaderOptions>;

  constructor(options: ConfigLoaderOptions = {}) {
    super();
    this.validator = new ConfigValidator();
    this.options = {
      searchPaths: options.searchPaths || ['.', '.stache'],
      configFiles: options.configFiles || [
        'stache.config.json',
        'stache.config.yml',
        'stache.config.yaml',
        '.stacherc'
      ],
      envPrefix: options.envPrefix || 'STACHE_',
      cwd: options.cwd || process.cwd(),
      env: options.env || process.env
    };
  }

  /**
   * Load configuration from all sources
   */
  async load(overrides: unknown = {}): Promise<RenderConfig> {
    try {
      // 1. Load configuration file, if any
      const fileConfig = await this.loadBaseConfig();

      // 2. Load environment variables
      const envConfig = this.loadEnvironmentVariables();

      // 3. Merge with precedence file < env < overrides
      const merged = deepmerge.all([fileConfig, envConfig, this.validator.validatePartial(overrides)]);

      // 4. Validate and fill defaults
      const validated = this.validator.validate(merged);

      // 5. Resolve paths
      const final = this.applyDefaults(validated);

      this.config = final;
      this.emit('config:loaded', final);

      return final;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        throw error;
      }
      throw new Error(`Failed to load configuration: ${error}`);
    }
  }

  /**
   * Get current configuration
   */
  get(): RenderConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call load() first.');
    }
    return this.config;
  }

  /**
   * Load base configuration from the first config file found
   */
  private async loadBaseConfig(): Promise<PlainObject> {
    for (const searchPath of this.options.searchPaths) {
      for (const configFile of this.options.configFiles) {
        const fullPath = path.resolve(this.options.cwd, searchPath, configFile);

        if (await this.fileExists(fullPath)) {
          return await this.loadConfigFile(fullPath);
        }
      }
    }

    return {};
  }

  /**
   * Load configuration file based on extension
   */
  private async loadConfigFile(filePath: string): Promise<PlainObject> {
    const ext = path.extname(filePath).toLowerCase();
    const content = await fs.readFile(filePath, 'utf-8');

    let parsed: unknown;
    if (ext === '.yml' || ext === '.yaml') {
      try {
        parsed = yaml.load(content);
      } catch (error) {
        throw new Error(`Invalid YAML in ${filePath}: ${error}`);
      }
    } else {
      // JSON, including extensionless files like .stacherc
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new Error(`Invalid JSON in ${filePath}: ${error}`);
      }
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigValidationError(`Configuration in ${filePath} must be an object`);
    }
    return parsed;
  }

  /**
   * Load environment variables
   */
  private loadEnvironmentVariables(): PlainObject {
    const config: PlainObject = {};
    const prefix = this.options.envPrefix;
    const env = this.options.env;

    const envMappings: Record<string, { path: string; parse?: (value: string) => unknown }> = {
      [`${prefix}ESCAPE_HTML`]: { path: 'escapeHtml', parse: parseBoolean },
      [`${prefix}ON_MISSING_KEY`]: { path: 'onMissingKey' },
      [`${prefix}KEEP_UNRESOLVED`]: { path: 'keepUnresolved', parse: parseBoolean },
      [`${prefix}DELIMITERS`]: { path: 'delimiters', parse: value => value.trim().split(/\s+/) },
      [`${prefix}MAX_DEPTH`]: { path: 'maxDepth', parse: Number },
      [`${prefix}ENABLE_CACHE`]: { path: 'enableCache', parse: parseBoolean },
      [`${prefix}PARTIALS_DIR`]: { path: 'partials.directory' },
      [`${prefix}PARTIALS_EXT`]: { path: 'partials.extension' }
    };

    for (const [envVar, mapping] of Object.entries(envMappings)) {
      const value = env[envVar];
      if (value !== undefined && value !== '') {
        setNestedValue(config, mapping.path, mapping.parse ? mapping.parse(value) : value);
      }
    }

    return config;
  }

  /**
   * Apply computed defaults
   */
  private applyDefaults(config: RenderConfig): RenderConfig {
    const directory = config.partials.directory;
    if (directory && !path.isAbsolute(directory)) {
      return {
        ...config,
        partials: { ...config.partials, directory: path.resolve(this.options.cwd, directory) }
      };
    }
    return config;
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Unrecognised values are passed through so validation reports them
 */
function parseBoolean(value: string): unknown {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return value;
}

/**
 * Turn a loaded configuration into render options. A partials directory
 * wraps any in-memory partials as the fallback checked first.
 */
export function toRenderOptions(
  config: RenderConfig,
  collaborators: { logger?: Logger; partials?: PartialSource | Record<string, string> } = {}
): RenderOptions {
  const { partials: partialsConfig, ...rest } = config;
  const inMemory = collaborators.partials ? toPartialSource(collaborators.partials) : undefined;

  const partials = partialsConfig.directory
    ? new FilePartialSource({
        directory: partialsConfig.directory,
        extension: partialsConfig.extension,
        fallback: inMemory
      })
    : inMemory;

  return { ...rest, partials, logger: collaborators.logger };
}
