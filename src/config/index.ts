export { ConfigLoader, ConfigLoaderOptions, toRenderOptions } from './config-loader';
export { ConfigValidator } from './config-validator';
export {
  RenderConfig,
  RenderConfigInput,
  RenderConfigOverride,
  PartialsConfig,
  ConfigValidationError,
  RenderConfigSchema,
  RenderConfigOverrideSchema,
  PartialsConfigSchema
} from './config-schema';
