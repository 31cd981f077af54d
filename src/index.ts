/**
 * Library exports for programmatic usage
 */
export { Reflector } from './reflector.js';
export type { ReflectorOptions } from './reflector.js';
export { SchemaReflector } from './schema-reflector.js';
export type { SchemaReflectorSettings } from './schema-reflector.js';
export { ParameterExtractor } from './parameter-extractor.js';
export { RequestBodyBuilder } from './request-body-builder.js';
export type { BodyTag } from './request-body-builder.js';
export { ResponseBuilder } from './response-builder.js';
export type { ResponseBuilderOptions } from './response-builder.js';
export { DefinitionRegistry } from './definition-registry.js';
export { loadConfig, resolveConfig, reflectorConfigSchema } from './config-loader.js';
export type { ReflectorConfig, ReflectorConfigInput } from './config-loader.js';
export { t } from './type-builder.js';
export { withOperation, operationCtx } from './operation-context.js';
export { toOpenAPISchema, toJSONSchema } from './openapi-schema.js';
export { TAG, MIME, COMPONENTS_SCHEMAS_PREFIX, X_FORBID_UNKNOWN } from './constants.js';
export {
  ReflectorError,
  DuplicateParameterError,
  ReflectionError,
  FieldPopulationError,
  ConfigurationError,
  OperationConflictError,
  OperationSetupError,
  isReflectorError,
  getErrorDetails,
} from './errors.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger } from './logger.js';
export type { Logger, LogFormat } from './logger.js';
export type * from './types/type-model.js';
export type * from './types/json-schema.js';
export type * from './types/inspector.js';
export type * from './types/operation-context.js';
export type * from './types/openapi.js';
