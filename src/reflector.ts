/**
 * Operation assembler
 *
 * Owns one OpenAPI document and fills its operations from annotated input and
 * output types. Named schemas from every builder land in the document's
 * components through a shared registry.
 *
 * One writer per document: callers that build operations from several tasks
 * must serialize calls.
 */

import { MIME, TAG } from './constants.js';
import { resolveConfig, type ReflectorConfig, type ReflectorConfigInput } from './config-loader.js';
import { DefinitionRegistry } from './definition-registry.js';
import { OperationConflictError, OperationSetupError, toError } from './errors.js';
import { createLogger, parseLogLevel, type Logger } from './logger.js';
import { refToDefinitionName } from './naming.js';
import { toJSONSchema } from './openapi-schema.js';
import { ParameterExtractor } from './parameter-extractor.js';
import { RequestBodyBuilder } from './request-body-builder.js';
import { ResponseBuilder } from './response-builder.js';
import { SchemaReflector } from './schema-reflector.js';
import type { TypeInspector } from './types/inspector.js';
import type { JsonSchema } from './types/json-schema.js';
import type { Document, HttpMethod, Operation, SchemaOrRef } from './types/openapi.js';
import type { OperationContext } from './types/operation-context.js';
import type { TypeSource } from './types/type-model.js';

export interface ReflectorOptions {
  /** Existing document to extend; a new one is created from config otherwise */
  spec?: Document;
  config?: ReflectorConfigInput;
  inspector?: TypeInspector;
  logger?: Logger;
}

export class Reflector {
  readonly spec: Document;
  readonly config: ReflectorConfig;
  readonly inspector: TypeInspector;
  readonly registry: DefinitionRegistry;

  private logger: Logger;
  private parameters: ParameterExtractor;
  private requestBodies: RequestBodyBuilder;
  private responses: ResponseBuilder;

  constructor(options: ReflectorOptions = {}) {
    this.config = resolveConfig(options.config ?? {});
    this.logger = options.logger ?? createLogger(
      undefined,
      this.config.logLevel ? parseLogLevel(this.config.logLevel) : undefined
    );
    this.spec = options.spec ?? this.createSpec();
    this.inspector = options.inspector ?? new SchemaReflector();
    this.registry = new DefinitionRegistry(this.schemas(), this.logger);

    this.parameters = new ParameterExtractor(this.inspector, this.registry, this.logger);
    this.requestBodies = new RequestBodyBuilder(this.inspector, this.registry, this.logger);
    this.responses = new ResponseBuilder(this.inspector, this.registry, this.logger, {
      trivialSchemas: this.config.trivialSchemas,
      defaultResponseContentType: this.config.defaultResponseContentType,
    });
  }

  /**
   * Describe the request side of an operation: parameters of every location,
   * then JSON and form bodies. Every step runs; failures are reported together.
   */
  setupRequest(oc: OperationContext): void {
    const steps: Array<() => void> = [
      () => this.parameters.extract(oc, 'query', oc.reqQueryMapping),
      () => this.parameters.extract(oc, 'path', oc.reqPathMapping),
      () => this.parameters.extract(oc, 'cookie', oc.reqCookieMapping),
      () => this.parameters.extract(oc, 'header', oc.reqHeaderMapping),
      () => this.requestBodies.build(oc, TAG.JSON, MIME.JSON, oc.httpMethod),
      () => this.requestBodies.build(oc, TAG.FORM_DATA, MIME.FORM_URLENCODED, oc.httpMethod, oc.reqFormDataMapping),
    ];

    const errors: Error[] = [];
    for (const step of steps) {
      try {
        step();
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (errors.length > 0) {
      this.logger.debug('Request setup failed', { count: errors.length });
      throw new OperationSetupError(errors);
    }
  }

  setRequest(operation: Operation, input: TypeSource, httpMethod: string): void {
    this.setupRequest({ operation, input, httpMethod });
  }

  setupResponse(oc: OperationContext): void {
    this.responses.build(oc);
  }

  setJSONResponse(operation: Operation, output: TypeSource | undefined, httpStatus: number): void {
    this.setupResponse({ operation, output, httpStatus });
  }

  /**
   * Place an operation at (method, path); a taken slot is an error
   */
  addOperation(method: HttpMethod, path: string, operation: Operation): void {
    const pathItem = this.spec.paths[path] ?? {};

    if (pathItem[method] !== undefined) {
      throw new OperationConflictError(method, path);
    }

    pathItem[method] = operation;
    this.spec.paths[path] = pathItem;
  }

  /**
   * JSON Schema of a component schema reference, if the document has it
   */
  resolveJSONSchemaRef(ref: string): JsonSchema | undefined {
    const name = refToDefinitionName(ref);
    if (name === undefined) return undefined;

    const schema = this.registry.get(name);
    return schema ? toJSONSchema(schema) : undefined;
  }

  private createSpec(): Document {
    const { openapi, info } = this.config;
    return {
      openapi,
      info: { ...info },
      paths: {},
      components: { schemas: {} },
    };
  }

  private schemas(): Record<string, SchemaOrRef> {
    const components = this.spec.components ?? {};
    const schemas = components.schemas ?? {};
    components.schemas = schemas;
    this.spec.components = components;
    return schemas;
  }
}
