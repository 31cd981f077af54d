/**
 * Response builder
 *
 * Writes one response (body schema, headers, description) per status code.
 */

import { STATUS_CODES } from 'http';
import { COMPONENTS_SCHEMAS_PREFIX, TAG } from './constants.js';
import type { DefinitionRegistry } from './definition-registry.js';
import { ConfigurationError } from './errors.js';
import { populateFromAnnotations } from './field-options.js';
import type { Logger } from './logger.js';
import { baseMediaType } from './naming.js';
import { isReference, stripNullable, toOpenAPISchema } from './openapi-schema.js';
import { withOperation } from './operation-context.js';
import type { TypeInspector } from './types/inspector.js';
import type { JsonSchema } from './types/json-schema.js';
import type { Header, Response } from './types/openapi.js';
import type { OperationContext } from './types/operation-context.js';
import type { TypeSource } from './types/type-model.js';

export interface ResponseBuilderOptions {
  /** JSON texts of schemas that describe no body */
  trivialSchemas: readonly string[];
  defaultResponseContentType: string;
}

const DEFAULT_STATUS = 200;

export class ResponseBuilder {
  private trivial: Set<string>;

  constructor(
    private inspector: TypeInspector,
    private registry: DefinitionRegistry,
    private logger: Logger,
    private options: ResponseBuilderOptions
  ) {
    this.trivial = new Set(options.trivialSchemas.map(parseTrivialSchema));
  }

  build(oc: OperationContext): void {
    const status = oc.httpStatus ?? DEFAULT_STATUS;
    const response: Response = { description: '' };

    if (oc.output !== undefined) {
      const contentType = oc.respContentType ? baseMediaType(oc.respContentType) : '';

      this.buildBody(response, oc, oc.output, contentType);
      this.buildHeaders(response, oc, oc.output);

      if (contentType) {
        ensureContentType(response, contentType);
      }
    }

    if (!response.description) {
      response.description = STATUS_CODES[status] ?? '';
    }

    oc.operation.responses[String(status)] = response;
  }

  /**
   * Whether the output describes anything beyond an empty or bare object body
   */
  hasMeaningfulSchema(output: TypeSource): boolean {
    let schema: JsonSchema;
    try {
      schema = this.inspector.reflect(output);
    } catch (error) {
      // The body reflection that follows reports the failure.
      this.logger.debug('Body probe failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return true;
    }

    const { title, description, $comment, examples, definitions, ...constraining } = schema;
    return !this.trivial.has(canonicalText(JSON.stringify(constraining)));
  }

  private buildBody(response: Response, oc: OperationContext, output: TypeSource, contentType: string): void {
    if (!this.hasMeaningfulSchema(output)) {
      this.logger.debug('Skipping trivial response body', { status: oc.httpStatus ?? DEFAULT_STATUS });
      return;
    }

    const schema = this.inspector.reflect(output, {
      operation: withOperation(oc, true, 'body'),
      rootRef: true,
      definitionsPrefix: COMPONENTS_SCHEMAS_PREFIX,
      collectDefinitions: (name, definition) => {
        this.registry.collect(name, definition);
      },
    });

    const content = response.content ?? {};
    content[contentType || this.options.defaultResponseContentType] = {
      schema: stripNullable(toOpenAPISchema(schema)),
    };
    response.content = content;

    if (schema.description !== undefined && !response.description) {
      response.description = schema.description;
    }
  }

  private buildHeaders(response: Response, oc: OperationContext, output: TypeSource): void {
    const headers: Record<string, Header> = {};

    const schema = this.inspector.reflect(output, {
      operation: withOperation(oc, true, TAG.HEADER),
      inlineRefs: true,
      propertyNameMapping: oc.respHeaderMapping,
      propertyNameTag: TAG.HEADER,
      interceptProperty: ({ name, field, propertySchema }) => {
        const headerSchema = toOpenAPISchema(propertySchema);
        const header: Header = { schema: headerSchema };

        if (propertySchema.description !== undefined) {
          header.description = propertySchema.description;
        }
        if (!isReference(headerSchema) && headerSchema.deprecated !== undefined) {
          header.deprecated = headerSchema.deprecated;
        }

        populateFromAnnotations(header, field);
        headers[name] = header;
      },
    });

    if (Object.keys(headers).length > 0) {
      response.headers = headers;
    } else {
      delete response.headers;
    }

    if (schema.description !== undefined && !response.description) {
      response.description = schema.description;
    }
  }
}

function ensureContentType(response: Response, contentType: string): void {
  const content = response.content ?? {};
  if (!Object.hasOwn(content, contentType)) {
    content[contentType] = { schema: {} };
  }
  response.content = content;
}

function parseTrivialSchema(text: string, index: number): string {
  try {
    return canonicalText(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid trivial schema at index ${index}: must be valid JSON text`, {
      schema: text,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * JSON text with object keys sorted, so equal schemas compare equal
 */
function canonicalText(text: string): string {
  const value: unknown = JSON.parse(text);
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
