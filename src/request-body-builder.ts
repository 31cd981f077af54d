/**
 * Request body builder
 *
 * Decides whether an input type contributes a body for one encoding and
 * writes the matching media type entry. JSON and form bodies of the same
 * operation live side by side under different media types.
 */

import { BODILESS_METHODS, COMPONENTS_SCHEMAS_PREFIX, MIME, TAG } from './constants.js';
import type { DefinitionRegistry } from './definition-registry.js';
import type { Logger } from './logger.js';
import { definitionPrefixFor } from './naming.js';
import { toOpenAPISchema } from './openapi-schema.js';
import { withOperation } from './operation-context.js';
import {
  findEmbeddedSliceOrMap,
  hasTaggedFields,
  isRequestBodyEnforcer,
  isSliceOrMap,
} from './type-utils.js';
import type { TypeInspector } from './types/inspector.js';
import type { Operation, RequestBody } from './types/openapi.js';
import type { NameMapping, OperationContext } from './types/operation-context.js';

export type BodyTag = typeof TAG.JSON | typeof TAG.FORM_DATA;

export class RequestBodyBuilder {
  constructor(
    private inspector: TypeInspector,
    private registry: DefinitionRegistry,
    private logger: Logger
  ) {}

  build(
    oc: OperationContext,
    tag: BodyTag,
    mimeType: string,
    httpMethod: string | undefined,
    nameMapping?: NameMapping
  ): void {
    const { input, operation } = oc;
    if (!input) return;

    const method = (httpMethod ?? '').toUpperCase();
    if (BODILESS_METHODS.has(method) && !isRequestBodyEnforcer(input)) {
      this.logger.debug('Skipping request body for bodiless method', { method, tag });
      return;
    }

    const hasTagged = hasTaggedFields(input, tag);
    const hasMapping = nameMapping !== undefined && Object.keys(nameMapping).length > 0;

    // Form data can not carry a bare map or array.
    if (!hasTagged && !hasMapping && tag !== TAG.JSON) {
      return;
    }

    // JSON can be a map or array without field tags.
    if (!hasTagged && !hasMapping && !isSliceOrMap(input) && !findEmbeddedSliceOrMap(input)) {
      return;
    }

    const upload = { detected: false };
    const definitionPrefix = definitionPrefixFor(tag);

    const schema = this.inspector.reflect(input, {
      operation: withOperation(oc, false, 'body'),
      definitionsPrefix: COMPONENTS_SCHEMAS_PREFIX + definitionPrefix,
      rootRef: true,
      propertyNameMapping: nameMapping,
      propertyNameTag: tag,
      interceptType: ({ type, schema: fileSchema }) => {
        if (type.kind !== 'file') return false;

        fileSchema.type = 'string';
        fileSchema.format = 'binary';
        upload.detected = true;
        return true;
      },
    });

    for (const [name, definition] of Object.entries(schema.definitions ?? {})) {
      this.registry.collect(definitionPrefix + name, definition);
    }

    const mediaType = mimeType === MIME.FORM_URLENCODED && upload.detected
      ? MIME.MULTIPART
      : mimeType;

    this.ensureRequestBody(operation).content[mediaType] = {
      schema: toOpenAPISchema(schema),
    };
  }

  private ensureRequestBody(operation: Operation): RequestBody {
    const existing = operation.requestBody;
    if (existing && !('$ref' in existing)) {
      return existing;
    }

    const body: RequestBody = { content: {} };
    operation.requestBody = body;
    return body;
  }
}
