/**
 * Parameter extraction for one location
 *
 * Turns the fields of an input type annotated for query, path, header or
 * cookie into parameter objects on the operation.
 */

import { COMPONENTS_SCHEMAS_PREFIX, MIME, TAG, X_FORBID_UNKNOWN } from './constants.js';
import type { DefinitionRegistry } from './definition-registry.js';
import { DuplicateParameterError } from './errors.js';
import { populateFromAnnotations } from './field-options.js';
import type { Logger } from './logger.js';
import { hasType, stripNullable, toOpenAPISchema } from './openapi-schema.js';
import { withOperation } from './operation-context.js';
import { hasTaggedFields, isSliceOrMap } from './type-utils.js';
import type { TypeInspector } from './types/inspector.js';
import type { JsonSchema } from './types/json-schema.js';
import type { Parameter, ParameterLocation } from './types/openapi.js';
import type { NameMapping, OperationContext } from './types/operation-context.js';
import type { FieldDef } from './types/type-model.js';

export class ParameterExtractor {
  constructor(
    private inspector: TypeInspector,
    private registry: DefinitionRegistry,
    private logger: Logger
  ) {}

  /**
   * Add the parameters of one location to the operation.
   *
   * A duplicate (location, name) pair aborts the location; parameters added
   * before it stay on the operation.
   */
  extract(oc: OperationContext, location: ParameterLocation, nameMapping?: NameMapping): void {
    const { input, operation } = oc;
    if (!input) return;

    // Bare arrays and maps have no named fields to spread into parameters.
    if (isSliceOrMap(input)) {
      this.logger.debug('Skipping parameters of collection input', { in: location });
      return;
    }

    const context = withOperation(oc, false, location);

    const aggregate = this.inspector.reflect(input, {
      operation: context,
      definitionsPrefix: COMPONENTS_SCHEMAS_PREFIX,
      collectDefinitions: (name, schema) => {
        this.registry.collect(name, schema);
      },
      propertyNameMapping: nameMapping,
      propertyNameTag: location,
      skipEmbeddedMapsSlices: true,
      interceptProperty: ({ name, field, propertySchema }) => {
        const parameter = this.buildParameter(context, location, name, field, propertySchema);
        const parameters = operation.parameters ?? [];

        const exists = parameters.some(
          p => !('$ref' in p) && p.in === parameter.in && p.name === parameter.name
        );
        if (exists) {
          throw new DuplicateParameterError(parameter.name, parameter.in);
        }

        parameters.push(parameter);
        operation.parameters = parameters;
      },
    });

    if (aggregate.additionalProperties === false) {
      const marker: `x-${string}` = `${X_FORBID_UNKNOWN}${location}`;
      operation[marker] = true;
    }
  }

  private buildParameter(
    oc: OperationContext,
    location: ParameterLocation,
    name: string,
    field: FieldDef,
    propertySchema: JsonSchema
  ): Parameter {
    const parameter: Parameter = {
      name,
      in: location,
      schema: stripNullable(toOpenAPISchema(propertySchema)),
    };

    if (propertySchema.description !== undefined) {
      parameter.description = propertySchema.description;
    }

    switch (field.annotations.collectionFormat) {
      case 'csv':
        parameter.style = 'form';
        parameter.explode = false;
        break;
      case 'ssv':
        parameter.style = 'spaceDelimited';
        parameter.explode = false;
        break;
      case 'pipes':
        parameter.style = 'pipeDelimited';
        parameter.explode = false;
        break;
      case 'multi':
        parameter.style = 'form';
        parameter.explode = true;
        break;
    }

    if (hasTaggedFields(field.type, TAG.JSON)) {
      // Structured payload passed as one JSON-encoded parameter.
      const contentSchema = this.inspector.reflect(field.type, {
        operation: oc,
        definitionsPrefix: COMPONENTS_SCHEMAS_PREFIX,
        collectDefinitions: (defName, schema) => {
          this.registry.collect(defName, schema);
        },
        rootRef: true,
      });

      delete parameter.schema;
      parameter.content = {
        [MIME.JSON]: { schema: toOpenAPISchema(contentSchema) },
      };
    } else {
      const inlined = this.inspector.reflect(field.type, {
        operation: oc,
        inlineRefs: true,
        propertyNameTag: location,
      });

      if (hasType(inlined, 'object')) {
        parameter.style = 'deepObject';
        parameter.explode = true;
      }
    }

    populateFromAnnotations(parameter, field);

    if (location === 'path') {
      parameter.required = true;
    }

    return parameter;
  }
}
