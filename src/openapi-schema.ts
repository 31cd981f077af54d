/**
 * Conversion between JSON Schema fragments and OpenAPI 3.0 schema objects
 *
 * OpenAPI 3.0 has no null type: ["string", "null"] becomes
 * { type: "string", nullable: true }. Only the first example survives.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type { JsonSchema, JsonSchemaType } from './types/json-schema.js';
import type { SchemaOrRef } from './types/openapi.js';

type ConcreteType = Exclude<JsonSchemaType, 'null'>;
type SchemaBase = Omit<OpenAPIV3.NonArraySchemaObject, 'type'>;

function isConcrete(type: JsonSchemaType): type is ConcreteType {
  return type !== 'null';
}

export function isReference(schema: SchemaOrRef): schema is OpenAPIV3.ReferenceObject {
  return '$ref' in schema;
}

/**
 * Convert a reflected fragment into an OpenAPI schema or reference.
 * Nested definitions are dropped; they are published separately.
 */
export function toOpenAPISchema(schema: JsonSchema): SchemaOrRef {
  if (schema.$ref !== undefined) {
    return { $ref: schema.$ref };
  }

  const types: JsonSchemaType[] = schema.type === undefined
    ? []
    : Array.isArray(schema.type) ? schema.type : [schema.type];
  const [primary] = types.filter(isConcrete);
  const base = convertKeywords(schema);

  if (types.includes('null')) {
    base.nullable = true;
  }

  if (primary === 'array') {
    return {
      ...base,
      type: 'array',
      items: schema.items ? toOpenAPISchema(schema.items) : {},
    };
  }

  const result: OpenAPIV3.NonArraySchemaObject = { ...base };
  if (primary !== undefined) {
    result.type = primary;
  }
  return result;
}

function convertKeywords(schema: JsonSchema): SchemaBase {
  const result: SchemaBase = {};

  if (schema.title !== undefined) result.title = schema.title;
  if (schema.description !== undefined) result.description = schema.description;
  if (schema.format !== undefined) result.format = schema.format;
  if (schema.default !== undefined) result.default = schema.default;
  if (schema.enum !== undefined) result.enum = [...schema.enum];
  if (schema.pattern !== undefined) result.pattern = schema.pattern;
  if (schema.minimum !== undefined) result.minimum = schema.minimum;
  if (schema.maximum !== undefined) result.maximum = schema.maximum;
  if (schema.multipleOf !== undefined) result.multipleOf = schema.multipleOf;
  if (schema.minLength !== undefined) result.minLength = schema.minLength;
  if (schema.maxLength !== undefined) result.maxLength = schema.maxLength;
  if (schema.minItems !== undefined) result.minItems = schema.minItems;
  if (schema.maxItems !== undefined) result.maxItems = schema.maxItems;
  if (schema.uniqueItems !== undefined) result.uniqueItems = schema.uniqueItems;
  if (schema.readOnly !== undefined) result.readOnly = schema.readOnly;
  if (schema.writeOnly !== undefined) result.writeOnly = schema.writeOnly;
  if (schema.deprecated !== undefined) result.deprecated = schema.deprecated;
  if (schema.examples !== undefined && schema.examples.length > 0) result.example = schema.examples[0];

  if (schema.properties) {
    const properties: Record<string, SchemaOrRef> = {};
    for (const [name, property] of Object.entries(schema.properties)) {
      properties[name] = toOpenAPISchema(property);
    }
    result.properties = properties;
  }

  if (schema.required !== undefined) result.required = [...schema.required];

  if (typeof schema.additionalProperties === 'boolean') {
    result.additionalProperties = schema.additionalProperties;
  } else if (schema.additionalProperties !== undefined) {
    result.additionalProperties = toOpenAPISchema(schema.additionalProperties);
  }

  return result;
}

/**
 * Remove the nullable marker from a schema (references are left untouched)
 */
export function stripNullable(schema: SchemaOrRef): SchemaOrRef {
  if (!isReference(schema)) {
    delete schema.nullable;
  }
  return schema;
}

/**
 * Convert an OpenAPI schema back into a JSON Schema fragment
 */
export function toJSONSchema(schema: SchemaOrRef): JsonSchema {
  if (isReference(schema)) {
    return { $ref: schema.$ref };
  }

  const result: JsonSchema = {};
  const nullable = schema.nullable === true;

  if (schema.type !== undefined) {
    result.type = nullable ? [schema.type, 'null'] : schema.type;
  } else if (nullable) {
    result.type = ['null'];
  }

  if (schema.title !== undefined) result.title = schema.title;
  if (schema.description !== undefined) result.description = schema.description;
  if (schema.format !== undefined) result.format = schema.format;
  if (schema.default !== undefined) result.default = schema.default;
  if (schema.enum !== undefined) result.enum = [...schema.enum];
  if (schema.pattern !== undefined) result.pattern = schema.pattern;
  if (schema.minimum !== undefined) result.minimum = schema.minimum;
  if (schema.maximum !== undefined) result.maximum = schema.maximum;
  if (schema.multipleOf !== undefined) result.multipleOf = schema.multipleOf;
  if (schema.minLength !== undefined) result.minLength = schema.minLength;
  if (schema.maxLength !== undefined) result.maxLength = schema.maxLength;
  if (schema.minItems !== undefined) result.minItems = schema.minItems;
  if (schema.maxItems !== undefined) result.maxItems = schema.maxItems;
  if (schema.uniqueItems !== undefined) result.uniqueItems = schema.uniqueItems;
  if (schema.readOnly !== undefined) result.readOnly = schema.readOnly;
  if (schema.writeOnly !== undefined) result.writeOnly = schema.writeOnly;
  if (schema.deprecated !== undefined) result.deprecated = schema.deprecated;
  if (schema.example !== undefined) result.examples = [schema.example];

  if (schema.type === 'array') {
    result.items = toJSONSchema(schema.items);
  }

  if (schema.properties) {
    const properties: Record<string, JsonSchema> = {};
    for (const [name, property] of Object.entries(schema.properties)) {
      properties[name] = toJSONSchema(property);
    }
    result.properties = properties;
  }

  if (schema.required !== undefined) result.required = [...schema.required];

  if (typeof schema.additionalProperties === 'boolean') {
    result.additionalProperties = schema.additionalProperties;
  } else if (schema.additionalProperties !== undefined) {
    result.additionalProperties = toJSONSchema(schema.additionalProperties);
  }

  return result;
}

/**
 * Check whether a reflected schema declares the given type
 */
export function hasType(schema: JsonSchema, type: JsonSchemaType): boolean {
  if (schema.type === undefined) return false;
  return Array.isArray(schema.type) ? schema.type.includes(type) : schema.type === type;
}
