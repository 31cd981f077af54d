/**
 * Type description builder
 *
 * Shorthand constructors for TypeDef values, e.g.
 *
 * ```typescript
 * const GetOrderInput = t.struct('GetOrderInput', [
 *   t.field('ID', t.integer(), { path: 'id' }),
 *   t.field('Fields', t.array(t.string()), { query: 'fields', collectionFormat: 'csv' }),
 * ]);
 * ```
 */

import type {
  AnyType,
  ArrayType,
  FieldAnnotations,
  FieldDef,
  FileType,
  MapType,
  NullableType,
  ScalarType,
  StructType,
  TypeDef,
} from './types/type-model.js';

interface MetaOptions {
  name?: string;
  title?: string;
  description?: string;
}

interface ScalarOptions extends MetaOptions {
  format?: string;
  enum?: Array<string | number | boolean>;
}

interface StructOptions {
  title?: string;
  description?: string;
  additionalProperties?: false;
  forceRequestBody?: boolean;
}

export function string(options: ScalarOptions = {}): ScalarType {
  return { kind: 'string', ...options };
}

export function number(options: ScalarOptions = {}): ScalarType {
  return { kind: 'number', ...options };
}

export function integer(options: ScalarOptions = {}): ScalarType {
  return { kind: 'integer', ...options };
}

export function boolean(options: MetaOptions = {}): ScalarType {
  return { kind: 'boolean', ...options };
}

export function any(options: MetaOptions = {}): AnyType {
  return { kind: 'any', ...options };
}

export function file(options: MetaOptions = {}): FileType {
  return { kind: 'file', ...options };
}

export function array(items: TypeDef, options: MetaOptions = {}): ArrayType {
  return { kind: 'array', items, ...options };
}

export function map(values: TypeDef, options: MetaOptions = {}): MapType {
  return { kind: 'map', values, ...options };
}

export function nullable(of: TypeDef): NullableType {
  return { kind: 'nullable', of };
}

/**
 * Create a struct; pass a name to hoist it into components/schemas
 */
export function struct(
  name: string | undefined,
  fields: FieldDef[],
  options: StructOptions = {}
): StructType {
  const type: StructType = { kind: 'struct', fields, ...options };
  if (name) type.name = name;
  return type;
}

export function field(name: string, type: TypeDef, annotations: FieldAnnotations = {}): FieldDef {
  return { name, type, annotations };
}

/**
 * Embed a struct (flattened) or a collection into the enclosing struct
 */
export function embed(type: TypeDef, annotations: FieldAnnotations = {}): FieldDef {
  return { name: type.name ?? '', type, annotations, embedded: true };
}

/**
 * Give any type a definition name
 */
export function named<T extends TypeDef>(name: string, type: T): T {
  return { ...type, name };
}

export const t = {
  string,
  number,
  integer,
  boolean,
  any,
  file,
  array,
  map,
  nullable,
  struct,
  field,
  embed,
  named,
};
