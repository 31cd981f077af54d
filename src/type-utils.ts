/**
 * Queries over type descriptions
 */

import type {
  Describable,
  FieldDef,
  LocationTag,
  StructType,
  TypeDef,
  TypeSource,
} from './types/type-model.js';

export function isDescribable(source: TypeSource): source is Describable {
  return 'describe' in source && typeof source.describe === 'function';
}

export function resolveType(source: TypeSource): TypeDef {
  return isDescribable(source) ? source.describe() : source;
}

/**
 * Strip nullable wrappers
 */
export function unwrapType(type: TypeDef): TypeDef {
  let current = type;
  while (current.kind === 'nullable') {
    current = current.of;
  }
  return current;
}

export function asStruct(type: TypeDef): StructType | undefined {
  const inner = unwrapType(type);
  return inner.kind === 'struct' ? inner : undefined;
}

export function isSliceOrMap(source: TypeSource): boolean {
  const type = unwrapType(resolveType(source));
  return type.kind === 'array' || type.kind === 'map';
}

/**
 * Find an embedded array or map field, searching embedded structs too
 */
export function findEmbeddedSliceOrMap(source: TypeSource): FieldDef | undefined {
  const type = asStruct(resolveType(source));
  if (!type) return undefined;

  for (const field of type.fields) {
    if (!field.embedded) continue;

    if (isSliceOrMap(field.type)) {
      return field;
    }

    const nested = findEmbeddedSliceOrMap(field.type);
    if (nested) return nested;
  }

  return undefined;
}

/**
 * Name of a field under a tag, or undefined when untagged or excluded with '-'
 */
export function taggedName(field: FieldDef, tag: LocationTag): string | undefined {
  const value = field.annotations[tag];

  if (value === undefined || value === '' || value === '-') {
    return undefined;
  }

  return value;
}

/**
 * Check whether a struct has at least one field annotated with the tag,
 * embedded structs included
 */
export function hasTaggedFields(source: TypeSource, tag: LocationTag): boolean {
  const type = asStruct(resolveType(source));
  if (!type) return false;

  return type.fields.some(field => {
    if (taggedName(field, tag) !== undefined) return true;
    return field.embedded === true && hasTaggedFields(field.type, tag);
  });
}

export function isRequestBodyEnforcer(source: TypeSource): boolean {
  if ('forceRequestBody' in source && typeof source.forceRequestBody === 'function') {
    return true;
  }

  const type = asStruct(resolveType(source));
  return type?.forceRequestBody === true;
}
