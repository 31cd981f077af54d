/**
 * Naming helpers for definitions, references and media types
 */

import { COMPONENTS_SCHEMAS_PREFIX, TAG } from './constants.js';

const COMPONENT_NAME_INVALID = /[^A-Za-z0-9._-]/g;

/**
 * Upper-case the first letter of every word: formData -> FormData
 */
export function titleCase(value: string): string {
  return value.replace(/(^|[^A-Za-z0-9])([a-z])/g, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

/**
 * Definition name prefix for a body encoding.
 *
 * JSON definitions are unprefixed; other encodings get the title-cased tag so
 * the same type reflected under two encodings does not collide.
 */
export function definitionPrefixFor(tag: string): string {
  return tag === TAG.JSON ? '' : titleCase(tag);
}

/**
 * Make a type name usable as a components/schemas key
 */
export function sanitizeDefinitionName(name: string): string {
  return name.replace(COMPONENT_NAME_INVALID, '_');
}

export function schemaRef(name: string, prefix = COMPONENTS_SCHEMAS_PREFIX): string {
  return `${prefix}${name}`;
}

/**
 * Definition name behind a components/schemas reference, or undefined for
 * any other reference
 */
export function refToDefinitionName(ref: string): string | undefined {
  if (!ref.startsWith(COMPONENTS_SCHEMAS_PREFIX)) return undefined;
  return ref.slice(COMPONENTS_SCHEMAS_PREFIX.length);
}

/**
 * Drop media type parameters: "text/csv; charset=utf-8" -> "text/csv"
 */
export function baseMediaType(contentType: string): string {
  return contentType.split(';')[0].trim();
}
