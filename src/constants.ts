/**
 * Reflector constants
 *
 * Annotation tags, MIME types and reference prefixes shared by the builders.
 */

/**
 * Annotation tags that select a transmission location
 */
export const TAG = {
  JSON: 'json',
  FORM_DATA: 'formData',
  QUERY: 'query',
  PATH: 'path',
  HEADER: 'header',
  COOKIE: 'cookie',
} as const;

/**
 * Media types produced by the request body and response builders
 */
export const MIME = {
  JSON: 'application/json',
  FORM_URLENCODED: 'application/x-www-form-urlencoded',
  MULTIPART: 'multipart/form-data',
} as const;

/**
 * Prefix of every hoisted schema reference
 */
export const COMPONENTS_SCHEMAS_PREFIX = '#/components/schemas/';

/**
 * Vendor extension prefix marking a location that rejects unknown parameters.
 * The parameter location is appended as a suffix.
 */
export const X_FORBID_UNKNOWN = 'x-forbid-unknown-';

/**
 * Methods that carry no request body unless the input forces one
 */
export const BODILESS_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'DELETE', 'TRACE']);

/**
 * Defaults for a freshly created document
 */
export const DEFAULTS = {
  OPENAPI_VERSION: '3.0.3',
  TITLE: 'API',
  VERSION: '1.0.0',
  TRIVIAL_SCHEMAS: ['{}', '{"type":"object"}'],
} as const;
