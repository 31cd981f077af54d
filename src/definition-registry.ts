/**
 * Document-scoped store of named schemas
 *
 * Every named sub-schema reflected by any builder passes through collect().
 * The first writer wins: later writes under an existing name are ignored, so
 * visiting a shared type again never changes the document.
 *
 * Not safe for concurrent writers; callers building one document from
 * several tasks must serialize access.
 */

import type { Logger } from './logger.js';
import { toOpenAPISchema } from './openapi-schema.js';
import type { JsonSchema } from './types/json-schema.js';
import type { SchemaOrRef } from './types/openapi.js';

export class DefinitionRegistry {
  constructor(
    private schemas: Record<string, SchemaOrRef>,
    private logger?: Logger
  ) {}

  /**
   * Insert a definition unless the name is taken.
   * Returns true when the definition was inserted.
   */
  collect(name: string, schema: JsonSchema): boolean {
    if (this.has(name)) {
      this.logger?.debug('Definition already registered, keeping first', { name });
      return false;
    }

    this.schemas[name] = toOpenAPISchema(schema);
    this.logger?.debug('Collected definition', { name });
    return true;
  }

  has(name: string): boolean {
    return Object.hasOwn(this.schemas, name);
  }

  get(name: string): SchemaOrRef | undefined {
    return this.has(name) ? this.schemas[name] : undefined;
  }

  names(): string[] {
    return Object.keys(this.schemas);
  }

  get size(): number {
    return this.names().length;
  }
}
