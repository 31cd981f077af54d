/**
 * Type inspector contract
 *
 * The builders only depend on this interface; SchemaReflector is the default
 * implementation.
 */

import type { JsonSchema } from './json-schema.js';
import type { NameMapping, OperationContext } from './operation-context.js';
import type { FieldDef, LocationTag, TypeDef, TypeSource } from './type-model.js';

export interface ReflectContext {
  readonly options: ReflectOptions;
  /** Operation being built, with its processing marker */
  readonly operation?: OperationContext;
  /** Property names from the root to the current value */
  readonly path: readonly string[];
}

export interface TypeInterceptParams {
  type: TypeDef;
  field?: FieldDef;
  /** In-progress schema, mutate it to customize the result */
  schema: JsonSchema;
  context: ReflectContext;
}

/**
 * Return true to stop default handling of the type
 */
export type TypeInterceptor = (params: TypeInterceptParams) => boolean;

export interface PropertyInterceptParams {
  name: string;
  field: FieldDef;
  propertySchema: JsonSchema;
  context: ReflectContext;
}

/**
 * Called for each property of the root type; throw to abort reflection
 */
export type PropertyInterceptor = (params: PropertyInterceptParams) => void;

export interface ReflectOptions {
  /** Reference prefix for named types, defaults to #/components/schemas/ */
  definitionsPrefix?: string;
  /** Receives named sub-schemas, once the pass completes, instead of the result's definitions */
  collectDefinitions?: (name: string, schema: JsonSchema) => void;
  /** A named root becomes a reference to its own definition */
  rootRef?: boolean;
  /** Inline named types instead of referencing them */
  inlineRefs?: boolean;
  /** Tag that selects and names properties at every depth, defaults to json */
  propertyNameTag?: LocationTag;
  /** Field name -> property name overrides for the root's fields */
  propertyNameMapping?: NameMapping;
  /** Ignore embedded arrays and maps instead of adopting their schema */
  skipEmbeddedMapsSlices?: boolean;
  interceptType?: TypeInterceptor;
  interceptProperty?: PropertyInterceptor;
  operation?: OperationContext;
}

export interface TypeInspector {
  /**
   * Produce the schema of a type; named sub-schemas end up in the result's
   * definitions unless collectDefinitions is set
   */
  reflect(source: TypeSource, options?: ReflectOptions): JsonSchema;
}
