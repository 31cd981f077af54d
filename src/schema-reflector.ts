/**
 * Default type inspector
 *
 * Walks a type description and produces a JSON Schema fragment. Named types
 * are hoisted into definitions (or handed to a collector) and referenced, so
 * shared and recursive types are described once.
 */

import { COMPONENTS_SCHEMAS_PREFIX, TAG } from './constants.js';
import { ReflectionError } from './errors.js';
import { sanitizeDefinitionName, schemaRef } from './naming.js';
import { isSliceOrMap, resolveType, taggedName, unwrapType } from './type-utils.js';
import type {
  ReflectContext,
  ReflectOptions,
  TypeInspector,
  TypeInterceptor,
} from './types/inspector.js';
import type { JsonSchema, JsonSchemaType } from './types/json-schema.js';
import type { FieldAnnotations, FieldDef, StructType, TypeDef, TypeSource } from './types/type-model.js';

export interface SchemaReflectorSettings {
  /** Rename a definition before it is referenced */
  interceptDefName?: (type: TypeDef, defaultName: string) => string;
}

interface WalkState {
  options: ReflectOptions;
  path: string[];
  definitions: Record<string, JsonSchema>;
  /** Definition names already emitted (or in progress) during this pass */
  emitted: Set<string>;
  /** Named types currently being inlined */
  inlining: Set<string>;
  /** Unnamed structs on the current walk path */
  structs: StructType[];
}

interface FieldCollection {
  properties: Record<string, JsonSchema>;
  required: string[];
  replacement?: JsonSchema;
}

export class SchemaReflector implements TypeInspector {
  private interceptors: TypeInterceptor[] = [];

  constructor(private settings: SchemaReflectorSettings = {}) {}

  /**
   * Register a type interceptor; interceptors run in registration order,
   * before the per-call interceptType option
   */
  addInterceptor(interceptor: TypeInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  reflect(source: TypeSource, options: ReflectOptions = {}): JsonSchema {
    const root = resolveType(source);
    const state: WalkState = {
      options,
      path: [],
      definitions: {},
      emitted: new Set(),
      inlining: new Set(),
      structs: [],
    };

    const schema = options.rootRef && root.name
      ? this.reference(root, undefined, state, true)
      : this.build(root, undefined, state, true);

    const { collectDefinitions } = options;
    if (collectDefinitions) {
      for (const [name, definition] of Object.entries(state.definitions)) {
        collectDefinitions(name, definition);
      }
    } else if (Object.keys(state.definitions).length > 0) {
      schema.definitions = state.definitions;
    }

    return schema;
  }

  definitionName(type: TypeDef): string {
    const name = type.name ?? '';
    const intercepted = this.settings.interceptDefName?.(type, name) ?? name;
    return sanitizeDefinitionName(intercepted);
  }

  private walk(type: TypeDef, field: FieldDef | undefined, state: WalkState): JsonSchema {
    if (!type.name) {
      return this.build(type, field, state, false);
    }

    if (!state.options.inlineRefs) {
      return this.reference(type, field, state);
    }

    const name = this.definitionName(type);
    if (state.inlining.has(name)) {
      throw new ReflectionError(`recursive type ${name} cannot be inlined`, {
        type: name,
        path: state.path.join('.'),
      });
    }

    state.inlining.add(name);
    try {
      return this.build(type, field, state, false);
    } finally {
      state.inlining.delete(name);
    }
  }

  private reference(
    type: TypeDef,
    field: FieldDef | undefined,
    state: WalkState,
    isRoot = false
  ): JsonSchema {
    const name = this.definitionName(type);
    const prefix = state.options.definitionsPrefix ?? COMPONENTS_SCHEMAS_PREFIX;

    if (!state.emitted.has(name)) {
      state.emitted.add(name);
      state.definitions[name] = this.build(type, field, state, isRoot);
    }

    return { $ref: schemaRef(name, prefix) };
  }

  private build(type: TypeDef, field: FieldDef | undefined, state: WalkState, isRoot: boolean): JsonSchema {
    const schema: JsonSchema = {};
    const context = this.context(state);

    for (const interceptor of [...this.interceptors, state.options.interceptType]) {
      if (interceptor?.({ type, field, schema, context })) {
        return schema;
      }
    }

    switch (type.kind) {
      case 'string':
      case 'number':
      case 'integer':
      case 'boolean':
        schema.type = type.kind;
        if (type.format) schema.format = type.format;
        if (type.enum) schema.enum = [...type.enum];
        break;

      case 'any':
        break;

      case 'file':
        schema.type = 'string';
        schema.format = 'binary';
        break;

      case 'array':
        schema.type = 'array';
        schema.items = this.walk(type.items, undefined, state);
        break;

      case 'map':
        schema.type = 'object';
        schema.additionalProperties = this.walk(type.values, undefined, state);
        break;

      case 'nullable': {
        const inner = type.of.name
          ? this.walk(type.of, field, state)
          : this.build(type.of, field, state, isRoot);
        if (inner.$ref === undefined) {
          addNullType(inner);
        }
        return inner;
      }

      case 'struct': {
        const replacement = this.buildStruct(type, schema, state, isRoot);
        if (replacement) return replacement;
        break;
      }

      default: {
        const kind: unknown = Reflect.get(type, 'kind');
        throw new ReflectionError(`unsupported type kind ${String(kind)}`, {
          kind,
          path: state.path.join('.'),
        });
      }
    }

    if (type.title) schema.title = type.title;
    if (type.description) schema.description = type.description;

    return schema;
  }

  private buildStruct(
    type: StructType,
    schema: JsonSchema,
    state: WalkState,
    isRoot: boolean
  ): JsonSchema | undefined {
    if (!type.name && state.structs.includes(type)) {
      throw new ReflectionError('recursive struct must be named to be described', {
        path: state.path.join('.'),
      });
    }

    const collected: FieldCollection = { properties: {}, required: [] };
    state.structs.push(type);
    try {
      this.collectFields(type, state, isRoot, collected);
    } finally {
      state.structs.pop();
    }

    if (collected.replacement) {
      return collected.replacement;
    }

    schema.type = 'object';
    if (Object.keys(collected.properties).length > 0) {
      schema.properties = collected.properties;
    }
    if (collected.required.length > 0) {
      schema.required = collected.required;
    }
    if (type.additionalProperties === false) {
      schema.additionalProperties = false;
    }

    return undefined;
  }

  private collectFields(type: StructType, state: WalkState, isRoot: boolean, into: FieldCollection): void {
    const { options } = state;
    // The tag selects properties at every depth; the mapping only renames the root's fields.
    const tag = options.propertyNameTag ?? TAG.JSON;
    const mapping = isRoot ? options.propertyNameMapping : undefined;

    for (const field of type.fields) {
      const propertyName = mappedName(mapping, field.name) ?? taggedName(field, tag);

      if (field.embedded && propertyName === undefined) {
        const embedded = unwrapType(field.type);

        if (embedded.kind === 'struct') {
          this.collectFields(embedded, state, isRoot, into);
          if (into.replacement) return;
          continue;
        }

        if (isSliceOrMap(embedded)) {
          if (options.skipEmbeddedMapsSlices) continue;
          into.replacement = this.walk(field.type, field, state);
          return;
        }

        throw new ReflectionError(`embedded field ${field.name || '(unnamed)'} must be a struct, array or map`, {
          field: field.name,
          kind: embedded.kind,
        });
      }

      if (propertyName === undefined) continue;

      state.path.push(propertyName);
      try {
        const propertySchema = this.walk(field.type, field, state);
        if (propertySchema.$ref === undefined) {
          applyAnnotations(propertySchema, field.annotations);
        }

        if (field.annotations.required) {
          into.required.push(propertyName);
        }
        into.properties[propertyName] = propertySchema;

        if (isRoot && options.interceptProperty) {
          options.interceptProperty({
            name: propertyName,
            field,
            propertySchema,
            context: this.context(state),
          });
        }
      } finally {
        state.path.pop();
      }
    }
  }

  private context(state: WalkState): ReflectContext {
    return {
      options: state.options,
      operation: state.options.operation,
      path: [...state.path],
    };
  }
}

function mappedName(mapping: Record<string, string> | undefined, fieldName: string): string | undefined {
  if (!mapping || !Object.hasOwn(mapping, fieldName)) return undefined;
  return mapping[fieldName];
}

function addNullType(schema: JsonSchema): void {
  if (schema.type === undefined) return;

  const types: JsonSchemaType[] = Array.isArray(schema.type) ? schema.type : [schema.type];
  if (!types.includes('null')) {
    schema.type = [...types, 'null'];
  }
}

/**
 * Copy schema-level field annotations onto a property schema
 */
function applyAnnotations(schema: JsonSchema, annotations: FieldAnnotations): void {
  if (annotations.title !== undefined) schema.title = annotations.title;
  if (annotations.description !== undefined) schema.description = annotations.description;
  if (annotations.format !== undefined) schema.format = annotations.format;
  if (annotations.pattern !== undefined) schema.pattern = annotations.pattern;
  if (annotations.enum !== undefined) schema.enum = [...annotations.enum];
  if (annotations.default !== undefined) schema.default = annotations.default;
  if (annotations.minimum !== undefined) schema.minimum = annotations.minimum;
  if (annotations.maximum !== undefined) schema.maximum = annotations.maximum;
  if (annotations.multipleOf !== undefined) schema.multipleOf = annotations.multipleOf;
  if (annotations.minLength !== undefined) schema.minLength = annotations.minLength;
  if (annotations.maxLength !== undefined) schema.maxLength = annotations.maxLength;
  if (annotations.minItems !== undefined) schema.minItems = annotations.minItems;
  if (annotations.maxItems !== undefined) schema.maxItems = annotations.maxItems;
  if (annotations.uniqueItems !== undefined) schema.uniqueItems = annotations.uniqueItems;
  if (annotations.readOnly !== undefined) schema.readOnly = annotations.readOnly;
  if (annotations.writeOnly !== undefined) schema.writeOnly = annotations.writeOnly;
  if (annotations.deprecated !== undefined) schema.deprecated = annotations.deprecated;
  if (annotations.example !== undefined) schema.examples = [annotations.example];
}
