/**
 * Runtime type descriptions
 *
 * Request and response types are described as data so the reflector can walk
 * them the same way on every call. A type is either a TypeDef value or an
 * object implementing Describable.
 */

export type ScalarKind = 'string' | 'number' | 'integer' | 'boolean';

export type CollectionFormat = 'csv' | 'ssv' | 'pipes' | 'multi';

export type ParameterStyle =
  | 'matrix'
  | 'label'
  | 'form'
  | 'simple'
  | 'spaceDelimited'
  | 'pipeDelimited'
  | 'deepObject';

interface TypeMeta {
  /** Named types are hoisted into components/schemas and referenced */
  name?: string;
  title?: string;
  description?: string;
}

export interface ScalarType extends TypeMeta {
  kind: ScalarKind;
  format?: string;
  enum?: Array<string | number | boolean>;
}

export interface AnyType extends TypeMeta {
  kind: 'any';
}

/** Uploaded file or stream */
export interface FileType extends TypeMeta {
  kind: 'file';
}

export interface ArrayType extends TypeMeta {
  kind: 'array';
  items: TypeDef;
}

/** String-keyed dictionary */
export interface MapType extends TypeMeta {
  kind: 'map';
  values: TypeDef;
}

/** Pointer-like wrapper, the value may be null */
export interface NullableType extends TypeMeta {
  kind: 'nullable';
  of: TypeDef;
}

export interface StructType extends TypeMeta {
  kind: 'struct';
  fields: FieldDef[];
  /** false closes the field set: unknown properties are rejected */
  additionalProperties?: false;
  /** Opt a GET/HEAD/DELETE/TRACE input into carrying a body */
  forceRequestBody?: boolean;
}

export type TypeDef =
  | ScalarType
  | AnyType
  | FileType
  | ArrayType
  | MapType
  | NullableType
  | StructType;

export type TypeKind = TypeDef['kind'];

export interface FieldDef {
  /** Declaring-side name, the key of name-remapping tables */
  name: string;
  type: TypeDef;
  annotations: FieldAnnotations;
  /** Fields of an embedded struct are flattened into the parent */
  embedded?: boolean;
}

export interface LocationAnnotations {
  query?: string;
  path?: string;
  header?: string;
  cookie?: string;
  formData?: string;
  json?: string;
}

export type LocationTag = keyof LocationAnnotations;

/** Options copied onto parameter and header descriptors */
export interface DescriptorAnnotations {
  description?: string;
  required?: boolean;
  deprecated?: boolean;
  example?: unknown;
  style?: ParameterStyle;
  explode?: boolean;
  allowEmptyValue?: boolean;
  allowReserved?: boolean;
  collectionFormat?: CollectionFormat;
}

export interface SchemaAnnotations {
  title?: string;
  format?: string;
  pattern?: string;
  enum?: Array<string | number | boolean>;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
}

export type FieldAnnotations = LocationAnnotations & DescriptorAnnotations & SchemaAnnotations;

/**
 * Capability of a class or object that can describe its own shape
 */
export interface Describable {
  describe(): TypeDef;
}

/**
 * Marker capability enabling a request body for GET, HEAD, DELETE and TRACE.
 *
 * Forcing a body is only meant for backwards compatibility; the method body
 * can be empty.
 */
export interface RequestBodyEnforcer {
  forceRequestBody(): void;
}

export type TypeSource = TypeDef | Describable;
