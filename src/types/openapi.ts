/**
 * OpenAPI document types
 *
 * Aliases over openapi-types. Operations accept x- vendor extensions, which
 * is where the forbid-unknown markers land.
 */

import type { OpenAPIV3 } from 'openapi-types';

export type OperationExtensions = { [extension: `x-${string}`]: unknown };

export type Document = OpenAPIV3.Document<OperationExtensions>;
export type Operation = OpenAPIV3.OperationObject<OperationExtensions>;
export type Parameter = OpenAPIV3.ParameterObject;
export type Header = OpenAPIV3.HeaderObject;
export type Response = OpenAPIV3.ResponseObject;
export type MediaType = OpenAPIV3.MediaTypeObject;
export type RequestBody = OpenAPIV3.RequestBodyObject;
export type Schema = OpenAPIV3.SchemaObject;
export type Reference = OpenAPIV3.ReferenceObject;
export type SchemaOrRef = Schema | Reference;

export type ParameterLocation = 'query' | 'path' | 'header' | 'cookie';

export type HttpMethod = 'get' | 'put' | 'post' | 'delete' | 'options' | 'head' | 'patch' | 'trace';
