/**
 * Tests for parameter extraction
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DefinitionRegistry } from './definition-registry.js';
import { DuplicateParameterError } from './errors.js';
import { ParameterExtractor } from './parameter-extractor.js';
import { SchemaReflector } from './schema-reflector.js';
import { t } from './type-builder.js';
import type { Operation, SchemaOrRef } from './types/openapi.js';
import { createMockLogger, ListOrdersInput, newOperation } from './testing/fixtures.js';

describe('ParameterExtractor', () => {
  let schemas: Record<string, SchemaOrRef>;
  let inspector: SchemaReflector;
  let extractor: ParameterExtractor;
  let operation: Operation;

  beforeEach(() => {
    schemas = {};
    inspector = new SchemaReflector();
    const logger = createMockLogger();
    extractor = new ParameterExtractor(inspector, new DefinitionRegistry(schemas, logger), logger);
    operation = newOperation();
  });

  it('should add query parameters, flattening embedded structs', () => {
    extractor.extract({ operation, input: ListOrdersInput }, 'query');

    expect(operation.parameters).toEqual([
      { name: 'limit', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 100, default: 20 } },
      { name: 'offset', in: 'query', schema: { type: 'integer' } },
      { name: 'status', in: 'query', schema: { $ref: '#/components/schemas/Status' } },
      {
        name: 'tags',
        in: 'query',
        schema: { type: 'array', items: { type: 'string' } },
        style: 'form',
        explode: false,
      },
    ]);
    expect(schemas).toEqual({ Status: { type: 'string', enum: ['open', 'closed'] } });
  });

  it('should mark path parameters as required', () => {
    extractor.extract({ operation, input: ListOrdersInput }, 'path');

    expect(operation.parameters).toEqual([
      {
        name: 'tenant',
        in: 'path',
        description: 'Tenant identifier',
        schema: { type: 'string', description: 'Tenant identifier' },
        required: true,
      },
    ]);
  });

  it('should override an explicit required false on path parameters', () => {
    const input = t.struct(undefined, [t.field('ID', t.string(), { path: 'id', required: false })]);

    extractor.extract({ operation, input }, 'path');

    expect(operation.parameters).toEqual([
      { name: 'id', in: 'path', schema: { type: 'string' }, required: true },
    ]);
  });

  it('should add header and cookie parameters', () => {
    extractor.extract({ operation, input: ListOrdersInput }, 'header');
    extractor.extract({ operation, input: ListOrdersInput }, 'cookie');

    expect(operation.parameters).toEqual([
      { name: 'X-Request-ID', in: 'header', schema: { type: 'string' } },
      { name: 'session', in: 'cookie', schema: { type: 'string' } },
    ]);
  });

  it('should reject a duplicate name in the same location', () => {
    const input = t.struct(undefined, [
      t.field('ID', t.string(), { query: 'id' }),
      t.field('Identifier', t.string(), { query: 'id' }),
    ]);

    expect(() => extractor.extract({ operation, input }, 'query'))
      .toThrow('parameter id in query is already defined');
    expect(operation.parameters).toEqual([{ name: 'id', in: 'query', schema: { type: 'string' } }]);
  });

  it('should reject a name already present on the operation', () => {
    operation.parameters = [{ name: 'offset', in: 'query' }];

    let caught: unknown;
    try {
      extractor.extract({ operation, input: ListOrdersInput }, 'query');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DuplicateParameterError);
    expect(caught).toMatchObject({ details: { name: 'offset', in: 'query' } });
    expect(operation.parameters?.map(p => ('$ref' in p ? p.$ref : p.name))).toEqual(['offset', 'limit']);
  });

  it('should allow the same name in different locations', () => {
    const input = t.struct(undefined, [
      t.field('QueryID', t.string(), { query: 'id' }),
      t.field('PathID', t.string(), { path: 'id' }),
    ]);

    extractor.extract({ operation, input }, 'query');
    extractor.extract({ operation, input }, 'path');

    expect(operation.parameters).toHaveLength(2);
  });

  it('should send JSON structured parameters as content', () => {
    const Filter = t.struct('Filter', [t.field('Status', t.string(), { json: 'status' })]);
    const input = t.struct(undefined, [t.field('Filter', Filter, { query: 'filter' })]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters).toEqual([
      {
        name: 'filter',
        in: 'query',
        content: {
          'application/json': { schema: { $ref: '#/components/schemas/Filter' } },
        },
      },
    ]);
    expect(schemas.Filter).toEqual({
      type: 'object',
      properties: { status: { type: 'string' } },
    });
  });

  it('should use deep object style for object parameters', () => {
    const input = t.struct(undefined, [t.field('Labels', t.map(t.string()), { query: 'labels' })]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters).toEqual([
      {
        name: 'labels',
        in: 'query',
        schema: { type: 'object', additionalProperties: { type: 'string' } },
        style: 'deepObject',
        explode: true,
      },
    ]);
  });

  it('should describe deep object parameters by their location tags', () => {
    const Range = t.struct('Range', [
      t.field('Min', t.integer(), { query: 'min' }),
      t.field('Max', t.integer(), { query: 'max' }),
    ]);
    const input = t.struct(undefined, [t.field('Range', Range, { query: 'range' })]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters).toEqual([
      {
        name: 'range',
        in: 'query',
        schema: { $ref: '#/components/schemas/Range' },
        style: 'deepObject',
        explode: true,
      },
    ]);
    expect(schemas.Range).toEqual({
      type: 'object',
      properties: {
        min: { type: 'integer' },
        max: { type: 'integer' },
      },
    });
  });

  it('should rename only root fields through the mapping', () => {
    const Window = t.struct('Window', [t.field('From', t.string(), { query: 'from' })]);
    const input = t.struct(undefined, [t.field('Window', Window)]);

    extractor.extract({ operation, input }, 'query', { Window: 'window', From: 'start' });

    expect(schemas.Window).toEqual({
      type: 'object',
      properties: { from: { type: 'string' } },
    });
  });

  it('should map collection formats to styles', () => {
    const input = t.struct(undefined, [
      t.field('A', t.array(t.string()), { query: 'a', collectionFormat: 'ssv' }),
      t.field('B', t.array(t.string()), { query: 'b', collectionFormat: 'pipes' }),
      t.field('C', t.array(t.string()), { query: 'c', collectionFormat: 'multi' }),
    ]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters?.map(p => ('$ref' in p ? undefined : [p.style, p.explode]))).toEqual([
      ['spaceDelimited', false],
      ['pipeDelimited', false],
      ['form', true],
    ]);
  });

  it('should let explicit options win over the collection format', () => {
    const input = t.struct(undefined, [
      t.field('Tags', t.array(t.string()), { query: 'tags', collectionFormat: 'csv', explode: true }),
    ]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters).toEqual([
      {
        name: 'tags',
        in: 'query',
        schema: { type: 'array', items: { type: 'string' } },
        style: 'form',
        explode: true,
      },
    ]);
  });

  it('should drop the nullable marker from parameter schemas', () => {
    const input = t.struct(undefined, [t.field('Since', t.nullable(t.string()), { query: 'since' })]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters).toEqual([{ name: 'since', in: 'query', schema: { type: 'string' } }]);
  });

  it('should name parameters through the mapping', () => {
    const input = t.struct(undefined, [t.field('PageToken', t.string())]);

    extractor.extract({ operation, input }, 'query', { PageToken: 'page_token' });

    expect(operation.parameters).toEqual([{ name: 'page_token', in: 'query', schema: { type: 'string' } }]);
  });

  it('should flag closed inputs as rejecting unknown parameters', () => {
    const input = t.struct(undefined, [t.field('Q', t.string(), { query: 'q' })], {
      additionalProperties: false,
    });

    extractor.extract({ operation, input }, 'query');

    expect(operation['x-forbid-unknown-query']).toBe(true);
  });

  it('should skip embedded collections', () => {
    const input = t.struct(undefined, [
      t.embed(t.array(t.string())),
      t.field('Q', t.string(), { query: 'q' }),
    ]);

    extractor.extract({ operation, input }, 'query');

    expect(operation.parameters).toEqual([{ name: 'q', in: 'query', schema: { type: 'string' } }]);
  });

  it('should skip collection inputs and missing inputs', () => {
    extractor.extract({ operation, input: t.array(t.string()) }, 'query');
    extractor.extract({ operation }, 'query');

    expect(operation.parameters).toBeUndefined();
  });

  it('should expose the processing marker to interceptors', () => {
    const seen: Array<[boolean | undefined, string | undefined]> = [];
    inspector.addInterceptor(({ context }) => {
      seen.push([context.operation?.processingResponse, context.operation?.processingIn]);
      return false;
    });

    extractor.extract({ operation, input: ListOrdersInput }, 'header');

    expect(seen.length).toBeGreaterThan(0);
    expect(seen.every(([response, location]) => response === false && location === 'header')).toBe(true);
  });
});
