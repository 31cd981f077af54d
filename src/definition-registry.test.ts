/**
 * Tests for the document definition registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DefinitionRegistry } from './definition-registry.js';
import type { Logger } from './logger.js';
import type { SchemaOrRef } from './types/openapi.js';
import { createMockLogger } from './testing/fixtures.js';

describe('DefinitionRegistry', () => {
  let schemas: Record<string, SchemaOrRef>;
  let logger: Logger;
  let registry: DefinitionRegistry;

  beforeEach(() => {
    schemas = {};
    logger = createMockLogger();
    registry = new DefinitionRegistry(schemas, logger);
  });

  it('should write converted definitions into the document', () => {
    expect(registry.collect('Note', { type: ['string', 'null'] })).toBe(true);

    expect(schemas).toEqual({ Note: { type: 'string', nullable: true } });
    expect(logger.debug).toHaveBeenCalledWith('Collected definition', { name: 'Note' });
  });

  it('should keep the first definition of a name', () => {
    registry.collect('Order', { type: 'object', description: 'first' });
    expect(registry.collect('Order', { type: 'object', description: 'second' })).toBe(false);

    expect(registry.get('Order')).toEqual({ type: 'object', description: 'first' });
    expect(registry.size).toBe(1);
    expect(logger.debug).toHaveBeenCalledWith('Definition already registered, keeping first', { name: 'Order' });
  });

  it('should not change the document when collecting the same schema again', () => {
    registry.collect('Order', { type: 'object' });
    const before = JSON.stringify(schemas);

    registry.collect('Order', { type: 'object' });

    expect(JSON.stringify(schemas)).toBe(before);
  });

  it('should respect definitions already present in the document', () => {
    schemas.Legacy = { type: 'string' };

    expect(registry.has('Legacy')).toBe(true);
    expect(registry.collect('Legacy', { type: 'integer' })).toBe(false);
    expect(schemas.Legacy).toEqual({ type: 'string' });
  });

  it('should not treat prototype keys as definitions', () => {
    expect(registry.has('constructor')).toBe(false);
    expect(registry.get('constructor')).toBeUndefined();
  });

  it('should list names in insertion order', () => {
    registry.collect('B', {});
    registry.collect('A', {});

    expect(registry.names()).toEqual(['B', 'A']);
  });

  it('should work without a logger', () => {
    const silent = new DefinitionRegistry({});
    expect(silent.collect('X', {})).toBe(true);
  });
});
