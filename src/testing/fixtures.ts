/**
 * Shared type descriptions and helpers for tests
 *
 * A small order-management API: enough named, nested, embedded and
 * location-annotated types to exercise every builder.
 */

import { vi } from 'vitest';
import type { Logger } from '../logger.js';
import { t } from '../type-builder.js';
import type { Operation } from '../types/openapi.js';

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function newOperation(): Operation {
  return { responses: {} };
}

export const Address = t.struct('Address', [
  t.field('Street', t.string(), { json: 'street', required: true }),
  t.field('City', t.string(), { json: 'city' }),
]);

export const Customer = t.struct('Customer', [
  t.field('Name', t.string(), { json: 'name', required: true }),
  t.field('Address', Address, { json: 'address' }),
]);

export const Status = t.named('Status', t.string({ enum: ['open', 'closed'] }));

export const Paging = t.struct(undefined, [
  t.field('Limit', t.integer(), { query: 'limit', minimum: 1, maximum: 100, default: 20 }),
  t.field('Offset', t.integer(), { query: 'offset' }),
]);

export const ListOrdersInput = t.struct('ListOrdersInput', [
  t.embed(Paging),
  t.field('Status', Status, { query: 'status' }),
  t.field('Tags', t.array(t.string()), { query: 'tags', collectionFormat: 'csv' }),
  t.field('TenantID', t.string(), { path: 'tenant', description: 'Tenant identifier' }),
  t.field('RequestID', t.string(), { header: 'X-Request-ID' }),
  t.field('Session', t.string(), { cookie: 'session' }),
]);

export const CreateOrderInput = t.struct('CreateOrderInput', [
  t.field('TenantID', t.string(), { path: 'tenant' }),
  t.field('Customer', Customer, { json: 'customer', required: true }),
  t.field('Quantity', t.integer(), { json: 'quantity', minimum: 1 }),
  t.field('Note', t.nullable(t.string()), { json: 'note' }),
]);

export const UploadInput = t.struct('UploadInput', [
  t.field('Title', t.string(), { formData: 'title' }),
  t.field('Attachment', t.file(), { formData: 'attachment' }),
]);

export const Order = t.struct('Order', [
  t.field('ID', t.integer({ format: 'int64' }), { json: 'id', required: true }),
  t.field('Status', Status, { json: 'status' }),
  t.field('Customer', Customer, { json: 'customer' }),
  t.field('ETag', t.string(), { header: 'ETag', description: 'Entity version' }),
  t.field('RateLimit', t.integer(), { header: 'X-Rate-Limit' }),
], { description: 'Order details' });

export const Empty = t.struct('Empty', []);
