/**
 * Declarative field options for parameter and header descriptors
 *
 * Annotation values can come from untyped sources (plain JS, parsed files),
 * so they are validated before being copied onto the descriptor.
 */

import { z } from 'zod';
import { FieldPopulationError } from './errors.js';
import type { Header, Parameter } from './types/openapi.js';
import type { FieldDef } from './types/type-model.js';

export const descriptorOptionsSchema = z.object({
  description: z.string().optional(),
  required: z.boolean().optional(),
  deprecated: z.boolean().optional(),
  allowEmptyValue: z.boolean().optional(),
  style: z.enum([
    'matrix',
    'label',
    'form',
    'simple',
    'spaceDelimited',
    'pipeDelimited',
    'deepObject',
  ]).optional(),
  explode: z.boolean().optional(),
  allowReserved: z.boolean().optional(),
  collectionFormat: z.enum(['csv', 'ssv', 'pipes', 'multi']).optional(),
  example: z.unknown().optional(),
});

export type DescriptorOptions = z.infer<typeof descriptorOptionsSchema>;

/**
 * Validate the descriptor options of a field
 */
export function readDescriptorOptions(field: FieldDef): DescriptorOptions {
  const result = descriptorOptionsSchema.safeParse(field.annotations);

  if (!result.success) {
    const reason = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new FieldPopulationError(field.name, reason, result.error.issues);
  }

  return result.data;
}

/**
 * Copy the field's declarative options onto a parameter or header
 */
export function populateFromAnnotations(target: Parameter | Header, field: FieldDef): void {
  const options = readDescriptorOptions(field);

  if (options.description !== undefined) target.description = options.description;
  if (options.required !== undefined) target.required = options.required;
  if (options.deprecated !== undefined) target.deprecated = options.deprecated;
  if (options.allowEmptyValue !== undefined) target.allowEmptyValue = options.allowEmptyValue;
  if (options.style !== undefined) target.style = options.style;
  if (options.explode !== undefined) target.explode = options.explode;
  if (options.allowReserved !== undefined) target.allowReserved = options.allowReserved;
  if (options.example !== undefined) target.example = options.example;
}
