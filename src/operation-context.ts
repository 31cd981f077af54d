/**
 * Operation context helpers for reflection hooks
 */

import type { ReflectContext } from './types/inspector.js';
import type { OperationContext } from './types/operation-context.js';

/**
 * Copy of the context carrying the processing marker for one reflection pass
 */
export function withOperation(
  oc: OperationContext,
  processingResponse: boolean,
  processingIn: string
): OperationContext {
  return { ...oc, processingResponse, processingIn };
}

/**
 * Operation context of a reflection pass, if the pass was started by a builder
 */
export function operationCtx(context: ReflectContext): OperationContext | undefined {
  return context.operation;
}
