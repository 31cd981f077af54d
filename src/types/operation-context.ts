/**
 * Unit of work for building one operation
 */

import type { Operation } from './openapi.js';
import type { TypeSource } from './type-model.js';

/** Field name -> transmitted name overrides */
export type NameMapping = Record<string, string>;

export interface OperationContext {
  operation: Operation;
  input?: TypeSource;
  httpMethod?: string;

  reqQueryMapping?: NameMapping;
  reqPathMapping?: NameMapping;
  reqCookieMapping?: NameMapping;
  reqHeaderMapping?: NameMapping;
  reqFormDataMapping?: NameMapping;

  output?: TypeSource;
  httpStatus?: number;
  respContentType?: string;
  respHeaderMapping?: NameMapping;

  /** Set while a response is being reflected; read by interceptors only */
  processingResponse?: boolean;
  /** Location being reflected: query, path, cookie, header, body; read by interceptors only */
  processingIn?: string;
}
