/**
 * Tool Metadata Types
 * Descriptors the registry builds once at startup and the adapter lists and
 * resolves for every request. Shapes sent over the wire are type aliases so
 * they satisfy the SDK's open-ended result types.
 */

import type { OperationId } from '../engine/refactoring/types.js';

export type ParameterType = 'string' | 'integer' | 'boolean';

export type ParameterSchema = {
  type: ParameterType;
  description: string;
  default?: string | number | boolean;
  minimum?: number;
  enum?: string[];
};

export type InputSchema = {
  type: 'object';
  description: string;
  properties: Record<string, ParameterSchema>;
  required: string[];
};

export interface CapabilityDescriptor {
  /** Lowercase, hyphen-separated, unique in the registry. */
  toolName: string;
  operationId: OperationId;
  description: string;
  inputSchema: InputSchema;
}

/** One entry of a `tools/list` response. */
export type WireToolDescriptor = {
  name: string;
  description: string;
  inputSchema: InputSchema;
};

export type TextContent = {
  type: 'text';
  text: string;
};

/** Result of a `tools/call`, built exactly once per invocation. */
export type InvocationResult = {
  content: TextContent[];
  isError: boolean;
};

export function textResult(text: string, isError = false): InvocationResult {
  return { content: [{ type: 'text', text }], isError };
}
