/**
 * Shared utility types.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  /** Allowed values for string fields. */
  enum?: string[];
  /** Whole numbers only, for number fields. */
  integer?: boolean;
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;
