/**
 * Parses the JSON body and checks it against a field schema.
 * The parsed body is handed on in `ctx.body`; violations throw ValidationError.
 */

import { ValidationError } from '../errors.js';
import type { BodySchema, FieldSchema } from '../types/common.js';
import type { Middleware } from './pipeline.js';

export function validateBody(schema: BodySchema): Middleware {
  return (next) => async (req, ctx) => {
    let parsed: unknown;
    try {
      parsed = await req.json();
    } catch {
      throw new ValidationError('Request body must be valid JSON');
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ValidationError('Request body must be a JSON object');
    }
    const body: Record<string, unknown> = { ...parsed };

    const errors = validateFields(body, schema);
    if (errors.length > 0) {
      throw new ValidationError(errors.join('; '), { fields: errors });
    }

    return next(req, { ...ctx, body });
  };
}

export function validateFields(body: Record<string, unknown>, schema: BodySchema): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (value === undefined || value === null) {
      if (fieldSchema.required) errors.push(`${field} is required`);
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }
    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(field: string, value: unknown, schema: FieldSchema): string | null {
  switch (schema.type) {
    case 'string':
      return typeof value === 'string' ? null : `${field} must be a string`;
    case 'number':
      return typeof value === 'number' && Number.isFinite(value)
        ? null
        : `${field} must be a number`;
    case 'boolean':
      return typeof value === 'boolean' ? null : `${field} must be a boolean`;
    case 'array':
      return Array.isArray(value) ? null : `${field} must be an array`;
    case 'object':
      return typeof value === 'object' && !Array.isArray(value)
        ? null
        : `${field} must be an object`;
  }
}

function checkConstraints(field: string, value: unknown, schema: FieldSchema): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.required && value.trim().length === 0) {
      errors.push(`${field} must not be empty`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (typeof value === 'number') {
    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${field} must be a whole number`);
    }
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  if (Array.isArray(value)) {
    if (schema.required && value.length === 0) {
      errors.push(`${field} must not be empty`);
    }
    if (schema.maxItems !== undefined && value.length > schema.maxItems) {
      errors.push(`${field} must have at most ${schema.maxItems} items`);
    }
  }

  return errors;
}
