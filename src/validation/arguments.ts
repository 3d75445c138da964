import { z, type ZodType, type ZodTypeDef } from 'zod';
import { ValidationError, UnsupportedFeatureError } from '../errors/categories.js';
import type { Capability } from '../types/common.js';

function requiredStringSchema(param: string) {
  return z
    .string({
      required_error: `${param} is required`,
      invalid_type_error: `${param} must be a single string`,
    })
    .min(1, `${param} cannot be empty`)
    .refine((value) => value.trim() !== '', `${param} cannot be empty`);
}

function flagSchema(param: string) {
  return z.boolean({
    required_error: `${param} is required`,
    invalid_type_error: `${param} must be a single boolean`,
  });
}

/**
 * Runs a zod schema and rethrows its first issue as a `ValidationError`.
 */
export function parseArgument<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  param: string
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const path = issue && issue.path.length > 0 ? `${param}.${issue.path.join('.')}` : param;
  throw new ValidationError(issue?.message ?? `${param} is invalid`, { param: path });
}

export function requireString(value: unknown, param: string): string {
  return parseArgument(requiredStringSchema(param), value, param);
}

export function requireFlag(value: unknown, param: string): boolean {
  return parseArgument(flagSchema(param), value, param);
}

/**
 * Accepts a capability toggle only when it is switched off.
 *
 * Non-boolean values fail as a `ValidationError`; `true` fails as an
 * `UnsupportedFeatureError` naming the capability.
 */
export function rejectUnsupported(capability: Capability, requested: unknown): false {
  if (requireFlag(requested, capability)) {
    throw new UnsupportedFeatureError(capability);
  }
  return false;
}
