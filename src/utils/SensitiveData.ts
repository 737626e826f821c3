/**
 * Utilities for keeping original values out of diagnostics
 */

const DEFAULT_MASK = '*** FILTERED ***';

const TRUTHY_FLAGS = ['true', '1', 'yes', 'on'];

/**
 * Returns true when masking is requested via environment variable.
 * Supported flags: TABTOKEN_HIDE_SENSITIVE, TABTOKEN_MASK_SENSITIVE_DATA
 */
export function isSensitiveMaskEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.TABTOKEN_HIDE_SENSITIVE || env.TABTOKEN_MASK_SENSITIVE_DATA || '';
  return TRUTHY_FLAGS.includes(value.toLowerCase());
}

/**
 * Returns the mask string to use. Can be overridden via TABTOKEN_SENSITIVE_MASK.
 */
export function getMaskString(env: NodeJS.ProcessEnv = process.env): string {
  return env.TABTOKEN_SENSITIVE_MASK || DEFAULT_MASK;
}

/**
 * Replace every field with the mask, keeping the field count visible
 */
export function maskFields(fields: readonly string[], mask: string = DEFAULT_MASK): string[] {
  return fields.map(() => mask);
}

/**
 * Fields as they should appear in a diagnostic
 */
export function presentFields(
  fields: readonly string[],
  hideSensitive: boolean,
  mask: string = DEFAULT_MASK,
): string[] {
  return hideSensitive ? maskFields(fields, mask) : [...fields];
}
