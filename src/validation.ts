/**
 * Pure validation functions for session parameters
 * No side effects, return ValidationResult
 */

import { InvalidParameterError, ValidationIssue, ValidationResult } from './error.js';

function result(errors: ValidationIssue[]): ValidationResult {
  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate a probability such as an error rate, threshold or fraction
 * Rules: finite number within [0, 1]
 */
export function validateRate(field: string, value: number): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (typeof value !== 'number' || Number.isNaN(value)) {
    errors.push({ field, message: 'Must be a number', value });
  } else if (value < 0 || value > 1) {
    errors.push({ field, message: 'Must lie within [0, 1]', value });
  }

  return result(errors);
}

/**
 * Validate a strictly positive integer (stream lengths, counts)
 */
export function validatePositiveInteger(field: string, value: number): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!Number.isSafeInteger(value) || value <= 0) {
    errors.push({ field, message: 'Must be a positive integer', value });
  }

  return result(errors);
}

/**
 * Validate a duration in milliseconds
 */
export function validateDuration(field: string, value: number): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!Number.isFinite(value) || value <= 0) {
    errors.push({ field, message: 'Must be a positive duration in milliseconds', value });
  }

  return result(errors);
}

/**
 * Validate the derived key length
 * ChaCha20-Poly1305 takes 256-bit keys only
 */
export function validateKeyLength(bits: number): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (bits !== 256) {
    errors.push({
      field: 'keyLengthBits',
      message: 'Session keys must be 256 bits for ChaCha20-Poly1305',
      value: bits,
    });
  }

  return result(errors);
}

/**
 * Validate a TCP port
 */
export function validatePort(port: number): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!Number.isInteger(port)) {
    errors.push({ field: 'port', message: 'Port must be an integer', value: port });
  } else if (port < 0 || port > 65535) {
    errors.push({ field: 'port', message: 'Port is outside valid range (0-65535)', value: port });
  }

  return result(errors);
}

/**
 * Merge several results into one
 */
export function combine(...results: ValidationResult[]): ValidationResult {
  return result(results.flatMap(r => r.errors));
}

/**
 * Throw InvalidParameterError carrying every accumulated issue
 */
export function assertValid(validation: ValidationResult, message: string): void {
  if (!validation.valid) {
    const detail = validation.errors.map(e => `${e.field}: ${e.message}`).join('; ');
    throw new InvalidParameterError(`${message} (${detail})`, validation.errors);
  }
}
