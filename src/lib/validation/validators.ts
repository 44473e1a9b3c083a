import { isEmail } from 'class-validator';
import { parseIsoDate } from '../time/calendar';
import { invalid, valid, type ValidationResult } from './validation-result';

/*
 * Single-field checks. None of these throw: a malformed value is the thing
 * being classified, so it comes back as an invalid result.
 */

export function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

// Plain decimal, optionally signed, with an optional exponent.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Finite number from a number or decimal string; null for anything else. */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && DECIMAL.test(value.trim())) {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function validateRequiredField(
  value: unknown,
  fieldName: string,
): ValidationResult {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return invalid(`${fieldName} is required`);
  }
  return valid();
}

/** Absent values pass; required-ness is a separate check. */
export function validateMaxLength(
  value: string | null | undefined,
  max: number,
  fieldName: string,
): ValidationResult {
  if (isPresent(value) && value.length > max) {
    return invalid(`${fieldName} must be at most ${max} characters`);
  }
  return valid();
}

function validateAxis(
  value: unknown,
  label: 'Latitude' | 'Longitude',
  limit: 90 | 180,
): ValidationResult {
  if (!isPresent(value)) return valid();
  const n = toFiniteNumber(value);
  if (n === null) return invalid(`${label} must be a valid number`);
  if (n < -limit || n > limit) {
    return invalid(`${label} must be between -${limit} and ${limit} degrees`);
  }
  return valid();
}

export function validateLatitude(value: unknown): ValidationResult {
  return validateAxis(value, 'Latitude', 90);
}

export function validateLongitude(value: unknown): ValidationResult {
  return validateAxis(value, 'Longitude', 180);
}

/**
 * Both or neither. With exactly one present the pair is rejected before the
 * present value's own range is looked at.
 */
export function validateCoordinates(
  latitude: unknown,
  longitude: unknown,
): ValidationResult {
  const hasLat = isPresent(latitude);
  const hasLng = isPresent(longitude);
  if (!hasLat && !hasLng) return valid();
  if (hasLat !== hasLng) {
    return invalid('Both latitude and longitude must be provided together');
  }
  const lat = validateLatitude(latitude);
  if (!lat.isValid) return lat;
  return validateLongitude(longitude);
}

/**
 * Syntax-only email check (no DNS). UTF-8 local parts are accepted;
 * IP-literal domains and display names are not.
 * Validator-specific detail is collapsed to one message.
 */
export function validateEmail(value: unknown): ValidationResult {
  if (typeof value !== 'string' || value.length === 0) {
    return invalid('Email is required');
  }
  const ok = isEmail(value, {
    allow_utf8_local_part: true,
    allow_ip_domain: false,
    allow_display_name: false,
    require_tld: true,
  });
  return ok ? valid() : invalid('Invalid email format');
}

/** Strict `YYYY-MM-DD` naming a real calendar day. */
export function validateCalendarDate(
  value: unknown,
  fieldName: string,
): ValidationResult {
  if (typeof value === 'string' && parseIsoDate(value) !== null) {
    return valid();
  }
  return invalid(`${fieldName} must be a valid date (YYYY-MM-DD)`);
}

/** First failing result, or valid when every check passes. */
export function firstInvalid(
  ...results: readonly ValidationResult[]
): ValidationResult {
  return results.find((r) => !r.isValid) ?? valid();
}
