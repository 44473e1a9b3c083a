export interface ValidationResult {
  readonly isValid: boolean;
  readonly errorMessage: string | null;
}

const VALID: ValidationResult = Object.freeze({
  isValid: true,
  errorMessage: null,
});

export function valid(): ValidationResult {
  return VALID;
}

export function invalid(errorMessage: string): ValidationResult {
  return Object.freeze({ isValid: false, errorMessage });
}
