import { HttpException, HttpStatus } from '@nestjs/common';

/** The parts of a class-validator ValidationError read here. */
export interface FieldError {
  property: string;
  constraints?: Record<string, string>;
  children?: FieldError[];
}

export interface ValidationIssue {
  path: string;
  message: string;
  constraint?: string;
}

/**
 * 400 raised by the global ValidationPipe when a request body or query does
 * not match its DTO. Same envelope as every other API error.
 */
export class ValidationHttpException extends HttpException {
  constructor(readonly details: ValidationIssue[]) {
    super(
      {
        success: false,
        error: 'Invalid input data',
        details,
      },
      HttpStatus.BAD_REQUEST,
    );
    this.name = 'ValidationHttpException';
  }

  /** `exceptionFactory` for ValidationPipe. */
  public static fromValidationErrors(
    errors: FieldError[],
  ): ValidationHttpException {
    return new ValidationHttpException(toValidationIssues(errors));
  }
}

/** Flatten nested class-validator errors into dotted-path issues. */
export function toValidationIssues(
  errors: FieldError[],
  parentPath = '',
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    for (const [constraint, message] of Object.entries(
      error.constraints ?? {},
    )) {
      issues.push({ path, message, constraint });
    }
    if (error.children && error.children.length > 0) {
      issues.push(...toValidationIssues(error.children, path));
    }
  }
  return issues;
}
