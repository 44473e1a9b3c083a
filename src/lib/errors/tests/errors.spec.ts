import { HttpStatus } from '@nestjs/common';
import { ApiHttpException } from '../ApiHttpException';
import { MongoActionError } from '../MongoActionError';
import { rejected } from '../../creation/creation-result';
import {
  ValidationHttpException,
  toValidationIssues,
} from '../ValidationHttpException';

describe('ApiHttpException', () => {
  it('maps a creation failure to its status and envelope', () => {
    const err = ApiHttpException.fromCreationFailure(
      'hive',
      rejected('NotFound', 'User not found'),
    );
    expect(err.getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(err.getResponse()).toEqual({
      success: false,
      error: 'User not found',
    });
  });
});

describe('ValidationHttpException', () => {
  it('flattens nested errors into dotted paths', () => {
    const issues = toValidationIssues([
      {
        property: 'location',
        children: [
          {
            property: 'latitude',
            constraints: { isNumber: 'latitude must be a number' },
          },
        ],
      },
      { property: 'name', constraints: { isString: 'name must be a string' } },
    ]);

    expect(issues).toEqual([
      {
        path: 'location.latitude',
        message: 'latitude must be a number',
        constraint: 'isNumber',
      },
      { path: 'name', message: 'name must be a string', constraint: 'isString' },
    ]);
  });

  it('renders the shared error envelope with 400', () => {
    const err = ValidationHttpException.fromValidationErrors([
      { property: 'email', constraints: { isString: 'email must be a string' } },
    ]);
    expect(err.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(err.getResponse()).toEqual({
      success: false,
      error: 'Invalid input data',
      details: [
        {
          path: 'email',
          message: 'email must be a string',
          constraint: 'isString',
        },
      ],
    });
  });
});

describe('MongoActionError.wrap', () => {
  it('keeps an existing MongoActionError', () => {
    const original = new MongoActionError('x', { operation: 'find' });
    expect(MongoActionError.wrap(original, { operation: 'insertOne' })).toBe(
      original,
    );
  });

  it('uses the fallback message for non-errors', () => {
    const wrapped = MongoActionError.wrap('weird', { operation: 'ping' }, 'ping failed');
    expect(wrapped.message).toBe('ping failed');
    expect(wrapped.cause).toBe('weird');
    expect(wrapped.summary()).toBe('Mongo action failed: op=ping');
  });
});
