import {
  MongoNetworkError,
  MongoNotConnectedError,
  MongoServerError,
} from 'mongodb';
import {
  duplicateKeyField,
  translateMongoError,
} from '../internal/mongodb.errors';
import { isHex24, toObjectId } from '../internal/mongodb.ids';
import { ConfigError } from '../../../lib/errors/ConfigError';
import { MongoActionError } from '../../../lib/errors/MongoActionError';
import {
  DependencyUnavailableError,
  IntegrityViolationError,
} from '../../../lib/errors/PersistenceError';

const context = { operation: 'insertOne', collection: 'users' } as const;

describe('translateMongoError', () => {
  it('turns a duplicate key into an integrity violation', () => {
    const err = new MongoServerError({
      message:
        'E11000 duplicate key error collection: apiary.users index: email_1 dup key',
      code: 11000,
      keyPattern: { email: 1 },
    });
    const translated = translateMongoError(err, context);

    expect(translated).toBeInstanceOf(IntegrityViolationError);
    expect(translated.message).toBe(
      "Integrity constraint violated on 'email' in users",
    );
    expect(translated.cause).toBe(err);
  });

  it('reads the key from the message when keyPattern is missing', () => {
    const err = new MongoServerError({
      message:
        'E11000 duplicate key error collection: apiary.users index: apiKey_1 dup key',
      code: 11000,
    });
    expect(duplicateKeyField(err)).toBe('apiKey');
  });

  it.each([
    new MongoNetworkError('socket closed'),
    new MongoNotConnectedError('client not connected'),
  ])('reports %p as unavailable', (err) => {
    expect(translateMongoError(err, context)).toBeInstanceOf(
      DependencyUnavailableError,
    );
  });

  it('wraps other server errors with context', () => {
    const err = new MongoServerError({ message: 'not authorized', code: 13 });
    const translated = translateMongoError(err, context);

    expect(translated).toBeInstanceOf(MongoActionError);
    if (translated instanceof MongoActionError) {
      expect(translated.summary()).toBe(
        'Mongo action failed: op=insertOne coll=users driverCode=13',
      );
    }
  });

  it('passes application errors through', () => {
    const err = new ConfigError('bad');
    expect(translateMongoError(err, context)).toBe(err);
  });
});

describe('ids', () => {
  it('accepts only 24 hex characters', () => {
    expect(isHex24('65a1f0c2b4d3e2f1a0b9c8d7')).toBe(true);
    expect(isHex24('65a1f0c2b4d3e2f1a0b9c8d')).toBe(false);
    expect(isHex24('zza1f0c2b4d3e2f1a0b9c8d7')).toBe(false);
  });

  it('converts valid ids and refuses the rest', () => {
    expect(toObjectId('65a1f0c2b4d3e2f1a0b9c8d7')?.toHexString()).toBe(
      '65a1f0c2b4d3e2f1a0b9c8d7',
    );
    expect(toObjectId('not-an-id')).toBeNull();
  });
});
