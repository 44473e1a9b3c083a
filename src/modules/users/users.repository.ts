import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ObjectId, type Collection } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import { translateMongoError } from '../mongodb/internal/mongodb.errors';
import { toObjectId } from '../mongodb/internal/mongodb.ids';
import type { User, UserDraft } from './users.types';

export const USER_REPOSITORY = Symbol('USER_REPOSITORY');

/**
 * `save` throws IntegrityViolationError for a duplicate email and
 * DependencyUnavailableError when the store cannot be reached.
 */
export interface UserRepository {
  findById(id: string): Promise<User | null>;
  existsByEmail(email: string): Promise<boolean>;
  save(draft: UserDraft): Promise<User>;
}

interface UserDoc {
  _id: ObjectId;
  name: string;
  email: string;
  apiKey: string;
  registeredAt: Date;
}

export const USERS_COLLECTION = 'users';

function toUser(doc: UserDoc): User {
  return {
    id: doc._id.toHexString(),
    name: doc.name,
    email: doc.email,
    apiKey: doc.apiKey,
    registeredAt: doc.registeredAt,
  };
}

@Injectable()
export class MongoUserRepository
  implements UserRepository, OnApplicationBootstrap
{
  private readonly logger = new Logger(MongoUserRepository.name);

  public constructor(private readonly mongo: MongodbService) {}

  public async onApplicationBootstrap(): Promise<void> {
    await this.ensureIndexes();
  }

  /** Unique email is the backstop for the service's duplicate pre-check. */
  public async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    try {
      await col.createIndexes([
        { key: { email: 1 }, name: 'email_1', unique: true },
        { key: { apiKey: 1 }, name: 'apiKey_1', unique: true },
        { key: { registeredAt: -1 }, name: 'registeredAt_-1' },
      ]);
      this.logger.debug(`Indexes ensured on ${USERS_COLLECTION}`);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'createIndexes',
        collection: USERS_COLLECTION,
      });
    }
  }

  public async findById(id: string): Promise<User | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const col = await this.collection();
    try {
      const doc = await col.findOne({ _id });
      return doc ? toUser(doc) : null;
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'findOne',
        collection: USERS_COLLECTION,
      });
    }
  }

  public async existsByEmail(email: string): Promise<boolean> {
    const col = await this.collection();
    try {
      const doc = await col.findOne({ email }, { projection: { _id: 1 } });
      return doc !== null;
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'findOne',
        collection: USERS_COLLECTION,
      });
    }
  }

  public async save(draft: UserDraft): Promise<User> {
    const doc: UserDoc = { _id: new ObjectId(), ...draft };
    const col = await this.collection();
    try {
      await col.insertOne(doc);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'insertOne',
        collection: USERS_COLLECTION,
      });
    }
    this.logger.debug(`User saved id=${doc._id.toHexString()}`);
    return toUser(doc);
  }

  private collection(): Promise<Collection<UserDoc>> {
    return this.mongo.getCollection<UserDoc>(USERS_COLLECTION);
  }
}
