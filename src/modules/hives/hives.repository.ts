import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ObjectId, type Collection } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import { translateMongoError } from '../mongodb/internal/mongodb.errors';
import { toObjectId } from '../mongodb/internal/mongodb.ids';
import type { GeoPoint, Hive, HiveDraft } from './hives.types';

export const HIVE_REPOSITORY = Symbol('HIVE_REPOSITORY');

export interface HiveRepository {
  findById(id: string): Promise<Hive | null>;
  listByUser(userId: string): Promise<Hive[]>;
  save(draft: HiveDraft): Promise<Hive>;
}

interface HiveDoc {
  _id: ObjectId;
  userId: ObjectId;
  name: string;
  location: { type: 'Point'; coordinates: [number, number] } | null;
  frameType: string | null;
  installedAt: Date;
}

export const HIVES_COLLECTION = 'hives';

function toHive(doc: HiveDoc): Hive {
  const location: GeoPoint | null = doc.location
    ? { type: 'Point', coordinates: [doc.location.coordinates[0], doc.location.coordinates[1]] }
    : null;
  return {
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    name: doc.name,
    location,
    frameType: doc.frameType,
    installedAt: doc.installedAt,
  };
}

@Injectable()
export class MongoHiveRepository
  implements HiveRepository, OnApplicationBootstrap
{
  private readonly logger = new Logger(MongoHiveRepository.name);

  public constructor(private readonly mongo: MongodbService) {}

  public async onApplicationBootstrap(): Promise<void> {
    await this.ensureIndexes();
  }

  public async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    try {
      await col.createIndexes([
        { key: { userId: 1 }, name: 'userId_1' },
        { key: { location: '2dsphere' }, name: 'location_2dsphere' },
        { key: { installedAt: -1 }, name: 'installedAt_-1' },
      ]);
      this.logger.debug(`Indexes ensured on ${HIVES_COLLECTION}`);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'createIndexes',
        collection: HIVES_COLLECTION,
      });
    }
  }

  public async findById(id: string): Promise<Hive | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const col = await this.collection();
    try {
      const doc = await col.findOne({ _id });
      return doc ? toHive(doc) : null;
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'findOne',
        collection: HIVES_COLLECTION,
      });
    }
  }

  public async listByUser(userId: string): Promise<Hive[]> {
    const owner = toObjectId(userId);
    if (!owner) return [];
    const col = await this.collection();
    try {
      const docs = await col
        .find({ userId: owner })
        .sort({ installedAt: -1 })
        .toArray();
      return docs.map(toHive);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'find',
        collection: HIVES_COLLECTION,
      });
    }
  }

  public async save(draft: HiveDraft): Promise<Hive> {
    const owner = toObjectId(draft.userId);
    if (!owner) {
      throw new TypeError(`Invalid user id for hive: ${draft.userId}`);
    }
    const doc: HiveDoc = {
      _id: new ObjectId(),
      userId: owner,
      name: draft.name,
      location: draft.location
        ? {
            type: 'Point',
            coordinates: [draft.location.coordinates[0], draft.location.coordinates[1]],
          }
        : null,
      frameType: draft.frameType,
      installedAt: draft.installedAt,
    };
    const col = await this.collection();
    try {
      await col.insertOne(doc);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'insertOne',
        collection: HIVES_COLLECTION,
      });
    }
    this.logger.debug(`Hive saved id=${doc._id.toHexString()}`);
    return toHive(doc);
  }

  private collection(): Promise<Collection<HiveDoc>> {
    return this.mongo.getCollection<HiveDoc>(HIVES_COLLECTION);
  }
}
