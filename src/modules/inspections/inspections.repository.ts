import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ObjectId, type Collection } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import { translateMongoError } from '../mongodb/internal/mongodb.errors';
import { toObjectId } from '../mongodb/internal/mongodb.ids';
import { parseIsoDate, toIsoDate } from '../../lib/time/calendar';
import type { Inspection, InspectionDraft } from './inspections.types';

export const INSPECTION_REPOSITORY = Symbol('INSPECTION_REPOSITORY');

export interface InspectionRepository {
  findById(id: string): Promise<Inspection | null>;
  listByHive(hiveId: string): Promise<Inspection[]>;
  save(draft: InspectionDraft): Promise<Inspection>;
}

/** `scheduledFor` is stored as UTC midnight of the scheduled day. */
interface InspectionDoc {
  _id: ObjectId;
  hiveId: ObjectId;
  scheduledFor: Date;
  notes: string | null;
  createdAt: Date;
}

export const INSPECTIONS_COLLECTION = 'inspections';

function toInspection(doc: InspectionDoc): Inspection {
  return {
    id: doc._id.toHexString(),
    hiveId: doc.hiveId.toHexString(),
    scheduledFor: toIsoDate(doc.scheduledFor),
    notes: doc.notes,
    createdAt: doc.createdAt,
  };
}

@Injectable()
export class MongoInspectionRepository
  implements InspectionRepository, OnApplicationBootstrap
{
  private readonly logger = new Logger(MongoInspectionRepository.name);

  public constructor(private readonly mongo: MongodbService) {}

  public async onApplicationBootstrap(): Promise<void> {
    await this.ensureIndexes();
  }

  public async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    try {
      await col.createIndexes([
        { key: { hiveId: 1, scheduledFor: 1 }, name: 'hiveId_1_scheduledFor_1' },
      ]);
      this.logger.debug(`Indexes ensured on ${INSPECTIONS_COLLECTION}`);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'createIndexes',
        collection: INSPECTIONS_COLLECTION,
      });
    }
  }

  public async findById(id: string): Promise<Inspection | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const col = await this.collection();
    try {
      const doc = await col.findOne({ _id });
      return doc ? toInspection(doc) : null;
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'findOne',
        collection: INSPECTIONS_COLLECTION,
      });
    }
  }

  public async listByHive(hiveId: string): Promise<Inspection[]> {
    const hive = toObjectId(hiveId);
    if (!hive) return [];
    const col = await this.collection();
    try {
      const docs = await col
        .find({ hiveId: hive })
        .sort({ scheduledFor: 1 })
        .toArray();
      return docs.map(toInspection);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'find',
        collection: INSPECTIONS_COLLECTION,
      });
    }
  }

  public async save(draft: InspectionDraft): Promise<Inspection> {
    const hive = toObjectId(draft.hiveId);
    if (!hive) {
      throw new TypeError(`Invalid hive id for inspection: ${draft.hiveId}`);
    }
    const day = parseIsoDate(draft.scheduledFor);
    if (day === null) {
      throw new TypeError(`Invalid scheduled date: ${draft.scheduledFor}`);
    }
    const doc: InspectionDoc = {
      _id: new ObjectId(),
      hiveId: hive,
      scheduledFor: new Date(day),
      notes: draft.notes,
      createdAt: draft.createdAt,
    };
    const col = await this.collection();
    try {
      await col.insertOne(doc);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'insertOne',
        collection: INSPECTIONS_COLLECTION,
      });
    }
    this.logger.debug(`Inspection saved id=${doc._id.toHexString()}`);
    return toInspection(doc);
  }

  private collection(): Promise<Collection<InspectionDoc>> {
    return this.mongo.getCollection<InspectionDoc>(INSPECTIONS_COLLECTION);
  }
}
