import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ObjectId } from 'mongodb';
import { HIVES_COLLECTION, MongoHiveRepository } from '../hives.repository';
import { MongodbService } from '../../mongodb/mongodb.service';
import {
  FakeMongodbService,
  type FakeCollection,
} from '../../../../test/helpers/fake-mongo';

const INSTALLED = new Date('2024-06-01T00:00:00Z');

describe('MongoHiveRepository', () => {
  let moduleRef: TestingModule;
  let repo: MongoHiveRepository;
  let col: FakeCollection;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    const mongo = new FakeMongodbService();
    col = mongo.collection(HIVES_COLLECTION);
    moduleRef = await Test.createTestingModule({
      providers: [
        MongoHiveRepository,
        { provide: MongodbService, useValue: mongo },
      ],
    }).compile();
    repo = moduleRef.get(MongoHiveRepository);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('indexes the location for geo queries', async () => {
    await repo.ensureIndexes();
    expect(col.createIndexes).toHaveBeenCalledWith(
      expect.arrayContaining([
        { key: { location: '2dsphere' }, name: 'location_2dsphere' },
      ]),
    );
  });

  it('stores the owner as an ObjectId and the location as GeoJSON', async () => {
    const userId = new ObjectId().toHexString();
    const hive = await repo.save({
      userId,
      name: 'Hive Alpha',
      location: { type: 'Point', coordinates: [-74.006, 40.7128] },
      frameType: null,
      installedAt: INSTALLED,
    });

    const [[doc]] = col.insertOne.mock.calls;
    expect(doc.userId).toBeInstanceOf(ObjectId);
    expect(doc.location).toEqual({
      type: 'Point',
      coordinates: [-74.006, 40.7128],
    });
    expect(hive.userId).toBe(userId);
    expect(hive.location).toEqual({
      type: 'Point',
      coordinates: [-74.006, 40.7128],
    });
  });

  it('refuses a malformed owner id', async () => {
    await expect(
      repo.save({
        userId: 'nope',
        name: 'Hive',
        location: null,
        frameType: null,
        installedAt: INSTALLED,
      }),
    ).rejects.toThrow('Invalid user id for hive: nope');
    expect(col.insertOne).not.toHaveBeenCalled();
  });

  it('lists by owner, newest first', async () => {
    const owner = new ObjectId();
    col.found = [
      {
        _id: new ObjectId(),
        userId: owner,
        name: 'Newer',
        location: null,
        frameType: null,
        installedAt: INSTALLED,
      },
    ];

    const listed = await repo.listByUser(owner.toHexString());
    expect(col.find).toHaveBeenCalledWith({ userId: owner });
    expect(listed.map((h) => h.name)).toEqual(['Newer']);
    await expect(repo.listByUser('nope')).resolves.toEqual([]);
  });
});
