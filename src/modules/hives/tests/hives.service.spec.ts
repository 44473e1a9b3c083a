import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { HivesService } from '../hives.service';
import { HIVE_REPOSITORY } from '../hives.repository';
import { USER_REPOSITORY } from '../../users/users.repository';
import type { User } from '../../users/users.types';
import { CLOCK, fixedClock } from '../../../lib/time/clock';
import { IntegrityViolationError } from '../../../lib/errors/PersistenceError';
import {
  InMemoryHiveRepository,
  InMemoryUserRepository,
} from '../../../../test/helpers/in-memory.repositories';

const NOW = new Date('2025-04-01T09:30:00Z');
const MISSING_ID = '65a1f0c2b4d3e2f1a0b9c8d7';

describe('HivesService', () => {
  let moduleRef: TestingModule;
  let service: HivesService;
  let users: InMemoryUserRepository;
  let hives: InMemoryHiveRepository;
  let owner: User;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    users = new InMemoryUserRepository();
    hives = new InMemoryHiveRepository();
    owner = await users.save({
      name: 'Alice',
      email: 'alice@example.com',
      apiKey: 'test-api-key',
      registeredAt: NOW,
    });
    moduleRef = await Test.createTestingModule({
      providers: [
        HivesService,
        { provide: HIVE_REPOSITORY, useValue: hives },
        { provide: USER_REPOSITORY, useValue: users },
        { provide: CLOCK, useValue: fixedClock(NOW) },
      ],
    }).compile();
    service = moduleRef.get(HivesService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('creates a located hive', async () => {
    const result = await service.create({
      userId: owner.id,
      name: 'Hive Alpha',
      latitude: 40.7128,
      longitude: -74.006,
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.entity).toEqual({
      id: expect.stringMatching(/^[0-9a-f]{24}$/),
      userId: owner.id,
      name: 'Hive Alpha',
      location: { type: 'Point', coordinates: [-74.006, 40.7128] },
      frameType: null,
      installedAt: NOW,
    });
  });

  it('creates a hive without a location', async () => {
    const installedAt = new Date('2024-05-01T00:00:00Z');
    const result = await service.create({
      userId: owner.id,
      name: 'Hive Beta',
      frameType: 'Langstroth',
      installedAt,
    });

    expect(result).toMatchObject({
      success: true,
      entity: { location: null, frameType: 'Langstroth', installedAt },
    });
  });

  it('accepts numeric strings as coordinates', async () => {
    const result = await service.create({
      userId: owner.id,
      name: 'Hive Gamma',
      latitude: '51.5',
      longitude: '-0.12',
    });
    expect(result).toMatchObject({
      success: true,
      entity: { location: { coordinates: [-0.12, 51.5] } },
    });
  });

  it('reports a missing owner before checking coordinates', async () => {
    await expect(
      service.create({
        userId: MISSING_ID,
        name: 'Orphan',
        latitude: 999,
        longitude: 0,
      }),
    ).resolves.toEqual({
      success: false,
      errorKind: 'NotFound',
      message: 'User not found',
    });
    expect(hives.all()).toHaveLength(0);
  });

  it('rejects a latitude out of range', async () => {
    await expect(
      service.create({
        userId: owner.id,
        name: 'Hive',
        latitude: 91,
        longitude: 0,
      }),
    ).resolves.toEqual({
      success: false,
      errorKind: 'InvalidInput',
      message: 'Latitude must be between -90 and 90 degrees',
    });
  });

  it('rejects half a coordinate pair', async () => {
    await expect(
      service.create({ userId: owner.id, name: 'Hive', longitude: 10 }),
    ).resolves.toEqual({
      success: false,
      errorKind: 'InvalidInput',
      message: 'Both latitude and longitude must be provided together',
    });
  });

  it('rejects a blank name and a long frame type', async () => {
    await expect(
      service.create({ userId: owner.id, name: '' }),
    ).resolves.toMatchObject({ message: 'Name is required' });
    await expect(
      service.create({
        userId: owner.id,
        name: 'Hive',
        frameType: 'f'.repeat(51),
      }),
    ).resolves.toMatchObject({
      errorKind: 'InvalidInput',
      message: 'Frame type must be at most 50 characters',
    });
  });

  it('maps a store integrity violation to Conflict', async () => {
    hives.failNextSave(new IntegrityViolationError('hives', null));
    await expect(
      service.create({ userId: owner.id, name: 'Hive' }),
    ).resolves.toEqual({
      success: false,
      errorKind: 'Conflict',
      message: 'Hive creation failed due to data conflict',
    });
  });

  it('lists hives by owner', async () => {
    await service.create({ userId: owner.id, name: 'One' });
    await service.create({ userId: owner.id, name: 'Two' });

    const listed = await service.listByUser(owner.id);
    expect(listed.map((h) => h.name).sort()).toEqual(['One', 'Two']);
    await expect(service.listByUser(MISSING_ID)).resolves.toEqual([]);
  });
});
