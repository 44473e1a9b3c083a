import { Logger } from '@nestjs/common';
import { CreationService } from '../creation.service';
import { rejected, type CreationFailure } from '../creation-result';
import {
  DependencyUnavailableError,
  IntegrityViolationError,
} from '../../errors/PersistenceError';
import { MongoActionError } from '../../errors/MongoActionError';

interface Widget {
  id: string;
  label: string;
}

type WidgetKind = 'NotFound' | 'InvalidInput' | 'Conflict';

class WidgetService extends CreationService<
  string,
  { label: string },
  Widget,
  WidgetKind
> {
  protected readonly logger = new Logger('WidgetService');
  protected readonly entityName = 'Widget';
  protected readonly conflictMessage = 'Widget already exists';

  public readonly calls: string[] = [];
  public referenceFailure: CreationFailure<WidgetKind> | null = null;
  public conflictFailure: CreationFailure<WidgetKind> | null = null;
  public persistImpl: (draft: { label: string }) => Promise<Widget> = (d) =>
    Promise.resolve({ id: 'w1', label: d.label });

  protected checkReferences(): Promise<CreationFailure<WidgetKind> | null> {
    this.calls.push('checkReferences');
    return Promise.resolve(this.referenceFailure);
  }

  protected validate(input: string): CreationFailure<WidgetKind> | null {
    this.calls.push('validate');
    return input.length === 0 ? rejected('InvalidInput', 'Label is required') : null;
  }

  protected checkConflicts(): Promise<CreationFailure<WidgetKind> | null> {
    this.calls.push('checkConflicts');
    return Promise.resolve(this.conflictFailure);
  }

  protected build(input: string): { label: string } {
    this.calls.push('build');
    if (input === 'explode') throw new RangeError('bad');
    return { label: input };
  }

  protected persist(draft: { label: string }): Promise<Widget> {
    this.calls.push('persist');
    return this.persistImpl(draft);
  }

  protected describeInput(input: string): string {
    return `label=${input}`;
  }

  protected describeEntity(entity: Widget): string {
    return `id=${entity.id}`;
  }
}

describe('CreationService', () => {
  let service: WidgetService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  afterAll(() => {
    Logger.overrideLogger(['log', 'error', 'warn', 'debug', 'verbose']);
  });

  beforeEach(() => {
    service = new WidgetService();
  });

  it('runs every step in order and returns the entity', async () => {
    const result = await service.create('gear');
    expect(result).toEqual({
      success: true,
      entity: { id: 'w1', label: 'gear' },
    });
    expect(service.calls).toEqual([
      'checkReferences',
      'validate',
      'checkConflicts',
      'build',
      'persist',
    ]);
  });

  it('stops at a missing reference before validating', async () => {
    service.referenceFailure = rejected('NotFound', 'Parent not found');
    const result = await service.create('');
    expect(result).toEqual({
      success: false,
      errorKind: 'NotFound',
      message: 'Parent not found',
    });
    expect(service.calls).toEqual(['checkReferences']);
  });

  it('stops at invalid input without writing', async () => {
    const result = await service.create('');
    expect(result).toMatchObject({ success: false, errorKind: 'InvalidInput' });
    expect(service.calls).not.toContain('persist');
  });

  it('returns a pre-check conflict as is', async () => {
    service.conflictFailure = rejected('Conflict', 'Label taken');
    const result = await service.create('gear');
    expect(result).toEqual({
      success: false,
      errorKind: 'Conflict',
      message: 'Label taken',
    });
    expect(service.calls).not.toContain('build');
  });

  it('maps an integrity violation to Conflict with the entity message', async () => {
    service.persistImpl = () =>
      Promise.reject(new IntegrityViolationError('widgets', 'label'));
    await expect(service.create('gear')).resolves.toEqual({
      success: false,
      errorKind: 'Conflict',
      message: 'Widget already exists',
    });
  });

  it('maps an unavailable store to DependencyFailure', async () => {
    service.persistImpl = () =>
      Promise.reject(
        new DependencyUnavailableError('database', new Error('ECONNREFUSED')),
      );
    await expect(service.create('gear')).resolves.toEqual({
      success: false,
      errorKind: 'DependencyFailure',
      message: 'Database is temporarily unavailable',
    });
  });

  it('hides unexpected error text behind Unknown', async () => {
    service.persistImpl = () =>
      Promise.reject(
        MongoActionError.wrap(new Error('secret detail'), {
          operation: 'insertOne',
          collection: 'widgets',
        }),
      );
    await expect(service.create('gear')).resolves.toEqual({
      success: false,
      errorKind: 'Unknown',
      message: 'Internal server error',
    });
  });

  it('classifies a throw from any step', async () => {
    await expect(service.create('explode')).resolves.toEqual({
      success: false,
      errorKind: 'Unknown',
      message: 'Internal server error',
    });
    expect(service.calls).not.toContain('persist');
  });
});
