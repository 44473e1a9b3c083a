import { Injectable, Logger } from '@nestjs/common';
import { runWithDeadline } from '../../lib/async/deadline';
import type { ComponentHealth, HealthDependency } from './health.types';

export interface ProbeOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export const PROBE_SUCCESS_MESSAGE = 'Connected successfully';
export const PROBE_CANCELLED_MESSAGE = 'Health check cancelled';

function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs one dependency check against a deadline. Outcomes are reported, never
 * thrown; a check that finishes after the verdict is only logged.
 */
@Injectable()
export class HealthProbe {
  private readonly logger = new Logger(HealthProbe.name);

  public async probe(
    dependency: HealthDependency,
    options: ProbeOptions,
  ): Promise<ComponentHealth> {
    const { name } = dependency;
    const { timeoutMs, signal } = options;

    const outcome = await runWithDeadline(() => dependency.check(), {
      timeoutMs,
      signal,
      onLateSettle: (state, error) => {
        this.logger.debug(
          state === 'rejected'
            ? `Abandoned ${name} check failed late: ${errorMessage(error)}`
            : `Abandoned ${name} check completed late`,
        );
      },
    });

    switch (outcome.kind) {
      case 'settled':
        return {
          name,
          status: 'healthy',
          message: PROBE_SUCCESS_MESSAGE,
          latencyMs: roundMs(outcome.elapsedMs),
        };
      case 'timedOut':
        this.logger.warn(`${name} check timed out after ${timeoutMs}ms`);
        return {
          name,
          status: 'unhealthy',
          message: `Connection timed out after ${timeoutMs}ms`,
          latencyMs: roundMs(outcome.elapsedMs),
          metadata: { timeoutMs },
        };
      case 'failed':
        this.logger.warn(
          `${name} check failed: ${errorName(outcome.error)}: ${errorMessage(outcome.error)}`,
        );
        return {
          name,
          status: 'unhealthy',
          message: `Connection failed: ${errorName(outcome.error)}`,
          latencyMs: roundMs(outcome.elapsedMs),
          metadata: { error: errorMessage(outcome.error) },
        };
      case 'aborted':
        return {
          name,
          status: 'unhealthy',
          message: PROBE_CANCELLED_MESSAGE,
          latencyMs: roundMs(outcome.elapsedMs),
          metadata: { cancelled: true },
        };
    }
  }
}
