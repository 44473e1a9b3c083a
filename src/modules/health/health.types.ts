export type HealthStatus = 'healthy' | 'unhealthy';

/** One dependency's state as reported by a probe. */
export interface ComponentHealth {
  readonly name: string;
  readonly status: HealthStatus;
  readonly message?: string;
  readonly latencyMs?: number;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/** Something readiness depends on. `check` makes one round trip and throws on failure. */
export interface HealthDependency {
  readonly name: string;
  check(): Promise<void>;
}

/** Injection token for the readiness dependency list. */
export const HEALTH_DEPENDENCIES = Symbol('HEALTH_DEPENDENCIES');

export class SystemHealth {
  public constructor(
    public readonly status: HealthStatus,
    public readonly service: string,
    public readonly timestamp: Date,
    public readonly version: string | null = null,
    /** Null when no dependency was probed (liveness). */
    public readonly components: readonly ComponentHealth[] | null = null,
  ) {}

  public get isHealthy(): boolean {
    return this.status === 'healthy';
  }

  /** Healthy iff every component is. An empty list is healthy and still reported. */
  public static fromComponents(
    service: string,
    timestamp: Date,
    version: string | null,
    components: readonly ComponentHealth[],
  ): SystemHealth {
    const status: HealthStatus = components.every(
      (c) => c.status === 'healthy',
    )
      ? 'healthy'
      : 'unhealthy';
    return new SystemHealth(status, service, timestamp, version, components);
  }
}
