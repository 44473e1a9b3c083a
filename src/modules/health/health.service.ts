import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../../config/app.config';
import { CLOCK, type Clock } from '../../lib/time/clock';
import { HealthProbe } from './health.probe';
import {
  HEALTH_DEPENDENCIES,
  SystemHealth,
  type HealthDependency,
} from './health.types';

@Injectable()
export class HealthService {
  public constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(HEALTH_DEPENDENCIES)
    private readonly dependencies: readonly HealthDependency[],
    private readonly probe: HealthProbe,
  ) {}

  /** The process is up. Touches no dependency. */
  public liveness(): SystemHealth {
    return new SystemHealth(
      'healthy',
      this.config.serviceName,
      this.clock.now(),
      this.config.version,
    );
  }

  /** Probes every dependency concurrently; uncached. */
  public async readiness(signal?: AbortSignal): Promise<SystemHealth> {
    const timeoutMs = this.config.health.databaseTimeoutMs;
    const components = await Promise.all(
      this.dependencies.map((dep) =>
        this.probe.probe(dep, { timeoutMs, signal }),
      ),
    );
    return SystemHealth.fromComponents(
      this.config.serviceName,
      this.clock.now(),
      this.config.version,
      components,
    );
  }
}
