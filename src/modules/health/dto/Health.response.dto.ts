// Response DTO for GET /health/live and GET /health/ready

import type {
  ComponentHealth,
  HealthStatus,
  SystemHealth,
} from '../health.types';

export class HealthResponseDto {
  public readonly status: HealthStatus;
  public readonly service: string;
  public readonly timestamp: string; // ISO-8601
  public readonly version?: string;
  public readonly components?: readonly ComponentHealth[];

  public constructor(health: SystemHealth) {
    this.status = health.status;
    this.service = health.service;
    this.timestamp = health.timestamp.toISOString();
    if (health.version !== null) this.version = health.version;
    if (health.components !== null) this.components = health.components;
  }
}
