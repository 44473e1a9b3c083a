import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import type { Response } from 'express';
import { HealthService } from './health.service';
import { HealthResponseDto } from './dto/Health.response.dto';
import type { SystemHealth } from './health.types';

/** Mounted outside the `api` prefix. */
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get('live')
  public live(@Res({ passthrough: true }) res: Response): HealthResponseDto {
    return respond(res, this.healthService.liveness());
  }

  /** Probes are abandoned if the client goes away first. */
  @Get('ready')
  public async ready(
    @Res({ passthrough: true }) res: Response,
  ): Promise<HealthResponseDto> {
    const abort = new AbortController();
    const onClose = (): void => {
      if (!res.writableEnded) abort.abort();
    };
    res.on('close', onClose);
    try {
      return respond(res, await this.healthService.readiness(abort.signal));
    } finally {
      res.off('close', onClose);
    }
  }
}

function respond(res: Response, health: SystemHealth): HealthResponseDto {
  res.status(
    health.isHealthy ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE,
  );
  return new HealthResponseDto(health);
}
