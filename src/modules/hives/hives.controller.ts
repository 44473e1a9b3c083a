import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import { HivesService } from './hives.service';
import { CreateHiveRequestDto } from './dto/CreateHive.request.dto';
import {
  HiveIdParamsDto,
  ListHivesQueryDto,
} from './dto/ListHives.request.dto';
import {
  toHiveDto,
  type CreateHiveResponseDto,
  type GetHiveResponseDto,
  type ListHivesResponseDto,
} from './dto/Hive.response.dto';
import type { HiveCreationResult } from './hives.types';
import { ApiHttpException } from '../../lib/errors/ApiHttpException';

@Controller('hives')
export class HivesController {
  public constructor(private readonly hives: HivesService) {}

  /** POST /api/hives */
  @Post()
  public async create(
    @Body() body: CreateHiveRequestDto,
  ): Promise<CreateHiveResponseDto> {
    const result: HiveCreationResult = await this.hives.create({
      userId: body.userId,
      name: body.name,
      latitude: body.latitude,
      longitude: body.longitude,
      frameType: body.frameType,
      installedAt: body.installedAt,
    });
    if (!result.success) {
      throw ApiHttpException.fromCreationFailure('hive', result);
    }
    return { success: true, hive: toHiveDto(result.entity) };
  }

  /** GET /api/hives?userId=... */
  @Get()
  public async list(
    @Query() query: ListHivesQueryDto,
  ): Promise<ListHivesResponseDto> {
    const hives = await this.hives.listByUser(query.userId);
    return { success: true, hives: hives.map(toHiveDto) };
  }

  /** GET /api/hives/:id */
  @Get(':id')
  public async get(
    @Param() params: HiveIdParamsDto,
  ): Promise<GetHiveResponseDto> {
    const hive = await this.hives.getById(params.id);
    if (!hive) throw ApiHttpException.notFound('Hive not found');
    return { success: true, hive: toHiveDto(hive) };
  }
}
