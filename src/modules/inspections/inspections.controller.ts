import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import { InspectionsService } from './inspections.service';
import { CreateInspectionRequestDto } from './dto/CreateInspection.request.dto';
import {
  InspectionIdParamsDto,
  ListInspectionsQueryDto,
} from './dto/ListInspections.request.dto';
import {
  toInspectionDto,
  type CreateInspectionResponseDto,
  type GetInspectionResponseDto,
  type ListInspectionsResponseDto,
} from './dto/Inspection.response.dto';
import type { InspectionCreationResult } from './inspections.types';
import { ApiHttpException } from '../../lib/errors/ApiHttpException';

@Controller('inspections')
export class InspectionsController {
  public constructor(private readonly inspections: InspectionsService) {}

  /** POST /api/inspections */
  @Post()
  public async create(
    @Body() body: CreateInspectionRequestDto,
  ): Promise<CreateInspectionResponseDto> {
    const result: InspectionCreationResult = await this.inspections.create({
      hiveId: body.hiveId,
      scheduledFor: body.scheduledFor,
      notes: body.notes,
    });
    if (!result.success) {
      throw ApiHttpException.fromCreationFailure('inspection', result);
    }
    return { success: true, inspection: toInspectionDto(result.entity) };
  }

  /** GET /api/inspections?hiveId=... */
  @Get()
  public async list(
    @Query() query: ListInspectionsQueryDto,
  ): Promise<ListInspectionsResponseDto> {
    const found = await this.inspections.listByHive(query.hiveId);
    return { success: true, inspections: found.map(toInspectionDto) };
  }

  /** GET /api/inspections/:id */
  @Get(':id')
  public async get(
    @Param() params: InspectionIdParamsDto,
  ): Promise<GetInspectionResponseDto> {
    const inspection = await this.inspections.getById(params.id);
    if (!inspection) throw ApiHttpException.notFound('Inspection not found');
    return { success: true, inspection: toInspectionDto(inspection) };
  }
}
