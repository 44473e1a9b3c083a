import { IsMongoId } from 'class-validator';

export class ListInspectionsQueryDto {
  @IsMongoId()
  readonly hiveId!: string;
}

export class InspectionIdParamsDto {
  @IsMongoId()
  readonly id!: string;
}
