import { IsMongoId } from 'class-validator';

export class ListHivesQueryDto {
  @IsMongoId()
  readonly userId!: string;
}

export class HiveIdParamsDto {
  @IsMongoId()
  readonly id!: string;
}
