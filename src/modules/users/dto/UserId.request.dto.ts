import { IsMongoId } from 'class-validator';

export class UserIdParamsDto {
  @IsMongoId()
  readonly id!: string;
}
