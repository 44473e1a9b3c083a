import { Transform, Type } from 'class-transformer';
import {
  Allow,
  IsDate,
  IsMongoId,
  IsOptional,
  IsString,
} from 'class-validator';
import {
  optionalTextInput,
  trimInput,
} from '../../../lib/validation/sanitizers';

export class CreateHiveRequestDto {
  @IsMongoId()
  readonly userId!: string;

  @Transform(trimInput)
  @IsString()
  readonly name!: string;

  // Type and range are validated by the service so a missing owner is
  // reported first and coordinate messages stay specific.
  @Allow()
  readonly latitude?: unknown;

  @Allow()
  readonly longitude?: unknown;

  @Transform(optionalTextInput)
  @IsOptional()
  @IsString()
  readonly frameType?: string | null;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  readonly installedAt?: Date;
}
