import { Transform } from 'class-transformer';
import { IsMongoId, IsOptional, IsString } from 'class-validator';
import {
  optionalTextInput,
  trimInput,
} from '../../../lib/validation/sanitizers';

/** The calendar checks on `scheduledFor` run after the hive lookup. */
export class CreateInspectionRequestDto {
  @IsMongoId()
  readonly hiveId!: string;

  @Transform(trimInput)
  @IsString()
  readonly scheduledFor!: string;

  @Transform(optionalTextInput)
  @IsOptional()
  @IsString()
  readonly notes?: string | null;
}
