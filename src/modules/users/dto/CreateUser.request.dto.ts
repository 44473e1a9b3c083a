import { Transform } from 'class-transformer';
import { IsString } from 'class-validator';
import { emailInput, trimInput } from '../../../lib/validation/sanitizers';

/** Shape only; required-ness, length and email syntax are checked by the service. */
export class CreateUserRequestDto {
  @Transform(trimInput)
  @IsString()
  readonly name!: string;

  @Transform(emailInput)
  @IsString()
  readonly email!: string;
}
