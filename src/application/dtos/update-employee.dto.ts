import { IsInt, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';

/** Fields to change on an existing record; omitted fields keep their value. */
export class UpdateEmployeeDto {
  @IsOptional()
  @IsString({ message: 'firstName must be a string' })
  @MaxLength(50, { message: 'firstName must have at most 50 characters' })
  firstName?: string;

  @IsOptional()
  @IsString({ message: 'lastName must be a string' })
  @MaxLength(50, { message: 'lastName must have at most 50 characters' })
  lastName?: string;

  @IsOptional()
  @IsString({ message: 'department must be a string' })
  department?: string;

  @IsOptional()
  @IsString({ message: 'phoneNumber must be a string' })
  phoneNumber?: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'salary must be a number' })
  @Min(0, { message: 'salary cannot be negative' })
  salary?: number;

  /** Managers only. */
  @IsOptional()
  @IsInt({ message: 'teamSize must be an integer' })
  @Min(0, { message: 'teamSize cannot be negative' })
  teamSize?: number;

  /** Managers only. */
  @IsOptional()
  @IsString({ message: 'officeNumber must be a string' })
  @MaxLength(20, { message: 'officeNumber must have at most 20 characters' })
  officeNumber?: string;
}
