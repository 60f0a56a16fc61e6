import { Transform } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { EmployeeType } from '@/domain/models';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

/**
 * Input for creating an employee or manager.
 * Checks shape only; name, department and phone rules belong to the domain model.
 */
export class CreateEmployeeDto {
  @IsNotEmpty({ message: 'id is required' })
  @IsString({ message: 'id must be a string' })
  @MaxLength(50, { message: 'id must have at most 50 characters' })
  @Transform(trim)
  id!: string;

  @IsOptional()
  @IsEnum(EmployeeType, { message: 'employeeType must be Employee or Manager' })
  employeeType?: EmployeeType;

  @IsNotEmpty({ message: 'firstName is required' })
  @IsString({ message: 'firstName must be a string' })
  @MaxLength(50, { message: 'firstName must have at most 50 characters' })
  firstName!: string;

  @IsNotEmpty({ message: 'lastName is required' })
  @IsString({ message: 'lastName must be a string' })
  @MaxLength(50, { message: 'lastName must have at most 50 characters' })
  lastName!: string;

  @IsNotEmpty({ message: 'department is required' })
  @IsString({ message: 'department must be a string' })
  department!: string;

  @IsNotEmpty({ message: 'phoneNumber is required' })
  @IsString({ message: 'phoneNumber must be a string' })
  phoneNumber!: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'salary must be a number' })
  @Min(0, { message: 'salary cannot be negative' })
  salary?: number;

  @IsOptional()
  @IsInt({ message: 'teamSize must be an integer' })
  @Min(0, { message: 'teamSize cannot be negative' })
  teamSize?: number;

  @IsOptional()
  @IsString({ message: 'officeNumber must be a string' })
  @MaxLength(20, { message: 'officeNumber must have at most 20 characters' })
  officeNumber?: string;
}
