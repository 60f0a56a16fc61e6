import { Transform } from 'class-transformer';
import { IsIn, IsOptional, IsString } from 'class-validator';

export type EmployeeTypeFilter = 'employee' | 'manager';

/** Search criteria; every provided criterion must match. */
export class SearchEmployeesDto {
  /** Case-insensitive substring of the id. */
  @IsOptional()
  @IsString()
  id?: string;

  /** Case-insensitive substring of the first or last name. */
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  department?: string;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsIn(['employee', 'manager'], { message: 'type must be employee or manager' })
  type?: EmployeeTypeFilter;
}
