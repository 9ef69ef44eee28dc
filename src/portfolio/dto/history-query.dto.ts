import { Type } from 'class-transformer';
import { IsNumber, IsOptional, IsPositive, Max } from 'class-validator';

// ?hours=24 limits history to the last 24 hours
export class HistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  @Max(24 * 366)
  hours?: number;
}
