import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * Paging and sorting parameters shared by every list query. Ranges are
 * checked by ValidationGate.pageParams so that a non-positive value is a
 * validation failure rather than a DTO error.
 */
export class PageParamsDto {
  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  pageNumber?: number;

  @ApiPropertyOptional({
    minimum: 1,
    description: 'Defaults to the configured page size; clamped to the maximum',
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  pageSize?: number;

  @ApiPropertyOptional({
    description: 'Comma-separated list of "Property [asc|desc]" clauses',
    example: 'CreatedAt desc',
  })
  @IsOptional()
  @IsString()
  @MaxLength(256)
  orderBy?: string;
}
