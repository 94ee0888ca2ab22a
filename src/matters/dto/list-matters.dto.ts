import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { PageParamsDto } from '../../utils/pagination/page-params.dto';

export class ListMattersDto extends PageParamsDto {
  @ApiPropertyOptional({ description: 'Exact description (case-insensitive)' })
  @IsOptional()
  @IsString()
  @MaxLength(128)
  description?: string;

  @ApiPropertyOptional({ description: 'Substring of the description' })
  @IsOptional()
  @IsString()
  @MaxLength(128)
  searchQuery?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  includeArchived?: boolean;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  includeDeleted?: boolean;
}
