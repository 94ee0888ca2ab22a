import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { PageParamsDto } from '../../utils/pagination/page-params.dto';

export class ListDocumentsDto extends PageParamsDto {
  @ApiPropertyOptional({ description: 'Exact file name (case-insensitive)' })
  @IsOptional()
  @IsString()
  @MaxLength(128)
  fileName?: string;

  @ApiPropertyOptional({
    description: 'Substring of the file name, extension or MIME type',
  })
  @IsOptional()
  @IsString()
  @MaxLength(128)
  searchQuery?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  includeDeleted?: boolean;
}
