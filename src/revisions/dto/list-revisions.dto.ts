import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional } from 'class-validator';
import { PageParamsDto } from '../../utils/pagination/page-params.dto';

export class ListRevisionsDto extends PageParamsDto {
  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  includeDeleted?: boolean;
}
