import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDate, IsInt, IsOptional, Max, Min } from 'class-validator';
import { NullableType } from '../../utils/types/nullable.type';

export const MAX_REVISION_NUMBER = 999_999;

export class UpdateRevisionDto {
  @ApiPropertyOptional({ example: 2, minimum: 1, maximum: MAX_REVISION_NUMBER })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_REVISION_NUMBER)
  revisionNumber?: number;

  @ApiPropertyOptional({ type: Date, example: '2026-03-01T09:00:00.000Z' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  createdAt?: Date;
}

export const UPDATABLE_REVISION_FIELDS = [
  'revisionNumber',
  'createdAt',
] as const satisfies readonly (keyof UpdateRevisionDto)[];

/** A null field is rejected; an omitted one is left unchanged. */
export type UpdateRevisionPayload = {
  [K in keyof UpdateRevisionDto]?: NullableType<UpdateRevisionDto[K]>;
};
