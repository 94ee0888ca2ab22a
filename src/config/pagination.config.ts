import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../utils/validate-config';
import { PaginationConfig } from './pagination-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  PAGINATION_DEFAULT_PAGE_SIZE?: number;

  @IsInt()
  @Min(1)
  @Max(1000)
  @IsOptional()
  PAGINATION_MAX_PAGE_SIZE?: number;
}

export default registerAs<PaginationConfig>('pagination', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  const maxPageSize = env.PAGINATION_MAX_PAGE_SIZE ?? 50;
  const defaultPageSize = env.PAGINATION_DEFAULT_PAGE_SIZE ?? 10;

  if (defaultPageSize > maxPageSize) {
    throw new Error(
      `PAGINATION_DEFAULT_PAGE_SIZE (${defaultPageSize}) cannot exceed PAGINATION_MAX_PAGE_SIZE (${maxPageSize})`,
    );
  }

  return { defaultPageSize, maxPageSize };
});
