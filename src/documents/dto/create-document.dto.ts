import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';

// Path separators, characters reserved by common file systems and control characters
const FILE_NAME_PATTERN = /^(?!\.{1,2}$)[^<>:"/\\|?*\u0000-\u001F]+$/;

export class CreateDocumentDto {
  @ApiProperty({ example: 'engagement-letter', maxLength: 128 })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  @Matches(FILE_NAME_PATTERN, {
    message: 'fileName must not contain path separators or reserved characters',
  })
  fileName!: string;

  @ApiProperty({ example: 'pdf', maxLength: 5 })
  @Transform(({ value }) =>
    typeof value === 'string'
      ? value.trim().replace(/^\./, '').toLowerCase()
      : value,
  )
  @IsString()
  @Matches(/^[a-z0-9]{1,5}$/, {
    message: 'extension must be 1 to 5 letters or digits',
  })
  extension!: string;

  @ApiProperty({ example: 52_480, description: 'Size in bytes' })
  @IsInt()
  @Min(0)
  fileSize!: number;

  @ApiProperty({ example: 'application/pdf' })
  @IsString()
  @MaxLength(128)
  @Matches(/^[\w.+-]+\/[\w.+-]+$/, {
    message: 'mimeType must look like type/subtype',
  })
  mimeType!: string;

  @ApiProperty({ description: 'SHA-256 of the content, hex encoded' })
  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsString()
  @Matches(/^[a-f0-9]{64}$/, {
    message: 'checksum must be a SHA-256 hex digest',
  })
  checksum!: string;
}
