import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { Document } from '../domain/entities/document.entity';

export class DocumentResponseDto {
  @ApiProperty({ example: '123e4567-e89b-12d3-a456-426614174000' })
  @Expose()
  id!: string;

  @ApiProperty({ example: '5f0c6f4e-2b1a-4c8e-9d3f-7a6b5c4d3e2f' })
  @Expose()
  matterId!: string;

  @ApiProperty({ example: 'engagement-letter' })
  @Expose()
  fileName!: string;

  @ApiProperty({ example: 'pdf' })
  @Expose()
  extension!: string;

  @ApiProperty({ example: 52480 })
  @Expose()
  fileSize!: number;

  @ApiProperty({ example: 'application/pdf' })
  @Expose()
  mimeType!: string;

  @ApiProperty()
  @Expose()
  checksum!: string;

  @ApiProperty()
  @Expose()
  isCheckedOut!: boolean;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  checkedOutBy!: string | null;

  @ApiProperty()
  @Expose()
  isDeleted!: boolean;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  static fromDomain(document: Document): DocumentResponseDto {
    const dto = new DocumentResponseDto();
    dto.id = document.id;
    dto.matterId = document.matterId;
    dto.fileName = document.fileName;
    dto.extension = document.extension;
    dto.fileSize = document.fileSize;
    dto.mimeType = document.mimeType;
    dto.checksum = document.checksum;
    dto.isCheckedOut = document.isCheckedOut;
    dto.checkedOutBy = document.checkedOutBy;
    dto.isDeleted = document.isDeleted;
    dto.createdAt = document.createdAt;
    return dto;
  }
}
