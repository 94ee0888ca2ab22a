import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { Revision } from '../domain/entities/revision.entity';

export class RevisionResponseDto {
  @ApiProperty({ example: '0b8f4d1e-6c2a-4e9b-8f7d-3a2c1b0e9d8f' })
  @Expose()
  id!: string;

  @ApiProperty({ example: '123e4567-e89b-12d3-a456-426614174000' })
  @Expose()
  documentId!: string;

  @ApiProperty({ example: 3, minimum: 1 })
  @Expose()
  revisionNumber!: number;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  isDeleted!: boolean;

  static fromDomain(revision: Revision): RevisionResponseDto {
    const dto = new RevisionResponseDto();
    dto.id = revision.id;
    dto.documentId = revision.documentId;
    dto.revisionNumber = revision.revisionNumber;
    dto.createdAt = revision.createdAt;
    dto.isDeleted = revision.isDeleted;
    return dto;
  }
}
