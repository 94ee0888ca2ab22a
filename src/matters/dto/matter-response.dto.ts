import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { Matter } from '../domain/entities/matter.entity';

export class MatterResponseDto {
  @ApiProperty({ example: '123e4567-e89b-12d3-a456-426614174000' })
  @Expose()
  id!: string;

  @ApiProperty({ example: 'Acme Corp v. Example Ltd' })
  @Expose()
  description!: string;

  @ApiProperty({ example: '2025-01-15T10:30:00Z' })
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  isArchived!: boolean;

  @ApiProperty()
  @Expose()
  isDeleted!: boolean;

  static fromDomain(matter: Matter): MatterResponseDto {
    const dto = new MatterResponseDto();
    dto.id = matter.id;
    dto.description = matter.description;
    dto.createdAt = matter.createdAt;
    dto.isArchived = matter.isArchived;
    dto.isDeleted = matter.isDeleted;
    return dto;
  }
}
