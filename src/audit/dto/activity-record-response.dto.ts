import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { ActivityRecord } from '../domain/entities/activity-record.entity';
import { Activity } from '../domain/enums/activity.enum';
import { AuditedEntityKind } from '../domain/enums/audited-entity-kind.enum';
import { TransferDirection } from '../domain/enums/transfer-direction.enum';

export class ActivityRecordResponseDto {
  @ApiProperty({ description: 'Ledger sequence number', example: 1001 })
  @Expose()
  id!: number | null;

  @ApiProperty({ enum: AuditedEntityKind, example: AuditedEntityKind.DOCUMENT })
  @Expose()
  kind!: AuditedEntityKind;

  @ApiProperty({
    description: 'Audited entity; the transferred document for transfers',
    example: '550e8400-e29b-41d4-a716-446655440000',
  })
  @Expose()
  entityId!: string;

  @ApiProperty({ enum: Activity, example: Activity.CHECKED_OUT })
  @Expose()
  activity!: Activity;

  @ApiProperty({ example: '6f1d2c3b-4a59-4e6f-8a7b-9c0d1e2f3a4b' })
  @Expose()
  userId!: string;

  @ApiProperty({ example: '2025-01-20T10:30:00Z' })
  @Expose()
  createdAt!: Date;

  @ApiPropertyOptional({ description: 'Matter this transfer record belongs to' })
  @Expose()
  matterId?: string;

  @ApiPropertyOptional({ description: 'The other matter of the transfer' })
  @Expose()
  counterpartMatterId?: string;

  @ApiPropertyOptional({ enum: TransferDirection })
  @Expose()
  direction?: TransferDirection;

  static fromDomain(record: ActivityRecord): ActivityRecordResponseDto {
    const dto = new ActivityRecordResponseDto();
    dto.id = record.id;
    dto.kind = record.kind;
    dto.entityId = record.entityId;
    dto.activity = record.activity;
    dto.userId = record.userId;
    dto.createdAt = record.createdAt;
    if (record.kind === AuditedEntityKind.MATTER_DOCUMENT) {
      dto.matterId = record.matterId;
      dto.counterpartMatterId = record.counterpartMatterId;
      dto.direction = record.direction;
    }
    return dto;
  }
}
