import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'documents',
})
@Index(['matterId', 'fileName'])
export class DocumentEntity extends EntityRelationalHelper {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'matter_id', type: 'varchar', length: 36 })
  @Index()
  matterId!: string;

  @Column({ name: 'file_name', type: 'varchar', length: 128 })
  fileName!: string;

  @Column({ type: 'varchar', length: 5 })
  extension!: string;

  @Column({ name: 'file_size', type: 'integer' })
  fileSize!: number;

  @Column({ name: 'mime_type', type: 'varchar', length: 128 })
  mimeType!: string;

  @Column({ type: 'varchar', length: 64 })
  checksum!: string;

  @Column({ name: 'is_checked_out', type: 'boolean', default: false })
  isCheckedOut!: boolean;

  @Column({
    name: 'checked_out_by',
    type: 'varchar',
    length: 36,
    nullable: true,
  })
  checkedOutBy!: string | null;

  @Column({ name: 'is_deleted', type: 'boolean', default: false })
  isDeleted!: boolean;

  @Column({ name: 'created_at' })
  createdAt!: Date;

  @Column({ type: 'integer', default: 1 })
  version!: number;
}
