import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { Activity } from '../../../../domain/enums/activity.enum';
import { TransferDirection } from '../../../../domain/enums/transfer-direction.enum';

@Entity({
  name: 'matter_document_activities',
})
@Index(['matterId', 'direction'])
export class MatterDocumentActivityEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'matter_id', type: 'varchar', length: 36 })
  matterId!: string;

  @Column({ name: 'counterpart_matter_id', type: 'varchar', length: 36 })
  counterpartMatterId!: string;

  @Column({ name: 'document_id', type: 'varchar', length: 36 })
  @Index()
  documentId!: string;

  @Column({ type: 'varchar', length: 4 })
  direction!: TransferDirection;

  @Column({ type: 'varchar', length: 20 })
  activity!: Activity;

  @Column({ name: 'user_id', type: 'varchar', length: 36 })
  userId!: string;

  @Column({ name: 'created_at' })
  @Index()
  createdAt!: Date;
}
