import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { Activity } from '../../../../domain/enums/activity.enum';

@Entity({
  name: 'document_activities',
})
export class DocumentActivityEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'document_id', type: 'varchar', length: 36 })
  @Index()
  entityId!: string;

  @Column({ type: 'varchar', length: 20 })
  activity!: Activity;

  @Column({ name: 'user_id', type: 'varchar', length: 36 })
  userId!: string;

  // Assigned by the application so paired records share one timestamp
  @Column({ name: 'created_at' })
  @Index()
  createdAt!: Date;
}
