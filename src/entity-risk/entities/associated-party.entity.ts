import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'entity_associated_parties' })
@Index(['entityId'])
export class AssociatedPartyRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  entityId!: string;

  @Column()
  partyId!: string;

  @Column({ type: 'varchar', nullable: true })
  partyName!: string | null;

  @Column({ type: 'varchar', nullable: true })
  level!: string | null;

  @Column({ type: 'varchar', nullable: true })
  sourceType!: string | null;

  @Column({ type: 'varchar', nullable: true })
  relation!: string | null;
}
