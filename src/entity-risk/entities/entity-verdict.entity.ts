import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { RiskLevel } from '../../screening/risk-level';
import { AssociatedParty, BucketEntry } from '../signal-row';

/** Output of the bulk entity risk run. The table is replaced on every run. */
@Entity({ name: 'entity_verdicts' })
@Index(['entityId'], { unique: true })
@Index(['primaryName'])
export class EntityVerdict {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  entityId!: string;

  @Column({ type: 'varchar', nullable: true })
  entityDate!: string | null;

  @Column({ type: 'varchar', nullable: true })
  activeStatus!: string | null;

  @Column({ type: 'varchar', nullable: true })
  primaryName!: string | null;

  @Column({ type: 'varchar', nullable: true })
  secondaryName!: string | null;

  @Column({ type: 'varchar', nullable: true })
  primaryCountry!: string | null;

  @Column({ type: 'varchar', nullable: true })
  secondaryCountry!: string | null;

  @Column({ type: 'varchar', nullable: true })
  dateValue!: string | null;

  @Column({ type: 'varchar' })
  sanctionsLevel!: RiskLevel;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  high!: BucketEntry[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  medium!: BucketEntry[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  undetermined!: BucketEntry[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  none!: BucketEntry[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  associatedParties!: AssociatedParty[];

  @Column()
  runId!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
