import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * Joined sanctions source row, loaded by an upstream feed. The three flag
 * columns carry the feed's own classification of the row.
 */
@Entity({ name: 'entity_signals' })
@Index(['entityId'])
export class EntitySignal {
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

  @Column({ type: 'varchar', nullable: true })
  sanctionsName!: string | null;

  @Column({ type: 'text', nullable: true })
  sanctionDescription!: string | null;

  @Column({ type: 'text', nullable: true })
  scopeDescription!: string | null;

  @Column({ type: 'varchar', nullable: true })
  startTime!: string | null;

  @Column({ type: 'varchar', nullable: true })
  endTime!: string | null;

  /** Written by upstream ingestion; spelling is not normalized. */
  @Column({ type: 'varchar', nullable: true })
  isSan!: string | null;

  @Column({ type: 'varchar', nullable: true })
  isSco!: string | null;

  @Column({ type: 'varchar', nullable: true })
  isOol!: string | null;
}
