import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

export enum EntityRiskRunStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

@Entity({ name: 'entity_risk_runs' })
export class EntityRiskRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', default: EntityRiskRunStatus.PENDING })
  status!: EntityRiskRunStatus;

  @Column({ type: 'timestamptz' })
  evaluatedAt!: Date;

  @Column({ type: 'int', default: 0 })
  entityCount!: number;

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
