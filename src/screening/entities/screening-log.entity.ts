import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { RiskLevel } from '../risk-level';
import { SerializedRiskRecord } from '../risk-record';

export enum ScreeningStatus {
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  REJECTED = 'rejected',
}

/** Audit trail of every screening request and the records it produced. */
@Entity({ name: 'screening_logs' })
@Index(['subjectId', 'createdAt'])
export class ScreeningLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  subjectId!: string;

  @Column({ type: 'jsonb' })
  checkIds!: string[];

  @Column({ type: 'jsonb', default: () => "'{}'" })
  params!: Record<string, unknown>;

  @Column({ type: 'varchar' })
  status!: ScreeningStatus;

  @Column({ type: 'varchar', nullable: true })
  overallLevel!: RiskLevel | null;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  records!: SerializedRiskRecord[];

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'int', default: 0 })
  durationMs!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
