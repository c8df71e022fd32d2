import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { RiskLevel } from '../../screening/risk-level';

@Entity({ name: 'risk_descriptions' })
@Index(['riskType', 'riskLevel'], { unique: true })
export class RiskDescription {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  riskType!: string;

  @Column({ type: 'varchar' })
  riskLevel!: RiskLevel;

  @Column({ default: '' })
  riskDescription!: string;

  @Column({ type: 'text', default: '' })
  riskDescriptionInfo!: string;

  @Column({ type: 'text', default: '' })
  info!: string;
}
