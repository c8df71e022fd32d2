import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'sanctioned_countries' })
export class SanctionedCountry {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  countryName!: string;
}
