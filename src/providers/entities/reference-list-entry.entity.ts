import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

export enum ReferenceListName {
  UANI = 'uani',
  CARGO_COUNTRIES = 'cargo_countries',
  PORT_COUNTRIES = 'port_countries',
}

/**
 * One row of a locally maintained reference list. `key` is the IMO number for
 * vessel lists and the country name for country lists.
 */
@Entity({ name: 'reference_list_entries' })
@Index(['listName', 'key'])
export class ReferenceListEntry {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  listName!: ReferenceListName;

  @Column()
  key!: string;

  @Column({ type: 'varchar', nullable: true })
  name!: string | null;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  details!: Record<string, string | number | boolean | null>;

  @CreateDateColumn()
  createdAt!: Date;
}
