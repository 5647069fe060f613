import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('currency_config')
export class CurrencyConfig {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 5, unique: true })
  currencyCode!: string;

  @Column({ type: 'varchar', length: 10 })
  currencySymbol!: string;

  @Column({ type: 'varchar', length: 50 })
  currencyName!: string;

  // Rate against the base currency (INR)
  @Column({ type: 'double precision', default: 1.0 })
  exchangeRate!: number;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
