import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * Per-variable price per location, with optional subscription tier overrides
 */
@Entity('pricing_config')
export class PricingConfig {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100, unique: true })
  variableName!: string;

  @Column({ type: 'varchar', length: 20 })
  providerGroup!: string;

  @Column({ type: 'double precision', default: 1.0 })
  basePrice!: number;

  @Column({ type: 'varchar', length: 5, default: 'INR' })
  currency!: string;

  @Column({ type: 'double precision', default: 0.0 })
  taxRate!: number; // GST percentage

  @Column({ type: 'boolean', default: true })
  taxEnabled!: boolean;

  @Column({ type: 'varchar', length: 20, nullable: true })
  hsnSacCode!: string | null;

  // Tier overrides, null means "use basePrice"
  @Column({ type: 'double precision', nullable: true })
  freePlanPrice!: number | null;

  @Column({ type: 'double precision', nullable: true })
  developerPlanPrice!: number | null;

  @Column({ type: 'double precision', nullable: true })
  businessPlanPrice!: number | null;

  @Column({ type: 'double precision', nullable: true })
  enterprisePlanPrice!: number | null;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
