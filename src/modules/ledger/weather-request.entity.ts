import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';

@Entity('weather_requests')
@Index('IDX_WEATHER_REQUEST_USER_CREATED', ['userId', 'createdAt'])
export class WeatherRequest {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64, nullable: true })
  userId!: string | null;

  @Column({ type: 'varchar', length: 64, nullable: true })
  apiKeyId!: string | null;

  // Request parameters
  @Column({ type: 'jsonb' })
  locations!: number[][];

  @Column({ type: 'jsonb' })
  variables!: string[];

  @Column({ type: 'varchar', length: 50 })
  timestamp!: string;

  @Column({ type: 'varchar', length: 50, default: 'Asia/Kolkata' })
  timezone!: string;

  // Response details
  @Column({ type: 'jsonb', default: () => "'[]'" })
  endpointsCalled!: string[];

  @Column({ type: 'int' })
  responseStatus!: number;

  @Column({ type: 'double precision' })
  responseTime!: number; // seconds

  @Column({ type: 'boolean' })
  success!: boolean;

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  // Pricing details
  @Column({ type: 'double precision', default: 0 })
  totalCost!: number;

  @Column({ type: 'varchar', length: 5, default: 'INR' })
  currency!: string;

  @Column({ type: 'double precision', default: 0 })
  taxAmount!: number;

  @Column({ type: 'double precision', default: 0 })
  finalAmount!: number;

  // Request metadata
  @Column({ type: 'varchar', length: 50, nullable: true })
  ipAddress!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  userAgent!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
