import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { Money, moneyTransformer } from '../lib/money';

export enum WardType {
  GENERAL = 'GENERAL',
  SEMI_PRIVATE = 'SEMI_PRIVATE',
  PRIVATE = 'PRIVATE'
}

export enum BedStatus {
  AVAILABLE = 'AVAILABLE',
  OCCUPIED = 'OCCUPIED',
  MAINTENANCE = 'MAINTENANCE'
}

/**
 * Bed entity - status is the single source of truth for allocation
 */
@Entity('beds')
export class Bed {
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @Column({ type: 'varchar', length: 10, unique: true })
  bedNumber!: string;

  @Column({ type: 'simple-enum', enum: WardType })
  wardType!: WardType;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: moneyTransformer })
  perDayCharge!: Money;

  @Column({ type: 'simple-enum', enum: BedStatus, default: BedStatus.AVAILABLE })
  status!: BedStatus;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
