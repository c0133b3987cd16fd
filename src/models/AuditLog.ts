import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';

export enum AuditAction {
  MANUAL_CHARGE_ADD = 'MANUAL_CHARGE_ADD',
  MANUAL_CHARGE_EDIT = 'MANUAL_CHARGE_EDIT',
  RATE_CHANGE = 'RATE_CHANGE'
}

export type AuditSnapshot = Record<string, string | number | null>;

/**
 * AuditLog entity - append-only record of a privileged mutation
 * Rows are never updated or deleted
 */
@Entity('audit_logs')
@Index(['tableName', 'recordId'])
export class AuditLog {
  // LOG + YYYYMMDD + HHMMSS + 3-digit sequence; sorts in issue order
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @Column({ type: 'varchar', length: 50 })
  actorId!: string;

  @Column({ type: 'simple-enum', enum: AuditAction })
  actionType!: AuditAction;

  @Column({ type: 'varchar', length: 50 })
  tableName!: string;

  @Column({ type: 'varchar', length: 30 })
  recordId!: string;

  @Column({ type: 'simple-json', nullable: true })
  oldValue!: AuditSnapshot | null;

  @Column({ type: 'simple-json', nullable: true })
  newValue!: AuditSnapshot | null;

  @CreateDateColumn()
  timestamp!: Date;
}
