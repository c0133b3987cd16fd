import { Entity, PrimaryColumn, Column, CreateDateColumn, ManyToOne } from 'typeorm';
import { Admission } from './Admission';

/**
 * OtProcedure entity - an operation performed during an admission
 * Its charges live in billing_charges with type OT
 */
@Entity('ot_procedures')
export class OtProcedure {
  @PrimaryColumn({ type: 'varchar', length: 30 })
  id!: string;

  @ManyToOne(() => Admission)
  admission!: Admission;

  @Column({ type: 'varchar', length: 20 })
  admissionId!: string;

  @Column({ type: 'varchar', length: 200 })
  operationName!: string;

  @Column()
  operationDate!: Date;

  @Column({ type: 'int' })
  durationMinutes!: number;

  @Column({ type: 'varchar', length: 100 })
  surgeonName!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  anesthesiaType!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ type: 'varchar', length: 50 })
  createdBy!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
