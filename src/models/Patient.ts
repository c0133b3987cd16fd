import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, OneToMany } from 'typeorm';
import { Visit } from './Visit';
import { Admission } from './Admission';

export enum Gender {
  MALE = 'MALE',
  FEMALE = 'FEMALE',
  OTHER = 'OTHER'
}

/**
 * Patient entity - one registered person
 * Mobile number is unique across the hospital
 */
@Entity('patients')
export class Patient {
  // P + YYYYMMDD + 4-digit daily sequence
  @PrimaryColumn({ type: 'varchar', length: 20 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'int' })
  age!: number;

  @Column({ type: 'simple-enum', enum: Gender })
  gender!: Gender;

  @Column({ type: 'text' })
  address!: string;

  @Column({ type: 'varchar', length: 15, unique: true })
  mobileNumber!: string;

  @OneToMany(() => Visit, visit => visit.patient)
  visits!: Visit[];

  @OneToMany(() => Admission, admission => admission.patient)
  admissions!: Admission[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
