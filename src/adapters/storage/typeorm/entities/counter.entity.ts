import { Entity, PrimaryColumn, Column } from 'typeorm';
import { CounterName } from '../../../../core';

/**
 * TypeORM entity for a named aggregate counter
 */
@Entity('counters')
export class CounterEntity {
  @PrimaryColumn({ name: 'counter_name', type: 'varchar' })
  name!: CounterName;

  @Column({ type: 'integer', default: 0 })
  value!: number;
}
