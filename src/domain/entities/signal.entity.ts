import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('signals')
export class Signal {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'run_date', type: 'varchar' })
  @Index()
  runDate!: string;

  @Column({ type: 'varchar' })
  @Index()
  symbol!: string;

  @Column({ type: 'varchar' })
  trigger!: string;

  @Column({ type: 'real' })
  close!: number;

  @Column({ name: 'bar_date', type: 'varchar' })
  barDate!: string;

  @Column({ name: 'regime_state', type: 'varchar' })
  regimeState!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
