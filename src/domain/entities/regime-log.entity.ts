import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('regime_logs')
export class RegimeLog {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar' })
  @Index()
  date!: string;

  @Column({ type: 'varchar' })
  state!: string;

  @Column({ name: 'total_score', type: 'real' })
  totalScore!: number;

  @Column({ name: 'conditions_level', type: 'real' })
  conditionsLevel!: number;

  @Column({ name: 's_1w', type: 'real' })
  s1w!: number;

  @Column({ name: 's_4w', type: 'real' })
  s4w!: number;

  @Column({ name: 'price_close', type: 'real' })
  priceClose!: number;

  @Column({ type: 'real' })
  ma50!: number;

  @Column({ type: 'real' })
  ma200!: number;

  @Column({ name: 'price_score', type: 'integer' })
  priceScore!: number;

  @Column({ name: 'level_score', type: 'real' })
  levelScore!: number;

  @Column({ name: 'trend_score', type: 'real' })
  trendScore!: number;

  @Column({ name: 'abs_penalty', type: 'real' })
  absPenalty!: number;

  @Column({ name: 'max_exposure', type: 'real' })
  maxExposure!: number;

  @Column({ name: 'allow_new_entries', type: 'boolean' })
  allowNewEntries!: boolean;

  @Column({ name: 'risk_off_trigger', type: 'boolean' })
  riskOffTrigger!: boolean;

  @Column({ name: 'risk_on_trigger', type: 'boolean' })
  riskOnTrigger!: boolean;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({ name: 'regime_json', type: 'text' })
  regimeJson!: string;

  @Column({ name: 'hits_json', type: 'text' })
  hitsJson!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
