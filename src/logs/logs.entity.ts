import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

@Entity('logs')
export class Log {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  action!: string;

  @Column({ type: 'varchar', length: 50 })
  module!: string;

  @Column({ type: 'enum', enum: ['info', 'warn', 'error', 'debug'], default: 'info' })
  level!: LogLevel;

  @Column('json', { nullable: true })
  performedBy?: Record<string, unknown> | null;

  @Column({ type: 'varchar', nullable: true })
  entityId?: string | null;

  @Column({ type: 'varchar', nullable: true })
  entityType?: string | null;

  @Column('json', { nullable: true })
  oldValues?: Record<string, unknown> | null;

  @Column('json', { nullable: true })
  newValues?: Record<string, unknown> | null;

  @Column('json', { nullable: true })
  metadata?: Record<string, unknown> | null;

  // Multi-tenancy: associate log with a school (tenant) when applicable
  @Index()
  @Column({ type: 'uuid', nullable: true })
  schoolId?: string | null;

  @CreateDateColumn()
  timestamp!: Date;
}
