import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

export enum TaskStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export const TERMINAL_STATUSES: readonly TaskStatus[] = [
  TaskStatus.COMPLETED,
  TaskStatus.FAILED,
];

export const OPEN_STATUSES: readonly TaskStatus[] = Object.values(
  TaskStatus,
).filter((status) => !TERMINAL_STATUSES.includes(status));

@Entity('tasks')
export class TaskEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    type: 'simple-enum',
    enum: TaskStatus,
    default: TaskStatus.PENDING,
  })
  status!: TaskStatus;

  @Column()
  url!: string;

  @Column({ type: 'integer', default: 1 })
  priority!: number;

  @CreateDateColumn()
  createdAt!: Date;

  @Column({ type: 'datetime', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'datetime', nullable: true })
  completedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  /** Deflated JSON of the crawl result. */
  @Column({ type: 'blob', nullable: true })
  compressedResult!: Buffer | null;

  @Column({ type: 'varchar', nullable: true })
  resultHash!: string | null;

  @Column({ type: 'integer', nullable: true })
  resultSize!: number | null;
}
