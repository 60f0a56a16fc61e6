import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { OperationType } from '@/domain/models';

/**
 * ORM Entity for OperationLog.
 * Kept apart from the domain model, which carries no TypeORM decorators.
 */
@Entity('operation_logs')
export class OperationLogEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 10 })
  operation!: OperationType;

  @Column({ name: 'employee_id', type: 'varchar', length: 50, nullable: true })
  employeeId!: string | null;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'text' })
  result!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
