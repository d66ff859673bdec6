import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  VersionColumn,
} from 'typeorm';
import { ExecutionStatus } from '../enums/ExecutionStatus';

@Entity('matches')
@Index(['shipmentId', 'round'], { unique: true })
@Index(['driverId'])
@Index(['executionStatus'])
export class Match {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  shipmentId!: string;

  @Column({ type: 'int' })
  round!: number;

  @Column({ type: 'uuid', unique: true, comment: 'Winning bid' })
  bidId!: string;

  @Column({ type: 'varchar', length: 64 })
  driverId!: string;

  @Column({ type: 'float', comment: 'Committed price (settlement trigger)' })
  price!: number;

  @Column({ type: 'timestamptz' })
  committedAt!: Date;

  @Column({ type: 'enum', enum: ExecutionStatus, default: ExecutionStatus.ASSIGNED })
  executionStatus!: ExecutionStatus;

  @Column({
    type: 'timestamptz',
    comment: 'Pickup window end plus grace; ASSIGNED past this is a no-show',
  })
  pickupDeadline!: Date;

  // Execution tracking
  @Column({ type: 'timestamptz', nullable: true })
  pickedUpAt?: Date;

  @Column({ type: 'timestamptz', nullable: true })
  departedAt?: Date;

  @Column({ type: 'timestamptz', nullable: true })
  deliveredAt?: Date;

  @Column({ type: 'boolean', nullable: true })
  deliveredOnTime?: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  cancelledAt?: Date;

  @Column({ type: 'timestamptz', nullable: true })
  failedAt?: Date;

  @Column({ type: 'text', nullable: true })
  failureReason?: string;

  @VersionColumn()
  version!: number;
}
