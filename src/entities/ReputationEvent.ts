import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { CancellationStage } from '../enums/CancellationStage';

export type ReputationEventKind = 'completion' | 'cancellation';

/**
 * Append-only reputation history; the profile score is a fold over these
 */
@Entity('reputation_events')
@Index(['driverId', 'occurredAt'])
export class ReputationEvent {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64 })
  driverId!: string;

  @Column({ type: 'varchar', length: 20 })
  kind!: ReputationEventKind;

  @Column({ type: 'boolean', nullable: true })
  onTime?: boolean;

  @Column({ type: 'enum', enum: CancellationStage, nullable: true })
  stage?: CancellationStage;

  @Column({ type: 'uuid', nullable: true })
  shipmentId?: string;

  @Column({ type: 'float' })
  scoreBefore!: number;

  @Column({ type: 'float' })
  scoreAfter!: number;

  @Column({ type: 'timestamptz' })
  occurredAt!: Date;
}
