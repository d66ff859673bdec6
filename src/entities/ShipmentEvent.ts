import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { ShipmentStatus } from '../enums/ShipmentStatus';

/**
 * Immutable audit row written for every successful ledger transition
 */
@Entity('shipment_events')
@Index(['shipmentId', 'sequence'], { unique: true })
export class ShipmentEvent {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  shipmentId!: string;

  @Column({ type: 'int', comment: 'Position in the shipment history (1-based)' })
  sequence!: number;

  @Column({ type: 'enum', enum: ShipmentStatus, nullable: true, comment: 'Null for creation' })
  fromStatus?: ShipmentStatus;

  @Column({ type: 'enum', enum: ShipmentStatus })
  toStatus!: ShipmentStatus;

  @Column({ type: 'text', nullable: true })
  reason?: string;

  @Column({ type: 'timestamptz' })
  occurredAt!: Date;
}
