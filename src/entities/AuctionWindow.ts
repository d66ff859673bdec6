import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  VersionColumn,
} from 'typeorm';
import { AuctionState } from '../enums/AuctionState';
import { CloseTrigger } from '../enums/CloseTrigger';

@Entity('auction_windows')
@Index(['shipmentId', 'round'], { unique: true })
@Index(['state'])
export class AuctionWindow {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  shipmentId!: string;

  @Column({ type: 'int' })
  round!: number;

  @Column({ type: 'enum', enum: AuctionState, default: AuctionState.PENDING })
  state!: AuctionState;

  @Column({ type: 'timestamptz', comment: 'When bidding opens (or opened)' })
  opensAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  openedAt?: Date;

  @Column({
    type: 'timestamptz',
    nullable: true,
    comment: 'Timer close; null means the shipper closes explicitly',
  })
  scheduledCloseAt?: Date;

  @Column({ type: 'int', nullable: true, comment: 'Window length used when a pending window opens' })
  durationMinutes?: number;

  @Column({ type: 'boolean', default: false })
  closed!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  closedAt?: Date;

  @Column({ type: 'enum', enum: CloseTrigger, nullable: true })
  closeTrigger?: CloseTrigger;

  @Column({ type: 'uuid', nullable: true })
  matchId?: string;

  @Column({ type: 'varchar', length: 50, nullable: true, comment: 'no_bids | cancelled' })
  voidReason?: string;

  @VersionColumn()
  version!: number;
}
