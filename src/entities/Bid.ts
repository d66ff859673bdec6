import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  VersionColumn,
} from 'typeorm';
import { Point } from 'geojson';
import { BidStatus } from '../enums/BidStatus';

@Entity('bids')
@Index(['shipmentId', 'round'])
@Index(['driverId'])
// One ACTIVE bid per driver per shipment
@Index('uq_bids_active_driver', ['shipmentId', 'driverId'], {
  unique: true,
  where: `"status" = 'active'`,
})
export class Bid {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  shipmentId!: string;

  @Column({ type: 'int', comment: 'Auction round the bid was placed in' })
  round!: number;

  @Column({ type: 'varchar', length: 64 })
  driverId!: string;

  @Column({ type: 'float' })
  price!: number;

  @Column({ type: 'float', comment: 'Driver ETA to the shipment origin, in minutes' })
  etaMinutes!: number;

  @Column({
    type: 'geometry',
    spatialFeatureType: 'Point',
    srid: 4326,
    nullable: true,
    comment: 'Driver position when the bid was submitted',
  })
  driverLocation?: Point;

  @Column({ type: 'text', nullable: true })
  message?: string;

  @Column({ type: 'enum', enum: BidStatus, default: BidStatus.ACTIVE })
  status!: BidStatus;

  @Column({ type: 'timestamptz' })
  submittedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true, comment: 'When the bid left ACTIVE' })
  resolvedAt?: Date;

  @VersionColumn()
  version!: number;
}
