import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
  VersionColumn,
} from 'typeorm';
import { Point } from 'geojson';
import { ShipmentStatus } from '../enums/ShipmentStatus';
import { NoBidPolicy } from '../enums/NoBidPolicy';

@Entity('shipments')
@Index(['status'])
@Index(['shipperId'])
@Index(['origin'], { spatial: true })
export class Shipment {
  @PrimaryColumn('uuid')
  id!: string;

  // Owning shipper (identity lives in an external service)
  @Column({ type: 'varchar', length: 64 })
  shipperId!: string;

  // ORIGIN - PostGIS Point geometry
  @Column({
    type: 'geometry',
    spatialFeatureType: 'Point',
    srid: 4326,
    comment: 'Origin as PostGIS Point (longitude, latitude in SRID 4326)',
  })
  origin!: Point;

  @Column({ type: 'varchar', length: 255 })
  originAddress!: string;

  // DESTINATION - PostGIS Point geometry
  @Column({
    type: 'geometry',
    spatialFeatureType: 'Point',
    srid: 4326,
    comment: 'Destination as PostGIS Point (longitude, latitude in SRID 4326)',
  })
  destination!: Point;

  @Column({ type: 'varchar', length: 255 })
  destinationAddress!: string;

  // CARGO
  @Column({ type: 'float', comment: 'Cargo weight in kilograms' })
  weightKg!: number;

  @Column({ type: 'varchar', length: 50, comment: 'dry_van | reefer | flatbed | ...' })
  cargoType!: string;

  @Column({ type: 'text', nullable: true })
  description?: string;

  // REQUESTED WINDOWS
  @Column({ type: 'timestamptz' })
  pickupWindowStart!: Date;

  @Column({ type: 'timestamptz' })
  pickupWindowEnd!: Date;

  @Column({ type: 'timestamptz' })
  deliveryWindowStart!: Date;

  @Column({ type: 'timestamptz' })
  deliveryWindowEnd!: Date;

  @Column({ type: 'float', nullable: true, comment: 'Optional reserve price' })
  reservePrice?: number;

  // LIFECYCLE
  @Column({ type: 'enum', enum: ShipmentStatus, default: ShipmentStatus.DRAFT })
  status!: ShipmentStatus;

  @Column({
    type: 'enum',
    enum: NoBidPolicy,
    default: NoBidPolicy.RELIST,
    comment: 'What happens when an auction closes without bids',
  })
  noBidPolicy!: NoBidPolicy;

  @Column({ type: 'int', default: 0, comment: 'Current auction round (0 = never auctioned)' })
  auctionRound!: number;

  @Column({
    type: 'text',
    array: true,
    default: '{}',
    comment: 'Drivers who won this shipment and then cancelled',
  })
  excludedDriverIds!: string[];

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;

  @VersionColumn()
  version!: number;
}
