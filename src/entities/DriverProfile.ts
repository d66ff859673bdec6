import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  VersionColumn,
} from 'typeorm';
import { Point } from 'geojson';

@Entity('driver_profiles')
export class DriverProfile {
  // Driver id issued by the identity service
  @PrimaryColumn({ type: 'varchar', length: 64 })
  id!: string;

  // REPUTATION (mutated only by the reputation scorer)
  @Column({ type: 'float', default: 0.5, comment: 'Trust score in [0, 1]' })
  reputationScore!: number;

  @Column({ type: 'int', default: 0 })
  completedJobs!: number;

  @Column({ type: 'int', default: 0 })
  onTimeJobs!: number;

  @Column({ type: 'int', default: 0 })
  cancellationCount!: number;

  // AVAILABILITY / EQUIPMENT
  @Column({
    type: 'geometry',
    spatialFeatureType: 'Point',
    srid: 4326,
    nullable: true,
  })
  currentLocation?: Point;

  @Column({ type: 'boolean', default: true })
  available!: boolean;

  @Column({
    type: 'text',
    array: true,
    default: '{}',
    comment: 'Cargo types the truck can haul; empty = any',
  })
  equipmentTypes!: string[];

  @Column({ type: 'float', nullable: true, comment: 'Max payload in kilograms' })
  capacityKg?: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;

  @VersionColumn()
  version!: number;
}
