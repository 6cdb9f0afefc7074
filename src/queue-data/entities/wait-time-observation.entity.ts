import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  Index,
  JoinColumn,
  Unique,
} from "typeorm";
import { Ride } from "../../rides/entities/ride.entity";
import { isoTimestampTransformer } from "../../common/transformers/iso-timestamp.transformer";

/**
 * Wait Time Observation Entity
 *
 * Append-only fact row: one ride's status at one snapshot time.
 * (ride_id, observed_at) is unique, which makes re-ingesting a snapshot a
 * no-op. Rows are never updated or deleted by the collector.
 */
@Entity("wait_time_observations")
@Unique("uq_wait_time_observations_ride_observed_at", ["rideId", "observedAt"])
@Index("idx_wait_time_observations_observed_at", ["observedAt"])
export class WaitTimeObservation {
  @PrimaryGeneratedColumn("increment")
  id!: number;

  @ManyToOne(() => Ride, { nullable: false })
  @JoinColumn({ name: "ride_id" })
  ride!: Ride;

  @Column({ name: "ride_id", type: "integer" })
  rideId!: number;

  @Column({
    name: "observed_at",
    type: "text",
    transformer: isoTimestampTransformer,
  })
  observedAt!: Date;

  // null when the ride is closed
  @Column({ name: "wait_minutes", type: "integer", nullable: true })
  waitMinutes!: number | null;

  @Column({ name: "is_open", type: "boolean" })
  isOpen!: boolean;

  // API timestamp: when Queue-Times last updated this ride
  @Column({
    name: "source_updated_at",
    type: "text",
    nullable: true,
    transformer: isoTimestampTransformer,
  })
  sourceUpdatedAt!: Date | null;

  // Calendar fields in the park's local timezone (0 = Monday)
  @Column({ name: "day_of_week", type: "integer" })
  dayOfWeek!: number;

  @Column({ type: "integer" })
  hour!: number;

  @Column({ name: "is_weekend", type: "boolean" })
  isWeekend!: boolean;
}
