import {
  Entity,
  PrimaryColumn,
  Column,
  ManyToOne,
  Index,
  JoinColumn,
} from "typeorm";
import { Park } from "../../parks/entities/park.entity";
import { Land } from "../../parks/entities/land.entity";

/**
 * Ride Entity
 *
 * A single attraction. Rides listed in the top-level `rides` array of the
 * API response (usually single rider queues) have no land.
 *
 * API Mapping (from GET /parks/{id}/queue_times.json):
 * - lands[].rides[].id / rides[].id → id
 * - name → name
 * - enclosing land id → landId (null for top-level rides)
 */
@Entity("rides")
export class Ride {
  @PrimaryColumn({ type: "integer" })
  id!: number;

  @ManyToOne(() => Park, (park) => park.rides, { nullable: false })
  @JoinColumn({ name: "park_id" })
  park!: Park;

  @Column({ name: "park_id", type: "integer" })
  @Index()
  parkId!: number;

  @ManyToOne(() => Land, (land) => land.rides, { nullable: true })
  @JoinColumn({ name: "land_id" })
  land!: Land | null;

  @Column({ name: "land_id", type: "integer", nullable: true })
  landId!: number | null;

  @Column({ type: "text" })
  name!: string;
}
