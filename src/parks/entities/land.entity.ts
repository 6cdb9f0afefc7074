import {
  Entity,
  PrimaryColumn,
  Column,
  ManyToOne,
  OneToMany,
  Index,
  JoinColumn,
} from "typeorm";
import { Park } from "./park.entity";
import { Ride } from "../../rides/entities/ride.entity";

/**
 * Land Entity
 *
 * Themed area within a park (e.g. "The Wizarding World of Harry Potter").
 *
 * API Mapping (from GET /parks/{id}/queue_times.json):
 * - lands[].id → id
 * - lands[].name → name
 */
@Entity("lands")
export class Land {
  @PrimaryColumn({ type: "integer" })
  id!: number;

  @ManyToOne(() => Park, (park) => park.lands, { nullable: false })
  @JoinColumn({ name: "park_id" })
  park!: Park;

  @Column({ name: "park_id", type: "integer" })
  @Index()
  parkId!: number;

  @Column({ type: "text" })
  name!: string;

  @OneToMany(() => Ride, (ride) => ride.land)
  rides!: Ride[];
}
