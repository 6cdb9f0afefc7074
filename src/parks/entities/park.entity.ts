import { Entity, PrimaryColumn, Column, OneToMany } from "typeorm";
import { Land } from "./land.entity";
import { Ride } from "../../rides/entities/ride.entity";

/**
 * Park Entity
 *
 * A tracked theme park. The primary key is the Queue-Times park id, so the
 * row is stable across runs and upserted by id.
 * Examples: 64 "Islands of Adventure", 65 "Universal Studios Florida"
 */
@Entity("parks")
export class Park {
  @PrimaryColumn({ type: "integer" })
  id!: number;

  @Column({ type: "text" })
  name!: string;

  // IANA timezone, from configuration (Queue-Times does not send one per park)
  @Column({ type: "text" })
  timezone!: string;

  @OneToMany(() => Land, (land) => land.park)
  lands!: Land[];

  @OneToMany(() => Ride, (ride) => ride.park)
  rides!: Ride[];
}
