import { Park } from "../../parks/entities/park.entity";
import { Land } from "../../parks/entities/land.entity";
import { Ride } from "../../rides/entities/ride.entity";
import { WaitTimeObservation } from "../../queue-data/entities/wait-time-observation.entity";

export const COLLECTOR_ENTITIES = [Park, Land, Ride, WaitTimeObservation];
