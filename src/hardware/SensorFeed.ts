/** A driver that pushes readings into the sensor store on its own schedule. */
export interface SensorFeed {
  start(): void
  stop(): void
}
