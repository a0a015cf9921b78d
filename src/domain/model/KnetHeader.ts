/** Metadata carried by the 17-line header of a K-NET / KiK-net ASCII record. All times are UTC. */
export interface KnetHeader {
  readonly eventOriginTime: Date;
  readonly eventLatitude: number;
  readonly eventLongitude: number;
  readonly eventDepthKm: number;
  readonly eventMagnitude: number;
  /** Station identifier, at most 7 characters. */
  readonly stationCode: string;
  /** Two trailing characters split off the raw station code when `convertStationName` is on; otherwise `''`. */
  readonly locationCode: string;
  readonly stationLatitude: number;
  readonly stationLongitude: number;
  readonly stationElevationM: number;
  /** Start of the first sample, with the logger's trigger delay removed. */
  readonly recordStartTime: Date;
  readonly samplingRateHz: number;
  readonly durationS: number;
  /** Direction code with hyphens removed; KiK-net borehole codes `1`..`6` become `NS1`..`UD2`. */
  readonly channelCode: string;
  /** Multiplier from digitizer counts to m/s². */
  readonly calibrationFactor: number;
  readonly maxAccelerationGal: number;
  readonly lastCorrectionTime: Date;
  readonly comment?: string;
}

export interface KnetHeaderOptions {
  /**
   * Move the last two characters of station codes longer than 5 characters into `locationCode`.
   * Default: `false`.
   */
  readonly convertStationName?: boolean;
}
