/** PurpleAir channel_flags: 0 Normal, 1 A-Downgraded, 2 B-Downgraded, 3 Both-Downgraded. */
export type ChannelFlags = 0 | 1 | 2 | 3;

/** PurpleAir channel_state: 0 No PM, 1 PM-A only, 2 PM-B only, 3 both channels on. */
export type ChannelState = 0 | 1 | 2 | 3;

export type GeoPointLike = {
  lat: number;
  lon: number;
};

export type SpikeEvent = {
  sensorIndex: number;
  pm25: number;
};

export type ReportSummary = {
  recordId: number;
  reportId: string;
  durationMinutes: number;
  maxReading: number;
};

export type ContactFailure = {
  recordId: number;
  reason: "no_contact";
};

export type DeliveryFailure = {
  recordId: number;
  to: string;
  error: string;
};

export type DispatchSummary = {
  attempted: number;
  delivered: number;
  contactFailures: ContactFailure[];
  deliveryFailures: DeliveryFailure[];
};

export type PipelineRunSummary = {
  startedAt: string;
  localTime: string;
  timeZone: string;
  sensorsQueried: number;
  cleanCount: number;
  flaggedSensorIds: number[];
  spikes: SpikeEvent[];
  openedAlerts: number[];
  extendedAlerts: number[];
  closedAlerts: number[];
  reports: ReportSummary[];
  dispatch: DispatchSummary;
  completedAt: string;
};
