export type ChannelRole = 'ion' | 'temperature';

export interface Channel {
  name: string; // `${experimentName}_${headerToken}`
  label: string; // header token as written in the file
  role: ChannelRole;
  time: number[]; // seconds
  value: number[]; // K for temperature, arbitrary units for ion current
}

export interface ExperimentMeta {
  id: string;
  name: string;
  sourceFile: string;
  parserId: string;
  createdAt: string;
}

export interface Experiment extends ExperimentMeta {
  channels: Channel[]; // header order, all row-aligned
  temperatureChannel: string | null;
}

export interface TimeWindow {
  startTime: number;
  endTime: number;
}

export type TrimRegion = TimeWindow | null;

export interface TrimmedExperiment {
  experimentName: string;
  region: TrimRegion;
  channels: Channel[];
  temperatureChannel: string | null;
}

export interface IntegrationWindows {
  leftStart: number;
  leftEnd: number;
  rightStart: number;
  rightEnd: number;
}

export const UNDEFINED_RATIO = 'undefined' as const;
export type RatioValue = number | typeof UNDEFINED_RATIO;

export interface IntegrationEntry<V> {
  experimentName: string;
  dosage: number;
  value: V;
  channels: Record<string, V>; // channel name -> contribution
}

export interface IntegrationResult<V> {
  values: Record<number, V>; // dosage -> value, last write wins
  entries: IntegrationEntry<V>[];
  warnings: string[];
}

export type FullIntegrationResult = IntegrationResult<number>;
export type RatioIntegrationResult = IntegrationResult<RatioValue>;

export interface LinearCalibrationFit {
  kind: 'linear';
  slope: number;
  intercept: number;
  r2: number;
  x: number[];
  y: number[];
}

export interface PiecewiseCalibrationFit {
  kind: 'piecewise';
  threshold: number;
  slope: number;
  r2: number;
  sse: number;
  iterations: number;
  x: number[];
  y: number[];
}

export type CalibrationFit = LinearCalibrationFit | PiecewiseCalibrationFit;
