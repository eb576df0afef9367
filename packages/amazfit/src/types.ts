/** Record types for the amazfit CLI. Dates are `yyyy-MM-dd` in the process time zone. */

export interface Credentials {
  token: string;
  userId: string;
}

/** Inclusive range of calendar days. */
export interface DateRange {
  start: Date;
  end: Date;
}

export type SleepPhaseType = "light" | "deep" | "rem" | "awake";

export interface SleepPhase {
  start: string;
  end: string;
  type: SleepPhaseType;
  minutes: number;
}

export interface SleepSummary {
  totalMinutes: number;
  deepMinutes: number;
  lightMinutes: number;
  /** null on devices that do not report REM */
  remMinutes: number | null;
  score: number | null;
  start: string | null;
  end: string | null;
  wakeCount: number;
  /** Minutes awake between falling asleep and waking up */
  wakeMinutes: number;
  /** Minutes to fall asleep */
  latencyMinutes: number | null;
  timeInBed: number | null;
  outOfBedTime: number | null;
  interruptionScore: number | null;
  phases: SleepPhase[];
}

export interface ActivityStage {
  start: string;
  end: string;
  mode: number;
  modeName: string;
  steps: number;
  distanceMeters: number;
  calories: number;
}

export interface DailySummary {
  date: string;
  steps: number;
  distanceMeters: number;
  calories: number;
  runDistanceMeters: number;
  walkingMinutes: number;
  runningCalories: number;
  runningSteps: number;
  sleep: SleepSummary;
  restingHeartRate: number | null;
  maxHeartRate: number | null;
  activities: ActivityStage[];
}

export interface StressReading {
  timestamp: string;
  value: number;
}

export interface StressSample {
  date: string;
  avg: number;
  min: number;
  max: number;
  // Percent of the day per band, as reported (may not sum to 100)
  relaxed: number;
  normal: number;
  medium: number;
  high: number;
  readings: StressReading[];
}

export interface Spo2Reading {
  timestamp: string;
  spo2: number;
  auto: boolean;
}

export interface ApneaEvent {
  timestamp: string;
  /** Lowest SpO2 during the event */
  spo2Decrease: number | null;
  spo2Samples: number[];
  hrSamples: number[];
}

export interface Spo2Sample {
  date: string;
  /** Oxygen desaturation index, events per hour of sleep */
  odi: number | null;
  odiCount: number;
  score: number | null;
  readingCount: number;
  apneaEventCount: number;
  avgSpo2: number | null;
  readings: Spo2Reading[];
  apneaEvents: ApneaEvent[];
}

export interface PaiSample {
  date: string;
  totalPai: number;
  /** PAI earned (or lost) that day */
  dailyPai: number;
  restingHeartRate: number | null;
  maxHeartRate: number | null;
  lowZoneMinutes: number;
  mediumZoneMinutes: number;
  highZoneMinutes: number;
  lowZonePai: number;
  mediumZonePai: number;
  highZonePai: number;
  /** Lower heart-rate bound of each zone */
  lowZoneLimit: number | null;
  mediumZoneLimit: number | null;
  highZoneLimit: number | null;
  activityScores: number[];
  nextActivityScores: number[];
}

export interface ReadinessSample {
  date: string;
  readinessScore: number | null;
  readinessInsight: number | null;
  hrvScore: number | null;
  hrvBaseline: number | null;
  sleepHrv: number | null;
  rhrScore: number | null;
  rhrBaseline: number | null;
  sleepRhr: number | null;
  skinTempScore: number | null;
  skinTempBaseline: number | null;
  /** Deviation from the personal baseline, °C */
  skinTempDelta: number | null;
  mentalScore: number | null;
  mentalBaseline: number | null;
  physicalScore: number | null;
  physicalBaseline: number | null;
  ahiScore: number | null;
  ahiBaseline: number | null;
  afibScore: number | null;
  afibBaseline: number | null;
}

export interface HeartRatePoint {
  offsetSeconds: number;
  bpm: number;
}

export interface HeartRateZone {
  /** 1-based, lowest intensity first */
  zone: number;
  name: string;
  seconds: number;
  maxHeartRate: number;
}

export interface StrengthGroup {
  actionType: number;
  count: number;
}

export interface WorkoutRecord {
  trackId: string;
  source: string;
  type: number;
  /** e.g. `outdoor_running`; `unknown_<code>` when the code is not mapped */
  activity: string;
  start: string;
  end: string;
  durationSeconds: number;
  calories: number;
  distanceMeters: number;
  avgHeartRate: number | null;
  maxHeartRate: number | null;
  minHeartRate: number | null;
  trainingEffect: number | null;
  anaerobicTrainingEffect: number | null;
  vo2Max: number | null;
  exerciseLoad: number | null;
  avgCadence: number | null;
  avgStrideLength: number | null;
  altitudeAscend: number | null;
  altitudeDescend: number | null;
  avgPace: number | null;
  totalSteps: number;
  heartRateZones: HeartRateZone[];
  strengthScores: number[];
  strengthGroups: StrengthGroup[];
  totalGroups: number;
  // rope skipping
  avgFrequency: number | null;
  avgRtpc: number | null;
  bestRtpc: number | null;
  worstRtpc: number | null;
  ropeSkippingRestSeconds: number | null;
  forefootRatio: number | null;
  pauseSeconds: number | null;
  heartRateSeries: HeartRatePoint[];
}

export interface SummaryRow {
  date: string;
  steps: number | null;
  distanceMeters: number | null;
  sleepMinutes: number | null;
  restingHeartRate: number | null;
  maxHeartRate: number | null;
  avgStress: number | null;
  avgSpo2: number | null;
  totalPai: number | null;
}

/** One raw band-data day with its summary blob decoded. */
export interface BandDay {
  date: string;
  summary: unknown;
}

/** How a date range turns into request windows. */
export type FanoutPolicy = "range" | "per-day";

/** Every health-data provider must implement this interface */
export interface HealthProvider {
  name: string;

  getDaily(start: Date, end: Date): Promise<DailySummary[]>;
  getSummary(start: Date, end: Date): Promise<SummaryRow[]>;
  getStress(start: Date, end: Date): Promise<StressSample[]>;
  getSpo2(start: Date, end: Date): Promise<Spo2Sample[]>;
  getPai(start: Date, end: Date): Promise<PaiSample[]>;
  getReadiness(start: Date, end: Date): Promise<ReadinessSample[]>;
  getWorkouts(start: Date, end: Date): Promise<WorkoutRecord[]>;
  getBandData(start: Date, end: Date): Promise<BandDay[]>;
  close(): void;
}
