import { addMinutes, parse } from "date-fns";
import { ParseError } from "@wristlog/shared";
import { DAY_FORMAT, dayKey, fromEpoch } from "../dates.ts";
import {
  bandDataDay,
  bandSummary,
  clickEvent,
  clickExtra,
  odiEvent,
  osaEvent,
  osaExtra,
  paiEvent,
  parseJsonField,
  parseWith,
  readinessEvent,
  spo2Event,
  stressEvent,
  stressPoints,
  timedEvent,
  type RawStage,
  type RawWorkoutSummary,
} from "./raw.ts";
import type {
  ActivityStage,
  ApneaEvent,
  BandDay,
  DailySummary,
  HeartRatePoint,
  HeartRateZone,
  PaiSample,
  ReadinessSample,
  SleepPhase,
  SleepPhaseType,
  Spo2Reading,
  Spo2Sample,
  StressSample,
  WorkoutRecord,
} from "../types.ts";

export const ACTIVITY_MODES: Record<number, string> = {
  1: "slow_walking",
  3: "fast_walking",
  4: "light_sleep",
  5: "deep_sleep",
  6: "running",
  7: "normal_activity",
  9: "cycling",
  11: "rem_sleep",
  80: "outdoor_running",
  81: "walking",
  82: "hiking",
  83: "treadmill",
  84: "cycling",
  85: "stationary_bike",
};

export const WORKOUT_TYPES: Record<number, string> = {
  1: "outdoor_running",
  2: "walking",
  3: "cycling",
  4: "treadmill",
  5: "indoor_cycling",
  6: "elliptical",
  7: "climbing",
  8: "trail_running",
  9: "skiing",
  10: "snowboarding",
  16: "freestyle",
  17: "swimming",
  18: "indoor_swimming",
  19: "open_water_swimming",
  20: "yoga",
  21: "rowing",
  22: "indoor_rowing",
  64: "strength_training",
  128: "hiit",
  223: "other",
};

// Sleep bounds above this are epoch seconds, below it minutes from midnight
const EPOCH_THRESHOLD = 1_000_000_000;

/** Sentinel the readiness API uses for "no measurement". */
const NO_DATA = "255";

const ZONE_NAMES = ["Very Light", "Light", "Moderate", "Hard", "Maximum", "Extreme"];

// Zero and -1 both mean "not measured" for optional metrics
function positive(n: number | null | undefined): number | null {
  return n != null && n > 0 ? n : null;
}

function whole(n: number | null | undefined): number | null {
  const value = positive(n);
  return value === null ? null : Math.trunc(value);
}

function tenths(n: number | null): number | null {
  return n !== null && n > 0 ? n / 10 : null;
}

// ── Per-day selection ────────────────────────────────────────────

/**
 * Collapse records to one per date. `prefer(candidate, current)` decides
 * whether a later record replaces the one kept so far.
 */
export function onePerDay<T extends { date: string }>(
  records: T[],
  prefer: (candidate: T, current: T) => boolean,
): T[] {
  const byDate = new Map<string, T>();
  for (const record of records) {
    const current = byDate.get(record.date);
    if (!current || prefer(record, current)) byDate.set(record.date, record);
  }
  return [...byDate.values()];
}

/** Event time in epoch milliseconds. */
export function eventTimestamp(raw: unknown, endpoint: string, at: string): number {
  return fromEpoch(parseWith(timedEvent, raw, endpoint, at).timestamp).getTime();
}

// ── Band data ────────────────────────────────────────────────────

/** Decode one band-data entry; `summary` is base64-encoded JSON. */
export function decodeBandDay(raw: unknown, endpoint: string, at: string): BandDay {
  const day = parseWith(bandDataDay, raw, endpoint, at);
  const text = Buffer.from(day.summary, "base64").toString("utf-8");
  const decoded = parseJsonField(text, endpoint, `${at}.summary`);
  return {
    date: day.date_time,
    summary: Array.isArray(decoded) ? decoded[0] : decoded,
  };
}

function phaseType(mode: number): SleepPhaseType {
  switch (mode) {
    case 4:
      return "light";
    case 5:
      return "deep";
    case 8:
    case 11:
      return "rem";
    default:
      return "awake";
  }
}

function sleepBound(value: number, base: Date): string {
  return (value > EPOCH_THRESHOLD ? fromEpoch(value) : addMinutes(base, value)).toISOString();
}

function mapPhase(stage: RawStage, base: Date): SleepPhase {
  return {
    start: addMinutes(base, stage.start).toISOString(),
    end: addMinutes(base, stage.stop).toISOString(),
    type: phaseType(stage.mode),
    minutes: stage.stop - stage.start,
  };
}

function mapStage(stage: RawStage, base: Date): ActivityStage {
  return {
    start: addMinutes(base, stage.start).toISOString(),
    end: addMinutes(base, stage.stop).toISOString(),
    mode: stage.mode,
    modeName: ACTIVITY_MODES[stage.mode] ?? `unknown_${stage.mode}`,
    steps: stage.step ?? 0,
    distanceMeters: stage.dis ?? 0,
    calories: stage.cal ?? 0,
  };
}

export function mapDaily(day: BandDay, endpoint: string, at: string): DailySummary {
  const { stp, slp, hr } = parseWith(bandSummary, day.summary, endpoint, `${at}.summary`);
  const base = parse(day.date, DAY_FORMAT, new Date());
  const totalMinutes = slp.dp + slp.lt + (slp.dt ?? 0);
  const slept = totalMinutes > 0;

  return {
    date: day.date,
    steps: stp.ttl,
    distanceMeters: stp.dis,
    calories: stp.cal,
    runDistanceMeters: stp.runDist ?? 0,
    walkingMinutes: stp.wk ?? 0,
    runningCalories: stp.runCal ?? 0,
    runningSteps: stp.rn ?? 0,
    sleep: {
      totalMinutes,
      deepMinutes: slp.dp,
      lightMinutes: slp.lt,
      remMinutes: slp.dt,
      score: positive(slp.ss),
      start: slept ? sleepBound(slp.st, base) : null,
      end: slept ? sleepBound(slp.ed, base) : null,
      wakeCount: slp.wc ?? 0,
      wakeMinutes: slp.wk ?? 0,
      latencyMinutes: positive(slp.lb),
      timeInBed: positive(slp.ebt),
      outOfBedTime: positive(slp.obt),
      interruptionScore: positive(slp.is),
      phases: (slp.stage ?? []).map((s) => mapPhase(s, base)),
    },
    restingHeartRate: positive(slp.rhr),
    maxHeartRate: positive(hr?.maxHr?.hr),
    activities: (stp.stage ?? []).map((s) => mapStage(s, base)),
  };
}

// ── Stress ───────────────────────────────────────────────────────

export function mapStress(raw: unknown, endpoint: string, at: string): StressSample {
  const item = parseWith(stressEvent, raw, endpoint, at);
  const points = item.data
    ? parseWith(stressPoints, parseJsonField(item.data, endpoint, `${at}.data`), endpoint, `${at}.data`)
    : [];

  return {
    date: dayKey(fromEpoch(item.timestamp)),
    avg: item.avgStress,
    min: item.minStress,
    max: item.maxStress,
    relaxed: item.relaxProportion,
    normal: item.normalProportion,
    medium: item.mediumProportion,
    high: item.highProportion,
    readings: points.map((p) => ({
      timestamp: fromEpoch(p.time).toISOString(),
      value: p.value,
    })),
  };
}

// ── SpO2 ─────────────────────────────────────────────────────────

interface Spo2Day {
  date: string;
  odi: number | null;
  odiCount: number;
  score: number | null;
  readings: Spo2Reading[];
  apneaEvents: ApneaEvent[];
}

function decodeExtra(raw: string | Record<string, unknown> | null | undefined, endpoint: string, at: string): unknown {
  if (raw == null) return {};
  return typeof raw === "string" ? parseJsonField(raw, endpoint, at) : raw;
}

function samples(values: (number | null)[] | undefined): number[] {
  return (values ?? []).filter((v): v is number => v !== null).map(Math.trunc);
}

/**
 * Group blood-oxygen events by day. `odi` events carry the nightly
 * desaturation index, `click` events single readings, `osa_event` apnea
 * episodes; other subtypes are skipped.
 */
export function groupSpo2(items: unknown[], endpoint: string): Spo2Sample[] {
  const days = new Map<string, Spo2Day>();
  const dayOf = (ts: number): Spo2Day => {
    const date = dayKey(fromEpoch(ts));
    let day = days.get(date);
    if (!day) {
      day = { date, odi: null, odiCount: 0, score: null, readings: [], apneaEvents: [] };
      days.set(date, day);
    }
    return day;
  };

  items.forEach((raw, i) => {
    const at = `items.${i}`;
    const { subType } = parseWith(spo2Event, raw, endpoint, at);

    if (subType === "odi") {
      const item = parseWith(odiEvent, raw, endpoint, at);
      const day = dayOf(item.timestamp);
      day.odi = item.odi;
      day.odiCount = item.odiNum;
      day.score = positive(item.score) ?? day.score;
    } else if (subType === "click") {
      const item = parseWith(clickEvent, raw, endpoint, at);
      const extra = parseWith(clickExtra, decodeExtra(item.extra, endpoint, `${at}.extra`), endpoint, `${at}.extra`);
      const ts = extra.timestamp ?? item.timestamp;
      const day = dayOf(ts);
      const history = [...(extra.spo2History ?? [])].reverse();
      const spo2 = [item.spo2, item.value, extra.spo2, ...history].find((v) => v != null && v > 0);
      if (spo2 != null) {
        day.readings.push({
          timestamp: fromEpoch(ts).toISOString(),
          spo2: Math.trunc(spo2),
          auto: extra.isAuto === true,
        });
      }
    } else if (subType === "osa_event") {
      const item = parseWith(osaEvent, raw, endpoint, at);
      const extra = parseWith(osaExtra, decodeExtra(item.extra, endpoint, `${at}.extra`), endpoint, `${at}.extra`);
      const ts = extra.timestamp ?? item.timestamp;
      dayOf(ts).apneaEvents.push({
        timestamp: fromEpoch(ts).toISOString(),
        spo2Decrease: extra.spo2_decrease,
        spo2Samples: samples(extra.spo2),
        hrSamples: samples(extra.hr),
      });
    }
  });

  return [...days.values()].map((day) => ({
    ...day,
    readingCount: day.readings.length,
    apneaEventCount: day.apneaEvents.length,
    avgSpo2: day.readings.length
      ? Math.round(day.readings.reduce((sum, r) => sum + r.spo2, 0) / day.readings.length)
      : null,
  }));
}

// ── PAI ──────────────────────────────────────────────────────────

export function mapPai(raw: unknown, endpoint: string, at: string): PaiSample {
  const item = parseWith(paiEvent, raw, endpoint, at);
  return {
    date: dayKey(fromEpoch(item.timestamp)),
    totalPai: item.totalPai,
    dailyPai: item.dailyPai,
    restingHeartRate: positive(item.restHr),
    maxHeartRate: positive(item.maxHr),
    lowZoneMinutes: item.lowZoneMinutes,
    mediumZoneMinutes: item.mediumZoneMinutes,
    highZoneMinutes: item.highZoneMinutes,
    lowZonePai: item.lowZonePai ?? 0,
    mediumZonePai: item.mediumZonePai ?? 0,
    highZonePai: item.highZonePai ?? 0,
    lowZoneLimit: whole(item.lowZoneLowerLimit),
    mediumZoneLimit: whole(item.mediumZoneLowerLimit),
    highZoneLimit: whole(item.highZoneLowerLimit),
    activityScores: item.activityScores,
    nextActivityScores: item.nextActivityScores,
  };
}

// ── Readiness ────────────────────────────────────────────────────

function score(value: number | string | null | undefined): number | null {
  if (value == null || value === "" || String(value) === NO_DATA) return null;
  const n = Number(value);
  return Number.isInteger(n) ? n : null;
}

function decimal(value: number | string | null | undefined): number | null {
  if (value == null || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** Returns null for subtypes other than `watch_score`, which carry no scores. */
export function mapReadiness(raw: unknown, endpoint: string, at: string): ReadinessSample | null {
  const item = parseWith(readinessEvent, raw, endpoint, at);
  if (item.subType !== "watch_score") return null;

  const calibrated = decimal(item.skinTempCalibrated);
  return {
    date: dayKey(fromEpoch(item.timestamp)),
    readinessScore: score(item.rdnsScore),
    readinessInsight: score(item.rdnsInsight),
    hrvScore: score(item.hrvScore),
    hrvBaseline: score(item.hrvBaseline),
    sleepHrv: score(item.sleepHRV),
    rhrScore: score(item.rhrScore),
    rhrBaseline: score(item.rhrBaseline),
    sleepRhr: score(item.sleepRHR),
    skinTempScore: score(item.skinTempScore),
    skinTempBaseline: decimal(item.skinTempBaseLine),
    // reported in tenths of a degree
    skinTempDelta: calibrated === null ? null : calibrated / 10,
    mentalScore: score(item.mentScore),
    mentalBaseline: score(item.mentBaseLine),
    physicalScore: score(item.phyScore),
    physicalBaseline: score(item.phyBaseline),
    ahiScore: score(item.ahiScore),
    ahiBaseline: decimal(item.ahiBaseline),
    afibScore: score(item.afibScore),
    afibBaseline: score(item.afibBaseLine),
  };
}

function completeness(sample: ReadinessSample): number {
  return Object.values(sample).filter((v) => v !== null).length;
}

/** Keep the most complete sample per day; the first one wins ties. */
export function pickReadiness(samples: ReadinessSample[]): ReadinessSample[] {
  return onePerDay(samples, (candidate, current) => completeness(candidate) > completeness(current));
}

// ── Workouts ─────────────────────────────────────────────────────

/**
 * Decode the detail endpoint's heart-rate track: `;`-separated
 * `timeDelta,bpmDelta` pairs, accumulated from zero. Empty parts are 0.
 */
export function decodeHeartRate(track: string, endpoint: string, field: string): HeartRatePoint[] {
  const points: HeartRatePoint[] = [];
  let offsetSeconds = 0;
  let bpm = 0;
  for (const pair of track.split(";")) {
    if (pair === "") continue;
    const [dt = "", dhr = ""] = pair.split(",");
    const time = dt === "" ? 0 : Number(dt);
    const rate = dhr === "" ? 0 : Number(dhr);
    if (!Number.isFinite(time) || !Number.isFinite(rate)) {
      throw new ParseError(endpoint, field, `has a malformed entry "${pair}"`);
    }
    offsetSeconds += time;
    bpm += rate;
    points.push({ offsetSeconds, bpm });
  }
  return points;
}

/**
 * Time spent per heart-rate zone from the summary's `heart_range`.
 * Malformed or empty zones are skipped; zone numbers keep their position.
 */
export function parseHeartRateZones(range: string | null): HeartRateZone[] {
  if (!range) return [];
  const zones: HeartRateZone[] = [];
  range.split(";").forEach((part, i) => {
    const fields = part.split(",");
    if (fields.length !== 2) return;
    const [seconds = Number.NaN, maxHeartRate = Number.NaN] = fields.map((f) => (f === "" ? Number.NaN : Number(f)));
    if (!Number.isInteger(seconds) || !Number.isInteger(maxHeartRate) || seconds <= 0) return;
    zones.push({ zone: i + 1, name: ZONE_NAMES[i] ?? `Zone ${i + 1}`, seconds, maxHeartRate });
  });
  return zones;
}

export function mapWorkout(item: RawWorkoutSummary, heartRateSeries: HeartRatePoint[]): WorkoutRecord {
  const end = fromEpoch(item.end_time);
  const start = fromEpoch(item.end_time - item.run_time);

  return {
    trackId: item.trackid,
    source: item.source,
    type: item.type,
    activity: WORKOUT_TYPES[item.type] ?? `unknown_${item.type}`,
    start: start.toISOString(),
    end: end.toISOString(),
    durationSeconds: item.run_time,
    calories: item.calorie,
    distanceMeters: item.dis ?? 0,
    avgHeartRate: whole(item.avg_heart_rate),
    maxHeartRate: whole(item.max_heart_rate),
    minHeartRate: whole(item.min_heart_rate),
    // training effects are stored as tenths
    trainingEffect: tenths(item.te),
    anaerobicTrainingEffect: tenths(item.anaerobic_te),
    vo2Max: whole(item.VO2_max),
    exerciseLoad: whole(item.exercise_load),
    avgCadence: whole(item.avg_cadence),
    avgStrideLength: positive(item.avg_stride_length),
    altitudeAscend: whole(item.altitude_ascend),
    altitudeDescend: whole(item.altitude_descend),
    avgPace: positive(item.avg_pace),
    totalSteps: whole(item.total_step) ?? 0,
    heartRateZones: parseHeartRateZones(item.heart_range ?? null),
    strengthScores: item.strengthScores,
    strengthGroups: item.strength_training_group.map((g) => ({ actionType: g.actionType, count: g.count })),
    totalGroups: whole(item.total_group) ?? 0,
    avgFrequency: positive(item.avg_frequency),
    avgRtpc: positive(item.averageRTPC),
    bestRtpc: whole(item.bestRTPC),
    worstRtpc: whole(item.worstRTPC),
    ropeSkippingRestSeconds: whole(item.rope_skipping_rest_time),
    forefootRatio: positive(item.forefoot_ratio),
    pauseSeconds: whole(item.pause_time),
    heartRateSeries,
  };
}
