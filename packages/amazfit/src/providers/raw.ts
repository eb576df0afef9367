import { z } from "zod";
import { ParseError } from "@wristlog/shared";

// ── Field helpers ────────────────────────────────────────────────

/** The API mixes numbers and numeric strings ("110.0") freely. */
const numeric = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, "not a number").transform(Number),
]);

const count = numeric.pipe(z.number().nonnegative());

/** Lists of numbers; absent or null reads as empty. */
const numbers = z
  .array(numeric)
  .nullish()
  .transform((v) => v ?? []);

/** Optional numeric field; absent, null and "" all mean "not reported". */
const reported = z
  .union([numeric, z.literal("")])
  .nullish()
  .transform((v) => (v === "" || v === undefined ? null : v));

// ── Band data (daily summary) ────────────────────────────────────

const envelope = {
  code: z.number(),
  message: z.string().optional(),
};

export const bandDataResponse = z.object({
  ...envelope,
  data: z.array(z.unknown()).optional(),
});

export const bandDataDay = z.object({
  date_time: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "not a yyyy-MM-dd date"),
  summary: z.string().min(1),
});

// Stage bounds are minutes from local midnight and go negative before it.
const stage = z.object({
  start: numeric,
  stop: numeric,
  mode: numeric,
  step: reported,
  dis: reported,
  cal: reported,
});

export const bandSummary = z.object({
  stp: z.object({
    ttl: count,
    dis: count,
    cal: count,
    runDist: reported,
    wk: reported,
    runCal: reported,
    rn: reported,
    stage: z.array(stage).optional(),
  }),
  slp: z.object({
    dp: count,
    lt: count,
    dt: reported,
    st: numeric,
    ed: numeric,
    rhr: reported,
    ss: reported,
    wc: reported,
    lb: reported,
    wk: reported,
    ebt: reported,
    obt: reported,
    is: reported,
    stage: z.array(stage).optional(),
  }),
  hr: z
    .object({
      maxHr: z.object({ hr: count, ts: reported }).optional(),
    })
    .optional(),
});

export type RawBandSummary = z.output<typeof bandSummary>;
export type RawStage = z.output<typeof stage>;

// ── Events API ───────────────────────────────────────────────────

export const eventsResponse = z.object({
  items: z.array(z.unknown()),
});

export const timedEvent = z.object({ timestamp: numeric });

export const stressEvent = z.object({
  timestamp: numeric,
  avgStress: count,
  minStress: count,
  maxStress: count,
  relaxProportion: count,
  normalProportion: count,
  mediumProportion: count,
  highProportion: count,
  data: z.string().nullish(),
});

export const stressPoints = z.array(z.object({ time: numeric, value: count }));

export type RawStressEvent = z.output<typeof stressEvent>;

export const spo2Event = z.object({
  subType: z.string(),
  timestamp: numeric,
});

export const odiEvent = z.object({
  timestamp: numeric,
  odi: count,
  odiNum: count,
  score: reported,
});

/** `extra` is usually a JSON string, sometimes an inline object. */
const extra = z.union([z.string(), z.record(z.unknown())]).nullish();

export const clickEvent = z.object({
  timestamp: numeric,
  spo2: reported,
  value: reported,
  extra,
});

export const clickExtra = z.object({
  spo2: reported,
  spo2History: z.array(reported).optional(),
  timestamp: reported,
  isAuto: z.boolean().optional(),
});

export const osaEvent = z.object({
  timestamp: numeric,
  extra,
});

export const osaExtra = z.object({
  timestamp: reported,
  spo2_decrease: reported,
  spo2: z.array(reported).optional(),
  hr: z.array(reported).optional(),
});

export const paiEvent = z.object({
  timestamp: numeric,
  totalPai: count,
  dailyPai: numeric,
  restHr: reported,
  maxHr: reported,
  lowZoneMinutes: count,
  mediumZoneMinutes: count,
  highZoneMinutes: count,
  lowZonePai: reported,
  mediumZonePai: reported,
  highZonePai: reported,
  lowZoneLowerLimit: reported,
  mediumZoneLowerLimit: reported,
  highZoneLowerLimit: reported,
  activityScores: numbers,
  nextActivityScores: numbers,
});

export type RawPaiEvent = z.output<typeof paiEvent>;

/** Readiness values come as strings; "255" marks a missing measurement. */
const readinessValue = z.union([z.number(), z.string()]).nullish();

export const readinessEvent = z.object({
  subType: z.string(),
  timestamp: numeric,
  rdnsScore: readinessValue,
  rdnsInsight: readinessValue,
  hrvScore: readinessValue,
  hrvBaseline: readinessValue,
  sleepHRV: readinessValue,
  rhrScore: readinessValue,
  rhrBaseline: readinessValue,
  sleepRHR: readinessValue,
  skinTempScore: readinessValue,
  skinTempBaseLine: readinessValue,
  skinTempCalibrated: readinessValue,
  mentScore: readinessValue,
  mentBaseLine: readinessValue,
  phyScore: readinessValue,
  phyBaseline: readinessValue,
  ahiScore: readinessValue,
  ahiBaseline: readinessValue,
  afibScore: readinessValue,
  afibBaseLine: readinessValue,
});

export type RawReadinessEvent = z.output<typeof readinessEvent>;

// ── Workouts ─────────────────────────────────────────────────────

export const workoutSummary = z.object({
  trackid: z.union([z.string().min(1), z.number()]).transform(String),
  source: z.string(),
  type: numeric,
  end_time: count,
  run_time: count,
  calorie: count,
  dis: reported,
  avg_heart_rate: reported,
  max_heart_rate: reported,
  min_heart_rate: reported,
  te: reported,
  anaerobic_te: reported,
  VO2_max: reported,
  exercise_load: reported,
  avg_cadence: reported,
  avg_stride_length: reported,
  altitude_ascend: reported,
  altitude_descend: reported,
  avg_pace: reported,
  total_step: reported,
  // "seconds,maxHr;..." per zone, lowest zone first
  heart_range: z.string().nullish(),
  strengthScores: numbers,
  strength_training_group: z
    .array(z.object({ actionType: numeric, count: count }))
    .nullish()
    .transform((v) => v ?? []),
  total_group: reported,
  avg_frequency: reported,
  averageRTPC: reported,
  bestRTPC: reported,
  worstRTPC: reported,
  rope_skipping_rest_time: reported,
  forefoot_ratio: reported,
  pause_time: reported,
});

export type RawWorkoutSummary = z.output<typeof workoutSummary>;

export const workoutHistoryResponse = z.object({
  ...envelope,
  data: z.object({ summary: z.array(z.unknown()) }).optional(),
});

export const workoutDetailResponse = z.object({
  ...envelope,
  data: z
    .object({
      trackid: z.union([z.string(), z.number()]).transform(String),
      heart_rate: z.string().optional(),
    })
    .optional(),
});

// ── Parsing ──────────────────────────────────────────────────────

function isMissing(issue: z.ZodIssue): boolean {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === "undefined";
    case z.ZodIssueCode.invalid_union:
      return issue.unionErrors.every((e) => e.issues.every(isMissing));
    default:
      return false;
  }
}

function describe(issue: z.ZodIssue): string {
  return isMissing(issue) ? "is missing" : `is invalid (${issue.message})`;
}

/**
 * Validate `value` against `schema`, turning the first issue into a
 * ParseError. `at` prefixes the reported field path.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  endpoint: string,
  at = "",
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const path = [at, ...(issue?.path ?? [])].filter((p) => p !== "").join(".");
  throw new ParseError(endpoint, path || "response", issue ? describe(issue) : "is invalid");
}

/** Decode a JSON string field, reporting bad JSON as a ParseError on `field`. */
export function parseJsonField(raw: string, endpoint: string, field: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ParseError(endpoint, field, "is not valid JSON");
  }
}
