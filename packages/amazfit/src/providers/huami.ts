import {
  ConfigurationError,
  HttpClient,
  ParseError,
  TransportError,
} from "@wristlog/shared";
import { dayKey, eventBounds, fromEpoch, inRange, planWindows, toRange } from "../dates.ts";
import { mergeSummary } from "../merge.ts";
import {
  decodeBandDay,
  decodeHeartRate,
  eventTimestamp,
  groupSpo2,
  mapDaily,
  mapPai,
  mapReadiness,
  mapStress,
  mapWorkout,
  onePerDay,
  pickReadiness,
} from "./normalize.ts";
import {
  bandDataResponse,
  eventsResponse,
  parseWith,
  workoutDetailResponse,
  workoutHistoryResponse,
  workoutSummary,
  type RawWorkoutSummary,
} from "./raw.ts";
import type {
  BandDay,
  DailySummary,
  DateRange,
  FanoutPolicy,
  HealthProvider,
  HeartRatePoint,
  PaiSample,
  ReadinessSample,
  Spo2Sample,
  StressSample,
  SummaryRow,
  WorkoutRecord,
} from "../types.ts";

const HUAMI_URL = "https://api-mifit.huami.com";
const ZEPP_URL = "https://api-mifit.zepp.com";

const BAND_DATA = "/v1/data/band_data.json";
const WORKOUT_HISTORY = "/v1/sport/run/history.json";
const WORKOUT_DETAIL = "/v1/sport/run/detail.json";

const HEADERS = {
  appname: "com.xiaomi.hm.health",
  lang: "en",
  "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)",
  Accept: "application/json",
};

const EVENT_LIMIT = "1000";

export interface HuamiClientOptions {
  token?: string;
  userId?: string;
  /**
   * IANA zone sent with SpO2 queries. Defaults to the process zone.
   * Records are grouped into days in the process zone (`TZ`), so callers
   * passing a different zone must set `TZ` to match; the CLI does.
   */
  timeZone?: string;
  fanout?: FanoutPolicy;
  timeoutMs?: number;
}

interface Envelope<T> {
  code: number;
  message?: string;
  data?: T;
}

// ── Helpers ──────────────────────────────────────────────────────

function required(value: string | undefined, what: string): string {
  if (!value || value.trim() === "") {
    throw new ConfigurationError(`${what} is required`);
  }
  return value;
}

function unwrap<T>(res: Envelope<T>, endpoint: string): T {
  if (res.code !== 1) {
    throw new TransportError(
      `${endpoint} returned code ${res.code}: ${res.message ?? "unknown error"}`,
      undefined,
      { endpoint, code: res.code },
    );
  }
  if (res.data === undefined) {
    throw new ParseError(endpoint, "data", "is missing");
  }
  return res.data;
}

/** Drop records outside the range and order the rest by date. */
function within<T extends { date: string }>(records: T[], range: DateRange): T[] {
  return records
    .filter((r) => inRange(r.date, range))
    .sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Map each event item and keep the latest event per day; several events
 * on one day are successive updates of the same daily aggregate.
 */
function latestPerDay<T extends { date: string }>(
  items: unknown[],
  endpoint: string,
  map: (raw: unknown, endpoint: string, at: string) => T,
): T[] {
  const stamped = items.map((raw, i) => {
    const record = map(raw, endpoint, `items.${i}`);
    return { date: record.date, timestamp: eventTimestamp(raw, endpoint, `items.${i}`), record };
  });
  return onePerDay(stamped, (candidate, current) => candidate.timestamp > current.timestamp)
    .map((s) => s.record);
}

function workoutStart(w: RawWorkoutSummary): number {
  return w.end_time - w.run_time;
}

// ── Provider ─────────────────────────────────────────────────────

/**
 * Client for the private Huami/Zepp API. Owns the credentials and both
 * host sessions; requests are issued one at a time.
 */
export class HuamiClient implements HealthProvider {
  readonly name = "huami";
  readonly userId: string;
  readonly timeZone: string;
  readonly fanout: FanoutPolicy;

  private readonly huami: HttpClient;
  private readonly zepp: HttpClient;

  constructor(opts: HuamiClientOptions) {
    const token = required(opts.token, "App token (AMAZFIT_TOKEN or --token)");
    this.userId = required(opts.userId, "User ID (AMAZFIT_USER_ID or --user-id)");
    this.timeZone = opts.timeZone ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
    this.fanout = opts.fanout ?? "range";

    const headers = { ...HEADERS, apptoken: token };
    this.huami = new HttpClient({ baseUrl: HUAMI_URL, headers, timeoutMs: opts.timeoutMs });
    this.zepp = new HttpClient({ baseUrl: ZEPP_URL, headers, timeoutMs: opts.timeoutMs });
  }

  close(): void {
    this.huami.close();
    this.zepp.close();
  }

  // ── Band data ──

  async getBandData(start: Date, end: Date): Promise<BandDay[]> {
    return this.bandDays(toRange(start, end));
  }

  async getDaily(start: Date, end: Date): Promise<DailySummary[]> {
    const days = await this.bandDays(toRange(start, end));
    return days.map((day) => mapDaily(day, "band_data", `data.${day.date}`));
  }

  private async bandDays(range: DateRange): Promise<BandDay[]> {
    const days: BandDay[] = [];
    for (const window of planWindows(range, this.fanout)) {
      const res = await this.huami.get(BAND_DATA, {
        query_type: "summary",
        device_type: "ios_phone",
        userid: this.userId,
        from_date: dayKey(window.start),
        to_date: dayKey(window.end),
      });
      const data = unwrap(parseWith(bandDataResponse, res, "band_data"), "band_data");
      data.forEach((raw, i) => days.push(decodeBandDay(raw, "band_data", `data.${i}`)));
    }
    return within(days, range);
  }

  // ── Events ──

  private async events(
    eventType: string,
    range: DateRange,
    extra: Record<string, string> = {},
  ): Promise<unknown[]> {
    const items: unknown[] = [];
    for (const window of planWindows(range, this.fanout)) {
      const res = await this.zepp.get(`/users/${encodeURIComponent(this.userId)}/events`, {
        eventType,
        limit: EVENT_LIMIT,
        ...eventBounds(window),
        ...extra,
      });
      items.push(...parseWith(eventsResponse, res, `events/${eventType}`).items);
    }
    return items;
  }

  async getStress(start: Date, end: Date): Promise<StressSample[]> {
    const range = toRange(start, end);
    const endpoint = "events/all_day_stress";
    const items = await this.events("all_day_stress", range);
    return within(latestPerDay(items, endpoint, mapStress), range);
  }

  async getSpo2(start: Date, end: Date): Promise<Spo2Sample[]> {
    const range = toRange(start, end);
    const items = await this.events("blood_oxygen", range, { timeZone: this.timeZone });
    return within(groupSpo2(items, "events/blood_oxygen"), range);
  }

  async getPai(start: Date, end: Date): Promise<PaiSample[]> {
    const range = toRange(start, end);
    const endpoint = "events/PaiHealthInfo";
    const items = await this.events("PaiHealthInfo", range);
    return within(latestPerDay(items, endpoint, mapPai), range);
  }

  async getReadiness(start: Date, end: Date): Promise<ReadinessSample[]> {
    const range = toRange(start, end);
    const endpoint = "events/readiness";
    const items = await this.events("readiness", range);
    const samples = items
      .map((raw, i) => mapReadiness(raw, endpoint, `items.${i}`))
      .filter((s): s is ReadinessSample => s !== null);
    return within(pickReadiness(samples), range);
  }

  // ── Summary ──

  async getSummary(start: Date, end: Date): Promise<SummaryRow[]> {
    toRange(start, end);
    const daily = await this.getDaily(start, end);
    const stress = await this.getStress(start, end);
    const spo2 = await this.getSpo2(start, end);
    const pai = await this.getPai(start, end);
    return mergeSummary({ daily, stress, spo2, pai });
  }

  // ── Workouts ──

  async getWorkouts(start: Date, end: Date): Promise<WorkoutRecord[]> {
    const range = toRange(start, end);
    const res = await this.huami.get(WORKOUT_HISTORY);
    const { summary } = unwrap(parseWith(workoutHistoryResponse, res, "run/history"), "run/history");

    const seen = new Set<string>();
    const selected = summary
      .map((raw, i) => parseWith(workoutSummary, raw, "run/history", `data.summary.${i}`))
      .filter((w) => {
        if (seen.has(w.trackid)) return false;
        seen.add(w.trackid);
        return inRange(dayKey(fromEpoch(workoutStart(w))), range);
      })
      .sort((a, b) => workoutStart(a) - workoutStart(b));

    const workouts: WorkoutRecord[] = [];
    for (const item of selected) {
      workouts.push(mapWorkout(item, await this.heartRate(item)));
    }
    return workouts;
  }

  private async heartRate(item: RawWorkoutSummary): Promise<HeartRatePoint[]> {
    const res = await this.huami.get(WORKOUT_DETAIL, {
      trackid: item.trackid,
      source: item.source,
    });
    const detail = unwrap(parseWith(workoutDetailResponse, res, "run/detail"), "run/detail");
    return detail.heart_rate
      ? decodeHeartRate(detail.heart_rate, "run/detail", "data.heart_rate")
      : [];
  }
}

/** Run `fn` with a fresh client and always release its sessions afterwards. */
export async function withClient<T>(
  opts: HuamiClientOptions,
  fn: (client: HuamiClient) => Promise<T>,
): Promise<T> {
  const client = new HuamiClient(opts);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
