import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  AuthenticationError,
  ConfigurationError,
  InvalidArgumentError,
  ParseError,
  TransportError,
} from "@wristlog/shared";
import { HuamiClient, withClient } from "./huami.ts";

const mockFetch = vi.fn<typeof fetch>();

const JAN_24 = new Date("2025-01-24T00:00:00Z");
const JAN_25 = new Date("2025-01-25T00:00:00Z");
const JAN_26 = new Date("2025-01-26T00:00:00Z");

// 2025-01-24T00:00:00Z in seconds
const DAY = 1737676800;

type Handler = (url: URL) => unknown;

/** Answer each request with the JSON its handler returns, keyed by path or events type. */
function serve(handlers: Record<string, Handler>): void {
  mockFetch.mockImplementation(async (input) => {
    const url = new URL(String(input));
    const key = url.searchParams.get("eventType") ?? url.pathname;
    const handler = handlers[key];
    if (!handler) return new Response("not found", { status: 404 });
    return new Response(JSON.stringify(handler(url)), { status: 200 });
  });
}

function requested(): URL[] {
  return mockFetch.mock.calls.map(([input]) => new URL(String(input)));
}

function encode(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64");
}

function stressItem(timestamp: number, avg: number) {
  return {
    timestamp,
    avgStress: avg,
    minStress: 9,
    maxStress: 61,
    relaxProportion: 62,
    normalProportion: 24,
    mediumProportion: 11,
    highProportion: 3,
  };
}

function bandSummary(steps: number) {
  return {
    stp: { ttl: steps, dis: 4000, cal: 150 },
    slp: { dp: 90, lt: 300, st: DAY + 1800, ed: DAY + 25200, rhr: 57 },
  };
}

describe("HuamiClient", () => {
  let client: HuamiClient;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
    client = new HuamiClient({ token: "test-token", userId: "1001", timeZone: "UTC" });
  });

  afterEach(() => {
    client.close();
    vi.unstubAllGlobals();
  });

  describe("constructor", () => {
    it("requires a token", () => {
      expect(() => new HuamiClient({ userId: "1001" })).toThrow(ConfigurationError);
    });

    it("requires a non-blank user ID", () => {
      expect(() => new HuamiClient({ token: "test-token", userId: "  " })).toThrow(ConfigurationError);
    });

    it("defaults to one request per range", () => {
      expect(client.fanout).toBe("range");
      expect(client.timeZone).toBe("UTC");
    });

    it("defaults the time zone to the process zone", () => {
      const local = new HuamiClient({ token: "test-token", userId: "1001" });
      local.close();

      expect(local.timeZone).toBe(Intl.DateTimeFormat().resolvedOptions().timeZone);
    });
  });

  describe("getStress", () => {
    it("returns one sample per day from a single request", async () => {
      serve({
        all_day_stress: () => ({
          items: [
            {
              timestamp: 1737676800000,
              avgStress: 29,
              minStress: 10,
              maxStress: 68,
              relaxProportion: 58,
              normalProportion: 26,
              mediumProportion: 12,
              highProportion: 4,
            },
            {
              timestamp: 1737763200000,
              avgStress: 24,
              minStress: 9,
              maxStress: 61,
              relaxProportion: 62,
              normalProportion: 24,
              mediumProportion: 11,
              highProportion: 3,
            },
          ],
        }),
      });

      const samples = await client.getStress(JAN_24, JAN_25);

      expect(samples.map((s) => [s.date, s.avg, s.min, s.max, s.relaxed, s.normal, s.medium, s.high])).toEqual([
        ["2025-01-24", 29, 10, 68, 58, 26, 12, 4],
        ["2025-01-25", 24, 9, 61, 62, 24, 11, 3],
      ]);
      expect(mockFetch).toHaveBeenCalledTimes(1);

      const [url] = requested();
      expect(url?.origin).toBe("https://api-mifit.zepp.com");
      expect(url?.pathname).toBe("/users/1001/events");
      expect(Object.fromEntries(url?.searchParams ?? [])).toEqual({
        eventType: "all_day_stress",
        limit: "1000",
        from: "1737676800000",
        to: "1737849599000",
      });
      expect(mockFetch.mock.calls[0]?.[1]?.headers).toMatchObject({
        apptoken: "test-token",
        appname: "com.xiaomi.hm.health",
        lang: "en",
      });
    });

    it("drops days outside the range and sorts by date", async () => {
      serve({
        all_day_stress: () => ({
          items: [
            stressItem((DAY + 86400) * 1000, 24),
            stressItem((DAY - 86400) * 1000, 40),
            stressItem(DAY * 1000, 29),
          ],
        }),
      });

      const samples = await client.getStress(JAN_24, JAN_25);

      expect(samples.map((s) => s.date)).toEqual(["2025-01-24", "2025-01-25"]);
    });

    it("keeps the latest event when a day has several", async () => {
      serve({
        all_day_stress: () => ({
          items: [stressItem((DAY + 3600) * 1000, 30), stressItem(DAY * 1000, 20)],
        }),
      });

      const samples = await client.getStress(JAN_24, JAN_24);

      expect(samples.map((s) => [s.date, s.avg])).toEqual([["2025-01-24", 30]]);
    });

    it("rejects an end before the start without a request", async () => {
      await expect(client.getStress(JAN_25, JAN_24)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("reports the offending field of a malformed item", async () => {
      const { avgStress: _avg, ...item } = stressItem(DAY * 1000, 29);
      serve({ all_day_stress: () => ({ items: [item] }) });

      const err = await client.getStress(JAN_24, JAN_25).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ParseError);
      expect((err as ParseError).endpoint).toBe("events/all_day_stress");
      expect((err as ParseError).field).toBe("items.0.avgStress");
    });

    it("surfaces a rejected token as AuthenticationError", async () => {
      mockFetch.mockResolvedValueOnce(new Response("unauthorized", { status: 401 }));

      await expect(client.getStress(JAN_24, JAN_25)).rejects.toBeInstanceOf(AuthenticationError);
    });
  });

  describe("fanout", () => {
    it("issues one request per day with the per-day policy", async () => {
      const perDay = new HuamiClient({ token: "test-token", userId: "1001", fanout: "per-day" });
      serve({ PaiHealthInfo: () => ({ items: [] }) });

      await perDay.getPai(JAN_24, JAN_26);
      perDay.close();

      expect(requested().map((u) => [u.searchParams.get("from"), u.searchParams.get("to")])).toEqual([
        ["1737676800000", "1737763199000"],
        ["1737763200000", "1737849599000"],
        ["1737849600000", "1737935999000"],
      ]);
    });
  });

  describe("getPai", () => {
    it("returns one sample per day, the latest update", async () => {
      const pai = (seconds: number, totalPai: number) => ({
        timestamp: seconds * 1000,
        totalPai,
        dailyPai: 2,
        lowZoneMinutes: 10,
        mediumZoneMinutes: 0,
        highZoneMinutes: 0,
      });
      serve({ PaiHealthInfo: () => ({ items: [pai(DAY + 7200, 84), pai(DAY + 60, 80), pai(DAY + 3600, 82)] }) });

      const samples = await client.getPai(JAN_24, JAN_24);

      expect(samples.map((s) => [s.date, s.totalPai])).toEqual([["2025-01-24", 84]]);
    });
  });

  describe("getDaily", () => {
    it("queries band data and decodes each day", async () => {
      serve({
        "/v1/data/band_data.json": () => ({
          code: 1,
          message: "success",
          data: [
            { date_time: "2025-01-25", summary: encode(bandSummary(6400)) },
            { date_time: "2025-01-24", summary: encode(bandSummary(8500)) },
          ],
        }),
      });

      const days = await client.getDaily(JAN_24, JAN_25);

      expect(days.map((d) => [d.date, d.steps, d.sleep.totalMinutes, d.restingHeartRate])).toEqual([
        ["2025-01-24", 8500, 390, 57],
        ["2025-01-25", 6400, 390, 57],
      ]);
      const [url] = requested();
      expect(url?.origin).toBe("https://api-mifit.huami.com");
      expect(Object.fromEntries(url?.searchParams ?? [])).toEqual({
        query_type: "summary",
        device_type: "ios_phone",
        userid: "1001",
        from_date: "2025-01-24",
        to_date: "2025-01-25",
      });
    });

    it("raises the service's own error code", async () => {
      serve({ "/v1/data/band_data.json": () => ({ code: 0, message: "token expired" }) });

      await expect(client.getDaily(JAN_24, JAN_24)).rejects.toThrow(
        new TransportError("band_data returned code 0: token expired"),
      );
    });

    it("returns the raw band data with decoded summaries", async () => {
      serve({
        "/v1/data/band_data.json": () => ({
          code: 1,
          data: [{ date_time: "2025-01-24", summary: encode(bandSummary(8500)) }],
        }),
      });

      expect(await client.getBandData(JAN_24, JAN_24)).toEqual([
        { date: "2025-01-24", summary: bandSummary(8500) },
      ]);
    });
  });

  describe("getSpo2", () => {
    it("sends the client's time zone", async () => {
      const berlin = new HuamiClient({ token: "test-token", userId: "1001", timeZone: "Europe/Berlin" });
      serve({
        blood_oxygen: () => ({
          items: [{ subType: "odi", timestamp: (DAY + 21600) * 1000, odi: 1.2, odiNum: 6, score: 91 }],
        }),
      });

      const samples = await berlin.getSpo2(JAN_24, JAN_24);
      berlin.close();

      expect(requested()[0]?.searchParams.get("timeZone")).toBe("Europe/Berlin");
      expect(samples).toHaveLength(1);
      expect(samples[0]).toMatchObject({ date: "2025-01-24", odi: 1.2, odiCount: 6, score: 91, avgSpo2: null });
    });
  });

  describe("getReadiness", () => {
    it("keeps watch scores only", async () => {
      serve({
        readiness: () => ({
          items: [
            { subType: "daily_report", timestamp: DAY * 1000 },
            { subType: "watch_score", timestamp: DAY * 1000, rdnsScore: "74", hrvScore: "61" },
          ],
        }),
      });

      const samples = await client.getReadiness(JAN_24, JAN_24);

      expect(samples.map((s) => [s.date, s.readinessScore, s.hrvScore])).toEqual([["2025-01-24", 74, 61]]);
    });
  });

  describe("getSummary", () => {
    it("joins every source on date", async () => {
      serve({
        "/v1/data/band_data.json": () => ({
          code: 1,
          data: [{ date_time: "2025-01-24", summary: encode(bandSummary(8500)) }],
        }),
        all_day_stress: () => ({ items: [stressItem(DAY * 1000, 29), stressItem((DAY + 86400) * 1000, 24)] }),
        blood_oxygen: () => ({
          items: [{ subType: "click", timestamp: (DAY + 86400 + 3600) * 1000, spo2: 96 }],
        }),
        PaiHealthInfo: () => ({
          items: [
            {
              timestamp: DAY * 1000,
              totalPai: 80,
              dailyPai: 4,
              lowZoneMinutes: 20,
              mediumZoneMinutes: 5,
              highZoneMinutes: 0,
            },
          ],
        }),
      });

      const rows = await client.getSummary(JAN_24, JAN_25);

      expect(rows).toEqual([
        {
          date: "2025-01-24",
          steps: 8500,
          distanceMeters: 4000,
          sleepMinutes: 390,
          restingHeartRate: 57,
          maxHeartRate: null,
          avgStress: 29,
          avgSpo2: null,
          totalPai: 80,
        },
        {
          date: "2025-01-25",
          steps: null,
          distanceMeters: null,
          sleepMinutes: null,
          restingHeartRate: null,
          maxHeartRate: null,
          avgStress: 24,
          avgSpo2: 96,
          totalPai: null,
        },
      ]);
      expect(mockFetch).toHaveBeenCalledTimes(4);
    });
  });

  describe("getWorkouts", () => {
    it("selects workouts in range, sorted by start, with heart-rate detail", async () => {
      const workout = (trackid: string, end: number, type = 1) => ({
        trackid,
        source: "run.watch",
        type,
        end_time: end,
        run_time: 1800,
        calorie: 300,
        dis: 5000,
        avg_heart_rate: 145,
        max_heart_rate: 170,
        te: 30,
      });
      serve({
        "/v1/sport/run/history.json": () => ({
          code: 1,
          data: {
            summary: [
              workout("b", DAY + 86400 + 36000, 2),
              workout("a", DAY + 30000),
              workout("a", DAY + 30000),
              workout("old", DAY - 86400 + 30000),
            ],
          },
        }),
        "/v1/sport/run/detail.json": (url) => ({
          code: 1,
          data: { trackid: url.searchParams.get("trackid"), heart_rate: "0,120;10,5" },
        }),
      });

      const workouts = await client.getWorkouts(JAN_24, JAN_25);

      expect(workouts.map((w) => [w.trackId, w.activity, w.start])).toEqual([
        ["a", "outdoor_running", "2025-01-24T07:50:00.000Z"],
        ["b", "walking", "2025-01-25T09:30:00.000Z"],
      ]);
      expect(workouts[0]?.heartRateSeries).toEqual([
        { offsetSeconds: 0, bpm: 120 },
        { offsetSeconds: 10, bpm: 125 },
      ]);
      expect(workouts[0]?.trainingEffect).toBe(3);
      expect(
        requested()
          .filter((u) => u.pathname === "/v1/sport/run/detail.json")
          .map((u) => [u.searchParams.get("trackid"), u.searchParams.get("source")]),
      ).toEqual([
        ["a", "run.watch"],
        ["b", "run.watch"],
      ]);
    });
  });

  describe("withClient", () => {
    it("closes the client once the callback settles", async () => {
      let used: HuamiClient | undefined;
      await withClient({ token: "test-token", userId: "1001" }, async (c) => {
        used = c;
      });

      await expect(used?.getStress(JAN_24, JAN_24)).rejects.toBeInstanceOf(TransportError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
