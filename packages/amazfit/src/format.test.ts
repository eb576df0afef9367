import { describe, it, expect } from "vitest";
import {
  clock,
  dailyTotals,
  duration,
  heartRate,
  skinTemp,
  stressView,
  summaryView,
  thousands,
  workoutsView,
} from "./format.ts";
import type { DailySummary, WorkoutRecord } from "./types.ts";

function day(date: string, steps: number, distanceMeters: number, totalMinutes: number): DailySummary {
  return {
    date,
    steps,
    distanceMeters,
    calories: 0,
    runDistanceMeters: 0,
    walkingMinutes: 0,
    runningCalories: 0,
    runningSteps: 0,
    sleep: {
      totalMinutes,
      deepMinutes: 0,
      lightMinutes: 0,
      remMinutes: null,
      score: null,
      start: null,
      end: null,
      wakeCount: 0,
      wakeMinutes: 0,
      latencyMinutes: null,
      timeInBed: null,
      outOfBedTime: null,
      interruptionScore: null,
      phases: [],
    },
    restingHeartRate: null,
    maxHeartRate: null,
    activities: [],
  };
}

describe("helpers", () => {
  it("formats durations", () => {
    expect(duration(450)).toBe("7h 30m");
    expect(duration(45)).toBe("45m");
    expect(duration(0)).toBe("0m");
  });

  it("groups thousands", () => {
    expect(thousands(12345.6)).toBe("12,346");
  });

  it("prints clock times in the process zone", () => {
    expect(clock("2025-01-24T07:30:00.000Z")).toBe("07:30");
  });

  it("combines resting and max heart rate", () => {
    expect(heartRate(58, 142)).toBe("58/142");
    expect(heartRate(58, null)).toBe("58");
    expect(heartRate(null, 142)).toBe("—/142");
    expect(heartRate(null, null)).toBe("—");
  });

  it("signs skin temperature deltas", () => {
    expect(skinTemp(0.3)).toBe("+0.3°");
    expect(skinTemp(-0.4)).toBe("-0.4°");
    expect(skinTemp(0)).toBe("0°");
    expect(skinTemp(null)).toBe("—");
  });
});

describe("views", () => {
  it("renders stress bands as percentages", () => {
    const view = stressView([
      { date: "2025-01-24", avg: 29, min: 10, max: 68, relaxed: 58, normal: 26, medium: 12, high: 4, readings: [] },
    ]);

    expect(view.headers).toEqual(["Date", "Avg", "Min", "Max", "Relaxed", "Normal", "Medium", "High"]);
    expect(view.rows).toEqual([["2025-01-24", "29", "10", "68", "58%", "26%", "12%", "4%"]]);
    expect(view.align).toEqual(["left", "right", "right", "right", "right", "right", "right", "right"]);
  });

  it("shows missing summary fields as empty cells", () => {
    const view = summaryView([
      {
        date: "2025-01-24",
        steps: 8500,
        distanceMeters: 6200,
        sleepMinutes: 430,
        restingHeartRate: 58,
        maxHeartRate: 142,
        avgStress: 29,
        avgSpo2: null,
        totalPai: 86.5,
      },
    ]);

    expect(view.rows).toEqual([["2025-01-24", "8,500", "7h 10m", "58/142", "29", "—", "86.5"]]);
  });

  it("renders workouts", () => {
    const workout: WorkoutRecord = {
      trackId: "1",
      source: "run.watch",
      type: 1,
      activity: "outdoor_running",
      start: "2025-01-24T07:50:00.000Z",
      end: "2025-01-24T08:20:00.000Z",
      durationSeconds: 1800,
      calories: 320,
      distanceMeters: 5012.5,
      avgHeartRate: 148,
      maxHeartRate: 171,
      minHeartRate: null,
      trainingEffect: 3.2,
      anaerobicTrainingEffect: null,
      vo2Max: null,
      exerciseLoad: null,
      avgCadence: null,
      avgStrideLength: null,
      altitudeAscend: null,
      altitudeDescend: null,
      avgPace: null,
      totalSteps: 0,
      heartRateZones: [],
      strengthScores: [],
      strengthGroups: [],
      totalGroups: 0,
      avgFrequency: null,
      avgRtpc: null,
      bestRtpc: null,
      worstRtpc: null,
      ropeSkippingRestSeconds: null,
      forefootRatio: null,
      pauseSeconds: null,
      heartRateSeries: [],
    };

    expect(workoutsView([workout]).rows).toEqual([
      ["2025-01-24 07:50", "outdoor_running", "30m", "320", "148", "171", "3.2"],
    ]);
  });

  it("totals daily rows", () => {
    const totals = dailyTotals([day("2025-01-24", 8500, 6200, 430), day("2025-01-25", 4000, 3100, 300)]);

    expect(totals).toEqual({ steps: "12,500", distance: "9.3 km", avgSleep: "6h 5m" });
  });
});
