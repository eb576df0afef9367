import { format, parseISO } from "date-fns";
import { EMPTY, type Align, type Cell } from "@wristlog/shared/output";
import type {
  DailySummary,
  PaiSample,
  ReadinessSample,
  Spo2Sample,
  StressSample,
  SummaryRow,
  WorkoutRecord,
} from "./types.ts";

export interface View {
  headers: string[];
  rows: Cell[][];
  align: Align[];
}

// ── Formatting helpers ───────────────────────────────────────────

export function duration(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = Math.floor(minutes % 60);
  return h > 0 ? `${h}h ${m}m` : `${m}m`;
}

export function thousands(n: number): string {
  return Math.round(n).toLocaleString("en-US");
}

export function clock(iso: string): string {
  return format(parseISO(iso), "HH:mm");
}

function orEmpty<T>(value: T | null, fmt: (v: T) => string = String): string {
  return value === null ? EMPTY : fmt(value);
}

export function heartRate(resting: number | null, max: number | null): string {
  if (resting !== null && max !== null) return `${resting}/${max}`;
  if (resting !== null) return String(resting);
  if (max !== null) return `${EMPTY}/${max}`;
  return EMPTY;
}

export function skinTemp(delta: number | null): string {
  if (delta === null) return EMPTY;
  if (delta === 0) return "0°";
  return `${delta > 0 ? "+" : ""}${delta.toFixed(1)}°`;
}

function signed(n: number): string {
  return `${n >= 0 ? "+" : ""}${n.toFixed(1)}`;
}

const right = (n: number): Align[] => ["left", ...Array<Align>(n).fill("right")];

// ── Views ────────────────────────────────────────────────────────

export function dailyView(days: DailySummary[]): View {
  return {
    headers: ["Date", "Steps", "Distance", "Sleep", "Deep", "Light", "REM", "HR"],
    align: right(7),
    rows: days.map((d) => [
      d.date,
      thousands(d.steps),
      `${thousands(d.distanceMeters)}m`,
      duration(d.sleep.totalMinutes),
      duration(d.sleep.deepMinutes),
      duration(d.sleep.lightMinutes),
      orEmpty(d.sleep.remMinutes, duration),
      heartRate(d.restingHeartRate, d.maxHeartRate),
    ]),
  };
}

export function dailyTotals(days: DailySummary[]): { steps: string; distance: string; avgSleep: string } {
  const steps = days.reduce((sum, d) => sum + d.steps, 0);
  const meters = days.reduce((sum, d) => sum + d.distanceMeters, 0);
  const sleep = days.length ? days.reduce((sum, d) => sum + d.sleep.totalMinutes, 0) / days.length : 0;
  return {
    steps: thousands(steps),
    distance: `${(meters / 1000).toFixed(1)} km`,
    avgSleep: duration(Math.floor(sleep)),
  };
}

export function summaryView(rows: SummaryRow[]): View {
  return {
    headers: ["Date", "Steps", "Sleep", "HR", "Stress", "SpO2", "PAI"],
    align: right(6),
    rows: rows.map((r) => [
      r.date,
      orEmpty(r.steps, thousands),
      orEmpty(r.sleepMinutes, duration),
      heartRate(r.restingHeartRate, r.maxHeartRate),
      orEmpty(r.avgStress),
      orEmpty(r.avgSpo2),
      orEmpty(r.totalPai, (p) => p.toFixed(1)),
    ]),
  };
}

export function stressView(samples: StressSample[]): View {
  return {
    headers: ["Date", "Avg", "Min", "Max", "Relaxed", "Normal", "Medium", "High"],
    align: right(7),
    rows: samples.map((s) => [
      s.date,
      String(s.avg),
      String(s.min),
      String(s.max),
      `${s.relaxed}%`,
      `${s.normal}%`,
      `${s.medium}%`,
      `${s.high}%`,
    ]),
  };
}

export function spo2View(samples: Spo2Sample[]): View {
  return {
    headers: ["Date", "ODI", "Events", "Score", "Readings", "OSA"],
    align: right(5),
    rows: samples.map((s) => [
      s.date,
      orEmpty(s.odi, (o) => o.toFixed(2)),
      String(s.odiCount),
      orEmpty(s.score),
      s.readingCount > 0 ? String(s.readingCount) : EMPTY,
      s.apneaEventCount > 0 ? String(s.apneaEventCount) : EMPTY,
    ]),
  };
}

export function paiView(samples: PaiSample[]): View {
  return {
    headers: ["Date", "Total", "Daily", "Rest HR", "Low", "Med", "High"],
    align: right(6),
    rows: samples.map((s) => [
      s.date,
      s.totalPai.toFixed(1),
      signed(s.dailyPai),
      orEmpty(s.restingHeartRate),
      `${s.lowZoneMinutes}m`,
      `${s.mediumZoneMinutes}m`,
      `${s.highZoneMinutes}m`,
    ]),
  };
}

export function readinessView(samples: ReadinessSample[]): View {
  return {
    headers: ["Date", "Ready", "HRV", "Sleep HRV", "RHR", "Skin Temp", "Mental", "Physical"],
    align: right(7),
    rows: samples.map((s) => [
      s.date,
      orEmpty(s.readinessScore),
      orEmpty(s.hrvScore),
      orEmpty(s.sleepHrv, (v) => `${v}ms`),
      orEmpty(s.sleepRhr),
      skinTemp(s.skinTempDelta),
      orEmpty(s.mentalScore),
      orEmpty(s.physicalScore),
    ]),
  };
}

export function workoutsView(workouts: WorkoutRecord[]): View {
  return {
    headers: ["Date", "Type", "Duration", "Calories", "Avg HR", "Max HR", "TE"],
    align: ["left", "left", "right", "right", "right", "right", "right"],
    rows: workouts.map((w) => [
      format(parseISO(w.start), "yyyy-MM-dd HH:mm"),
      w.activity,
      duration(Math.floor(w.durationSeconds / 60)),
      w.calories.toFixed(0),
      orEmpty(w.avgHeartRate),
      orEmpty(w.maxHeartRate),
      orEmpty(w.trainingEffect, (te) => te.toFixed(1)),
    ]),
  };
}
