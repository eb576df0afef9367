import type {
  DailySummary,
  PaiSample,
  Spo2Sample,
  StressSample,
  SummaryRow,
} from "./types.ts";

export interface SummarySources {
  daily: DailySummary[];
  stress: StressSample[];
  spo2: Spo2Sample[];
  pai: PaiSample[];
}

function byDate<T extends { date: string }>(records: T[]): Map<string, T> {
  return new Map(records.map((r) => [r.date, r]));
}

/**
 * Join independently fetched sequences on their date. Every date seen in
 * any source gets a row; fields whose source has no record for that day
 * stay null.
 */
export function mergeSummary(sources: SummarySources): SummaryRow[] {
  const daily = byDate(sources.daily);
  const stress = byDate(sources.stress);
  const spo2 = byDate(sources.spo2);
  const pai = byDate(sources.pai);

  const dates = new Set([...daily.keys(), ...stress.keys(), ...spo2.keys(), ...pai.keys()]);

  return [...dates].sort().map((date) => {
    const day = daily.get(date);
    return {
      date,
      steps: day?.steps ?? null,
      distanceMeters: day?.distanceMeters ?? null,
      sleepMinutes: day?.sleep.totalMinutes ?? null,
      restingHeartRate: day?.restingHeartRate ?? null,
      maxHeartRate: day?.maxHeartRate ?? null,
      avgStress: stress.get(date)?.avg ?? null,
      avgSpo2: spo2.get(date)?.avgSpo2 ?? null,
      totalPai: pai.get(date)?.totalPai ?? null,
    };
  });
}
