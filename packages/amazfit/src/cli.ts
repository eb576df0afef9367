#!/usr/bin/env tsx
import { writeFileSync } from "node:fs";
import { Command } from "commander";
import { error as showError } from "@wristlog/shared";
import * as out from "@wristlog/shared/output";
import { withClient, type HuamiClient } from "./providers/huami.ts";
import {
  TOOL,
  credentialSources,
  loadEnv,
  resolveCredentials,
  saveCredentials,
} from "./credentials.ts";
import { dayKey, lastDays, parseDay } from "./dates.ts";
import {
  clock,
  dailyTotals,
  dailyView,
  duration,
  paiView,
  readinessView,
  spo2View,
  stressView,
  summaryView,
  workoutsView,
  type View,
} from "./format.ts";
import type { DailySummary, DateRange } from "./types.ts";

interface RangeOptions {
  days: string;
  startDate?: string;
  endDate?: string;
  token?: string;
  userId?: string;
  timeZone?: string;
  json?: boolean;
  file?: string;
}

interface DailyOptions extends RangeOptions {
  detailed?: boolean;
  raw?: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────

function resolveRange(opts: RangeOptions): DateRange {
  const end = opts.endDate ? parseDay(opts.endDate) : new Date();
  const start = opts.startDate ? parseDay(opts.startDate) : lastDays(Number(opts.days), end).start;
  return { start, end };
}

function timeZone(opts: RangeOptions): string | undefined {
  return opts.timeZone ?? process.env.AMAZFIT_TIME_ZONE;
}

async function fetchRange<T>(
  opts: RangeOptions,
  label: string,
  fetch: (client: HuamiClient, range: DateRange) => Promise<T>,
): Promise<T> {
  const credentials = resolveCredentials(opts);
  const range = resolveRange(opts);
  if (!opts.json && !opts.file) {
    out.info(`Fetching ${label} from ${dayKey(range.start)} to ${dayKey(range.end)}`);
    out.blank();
  }
  return withClient({ ...credentials, timeZone: timeZone(opts) }, (client) => fetch(client, range));
}

/** JSON to a file or stdout when asked for; otherwise run `render`. */
function emit(opts: RangeOptions, data: unknown, render: () => void): void {
  if (opts.file) {
    writeFileSync(opts.file, JSON.stringify(data, null, 2) + "\n");
    out.success(`Data saved to ${opts.file}`);
  } else if (opts.json) {
    out.json(data);
  } else {
    render();
  }
}

function show(title: string, records: unknown[], view: View, notes: string[] = []): void {
  out.heading(title);
  if (records.length === 0) {
    out.info("No data found for the specified date range.");
    return;
  }
  out.table(view.headers, view.rows, view.align);
  if (notes.length > 0) out.blank();
  for (const note of notes) out.info(note);
}

function showDetailed(days: DailySummary[]): void {
  if (days.length === 0) {
    out.info("No data found for the specified date range.");
    return;
  }
  for (const day of days) {
    out.heading(`═══ ${day.date} ═══`);
    out.subheading(`Steps: ${day.steps.toLocaleString("en-US")}`);
    out.info(`  Distance: ${day.distanceMeters.toLocaleString("en-US")} m, calories: ${day.calories}`);

    const { sleep } = day;
    const score = sleep.score !== null ? ` (score: ${sleep.score})` : "";
    out.subheading(`Sleep: ${duration(sleep.totalMinutes)}${score}`);
    if (sleep.start && sleep.end) out.info(`  ${clock(sleep.start)} - ${clock(sleep.end)}`);
    out.info(`  Deep ${duration(sleep.deepMinutes)}, light ${duration(sleep.lightMinutes)}` +
      (sleep.remMinutes !== null ? `, REM ${duration(sleep.remMinutes)}` : ""));
    const latency = sleep.latencyMinutes !== null ? `, ${sleep.latencyMinutes}m to fall asleep` : "";
    out.info(`  Woke ${sleep.wakeCount}x (${sleep.wakeMinutes}m awake)${latency}`);
    for (const phase of sleep.phases) {
      out.info(`    ${clock(phase.start)}-${clock(phase.end)}: ${phase.type} (${phase.minutes}m)`);
    }

    if (day.restingHeartRate !== null) out.info(`  Resting HR: ${day.restingHeartRate} bpm`);
    if (day.maxHeartRate !== null) out.info(`  Max HR: ${day.maxHeartRate} bpm`);

    const moving = day.activities.filter((a) => !a.modeName.endsWith("_sleep"));
    if (moving.length > 0) out.subheading("Activities:");
    for (const act of moving) {
      out.info(`  ${clock(act.start)}-${clock(act.end)}: ${act.modeName} (${act.steps} steps)`);
    }
    out.blank();
  }
}

// ── Program ──────────────────────────────────────────────────────

loadEnv();

const program = new Command();
program
  .name(TOOL)
  .description("Amazfit/Zepp health data CLI")
  .version("0.1.0");

// Day grouping follows the process zone, so set it before any date math.
program.hook("preAction", (_program, actionCommand) => {
  const zone = actionCommand.opts<{ timeZone?: string }>().timeZone ?? process.env.AMAZFIT_TIME_ZONE;
  if (zone) process.env.TZ = zone;
});

function dataCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .option("-d, --days <n>", "number of days back from today", "7")
    .option("--start-date <date>", "start date (YYYY-MM-DD), overrides --days")
    .option("--end-date <date>", "end date (YYYY-MM-DD), defaults to today")
    .option("-t, --token <token>", "app token (overrides AMAZFIT_TOKEN)")
    .option("-u, --user-id <id>", "user ID (overrides AMAZFIT_USER_ID)")
    .option("--time-zone <zone>", "IANA time zone for day grouping")
    .option("--json", "print JSON instead of a table")
    .option("-f, --file <path>", "write JSON to a file");
}

// ── Auth commands ────────────────────────────────────────────────

program
  .command("auth-setup <token> <userId>")
  .description("Save the app token and user ID to the local config")
  .action((token: string, userId: string) => {
    const path = saveCredentials({ token, userId });
    out.success(`Credentials saved to ${path}`);
  });

program
  .command("auth-status")
  .description("Show where the token and user ID are read from")
  .option("-t, --token <token>", "app token")
  .option("-u, --user-id <id>", "user ID")
  .action((opts: { token?: string; userId?: string }) => {
    const sources = credentialSources(opts);
    out.table(
      ["Value", "Source"],
      [
        ["token", sources.token ?? "missing"],
        ["user ID", sources.userId ?? "missing"],
      ],
    );
    if (!sources.token || !sources.userId) {
      out.blank();
      out.info(`Run: ${TOOL} token-help`);
    }
  });

program
  .command("token-help")
  .description("How to extract your app token and user ID")
  .action(() => {
    out.heading("Getting an Amazfit/Zepp app token");
    out.blank();
    out.subheading("Browser developer tools");
    out.info("  1. Open https://user.huami.com/privacy2/index.html and log in");
    out.info("  2. Open the Network tab of the developer tools");
    out.info("  3. Click \"Export Data\" or reload the page");
    out.info("  4. Pick any request to api-mifit.huami.com");
    out.info("  5. The \"apptoken\" request header is your token, the \"userid\" parameter your user ID");
    out.blank();
    out.subheading("Network proxy");
    out.info("  Route the Zepp app through mitmproxy or HTTP Toolkit, sync, and read the");
    out.info("  \"apptoken\" header from any request.");
    out.blank();
    out.subheading("Using it");
    out.info("  AMAZFIT_TOKEN / AMAZFIT_USER_ID in the environment or .env,");
    out.info(`  --token / --user-id flags, or ${TOOL} auth-setup <token> <userId>`);
    out.blank();
    out.info("Tokens expire after roughly 90 days; extract a new one when requests fail with 401.");
  });

// ── Data commands ────────────────────────────────────────────────

dataCommand("daily", "Daily steps, distance, sleep and heart rate")
  .option("--detailed", "per-day breakdown with sleep phases and activities")
  .option("--raw", "raw band data with decoded summaries (JSON)")
  .action(async (opts: DailyOptions) => {
    if (opts.raw) {
      const asJson = { ...opts, json: true };
      const raw = await fetchRange(asJson, "band data", (c, r) => c.getBandData(r.start, r.end));
      emit(asJson, raw, () => out.json(raw));
      return;
    }

    const days = await fetchRange(opts, "daily data", (c, r) => c.getDaily(r.start, r.end));
    emit(opts, days, () => {
      if (opts.detailed) {
        showDetailed(days);
        return;
      }
      show("Health Summary", days, dailyView(days));
      if (days.length === 0) return;
      const totals = dailyTotals(days);
      out.blank();
      out.subheading(`Total steps: ${totals.steps}`);
      out.subheading(`Total distance: ${totals.distance}`);
      out.subheading(`Average sleep: ${totals.avgSleep}`);
    });
  });

dataCommand("summary", "Steps, sleep and HR joined with stress, SpO2 and PAI")
  .action(async (opts: RangeOptions) => {
    const rows = await fetchRange(opts, "aggregated summary", (c, r) => c.getSummary(r.start, r.end));
    emit(opts, rows, () => show("Health Summary (Aggregated)", rows, summaryView(rows)));
  });

dataCommand("stress", "Daily stress levels and band distribution")
  .action(async (opts: RangeOptions) => {
    const samples = await fetchRange(opts, "stress data", (c, r) => c.getStress(r.start, r.end));
    emit(opts, samples, () => show("Stress Data", samples, stressView(samples)));
  });

dataCommand("spo2", "Blood oxygen: ODI, readings and apnea events")
  .action(async (opts: RangeOptions) => {
    const samples = await fetchRange(opts, "SpO2 data", (c, r) => c.getSpo2(r.start, r.end));
    emit(opts, samples, () =>
      show("Blood Oxygen (SpO2) Data", samples, spo2View(samples), [
        "ODI = Oxygen Desaturation Index (events per hour during sleep)",
        "OSA = sleep apnea events (from device detection)",
      ]),
    );
  });

dataCommand("pai", "PAI (Personal Activity Intelligence)")
  .action(async (opts: RangeOptions) => {
    const samples = await fetchRange(opts, "PAI data", (c, r) => c.getPai(r.start, r.end));
    emit(opts, samples, () =>
      show("PAI (Personal Activity Intelligence)", samples, paiView(samples), [
        "PAI = Personal Activity Intelligence (aim for 100+ weekly)",
      ]),
    );
  });

dataCommand("readiness", "Readiness, HRV, resting HR and skin temperature")
  .action(async (opts: RangeOptions) => {
    const samples = await fetchRange(opts, "readiness data", (c, r) => c.getReadiness(r.start, r.end));
    emit(opts, samples, () =>
      show("Readiness & Recovery Data", samples, readinessView(samples), [
        "Ready = readiness score, HRV = heart rate variability score",
        "Skin Temp = deviation from personal baseline",
      ]),
    );
  });

dataCommand("workouts", "Workout history with per-workout detail")
  .action(async (opts: RangeOptions) => {
    const workouts = await fetchRange(opts, "workouts", (c, r) => c.getWorkouts(r.start, r.end));
    emit(opts, workouts, () => {
      show("Workout History", workouts, workoutsView(workouts));
      if (workouts.length > 0) {
        out.blank();
        out.info(`Total workouts: ${workouts.length}`);
      }
    });
  });

// ── Run ──────────────────────────────────────────────────────────

try {
  await program.parseAsync(process.argv);
} catch (e: unknown) {
  showError((e as Error).message);
  process.exit(1);
}
