/**
 * Aggregates over call records for the dashboard. Pure functions; callers
 * load the records from the store.
 */
import type { CallRecord, DateRange } from '../types/index.js';
import { round } from '../utils/format.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CountEntry {
  label: string;
  count: number;
  percentage: number;
}

export interface ProcessingStats {
  totalFiles: number;
  successful: number;
  failed: number;
  processing: number;
  pending: number;
  successRate: number;
  avgProcessingTime: number;
  totalDuration: number;
  byIntent: Record<string, number>;
}

export interface OverviewStats {
  totalCalls: number;
  completedCalls: number;
  failedCalls: number;
  processingCalls: number;
  successRate: number;
  totalDurationHours: number;
  avgDurationMinutes: number;
  maxDurationMinutes: number;
  avgProcessingTime: number;
  totalProcessingTime: number;
  totalSizeMb: number;
  avgSizeMb: number;
  callsToday: number;
  callsYesterday: number;
  callsThisWeek: number;
  topAgent?: string;
  totalAgents?: number;
  uniquePhoneNumbers?: number;
}

export interface DurationBucket {
  range: string;
  count: number;
  percentage: number;
  minSeconds: number;
  maxSeconds: number | null;
}

const DURATION_RANGES: ReadonlyArray<[number, number | null, string]> = [
  [0, 30, 'Under 30 seconds'],
  [30, 60, '30s - 1 minute'],
  [60, 120, '1 - 2 minutes'],
  [120, 240, '2 - 4 minutes'],
  [240, 360, '4 - 6 minutes'],
  [360, null, 'Over 6 minutes'],
];

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function mean(values: number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

function percentage(count: number, total: number): number {
  return total > 0 ? round((count / total) * 100, 1) : 0;
}

/** ROOF_REPAIR -> "Roof Repair" */
export function titleCase(label: string): string {
  return label
    .toLowerCase()
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Occurrences of each non-empty value, most frequent first (ties by label).
 */
export function countBy(values: Array<string | undefined>): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

function toEntries(values: Array<string | undefined>, total: number): CountEntry[] {
  return countBy(values).map(([label, count]) => ({ label, count, percentage: percentage(count, total) }));
}

function completed(records: CallRecord[]): CallRecord[] {
  return records.filter((record) => record.status === 'completed');
}

/**
 * Keep records whose timestamp falls in [startDate, endDate]; the end date
 * is inclusive of its whole day.
 */
export function filterByDateRange(records: CallRecord[], range: DateRange = {}): CallRecord[] {
  const start = range.startDate ? Date.parse(range.startDate) : undefined;
  const end = range.endDate ? Date.parse(range.endDate) + DAY_MS : undefined;
  return records.filter((record) => {
    const time = Date.parse(record.timestamp);
    if (start !== undefined && time < start) return false;
    if (end !== undefined && time >= end) return false;
    return true;
  });
}

export function processingStats(records: CallRecord[]): ProcessingStats {
  const successful = completed(records);
  const byIntent: Record<string, number> = {};
  for (const [intent, count] of countBy(successful.map((record) => record.intent))) {
    byIntent[intent] = count;
  }

  return {
    totalFiles: records.length,
    successful: successful.length,
    failed: records.filter((record) => record.status === 'failed').length,
    processing: records.filter((record) => record.status === 'processing').length,
    pending: records.filter((record) => record.status === 'pending').length,
    successRate: percentage(successful.length, records.length),
    avgProcessingTime: round(mean(successful.map((record) => record.processingTimeSeconds)), 2),
    totalDuration: round(sum(successful.map((record) => record.durationSeconds)), 2),
    byIntent,
  };
}

export function overviewStats(records: CallRecord[], now: Date = new Date()): OverviewStats {
  const done = completed(records);
  const durations = done.map((record) => record.durationSeconds);
  const sizes = records.map((record) => record.fileSize);

  const today = now.toISOString().slice(0, 10);
  const yesterday = new Date(now.getTime() - DAY_MS).toISOString().slice(0, 10);
  const weekAgo = now.getTime() - 7 * DAY_MS;

  const stats: OverviewStats = {
    totalCalls: records.length,
    completedCalls: done.length,
    failedCalls: records.filter((record) => record.status === 'failed').length,
    processingCalls: records.filter((record) => record.status === 'processing').length,
    successRate: percentage(done.length, records.length),
    totalDurationHours: round(sum(durations) / 3600, 2),
    avgDurationMinutes: round(mean(durations) / 60, 1),
    maxDurationMinutes: round((durations.length > 0 ? Math.max(...durations) : 0) / 60, 1),
    avgProcessingTime: round(mean(done.map((record) => record.processingTimeSeconds)), 2),
    totalProcessingTime: round(sum(records.map((record) => record.processingTimeSeconds)), 2),
    totalSizeMb: round(sum(sizes) / 1024 / 1024, 2),
    avgSizeMb: round(mean(sizes) / 1024 / 1024, 2),
    callsToday: records.filter((record) => record.timestamp.slice(0, 10) === today).length,
    callsYesterday: records.filter((record) => record.timestamp.slice(0, 10) === yesterday).length,
    callsThisWeek: records.filter((record) => Date.parse(record.timestamp) >= weekAgo).length,
  };

  const agents = countBy(done.map((record) => record.agentName));
  const topAgent = agents[0];
  if (topAgent) {
    stats.topAgent = topAgent[0];
    stats.totalAgents = agents.length;
  }
  const phones = countBy(done.map((record) => record.phoneNumber));
  if (phones.length > 0) {
    stats.uniquePhoneNumbers = phones.length;
  }

  return stats;
}

export function intentDistribution(records: CallRecord[]) {
  const done = completed(records);
  const entries = toEntries(
    done.map((record) => record.intent),
    done.length
  );
  return {
    intents: entries.map((entry) => ({ intent: entry.label, ...entry, label: titleCase(entry.label) })),
    total: done.length,
    uniqueIntents: entries.length,
  };
}

export function subIntentDistribution(records: CallRecord[]) {
  const withSubIntent = completed(records).filter((record) => record.subIntent);
  const entries = toEntries(
    withSubIntent.map((record) => record.subIntent),
    withSubIntent.length
  );
  return {
    subIntents: entries.map((entry) => ({ subIntent: entry.label, ...entry, label: titleCase(entry.label) })),
    total: withSubIntent.length,
    uniqueSubIntents: entries.length,
  };
}

export interface DurationDistribution {
  durationRanges: DurationBucket[];
  total: number;
  avgDurationMinutes: number;
}

export function durationDistribution(records: CallRecord[]): DurationDistribution {
  const durations = completed(records).map((record) => record.durationSeconds);
  if (durations.length === 0) {
    return { durationRanges: [], total: 0, avgDurationMinutes: 0 };
  }

  const durationRanges: DurationBucket[] = DURATION_RANGES.map(([min, max, label]) => {
    const count = durations.filter((duration) => duration >= min && (max === null || duration < max)).length;
    return {
      range: label,
      count,
      percentage: percentage(count, durations.length),
      minSeconds: min,
      maxSeconds: max,
    };
  });

  return {
    durationRanges,
    total: durations.length,
    avgDurationMinutes: round(mean(durations) / 60, 1),
  };
}

export function dispositionDistribution(records: CallRecord[]) {
  const classified = records.filter(
    (record) => record.primaryDisposition && record.primaryDisposition !== 'UNKNOWN'
  );
  const withSecondary = classified.filter((record) => record.secondaryDisposition);

  return {
    primaryDispositions: toEntries(
      classified.map((record) => record.primaryDisposition),
      classified.length
    ),
    secondaryDispositions: toEntries(
      withSecondary.map((record) => record.secondaryDisposition),
      withSecondary.length
    ),
    totalClassified: classified.length,
    classificationRate: percentage(classified.length, records.length),
  };
}

function dayOf(record: CallRecord): string {
  return record.timestamp.slice(0, 10);
}

function hourOf(record: CallRecord): number | undefined {
  const time = Date.parse(record.timestamp);
  return Number.isNaN(time) ? undefined : new Date(time).getUTCHours();
}

function formatHour(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

/** Every UTC day from `days` days before `now` up to and including today. */
function dayWindow(days: number, now: Date): string[] {
  const first = Date.parse(new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10));
  const last = Date.parse(now.toISOString().slice(0, 10));
  const dates: string[] = [];
  for (let time = first; time <= last; time += DAY_MS) {
    dates.push(new Date(time).toISOString().slice(0, 10));
  }
  return dates;
}

/** Linear interpolation between closest ranks, `q` in [0, 1]. */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = q * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const low = sorted[lower] ?? 0;
  const high = sorted[upper] ?? low;
  return low + (high - low) * (position - lower);
}

export interface DailyTrends {
  dates: string[];
  totalCalls: number[];
  completedCalls: number[];
  failedCalls: number[];
  avgProcessingTime: number[];
  totalDurationHours: number[];
}

/**
 * Per-day counts for the last `days` days; days without calls are zero.
 */
export function dailyTrends(records: CallRecord[], days: number, now: Date = new Date()): DailyTrends {
  const dates = dayWindow(days, now);
  const byDay = new Map<string, CallRecord[]>(dates.map((date) => [date, []]));
  for (const record of records) {
    byDay.get(dayOf(record))?.push(record);
  }

  const trends: DailyTrends = {
    dates,
    totalCalls: [],
    completedCalls: [],
    failedCalls: [],
    avgProcessingTime: [],
    totalDurationHours: [],
  };
  for (const date of dates) {
    const day = byDay.get(date) ?? [];
    trends.totalCalls.push(day.length);
    trends.completedCalls.push(day.filter((record) => record.status === 'completed').length);
    trends.failedCalls.push(day.filter((record) => record.status === 'failed').length);
    trends.avgProcessingTime.push(round(mean(day.map((record) => record.processingTimeSeconds)), 2));
    trends.totalDurationHours.push(round(sum(day.map((record) => record.durationSeconds)) / 3600, 2));
  }
  return trends;
}

export function hourlyDistribution(records: CallRecord[]): { hours: string[]; calls: number[] } {
  if (records.length === 0) {
    return { hours: [], calls: [] };
  }
  const calls = Array.from({ length: 24 }, () => 0);
  for (const record of records) {
    const hour = hourOf(record);
    if (hour !== undefined) {
      calls[hour] = (calls[hour] ?? 0) + 1;
    }
  }
  return { hours: calls.map((_, hour) => formatHour(hour)), calls };
}

export interface PerformanceMetrics {
  processingTime: { mean: number; median: number; p95: number; p99: number; min: number; max: number };
  callDuration: {
    meanMinutes: number;
    medianMinutes: number;
    totalHours: number;
    shortestSeconds: number;
    longestMinutes: number;
  };
  throughput: { callsPerHour: number; processingEfficiency: number };
}

export function performanceMetrics(records: CallRecord[]): PerformanceMetrics {
  const done = completed(records);
  const processing = done.map((record) => record.processingTimeSeconds);
  const durations = done.map((record) => record.durationSeconds);
  const times = done.map((record) => Date.parse(record.timestamp)).filter((time) => !Number.isNaN(time));

  const spanHours = times.length > 1 ? (Math.max(...times) - Math.min(...times)) / (3600 * 1000) : 0;
  const totalProcessing = sum(processing);

  return {
    processingTime: {
      mean: round(mean(processing), 2),
      median: round(quantile(processing, 0.5), 2),
      p95: round(quantile(processing, 0.95), 2),
      p99: round(quantile(processing, 0.99), 2),
      min: round(processing.length > 0 ? Math.min(...processing) : 0, 2),
      max: round(processing.length > 0 ? Math.max(...processing) : 0, 2),
    },
    callDuration: {
      meanMinutes: round(mean(durations) / 60, 2),
      medianMinutes: round(quantile(durations, 0.5) / 60, 2),
      totalHours: round(sum(durations) / 3600, 2),
      shortestSeconds: round(durations.length > 0 ? Math.min(...durations) : 0, 2),
      longestMinutes: round((durations.length > 0 ? Math.max(...durations) : 0) / 60, 2),
    },
    throughput: {
      callsPerHour: spanHours > 0 ? round(done.length / spanHours, 2) : 0,
      processingEfficiency: totalProcessing > 0 ? round(sum(durations) / totalProcessing, 2) : 0,
    },
  };
}

export interface Insight {
  type: 'peak_time' | 'top_intent' | 'efficiency' | 'reliability';
  title: string;
  description: string;
  value: string;
  icon: string;
}

export function topInsights(records: CallRecord[]): Insight[] {
  if (records.length === 0) {
    return [];
  }
  const insights: Insight[] = [];
  const done = completed(records);

  const hourly = hourlyDistribution(records).calls;
  const peakCount = Math.max(...hourly);
  if (peakCount > 0) {
    const peak = formatHour(hourly.indexOf(peakCount));
    insights.push({
      type: 'peak_time',
      title: 'Peak Call Hour',
      description: `Most calls (${peakCount}) occur at ${peak}`,
      value: peak,
      icon: 'clock',
    });
  }

  const topIntent = countBy(done.map((record) => record.intent))[0];
  if (topIntent) {
    const [intent, count] = topIntent;
    insights.push({
      type: 'top_intent',
      title: 'Most Common Intent',
      description: `${titleCase(intent)} (${percentage(count, done.length)}% of calls)`,
      value: `${count} calls`,
      icon: 'bullseye',
    });
  }

  if (done.length > 0) {
    const avgProcessing = mean(done.map((record) => record.processingTimeSeconds));
    if (avgProcessing < 30) {
      insights.push({
        type: 'efficiency',
        title: 'High Processing Efficiency',
        description: `Average processing time: ${avgProcessing.toFixed(1)}s`,
        value: 'Excellent',
        icon: 'lightning',
      });
    }
  }

  const successRate = (done.length / records.length) * 100;
  if (successRate > 95) {
    insights.push({
      type: 'reliability',
      title: 'High Success Rate',
      description: `${successRate.toFixed(1)}% of calls processed successfully`,
      value: `${successRate.toFixed(1)}%`,
      icon: 'check-circle',
    });
  }

  return insights;
}

export interface IntentTrends {
  dates: string[];
  intentData: Record<string, { label: string; data: number[]; total: number }>;
}

/**
 * Completed calls per intent per day over the last `days` days.
 */
export function intentTrends(records: CallRecord[], days: number, now: Date = new Date()): IntentTrends {
  const dates = dayWindow(days, now);
  const index = new Map(dates.map((date, position) => [date, position]));
  const intentData: IntentTrends['intentData'] = {};

  for (const record of completed(records)) {
    const position = index.get(dayOf(record));
    if (position === undefined || !record.intent) {
      continue;
    }
    let series = intentData[record.intent];
    if (!series) {
      series = { label: titleCase(record.intent), data: dates.map(() => 0), total: 0 };
      intentData[record.intent] = series;
    }
    series.data[position] = (series.data[position] ?? 0) + 1;
    series.total += 1;
  }

  return { dates, intentData };
}

function withIntentAndSubIntent(records: CallRecord[]): Array<CallRecord & { intent: string; subIntent: string }> {
  return completed(records).flatMap((record) =>
    record.intent && record.subIntent ? [{ ...record, intent: record.intent, subIntent: record.subIntent }] : []
  );
}

export interface IntentMatrix {
  matrix: Record<string, Record<string, number>>;
  intents: string[];
  subIntents: string[];
  totalCombinations: number;
}

/** Intent x sub-intent counts over completed calls; zero cells are left out. */
export function intentSubIntentMatrix(records: CallRecord[]): IntentMatrix {
  const matrix: IntentMatrix['matrix'] = {};
  const subIntents = new Set<string>();
  let totalCombinations = 0;

  for (const record of withIntentAndSubIntent(records)) {
    let row = matrix[record.intent];
    if (!row) {
      row = {};
      matrix[record.intent] = row;
    }
    if (row[record.subIntent] === undefined) {
      totalCombinations += 1;
    }
    row[record.subIntent] = (row[record.subIntent] ?? 0) + 1;
    subIntents.add(record.subIntent);
  }

  const byName = (a: string, b: string) => a.localeCompare(b);
  return {
    matrix,
    intents: Object.keys(matrix).sort(byName).map(titleCase),
    subIntents: [...subIntents].sort(byName).map(titleCase),
    totalCombinations,
  };
}

export interface IntentBreakdown {
  breakdown: Record<
    string,
    {
      label: string;
      totalCount: number;
      subIntents: Array<{ subIntent: string; label: string; count: number; percentage: number }>;
    }
  >;
  total: number;
}

/** Sub-intent split within each of the five most common intents. */
export function intentSubIntentBreakdown(records: CallRecord[]): IntentBreakdown {
  const valid = withIntentAndSubIntent(records);
  const breakdown: IntentBreakdown['breakdown'] = {};

  for (const [intent, totalCount] of countBy(valid.map((record) => record.intent)).slice(0, 5)) {
    const subIntents = countBy(valid.filter((record) => record.intent === intent).map((record) => record.subIntent));
    breakdown[intent] = {
      label: titleCase(intent),
      totalCount,
      subIntents: subIntents.map(([subIntent, count]) => ({
        subIntent,
        label: titleCase(subIntent),
        count,
        percentage: percentage(count, totalCount),
      })),
    };
  }

  return { breakdown, total: valid.length };
}

export interface SpeakerDistribution {
  speakerCounts: Array<{ speakerCount: number; label: string; description: string; calls: number; percentage: number }>;
  total: number;
  dropOffRate: number;
}

function speakerLabel(count: number): { label: string; description: string } {
  if (count === 1) {
    return { label: '1 Speaker (Agent Only)', description: 'Calls where only the agent spoke - likely drop-offs' };
  }
  if (count === 2) {
    return { label: '2 Speakers (Normal)', description: 'Standard agent-customer conversations' };
  }
  return { label: `${count} Speakers`, description: 'Multi-party conversations' };
}

export function speakerDistribution(records: CallRecord[]): SpeakerDistribution {
  const done = completed(records);
  const counts = new Map<number, number>();
  for (const record of done) {
    counts.set(record.speakerCount, (counts.get(record.speakerCount) ?? 0) + 1);
  }

  return {
    speakerCounts: [...counts.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([speakerCount, calls]) => ({
        speakerCount,
        ...speakerLabel(speakerCount),
        calls,
        percentage: percentage(calls, done.length),
      })),
    total: done.length,
    dropOffRate: percentage(counts.get(1) ?? 0, done.length),
  };
}

export interface DropOffAnalysis {
  dropOffs: number;
  totalCalls: number;
  dropOffRate: number;
  analysis: Array<{ type: string; count: number; percentage: number; description: string }>;
}

/**
 * Likely drop-offs among completed calls: agent-only or under 30 seconds.
 * Hang-ups come from the dialler status in the filename, over all calls.
 */
export function dropOffAnalysis(records: CallRecord[]): DropOffAnalysis {
  const done = completed(records);
  if (done.length === 0) {
    return { dropOffs: 0, totalCalls: 0, dropOffRate: 0, analysis: [] };
  }

  const singleSpeaker = done.filter((record) => record.speakerCount === 1);
  const veryShort = done.filter((record) => record.durationSeconds < 30);
  const short = done.filter((record) => record.durationSeconds >= 30 && record.durationSeconds < 60);
  const hangUps = records.filter((record) => record.callStatus?.includes('HangUp'));
  const dropOffs = done.filter((record) => record.speakerCount === 1 || record.durationSeconds < 30).length;

  return {
    dropOffs,
    totalCalls: done.length,
    dropOffRate: percentage(dropOffs, done.length),
    analysis: [
      {
        type: 'Single Speaker',
        count: singleSpeaker.length,
        percentage: percentage(singleSpeaker.length, done.length),
        description: 'Calls with only agent speaking (likely immediate hang-ups)',
      },
      {
        type: 'Very Short Calls',
        count: veryShort.length,
        percentage: percentage(veryShort.length, done.length),
        description: 'Calls under 30 seconds (quick hang-ups)',
      },
      {
        type: 'Short Calls',
        count: short.length,
        percentage: percentage(short.length, done.length),
        description: 'Calls 30-60 seconds (early disconnects)',
      },
      {
        type: 'Hang Ups',
        count: hangUps.length,
        percentage: percentage(hangUps.length, records.length),
        description: 'Calls marked as hang-ups in filename',
      },
    ],
  };
}

export interface AgentPerformance {
  agent: string;
  totalCalls: number;
  avgDurationMinutes: number;
  totalDurationHours: number;
  successRate: number;
  mostCommonStatus: string;
}

/**
 * Completed calls per agent, busiest first. The success rate counts the
 * agent's completed calls against all of the agent's calls.
 */
export function agentPerformance(records: CallRecord[]): { agents: AgentPerformance[]; total: number } {
  const agents = countBy(completed(records).map((record) => record.agentName)).map(([agent]): AgentPerformance => {
    const all = records.filter((record) => record.agentName === agent);
    const done = completed(all);
    const durations = done.map((record) => record.durationSeconds);
    return {
      agent,
      totalCalls: done.length,
      avgDurationMinutes: round(mean(durations) / 60, 1),
      totalDurationHours: round(sum(durations) / 3600, 2),
      successRate: percentage(done.length, all.length),
      mostCommonStatus: countBy(done.map((record) => record.callStatus))[0]?.[0] ?? 'Unknown',
    };
  });
  return { agents, total: agents.length };
}

export function callStatusDistribution(records: CallRecord[]) {
  const done = completed(records);
  const entries = toEntries(
    done.map((record) => record.callStatus),
    done.length
  );
  return {
    statuses: entries.map((entry) => ({ status: entry.label, ...entry, label: titleCase(entry.label) })),
    total: done.length,
    uniqueStatuses: entries.length,
  };
}
