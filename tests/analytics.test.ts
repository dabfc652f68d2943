import { describe, expect, it } from 'vitest';
import {
  agentPerformance,
  callStatusDistribution,
  countBy,
  dailyTrends,
  dispositionDistribution,
  dropOffAnalysis,
  durationDistribution,
  filterByDateRange,
  hourlyDistribution,
  intentDistribution,
  intentSubIntentBreakdown,
  intentSubIntentMatrix,
  intentTrends,
  overviewStats,
  performanceMetrics,
  processingStats,
  quantile,
  speakerDistribution,
  subIntentDistribution,
  titleCase,
  topInsights,
} from '../src/services/analytics.js';
import { exportRecords } from '../src/services/exporter.js';
import { parseRecords } from '../src/store/csvCodec.js';
import { COLUMN_NAMES } from '../src/store/schema.js';
import { makeRecord } from './helpers.js';

const MB = 1024 * 1024;
const NOW = new Date('2024-03-10T12:00:00.000Z');

const RECORDS = [
  makeRecord({
    filename: 'a.mp3',
    timestamp: '2024-03-10T09:00:00.000Z',
    durationSeconds: 20,
    processingTimeSeconds: 2,
    fileSize: MB,
    agentName: 'jane',
    phoneNumber: '5550001',
    primaryDisposition: 'APPOINTMENT_SET',
    secondaryDisposition: 'IMMEDIATE',
  }),
  makeRecord({
    filename: 'b.mp3',
    timestamp: '2024-03-09T10:00:00.000Z',
    durationSeconds: 90,
    processingTimeSeconds: 4,
    fileSize: MB,
    subIntent: 'ROOF_INSPECTION',
    agentName: 'jane',
    phoneNumber: '5550002',
    primaryDisposition: 'CALLBACK_REQUESTED',
  }),
  makeRecord({
    filename: 'c.mp3',
    timestamp: '2024-03-01T08:00:00.000Z',
    durationSeconds: 400,
    processingTimeSeconds: 6,
    fileSize: 2 * MB,
    intent: 'HVAC',
    subIntent: 'AC_REPAIR',
    agentName: 'bob',
    phoneNumber: '5550001',
    primaryDisposition: 'UNKNOWN',
  }),
  makeRecord({
    filename: 'd.mp3',
    timestamp: '2024-03-10T11:00:00.000Z',
    status: 'failed',
    durationSeconds: 0,
    processingTimeSeconds: 1,
    fileSize: MB,
    transcription: undefined,
    summary: undefined,
    intent: undefined,
    subIntent: undefined,
    errorMessage: 'Transcription failed: bad audio',
  }),
];

describe('titleCase', () => {
  it('turns labels into words', () => {
    expect(titleCase('ROOF_REPAIR')).toBe('Roof Repair');
    expect(titleCase('HVAC')).toBe('Hvac');
    expect(titleCase('__OTHER_')).toBe('Other');
  });
});

describe('countBy', () => {
  it('orders by count, then label, and ignores empty values', () => {
    expect(countBy(['b', 'a', undefined, 'b', '', 'c', 'a'])).toEqual([
      ['a', 2],
      ['b', 2],
      ['c', 1],
    ]);
  });
});

describe('filterByDateRange', () => {
  it('includes the whole end day', () => {
    const names = (range: { startDate?: string; endDate?: string }) =>
      filterByDateRange(RECORDS, range).map((record) => record.filename);

    expect(names({ startDate: '2024-03-09', endDate: '2024-03-09' })).toEqual(['b.mp3']);
    expect(names({ endDate: '2024-03-09' })).toEqual(['b.mp3', 'c.mp3']);
    expect(names({ startDate: '2024-03-10' })).toEqual(['a.mp3', 'd.mp3']);
    expect(names({})).toHaveLength(4);
  });
});

describe('processingStats', () => {
  it('summarizes the pipeline', () => {
    expect(processingStats(RECORDS)).toEqual({
      totalFiles: 4,
      successful: 3,
      failed: 1,
      processing: 0,
      pending: 0,
      successRate: 75,
      avgProcessingTime: 4,
      totalDuration: 510,
      byIntent: { ROOFING: 2, HVAC: 1 },
    });
  });

  it('reports zeros for an empty store', () => {
    expect(processingStats([])).toMatchObject({ totalFiles: 0, successRate: 0, avgProcessingTime: 0 });
  });
});

describe('overviewStats', () => {
  it('computes totals, averages and recent activity', () => {
    expect(overviewStats(RECORDS, NOW)).toEqual({
      totalCalls: 4,
      completedCalls: 3,
      failedCalls: 1,
      processingCalls: 0,
      successRate: 75,
      totalDurationHours: 0.14,
      avgDurationMinutes: 2.8,
      maxDurationMinutes: 6.7,
      avgProcessingTime: 4,
      totalProcessingTime: 13,
      totalSizeMb: 5,
      avgSizeMb: 1.25,
      callsToday: 2,
      callsYesterday: 1,
      callsThisWeek: 3,
      topAgent: 'jane',
      totalAgents: 2,
      uniquePhoneNumbers: 2,
    });
  });

  it('leaves agent fields out when no record names one', () => {
    const stats = overviewStats([makeRecord()], NOW);

    expect(stats.topAgent).toBeUndefined();
    expect(stats.totalAgents).toBeUndefined();
    expect(stats.uniquePhoneNumbers).toBeUndefined();
  });
});

describe('intentDistribution', () => {
  it('counts completed calls per intent', () => {
    expect(intentDistribution(RECORDS)).toEqual({
      intents: [
        { intent: 'ROOFING', label: 'Roofing', count: 2, percentage: 66.7 },
        { intent: 'HVAC', label: 'Hvac', count: 1, percentage: 33.3 },
      ],
      total: 3,
      uniqueIntents: 2,
    });
  });
});

describe('subIntentDistribution', () => {
  it('counts completed calls per sub-intent', () => {
    const result = subIntentDistribution(RECORDS);

    expect(result.subIntents.map((entry) => [entry.subIntent, entry.label, entry.count])).toEqual([
      ['AC_REPAIR', 'Ac Repair', 1],
      ['ROOF_INSPECTION', 'Roof Inspection', 1],
      ['ROOF_REPAIR', 'Roof Repair', 1],
    ]);
    expect(result.total).toBe(3);
    expect(result.uniqueSubIntents).toBe(3);
  });
});

describe('durationDistribution', () => {
  it('buckets completed call durations', () => {
    const result = durationDistribution(RECORDS);

    expect(result.durationRanges.map((bucket) => [bucket.range, bucket.count, bucket.percentage])).toEqual([
      ['Under 30 seconds', 1, 33.3],
      ['30s - 1 minute', 0, 0],
      ['1 - 2 minutes', 1, 33.3],
      ['2 - 4 minutes', 0, 0],
      ['4 - 6 minutes', 0, 0],
      ['Over 6 minutes', 1, 33.3],
    ]);
    expect(result.durationRanges[5]).toMatchObject({ minSeconds: 360, maxSeconds: null });
    expect(result.total).toBe(3);
    expect(result.avgDurationMinutes).toBe(2.8);
  });

  it('returns no buckets without completed calls', () => {
    expect(durationDistribution([])).toEqual({ durationRanges: [], total: 0, avgDurationMinutes: 0 });
  });
});

describe('dispositionDistribution', () => {
  it('ignores unclassified and UNKNOWN records', () => {
    expect(dispositionDistribution(RECORDS)).toEqual({
      primaryDispositions: [
        { label: 'APPOINTMENT_SET', count: 1, percentage: 50 },
        { label: 'CALLBACK_REQUESTED', count: 1, percentage: 50 },
      ],
      secondaryDispositions: [{ label: 'IMMEDIATE', count: 1, percentage: 100 }],
      totalClassified: 2,
      classificationRate: 50,
    });
  });
});

// Two days of dialler calls: e1-e4 completed, e5 failed.
const CALLS = [
  makeRecord({
    filename: 'e1.mp3',
    timestamp: '2024-03-10T09:15:00.000Z',
    durationSeconds: 1800,
    processingTimeSeconds: 10,
    agentName: 'jane',
    callStatus: 'ANSWERED',
  }),
  makeRecord({
    filename: 'e2.mp3',
    timestamp: '2024-03-10T09:45:00.000Z',
    durationSeconds: 20,
    processingTimeSeconds: 20,
    speakerCount: 1,
    agentName: 'jane',
    callStatus: 'HangUp',
  }),
  makeRecord({
    filename: 'e3.mp3',
    timestamp: '2024-03-09T14:00:00.000Z',
    durationSeconds: 36,
    processingTimeSeconds: 30,
    subIntent: 'ROOF_INSPECTION',
    agentName: 'bob',
    callStatus: 'ANSWERED',
  }),
  makeRecord({
    filename: 'e4.mp3',
    timestamp: '2024-03-09T15:00:00.000Z',
    durationSeconds: 7200,
    processingTimeSeconds: 40,
    intent: 'HVAC',
    subIntent: 'AC_REPAIR',
    speakerCount: 3,
    agentName: 'jane',
    callStatus: 'ANSWERED',
  }),
  makeRecord({
    filename: 'e5.mp3',
    timestamp: '2024-03-10T10:00:00.000Z',
    status: 'failed',
    durationSeconds: 0,
    processingTimeSeconds: 5,
    speakerCount: 0,
    transcription: undefined,
    summary: undefined,
    intent: undefined,
    subIntent: undefined,
    agentName: 'bob',
    callStatus: 'HangUp',
    errorMessage: 'Transcription failed: bad audio',
  }),
];

describe('quantile', () => {
  it('interpolates between ranks', () => {
    expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5);
    expect(quantile([5], 0.99)).toBe(5);
    expect(quantile([], 0.5)).toBe(0);
  });
});

describe('dailyTrends', () => {
  it('aggregates each day of the window', () => {
    expect(dailyTrends(CALLS, 1, NOW)).toEqual({
      dates: ['2024-03-09', '2024-03-10'],
      totalCalls: [2, 3],
      completedCalls: [2, 2],
      failedCalls: [0, 1],
      avgProcessingTime: [35, 11.67],
      totalDurationHours: [2.01, 0.51],
    });
  });

  it('fills days without calls with zeros', () => {
    const trends = dailyTrends([], 2, NOW);

    expect(trends.dates).toEqual(['2024-03-08', '2024-03-09', '2024-03-10']);
    expect(trends.totalCalls).toEqual([0, 0, 0]);
    expect(trends.avgProcessingTime).toEqual([0, 0, 0]);
  });
});

describe('hourlyDistribution', () => {
  it('counts calls per UTC hour', () => {
    const { hours, calls } = hourlyDistribution(CALLS);

    expect(hours).toHaveLength(24);
    expect(hours[9]).toBe('09:00');
    expect(calls.slice(8, 16)).toEqual([0, 2, 1, 0, 0, 0, 1, 1]);
  });

  it('is empty without records', () => {
    expect(hourlyDistribution([])).toEqual({ hours: [], calls: [] });
  });
});

describe('performanceMetrics', () => {
  it('summarizes processing time, duration and throughput', () => {
    expect(performanceMetrics(CALLS)).toEqual({
      processingTime: { mean: 25, median: 25, p95: 38.5, p99: 39.7, min: 10, max: 40 },
      callDuration: {
        meanMinutes: 37.73,
        medianMinutes: 15.3,
        totalHours: 2.52,
        shortestSeconds: 20,
        longestMinutes: 120,
      },
      throughput: { callsPerHour: 0.2, processingEfficiency: 90.56 },
    });
  });

  it('reports zeros without completed calls', () => {
    expect(performanceMetrics(CALLS.slice(4)).throughput).toEqual({ callsPerHour: 0, processingEfficiency: 0 });
  });
});

describe('topInsights', () => {
  it('names the peak hour, top intent and processing speed', () => {
    expect(topInsights(CALLS)).toEqual([
      { type: 'peak_time', title: 'Peak Call Hour', description: 'Most calls (2) occur at 09:00', value: '09:00', icon: 'clock' },
      {
        type: 'top_intent',
        title: 'Most Common Intent',
        description: 'Roofing (75% of calls)',
        value: '3 calls',
        icon: 'bullseye',
      },
      {
        type: 'efficiency',
        title: 'High Processing Efficiency',
        description: 'Average processing time: 25.0s',
        value: 'Excellent',
        icon: 'lightning',
      },
    ]);
  });

  it('adds a reliability insight above 95% success', () => {
    const insights = topInsights(CALLS.slice(0, 4));

    expect(insights.map((insight) => insight.type)).toEqual(['peak_time', 'top_intent', 'efficiency', 'reliability']);
    expect(insights[3]?.value).toBe('100.0%');
  });
});

describe('intentTrends', () => {
  it('counts completed calls per intent per day', () => {
    expect(intentTrends(CALLS, 1, NOW)).toEqual({
      dates: ['2024-03-09', '2024-03-10'],
      intentData: {
        ROOFING: { label: 'Roofing', data: [1, 2], total: 3 },
        HVAC: { label: 'Hvac', data: [1, 0], total: 1 },
      },
    });
  });
});

describe('intentSubIntentMatrix', () => {
  it('cross-tabulates intents and sub-intents', () => {
    expect(intentSubIntentMatrix(CALLS)).toEqual({
      matrix: {
        ROOFING: { ROOF_REPAIR: 2, ROOF_INSPECTION: 1 },
        HVAC: { AC_REPAIR: 1 },
      },
      intents: ['Hvac', 'Roofing'],
      subIntents: ['Ac Repair', 'Roof Inspection', 'Roof Repair'],
      totalCombinations: 3,
    });
  });
});

describe('intentSubIntentBreakdown', () => {
  it('splits each intent by sub-intent', () => {
    expect(intentSubIntentBreakdown(CALLS)).toEqual({
      breakdown: {
        ROOFING: {
          label: 'Roofing',
          totalCount: 3,
          subIntents: [
            { subIntent: 'ROOF_REPAIR', label: 'Roof Repair', count: 2, percentage: 66.7 },
            { subIntent: 'ROOF_INSPECTION', label: 'Roof Inspection', count: 1, percentage: 33.3 },
          ],
        },
        HVAC: {
          label: 'Hvac',
          totalCount: 1,
          subIntents: [{ subIntent: 'AC_REPAIR', label: 'Ac Repair', count: 1, percentage: 100 }],
        },
      },
      total: 4,
    });
  });
});

describe('speakerDistribution', () => {
  it('groups completed calls by speaker count', () => {
    const result = speakerDistribution(CALLS);

    expect(result.speakerCounts.map((entry) => [entry.speakerCount, entry.label, entry.calls, entry.percentage])).toEqual([
      [1, '1 Speaker (Agent Only)', 1, 25],
      [2, '2 Speakers (Normal)', 2, 50],
      [3, '3 Speakers', 1, 25],
    ]);
    expect(result.total).toBe(4);
    expect(result.dropOffRate).toBe(25);
  });
});

describe('dropOffAnalysis', () => {
  it('counts agent-only, short and hung-up calls', () => {
    expect(dropOffAnalysis(CALLS)).toEqual({
      dropOffs: 1,
      totalCalls: 4,
      dropOffRate: 25,
      analysis: [
        {
          type: 'Single Speaker',
          count: 1,
          percentage: 25,
          description: 'Calls with only agent speaking (likely immediate hang-ups)',
        },
        { type: 'Very Short Calls', count: 1, percentage: 25, description: 'Calls under 30 seconds (quick hang-ups)' },
        { type: 'Short Calls', count: 1, percentage: 25, description: 'Calls 30-60 seconds (early disconnects)' },
        { type: 'Hang Ups', count: 2, percentage: 40, description: 'Calls marked as hang-ups in filename' },
      ],
    });
  });

  it('is empty without completed calls', () => {
    expect(dropOffAnalysis(CALLS.slice(4))).toEqual({ dropOffs: 0, totalCalls: 0, dropOffRate: 0, analysis: [] });
  });
});

describe('agentPerformance', () => {
  it('ranks agents by completed calls', () => {
    expect(agentPerformance(CALLS)).toEqual({
      agents: [
        {
          agent: 'jane',
          totalCalls: 3,
          avgDurationMinutes: 50.1,
          totalDurationHours: 2.51,
          successRate: 100,
          mostCommonStatus: 'ANSWERED',
        },
        {
          agent: 'bob',
          totalCalls: 1,
          avgDurationMinutes: 0.6,
          totalDurationHours: 0.01,
          successRate: 50,
          mostCommonStatus: 'ANSWERED',
        },
      ],
      total: 2,
    });
  });
});

describe('callStatusDistribution', () => {
  it('counts dialler statuses of completed calls', () => {
    expect(callStatusDistribution(CALLS)).toEqual({
      statuses: [
        { status: 'ANSWERED', label: 'Answered', count: 3, percentage: 75 },
        { status: 'HangUp', label: 'Hangup', count: 1, percentage: 25 },
      ],
      total: 4,
      uniqueStatuses: 2,
    });
  });
});

describe('exportRecords', () => {
  const stampTime = new Date('2024-03-10T14:05:09.123Z');

  it('renders CSV in the store layout', () => {
    const file = exportRecords(RECORDS.slice(0, 2), 'csv', stampTime);

    expect(file.filename).toBe('transcriptions_20240310_140509.csv');
    expect(file.contentType).toBe('text/csv; charset=utf-8');
    expect(file.body.split('\n')[0]).toBe(COLUMN_NAMES.join(','));
    expect(parseRecords(file.body)).toEqual({ records: RECORDS.slice(0, 2), rejected: [] });
  });

  it('renders JSON with a count', () => {
    const file = exportRecords(RECORDS.slice(0, 1), 'json', stampTime);

    expect(file.filename).toBe('transcriptions_20240310_140509.json');
    expect(file.contentType).toBe('application/json; charset=utf-8');
    expect(JSON.parse(file.body)).toEqual({ data: RECORDS.slice(0, 1), count: 1 });
  });
});
