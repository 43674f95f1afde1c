import { RAIN_THRESHOLD_MM, finiteValues, mean, sampleStdDev } from '../stats';
import type { DailyObservation, ObservationMetric } from '../types';
import type { ProverbRule, WindowSample } from './protocol';

export const HOT_DAY_MAX_C = 32;
export const SCORCHING_DAY_MAX_C = 35;
export const COLD_MONTH_MARGIN_C = 5;
export const PLUM_RAIN_MIN_YEARS = 10;

function isRainDay(o: DailyObservation): boolean {
  return o.precipitation !== null && o.precipitation >= RAIN_THRESHOLD_MM;
}

function rainDays(sample: WindowSample): number {
  return sample.observations.filter(isRainDay).length;
}

function metricValues(sample: WindowSample, metric: ObservationMetric): number[] {
  return finiteValues(sample.observations.map((o) => o[metric]));
}

function metricMean(sample: WindowSample, metric: ObservationMetric): number | null {
  const values = metricValues(sample, metric);
  return values.length > 0 ? mean(values) : null;
}

function metricTotal(sample: WindowSample, metric: ObservationMetric): number {
  return metricValues(sample, metric).reduce((sum, v) => sum + v, 0);
}

function shareWhere(
  sample: WindowSample,
  metric: ObservationMetric,
  test: (value: number) => boolean
): number | null {
  const values = metricValues(sample, metric);
  if (values.length === 0) return null;
  return values.filter(test).length / values.length;
}

function diurnalRanges(sample: WindowSample): number[] {
  const ranges: number[] = [];
  for (const o of sample.observations) {
    if (o.temperature_max !== null && o.temperature_min !== null) {
      ranges.push(o.temperature_max - o.temperature_min);
    }
  }
  return finiteValues(ranges);
}

function rangeSpread(sample: WindowSample): number | null {
  const ranges = diurnalRanges(sample);
  return ranges.length >= 2 ? sampleStdDev(ranges) : null;
}

function difference(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a - b;
}

function compareMeans(
  metric: ObservationMetric,
  holds: (baseline: number, subject: number) => boolean
): (baseline: WindowSample, subject: WindowSample) => boolean | null {
  return (baseline, subject) => {
    const before = metricMean(baseline, metric);
    const after = metricMean(subject, metric);
    if (before === null || after === null) return null;
    return holds(before, after);
  };
}

const lichunRain: ProverbRule = {
  id: 'lichun_rain',
  kind: 'span',
  anchorTerms: ['lichun', 'qingming'],
  condition: { at: { term: 'lichun' }, test: isRainDay },
  span: { from: { term: 'lichun', offset: 1 }, to: { term: 'qingming' } },
  // The whole stretch counts in the denominator; missing days count as dry.
  predicate: (s) => rainDays(s) / s.expected_days >= 0.4,
  measure: (s) => rainDays(s) / s.expected_days,
  measureLabel: 'rain-day ratio',
  methodology:
    'In years with rain on Start of Spring, checks whether at least 40% of the days up to Clear and Bright had rain (>= 0.1 mm).',
};

const qingmingRain: ProverbRule = {
  id: 'qingming_rain',
  kind: 'span',
  anchorTerms: ['qingming'],
  span: { from: { term: 'qingming', offset: -7 }, to: { term: 'qingming', offset: 7 } },
  minDays: 10,
  predicate: (s) => rainDays(s) / s.observations.length >= 0.5,
  measure: (s) => rainDays(s) / s.observations.length,
  measureLabel: 'rain-day ratio',
  methodology:
    'Checks whether at least half of the observed days within a week either side of Clear and Bright had rain; needs 10 observed days.',
};

const xiazhiHeat: ProverbRule = {
  id: 'xiazhi_heat',
  kind: 'comparison',
  anchorTerms: ['xiazhi'],
  baseline: { from: { term: 'xiazhi', offset: -30 }, to: { term: 'xiazhi', offset: -1 } },
  subject: { from: { term: 'xiazhi', offset: 1 }, to: { term: 'xiazhi', offset: 30 } },
  predicate: compareMeans('temperature_max', (before, after) => after > before),
  measure: (b, s) => difference(metricMean(s, 'temperature_max'), metricMean(b, 'temperature_max')),
  measureLabel: 'mean maximum after minus before (°C)',
  methodology: 'Compares the mean daily maximum over the 30 days after the Summer Solstice with the 30 days before.',
};

const dongzhiCold: ProverbRule = {
  id: 'dongzhi_cold',
  kind: 'comparison',
  anchorTerms: ['dongzhi'],
  baseline: { from: { term: 'dongzhi', offset: -30 }, to: { term: 'dongzhi', offset: -1 } },
  subject: { from: { term: 'dongzhi', offset: 1 }, to: { term: 'dongzhi', offset: 30 } },
  predicate: compareMeans('temperature_min', (before, after) => after < before),
  measure: (b, s) => difference(metricMean(b, 'temperature_min'), metricMean(s, 'temperature_min')),
  measureLabel: 'mean minimum before minus after (°C)',
  methodology: 'Compares the mean daily minimum over the 30 days after the Winter Solstice with the 30 days before.',
};

const bailuDew: ProverbRule = {
  id: 'bailu_dew',
  kind: 'comparison',
  anchorTerms: ['bailu'],
  baseline: { from: { term: 'bailu', offset: -15 }, to: { term: 'bailu', offset: -1 } },
  subject: { from: { term: 'bailu', offset: 1 }, to: { term: 'bailu', offset: 15 } },
  predicate: compareMeans('temperature_avg', (before, after) => after < before),
  measure: (b, s) => difference(metricMean(b, 'temperature_avg'), metricMean(s, 'temperature_avg')),
  measureLabel: 'mean temperature before minus after (°C)',
  methodology: 'Compares the mean daily temperature over the 15 days after White Dew with the 15 days before.',
};

const plumRain: ProverbRule = {
  id: 'plum_rain',
  kind: 'comparison',
  anchorTerms: [],
  minCases: PLUM_RAIN_MIN_YEARS,
  baseline: { from: { month: 4, day: 1 }, to: { month: 5, day: 1 } },
  subject: { from: { month: 5, day: 20 }, to: { month: 6, day: 20 } },
  predicate: (b, s) => {
    const spring = metricTotal(b, 'precipitation');
    const plum = metricTotal(s, 'precipitation');
    if (spring === 0 && plum === 0) return null;
    return plum > spring;
  },
  measure: (b, s) => metricTotal(s, 'precipitation') - metricTotal(b, 'precipitation'),
  measureLabel: 'plum-rain minus April total (mm)',
  methodology: `Compares total rainfall from 20 May to 20 June with 1 April to 1 May; needs ${PLUM_RAIN_MIN_YEARS} years with rain in either window.`,
};

const autumnTiger: ProverbRule = {
  id: 'autumn_tiger',
  kind: 'span',
  anchorTerms: ['chushu'],
  span: { from: { term: 'chushu', offset: -3 }, to: { term: 'chushu', offset: 18 } },
  predicate: (s) => {
    const share = shareWhere(s, 'temperature_max', (v) => v >= HOT_DAY_MAX_C);
    return share === null ? null : share > 0.5;
  },
  measure: (s) => shareWhere(s, 'temperature_max', (v) => v >= HOT_DAY_MAX_C),
  measureLabel: `share of days >= ${HOT_DAY_MAX_C}°C`,
  methodology: `Checks whether more than half of the days around End of Heat reached ${HOT_DAY_MAX_C}°C.`,
};

const threeFuDays: ProverbRule = {
  id: 'three_fu_days',
  kind: 'span',
  anchorTerms: ['xiaoshu', 'liqiu'],
  span: { from: { term: 'xiaoshu' }, to: { term: 'liqiu', offset: -1 } },
  predicate: (s) => {
    const share = shareWhere(s, 'temperature_max', (v) => v >= SCORCHING_DAY_MAX_C);
    return share === null ? null : share >= 0.1;
  },
  measure: (s) => metricMean(s, 'temperature_max'),
  measureLabel: 'mean maximum (°C)',
  methodology: `Checks whether at least 10% of the days from Minor Heat to Start of Autumn reached ${SCORCHING_DAY_MAX_C}°C.`,
};

// January against the months outside winter (March to November) of the same year.
const coldInNine: ProverbRule = {
  id: 'cold_in_nine',
  kind: 'comparison',
  anchorTerms: [],
  baseline: { from: { month: 3, day: 1 }, to: { month: 11, day: 30 } },
  subject: { from: { month: 1, day: 1 }, to: { month: 1, day: 31 } },
  predicate: compareMeans('temperature_min', (rest, january) => rest - january >= COLD_MONTH_MARGIN_C),
  measure: (b, s) => difference(metricMean(b, 'temperature_min'), metricMean(s, 'temperature_min')),
  measureLabel: 'March-November minus January mean minimum (°C)',
  methodology: `Checks whether the January mean minimum is at least ${COLD_MONTH_MARGIN_C}°C below the March to November mean minimum.`,
};

const springMotherFace: ProverbRule = {
  id: 'spring_mother_face',
  kind: 'comparison',
  anchorTerms: [],
  baseline: { from: { month: 6, day: 1 }, to: { month: 8, day: 31 } },
  subject: { from: { month: 3, day: 1 }, to: { month: 5, day: 31 } },
  predicate: (summer, spring) => {
    const springSpread = rangeSpread(spring);
    const summerSpread = rangeSpread(summer);
    if (springSpread === null || summerSpread === null) return null;
    return springSpread > summerSpread;
  },
  measure: (summer, spring) => difference(rangeSpread(spring), rangeSpread(summer)),
  measureLabel: 'spring minus summer std-dev of diurnal range (°C)',
  methodology:
    'Compares the standard deviation of the daily temperature range in March to May with June to August, year by year.',
};

export const BUILT_IN_RULES: readonly ProverbRule[] = [
  lichunRain,
  qingmingRain,
  xiazhiHeat,
  dongzhiCold,
  bailuDew,
  plumRain,
  autumnTiger,
  threeFuDays,
  coldInNine,
  springMotherFace,
];
