import { DEFAULT_MIN_OBSERVATIONS_PER_YEAR } from '../../config';
import { ValidationError } from '../../errors';
import { formatCount, formatRatio } from '../../format';
import { addDays, compareDates, daysBetween, formatIsoDate } from '../calendar';
import type { CalendarDate } from '../calendar';
import { shiftAnchor } from '../solarTerms';
import type { SolarTermId } from '../solarTerms';
import { mean } from '../stats';
import type { DailyObservation } from '../types';

/** A date relative to a solar-term anchor or to a fixed calendar day, shifted by `offset` days. */
export type DateRef =
  | { term: SolarTermId; offset?: number }
  | { month: number; day: number; offset?: number };

/** Inclusive at both ends. */
export interface DateSpan {
  from: DateRef;
  to: DateRef;
}

export interface WindowSample {
  start: string;
  end: string;
  expected_days: number;
  observations: DailyObservation[];
}

export interface RuleCondition {
  at: DateRef;
  test: (day: DailyObservation) => boolean;
}

interface RuleBase {
  id: string;
  anchorTerms: readonly SolarTermId[];
  methodology: string;
  /** Years where the condition day is missing or fails the test are not cases. */
  condition?: RuleCondition;
  /** Fewest observations a window needs to be evaluated. Defaults to 1. */
  minDays?: number;
  /** Fewest evaluable years needed before an accuracy is reported. */
  minCases?: number;
  measureLabel?: string;
}

export interface DayRule extends RuleBase {
  kind: 'day';
  at: DateRef;
  predicate: (day: DailyObservation) => boolean | null;
  measure?: (day: DailyObservation) => number | null;
}

export interface SpanRule extends RuleBase {
  kind: 'span';
  span: DateSpan;
  predicate: (sample: WindowSample) => boolean | null;
  measure?: (sample: WindowSample) => number | null;
}

export interface ComparisonRule extends RuleBase {
  kind: 'comparison';
  baseline: DateSpan;
  subject: DateSpan;
  predicate: (baseline: WindowSample, subject: WindowSample) => boolean | null;
  measure?: (baseline: WindowSample, subject: WindowSample) => number | null;
}

export type ProverbRule = DayRule | SpanRule | ComparisonRule;

export type ConfidenceLevel = 'high' | 'medium' | 'low' | 'unverifiable';

export type Interpretation =
  | 'strongly supported'
  | 'supported'
  | 'somewhat supported'
  | 'weakly supported'
  | 'not supported'
  | 'insufficient data'
  | 'requires additional data';

export interface ProverbVerificationResult {
  ok: true;
  proverb_id: string;
  proverb_text: string;
  station_id: string;
  total_cases: number;
  positive_cases: number;
  accuracy_rate: number;
  interpretation: Interpretation;
  sample_years: number[];
  confidence_level: ConfidenceLevel;
  methodology: string;
  mean_measure: number | null;
  measure_label: string | null;
  data_quality: string;
  summary: string;
}

export interface VerifyRuleOptions {
  minObservationsPerYear?: number;
  proverbText?: string;
}

export const SAMPLE_YEARS_SHOWN = 10;

export function interpretAccuracy(
  rate: number
): Exclude<Interpretation, 'insufficient data' | 'requires additional data'> {
  if (rate >= 0.8) return 'strongly supported';
  if (rate >= 0.65) return 'supported';
  if (rate >= 0.5) return 'somewhat supported';
  if (rate >= 0.35) return 'weakly supported';
  return 'not supported';
}

export function confidenceLevel(totalCases: number, rate: number): Exclude<ConfidenceLevel, 'unverifiable'> {
  if (totalCases >= 30 && rate !== 0 && rate !== 1) return 'high';
  if (totalCases >= 15) return 'medium';
  return 'low';
}

function termsIn(rule: ProverbRule): SolarTermId[] {
  const refs: DateRef[] = [];
  if (rule.condition) refs.push(rule.condition.at);
  switch (rule.kind) {
    case 'day':
      refs.push(rule.at);
      break;
    case 'span':
      refs.push(rule.span.from, rule.span.to);
      break;
    case 'comparison':
      refs.push(rule.baseline.from, rule.baseline.to, rule.subject.from, rule.subject.to);
      break;
  }
  const terms: SolarTermId[] = [];
  for (const ref of refs) {
    if ('term' in ref) terms.push(ref.term);
  }
  return terms;
}

function assertAnchorsDeclared(rule: ProverbRule): void {
  for (const term of termsIn(rule)) {
    if (!rule.anchorTerms.includes(term)) {
      throw new ValidationError(`Rule "${rule.id}" references ${term} without declaring it as an anchor`);
    }
  }
}

/**
 * Calendar years whose observation count reaches `minObservations`, ascending.
 */
export function dataSufficientYears(
  observations: Iterable<DailyObservation>,
  minObservations: number
): number[] {
  const counts = new Map<number, number>();
  for (const o of observations) {
    const year = Number(o.observed_date.slice(0, 4));
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }
  return [...counts.entries()]
    .filter(([, count]) => count >= minObservations)
    .map(([year]) => year)
    .sort((a, b) => a - b);
}

class YearContext {
  constructor(
    readonly year: number,
    private readonly anchorTerms: readonly SolarTermId[],
    private readonly byDate: ReadonlyMap<string, DailyObservation>
  ) {}

  resolve(ref: DateRef): CalendarDate {
    if ('term' in ref) {
      if (!this.anchorTerms.includes(ref.term)) {
        throw new ValidationError(`Anchor ${ref.term} was not declared`);
      }
      return shiftAnchor(this.year, ref.term, ref.offset ?? 0);
    }
    return addDays({ year: this.year, month: ref.month, day: ref.day }, ref.offset ?? 0);
  }

  day(ref: DateRef): DailyObservation | undefined {
    return this.byDate.get(formatIsoDate(this.resolve(ref)));
  }

  sample(span: DateSpan): WindowSample {
    const from = this.resolve(span.from);
    const to = this.resolve(span.to);
    if (compareDates(to, from) < 0) {
      throw new ValidationError(`Window ends before it starts: ${formatIsoDate(from)} > ${formatIsoDate(to)}`);
    }
    const expected = daysBetween(from, to) + 1;
    const observations: DailyObservation[] = [];
    for (let i = 0; i < expected; i++) {
      const hit = this.byDate.get(formatIsoDate(addDays(from, i)));
      if (hit) observations.push(hit);
    }
    return { start: formatIsoDate(from), end: formatIsoDate(to), expected_days: expected, observations };
  }
}

interface YearOutcome {
  positive: boolean;
  measure: number | null;
}

function evaluateYear(rule: ProverbRule, ctx: YearContext): YearOutcome | null {
  if (rule.condition) {
    const day = ctx.day(rule.condition.at);
    if (!day || !rule.condition.test(day)) return null;
  }

  const minDays = rule.minDays ?? 1;
  let positive: boolean | null = null;
  let measure: number | null = null;

  switch (rule.kind) {
    case 'day': {
      const day = ctx.day(rule.at);
      if (!day) return null;
      positive = rule.predicate(day);
      if (rule.measure) measure = rule.measure(day);
      break;
    }
    case 'span': {
      const sample = ctx.sample(rule.span);
      if (sample.observations.length < minDays) return null;
      positive = rule.predicate(sample);
      if (rule.measure) measure = rule.measure(sample);
      break;
    }
    case 'comparison': {
      const baseline = ctx.sample(rule.baseline);
      const subject = ctx.sample(rule.subject);
      if (baseline.observations.length < minDays || subject.observations.length < minDays) return null;
      positive = rule.predicate(baseline, subject);
      if (rule.measure) measure = rule.measure(baseline, subject);
      break;
    }
  }

  if (positive === null) return null;
  return { positive, measure: measure !== null && Number.isFinite(measure) ? measure : null };
}

/**
 * Runs one rule over every data-sufficient year of a station's history.
 * Only window extraction and the predicate vary between rules.
 */
export function verifyRule(
  rule: ProverbRule,
  stationId: string,
  observations: readonly DailyObservation[],
  options: VerifyRuleOptions = {}
): ProverbVerificationResult {
  assertAnchorsDeclared(rule);
  const minObservations = options.minObservationsPerYear ?? DEFAULT_MIN_OBSERVATIONS_PER_YEAR;

  const byDate = new Map<string, DailyObservation>();
  for (const o of observations) {
    if (o.station_id === stationId) byDate.set(o.observed_date, o);
  }
  const years = dataSufficientYears(byDate.values(), minObservations);

  let totalCases = 0;
  let positiveCases = 0;
  const evaluatedYears: number[] = [];
  const measures: number[] = [];

  for (const year of years) {
    const outcome = evaluateYear(rule, new YearContext(year, rule.anchorTerms, byDate));
    if (!outcome) continue;
    totalCases++;
    if (outcome.positive) positiveCases++;
    evaluatedYears.push(year);
    if (outcome.measure !== null) measures.push(outcome.measure);
  }

  const dataQuality = `${formatCount(years.length, 'year')} with data, ${formatCount(totalCases, 'evaluable year')}`;
  const minCases = rule.minCases ?? 1;

  if (totalCases < minCases) {
    return {
      ok: true,
      proverb_id: rule.id,
      proverb_text: options.proverbText ?? rule.id,
      station_id: stationId,
      total_cases: 0,
      positive_cases: 0,
      accuracy_rate: 0,
      interpretation: 'insufficient data',
      sample_years: [],
      confidence_level: 'low',
      methodology: rule.methodology,
      mean_measure: null,
      measure_label: rule.measureLabel ?? null,
      data_quality: dataQuality,
      summary:
        totalCases > 0
          ? `Only ${formatCount(totalCases, 'evaluable year')}, ${minCases} needed`
          : 'No evaluable years',
    };
  }

  const rate = positiveCases / totalCases;

  return {
    ok: true,
    proverb_id: rule.id,
    proverb_text: options.proverbText ?? rule.id,
    station_id: stationId,
    total_cases: totalCases,
    positive_cases: positiveCases,
    accuracy_rate: Math.round(rate * 1000) / 1000,
    interpretation: interpretAccuracy(rate),
    sample_years: evaluatedYears.slice(-SAMPLE_YEARS_SHOWN),
    confidence_level: confidenceLevel(totalCases, rate),
    methodology: rule.methodology,
    mean_measure: measures.length > 0 ? Math.round(mean(measures) * 100) / 100 : null,
    measure_label: rule.measureLabel ?? null,
    data_quality: dataQuality,
    summary: `${positiveCases} of ${formatCount(totalCases, 'evaluable year')} matched (${formatRatio(rate)})`,
  };
}

export interface UnverifiableProverb {
  id: string;
  text: string;
  verification_method: string;
}

/** Result for a proverb that no rule can score from daily observations. */
export function unverifiableResult(proverb: UnverifiableProverb, stationId: string): ProverbVerificationResult {
  return {
    ok: true,
    proverb_id: proverb.id,
    proverb_text: proverb.text,
    station_id: stationId,
    total_cases: 0,
    positive_cases: 0,
    accuracy_rate: 0,
    interpretation: 'requires additional data',
    sample_years: [],
    confidence_level: 'unverifiable',
    methodology: proverb.verification_method,
    mean_measure: null,
    measure_label: null,
    data_quality: 'Required data unavailable',
    summary: 'Needs data beyond daily station observations',
  };
}
