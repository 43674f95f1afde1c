import { loadEngineConfig } from '../../config';
import { ValidationError, errorMessage } from '../../errors';
import type { DailyObservation } from '../types';
import { loadDefaultCatalog } from './catalog';
import type { Proverb, ProverbCatalog } from './catalog';
import { unverifiableResult, verifyRule } from './protocol';
import type { ProverbRule, ProverbVerificationResult, VerifyRuleOptions } from './protocol';
import { BUILT_IN_RULES } from './rules';

export const HIGH_ACCURACY_THRESHOLD = 0.65;

export interface ProverbVerificationFailure {
  ok: false;
  proverb_id: string;
  proverb_text: string;
  station_id: string;
  error: string;
}

export type ProverbVerificationOutcome = ProverbVerificationResult | ProverbVerificationFailure;

export interface VerificationSummary {
  total_proverbs: number;
  verifiable_proverbs: number;
  verified_proverbs: number;
  average_accuracy: number | null;
  high_accuracy_count: number;
  failed: string[];
}

export type RegistryOptions = Pick<VerifyRuleOptions, 'minObservationsPerYear'>;

export class ProverbRegistry {
  private readonly rules = new Map<string, ProverbRule>();

  constructor(
    rules: readonly ProverbRule[],
    private readonly catalog: ProverbCatalog,
    private readonly options: RegistryOptions = {}
  ) {
    for (const rule of rules) {
      if (this.rules.has(rule.id)) {
        throw new ValidationError(`Duplicate rule id "${rule.id}"`);
      }
      this.rules.set(rule.id, rule);
    }
  }

  ruleIds(): string[] {
    return [...this.rules.keys()];
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  proverb(id: string): Proverb | undefined {
    return this.catalog.getById(id);
  }

  verify(id: string, stationId: string, observations: readonly DailyObservation[]): ProverbVerificationResult {
    const rule = this.rules.get(id);
    if (!rule) {
      const proverb = this.catalog.getById(id);
      if (!proverb) throw new ValidationError(`Unknown proverb "${id}"`);
      return unverifiableResult(proverb, stationId);
    }
    return verifyRule(rule, stationId, observations, {
      minObservationsPerYear: this.options.minObservationsPerYear,
      proverbText: this.catalog.getById(id)?.text,
    });
  }

  verifyAll(stationId: string, observations: readonly DailyObservation[]): ProverbVerificationOutcome[] {
    return this.ruleIds().map((id): ProverbVerificationOutcome => {
      try {
        return this.verify(id, stationId, observations);
      } catch (error) {
        console.error(`[proverbs] Verification of ${id} failed for station ${stationId}:`, error);
        return {
          ok: false,
          proverb_id: id,
          proverb_text: this.catalog.getById(id)?.text ?? id,
          station_id: stationId,
          error: errorMessage(error),
        };
      }
    });
  }

  summarize(outcomes: readonly ProverbVerificationOutcome[]): VerificationSummary {
    const verified: ProverbVerificationResult[] = [];
    const failed: string[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) failed.push(outcome.proverb_id);
      else if (outcome.total_cases > 0) verified.push(outcome);
    }

    const average =
      verified.length > 0
        ? Math.round((verified.reduce((sum, r) => sum + r.accuracy_rate, 0) / verified.length) * 1000) / 1000
        : null;

    return {
      total_proverbs: this.catalog.getAll().length,
      verifiable_proverbs: this.catalog.getVerifiable().length,
      verified_proverbs: verified.length,
      average_accuracy: average,
      high_accuracy_count: verified.filter((r) => r.accuracy_rate >= HIGH_ACCURACY_THRESHOLD).length,
      failed,
    };
  }
}

export function createDefaultProverbRegistry(
  options: RegistryOptions = { minObservationsPerYear: loadEngineConfig().minObservationsPerYear }
): ProverbRegistry {
  return new ProverbRegistry(BUILT_IN_RULES, loadDefaultCatalog(), options);
}
