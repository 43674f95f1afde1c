import { ValidationError } from '../../errors';
import { findSolarTerm } from '../solarTerms';
import type { SolarTermId } from '../solarTerms';
import catalogData from './catalog.json';

export type ProverbCategory =
  | 'solar_term'
  | 'seasonal'
  | 'temperature'
  | 'rain'
  | 'typhoon'
  | 'agriculture'
  | 'general';

export type ProverbRegion = 'taiwan' | 'china' | 'hakka' | 'hokkien';

export interface Proverb {
  id: string;
  text: string;
  reading: string | null;
  meaning: string;
  category: ProverbCategory;
  region: ProverbRegion;
  related_term: SolarTermId | null;
  applicable_months: number[];
  keywords: string[];
  verifiable: boolean;
  scientific_explanation: string;
  /** How the proverb could be checked, including with data this engine lacks. Empty when unknown. */
  verification_method: string;
}

const CATEGORIES: readonly ProverbCategory[] = [
  'solar_term',
  'seasonal',
  'temperature',
  'rain',
  'typhoon',
  'agriculture',
  'general',
];
const REGIONS: readonly ProverbRegion[] = ['taiwan', 'china', 'hakka', 'hokkien'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(entry: Record<string, unknown>, key: string, where: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

function readCategory(value: string, where: string): ProverbCategory {
  const match = CATEGORIES.find((c) => c === value);
  if (!match) throw new ValidationError(`${where}: unknown category "${value}"`);
  return match;
}

function readRegion(value: string, where: string): ProverbRegion {
  const match = REGIONS.find((r) => r === value);
  if (!match) throw new ValidationError(`${where}: unknown region "${value}"`);
  return match;
}

function readMonths(value: unknown, where: string): number[] {
  if (!Array.isArray(value)) throw new ValidationError(`${where}: applicable_months must be an array`);
  return value.map((m) => {
    if (typeof m !== 'number' || !Number.isInteger(m) || m < 1 || m > 12) {
      throw new ValidationError(`${where}: invalid month ${String(m)}`);
    }
    return m;
  });
}

function readKeywords(value: unknown, where: string): string[] {
  if (!Array.isArray(value)) throw new ValidationError(`${where}: keywords must be an array`);
  return value.map((k) => {
    if (typeof k !== 'string') throw new ValidationError(`${where}: keywords must be strings`);
    return k;
  });
}

export function parseProverb(entry: unknown, index: number): Proverb {
  if (!isRecord(entry)) {
    throw new ValidationError(`Proverb #${index} is not an object`);
  }
  const id = readString(entry, 'id', `Proverb #${index}`);
  const where = `Proverb "${id}"`;

  let relatedTerm: SolarTermId | null = null;
  if (entry.related_term !== null && entry.related_term !== undefined) {
    const term = typeof entry.related_term === 'string' ? findSolarTerm(entry.related_term) : undefined;
    if (!term) throw new ValidationError(`${where}: unknown related_term ${String(entry.related_term)}`);
    relatedTerm = term.id;
  }

  const method = entry.verification_method;
  if (method !== undefined && typeof method !== 'string') {
    throw new ValidationError(`${where}: "verification_method" must be a string`);
  }

  if (typeof entry.verifiable !== 'boolean') {
    throw new ValidationError(`${where}: "verifiable" must be a boolean`);
  }

  return {
    id,
    text: readString(entry, 'text', where),
    reading: typeof entry.reading === 'string' ? entry.reading : null,
    meaning: readString(entry, 'meaning', where),
    category: readCategory(readString(entry, 'category', where), where),
    region: readRegion(readString(entry, 'region', where), where),
    related_term: relatedTerm,
    applicable_months: readMonths(entry.applicable_months, where),
    keywords: readKeywords(entry.keywords, where),
    verifiable: entry.verifiable,
    scientific_explanation: readString(entry, 'scientific_explanation', where),
    verification_method: typeof method === 'string' ? method : '',
  };
}

export function parseCatalog(data: unknown): Proverb[] {
  if (!Array.isArray(data)) {
    throw new ValidationError('Proverb catalog must be an array');
  }
  const proverbs = data.map((entry, i) => parseProverb(entry, i));
  const seen = new Set<string>();
  for (const p of proverbs) {
    if (seen.has(p.id)) throw new ValidationError(`Duplicate proverb id "${p.id}"`);
    seen.add(p.id);
  }
  return proverbs;
}

export class ProverbCatalog {
  private readonly byId: Map<string, Proverb>;

  constructor(private readonly proverbs: readonly Proverb[]) {
    this.byId = new Map(proverbs.map((p) => [p.id, p]));
  }

  getAll(): Proverb[] {
    return [...this.proverbs];
  }

  getById(id: string): Proverb | undefined {
    return this.byId.get(id);
  }

  getVerifiable(): Proverb[] {
    return this.proverbs.filter((p) => p.verifiable);
  }

  byCategory(category: ProverbCategory): Proverb[] {
    return this.proverbs.filter((p) => p.category === category);
  }

  byRegion(region: ProverbRegion): Proverb[] {
    return this.proverbs.filter((p) => p.region === region);
  }

  /** Accepts a term id or its Chinese name. */
  bySolarTerm(idOrName: string): Proverb[] {
    const term = findSolarTerm(idOrName);
    if (!term) return [];
    return this.proverbs.filter((p) => p.related_term === term.id);
  }

  byMonth(month: number): Proverb[] {
    return this.proverbs.filter((p) => p.applicable_months.includes(month));
  }

  search(keyword: string): Proverb[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];
    return this.proverbs.filter(
      (p) =>
        p.text.includes(needle) ||
        p.meaning.toLowerCase().includes(needle) ||
        p.keywords.some((k) => k.toLowerCase().includes(needle))
    );
  }
}

let defaultCatalog: ProverbCatalog | null = null;

export function loadDefaultCatalog(): ProverbCatalog {
  if (!defaultCatalog) {
    defaultCatalog = new ProverbCatalog(parseCatalog(catalogData));
  }
  return defaultCatalog;
}
