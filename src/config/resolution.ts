/**
 * Domain tuning for matching and resolution.
 *
 * The bundled defaults live in `resolution.defaults.json`; a deployment can
 * point RESOLUTION_CONFIG_PATH at its own document, which is merged over the
 * defaults section by section and validated as a whole.
 */
import { readFileSync } from 'fs';
import defaults from './resolution.defaults.json';
import { validateResolutionConfig } from '../utils/schema-validator';
import { logger } from '../utils/logger';

export interface EventTypeOverride {
  temporalToleranceSec?: number;
  acceptanceThreshold?: number;
  marginThreshold?: number;
}

export interface ResolutionConfig {
  matcher: {
    /** Widening applied to both ends of a node's time span for the temporal gate */
    temporalToleranceSec: number;
    /** Separation, in combined sigmas, beyond which the spatial score is zero */
    maxSeparationSigma: number;
    /** Floor applied to every positional uncertainty */
    minPositionalErrorDeg: number;
    /** Scores this close to the top score are tie-broken */
    tieEpsilon: number;
    sameInstrumentBonus: number;
    cooperatingInstrumentBonus: number;
  };
  resolver: {
    /** Minimum top score for an automatic merge */
    acceptanceThreshold: number;
    /** Lead the top match needs over every other match */
    marginThreshold: number;
    /** Node-to-node score at which competing nodes are merged during re-evaluation */
    nodeMergeThreshold: number;
    /** Bound on cases re-scored per corroboration event */
    maxCasesPerReevaluation: number;
  };
  eventTypeOverrides: Record<string, EventTypeOverride>;
  instruments: {
    /** Groups of instruments that raise each other's match score */
    cooperating: string[][];
  };
  /** Event type assumed for an instrument when a notice carries none */
  instrumentEventTypes: Record<string, string>;
  eventTypes: {
    aliases: Record<string, string>;
    /** Pairs of confirmed types that can never be the same transient */
    conflicts: string[][];
  };
  /** Instrument → ingestion partition; unlisted instruments share `default` */
  partitions: Record<string, string>;
  normalizer: {
    sourcePriors: Record<string, number>;
    defaultPrior: number;
    confirmedConfidence: number;
    defaultErrorRadiusDeg: number;
    confirmedDesignations: string[];
  };
}

export type ResolutionConfigOverrides = {
  [K in keyof ResolutionConfig]?: Partial<ResolutionConfig[K]>;
};

export interface EffectiveThresholds {
  temporalToleranceSec: number;
  acceptanceThreshold: number;
  marginThreshold: number;
}

export const DEFAULT_PARTITION = 'default';

/**
 * Merge overrides over the bundled defaults and validate the result
 */
export function createResolutionConfig(overrides: ResolutionConfigOverrides = {}): ResolutionConfig {
  return mergeOverDefaults(overrides);
}

/**
 * Load the resolution config, optionally from a JSON document on disk
 */
export function loadResolutionConfig(path?: string): ResolutionConfig {
  if (!path) {
    logger.info('Using bundled resolution defaults');
    return createResolutionConfig();
  }

  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const config = mergeOverDefaults(isRecord(raw) ? raw : {});
  logger.info({ path }, 'Loaded resolution config');
  return config;
}

/**
 * Thresholds for one event type, with per-type overrides applied
 */
export function thresholdsFor(config: ResolutionConfig, eventType: string): EffectiveThresholds {
  const override = config.eventTypeOverrides[eventType] ?? {};
  return {
    temporalToleranceSec: override.temporalToleranceSec ?? config.matcher.temporalToleranceSec,
    acceptanceThreshold: override.acceptanceThreshold ?? config.resolver.acceptanceThreshold,
    marginThreshold: override.marginThreshold ?? config.resolver.marginThreshold,
  };
}

export function areCooperating(config: ResolutionConfig, a: string, b: string): boolean {
  return config.instruments.cooperating.some(group => group.includes(a) && group.includes(b));
}

export function typesConflict(config: ResolutionConfig, a: string, b: string): boolean {
  return config.eventTypes.conflicts.some(
    ([x, y]) => (x === a && y === b) || (x === b && y === a)
  );
}

export function partitionFor(config: ResolutionConfig, instrument: string): string {
  return config.partitions[instrument] ?? DEFAULT_PARTITION;
}

export function priorFor(config: ResolutionConfig, source: string): number {
  return config.normalizer.sourcePriors[source] ?? config.normalizer.defaultPrior;
}

function mergeOverDefaults(overrides: Record<string, unknown>): ResolutionConfig {
  const base: unknown = JSON.parse(JSON.stringify(defaults));
  const merged: Record<string, unknown> = isRecord(base) ? base : {};

  for (const [section, value] of Object.entries(overrides)) {
    const current = merged[section];
    merged[section] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }

  return validateResolutionConfig(merged);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
