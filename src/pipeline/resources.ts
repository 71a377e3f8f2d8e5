import os from 'os';
import { ModelTier } from './types';

export const GIB = 1024 ** 3;

export interface ResourceSample {
  availableMemoryBytes: number;
  cpuCount: number;
}

export type ResourceSampler = () => ResourceSample;

/** Approximate resident memory of one transcription job per tier, smallest first */
export const MODEL_TIERS: ReadonlyArray<{ tier: ModelTier; memoryBytes: number }> = [
  { tier: 'tiny', memoryBytes: 1 * GIB },
  { tier: 'base', memoryBytes: 1.5 * GIB },
  { tier: 'small', memoryBytes: 2 * GIB },
  { tier: 'medium', memoryBytes: 4 * GIB },
  { tier: 'large-v3', memoryBytes: 6 * GIB },
];

export function isModelTier(value: string): value is ModelTier {
  return MODEL_TIERS.some((t) => t.tier === value);
}

export function tierMemory(tier: ModelTier): number {
  const found = MODEL_TIERS.find((t) => t.tier === tier);
  return found ? found.memoryBytes : MODEL_TIERS[MODEL_TIERS.length - 1].memoryBytes;
}

export const DEFAULT_SAFETY_MARGIN = 0.2;
export const DEFAULT_SAFETY_FACTOR = 1.2;

/** Largest tier whose memory plus margin fits; tiny when none does */
export function recommendTier(availableMemoryBytes: number, safetyMargin = DEFAULT_SAFETY_MARGIN): ModelTier {
  let best: ModelTier = 'tiny';
  for (const { tier, memoryBytes } of MODEL_TIERS) {
    if (memoryBytes * (1 + safetyMargin) <= availableMemoryBytes) best = tier;
  }
  return best;
}

export function recommendConcurrency(
  cpuCount: number,
  tierMemoryCost: number,
  availableMemoryBytes: number,
  safetyFactor = DEFAULT_SAFETY_FACTOR
): number {
  const byCpu = Math.max(1, cpuCount - 1);
  const byMemory = Math.floor(availableMemoryBytes / (tierMemoryCost * safetyFactor));
  return Math.max(1, Math.min(byCpu, byMemory));
}

export function systemSample(): ResourceSample {
  return { availableMemoryBytes: os.freemem(), cpuCount: os.availableParallelism() };
}

export interface ResourcePlan extends ResourceSample {
  tier: ModelTier;
  concurrency: number;
  /** Bound implied by memory alone; overrides never exceed it */
  maxConcurrency: number;
}

export interface PlanOptions {
  tier?: ModelTier;
  concurrency?: number;
  safetyMargin?: number;
  safetyFactor?: number;
}

export class ResourceMonitor {
  constructor(private readonly sampler: ResourceSampler = systemSample) {}

  sample(): ResourceSample {
    return this.sampler();
  }

  /** One sample, then tier and worker count for the whole batch */
  plan(opts: PlanOptions = {}): ResourcePlan {
    const sample = this.sample();
    const tier = opts.tier ?? recommendTier(sample.availableMemoryBytes, opts.safetyMargin);
    const maxConcurrency = recommendConcurrency(
      sample.cpuCount,
      tierMemory(tier),
      sample.availableMemoryBytes,
      opts.safetyFactor
    );
    const concurrency =
      opts.concurrency !== undefined ? Math.max(1, Math.min(opts.concurrency, maxConcurrency)) : maxConcurrency;
    return { ...sample, tier, concurrency, maxConcurrency };
  }
}
