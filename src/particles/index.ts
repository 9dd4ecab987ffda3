export * as Registry from './registry';
export * as Timing from './timing';
export * as Insertion from './insertion';
export type { ParticleForm, ParticleRegistryInstance, RegionSummary } from './registry';
export type { TimingPolicy, TimingAnalysis, ParticleHint, PhonemeSegment, SpeechMetrics } from './timing';
export type { Placement } from './insertion';
