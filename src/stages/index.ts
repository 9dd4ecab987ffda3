export * as Consensus from './consensus';
export * as SearchAnalysis from './search-analysis';
export * as WebValidation from './web-validation';
export * as ParticleDetection from './particle-detection';
export * as FinalAssembly from './final-assembly';
export type { ParticleOverride } from './particle-detection';
