export { QualityValidator } from './quality-validator';
export type { QualityThresholds } from './quality-validator';
