/**
 * @module noise/index
 * @description Final-stage candidate filtering
 * @status COMPLETE
 * @lastModified 2026-10-16
 */

export {
  type NoiseOptions,
  type NoiseRejection,
  type NoiseResult,
  type ContentStats,
  DEFAULT_NOISE_OPTIONS,
  contentStats,
  filterNoise,
  isNoise,
} from './noise-filter';

export { buildAllowList, normalizeTerm, parseDictionary } from './allow-list';
