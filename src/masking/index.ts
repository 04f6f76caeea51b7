/**
 * @module masking
 * @description Masked-text rendering of reconciled candidates
 * @status COMPLETE
 * @dependencies src/masking/masker.ts
 * @lastModified 2026-10-18
 */

export {
  type MaskMode,
  type MaskOptions,
  type MaskInfo,
  type MaskResult,
  MASK_MODES,
  maskText,
  createMasker,
} from './masker';
