/**
 * @module consensus/index
 * @description Strict dual-detection agreement
 * @status COMPLETE
 * @lastModified 2026-10-16
 */

export {
  type ConsensusOptions,
  type ConsensusRejection,
  type ConsensusResult,
  type PairRelation,
  DEFAULT_CONSENSUS_OPTIONS,
  agrees,
  buildConsensus,
  classifyPair,
  toConsensusRecord,
} from './consensus-engine';
