// Consensus module exports
// Fork choice, leader election and block validity for pow, pos and ghost

// Chain selection
export {
    compareChains,
    compareFirstSeen,
    ghostHead,
    longestChainHead,
    selectBestChain,
} from "./chainSelection";
export type { ChainCandidate } from "./chainSelection";

// Leader election
export {
    posThreshold,
    powThreshold,
    relativeWeights,
    slotLottery,
} from "./leaderElection";

// Block validation
export {
    reject,
    slotOf,
    VALID,
    validateStructure,
    verifyPosProof,
    verifyPowProof,
} from "./blockValidation";
export type { RejectionReason, ValidationResult } from "./blockValidation";

// Engine variants
export { createConsensusEngine } from "./ConsensusEngine";
export type { ConsensusEngine, EngineParams, Trial } from "./ConsensusEngine";
