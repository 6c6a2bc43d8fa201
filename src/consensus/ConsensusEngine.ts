import type { ConsensusKind, PosParams, PowParams } from "../config/SimulationConfig";
import type {
    Block,
    BlockId,
    NodeId,
    PosProof,
    PowProof,
} from "../ledger/Block";
import type { LedgerView } from "../ledger/LedgerView";
import type { Rng } from "../utils/rng";
import {
    slotOf,
    validateStructure,
    type ValidationResult,
    verifyPosProof,
    verifyPowProof,
} from "./blockValidation";
import { ghostHead, longestChainHead } from "./chainSelection";
import {
    posThreshold,
    powThreshold,
    relativeWeights,
    slotLottery,
} from "./leaderElection";

/** Outcome of one mining attempt; `success` is false for a losing draw. */
export interface Trial {
    proof: PowProof | PosProof;
    success: boolean;
}

/**
 * What the node agent and driver need from a fork-choice rule.
 */
export interface ConsensusEngine {
    readonly kind: ConsensusKind;
    /** Time between two attempts of one node (PoW) or between slots (PoS). */
    readonly attemptInterval: number;
    /** Parent presence plus every structural and proof check. */
    validate(block: Block, view: LedgerView): ValidationResult;
    /** Preferred head of `view`; never mutates it. */
    selectHead(view: LedgerView): BlockId;
    weightOf(block: Pick<Block, "creator">): number;
    /** Block a node mining at `attempt` builds on. */
    parentFor(view: LedgerView, attempt: number): Block;
    /** When attempt number `attempt` of a node whose first attempt was at `start` fires. */
    attemptTime(attempt: number, start: number): number;
    tryProduce(node: NodeId, now: number, attempt: number, rng: Rng): Trial;
}

export interface EngineParams {
    /** Hash power or stake per node. */
    weights: ReadonlyMap<NodeId, number>;
    pow: Required<PowParams>;
    pos: Required<PosParams>;
}

class LongestChainPow implements ConsensusEngine {
    readonly kind: ConsensusKind = "pow";
    readonly attemptInterval: number;

    constructor(protected readonly params: EngineParams) {
        this.attemptInterval = params.pow.attemptInterval;
    }

    thresholdOf(node: NodeId): number {
        return powThreshold(
            this.params.weights.get(node) ?? 0,
            this.params.pow.successRate,
        );
    }

    weightOf(_block: Pick<Block, "creator">): number {
        return 1;
    }

    parentFor(view: LedgerView, _attempt: number): Block {
        return view.headBlock;
    }

    validate(block: Block, view: LedgerView): ValidationResult {
        const parent = block.parentId === null
            ? undefined
            : view.get(block.parentId);
        const structural = validateStructure(block, parent, {
            proofKind: "pow",
            isKnownCreator: (id) => this.params.weights.has(id),
            weightOf: (b) => this.weightOf(b),
        });
        if (!structural.valid || block.proof.kind !== "pow") return structural;
        return verifyPowProof(block.proof, this.thresholdOf(block.creator));
    }

    selectHead(view: LedgerView): BlockId {
        return longestChainHead(view);
    }

    attemptTime(attempt: number, start: number): number {
        return start + attempt * this.attemptInterval;
    }

    tryProduce(node: NodeId, _now: number, _attempt: number, rng: Rng): Trial {
        const threshold = this.thresholdOf(node);
        const draw = rng();
        return {
            proof: { kind: "pow", draw, threshold },
            success: draw < threshold,
        };
    }
}

// Same mining and validity as PoW; only fork choice differs.
class Ghost extends LongestChainPow {
    override readonly kind: ConsensusKind = "ghost";

    override selectHead(view: LedgerView): BlockId {
        return ghostHead(view);
    }
}

class ProofOfStake implements ConsensusEngine {
    readonly kind: ConsensusKind = "pos";
    readonly attemptInterval: number;
    private readonly stake: Map<NodeId, number>;

    constructor(private readonly params: EngineParams) {
        this.attemptInterval = params.pos.slotDuration;
        this.stake = relativeWeights(params.weights);
    }

    thresholdOf(node: NodeId): number {
        return posThreshold(
            this.stake.get(node) ?? 0,
            this.params.pos.activeSlotCoeff,
        );
    }

    weightOf(block: Pick<Block, "creator">): number {
        return this.stake.get(block.creator) ?? 0;
    }

    /**
     * The head, unless it already claims this slot or a later one; then its
     * nearest ancestor from an earlier slot.
     */
    parentFor(view: LedgerView, attempt: number): Block {
        let parent = view.headBlock;
        while (slotOf(parent) >= attempt && parent.parentId !== null) {
            parent = view.getOrThrow(parent.parentId);
        }
        return parent;
    }

    validate(block: Block, view: LedgerView): ValidationResult {
        const parent = block.parentId === null
            ? undefined
            : view.get(block.parentId);
        const structural = validateStructure(block, parent, {
            proofKind: "pos",
            isKnownCreator: (id) => this.stake.has(id),
            weightOf: (b) => this.weightOf(b),
        });
        if (!structural.valid || !parent || block.proof.kind !== "pos") {
            return structural;
        }
        return verifyPosProof(block, block.proof, parent, {
            nonce: this.params.pos.nonce,
            slotDuration: this.params.pos.slotDuration,
            expectedThreshold: this.thresholdOf(block.creator),
        });
    }

    selectHead(view: LedgerView): BlockId {
        return longestChainHead(view);
    }

    // Slots are global, so a node's start offset does not apply.
    attemptTime(attempt: number, _start: number): number {
        return attempt * this.attemptInterval;
    }

    /** The attempt counter is the slot number. */
    tryProduce(node: NodeId, _now: number, attempt: number, _rng: Rng): Trial {
        const threshold = this.thresholdOf(node);
        const lottery = slotLottery(this.params.pos.nonce, attempt, node);
        return {
            proof: { kind: "pos", slot: attempt, lottery, threshold },
            success: lottery < threshold,
        };
    }
}

export function createConsensusEngine(
    kind: ConsensusKind,
    params: EngineParams,
): ConsensusEngine {
    switch (kind) {
        case "pow":
            return new LongestChainPow(params);
        case "ghost":
            return new Ghost(params);
        case "pos":
            return new ProofOfStake(params);
        default: {
            const unknown: never = kind;
            throw new Error(`Unknown consensus kind ${String(unknown)}`);
        }
    }
}
