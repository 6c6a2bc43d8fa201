import {
    type Block,
    computeBlockId,
    type NodeId,
    type PosProof,
    type PowProof,
} from "../ledger/Block";
import { slotLottery } from "./leaderElection";

export type RejectionReason =
    | "bad-id"
    | "missing-parent"
    | "bad-height"
    | "bad-timestamp"
    | "unknown-creator"
    | "bad-weight"
    | "wrong-proof"
    | "failed-trial"
    | "bad-slot"
    | "failed-lottery";

export type ValidationResult =
    | { valid: true }
    | { valid: false; reason: RejectionReason };

export const VALID: ValidationResult = { valid: true };

export function reject(reason: RejectionReason): ValidationResult {
    return { valid: false, reason };
}

export interface StructuralRules {
    proofKind: "pow" | "pos";
    isKnownCreator(creator: NodeId): boolean;
    weightOf(block: Block): number;
}

function verifyBlockId(block: Block): boolean {
    const { id: _id, ...content } = block;
    return computeBlockId(content) === block.id;
}

/**
 * Checks every variant shares: content hash, parent linkage, creator and
 * weight. `parent` is the block the validating node holds under
 * `block.parentId`, if any.
 */
export function validateStructure(
    block: Block,
    parent: Block | undefined,
    rules: StructuralRules,
): ValidationResult {
    if (!verifyBlockId(block)) return reject("bad-id");
    if (!parent || parent.id !== block.parentId) {
        return reject("missing-parent");
    }
    if (block.height !== parent.height + 1) return reject("bad-height");
    if (
        !Number.isFinite(block.timestamp) || block.timestamp < parent.timestamp
    ) return reject("bad-timestamp");
    if (!rules.isKnownCreator(block.creator)) return reject("unknown-creator");
    if (block.weight !== rules.weightOf(block)) return reject("bad-weight");
    if (block.proof.kind !== rules.proofKind) return reject("wrong-proof");
    return VALID;
}

/** `expectedThreshold` is recomputed from the creator's configured hash power. */
export function verifyPowProof(
    proof: PowProof,
    expectedThreshold: number,
): ValidationResult {
    if (
        proof.threshold !== expectedThreshold ||
        !(proof.draw >= 0 && proof.draw < proof.threshold)
    ) return reject("failed-trial");
    return VALID;
}

export interface PosContext {
    nonce: string;
    slotDuration: number;
    expectedThreshold: number;
}

/** Slot of a block on a PoS chain; genesis sits before slot 0. */
export function slotOf(block: Block): number {
    return block.proof.kind === "pos" ? block.proof.slot : -1;
}

export function verifyPosProof(
    block: Block,
    proof: PosProof,
    parent: Block,
    ctx: PosContext,
): ValidationResult {
    if (
        !Number.isInteger(proof.slot) ||
        proof.slot <= slotOf(parent) ||
        block.timestamp !== proof.slot * ctx.slotDuration
    ) return reject("bad-slot");

    const lottery = slotLottery(ctx.nonce, proof.slot, block.creator);
    if (
        proof.lottery !== lottery ||
        proof.threshold !== ctx.expectedThreshold ||
        !(lottery < ctx.expectedThreshold)
    ) return reject("failed-lottery");
    return VALID;
}
