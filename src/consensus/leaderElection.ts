import { Cbor, CborArray, CborText, CborUInt } from "@harmoniclabs/cbor";
import { blake2b_256 } from "@harmoniclabs/crypto";
import type { NodeId } from "../ledger/Block";

/** Success probability of one hash-power trial, capped at certainty. */
export function powThreshold(hashPower: number, successRate: number): number {
    return Math.min(1, successRate * hashPower);
}

/**
 * phi_f(sigma) = 1 - (1 - f)^sigma: the chance that a holder of relative
 * stake sigma leads a slot when the active slot coefficient is f.
 */
export function posThreshold(
    relativeStake: number,
    activeSlotCoeff: number,
): number {
    if (relativeStake <= 0) return 0;
    return 1 - Math.pow(1 - activeSlotCoeff, relativeStake);
}

/**
 * Deterministic lottery ticket in [0, 1) for `creator` at `slot`. Anyone can
 * recompute it from the block, which is what makes a PoS proof checkable.
 */
export function slotLottery(
    nonce: string,
    slot: number,
    creator: NodeId,
): number {
    const input = Cbor.encode(
        new CborArray([
            new CborText(nonce),
            new CborUInt(slot),
            new CborText(creator),
        ]),
    ).toBuffer();
    const digest = blake2b_256(input);
    // 48 bits keep the value exact in a double
    let value = 0;
    for (let i = 0; i < 6; i++) value = value * 256 + digest[i];
    return value / 2 ** 48;
}

export function relativeWeights(
    weights: ReadonlyMap<NodeId, number>,
): Map<NodeId, number> {
    let total = 0;
    for (const w of weights.values()) total += w;
    return new Map(
        [...weights].map(([id, w]) => [id, total > 0 ? w / total : 0]),
    );
}
