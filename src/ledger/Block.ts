import {
    Cbor,
    CborArray,
    type CborObj,
    CborSimple,
    CborText,
    CborUInt,
} from "@harmoniclabs/cbor";
import { blake2b_256 } from "@harmoniclabs/crypto";
import { toHex } from "@harmoniclabs/uint8array-utils";

export type BlockId = string;
export type NodeId = string;

/** A successful hash-power trial: `draw < threshold`. */
export interface PowProof {
    readonly kind: "pow";
    readonly draw: number;
    readonly threshold: number;
}

/** A winning stake lottery ticket for `slot`. */
export interface PosProof {
    readonly kind: "pos";
    readonly slot: number;
    readonly lottery: number;
    readonly threshold: number;
}

export interface GenesisProof {
    readonly kind: "genesis";
}

export type Proof = PowProof | PosProof | GenesisProof;

export interface Block {
    /** Hex blake2b-256 over the canonical encoding of every other field. */
    readonly id: BlockId;
    readonly parentId: BlockId | null;
    readonly creator: NodeId;
    readonly timestamp: number;
    readonly height: number;
    readonly weight: number;
    readonly proof: Proof;
    readonly payload: string;
}

export type BlockContent = Omit<Block, "id">;

export const GENESIS_CREATOR = "genesis";

// Floats go through their shortest round-trip string so the encoding stays
// stable across runs.
function num(n: number): CborText {
    return new CborText(String(n));
}

function proofToCborObj(proof: Proof): CborObj {
    switch (proof.kind) {
        case "genesis":
            return new CborArray([new CborText("genesis")]);
        case "pow":
            return new CborArray([
                new CborText("pow"),
                num(proof.draw),
                num(proof.threshold),
            ]);
        case "pos":
            return new CborArray([
                new CborText("pos"),
                new CborUInt(proof.slot),
                num(proof.lottery),
                num(proof.threshold),
            ]);
    }
}

export function blockContentToCborObj(content: BlockContent): CborObj {
    return new CborArray([
        content.parentId === null
            ? new CborSimple(null)
            : new CborText(content.parentId),
        new CborText(content.creator),
        num(content.timestamp),
        new CborUInt(content.height),
        num(content.weight),
        proofToCborObj(content.proof),
        new CborText(content.payload),
    ]);
}

export function computeBlockId(content: BlockContent): BlockId {
    const bytes = Cbor.encode(blockContentToCborObj(content)).toBuffer();
    return toHex(blake2b_256(bytes));
}

export function createBlock(content: BlockContent): Block {
    return Object.freeze({
        id: computeBlockId(content),
        parentId: content.parentId,
        creator: content.creator,
        timestamp: content.timestamp,
        height: content.height,
        weight: content.weight,
        proof: Object.freeze({ ...content.proof }),
        payload: content.payload,
    });
}

export const GENESIS: Block = createBlock({
    parentId: null,
    creator: GENESIS_CREATOR,
    timestamp: 0,
    height: 0,
    weight: 0,
    proof: { kind: "genesis" },
    payload: "genesis",
});

export function shortId(id: BlockId): string {
    return id.slice(0, 8);
}
