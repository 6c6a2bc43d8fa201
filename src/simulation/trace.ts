import type { RejectionReason } from "../consensus/blockValidation";
import type { BlockId, NodeId } from "../ledger/Block";

interface TraceBase {
    readonly time: number;
    readonly nodeId: NodeId;
    readonly blockId: BlockId;
    readonly parentId: BlockId | null;
}

export interface MinedRecord extends TraceBase {
    readonly kind: "mined";
    readonly height: number;
    readonly weight: number;
    /** Set when the block carries a proof its creator did not win. */
    readonly forged: boolean;
    readonly resultingHead: BlockId;
}

export interface AcceptedRecord extends TraceBase {
    readonly kind: "accepted";
    readonly sender: NodeId;
    readonly height: number;
    readonly arrivalTime: number;
    readonly resultingHead: BlockId;
}

export interface BufferedRecord extends TraceBase {
    readonly kind: "buffered";
    readonly sender: NodeId;
}

export interface RejectedRecord extends TraceBase {
    readonly kind: "rejected";
    readonly sender: NodeId;
    readonly reason: RejectionReason;
}

/** `nodeId` is the sender; `to` never received the block. */
export interface DroppedRecord extends TraceBase {
    readonly kind: "dropped";
    readonly to: NodeId;
}

/** `nodeId` asked `from` for the missing block `blockId`. */
export interface RequestedRecord extends TraceBase {
    readonly kind: "requested";
    readonly from: NodeId;
}

/** `blockId` is the head after the check. */
export interface ForkCheckRecord extends TraceBase {
    readonly kind: "fork-check";
    readonly tips: number;
    readonly pending: number;
}

export interface OrphanUnresolvedRecord extends TraceBase {
    readonly kind: "orphan-unresolved";
    readonly bufferedAt: number;
}

export type TraceRecord =
    | MinedRecord
    | AcceptedRecord
    | BufferedRecord
    | RejectedRecord
    | DroppedRecord
    | RequestedRecord
    | ForkCheckRecord
    | OrphanUnresolvedRecord;

export type TraceKind = TraceRecord["kind"];

export type TraceRecordOf<K extends TraceKind> = Extract<
    TraceRecord,
    { kind: K }
>;

/** Append-only log of everything the nodes did, in dispatch order. */
export class TraceRecorder {
    private readonly _records: TraceRecord[] = [];

    record(entry: TraceRecord): void {
        this._records.push(entry);
    }

    get records(): readonly TraceRecord[] {
        return this._records;
    }

    get length(): number {
        return this._records.length;
    }

    ofKind<K extends TraceKind>(kind: K): TraceRecordOf<K>[] {
        return filterTrace(this._records, kind);
    }
}

export function filterTrace<K extends TraceKind>(
    trace: readonly TraceRecord[],
    kind: K,
): TraceRecordOf<K>[] {
    const out: TraceRecordOf<K>[] = [];
    for (const r of trace) {
        if (isKind(r, kind)) out.push(r);
    }
    return out;
}

function isKind<K extends TraceKind>(
    r: TraceRecord,
    kind: K,
): r is TraceRecordOf<K> {
    return r.kind === kind;
}

/** One JSON object per line. */
export function serializeTrace(trace: readonly TraceRecord[]): string {
    return trace.map((r) => JSON.stringify(r) + "\n").join("");
}
