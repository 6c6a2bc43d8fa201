import { EmptyQueueError } from "../errors";
import type { Block, NodeId } from "../ledger/Block";

interface ScheduledBase {
    /** Simulated time the event fires at. */
    readonly time: number;
    /** Insertion counter; breaks ties between equal times. */
    readonly seq: number;
    readonly target: NodeId;
}

export interface MineAttemptEvent extends ScheduledBase {
    readonly kind: "MineAttempt";
    /** Running attempt counter for `target`; the mining-trial token. */
    readonly attempt: number;
}

export interface BlockArrivalEvent extends ScheduledBase {
    readonly kind: "BlockArrival";
    readonly sender: NodeId;
    readonly block: Block;
    /** Set when this delivery answers an ancestor request. */
    readonly requested?: boolean;
}

export interface ForkCheckEvent extends ScheduledBase {
    readonly kind: "ForkCheck";
}

export type SimEvent = MineAttemptEvent | BlockArrivalEvent | ForkCheckEvent;
export type SimEventKind = SimEvent["kind"];

type Unscheduled<E> = E extends SimEvent ? Omit<E, "time" | "seq"> : never;
export type EventInput = Unscheduled<SimEvent>;

function compareEvents(a: SimEvent, b: SimEvent): number {
    return a.time - b.time || a.seq - b.seq;
}

/**
 * Min-heap of pending events ordered by `(time, seq)`. Events scheduled for
 * the same time dispatch in insertion order.
 */
export class EventQueue {
    private heap: SimEvent[] = [];
    private nextSeq = 0;

    get size() {
        return this.heap.length;
    }

    isEmpty(): boolean {
        return this.heap.length === 0;
    }

    schedule(event: EventInput, at: number): SimEvent {
        if (!Number.isFinite(at) || at < 0) {
            throw new RangeError(`Cannot schedule ${event.kind} at ${at}`);
        }
        const scheduled: SimEvent = { ...event, time: at, seq: this.nextSeq++ };
        this.heap.push(scheduled);
        this.bubbleUp(this.heap.length - 1);
        return scheduled;
    }

    peek(): SimEvent | undefined {
        return this.heap[0];
    }

    popNext(): SimEvent {
        const root = this.heap[0];
        if (root === undefined) throw new EmptyQueueError();
        const last = this.heap.pop();
        if (last !== undefined && this.heap.length > 0) {
            this.heap[0] = last;
            this.bubbleDown(0);
        }
        return root;
    }

    private bubbleUp(index: number) {
        while (index > 0) {
            const parentIndex = (index - 1) >> 1;
            if (compareEvents(this.heap[index], this.heap[parentIndex]) >= 0) {
                break;
            }
            [this.heap[index], this.heap[parentIndex]] = [
                this.heap[parentIndex],
                this.heap[index],
            ];
            index = parentIndex;
        }
    }

    private bubbleDown(index: number) {
        const length = this.heap.length;
        for (;;) {
            const left = index * 2 + 1;
            const right = left + 1;
            let smallest = index;

            if (
                left < length &&
                compareEvents(this.heap[left], this.heap[smallest]) < 0
            ) {
                smallest = left;
            }
            if (
                right < length &&
                compareEvents(this.heap[right], this.heap[smallest]) < 0
            ) {
                smallest = right;
            }
            if (smallest === index) break;
            [this.heap[index], this.heap[smallest]] = [
                this.heap[smallest],
                this.heap[index],
            ];
            index = smallest;
        }
    }
}
