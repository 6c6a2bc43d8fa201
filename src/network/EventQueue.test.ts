import { describe, expect, test } from "vitest";
import { EmptyQueueError } from "../errors";
import { EventQueue } from "./EventQueue";

describe("EventQueue", () => {
    test("pops events in time order", () => {
        const queue = new EventQueue();
        queue.schedule({ kind: "ForkCheck", target: "n0" }, 5);
        queue.schedule({ kind: "ForkCheck", target: "n1" }, 1);
        queue.schedule({ kind: "ForkCheck", target: "n2" }, 3);
        queue.schedule({ kind: "ForkCheck", target: "n3" }, 0.5);

        const order: string[] = [];
        while (!queue.isEmpty()) order.push(queue.popNext().target);
        expect(order).toEqual(["n3", "n1", "n2", "n0"]);
    });

    test("equal times dispatch in insertion order", () => {
        const queue = new EventQueue();
        for (let i = 0; i < 10; i++) {
            queue.schedule({ kind: "MineAttempt", target: `n${i}`, attempt: 0 }, 2);
        }
        queue.schedule({ kind: "ForkCheck", target: "early" }, 1);

        expect(queue.popNext().target).toBe("early");
        const rest: string[] = [];
        while (!queue.isEmpty()) rest.push(queue.popNext().target);
        expect(rest).toEqual(
            Array.from({ length: 10 }, (_, i) => `n${i}`),
        );
    });

    test("assigns increasing sequence numbers", () => {
        const queue = new EventQueue();
        const a = queue.schedule({ kind: "ForkCheck", target: "a" }, 4);
        const b = queue.schedule({ kind: "ForkCheck", target: "b" }, 1);
        expect(a.seq).toBe(0);
        expect(b.seq).toBe(1);
        expect(b.time).toBe(1);
    });

    test("peek does not remove", () => {
        const queue = new EventQueue();
        queue.schedule({ kind: "ForkCheck", target: "n0" }, 1);
        expect(queue.peek()?.target).toBe("n0");
        expect(queue.size).toBe(1);
        queue.popNext();
        expect(queue.peek()).toBeUndefined();
        expect(queue.size).toBe(0);
    });

    test("popNext on an empty queue throws", () => {
        const queue = new EventQueue();
        expect(() => queue.popNext()).toThrow(EmptyQueueError);
    });

    test("rejects negative and non-finite times", () => {
        const queue = new EventQueue();
        expect(() => queue.schedule({ kind: "ForkCheck", target: "n0" }, -1))
            .toThrow(RangeError);
        expect(() => queue.schedule({ kind: "ForkCheck", target: "n0" }, NaN))
            .toThrow(RangeError);
        expect(queue.isEmpty()).toBe(true);
    });
});
