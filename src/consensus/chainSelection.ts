import type { BlockId } from "../ledger/Block";
import type { Arrival, LedgerView } from "../ledger/LedgerView";

/**
 * A candidate tip as seen by one node
 */
export interface ChainCandidate {
    tip: BlockId;
    height: number;
    /** When the evaluating node received the tip */
    arrival: Arrival;
}

/**
 * Earlier arrival wins; equal times fall back to the view's insertion order.
 * Returns 1 when `a` was seen first, -1 when `b` was, 0 for the same block.
 */
export function compareFirstSeen(a: Arrival, b: Arrival): number {
    if (a.time !== b.time) return a.time < b.time ? 1 : -1;
    if (a.seq !== b.seq) return a.seq < b.seq ? 1 : -1;
    return 0;
}

/**
 * Longest-chain ordering: greater height first, then first seen.
 * Returns 1 if `a` is preferred, -1 if `b` is, 0 if they are the same tip.
 */
export function compareChains(a: ChainCandidate, b: ChainCandidate): number {
    if (a.height !== b.height) return a.height > b.height ? 1 : -1;
    return compareFirstSeen(a.arrival, b.arrival);
}

export function selectBestChain(
    candidates: ChainCandidate[],
): ChainCandidate | null {
    if (candidates.length === 0) return null;
    return candidates.reduce((best, current) =>
        compareChains(current, best) > 0 ? current : best
    );
}

function candidateOf(view: LedgerView, id: BlockId): ChainCandidate {
    const arrival = view.arrivalOf(id);
    if (!arrival) throw new Error(`No arrival recorded for ${id}`);
    return { tip: id, height: view.getOrThrow(id).height, arrival };
}

/**
 * Deepest block in the view. The deepest block is always a tip, so only tips
 * are compared.
 */
export function longestChainHead(view: LedgerView): BlockId {
    const best = selectBestChain(
        view.tips().map((id) => candidateOf(view, id)),
    );
    return best ? best.tip : view.genesisId;
}

/**
 * GHOST: from genesis, repeatedly step into the child whose subtree carries
 * the most cumulative weight (the child itself plus all its descendants).
 * Equal subtree weights go to the child seen first.
 */
export function ghostHead(view: LedgerView): BlockId {
    let current = view.genesisId;
    for (;;) {
        const children = view.childrenOf(current);
        if (children.length === 0) return current;
        let best = children[0];
        for (const child of children.slice(1)) {
            const wChild = view.subtreeWeight(child);
            const wBest = view.subtreeWeight(best);
            if (
                wChild > wBest ||
                (wChild === wBest &&
                    compareFirstSeen(
                            candidateOf(view, child).arrival,
                            candidateOf(view, best).arrival,
                        ) > 0)
            ) {
                best = child;
            }
        }
        current = best;
    }
}
