import { type BlockId, GENESIS, type NodeId, shortId } from "../ledger/Block";
import type { NodeSnapshot } from "../node/NodeAgent";
import { filterTrace, type TraceRecord } from "../simulation/trace";

export interface DelayStats {
    count: number;
    min: number;
    mean: number;
    p50: number;
    p90: number;
    max: number;
}

export interface SimulationSummary {
    blocksMined: number;
    forgedBlocks: number;
    /** Time from a block being mined to each acceptance elsewhere. */
    propagation: DelayStats;
    /** Extra children summed over every branching block. */
    forks: number;
    /** Honest blocks off the canonical chain. */
    staleBlocks: number;
    rejections: number;
    drops: number;
    unresolvedOrphans: number;
    /** Null when the heads still disagree at the end. */
    convergenceTime: number | null;
    agreement: boolean;
    canonicalHead: BlockId;
    canonicalHeight: number;
}

export interface SummaryOptions {
    /** How far heads may sit above their deepest common ancestor. */
    convergenceDepth?: number;
}

interface TreeNode {
    parentId: BlockId | null;
    height: number;
}

/** Nearest-rank percentile of an ascending array. */
function percentile(sorted: number[], p: number): number {
    if (sorted.length === 0) return 0;
    const rank = Math.max(1, Math.ceil(p * sorted.length));
    return sorted[rank - 1];
}

export function delayStats(delays: number[]): DelayStats {
    if (delays.length === 0) {
        return { count: 0, min: 0, mean: 0, p50: 0, p90: 0, max: 0 };
    }
    const sorted = [...delays].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, d) => acc + d, 0);
    return {
        count: sorted.length,
        min: sorted[0],
        mean: sum / sorted.length,
        p50: percentile(sorted, 0.5),
        p90: percentile(sorted, 0.9),
        max: sorted[sorted.length - 1],
    };
}

class BlockTree {
    private readonly nodes = new Map<BlockId, TreeNode>([
        [GENESIS.id, { parentId: null, height: 0 }],
    ]);

    add(id: BlockId, parentId: BlockId | null, height: number): void {
        this.nodes.set(id, { parentId, height });
    }

    heightOf(id: BlockId): number {
        return this.nodes.get(id)?.height ?? 0;
    }

    private parentOf(id: BlockId): BlockId | null {
        return this.nodes.get(id)?.parentId ?? null;
    }

    commonAncestor(a: BlockId, b: BlockId): BlockId {
        let x: BlockId | null = a;
        let y: BlockId | null = b;
        while (x !== null && y !== null && x !== y) {
            if (this.heightOf(x) >= this.heightOf(y)) x = this.parentOf(x);
            else y = this.parentOf(y);
        }
        return x ?? y ?? GENESIS.id;
    }

    /** `id` and its ancestors. */
    chain(id: BlockId): Set<BlockId> {
        const out = new Set<BlockId>();
        let cursor: BlockId | null = id;
        while (cursor !== null) {
            out.add(cursor);
            cursor = this.parentOf(cursor);
        }
        return out;
    }
}

function withinDepth(
    tree: BlockTree,
    heads: Iterable<BlockId>,
    depth: number,
): boolean {
    const all = [...heads];
    if (all.length === 0) return true;
    const lca = all.reduce((acc, h) => tree.commonAncestor(acc, h));
    const base = tree.heightOf(lca);
    return all.every((h) => tree.heightOf(h) - base <= depth);
}

function headOf(record: TraceRecord): BlockId | undefined {
    switch (record.kind) {
        case "mined":
        case "accepted":
            return record.resultingHead;
        case "fork-check":
            return record.blockId;
        default:
            return undefined;
    }
}

/**
 * Head held by the most nodes; ties go to the greater height, then the
 * smaller id.
 */
function canonicalHeadOf(
    snapshots: ReadonlyMap<NodeId, NodeSnapshot>,
): { head: BlockId; height: number } {
    const votes = new Map<BlockId, { count: number; height: number }>();
    for (const snap of snapshots.values()) {
        const v = votes.get(snap.head);
        if (v) v.count++;
        else votes.set(snap.head, { count: 1, height: snap.headHeight });
    }
    let best: { head: BlockId; height: number; count: number } = {
        head: GENESIS.id,
        height: 0,
        count: 0,
    };
    for (const [head, v] of votes) {
        if (
            v.count > best.count ||
            (v.count === best.count &&
                (v.height > best.height ||
                    (v.height === best.height && head < best.head)))
        ) best = { head, height: v.height, count: v.count };
    }
    return { head: best.head, height: best.height };
}

/**
 * Post-run statistics computed from the trace and the final snapshots only.
 */
export function summarize(
    trace: readonly TraceRecord[],
    snapshots: ReadonlyMap<NodeId, NodeSnapshot>,
    options: SummaryOptions = {},
): SimulationSummary {
    const depth = options.convergenceDepth ?? 1;
    const mined = filterTrace(trace, "mined");
    const tree = new BlockTree();
    const minedAt = new Map<BlockId, number>();
    for (const r of mined) {
        tree.add(r.blockId, r.parentId, r.height);
        minedAt.set(r.blockId, r.time);
    }

    const delays: number[] = [];
    for (const r of filterTrace(trace, "accepted")) {
        const t0 = minedAt.get(r.blockId);
        if (t0 !== undefined) delays.push(r.arrivalTime - t0);
    }

    const honest = mined.filter((r) => !r.forged);
    const children = new Map<BlockId, number>();
    for (const r of honest) {
        if (r.parentId === null) continue;
        children.set(r.parentId, (children.get(r.parentId) ?? 0) + 1);
    }
    let forks = 0;
    for (const n of children.values()) forks += Math.max(0, n - 1);

    const canonical = canonicalHeadOf(snapshots);
    const canonicalChain = tree.chain(canonical.head);
    const staleBlocks = honest.filter((r) => !canonicalChain.has(r.blockId))
        .length;

    // Replay head changes; a time step is judged once all of its records apply.
    const heads = new Map<NodeId, BlockId>(
        [...snapshots.keys()].map((id) => [id, GENESIS.id]),
    );
    let convergedSince: number | null = 0;
    for (let i = 0; i < trace.length; i++) {
        const record = trace[i];
        const head = headOf(record);
        if (head !== undefined && heads.has(record.nodeId)) {
            heads.set(record.nodeId, head);
        }
        const next = trace[i + 1];
        if (next !== undefined && next.time === record.time) continue;
        const ok = withinDepth(tree, heads.values(), depth);
        if (!ok) convergedSince = null;
        else if (convergedSince === null) convergedSince = record.time;
    }

    const finalHeads = new Set([...snapshots.values()].map((s) => s.head));
    return {
        blocksMined: mined.length,
        forgedBlocks: mined.length - honest.length,
        propagation: delayStats(delays),
        forks,
        staleBlocks,
        rejections: filterTrace(trace, "rejected").length,
        drops: filterTrace(trace, "dropped").length,
        unresolvedOrphans: filterTrace(trace, "orphan-unresolved").length,
        convergenceTime: convergedSince,
        agreement: finalHeads.size <= 1,
        canonicalHead: canonical.head,
        canonicalHeight: canonical.height,
    };
}

export function formatSummary(summary: SimulationSummary): string {
    const p = summary.propagation;
    const round = (n: number) => Number(n.toFixed(3));
    return [
        `blocks mined:        ${summary.blocksMined} (${summary.forgedBlocks} forged)`,
        `propagation delay:   n=${p.count} min=${round(p.min)} mean=${round(p.mean)} p50=${round(p.p50)} p90=${round(p.p90)} max=${round(p.max)}`,
        `forks:               ${summary.forks}`,
        `stale blocks:        ${summary.staleBlocks}`,
        `rejected deliveries: ${summary.rejections}`,
        `dropped deliveries:  ${summary.drops}`,
        `unresolved orphans:  ${summary.unresolvedOrphans}`,
        `converged at:        ${summary.convergenceTime ?? "never"}`,
        `agreement:           ${summary.agreement ? "yes" : "no"}`,
        `canonical head:      ${shortId(summary.canonicalHead)} at height ${summary.canonicalHeight}`,
    ].join("\n");
}
