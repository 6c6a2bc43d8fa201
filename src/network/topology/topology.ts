import { ConfigurationError, DisconnectedTopologyError } from "../../errors";
import type { NodeId } from "../../ledger/Block";
import { type Distribution, sample } from "../../utils/distributions";
import type { Rng } from "../../utils/rng";

export type TopologyKind = "random" | "ring" | "star" | "full" | "custom";

export const TOPOLOGY_KINDS: readonly TopologyKind[] = [
    "random",
    "ring",
    "star",
    "full",
    "custom",
];

export function isTopologyKind(v: unknown): v is TopologyKind {
    return typeof v === "string" &&
        (TOPOLOGY_KINDS as readonly string[]).includes(v);
}

export type LatencyFn = (from: NodeId, to: NodeId, rng: Rng) => number;

export interface LatencyModel {
    model: Distribution | LatencyFn;
    /**
     * false: one value per link, drawn at construction.
     * true: a fresh value for every message.
     */
    jitter?: boolean;
}

/** Directed links of a custom topology; `latency` overrides the model. */
export type CustomLinks = Record<NodeId, Record<NodeId, { latency?: number }>>;

export interface TopologyParams {
    /** Erdős–Rényi edge probability, random topologies only. */
    edgeProbability?: number;
    links?: CustomLinks;
}

interface Link {
    latency: number;
    /** Came from a topology file rather than the latency model. */
    explicit: boolean;
}

export class Topology {
    private readonly links: Map<NodeId, Map<NodeId, Link>>;

    constructor(
        readonly kind: TopologyKind,
        readonly nodeIds: readonly NodeId[],
        links: Map<NodeId, Map<NodeId, Link>>,
        private readonly latencyModel: LatencyModel,
        private readonly rng: Rng,
        readonly directed: boolean,
    ) {
        this.links = links;
    }

    neighbors(id: NodeId): NodeId[] {
        return [...(this.links.get(id)?.keys() ?? [])];
    }

    hasLink(from: NodeId, to: NodeId): boolean {
        return this.links.get(from)?.has(to) ?? false;
    }

    /** One-way delay for a block sent from `from` to its neighbor `to`. */
    latency(from: NodeId, to: NodeId): number {
        const link = this.links.get(from)?.get(to);
        if (!link) throw new Error(`No link from ${from} to ${to}`);
        if (!this.latencyModel.jitter || link.explicit) return link.latency;
        return drawLatency(this.latencyModel, from, to, this.rng);
    }

    /** Neighbor map with the per-link latencies fixed at construction. */
    neighborMap(): Map<NodeId, Map<NodeId, number>> {
        return new Map(
            [...this.links].map(([id, out]) => [
                id,
                new Map([...out].map(([to, link]) => [to, link.latency])),
            ]),
        );
    }

    get edgeCount(): number {
        let directedEdges = 0;
        for (const out of this.links.values()) directedEdges += out.size;
        return this.directed ? directedEdges : directedEdges / 2;
    }

    maxLatency(): number {
        let max = 0;
        for (const out of this.links.values()) {
            for (const link of out.values()) max = Math.max(max, link.latency);
        }
        return max;
    }

    /** Hop distances from `from` to every reachable node. */
    hopsFrom(from: NodeId): Map<NodeId, number> {
        return bfs(from, (id) => this.neighbors(id));
    }

    isConnected(): boolean {
        if (this.nodeIds.length <= 1) return true;
        const root = this.nodeIds[0];
        if (this.hopsFrom(root).size !== this.nodeIds.length) return false;
        if (!this.directed) return true;
        const reverse = new Map<NodeId, NodeId[]>();
        for (const [from, out] of this.links) {
            for (const to of out.keys()) {
                const list = reverse.get(to);
                if (list) list.push(from);
                else reverse.set(to, [from]);
            }
        }
        return bfs(root, (id) => reverse.get(id) ?? []).size ===
            this.nodeIds.length;
    }

    /** Longest shortest path in hops. */
    diameter(): number {
        let max = 0;
        for (const id of this.nodeIds) {
            for (const hops of this.hopsFrom(id).values()) {
                max = Math.max(max, hops);
            }
        }
        return max;
    }
}

function bfs(
    root: NodeId,
    next: (id: NodeId) => readonly NodeId[],
): Map<NodeId, number> {
    const seen = new Map<NodeId, number>([[root, 0]]);
    const queue: NodeId[] = [root];
    for (let i = 0; i < queue.length; i++) {
        const id = queue[i];
        const hops = seen.get(id) ?? 0;
        for (const n of next(id)) {
            if (seen.has(n)) continue;
            seen.set(n, hops + 1);
            queue.push(n);
        }
    }
    return seen;
}

function drawLatency(
    model: LatencyModel,
    from: NodeId,
    to: NodeId,
    rng: Rng,
): number {
    const value = typeof model.model === "function"
        ? model.model(from, to, rng)
        : sample(model.model, rng);
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(
            `latency ${from} -> ${to} must be a finite value >= 0, got ${value}`,
            "latency",
        );
    }
    return value;
}

function undirectedPairs(
    kind: Exclude<TopologyKind, "custom">,
    ids: readonly NodeId[],
    params: TopologyParams,
    rng: Rng,
): Array<[NodeId, NodeId]> {
    const n = ids.length;
    const pairs: Array<[NodeId, NodeId]> = [];
    switch (kind) {
        case "full":
            for (let i = 0; i < n; i++) {
                for (let j = i + 1; j < n; j++) pairs.push([ids[i], ids[j]]);
            }
            return pairs;
        case "star":
            for (let i = 1; i < n; i++) pairs.push([ids[0], ids[i]]);
            return pairs;
        case "ring":
            if (n === 2) return [[ids[0], ids[1]]];
            if (n < 3) return pairs;
            for (let i = 0; i < n; i++) pairs.push([ids[i], ids[(i + 1) % n]]);
            return pairs;
        case "random": {
            const p = params.edgeProbability;
            if (p === undefined || !(p >= 0 && p <= 1)) {
                throw new ConfigurationError(
                    `edgeProbability must be in [0, 1], got ${p}`,
                    "topology.edgeProbability",
                );
            }
            for (let i = 0; i < n; i++) {
                for (let j = i + 1; j < n; j++) {
                    if (rng() < p) pairs.push([ids[i], ids[j]]);
                }
            }
            return pairs;
        }
    }
}

/**
 * Builds a neighbor map of the requested shape and checks that every node can
 * reach every other one. Generated shapes are undirected; custom link sets are
 * taken as directed and must be strongly connected.
 */
export function buildTopology(
    kind: TopologyKind,
    nodeIds: readonly NodeId[],
    params: TopologyParams,
    latency: LatencyModel,
    rng: Rng,
): Topology {
    if (nodeIds.length === 0) {
        throw new ConfigurationError("at least one node is required", "nodeCount");
    }
    if (new Set(nodeIds).size !== nodeIds.length) {
        throw new ConfigurationError("node ids must be unique", "nodes");
    }

    const links = new Map<NodeId, Map<NodeId, Link>>(
        nodeIds.map((id) => [id, new Map<NodeId, Link>()]),
    );

    if (kind === "custom") {
        const custom = params.links;
        if (!custom) {
            throw new ConfigurationError(
                "custom topologies need a link set",
                "topology.file",
            );
        }
        for (const from of nodeIds) {
            for (const [to, info] of Object.entries(custom[from] ?? {})) {
                const out = links.get(from);
                if (!links.has(to) || !out) {
                    throw new ConfigurationError(
                        `link ${from} -> ${to} names an unknown node`,
                        "topology.file",
                    );
                }
                if (to === from) continue;
                out.set(
                    to,
                    info.latency === undefined
                        ? {
                            latency: drawLatency(latency, from, to, rng),
                            explicit: false,
                        }
                        : { latency: info.latency, explicit: true },
                );
            }
        }
    } else {
        for (const [a, b] of undirectedPairs(kind, nodeIds, params, rng)) {
            const link: Link = {
                latency: drawLatency(latency, a, b, rng),
                explicit: false,
            };
            links.get(a)?.set(b, link);
            links.get(b)?.set(a, link);
        }
    }

    const topology = new Topology(
        kind,
        [...nodeIds],
        links,
        latency,
        rng,
        kind === "custom",
    );

    if (!topology.isConnected()) {
        const reached = topology.hopsFrom(nodeIds[0]).size;
        throw new DisconnectedTopologyError(kind, reached, nodeIds.length);
    }
    return topology;
}
