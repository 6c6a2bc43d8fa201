import { ConfigurationError } from "../errors";
import type { NodeId } from "../ledger/Block";
import type {
    LatencyModel,
    TopologyKind,
} from "../network/topology/topology";
import { isTopologyKind } from "../network/topology/topology";
import {
    isTopologyFile,
    type TopologyFileNode,
    topologyFromFile,
} from "../network/topology/parseTopology";
import {
    assertNonNegative,
    type Distribution,
    isDistribution,
    sample,
} from "../utils/distributions";
import type { LoggerConfigInput } from "../utils/logger";
import type { Rng } from "../utils/rng";

export type ConsensusKind = "pow" | "pos" | "ghost";

export const CONSENSUS_KINDS: readonly ConsensusKind[] = ["pow", "pos", "ghost"];

export function isConsensusKind(v: unknown): v is ConsensusKind {
    return typeof v === "string" &&
        (CONSENSUS_KINDS as readonly string[]).includes(v);
}

export interface ExplicitWeights {
    distribution: "explicit";
    /** One entry per node, in node order. */
    values: number[];
}

export type WeightFn = (nodeId: NodeId, index: number, rng: Rng) => number;

/** Hash power (pow, ghost) or stake (pos) per node. */
export type WeightDistribution = Distribution | ExplicitWeights | WeightFn;

export interface TopologyConfig {
    kind: TopologyKind;
    edgeProbability?: number;
    /** Path of a custom topology file; read by `loadConfig`. */
    file?: string;
    /** Inline custom topology, node id -> links. */
    nodes?: Record<NodeId, TopologyFileNode>;
}

export interface PowParams {
    /** Success probability of one attempt per unit of hash power. */
    successRate?: number;
    attemptInterval?: number;
}

export interface PosParams {
    /** Probability that a node holding all stake wins a slot. */
    activeSlotCoeff?: number;
    slotDuration?: number;
    /** Randomness mixed into every slot lottery. */
    nonce?: string;
}

export interface Horizon {
    maxTime?: number;
    maxBlocks?: number;
}

export interface SimulationConfig {
    topology: TopologyConfig;
    /** Required unless the topology is custom, which names its own nodes. */
    nodeCount?: number;
    consensus: ConsensusKind;
    weights?: WeightDistribution;
    latency?: LatencyModel;
    pow?: PowParams;
    pos?: PosParams;
    horizon: Horizon;
    seed: number;
    /** Nodes that produce blocks; defaults to every node with a positive weight. */
    miners?: NodeId[];
    /** Nodes that claim every trial and publish forged proofs. */
    adversaries?: NodeId[];
    /** Probability that a single block delivery is lost. */
    dropRate?: number;
    forkCheckInterval?: number;
    /** First mining attempts are spread uniformly over [0, startJitter). */
    startJitter?: number;
    convergenceDepth?: number;
    logs?: LoggerConfigInput;
}

export interface ResolvedConfig {
    topology: TopologyConfig;
    nodeIds: NodeId[];
    consensus: ConsensusKind;
    weights: WeightDistribution;
    /** Weights a custom topology file pinned for some nodes. */
    pinnedWeights: Map<NodeId, number>;
    latency: LatencyModel;
    pow: Required<PowParams>;
    pos: Required<PosParams>;
    horizon: Horizon;
    seed: number;
    miners: NodeId[] | undefined;
    adversaries: NodeId[];
    dropRate: number;
    forkCheckInterval: number | undefined;
    startJitter: number;
    convergenceDepth: number;
}

export const DEFAULT_POW: Required<PowParams> = {
    successRate: 0.05,
    attemptInterval: 1,
};

export const DEFAULT_POS: Required<PosParams> = {
    activeSlotCoeff: 0.05,
    slotDuration: 1,
    nonce: "forksim",
};

export const DEFAULT_LATENCY: LatencyModel = {
    model: { distribution: "constant", value: 1 },
    jitter: false,
};

export function nodeIdAt(index: number): NodeId {
    return `n${index}`;
}

function positive(v: number | undefined, field: string): void {
    if (v !== undefined && !(Number.isFinite(v) && v > 0)) {
        throw new ConfigurationError(`must be a positive number, got ${v}`, field);
    }
}

function nonNegative(v: number | undefined, field: string): void {
    if (v !== undefined && !(Number.isFinite(v) && v >= 0)) {
        throw new ConfigurationError(`must be a number >= 0, got ${v}`, field);
    }
}

function assertKnownNodes(
    ids: NodeId[] | undefined,
    known: Set<NodeId>,
    field: string,
): void {
    for (const id of ids ?? []) {
        if (!known.has(id)) {
            throw new ConfigurationError(`unknown node ${id}`, field);
        }
    }
}

function validateWeights(weights: WeightDistribution, nodeCount: number): void {
    if (typeof weights === "function") return;
    if (weights.distribution === "explicit") {
        if (weights.values.length !== nodeCount) {
            throw new ConfigurationError(
                `expected ${nodeCount} values, got ${weights.values.length}`,
                "weights",
            );
        }
        if (weights.values.some((w) => !(Number.isFinite(w) && w >= 0))) {
            throw new ConfigurationError("values must be >= 0", "weights");
        }
        return;
    }
    if (!isDistribution(weights)) {
        throw new ConfigurationError("unknown weight distribution", "weights");
    }
    assertNonNegative(weights, "weights");
}

/** Fills in defaults and rejects every invalid parameter combination. */
export function resolveConfig(config: SimulationConfig): ResolvedConfig {
    if (!isConsensusKind(config.consensus)) {
        throw new ConfigurationError(
            `unknown consensus ${String(config.consensus)}`,
            "consensus",
        );
    }
    if (!isTopologyKind(config.topology?.kind)) {
        throw new ConfigurationError(
            `unknown topology kind ${String(config.topology?.kind)}`,
            "topology.kind",
        );
    }
    if (!Number.isInteger(config.seed)) {
        throw new ConfigurationError("must be an integer", "seed");
    }

    let nodeIds: NodeId[];
    let pinnedWeights = new Map<NodeId, number>();
    if (config.topology.kind === "custom") {
        if (!config.topology.nodes) {
            throw new ConfigurationError(
                "custom topologies need inline nodes or a file",
                "topology",
            );
        }
        const inline = { nodes: config.topology.nodes };
        if (!isTopologyFile(inline)) {
            throw new ConfigurationError(
                "weights and link latencies must be finite numbers >= 0",
                "topology.nodes",
            );
        }
        const parsed = topologyFromFile(inline);
        nodeIds = parsed.nodeIds;
        pinnedWeights = parsed.weights;
    } else {
        const { nodeCount } = config;
        if (nodeCount === undefined) {
            throw new ConfigurationError(
                `is required for ${config.topology.kind} topologies`,
                "nodeCount",
            );
        }
        if (!Number.isInteger(nodeCount) || nodeCount < 1) {
            throw new ConfigurationError(
                `must be an integer >= 1, got ${nodeCount}`,
                "nodeCount",
            );
        }
        nodeIds = Array.from({ length: nodeCount }, (_, i) => nodeIdAt(i));
    }

    const { maxTime, maxBlocks } = config.horizon ?? {};
    if (maxTime === undefined && maxBlocks === undefined) {
        throw new ConfigurationError(
            "set maxTime, maxBlocks or both",
            "horizon",
        );
    }
    nonNegative(maxTime, "horizon.maxTime");
    if (
        maxBlocks !== undefined && !(Number.isInteger(maxBlocks) && maxBlocks >= 1)
    ) {
        throw new ConfigurationError(
            `must be an integer >= 1, got ${maxBlocks}`,
            "horizon.maxBlocks",
        );
    }

    if (config.consensus === "pos" && config.pow !== undefined) {
        throw new ConfigurationError("pow parameters given for pos consensus", "pow");
    }
    if (config.consensus !== "pos" && config.pos !== undefined) {
        throw new ConfigurationError(
            `pos parameters given for ${config.consensus} consensus`,
            "pos",
        );
    }
    const pow = { ...DEFAULT_POW, ...config.pow };
    const pos = { ...DEFAULT_POS, ...config.pos };
    positive(pow.successRate, "pow.successRate");
    positive(pow.attemptInterval, "pow.attemptInterval");
    positive(pos.slotDuration, "pos.slotDuration");
    if (!(pos.activeSlotCoeff > 0 && pos.activeSlotCoeff <= 1)) {
        throw new ConfigurationError(
            `must be in (0, 1], got ${pos.activeSlotCoeff}`,
            "pos.activeSlotCoeff",
        );
    }

    const latency: LatencyModel = config.latency ?? DEFAULT_LATENCY;
    if (typeof latency.model !== "function") {
        if (!isDistribution(latency.model)) {
            throw new ConfigurationError("unknown latency distribution", "latency");
        }
        assertNonNegative(latency.model, "latency");
    }

    const weights: WeightDistribution = config.weights ??
        { distribution: "constant", value: 1 };
    validateWeights(weights, nodeIds.length);

    const known = new Set(nodeIds);
    assertKnownNodes(config.miners, known, "miners");
    assertKnownNodes(config.adversaries, known, "adversaries");

    const dropRate = config.dropRate ?? 0;
    if (!(dropRate >= 0 && dropRate < 1)) {
        throw new ConfigurationError(`must be in [0, 1), got ${dropRate}`, "dropRate");
    }
    positive(config.forkCheckInterval, "forkCheckInterval");
    nonNegative(config.startJitter, "startJitter");
    const convergenceDepth = config.convergenceDepth ?? 1;
    if (!(Number.isInteger(convergenceDepth) && convergenceDepth >= 0)) {
        throw new ConfigurationError(
            `must be an integer >= 0, got ${convergenceDepth}`,
            "convergenceDepth",
        );
    }

    return {
        topology: config.topology,
        nodeIds,
        consensus: config.consensus,
        weights,
        pinnedWeights,
        latency,
        pow,
        pos,
        horizon: { maxTime, maxBlocks },
        seed: config.seed,
        miners: config.miners ? [...config.miners] : undefined,
        adversaries: [...(config.adversaries ?? [])],
        dropRate,
        forkCheckInterval: config.forkCheckInterval,
        startJitter: config.startJitter ?? 0,
        convergenceDepth,
    };
}

/** Draws every node's hash power or stake, in node order. */
export function resolveWeights(
    config: ResolvedConfig,
    rng: Rng,
): Map<NodeId, number> {
    const { weights, nodeIds, pinnedWeights } = config;
    const result = new Map<NodeId, number>();
    nodeIds.forEach((id, i) => {
        let w: number;
        if (typeof weights === "function") w = weights(id, i, rng);
        else if (weights.distribution === "explicit") w = weights.values[i];
        else w = sample(weights, rng);
        const pinned = pinnedWeights.get(id);
        if (pinned !== undefined) w = pinned;
        if (!(Number.isFinite(w) && w >= 0)) {
            throw new ConfigurationError(`weight of ${id} must be >= 0, got ${w}`, "weights");
        }
        result.set(id, w);
    });
    if ([...result.values()].every((w) => w === 0)) {
        throw new ConfigurationError("at least one node needs a positive weight", "weights");
    }
    // Without a time bound the run ends only once maxBlocks blocks exist.
    if (config.horizon.maxTime === undefined && config.adversaries.length === 0) {
        const miners = config.miners ?? nodeIds;
        if (!miners.some((id) => (result.get(id) ?? 0) > 0)) {
            throw new ConfigurationError(
                "no miner has a positive weight and horizon.maxTime is unset",
                "miners",
            );
        }
    }
    return result;
}
