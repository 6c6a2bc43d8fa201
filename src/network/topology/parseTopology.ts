import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { ConfigurationError } from "../../errors";
import type { NodeId } from "../../ledger/Block";
import type { CustomLinks } from "./topology";

/** On-disk shape of a custom topology. */
export interface TopologyFile {
    nodes: Record<NodeId, TopologyFileNode>;
}

export interface TopologyFileNode {
    /** Hash power or stake; overrides the configured weight distribution. */
    weight?: number;
    neighbors: Record<NodeId, { latency?: number }>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isOptionalNonNegative(v: unknown): v is number | undefined {
    return v === undefined ||
        (typeof v === "number" && Number.isFinite(v) && v >= 0);
}

function isTopologyFileNode(v: unknown): v is TopologyFileNode {
    if (!isRecord(v) || !isOptionalNonNegative(v.weight)) return false;
    const neighbors = v.neighbors;
    return isRecord(neighbors) &&
        Object.values(neighbors).every((link) =>
            isRecord(link) && isOptionalNonNegative(link.latency)
        );
}

export function isTopologyFile(v: unknown): v is TopologyFile {
    return isRecord(v) && isRecord(v.nodes) &&
        Object.values(v.nodes).every(isTopologyFileNode);
}

export interface ParsedTopology {
    nodeIds: NodeId[];
    links: CustomLinks;
    /** Only the nodes that declared a weight. */
    weights: Map<NodeId, number>;
}

export function topologyFromFile(topology: TopologyFile): ParsedTopology {
    const nodeIds = Object.keys(topology.nodes);
    const links: CustomLinks = {};
    const weights = new Map<NodeId, number>();
    for (const id of nodeIds) {
        const node = topology.nodes[id];
        links[id] = { ...node.neighbors };
        if (node.weight !== undefined) weights.set(id, node.weight);
    }
    return { nodeIds, links, weights };
}

export async function parseTopology(path: string): Promise<ParsedTopology> {
    if (!existsSync(path)) {
        throw new ConfigurationError(
            "missing topology file at " + path,
            "topology.file",
        );
    }

    let topology: unknown;
    try {
        topology = JSON.parse(await readFile(path, "utf8"));
    } catch (err) {
        throw new ConfigurationError(
            `topology file at ${path} is not valid JSON: ${
                err instanceof Error ? err.message : String(err)
            }`,
            "topology.file",
        );
    }

    if (!isTopologyFile(topology)) {
        throw new ConfigurationError(
            "invalid topology file at " + path,
            "topology.file",
        );
    }

    return topologyFromFile(topology);
}
