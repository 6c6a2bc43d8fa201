import { existsSync } from "fs";
import { readFile } from "fs/promises";
import path from "path";
import { ConfigurationError } from "../errors";
import {
    isTopologyFile,
    parseTopology,
} from "../network/topology/parseTopology";
import { isDistribution } from "../utils/distributions";
import { logger } from "../utils/logger";
import type { SimulationConfig } from "./SimulationConfig";

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isOptional<T>(v: unknown, guard: (x: unknown) => x is T): boolean {
    return v === undefined || guard(v);
}

function isNumber(v: unknown): v is number {
    return typeof v === "number";
}

function isStringArray(v: unknown): v is string[] {
    return Array.isArray(v) && v.every((s) => typeof s === "string");
}

function isWeights(v: unknown): boolean {
    if (isDistribution(v)) return true;
    return isRecord(v) && v.distribution === "explicit" &&
        Array.isArray(v.values) && v.values.every(isNumber);
}

/**
 * Shape check for a JSON config file. Value ranges are left to
 * `resolveConfig`, which reports the offending field.
 */
export function isSimulationConfigFile(v: unknown): v is SimulationConfig {
    if (!isRecord(v)) return false;
    const { topology, horizon, latency } = v;
    return (
        isRecord(topology) &&
        typeof topology.kind === "string" &&
        isOptional(topology.edgeProbability, isNumber) &&
        (topology.file === undefined || typeof topology.file === "string") &&
        (topology.nodes === undefined ||
            isTopologyFile({ nodes: topology.nodes })) &&
        (v.consensus === "pow" || v.consensus === "pos" ||
            v.consensus === "ghost") &&
        (v.nodeCount === undefined || isNumber(v.nodeCount)) &&
        isNumber(v.seed) &&
        isRecord(horizon) &&
        isOptional(horizon.maxTime, isNumber) &&
        isOptional(horizon.maxBlocks, isNumber) &&
        (v.weights === undefined || isWeights(v.weights)) &&
        (latency === undefined ||
            (isRecord(latency) && isDistribution(latency.model) &&
                (latency.jitter === undefined ||
                    typeof latency.jitter === "boolean"))) &&
        (v.pow === undefined || isRecord(v.pow)) &&
        (v.pos === undefined || isRecord(v.pos)) &&
        isOptional(v.miners, isStringArray) &&
        isOptional(v.adversaries, isStringArray) &&
        isOptional(v.dropRate, isNumber) &&
        isOptional(v.forkCheckInterval, isNumber) &&
        isOptional(v.startJitter, isNumber) &&
        isOptional(v.convergenceDepth, isNumber) &&
        (v.logs === undefined || isRecord(v.logs))
    );
}

/**
 * Reads a JSON config file. A custom topology `file` is resolved relative to
 * the config and inlined under `topology.nodes`.
 */
export async function loadConfig(filePath: string): Promise<SimulationConfig> {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(filePath, "utf8"));
    } catch (err) {
        throw new ConfigurationError(
            `Config file ${filePath} is not valid JSON: ${
                err instanceof Error ? err.message : String(err)
            }`,
        );
    }
    if (!isSimulationConfigFile(raw)) {
        throw new ConfigurationError(`Config file ${filePath} has an invalid shape`);
    }

    const config = raw;
    if (config.topology.kind === "custom" && config.topology.file) {
        const topologyPath = path.resolve(
            path.dirname(filePath),
            config.topology.file,
        );
        logger.debug(`Loading topology from ${topologyPath}`);
        const parsed = await parseTopology(topologyPath);
        config.topology = {
            ...config.topology,
            nodes: Object.fromEntries(parsed.nodeIds.map((id) => [id, {
                weight: parsed.weights.get(id),
                neighbors: parsed.links[id] ?? {},
            }])),
        };
    }
    return config;
}
