import path from "path";
import { existsSync, readdirSync } from "fs";
import { writeFile } from "fs/promises";
import { ConfigurationError } from "./errors";
import { loadConfig } from "./config/loadConfig";
import type { SimulationConfig } from "./config/SimulationConfig";
import { Simulation } from "./simulation/Simulation";
import { serializeTrace } from "./simulation/trace";
import {
    formatSummary,
    type SimulationSummary,
    summarize,
} from "./stats/summary";
import { isLogLevelString, logger, logLevelFromString } from "./utils/logger";
import { getExamplesDir } from "./utils/paths";

export interface RunOptions {
    /** Path of a JSON config file. */
    config?: string;
    /** Name of a bundled example, used when no path is given. */
    example?: string;
    seed?: number;
    maxTime?: number;
    maxBlocks?: number;
    /** Where to write the trace as JSON lines. */
    trace?: string;
    logLevel?: string;
}

export function listExamples(): string[] {
    const dir = getExamplesDir();
    if (!existsSync(dir)) return [];
    return readdirSync(dir)
        .filter((f) => f.endsWith(".json"))
        .map((f) => f.slice(0, -".json".length))
        .sort();
}

export function getExamplePath(name: string): string {
    const file = path.join(getExamplesDir(), `${name}.json`);
    if (!existsSync(file)) {
        throw new ConfigurationError(
            `unknown example "${name}"; available: ${listExamples().join(", ")}`,
            "example",
        );
    }
    return file;
}

/** Command-line values win over the file. */
export function applyOverrides(
    config: SimulationConfig,
    options: RunOptions,
): SimulationConfig {
    const horizon = { ...config.horizon };
    if (options.maxTime !== undefined) horizon.maxTime = options.maxTime;
    if (options.maxBlocks !== undefined) horizon.maxBlocks = options.maxBlocks;
    return {
        ...config,
        seed: options.seed ?? config.seed,
        horizon,
    };
}

export async function startSimulation(
    options: RunOptions,
): Promise<SimulationSummary> {
    const configFilePath = options.config ??
        getExamplePath(options.example ?? "pow-random");
    logger.info(`Loading config from ${configFilePath}`);
    const config = applyOverrides(await loadConfig(configFilePath), options);

    if (config.logs) logger.setLogConfig(config.logs);
    if (options.logLevel !== undefined) {
        if (!isLogLevelString(options.logLevel)) {
            throw new ConfigurationError(
                `unknown log level ${options.logLevel}`,
                "logLevel",
            );
        }
        logger.setLogLevel(logLevelFromString(options.logLevel));
    }

    const simulation = new Simulation(config, { logger });
    const result = simulation.run();

    if (options.trace) {
        await writeFile(options.trace, serializeTrace(result.trace));
        logger.info(`Trace written to ${options.trace} (${result.trace.length} records)`);
    }

    const summary = summarize(result.trace, result.snapshots, {
        convergenceDepth: simulation.config.convergenceDepth,
    });
    console.log(formatSummary(summary));
    await logger.flushAll();
    return summary;
}
