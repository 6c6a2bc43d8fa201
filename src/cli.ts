import { InvalidArgumentError, program } from "commander";
import { listExamples, startSimulation } from "./start";

function parseNumber(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n)) {
        throw new InvalidArgumentError(`${value} is not a number`);
    }
    return n;
}

function parseInteger(value: string): number {
    const n = parseNumber(value);
    if (!Number.isInteger(n)) {
        throw new InvalidArgumentError(`${value} is not an integer`);
    }
    return n;
}

program.name("forksim");

export function Main() {
    program
        .command("run")
        .description(
            "Run a simulation and print propagation, fork and convergence statistics",
        )
        .argument("[config]", "path to a JSON simulation config")
        .option("--example <name>", "run a bundled example config")
        .option("--seed <n>", "override the config seed", parseInteger)
        .option("--max-time <t>", "override horizon.maxTime", parseNumber)
        .option("--max-blocks <n>", "override horizon.maxBlocks", parseInteger)
        .option("--trace <file>", "write the trace as JSON lines")
        .option("--log-level <level>", "DEBUG, INFO, WARN, ERROR or NONE")
        .action(async (
            config: string | undefined,
            options: {
                example?: string;
                seed?: number;
                maxTime?: number;
                maxBlocks?: number;
                trace?: string;
                logLevel?: string;
            },
        ) => {
            await startSimulation({ config, ...options });
        });

    program
        .command("examples")
        .description("List the bundled example configs")
        .action(() => {
            for (const name of listExamples()) console.log(name);
        });

    return program.parseAsync(process.argv);
}
