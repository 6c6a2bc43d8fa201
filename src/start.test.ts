import { mkdtempSync, readFileSync, rmSync } from "fs";
import os from "os";
import path from "path";
import { afterAll, describe, expect, test, vi } from "vitest";
import { ConfigurationError } from "./errors";
import type { SimulationConfig } from "./config/SimulationConfig";
import {
    applyOverrides,
    getExamplePath,
    listExamples,
    startSimulation,
} from "./start";

const base: SimulationConfig = {
    topology: { kind: "ring" },
    nodeCount: 4,
    consensus: "pow",
    horizon: { maxTime: 100 },
    seed: 1,
};

const tmp = mkdtempSync(path.join(os.tmpdir(), "forksim-start-"));
afterAll(() => rmSync(tmp, { recursive: true, force: true }));

describe("Start", () => {
    test("command-line values override the config file", () => {
        expect(applyOverrides(base, { seed: 9, maxBlocks: 5 })).toEqual({
            ...base,
            seed: 9,
            horizon: { maxTime: 100, maxBlocks: 5 },
        });
        expect(applyOverrides(base, {})).toEqual(base);
        expect(base.horizon).toEqual({ maxTime: 100 });
    });

    test("lists the bundled examples", () => {
        expect(listExamples()).toEqual([
            "adversarial-full",
            "custom-triangle",
            "ghost-star",
            "pos-ring",
            "pow-random",
        ]);
        expect(() => getExamplePath("nope")).toThrow(ConfigurationError);
    });

    test("runs an example, writes its trace and prints the summary", async () => {
        const out = vi.spyOn(console, "log").mockImplementation(() => {});
        const tracePath = path.join(tmp, "trace.jsonl");
        try {
            const summary = await startSimulation({
                example: "pos-ring",
                maxTime: 40,
                trace: tracePath,
                logLevel: "NONE",
            });
            const lines = readFileSync(tracePath, "utf8").trimEnd().split("\n");
            const mined = lines.filter((l) => l.startsWith('{"kind":"mined"'));
            expect(mined).toHaveLength(summary.blocksMined);
            const printed = out.mock.calls[out.mock.calls.length - 1];
            expect(String(printed[0]).split("\n")[0]).toBe(
                `blocks mined:        ${summary.blocksMined} (0 forged)`,
            );
        } finally {
            out.mockRestore();
        }
    });

    test("rejects an unknown log level", async () => {
        await expect(
            startSimulation({ example: "pos-ring", logLevel: "LOUD" }),
        ).rejects.toThrow("logLevel: unknown log level LOUD");
    });
});
