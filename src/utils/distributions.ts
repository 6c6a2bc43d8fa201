import { ConfigurationError } from "../errors";
import { type Rng, standardNormal, uniformBetween } from "./rng";

export interface ConstantDistribution {
    distribution: "constant";
    value: number;
}

export interface UniformDistribution {
    distribution: "uniform";
    min: number;
    max: number;
}

/** Samples below zero are clamped to zero. */
export interface NormalDistribution {
    distribution: "normal";
    mean: number;
    stdDev: number;
}

export interface ExpDistribution {
    distribution: "exp";
    lambda: number;
}

export type Distribution =
    | ConstantDistribution
    | UniformDistribution
    | NormalDistribution
    | ExpDistribution;

function isFiniteNumber(v: unknown): v is number {
    return typeof v === "number" && Number.isFinite(v);
}

export function isDistribution(v: unknown): v is Distribution {
    if (typeof v !== "object" || v === null || !("distribution" in v)) {
        return false;
    }
    switch (v.distribution) {
        case "constant":
            return "value" in v && isFiniteNumber(v.value);
        case "uniform":
            return "min" in v && "max" in v && isFiniteNumber(v.min) &&
                isFiniteNumber(v.max);
        case "normal":
            return "mean" in v && "stdDev" in v && isFiniteNumber(v.mean) &&
                isFiniteNumber(v.stdDev);
        case "exp":
            return "lambda" in v && isFiniteNumber(v.lambda);
        default:
            return false;
    }
}

/**
 * Rejects distributions that can produce negative or undefined samples.
 * `field` names the config entry in the thrown error.
 */
export function assertNonNegative(d: Distribution, field: string): void {
    switch (d.distribution) {
        case "constant":
            if (d.value < 0) {
                throw new ConfigurationError("value must be >= 0", field);
            }
            return;
        case "uniform":
            if (d.min < 0 || d.max < d.min) {
                throw new ConfigurationError(
                    "uniform bounds must satisfy 0 <= min <= max",
                    field,
                );
            }
            return;
        case "normal":
            if (d.stdDev < 0) {
                throw new ConfigurationError("stdDev must be >= 0", field);
            }
            return;
        case "exp":
            if (d.lambda <= 0) {
                throw new ConfigurationError("lambda must be > 0", field);
            }
            return;
    }
}

export function sample(d: Distribution, rng: Rng): number {
    switch (d.distribution) {
        case "constant":
            return d.value;
        case "uniform":
            return uniformBetween(rng, d.min, d.max);
        case "normal":
            return Math.max(0, d.mean + d.stdDev * standardNormal(rng));
        case "exp":
            return -Math.log(1 - rng()) / d.lambda;
    }
}
