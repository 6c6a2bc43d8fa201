/** Seeded uniform source in [0, 1). */
export type Rng = () => number;

export function mulberry32(seed: number): Rng {
    let t = seed >>> 0;
    return () => {
        t += 0x6d2b79f5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

// Independent streams per concern, so adding a latency draw or a lost
// message never shifts which mining trials succeed.
export interface RngStreams {
    readonly network: Rng;
    readonly mining: Rng;
    readonly drops: Rng;
}

export function createRngStreams(seed: number): RngStreams {
    return {
        network: mulberry32(seed ^ 0x9e3779b9),
        mining: mulberry32(seed),
        drops: mulberry32(seed ^ 0x85ebca6b),
    };
}

export function uniformBetween(rng: Rng, min: number, max: number): number {
    return min + rng() * (max - min);
}

// Box-Muller; the second variate is discarded to keep one draw pair per call.
export function standardNormal(rng: Rng): number {
    let u = 0;
    while (u === 0) u = rng();
    const v = rng();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
