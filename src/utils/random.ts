//
//
//

/**
 * A source of uniformly distributed numbers in [0, 1).
 * `Math.random` is one.
 */
export type Random = () => number;

/**
 * Returns a deterministic random source (mulberry32) for the given seed.
 * Two sources built from the same seed produce the same sequence.
 * @param seed any 32-bit integer, larger values are truncated.
 * @returns the random source.
 */
export function seededRandom(seed: number): Random {
    let t = seed >>> 0;
    return () => {
        t = (t + 0x6d2b79f5) >>> 0;
        let r = Math.imul(t ^ (t >>> 15), 1 | t);
        r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
        return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    };
}
