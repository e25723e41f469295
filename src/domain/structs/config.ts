//
//
//

import { Duration } from "src/utils";

export enum Speed {
    SLOW = "slow",
    NORMAL = "normal",
    FAST = "fast",
    LUDICROUS = "ludicrous",
}

const SPEED_DELAYS: Record<Speed, Duration> = {
    [Speed.SLOW]: Duration.fromMilliseconds(300),
    [Speed.NORMAL]: Duration.fromMilliseconds(150),
    [Speed.FAST]: Duration.fromMilliseconds(80),
    [Speed.LUDICROUS]: Duration.fromMilliseconds(20),
};

const SPEEDS: ReadonlySet<string> = new Set<string>(Object.values(Speed));

export function isSpeed(value: string): value is Speed {
    return SPEEDS.has(value);
}

/**
 * Returns the delay between two generations for the given speed preset.
 */
export function speedDelay(speed: Speed): Duration {
    return SPEED_DELAYS[speed];
}

export interface SimulationOptions {
    /** Maximum number of generations to run. */
    readonly generations: number;
    /** Pause between two generations. */
    readonly delay: Duration;
    /** Whether the run ends as soon as every cell is dead. Defaults to true. */
    readonly stopWhenExtinct?: boolean;
}
