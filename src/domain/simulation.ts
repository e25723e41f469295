//
//
//

import EventEmitter from "eventemitter3";
import * as math from "mathjs";
import { Logger } from "winston";

import { Duration, Instant, sleep } from "src/utils";
import { InvalidParameterError, SimulationRunningError } from "./errors";
import { Grid } from "./grid";
import { Frame, Renderer } from "./ports";
import { SimulationOptions } from "./structs";

export enum StopReason {
    COMPLETED = "completed",
    EXTINCT = "extinct",
    STOPPED = "stopped",
}

export interface SimulationSummary {
    readonly reason: StopReason;
    /** Number of steps taken during the run. */
    readonly generations: number;
    readonly finalPopulation: number;
    readonly peakPopulation: number;
    readonly meanPopulation: number;
    readonly populationStdDev: number;
    readonly elapsed: Duration;
}

interface SimulationEvents {
    generation: (frame: Frame) => void;
    extinct: (generation: number) => void;
    finished: (summary: SimulationSummary) => void;
}

/**
 * Drives a grid: draws a frame, waits, steps, and repeats until the
 * generation limit is reached, every cell is dead, or {@link Simulation.stop}
 * is called. Stopping only takes effect between two generations.
 */
export class Simulation {
    private readonly _grid: Grid;

    private readonly _renderer: Renderer;

    private readonly _generations: number;

    private readonly _delay: Duration;

    private readonly _stopWhenExtinct: boolean;

    private readonly _logger: Logger;

    private readonly _broker = new EventEmitter<SimulationEvents>();

    private _running = false;

    private _stopRequested = false;

    public constructor(grid: Grid, renderer: Renderer, options: SimulationOptions, logger: Logger) {
        if (!Number.isInteger(options.generations) || options.generations <= 0) {
            throw new InvalidParameterError("generations", options.generations, "a positive integer");
        }
        if (!Number.isFinite(options.delay.milliseconds) || options.delay.milliseconds < 0) {
            throw new InvalidParameterError("delay", options.delay.toString(), "a non-negative duration");
        }

        this._grid = grid;
        this._renderer = renderer;
        this._generations = options.generations;
        this._delay = options.delay;
        this._stopWhenExtinct = options.stopWhenExtinct ?? true;
        this._logger = logger;
    }

    // -----------------------------------------------------------------------
    // Public methods
    // -----------------------------------------------------------------------

    public get running(): boolean {
        return this._running;
    }

    public async run(): Promise<SimulationSummary> {
        if (this._running) {
            throw new SimulationRunningError();
        }

        this._running = true;
        this._stopRequested = false;

        try {
            return await this.loop();
        } finally {
            this._running = false;
        }
    }

    /**
     * Asks the running simulation to end before its next step.
     */
    public stop(): void {
        if (this._running) {
            this._stopRequested = true;
        }
    }

    public onGeneration(callback: (frame: Frame) => void) {
        this._broker.on("generation", callback);
    }

    public onExtinction(callback: (generation: number) => void) {
        this._broker.on("extinct", callback);
    }

    public onFinished(callback: (summary: SimulationSummary) => void) {
        this._broker.on("finished", callback);
    }

    // -----------------------------------------------------------------------
    // Private methods
    // -----------------------------------------------------------------------

    private async loop(): Promise<SimulationSummary> {
        const start = Instant.now();
        const startGeneration = this._grid.generation;
        const populations = [this._grid.liveCellCount()];
        let reason = StopReason.COMPLETED;

        this._logger.info(
            `Starting simulation on a ${this._grid.size.toString()} grid for up to ${this._generations} generations.`,
        );

        for (let i = 0; i < this._generations; i += 1) {
            const frame = this.snapshot();
            this._renderer.draw(frame);
            this._broker.emit("generation", frame);
            this._logger.debug(`Generation ${frame.generation}: population ${frame.population}.`);

            // eslint-disable-next-line no-await-in-loop
            await sleep(this._delay);
            if (this._stopRequested) {
                reason = StopReason.STOPPED;
                break;
            }

            this._grid.step();
            const population = this._grid.liveCellCount();
            populations.push(population);

            if (population === 0 && this._stopWhenExtinct) {
                reason = StopReason.EXTINCT;
                this._logger.warn(`All cells died at generation ${this._grid.generation}.`);
                this._broker.emit("extinct", this._grid.generation);
                break;
            }
        }

        const summary: SimulationSummary = {
            reason,
            generations: this._grid.generation - startGeneration,
            finalPopulation: this._grid.liveCellCount(),
            peakPopulation: asNumber(math.max(populations)),
            meanPopulation: asNumber(math.mean(populations)),
            populationStdDev: asNumber(math.std(populations, "uncorrected")),
            elapsed: Instant.now().subtract(start),
        };

        this._logger.info(
            `Simulation ${summary.reason} after ${summary.generations} generations ` +
                `(final population ${summary.finalPopulation}, peak ${summary.peakPopulation}).`,
        );
        this._broker.emit("finished", summary);

        return summary;
    }

    private snapshot(): Frame {
        return {
            cells: this._grid.cells(),
            generation: this._grid.generation,
            population: this._grid.liveCellCount(),
        };
    }
}

function asNumber(value: unknown): number {
    if (typeof value !== "number") {
        throw new Error(`Expected a number, got ${String(value)}.`);
    }
    return value;
}
