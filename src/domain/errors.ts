//
//
//

import { GridSize } from "./structs";

/**
 * Thrown when a grid is created with a non-positive or non-integer dimension.
 */
export class InvalidDimensionError extends Error {
    public constructor(width: number, height: number) {
        super(`Invalid grid dimensions: ${width}x${height}. Both must be positive integers.`);
        this.name = "InvalidDimensionError";
    }
}

/**
 * Thrown when a cell outside the grid is accessed directly.
 */
export class OutOfBoundsError extends Error {
    public constructor(row: number, column: number, size: GridSize) {
        super(`Cell (${row}, ${column}) is outside the ${size.toString()} grid.`);
        this.name = "OutOfBoundsError";
    }
}

/**
 * Thrown when a parameter is outside its allowed range.
 */
export class InvalidParameterError extends Error {
    public constructor(parameter: string, value: unknown, expected: string) {
        super(`Invalid ${parameter}: ${String(value)}. Expected ${expected}.`);
        this.name = "InvalidParameterError";
    }
}

/**
 * Thrown when a pattern is not in the library.
 */
export class UnknownPatternError extends Error {
    public constructor(name: string) {
        super(`Unknown pattern: ${name}.`);
        this.name = "UnknownPatternError";
    }
}

export class ConfigurationError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

/**
 * Thrown when a simulation is started while it is already running.
 */
export class SimulationRunningError extends Error {
    public constructor() {
        super("Simulation is already running.");
        this.name = "SimulationRunningError";
    }
}
