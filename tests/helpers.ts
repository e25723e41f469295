import { Writable } from "stream";
import { Logger } from "winston";

import { Grid } from "src/domain";
import { Frame, Renderer } from "src/domain/ports";
import { Pattern } from "src/domain/structs";
import { createLogger } from "src/utils";

/**
 * Returns the live cells of the grid as sorted "row,col" keys.
 */
export function liveCells(grid: Grid): string[] {
    const keys: string[] = [];
    for (const [r, row] of grid.cells().entries()) {
        for (const [c, alive] of row.entries()) {
            if (alive) {
                keys.push(`${r},${c}`);
            }
        }
    }
    return keys.sort();
}

/**
 * Returns the cells a pattern occupies at the given origin as sorted keys.
 */
export function patternCells(pattern: Pattern, row: number, col: number): string[] {
    return pattern.offsets.map((offset) => `${row + offset.row},${col + offset.column}`).sort();
}

export function stepTimes(grid: Grid, times: number): void {
    for (let i = 0; i < times; i += 1) {
        grid.step();
    }
}

export function silentLogger(): Logger {
    return createLogger("error", true);
}

export class RecordingRenderer implements Renderer {
    public readonly frames: Frame[] = [];

    public draw(frame: Frame): void {
        this.frames.push(frame);
    }
}

export class MemoryStream extends Writable {
    private readonly _chunks: string[] = [];

    public override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        this._chunks.push(chunk.toString());
        callback();
    }

    public get text(): string {
        return this._chunks.join("");
    }
}
