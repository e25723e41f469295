//
//
//

import { Random } from "src/utils";
import { InvalidDimensionError, InvalidParameterError, OutOfBoundsError } from "./errors";
import { GridSize, MOORE_OFFSETS, Pattern } from "./structs";

const ALIVE = 1;
const DEAD = 0;

/**
 * A bounded Game of Life universe. Cells outside the grid are permanently
 * dead, so edge cells simply have fewer neighbours.
 *
 * The state lives in two buffers: `step` reads the current one, writes the
 * next generation into the other and then swaps them.
 */
export class Grid {
    public readonly size: GridSize;

    private _current: Uint8Array;

    private _next: Uint8Array;

    private _generation = 0;

    private readonly _random: Random;

    private constructor(size: GridSize, random: Random) {
        this.size = size;
        this._current = new Uint8Array(size.area);
        this._next = new Uint8Array(size.area);
        this._random = random;
    }

    /**
     * Creates an all-dead grid.
     * @param width number of columns.
     * @param height number of rows.
     * @param random source used by {@link Grid.randomize}.
     */
    public static create(width: number, height: number, random: Random = Math.random): Grid {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new InvalidDimensionError(width, height);
        }

        return new Grid(new GridSize(height, width), random);
    }

    // -----------------------------------------------------------------------
    // Accessors
    // -----------------------------------------------------------------------

    public get width(): number {
        return this.size.columns;
    }

    public get height(): number {
        return this.size.rows;
    }

    public get generation(): number {
        return this._generation;
    }

    public isAlive(row: number, col: number): boolean {
        return this._current[this.indexOf(row, col)] === ALIVE;
    }

    public liveCellCount(): number {
        let count = 0;
        for (const cell of this._current) {
            count += cell;
        }
        return count;
    }

    /**
     * Returns a snapshot of the current generation, indexed as `[row][col]`.
     * The snapshot is detached from the grid.
     */
    public cells(): boolean[][] {
        const rows: boolean[][] = [];
        for (let r = 0; r < this.height; r += 1) {
            const row: boolean[] = [];
            const offset = r * this.width;
            for (let c = 0; c < this.width; c += 1) {
                row.push(this._current[offset + c] === ALIVE);
            }
            rows.push(row);
        }
        return rows;
    }

    // -----------------------------------------------------------------------
    // Seeding
    // -----------------------------------------------------------------------

    public setCell(row: number, col: number, alive: boolean): void {
        this._current[this.indexOf(row, col)] = alive ? ALIVE : DEAD;
    }

    /**
     * Brings to life every cell of the pattern, anchored with its top-left
     * corner at the given origin. Offsets falling outside the grid are
     * dropped, and cells not covered by the pattern keep their state.
     */
    public placePattern(pattern: Pattern, originRow: number, originCol: number): void {
        for (const offset of pattern.offsets) {
            const row = originRow + offset.row;
            const col = originCol + offset.column;
            if (this.contains(row, col)) {
                this._current[row * this.width + col] = ALIVE;
            }
        }
    }

    /**
     * Sets every cell alive independently with probability `density` and
     * resets the generation counter.
     */
    public randomize(density: number): void {
        if (!(density >= 0 && density <= 1)) {
            throw new InvalidParameterError("density", density, "a number between 0.0 and 1.0");
        }

        for (let i = 0; i < this._current.length; i += 1) {
            this._current[i] = this._random() < density ? ALIVE : DEAD;
        }
        this._generation = 0;
    }

    /**
     * Kills every cell and resets the generation counter.
     */
    public clear(): void {
        this._current.fill(DEAD);
        this._generation = 0;
    }

    // -----------------------------------------------------------------------
    // Evolution
    // -----------------------------------------------------------------------

    public countLiveNeighbors(row: number, col: number): number {
        this.assertContains(row, col);
        return this.neighboursIn(this._current, row, col);
    }

    /**
     * Advances the universe by one generation (B3/S23).
     */
    public step(): void {
        const current = this._current;
        const next = this._next;

        for (let r = 0; r < this.height; r += 1) {
            for (let c = 0; c < this.width; c += 1) {
                const index = r * this.width + c;
                const neighbours = this.neighboursIn(current, r, c);
                if (current[index] === ALIVE) {
                    next[index] = neighbours === 2 || neighbours === 3 ? ALIVE : DEAD;
                } else {
                    next[index] = neighbours === 3 ? ALIVE : DEAD;
                }
            }
        }

        this._current = next;
        this._next = current;
        this._generation += 1;
    }

    // -----------------------------------------------------------------------
    // Private methods
    // -----------------------------------------------------------------------

    private contains(row: number, col: number): boolean {
        return (
            Number.isInteger(row) &&
            Number.isInteger(col) &&
            row >= 0 &&
            row < this.height &&
            col >= 0 &&
            col < this.width
        );
    }

    private assertContains(row: number, col: number): void {
        if (!this.contains(row, col)) {
            throw new OutOfBoundsError(row, col, this.size);
        }
    }

    private indexOf(row: number, col: number): number {
        this.assertContains(row, col);
        return row * this.width + col;
    }

    private neighboursIn(cells: Uint8Array, row: number, col: number): number {
        let count = 0;
        for (const [dr, dc] of MOORE_OFFSETS) {
            const r = row + dr;
            const c = col + dc;
            if (r >= 0 && r < this.height && c >= 0 && c < this.width) {
                count += cells[r * this.width + c];
            }
        }
        return count;
    }
}
