import { describe, expect, it } from "vitest";

import { Grid, InvalidDimensionError, InvalidParameterError, OutOfBoundsError, PATTERNS } from "src/domain";
import { MOORE_OFFSETS } from "src/domain/structs";
import { liveCells } from "../helpers";

/**
 * Builds an 11x11 grid whose centre cell has `neighbours` live neighbours.
 */
function centreWith(neighbours: number, centreAlive: boolean): Grid {
    const grid = Grid.create(11, 11);
    grid.setCell(5, 5, centreAlive);
    for (const [dr, dc] of MOORE_OFFSETS.slice(0, neighbours)) {
        grid.setCell(5 + dr, 5 + dc, true);
    }
    return grid;
}

describe("Grid.create", () => {
    it("starts all dead at generation zero", () => {
        const grid = Grid.create(12, 7);

        expect(grid.width).toBe(12);
        expect(grid.height).toBe(7);
        expect(grid.generation).toBe(0);
        expect(grid.liveCellCount()).toBe(0);
        expect(grid.cells()).toHaveLength(7);
        expect(grid.cells()[0]).toHaveLength(12);
    });

    it.each([
        [0, 5],
        [5, -1],
        [-3, -3],
        [2.5, 4],
        [Number.NaN, 4],
    ])("rejects %s x %s", (width, height) => {
        expect(() => Grid.create(width, height)).toThrow(InvalidDimensionError);
    });

    it("accepts a single cell grid", () => {
        expect(Grid.create(1, 1).size.area).toBe(1);
    });
});

describe("Grid cell access", () => {
    it("sets and reads single cells", () => {
        const grid = Grid.create(10, 10);
        grid.setCell(5, 5, true);

        expect(grid.isAlive(5, 5)).toBe(true);
        expect(grid.liveCellCount()).toBe(1);

        grid.setCell(5, 5, false);
        expect(grid.isAlive(5, 5)).toBe(false);
        expect(grid.liveCellCount()).toBe(0);
    });

    it.each([
        [-1, 0],
        [0, -1],
        [4, 0],
        [0, 6],
    ])("rejects (%s, %s) on a 6x4 grid and leaves it unchanged", (row, col) => {
        const grid = Grid.create(6, 4);
        grid.setCell(1, 1, true);

        expect(() => grid.setCell(row, col, true)).toThrow(OutOfBoundsError);
        expect(() => grid.isAlive(row, col)).toThrow(OutOfBoundsError);
        expect(() => grid.countLiveNeighbors(row, col)).toThrow(OutOfBoundsError);
        expect(liveCells(grid)).toEqual(["1,1"]);
    });

    it("hands out detached snapshots", () => {
        const grid = Grid.create(3, 3);
        const snapshot = grid.cells();
        snapshot[1][1] = true;

        expect(grid.isAlive(1, 1)).toBe(false);
        expect(grid.liveCellCount()).toBe(0);
    });

    it("clears cells and the generation counter", () => {
        const grid = Grid.create(10, 10);
        grid.setCell(1, 1, true);
        grid.setCell(2, 2, true);
        grid.step();
        grid.clear();

        expect(grid.liveCellCount()).toBe(0);
        expect(grid.generation).toBe(0);
    });
});

describe("Grid.countLiveNeighbors", () => {
    it("counts three neighbours", () => {
        const grid = Grid.create(10, 10);
        grid.setCell(4, 4, true);
        grid.setCell(4, 5, true);
        grid.setCell(5, 6, true);

        expect(grid.countLiveNeighbors(5, 5)).toBe(3);
    });

    it("counts all eight neighbours but not the cell itself", () => {
        const grid = Grid.create(10, 10);
        grid.randomize(1);

        expect(grid.countLiveNeighbors(5, 5)).toBe(8);
    });

    it("sees at most three neighbours in a corner and five on an edge", () => {
        const grid = Grid.create(6, 5);
        grid.randomize(1);

        expect(grid.countLiveNeighbors(0, 0)).toBe(3);
        expect(grid.countLiveNeighbors(4, 5)).toBe(3);
        expect(grid.countLiveNeighbors(0, 3)).toBe(5);
        expect(grid.countLiveNeighbors(2, 0)).toBe(5);
    });

    it("does not wrap around the edges", () => {
        const grid = Grid.create(5, 5);
        grid.setCell(0, 4, true);
        grid.setCell(4, 0, true);
        grid.setCell(4, 4, true);

        expect(grid.countLiveNeighbors(0, 0)).toBe(0);
    });
});

describe("Grid.step", () => {
    it.each([0, 1, 2, 4, 5, 8])("keeps a dead cell with %i neighbours dead", (neighbours) => {
        const grid = centreWith(neighbours, false);
        grid.step();
        expect(grid.isAlive(5, 5)).toBe(false);
    });

    it("brings a dead cell with exactly three neighbours to life", () => {
        const grid = centreWith(3, false);
        grid.step();
        expect(grid.isAlive(5, 5)).toBe(true);
    });

    it.each([0, 1])("kills a live cell with %i neighbours", (neighbours) => {
        const grid = centreWith(neighbours, true);
        grid.step();
        expect(grid.isAlive(5, 5)).toBe(false);
    });

    it.each([2, 3])("keeps a live cell with %i neighbours alive", (neighbours) => {
        const grid = centreWith(neighbours, true);
        grid.step();
        expect(grid.isAlive(5, 5)).toBe(true);
    });

    it.each([4, 5, 6, 7, 8])("kills a live cell with %i neighbours", (neighbours) => {
        const grid = centreWith(neighbours, true);
        grid.step();
        expect(grid.isAlive(5, 5)).toBe(false);
    });

    it("updates every cell from the same snapshot", () => {
        const grid = Grid.create(10, 10);
        grid.setCell(5, 4, true);
        grid.setCell(5, 5, true);
        grid.setCell(5, 6, true);

        grid.step();

        expect(liveCells(grid)).toEqual(["4,5", "5,5", "6,5"]);
    });

    it("increments the generation by one per step", () => {
        const grid = Grid.create(4, 4);
        grid.step();
        grid.step();
        grid.step();
        expect(grid.generation).toBe(3);
    });

    it("keeps a block wedged in a corner intact", () => {
        const grid = Grid.create(4, 4);
        grid.placePattern(PATTERNS.get("block"), 0, 0);
        grid.step();
        expect(liveCells(grid)).toEqual(["0,0", "0,1", "1,0", "1,1"]);
    });
});

describe("Grid.randomize", () => {
    it("fills nothing at density 0 and everything at density 1", () => {
        const grid = Grid.create(9, 6);

        grid.randomize(0);
        expect(grid.liveCellCount()).toBe(0);

        grid.randomize(1);
        expect(grid.liveCellCount()).toBe(54);
    });

    it("draws one number per cell in row-major order from the injected source", () => {
        const draws = [0.1, 0.9, 0.4, 0.6];
        let next = 0;
        const grid = Grid.create(2, 2, () => {
            const value = draws[next % draws.length];
            next += 1;
            return value;
        });

        grid.randomize(0.5);

        expect(next).toBe(4);
        expect(liveCells(grid)).toEqual(["0,0", "1,0"]);
    });

    it("resets the generation counter", () => {
        const grid = Grid.create(6, 6);
        grid.step();
        grid.step();

        grid.randomize(0.5);

        expect(grid.generation).toBe(0);
    });

    it.each([-0.1, 1.5, Number.NaN])("rejects density %s and leaves the grid unchanged", (density) => {
        const grid = Grid.create(5, 5);
        grid.setCell(2, 2, true);

        expect(() => grid.randomize(density)).toThrow(InvalidParameterError);
        expect(liveCells(grid)).toEqual(["2,2"]);
    });
});

describe("Grid.placePattern", () => {
    it("places the pattern relative to its origin", () => {
        const grid = Grid.create(10, 10);
        grid.placePattern(PATTERNS.get("glider"), 2, 3);

        expect(liveCells(grid)).toEqual(["2,4", "3,5", "4,3", "4,4", "4,5"]);
    });

    it("clips offsets outside the grid without failing", () => {
        const grid = Grid.create(5, 5);

        expect(() => grid.placePattern(PATTERNS.get("glider"), -1, -1)).not.toThrow();
        expect(liveCells(grid)).toEqual(["0,1", "1,0", "1,1"]);
    });

    it("clips at the far edges too", () => {
        const grid = Grid.create(5, 5);
        grid.placePattern(PATTERNS.get("block"), 4, 4);

        expect(liveCells(grid)).toEqual(["4,4"]);
    });

    it("adds to the existing cells", () => {
        const grid = Grid.create(8, 8);
        grid.setCell(7, 7, true);
        grid.placePattern(PATTERNS.get("blinker"), 0, 0);

        expect(liveCells(grid)).toEqual(["0,0", "0,1", "0,2", "7,7"]);
    });
});
