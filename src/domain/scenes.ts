//
//
//

import { Duration, Random } from "src/utils";
import { Grid } from "./grid";
import { PATTERNS, PatternLibrary } from "./patterns";
import { Pattern, Position } from "./structs";

export const SCENE_WIDTH = 70;

export const SCENE_HEIGHT = 30;

export const SCENE_GENERATIONS = 500;

export const SCENE_DELAY = Duration.fromMilliseconds(100);

/**
 * A ready-made starting position offered by the interactive menu.
 */
export interface Scene {
    readonly key: string;
    readonly title: string;
    seed(grid: Grid, library: PatternLibrary): void;
}

type Placement = readonly [name: string, row: number, column: number];

function placements(key: string, title: string, items: readonly Placement[]): Scene {
    return {
        key,
        title,
        seed(grid, library) {
            for (const [name, row, column] of items) {
                grid.placePattern(library.get(name), row, column);
            }
        },
    };
}

function soup(key: string, title: string, density: number): Scene {
    return {
        key,
        title,
        seed(grid) {
            grid.randomize(density);
        },
    };
}

const fleet: Placement[] = [];
for (let i = 0; i < 5; i += 1) {
    fleet.push(["lightweight_spaceship", 3 + i * 5, 5]);
    fleet.push(["glider", 5 + i * 5, 50]);
}

export const SCENES: readonly Scene[] = [
    placements("1", "Glider Gun (infinite gliders!)", [["glider_gun", 2, 2]]),
    soup("2", "Random Soup (chaotic life)", 0.35),
    placements("3", "Pulsar (beautiful oscillator)", [["pulsar", 8, 28]]),
    placements("4", "Acorn (small seed, huge growth)", [["acorn", 15, 35]]),
    placements("5", "R-pentomino (legendary chaos)", [["r_pentomino", 15, 35]]),
    placements("6", "Spaceship Fleet", fleet),
    placements("7", "Pattern Zoo (multiple patterns)", [
        ["glider", 2, 5],
        ["blinker", 5, 20],
        ["toad", 10, 5],
        ["beacon", 10, 20],
        ["pulsar", 15, 30],
        ["block", 3, 60],
        ["beehive", 8, 55],
        ["loaf", 12, 60],
    ]),
];

/** Used when the menu choice matches no scene. */
export const FALLBACK_SCENE: Scene = soup("?", "Random Soup", 0.3);

/**
 * Returns the scene bound to the given menu key, or the fallback scene.
 */
export function findScene(key: string): Scene {
    const normalized = key.trim().toLowerCase();
    return SCENES.find((scene) => scene.key === normalized) ?? FALLBACK_SCENE;
}

/**
 * Creates a scene-sized grid and seeds it with the given scene.
 */
export function buildScene(scene: Scene, random: Random = Math.random, library: PatternLibrary = PATTERNS): Grid {
    const grid = Grid.create(SCENE_WIDTH, SCENE_HEIGHT, random);
    scene.seed(grid, library);
    return grid;
}

/**
 * Returns the origin that centres the pattern on the grid. Patterns larger
 * than the grid are anchored at the top-left corner and get clipped.
 */
export function centeredOrigin(grid: Grid, pattern: Pattern): Position {
    return new Position(
        Math.max(0, Math.floor((grid.height - pattern.height) / 2)),
        Math.max(0, Math.floor((grid.width - pattern.width) / 2)),
    );
}

export function placeCentered(grid: Grid, pattern: Pattern): void {
    const origin = centeredOrigin(grid, pattern);
    grid.placePattern(pattern, origin.row, origin.column);
}
