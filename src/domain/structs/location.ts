//
//
//

export const MOORE_OFFSETS: readonly (readonly [number, number])[] = [
    [-1, -1],
    [-1, 0],
    [-1, 1],
    [0, -1],
    [0, 1],
    [1, -1],
    [1, 0],
    [1, 1],
];

/**
 * A cell coordinate, or an offset from a pattern's top-left corner.
 */
export class Position {
    public constructor(
        public readonly row: number,
        public readonly column: number,
    ) {}
}
