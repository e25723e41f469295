//
//
//

/**
 * GridSize is a model that represents the size of a grid.
 */
export class GridSize {
    public constructor(
        public readonly rows: number,
        public readonly columns: number,
    ) {}

    public get area(): number {
        return this.rows * this.columns;
    }

    public toString(): string {
        return `${this.columns}x${this.rows}`;
    }
}
