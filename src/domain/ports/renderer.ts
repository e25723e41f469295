//
//
//

/**
 * A single generation as seen by a presentation layer.
 */
export interface Frame {
    /** Snapshot of the cells, indexed as `[row][col]`. */
    readonly cells: readonly (readonly boolean[])[];
    readonly generation: number;
    readonly population: number;
}

export interface Renderer {
    /**
     * Presents the given frame. Called once per generation, before the
     * simulation advances.
     * @param frame The frame to present.
     */
    draw(frame: Frame): void;
}
