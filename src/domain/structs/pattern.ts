//
//
//

import { Position } from "./location";

export enum PatternCategory {
    STILL_LIFE = "still life",
    OSCILLATOR = "oscillator",
    SPACESHIP = "spaceship",
    GUN = "gun",
    METHUSELAH = "methuselah",
}

const LIVE_MARKERS = new Set(["O", "#", "*"]);

/**
 * An immutable set of live cells, expressed as offsets from the top-left
 * corner of the pattern's bounding box.
 */
export class Pattern {
    public readonly offsets: readonly Position[];

    private constructor(
        public readonly name: string,
        public readonly category: PatternCategory,
        public readonly description: string,
        offsets: Position[],
        public readonly width: number,
        public readonly height: number,
    ) {
        this.offsets = Object.freeze(offsets);
        Object.freeze(this);
    }

    /**
     * Builds a pattern from its textual picture. Each string is a row; the
     * characters `O`, `#` and `*` mark live cells, anything else is dead.
     */
    public static fromRows(
        name: string,
        category: PatternCategory,
        description: string,
        rows: readonly string[],
    ): Pattern {
        const offsets: Position[] = [];
        let width = 0;

        for (const [r, line] of rows.entries()) {
            const chars = Array.from(line);
            width = Math.max(width, chars.length);
            for (const [c, char] of chars.entries()) {
                if (LIVE_MARKERS.has(char)) {
                    offsets.push(Object.freeze(new Position(r, c)));
                }
            }
        }

        return new Pattern(name, category, description, offsets, width, rows.length);
    }

    public get population(): number {
        return this.offsets.length;
    }
}

const CATEGORIES: ReadonlySet<string> = new Set<string>(Object.values(PatternCategory));

export function isPatternCategory(value: string): value is PatternCategory {
    return CATEGORIES.has(value);
}
