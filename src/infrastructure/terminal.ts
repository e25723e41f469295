//
//
//

import pc from "picocolors";

import { PatternLibrary, SimulationSummary, StopReason } from "src/domain";
import { Frame, Renderer } from "src/domain/ports";
import { fitText } from "src/utils";

export type Colors = ReturnType<typeof pc.createColors>;

export const CLEAR_SCREEN = "\x1b[2J\x1b[H";

const TITLE = "Conway's Game of Life";

const CELL_GLYPHS = ["█", "▓", "●", "◆", "★"];

/**
 * Returns the color palette, or a palette of identity functions when color
 * is disabled.
 */
export function getColors(useColor: boolean): Colors {
    return pc.createColors(useColor);
}

// ---------------------------------------------------------------------------
// TerminalRenderer
// ---------------------------------------------------------------------------

/**
 * Draws frames as a bordered block of text, clearing the screen first.
 */
export class TerminalRenderer implements Renderer {
    private readonly _output: NodeJS.WritableStream;

    private readonly _useColor: boolean;

    private readonly _colors: Colors;

    public constructor(output: NodeJS.WritableStream = process.stdout, useColor = true) {
        this._output = output;
        this._useColor = useColor;
        this._colors = getColors(useColor);
    }

    public draw(frame: Frame): void {
        const hint = this._colors.dim("Press Ctrl+C to stop");
        this._output.write(`${CLEAR_SCREEN}${this.render(frame).join("\n")}\n\n${hint}\n`);
    }

    /**
     * Renders the frame without writing it anywhere.
     * @returns one string per line, without trailing newlines.
     */
    public render(frame: Frame): string[] {
        const c = this._colors;
        const width = frame.cells.length > 0 ? frame.cells[0].length : 0;
        const inner = width + 2;

        const border = (text: string) => c.blue(text);
        const boxed = (text: string) => `${border("║")}${text}${border("║")}`;
        const rule = (left: string, right: string) => border(`${left}${"═".repeat(inner)}${right}`);

        const lines = [c.bold(rule("╔", "╗")), boxed(c.cyan(fitText(` ${TITLE}`, inner))), rule("╠", "╣")];

        for (const [r, row] of frame.cells.entries()) {
            const glyphs = row.map((alive, col) => this.glyph(alive, r, col));
            lines.push(boxed(` ${glyphs.join("")} `));
        }

        const separator = this._useColor ? "│" : "|";
        const stats =
            ` Generation: ${String(frame.generation).padStart(5)} ${separator} ` +
            `Population: ${String(frame.population).padStart(5)}`;

        lines.push(rule("╠", "╣"));
        lines.push(boxed(c.green(fitText(stats, inner))));
        lines.push(rule("╚", "╝"));

        return lines;
    }

    private glyph(alive: boolean, row: number, col: number): string {
        const c = this._colors;
        if (!alive) {
            return this._useColor ? c.dim("·") : " ";
        }

        const palette = [c.cyan, c.green, c.yellow, c.magenta, c.white];
        const idx = (row + col) % CELL_GLYPHS.length;
        return palette[idx](CELL_GLYPHS[idx]);
    }
}

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

export function renderPatternList(library: PatternLibrary, colors: Colors): string[] {
    const lines = ["", colors.bold(colors.blue("Available Patterns:")), ""];

    for (const info of library.list()) {
        const size = `(${info.width}x${info.height})`;
        lines.push(
            `  ${colors.green(info.name.padEnd(22))} ${size.padEnd(8)} ${colors.dim(`[${info.category}]`)} ${info.description}`,
        );
    }

    lines.push("", colors.dim("Use --pattern <name> to run a specific pattern"), "");
    return lines;
}

export function renderSummary(summary: SimulationSummary, colors: Colors, useEmoji = true): string[] {
    let headline: string;
    switch (summary.reason) {
        case StopReason.EXTINCT:
            headline = `${useEmoji ? "💀 " : ""}All cells have died! Game over.`;
            break;
        case StopReason.STOPPED:
            headline = `${useEmoji ? "👋 " : ""}Simulation stopped!`;
            break;
        default:
            headline = "Simulation complete.";
            break;
    }

    const stats =
        `Generations: ${summary.generations} | ` +
        `Final population: ${summary.finalPopulation} | ` +
        `Peak: ${summary.peakPopulation} | ` +
        `Mean: ${summary.meanPopulation.toFixed(2)} (σ ${summary.populationStdDev.toFixed(2)})`;

    return ["", colors.bold(headline), colors.dim(stats), ""];
}
