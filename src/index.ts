//
//
//

import * as dotenv from "dotenv";
import { Logger } from "winston";

import {
    Grid,
    PATTERNS,
    SCENE_DELAY,
    SCENE_GENERATIONS,
    Simulation,
    buildScene,
    placeCentered,
} from "./domain";
import { speedDelay } from "./domain/structs";
import {
    CliOptions,
    InteractiveMenu,
    TerminalRenderer,
    getColors,
    parseOptions,
    renderPatternList,
    renderSummary,
    usage,
} from "./infrastructure";
import { Duration, Random, createLogger, seededRandom } from "./utils";

interface Run {
    grid: Grid;
    generations: number;
    delay: Duration;
}

function write(lines: string[]) {
    process.stdout.write(`${lines.join("\n")}\n`);
}

async function prepareRun(options: CliOptions, random: Random, logger: Logger): Promise<Run | null> {
    if (options.interactive || (!options.random && options.pattern === undefined)) {
        const menu = new InteractiveMenu(process.stdin, process.stdout, options.color);
        const scene = await menu.choose();
        if (scene === null) {
            return null;
        }

        logger.info(`Selected scene: ${scene.title}.`);
        return { grid: buildScene(scene, random), generations: SCENE_GENERATIONS, delay: SCENE_DELAY };
    }

    const grid = Grid.create(options.width, options.height, random);
    if (options.random) {
        grid.randomize(options.density);
        logger.info(`Random fill with density ${options.density}: ${grid.liveCellCount()} live cells.`);
    } else if (options.pattern !== undefined) {
        placeCentered(grid, PATTERNS.get(options.pattern));
        logger.info(`Placed pattern ${options.pattern}.`);
    }

    return { grid, generations: options.generations, delay: speedDelay(options.speed) };
}

async function main() {
    dotenv.config();

    const options = parseOptions();
    const logger = createLogger(options.logLevel);
    const colors = getColors(options.color);

    if (options.help) {
        write(usage());
        return;
    }

    if (options.listPatterns) {
        write(renderPatternList(PATTERNS, colors));
        return;
    }

    const random = options.seed === undefined ? Math.random : seededRandom(options.seed);
    const run = await prepareRun(options, random, logger);
    if (run === null) {
        return;
    }

    const renderer = new TerminalRenderer(process.stdout, options.color);
    const simulation = new Simulation(run.grid, renderer, { generations: run.generations, delay: run.delay }, logger);

    // Ctrl+C ends the run at the next generation boundary
    const onInterrupt = () => simulation.stop();
    process.on("SIGINT", onInterrupt);
    try {
        const summary = await simulation.run();
        write(renderSummary(summary, colors, options.color));
    } finally {
        process.off("SIGINT", onInterrupt);
    }
}

main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
});
