//
//
//

import commandLineArgs, { CommandLineOptions, OptionDefinition } from "command-line-args";

import { ConfigurationError } from "src/domain";
import { Speed, isSpeed } from "src/domain/structs";
import { LOG_LEVELS, LogLevel, isLogLevel } from "src/utils";

export interface CliOptions {
    readonly pattern?: string;
    readonly random: boolean;
    readonly density: number;
    readonly speed: Speed;
    readonly generations: number;
    readonly width: number;
    readonly height: number;
    readonly listPatterns: boolean;
    readonly color: boolean;
    readonly interactive: boolean;
    readonly seed?: number;
    readonly logLevel: LogLevel;
    readonly help: boolean;
}

interface OptionSpec extends OptionDefinition {
    readonly type: StringConstructor | NumberConstructor | BooleanConstructor;
    readonly description: string;
}

const OPTIONS: readonly OptionSpec[] = [
    { name: "pattern", alias: "p", type: String, description: "Pattern to simulate" },
    { name: "random", alias: "r", type: Boolean, description: "Start with random cells" },
    { name: "density", alias: "d", type: Number, description: "Density for random fill (0.0 to 1.0, default: 0.3)" },
    {
        name: "speed",
        alias: "s",
        type: String,
        description: `Simulation speed: ${Object.values(Speed).join(", ")} (default: normal)`,
    },
    { name: "generations", alias: "g", type: Number, description: "Number of generations to run (default: 500)" },
    { name: "width", alias: "W", type: Number, description: "Grid width (default: 70)" },
    { name: "height", alias: "H", type: Number, description: "Grid height (default: 30)" },
    { name: "list-patterns", alias: "l", type: Boolean, description: "List available patterns and exit" },
    { name: "no-color", type: Boolean, description: "Disable colored output" },
    { name: "interactive", alias: "i", type: Boolean, description: "Run interactive menu" },
    { name: "seed", type: Number, description: "Seed for the random fill, for reproducible runs" },
    { name: "log-level", type: String, description: `Log level: ${LOG_LEVELS.join(", ")} (default: warn)` },
    { name: "help", alias: "h", type: Boolean, description: "Show this help and exit" },
];

const DEFAULT_DENSITY = 0.3;

const DEFAULT_GENERATIONS = 500;

const DEFAULT_WIDTH = 70;

const DEFAULT_HEIGHT = 30;

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Collects the options from the environment and the command line.
 * The environment variable of an option is its name in upper case with
 * dashes replaced by underscores (e.g. `LIST_PATTERNS`); command line
 * arguments take precedence over it. Anything left unset gets its default.
 */
export function parseOptions(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): CliOptions {
    const values = new Map<string, unknown>();

    // first check if the corresponding environment variables are set
    for (const option of OPTIONS) {
        const varName = option.name.toUpperCase().replace(/-/g, "_");
        const raw = env[varName];
        if (raw !== undefined && raw !== "") {
            values.set(option.name, fromEnvironment(option, raw));
        }
    }

    // then parse the command line arguments
    let cliArgs: CommandLineOptions;
    try {
        cliArgs = commandLineArgs([...OPTIONS], { argv });
    } catch (err) {
        throw new ConfigurationError(err instanceof Error ? err.message : String(err));
    }
    for (const [name, value] of Object.entries(cliArgs)) {
        values.set(name, value);
    }

    const speed = readString(values, "speed") ?? Speed.NORMAL;
    if (!isSpeed(speed)) {
        throw new ConfigurationError(`Unknown speed "${speed}". Expected one of: ${Object.values(Speed).join(", ")}.`);
    }

    const logLevel = readString(values, "log-level") ?? DEFAULT_LOG_LEVEL;
    if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`Unknown log level "${logLevel}". Expected one of: ${LOG_LEVELS.join(", ")}.`);
    }

    const generations = readNumber(values, "generations") ?? DEFAULT_GENERATIONS;
    if (!Number.isInteger(generations) || generations <= 0) {
        throw new ConfigurationError(`Option --generations expects a positive integer, got ${generations}.`);
    }

    const seed = readNumber(values, "seed");
    if (seed !== undefined && !Number.isInteger(seed)) {
        throw new ConfigurationError(`Option --seed expects an integer, got ${seed}.`);
    }

    return {
        pattern: readString(values, "pattern"),
        random: readFlag(values, "random"),
        density: readNumber(values, "density") ?? DEFAULT_DENSITY,
        speed,
        generations,
        width: readNumber(values, "width") ?? DEFAULT_WIDTH,
        height: readNumber(values, "height") ?? DEFAULT_HEIGHT,
        listPatterns: readFlag(values, "list-patterns"),
        color: !readFlag(values, "no-color"),
        interactive: readFlag(values, "interactive"),
        seed,
        logLevel,
        help: readFlag(values, "help"),
    };
}

/**
 * Returns the help text, one entry per line.
 */
export function usage(): string[] {
    const entries = OPTIONS.map((option) => {
        const alias = option.alias === undefined ? "    " : `-${option.alias}, `;
        const value = option.type === Boolean ? "" : ` <${option.type === Number ? "number" : "string"}>`;
        return [`${alias}--${option.name}${value}`, option.description] as const;
    });
    const column = Math.max(...entries.map(([flags]) => flags.length)) + 2;

    return [
        "Conway's Game of Life - A cellular automaton simulation",
        "",
        "Options:",
        ...entries.map(([flags, description]) => `  ${flags.padEnd(column)}${description}`),
        "",
        "Example: --pattern glider_gun --speed fast",
    ];
}

// ---------------------------------------------------------------------------
// Private API
// ---------------------------------------------------------------------------

function fromEnvironment(option: OptionSpec, raw: string): string | number | boolean {
    // NO_COLOR disables colour whatever its value (https://no-color.org)
    if (option.name === "no-color") {
        return true;
    }
    if (option.type === Boolean) {
        return /^(1|true|yes|on)$/i.test(raw.trim());
    }
    if (option.type === Number) {
        return Number(raw);
    }
    return raw;
}

function readString(values: Map<string, unknown>, name: string): string | undefined {
    const value = values.get(name);
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== "string") {
        throw new ConfigurationError(`Option --${name} expects a value.`);
    }
    return value;
}

function readNumber(values: Map<string, unknown>, name: string): number | undefined {
    const value = values.get(name);
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigurationError(`Option --${name} expects a number.`);
    }
    return value;
}

function readFlag(values: Map<string, unknown>, name: string): boolean {
    const value = values.get(name);
    return value === true;
}
