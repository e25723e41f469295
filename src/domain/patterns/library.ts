//
//
//

import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { UnknownPatternError } from "src/domain/errors";
import { Pattern, PatternCategory, isPatternCategory } from "src/domain/structs";

export interface PatternInfo {
    readonly name: string;
    readonly category: PatternCategory;
    readonly description: string;
    readonly width: number;
    readonly height: number;
}

interface CatalogueEntry {
    category: string;
    description: string;
    rows: string[];
}

/**
 * A read-only collection of named patterns.
 */
export class PatternLibrary {
    private readonly _patterns: ReadonlyMap<string, Pattern>;

    private constructor(patterns: Pattern[]) {
        const sorted = [...patterns].sort((a, b) => a.name.localeCompare(b.name));
        this._patterns = new Map(sorted.map((pattern) => [pattern.name, pattern]));
    }

    /**
     * Builds a library from a catalogue object mapping each pattern name to
     * its category, description and textual rows.
     */
    public static fromCatalogue(catalogue: unknown): PatternLibrary {
        if (typeof catalogue !== "object" || catalogue === null || Array.isArray(catalogue)) {
            throw new Error("Pattern catalogue must be an object.");
        }

        const patterns: Pattern[] = [];
        for (const [name, entry] of Object.entries(catalogue)) {
            if (!isCatalogueEntry(entry)) {
                throw new Error(`Malformed catalogue entry: ${name}.`);
            }
            if (!isPatternCategory(entry.category)) {
                throw new Error(`Unknown category "${entry.category}" for pattern ${name}.`);
            }
            patterns.push(Pattern.fromRows(name, entry.category, entry.description, entry.rows));
        }

        return new PatternLibrary(patterns);
    }

    public static fromFile(filePath: string): PatternLibrary {
        const content: unknown = JSON.parse(readFileSync(filePath, "utf8"));
        return PatternLibrary.fromCatalogue(content);
    }

    public get(name: string): Pattern {
        const pattern = this._patterns.get(name);
        if (pattern === undefined) {
            throw new UnknownPatternError(name);
        }
        return pattern;
    }

    public has(name: string): boolean {
        return this._patterns.has(name);
    }

    /**
     * Returns the pattern names in alphabetical order.
     */
    public names(): string[] {
        return Array.from(this._patterns.keys());
    }

    /**
     * Returns a description of every pattern, in alphabetical order of name.
     */
    public list(): PatternInfo[] {
        return Array.from(this._patterns.values(), (pattern) => ({
            name: pattern.name,
            category: pattern.category,
            description: pattern.description,
            width: pattern.width,
            height: pattern.height,
        }));
    }

    public get size(): number {
        return this._patterns.size;
    }
}

function isCatalogueEntry(value: unknown): value is CatalogueEntry {
    if (typeof value !== "object" || value === null) {
        return false;
    }

    return (
        "category" in value &&
        typeof value.category === "string" &&
        "description" in value &&
        typeof value.description === "string" &&
        "rows" in value &&
        Array.isArray(value.rows) &&
        value.rows.every((row: unknown) => typeof row === "string")
    );
}

const dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * The built-in catalogue, loaded once when the module is first imported.
 */
export const PATTERNS: PatternLibrary = PatternLibrary.fromFile(path.join(dirname, "patterns.json"));
