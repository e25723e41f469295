//
//
//

import * as readline from "node:readline";

import { FALLBACK_SCENE, SCENES, Scene, findScene } from "src/domain";
import { CLEAR_SCREEN, Colors, getColors } from "./terminal";

export const QUIT_KEY = "q";

/**
 * Text-mode menu that lets the user pick one of the ready-made scenes.
 */
export class InteractiveMenu {
    private readonly _input: NodeJS.ReadableStream;

    private readonly _output: NodeJS.WritableStream;

    private readonly _colors: Colors;

    private readonly _clearScreen: boolean;

    public constructor(
        input: NodeJS.ReadableStream = process.stdin,
        output: NodeJS.WritableStream = process.stdout,
        useColor = true,
        clearScreen = true,
    ) {
        this._input = input;
        this._output = output;
        this._colors = getColors(useColor);
        this._clearScreen = clearScreen;
    }

    public render(): string[] {
        const c = this._colors;
        const lines = [
            "",
            c.cyan(`╔${"═".repeat(40)}╗`),
            `${c.cyan("║")}${c.bold(c.green("   CONWAY'S GAME OF LIFE".padEnd(40)))}${c.cyan("║")}`,
            `${c.cyan("║")}${c.magenta("   A cellular automaton in your shell".padEnd(40))}${c.cyan("║")}`,
            c.cyan(`╚${"═".repeat(40)}╝`),
            "",
            c.blue("Select a demo:"),
            "",
        ];

        for (const scene of SCENES) {
            lines.push(`  ${c.green(`${scene.key}.`)} ${scene.title}`);
        }
        lines.push(`  ${c.green(`${QUIT_KEY}.`)} Quit`);

        return lines;
    }

    /**
     * Shows the menu and waits for a choice.
     * @returns the chosen scene, or null if the user quits.
     */
    public async choose(): Promise<Scene | null> {
        const c = this._colors;
        const prefix = this._clearScreen ? CLEAR_SCREEN : "";
        this._output.write(`${prefix}${this.render().join("\n")}\n`);

        const answer = (await this.ask(c.cyan(`\nEnter choice (1-${SCENES.length} or ${QUIT_KEY}): `)))
            .trim()
            .toLowerCase();

        if (answer === QUIT_KEY) {
            this._output.write(`\n${c.magenta("Thanks for playing! Life finds a way...")}\n\n`);
            return null;
        }

        const scene = findScene(answer);
        if (scene === FALLBACK_SCENE) {
            this._output.write(`\n${c.yellow("Invalid choice. Running random soup!")}\n`);
        }

        return scene;
    }

    private ask(question: string): Promise<string> {
        const rl = readline.createInterface({ input: this._input, output: this._output });

        return new Promise((resolve) => {
            // closing the input (Ctrl+D) or interrupting counts as quitting
            rl.once("close", () => resolve(QUIT_KEY));
            rl.once("SIGINT", () => rl.close());
            rl.question(question, (answer) => {
                resolve(answer);
                rl.close();
            });
        });
    }
}
