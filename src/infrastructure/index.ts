//
//
//

export { TerminalRenderer, CLEAR_SCREEN, getColors, renderPatternList, renderSummary } from "./terminal";
export type { Colors } from "./terminal";
export { InteractiveMenu, QUIT_KEY } from "./menu";
export { parseOptions, usage } from "./options";
export type { CliOptions } from "./options";
