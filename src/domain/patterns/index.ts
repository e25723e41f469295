//
//
//

export { PatternLibrary, PATTERNS } from "./library";
export type { PatternInfo } from "./library";
