//
//
//

export { GridSize } from "./grid";
export { Position, MOORE_OFFSETS } from "./location";
export { Pattern, PatternCategory, isPatternCategory } from "./pattern";
export { Speed, isSpeed, speedDelay } from "./config";
export type { SimulationOptions } from "./config";
