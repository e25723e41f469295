//
//
//

export { Grid } from "./grid";
export { Simulation, StopReason } from "./simulation";
export type { SimulationSummary } from "./simulation";
export {
    SCENES,
    FALLBACK_SCENE,
    SCENE_WIDTH,
    SCENE_HEIGHT,
    SCENE_GENERATIONS,
    SCENE_DELAY,
    findScene,
    buildScene,
    centeredOrigin,
    placeCentered,
} from "./scenes";
export type { Scene } from "./scenes";
export { PatternLibrary, PATTERNS } from "./patterns";
export type { PatternInfo } from "./patterns";
export {
    ConfigurationError,
    InvalidDimensionError,
    InvalidParameterError,
    OutOfBoundsError,
    SimulationRunningError,
    UnknownPatternError,
} from "./errors";
