//
//
//

export type { Frame, Renderer } from "./renderer";
