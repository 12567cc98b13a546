export { WallClock } from "./wall-clock.js";
export type { Clock } from "./types.js";
