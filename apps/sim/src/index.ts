export * from "./bots";
export * from "./cards";
export * from "./evaluator";
export { log, type LogLevel, setLogLevel } from "./obs/log";
export { orderByRandomSpaces, randomSpaceWalk } from "./randomSpaces";
export { mulberry32 } from "./rng";
export * from "./sequencer";
export * from "./simulation/config";
export type * from "./types";
export * from "./winterQuarters";
