export * from "./actions";
export * from "./activities";
export * from "./battle";
export * from "./board";
export * from "./commands";
export * from "./constants";
export * from "./control";
export * from "./dice";
export * from "./errors";
export * from "./events";
export * from "./leaders";
export * from "./map";
export * from "./snapshot";
export * from "./victory";

export { canGatherIn } from "./commands/gather";
export { canRaidIn, MAX_RAID_SPACES } from "./commands/raid";
export { canRabbleRouseIn } from "./commands/rabbleRousing";
export { maxToriesAt, nearBritishPower, MAX_MUSTER_REGULARS, FRENCH_MUSTER_COST } from "./commands/muster";
export { AGENT_MOBILIZATION_PROVINCES } from "./commands/agentMobilization";
export { GARRISON_COST } from "./commands/garrison";
export type { MarchMove } from "./commands/march";
export type { GarrisonMove } from "./commands/garrison";
export type { RallyMove } from "./commands/rally";
export type { GatherMove } from "./commands/gather";
export type { RaidMove } from "./commands/raid";
export { usableWarParties, type CommonCauseMode } from "./activities/commonCause";
export { canWarPathIn } from "./activities/warPath";
export { canPartisansIn } from "./activities/partisans";
export { canTradeIn } from "./activities/trade";
export { canPlunderIn } from "./activities/plunder";
export { canPersuadeIn } from "./activities/persuasion";
export { blockadedCities } from "./activities/navalPressure";
export type { SkirmishOption } from "./activities/skirmish";
export { PREPARER_REGULARS, type PreparerChoice } from "./activities/preparer";
