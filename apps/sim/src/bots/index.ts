import type { Faction } from "@liberty/engine";
import type { FactionBot } from "../types";
import { makeBritishBot } from "./british";
import { makeFrenchBot } from "./french";
import { makeIndianBot } from "./indians";
import { makePatriotBot } from "./patriots";

export function makeBots(): Record<Faction, FactionBot> {
	return {
		BRITISH: makeBritishBot(),
		PATRIOTS: makePatriotBot(),
		FRENCH: makeFrenchBot(),
		INDIANS: makeIndianBot(),
	};
}

export { makeBritishBot, makeFrenchBot, makeIndianBot, makePatriotBot };
export { makeRuleBot } from "./ruleBot";
export type { BotRule, RuleRun } from "./rules";
