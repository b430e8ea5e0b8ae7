import { type Faction, playEvent } from "@liberty/engine";
import { evaluateEvent } from "../evaluator";
import type { FactionBot } from "../types";
import { type BotRule, commandDecision, runRules, runSpecials, usedSpecial } from "./rules";

/**
 * A bot built from two priority tables: Commands (first match, with one
 * fallback each) and the Special Activity loop that follows a Command.
 */
export function makeRuleBot(opts: {
	faction: Faction;
	name: string;
	commands: readonly BotRule[];
	specials: readonly BotRule[];
}): FactionBot {
	return {
		faction: opts.faction,
		name: opts.name,
		takeTurn: (input) => {
			const { board, faction, card, slot, ctx } = input;
			if (slot.eventAllowed && slot.actions.includes("event")) {
				const decision = evaluateEvent(board, faction, card, ctx.rng);
				if (decision.play) {
					const played = playEvent(board, { faction, cardId: card.id, shaded: decision.shaded }, ctx);
					if (played.ok) return { action: "event", shaded: decision.shaded, reason: decision.reason };
				}
			}
			if (!slot.actions.includes("command")) return { action: "pass", reason: "no Command open" };

			const { result, tried } = runRules(opts.commands, input);
			if (result === null) return { action: "pass", reason: "no rule applies" };
			if (!result.ok) return { action: "pass", reason: `${tried.join(" > ")}: ${result.error}` };

			if (slot.specialAllowed && !usedSpecial(ctx)) runSpecials(opts.specials, input);
			return commandDecision(ctx);
		},
	};
}
