import {
	type ActionContext,
	type ActionResult,
	COMMANDS,
	type CommandName,
	SPECIAL_ACTIVITIES,
	type SpecialActivityName,
} from "@liberty/engine";
import type { TurnDecision, TurnInput } from "../types";

/** One row of a bot's priority table. */
export type BotRule = {
	name: string;
	when: (input: TurnInput) => boolean;
	run: (input: TurnInput) => ActionResult;
	/** Rule to try once, without its `when`, when this one's action is rejected. */
	fallback?: string;
};

export type RuleRun = {
	result: ActionResult | null;
	/** Rule names in the order they ran. */
	tried: string[];
};

/**
 * Walks the table as a flowchart. Each rule whose `when` holds runs; a rejected
 * action hands over to its fallback once, then the walk moves on to the next
 * rule. A fallback's own fallback is never followed and no rule runs twice.
 */
export function runRules(rules: readonly BotRule[], input: TurnInput): RuleRun {
	const byName = new Map(rules.map((rule) => [rule.name, rule]));
	const tried: string[] = [];
	let result: ActionResult | null = null;
	for (const rule of rules) {
		if (tried.includes(rule.name) || !rule.when(input)) continue;
		const fallback = rule.fallback === undefined ? undefined : byName.get(rule.fallback);
		for (const step of [rule, fallback]) {
			if (step === undefined || tried.includes(step.name)) continue;
			tried.push(step.name);
			result = step.run(input);
			if (result.ok) return { result, tried };
		}
	}
	return { result, tried };
}

/** Special Activity loop: the first rule that applies and succeeds wins. */
export function runSpecials(rules: readonly BotRule[], input: TurnInput): ActionResult | null {
	for (const rule of rules) {
		if (!rule.when(input)) continue;
		const result = rule.run(input);
		if (result.ok) return result;
	}
	return null;
}

export function isCommandName(name: string): name is CommandName {
	return Object.hasOwn(COMMANDS, name);
}

export function isSpecialActivityName(name: string): name is SpecialActivityName {
	return Object.hasOwn(SPECIAL_ACTIVITIES, name);
}

export function usedSpecial(ctx: ActionContext): boolean {
	return ctx.outcomes.some((outcome) => outcome.kind === "special");
}

/** Reads the Command and Special Activity a turn performed from its outcomes. */
export function commandDecision(ctx: ActionContext): TurnDecision {
	let command: CommandName | null = null;
	let special: SpecialActivityName | null = null;
	for (const { kind, name } of ctx.outcomes) {
		if (kind === "command" && command === null && isCommandName(name)) command = name;
		if (kind === "special" && special === null && isSpecialActivityName(name)) special = name;
	}
	return { action: "command", command, special };
}
