import {
	type ActionContext,
	type ActionOutcome,
	type Board,
	BRILLIANT_STROKE_CARDS,
	checkVictory,
	cloneBoard,
	createActionContext,
	createBoard,
	type Faction,
	FACTIONS,
	finalScoring,
	gainResources,
	PASS_REWARD,
	preparations,
	pushHistory,
	type Rng,
	TREATY_OF_ALLIANCE_CARD,
	TREATY_THRESHOLD,
	treatyOfAlliance,
} from "@liberty/engine";
import { makeBots } from "./bots";
import { type Card, cardLookup, factionOrder, isWinterQuarters, type Scenario } from "./cards";
import { log } from "./obs/log";
import { mulberry32 } from "./rng";
import type {
	FactionBot,
	GameEndReason,
	GameResult,
	HumanDecider,
	SlotOptions,
	TurnDecision,
	TurnRecord,
} from "./types";
import { resolveWinterQuarters } from "./winterQuarters";

// --- Slot options -------------------------------------------------------------

export const FIRST_SLOT: SlotOptions = {
	actions: ["pass", "event", "command"],
	limitedOnly: false,
	specialAllowed: true,
	eventAllowed: true,
};

/** Options for the second faction, given what the first one did. Null means no one has acted. */
export function slotOptions(prior: TurnDecision | null): SlotOptions {
	if (prior === null || prior.action === "pass") return FIRST_SLOT;
	if (prior.action === "event") {
		return { actions: ["pass", "command"], limitedOnly: false, specialAllowed: true, eventAllowed: false };
	}
	if (prior.special !== null) {
		return { actions: ["pass", "command", "event"], limitedOnly: true, specialAllowed: false, eventAllowed: true };
	}
	return { actions: ["pass", "command"], limitedOnly: true, specialAllowed: false, eventAllowed: false };
}

/** Spaces a Command touched; Hortalez has none but still counts as one. */
function commandSpaces(outcome: ActionOutcome): number {
	if (outcome.name === "HORTALEZ") return 1;
	return outcome.spaces.length;
}

/** Returns why a decision breaks the slot's options, or null when it fits. */
export function checkSlot(
	slot: SlotOptions,
	decision: TurnDecision,
	outcomes: readonly ActionOutcome[],
): string | null {
	if (!slot.actions.includes(decision.action)) return `${decision.action} is not open in this slot`;
	if (decision.action !== "command") return null;

	const commands = outcomes.filter((o) => o.kind === "command");
	const specials = outcomes.filter((o) => o.kind === "special");
	if (outcomes.some((o) => o.kind === "event")) return "an Event was played during a Command";
	if (commands.length > 1) return "only one Command per turn";
	if (specials.length > 1) return "only one Special Activity per turn";
	if (specials.length > 0 && !slot.specialAllowed) return "no Special Activity in this slot";

	const [command] = commands;
	if (command === undefined) {
		return specials.length > 0 ? null : "the Command did nothing";
	}
	const spaces = commandSpaces(command);
	if (spaces < 1) return `${command.name} affected no space`;
	if (slot.limitedOnly && spaces !== 1) return `Limited ${command.name} must affect exactly one space`;
	return null;
}

// --- Game ---------------------------------------------------------------------

export type GameOptions = {
	scenario: Scenario;
	seed: number;
	maxCards: number;
	humans?: readonly Faction[];
	/** Required when `humans` is non-empty. */
	humanDecider?: HumanDecider;
	bots?: Record<Faction, FactionBot>;
};

export type Game = {
	board: Board;
	rng: Rng;
	humans: readonly Faction[];
	decide: (faction: Faction) => FactionBot["takeTurn"];
	eligible: Record<Faction, boolean>;
	turns: TurnRecord[];
	/** Winter Quarters rounds played so far. */
	winters: number;
	britishRelease: readonly number[];
};

type TurnResult = {
	decision: TurnDecision;
	ctx: ActionContext;
	record: TurnRecord;
};

function allEligible(): Record<Faction, boolean> {
	return { BRITISH: true, PATRIOTS: true, FRENCH: true, INDIANS: true };
}

/**
 * Runs one faction's turn on a scratch copy of the board and commits it only
 * when the result fits the slot. Anything else becomes a Pass.
 */
export function resolveTurn(game: Game, faction: Faction, card: Card, slot: SlotOptions): TurnResult {
	const scratch = cloneBoard(game.board);
	const ctx = createActionContext(game.rng, game.humans);
	let decision = game.decide(faction)({ board: scratch, faction, card, slot, ctx });
	let rejected: string | undefined;

	const problem = checkSlot(slot, decision, ctx.outcomes);
	if (problem !== null) {
		log("warn", "turn rejected", { faction, cardId: card.id, problem });
		rejected = problem;
		decision = { action: "pass", reason: problem };
	}

	const record: TurnRecord = { faction, cardId: card.id, action: decision.action, spaces: [], deltas: [] };
	if (rejected !== undefined) record.rejected = rejected;

	if (decision.action === "pass") {
		gainResources(game.board, faction, PASS_REWARD[faction]);
		return { decision, ctx, record };
	}

	Object.assign(game.board, scratch);
	record.spaces = [...new Set(ctx.outcomes.flatMap((o) => o.spaces))];
	record.deltas = ctx.outcomes.flatMap((o) => o.deltas);
	if (decision.action === "command") {
		if (decision.command !== null) record.command = decision.command;
		if (decision.special !== null) record.special = decision.special;
	}
	return { decision, ctx, record };
}

/** Runs a Winter Quarters round; returns true when it was the last one. */
function playWinterQuarters(game: Game, card: Card, next: Card | null, finalRound: boolean): boolean {
	const report = resolveWinterQuarters(game.board, {
		cardId: card.id,
		rng: game.rng,
		nextFirst: next === null ? null : (factionOrder(next)[0] ?? null),
		release: game.britishRelease[game.winters] ?? 0,
		finalRound,
	});
	game.winters += 1;
	if (!report.final) game.eligible = allEligible();
	log("info", "winter quarters", { cardId: card.id, gained: report.gained, final: report.final });
	return report.final;
}

/**
 * Takes the next card off the deck. A Winter Quarters card lying right behind
 * it is played first and the card it jumped stays on top.
 */
export function drawCard(deck: number[]): number | undefined {
	const [top, behind] = deck;
	if (top !== undefined && behind !== undefined && isWinterQuarters(behind)) {
		deck[0] = behind;
		deck[1] = top;
	}
	return deck.shift();
}

function playBrilliantStroke(game: Game, card: Card): void {
	if (card.id === TREATY_OF_ALLIANCE_CARD && !game.board.toaPlayed) {
		const result = treatyOfAlliance(game.board, createActionContext(game.rng, game.humans));
		if (result.ok) {
			log("info", "treaty of alliance", { cardId: card.id, fni: game.board.fni });
			return;
		}
		pushHistory(game.board, {
			type: "note",
			message: `Treaty of Alliance not ready: preparations ${preparations(game.board)} of ${TREATY_THRESHOLD}`,
			cardId: card.id,
		});
		return;
	}
	pushHistory(game.board, { type: "note", message: "Brilliant Stroke skipped", cardId: card.id });
}

/** Plays one Event card: up to two factions act, in card order, among the Eligible. */
export function playEventCard(game: Game, card: Card): void {
	const queue = factionOrder(card).filter((f) => game.eligible[f]);
	const executed = new Set<Faction>();
	const remain = new Set<Faction>();
	const forced = new Set<Faction>();
	const dropped = new Set<Faction>();
	let prior: TurnDecision | null = null;
	let acted = 0;

	for (const faction of queue) {
		if (acted >= 2) break;
		if (dropped.has(faction)) continue;
		const { decision, ctx, record } = resolveTurn(game, faction, card, slotOptions(prior));
		game.turns.push(record);
		log("info", "turn", {
			cardId: card.id,
			faction,
			action: decision.action,
			command: record.command,
			special: record.special,
			spaces: record.spaces,
			reason: decision.action === "command" ? undefined : decision.reason,
		});
		if (decision.action === "pass") continue;

		executed.add(faction);
		prior = decision;
		acted += 1;
		for (const [target, effect] of Object.entries(ctx.eligibility)) {
			if (!isFaction(target) || effect === undefined) continue;
			if (effect === "remainEligible") remain.add(target);
			else forced.add(target);
			if (effect === "ineligibleThroughNext") dropped.add(target);
		}
	}

	for (const faction of FACTIONS) {
		game.eligible[faction] = !(executed.has(faction) && !remain.has(faction)) && !forced.has(faction);
	}
}

function isFaction(value: string): value is Faction {
	return FACTIONS.some((f) => f === value);
}

export function createGame(opts: GameOptions): Game {
	const humans = opts.humans ?? [];
	const humanDecider = opts.humanDecider;
	if (humans.length > 0 && humanDecider === undefined) {
		throw new Error("A human decider is required when humans play");
	}
	const bots = opts.bots ?? makeBots();
	return {
		board: createBoard(opts.scenario.board),
		rng: mulberry32(opts.seed),
		humans,
		decide: (faction) =>
			humans.includes(faction) && humanDecider !== undefined ? humanDecider : bots[faction].takeTurn,
		eligible: allEligible(),
		turns: [],
		winters: 0,
		britishRelease: opts.scenario.britishRelease,
	};
}

/** Plays the scenario deck until a victory, the deck runs out, or `maxCards`. */
export function runGame(opts: GameOptions): GameResult {
	const game = createGame(opts);
	const lookup = cardLookup(opts.scenario.cards);
	const deck = [...game.board.deck];

	let cardsPlayed = 0;
	let reason: GameEndReason = "deck";
	let winners: Faction[] = [];
	while (true) {
		if (cardsPlayed >= opts.maxCards) {
			reason = "maxCards";
			break;
		}
		const cardId = drawCard(deck);
		if (cardId === undefined) {
			reason = "deck";
			break;
		}
		const card = lookup(cardId);
		cardsPlayed += 1;

		if (isWinterQuarters(card.id)) {
			winners = checkVictory(game.board).winners;
			if (winners.length === 0) {
				const [nextId] = deck;
				const next = nextId === undefined ? null : lookup(nextId);
				if (playWinterQuarters(game, card, next, !deck.some(isWinterQuarters))) {
					reason = "deck";
					break;
				}
			}
		} else {
			if (BRILLIANT_STROKE_CARDS.includes(card.id)) playBrilliantStroke(game, card);
			else playEventCard(game, card);
			winners = checkVictory(game.board).winners;
		}
		if (winners.length > 0) {
			reason = "victory";
			break;
		}
	}

	const finalScore = finalScoring(game.board);
	log("info", "game over", { seed: opts.seed, cardsPlayed, reason, winners, winner: finalScore.winner });
	return {
		seed: opts.seed,
		cardsPlayed,
		reason,
		winners,
		finalScore,
		resources: { ...game.board.resources },
		turns: game.turns,
	};
}
