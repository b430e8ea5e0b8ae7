import {
	type Board,
	controlledCities,
	count,
	type Faction,
	type Rng,
	rollD6,
	SPACE_IDS,
	supportTotals,
	VILLAGE,
} from "@liberty/engine";
import type { Card } from "../cards";
import { type CardFlag, cardFlags } from "./cardEffects";
import { directiveFor, FORCE_IF, hiddenMilitiaToFlip } from "./directives";

export type EventDecision = {
	play: boolean;
	shaded: boolean;
	/** The directive or bullet that decided, for the turn log. */
	reason: string;
};

type BulletInput = {
	board: Board;
	flags: ReadonlySet<CardFlag>;
	rng: Rng;
};

type Bullet = {
	name: string;
	test: (input: BulletInput) => boolean;
};

// --- Shared predicates --------------------------------------------------------

const oppositionLeads = ({ board }: BulletInput) => {
	const { support, opposition } = supportTotals(board);
	return opposition > support;
};

const supportLeads = ({ board }: BulletInput) => {
	const { support, opposition } = supportTotals(board);
	return support > opposition;
};

const has =
	(...flags: CardFlag[]) =>
	({ flags: card }: BulletInput) =>
		flags.some((flag) => card.has(flag));

/** Effective Event plus a D6 of 5 or 6. The die is only rolled once `gate` holds. */
const effectiveRoll =
	(gate: (input: BulletInput) => boolean) =>
	(input: BulletInput) =>
		input.flags.has("isEffective") && gate(input) && rollD6(input.rng) >= 5;

function villagesOnMap(board: Board): number {
	return SPACE_IDS.reduce((sum, space) => sum + count(board, space, VILLAGE), 0);
}

// --- Bullets by faction -------------------------------------------------------

export const BULLETS: Readonly<Record<Faction, readonly Bullet[]>> = {
	BRITISH: [
		{ name: "shift toward Support", test: (i) => oppositionLeads(i) && has("shiftsSupportRoyalist")(i) },
		{ name: "place British pieces", test: has("placesBritishPieces") },
		{ name: "remove a Patriot Fort", test: has("removesPatriotFort") },
		{ name: "add British Resources", test: has("addsBritishResources3plus") },
		{ name: "5+ British Cities and a 5+", test: effectiveRoll(({ board }) => controlledCities(board, "BRITISH").length >= 5) },
	],
	PATRIOTS: [
		{ name: "shift toward Opposition", test: (i) => supportLeads(i) && has("shiftsSupportRebel")(i) },
		{ name: "place Militia or a Fort", test: has("placesPatriotMilitiaU", "placesPatriotFort") },
		{ name: "inflict British casualties", test: has("inflictsBritishCasualties") },
		{ name: "add Patriot Resources", test: has("addsPatriotResources3plus") },
		{
			name: "5+ Rebellion Cities and a 5+",
			test: effectiveRoll(({ board }) => controlledCities(board, "REBELLION").length >= 5),
		},
	],
	INDIANS: [
		{ name: "shift toward Support", test: (i) => oppositionLeads(i) && has("shiftsSupportRoyalist")(i) },
		{ name: "place a Village or Gather", test: has("placesVillage", "grantsFreeGather") },
		{ name: "remove a Patriot Fort", test: has("removesPatriotFort") },
		{ name: "4+ Villages and a 5+", test: effectiveRoll(({ board }) => villagesOnMap(board) >= 4) },
	],
	FRENCH: [
		{ name: "shift toward Opposition", test: (i) => supportLeads(i) && has("shiftsSupportRebel")(i) },
		{ name: "French from Unavailable", test: has("placesFrenchFromUnavailable") },
		{ name: "French onto the map", test: has("placesFrenchOnMap") },
		{ name: "inflict British casualties", test: has("inflictsBritishCasualties") },
		{ name: "add French Resources", test: has("addsFrenchResources") },
		{ name: "Treaty in force and a 5+", test: effectiveRoll(({ board }) => board.toaPlayed) },
	],
};

/** Royalist bots play the unshaded side, Rebellion bots the shaded side of dual cards. */
export function defaultShaded(faction: Faction, card: Card): boolean {
	return card.dual && (faction === "PATRIOTS" || faction === "FRENCH");
}

// --- Decision -----------------------------------------------------------------

/**
 * Decides whether `faction` plays the Event on `card`. Directives from the
 * instruction sheet come first, then the ineffective-event check, then the
 * faction's bullets in order. Dice are drawn from `rng` only when a bullet
 * reaches its roll.
 */
export function evaluateEvent(board: Board, faction: Faction, card: Card, rng: Rng): EventDecision {
	const shaded = defaultShaded(faction, card);
	const decide = (play: boolean, reason: string): EventDecision => ({ play, shaded, reason });

	if (card.sword) return decide(false, "sword");

	const directive = directiveFor(faction, card.id);
	if (directive) {
		switch (directive.kind) {
			case "force":
				return decide(true, "force");
			case "ignore":
				return decide(false, "ignore");
			case "forceIf": {
				const predicate = FORCE_IF[directive.cardId];
				if (predicate === undefined) return decide(false, `force_if_${directive.cardId} has no predicate`);
				return decide(predicate(board), `force_if_${directive.cardId}`);
			}
			case "ignoreIfMilitia":
				if (hiddenMilitiaToFlip(board) < directive.threshold) {
					return decide(false, `fewer than ${directive.threshold} Militia to flip`);
				}
				break;
		}
	}

	const flags = cardFlags(card.id, shaded);
	if (!flags.has("isEffective")) return decide(false, "ineffective");

	const input: BulletInput = { board, flags, rng };
	for (const bullet of BULLETS[faction]) {
		if (bullet.test(input)) return decide(true, bullet.name);
	}
	return decide(false, "no bullet");
}
