import {
	type ActionContext,
	type ActionNotes,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
	reject,
} from "./actions";
import {
	type Board,
	count,
	countAll,
	flip,
	hasMarker,
	isBlockaded,
	placeMarker,
	pushHistory,
	removeCasualties,
	removeMarker,
	shiftSupport,
	spendResources,
} from "./board";
import {
	BLOCKADE,
	type Faction,
	FORT_BRI,
	FORT_PAT,
	isCube,
	lossValue,
	MILITIA_A,
	MILITIA_U,
	type PieceTag,
	REBELLION_TAGS,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	ROYALIST_TAGS,
	type Side,
	sideOf,
	TORY,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
	WEST_INDIES,
} from "./constants";
import { rollD3s } from "./dice";
import { hasSideLeader, leaderModifiers, rebelLeaderBonus, royalistLeaderBonus } from "./leaders";
import { adjacent, isCity, isReserve, population, type SpaceId, SPACE_IDS } from "./map";

// --- Bot scoring helpers ------------------------------------------------------

/** Regulars + min(Tories, Regulars) + half the Active War Parties + British leader. */
export function royalistForce(board: Board, space: SpaceId): number {
	const regulars = count(board, space, REGULAR_BRI);
	const tories = count(board, space, TORY);
	return (
		regulars +
		Math.min(tories, regulars) +
		Math.floor(count(board, space, WARPARTY_A) / 2) +
		royalistLeaderBonus(board, space)
	);
}

export function rebelDefense(board: Board, space: SpaceId): number {
	return (
		count(board, space, REGULAR_PAT) +
		count(board, space, REGULAR_FRE) +
		count(board, space, MILITIA_A) +
		Math.floor(count(board, space, MILITIA_U) / 2) +
		count(board, space, FORT_PAT)
	);
}

/** Continentals, French Regulars and Active Militia; Underground Militia never count. */
export function activeRebels(board: Board, space: SpaceId): number {
	return count(board, space, REGULAR_PAT) + count(board, space, REGULAR_FRE) + count(board, space, MILITIA_A);
}

/** Spaces where 2+ Active Rebels (plus leader bonus) are outnumbered by Royalist force. */
export function battleableSpaces(board: Board): SpaceId[] {
	return SPACE_IDS.filter((space) => {
		const rebels = activeRebels(board, space);
		if (rebels < 2) return false;
		return rebels + rebelLeaderBonus(board, space) < royalistForce(board, space);
	});
}

export function canBattle(board: Board): boolean {
	return battleableSpaces(board).length > 0;
}

// --- Battle Command ---------------------------------------------------------

export type BattleRequest = {
	faction: Faction;
	spaces: SpaceId[];
	free?: boolean;
	/** Extra attacking force granted by an event. */
	forceBonus?: number;
	/** City to receive Blockades from a Battle City the Rebellion won. */
	winBlockadeDest?: SpaceId;
};

export type SpaceBattleResult = {
	space: SpaceId;
	attackerLosses: number;
	defenderLosses: number;
	winner: Side | null;
};

function attackerPresent(board: Board, faction: Faction, space: SpaceId, ctx: ActionContext): boolean {
	switch (faction) {
		case "BRITISH":
			return count(board, space, REGULAR_BRI) + count(board, space, TORY) + (ctx.commonCause[space] ?? 0) > 0;
		case "PATRIOTS":
			return count(board, space, REGULAR_PAT) + count(board, space, MILITIA_A) + count(board, space, MILITIA_U) > 0;
		case "FRENCH":
			return count(board, space, REGULAR_FRE) > 0;
		case "INDIANS":
			return false;
	}
}

function allyFee(board: Board, faction: Faction, spaces: readonly SpaceId[]): { ally: Faction; fee: number } | null {
	if (faction === "PATRIOTS") {
		return { ally: "FRENCH", fee: spaces.filter((s) => count(board, s, REGULAR_FRE) > 0).length };
	}
	if (faction === "FRENCH") {
		return { ally: "PATRIOTS", fee: spaces.filter((s) => count(board, s, REGULAR_PAT) > 0).length };
	}
	return null;
}

export function battle(board: Board, request: BattleRequest, ctx: ActionContext): ActionResult {
	const { faction, spaces } = request;
	if (faction === "INDIANS") return illegal("Indians cannot initiate Battle");
	if (faction === "FRENCH" && !board.toaPlayed) {
		return reject("not_available", "French cannot Battle before the Treaty of Alliance");
	}
	if (spaces.length === 0) return illegal("Battle needs at least one space");
	if (hasDuplicates(spaces)) return illegal("Battle spaces must be distinct");
	const enemy = sideOf(faction) === "ROYALIST" ? REBELLION_TAGS : ROYALIST_TAGS;
	for (const space of spaces) {
		if (!attackerPresent(board, faction, space, ctx)) {
			return illegal(`${faction} has no attacking pieces in ${space}`);
		}
		if (countAll(board, space, enemy) === 0) {
			return illegal(`No enemy pieces in ${space}`);
		}
	}
	const fee = allyFee(board, faction, spaces);
	if (!request.free) {
		if (board.resources[faction] < spaces.length) {
			return reject("insufficient_resources", `${faction} needs ${spaces.length} Resources to Battle`);
		}
		if (fee && board.resources[fee.ally] < fee.fee) {
			return reject("insufficient_resources", `${fee.ally} cannot pay ${fee.fee} Resources to join the Battle`);
		}
	}

	const mark = beginAction(board);
	if (!request.free) {
		spendResources(board, faction, spaces.length);
		if (fee) spendResources(board, fee.ally, fee.fee);
	}

	const notes: ActionNotes = {};
	const results: SpaceBattleResult[] = [];
	for (const space of spaces) {
		const result = resolveSpace(board, ctx, faction, space, request.forceBonus ?? 0);
		results.push(result);
		notes[`${space}.winner`] = result.winner ?? "none";
		notes[`${space}.attackerLosses`] = result.attackerLosses;
		notes[`${space}.defenderLosses`] = result.defenderLosses;
	}

	const dest = request.winBlockadeDest;
	if (dest && isCity(dest)) {
		for (const result of results) {
			if (result.winner !== "REBELLION" || !isCity(result.space)) continue;
			if (!isBlockaded(board, result.space) || hasMarker(board, BLOCKADE, dest)) continue;
			removeMarker(board, BLOCKADE, result.space);
			placeMarker(board, BLOCKADE, dest);
		}
	}

	return completeAction(board, ctx, { kind: "command", name: "BATTLE", faction, spaces }, mark, notes);
}

// --- Resolution -----------------------------------------------------------

function force(
	board: Board,
	space: SpaceId,
	side: Side,
	attacker: Faction,
	defending: boolean,
	ccWarParties: number,
): number {
	let total: number;
	if (side === "ROYALIST") {
		const regulars = count(board, space, REGULAR_BRI);
		let tories = count(board, space, TORY) + ccWarParties;
		if (!defending) tories = Math.min(tories, regulars);
		const activeWp = Math.max(0, count(board, space, WARPARTY_A) - ccWarParties);
		total = regulars + tories + Math.floor(activeWp / 2);
	} else {
		let continentals = count(board, space, REGULAR_PAT);
		let french = count(board, space, REGULAR_FRE);
		if (!defending && attacker === "PATRIOTS") french = Math.min(french, continentals);
		if (!defending && attacker === "FRENCH") continentals = Math.min(continentals, french);
		total = continentals + french + Math.floor(count(board, space, MILITIA_A) / 2);
	}
	if (defending) total += count(board, space, side === "ROYALIST" ? FORT_BRI : FORT_PAT);
	return total;
}

function diceFor(forceLevel: number): number {
	return Math.min(3, Math.floor(forceLevel / 3));
}

function halfRegulars(board: Board, space: SpaceId, side: Side, ccWarParties: number): boolean {
	if (side === "ROYALIST") {
		const regulars = count(board, space, REGULAR_BRI);
		const cubes = regulars + count(board, space, TORY) + ccWarParties;
		return cubes > 0 && regulars * 2 >= cubes;
	}
	return count(board, space, REGULAR_PAT) + count(board, space, REGULAR_FRE) > 0;
}

function hasUnderground(board: Board, space: SpaceId, side: Side): boolean {
	return count(board, space, side === "ROYALIST" ? WARPARTY_U : MILITIA_U) > 0;
}

function britishBlockadePenalty(board: Board, space: SpaceId): number {
	if (isCity(space) && isBlockaded(board, space)) return 1;
	if (space === WEST_INDIES && board.markers.Blockade.pool > 0) return 1;
	return 0;
}

function defenderLossModifier(
	board: Board,
	space: SpaceId,
	attSide: Side,
	defSide: Side,
	ccWarParties: number,
): number {
	let mods = 0;
	if (halfRegulars(board, space, attSide, ccWarParties)) mods += 1;
	if (hasUnderground(board, space, attSide)) mods += 1;
	if (hasSideLeader(board, space, attSide)) mods += 1;
	if (attSide === "REBELLION" && count(board, space, REGULAR_FRE) > 0) {
		mods += leaderModifiers(board, "battle", space).frenchAttackLossBonus;
	}
	if (attSide === "ROYALIST") mods -= britishBlockadePenalty(board, space);
	mods -= count(board, space, defSide === "ROYALIST" ? FORT_BRI : FORT_PAT);
	if (
		defSide === "ROYALIST" &&
		isReserve(space) &&
		count(board, space, WARPARTY_A) + count(board, space, WARPARTY_U) > 0
	) {
		mods -= 1;
	}
	if (defSide === "REBELLION") mods += leaderModifiers(board, "battle", space).rebelDefenceLossModifier;
	return mods;
}

function attackerLossModifier(board: Board, space: SpaceId, defSide: Side, ccWarParties: number): number {
	let mods = 0;
	if (halfRegulars(board, space, defSide, ccWarParties)) mods += 1;
	if (hasUnderground(board, space, defSide)) mods += 1;
	if (hasSideLeader(board, space, defSide)) mods += 1;
	if (defSide === "ROYALIST") mods -= britishBlockadePenalty(board, space);
	mods += count(board, space, defSide === "ROYALIST" ? FORT_BRI : FORT_PAT);
	return mods;
}

type Removal = { removed: number; lostCubeOrFort: boolean };

function takeLosses(board: Board, space: SpaceId, side: Side, defending: boolean, loss: number): Removal {
	const state: Removal = { removed: 0, lostCubeOrFort: false };
	let remaining = loss;
	const takeOne = (tag: PieceTag): boolean => {
		if (remaining <= 0 || count(board, space, tag) === 0) return false;
		removeCasualties(board, space, tag, 1);
		state.removed += 1;
		remaining -= lossValue(tag);
		if (isCube(tag) || tag === FORT_BRI || tag === FORT_PAT) state.lostCubeOrFort = true;
		return true;
	};

	if (side === "ROYALIST") {
		while (remaining > 0) {
			const tookRegular = takeOne(REGULAR_BRI);
			const tookTory = takeOne(TORY);
			if (!tookRegular && !tookTory) break;
		}
		for (const tag of defending ? [WARPARTY_A, VILLAGE, FORT_BRI] : [WARPARTY_A]) {
			while (remaining > 0 && count(board, space, tag) > 0) takeOne(tag);
		}
	} else {
		while (remaining > 0) {
			const tookFrench = takeOne(REGULAR_FRE);
			const tookContinental = takeOne(REGULAR_PAT);
			const tookMilitia = takeOne(MILITIA_A);
			if (!tookFrench && !tookContinental && !tookMilitia) break;
		}
		if (defending) {
			while (remaining > 0 && count(board, space, FORT_PAT) > 0) takeOne(FORT_PAT);
		}
	}
	return state;
}

function sideStanding(board: Board, space: SpaceId, side: Side): boolean {
	if (side === "ROYALIST") {
		return (
			count(board, space, REGULAR_BRI) +
				count(board, space, TORY) +
				count(board, space, WARPARTY_A) +
				count(board, space, VILLAGE) +
				count(board, space, FORT_BRI) >
			0
		);
	}
	return (
		count(board, space, REGULAR_PAT) +
			count(board, space, REGULAR_FRE) +
			count(board, space, MILITIA_A) +
			count(board, space, FORT_PAT) >
		0
	);
}

/** Shifts toward the winner's side; leftovers spill into adjacent spaces by population. */
function winTheDay(board: Board, space: SpaceId, winner: Side, shifts: number): void {
	const direction = winner === "ROYALIST" ? 1 : -1;
	let remaining = shifts - shiftSupport(board, space, direction * shifts);
	if (remaining <= 0) return;
	const neighbours = [...adjacent(space)]
		.filter((id) => id !== WEST_INDIES)
		.sort((a, b) => population(b) - population(a) || a.localeCompare(b));
	for (const id of neighbours) {
		if (remaining <= 0) break;
		remaining -= shiftSupport(board, id, direction * remaining);
	}
}

/** Bot Indians defending with a Village reveal all but one Underground War Party. */
function indianDefensiveActivation(board: Board, space: SpaceId, ctx: ActionContext): void {
	if (ctx.humans.includes("INDIANS")) return;
	if (count(board, space, VILLAGE) === 0) return;
	const n = count(board, space, WARPARTY_U) - 1;
	if (n > 0) flip(board, space, WARPARTY_U, WARPARTY_A, n);
}

export function resolveSpace(
	board: Board,
	ctx: ActionContext,
	attacker: Faction,
	space: SpaceId,
	forceBonus = 0,
): SpaceBattleResult {
	const attSide = sideOf(attacker);
	const defSide: Side = attSide === "ROYALIST" ? "REBELLION" : "ROYALIST";
	const cc = ctx.commonCause[space] ?? 0;

	if (defSide === "ROYALIST") indianDefensiveActivation(board, space, ctx);

	const attForce = force(board, space, attSide, attacker, false, cc) + forceBonus;
	const defForce = force(board, space, defSide, attacker, true, cc);

	const defenderLoss = Math.max(
		0,
		rollD3s(ctx.rng, diceFor(attForce)) + defenderLossModifier(board, space, attSide, defSide, cc),
	);
	const attackerLoss = Math.max(
		0,
		rollD3s(ctx.rng, diceFor(defForce)) + attackerLossModifier(board, space, defSide, cc),
	);

	const defenderRemoval = takeLosses(board, space, defSide, true, defenderLoss);
	const attackerRemoval = takeLosses(board, space, attSide, false, attackerLoss);

	const attStanding = sideStanding(board, space, attSide);
	const defStanding = sideStanding(board, space, defSide);
	let winner: Side | null;
	if (!attStanding && !defStanding) winner = null;
	else if (!attStanding) winner = defSide;
	else if (!defStanding) winner = attSide;
	else if (attackerRemoval.removed < defenderRemoval.removed) winner = attSide;
	else winner = defSide;

	if (winner && space !== WEST_INDIES) {
		const loser = winner === attSide ? defenderRemoval : attackerRemoval;
		if (loser.removed >= 2 && loser.lostCubeOrFort) {
			let shifts = Math.min(3, Math.floor(loser.removed / 2));
			if (winner === "REBELLION") {
				shifts = Math.min(6, shifts * leaderModifiers(board, "battle", space).winTheDayMultiplier);
			}
			winTheDay(board, space, winner, shifts);
		}
	}

	pushHistory(board, {
		type: "note",
		faction: attacker,
		message: `BATTLE ${space}: ${attSide}-loss=${attackerRemoval.removed}, ${defSide}-loss=${defenderRemoval.removed}, winner=${winner ?? "NONE"}`,
	});
	return {
		space,
		attackerLosses: attackerRemoval.removed,
		defenderLosses: defenderRemoval.removed,
		winner,
	};
}
