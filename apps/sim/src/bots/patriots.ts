import {
	ACTIVE_OPPOSITION,
	ACTIVE_SUPPORT,
	adjacent,
	type Board,
	bases,
	canPartisansIn,
	canPersuadeIn,
	canRabbleRouseIn,
	control,
	count,
	executeCommand,
	executeSpecialActivity,
	FORT_BRI,
	FORT_PAT,
	isCity,
	isReserve,
	isWestIndies,
	MAX_BASES_PER_SPACE,
	MILITIA_A,
	MILITIA_U,
	type MarchMove,
	poolCount,
	population,
	rebelDefense,
	rebelLeaderBonus,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	royalistForce,
	royalistPieces,
	type SpaceId,
	TORY,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
} from "@liberty/engine";
import type { TurnInput } from "../types";
import { makeRuleBot } from "./ruleBot";
import type { BotRule } from "./rules";
import { commandSpaces, flag, lowest, noTarget, rankSpaces, spaceBudget, spacesWhere } from "./targets";

function patriotUnits(board: Board, space: SpaceId): number {
	return count(board, space, REGULAR_PAT) + count(board, space, MILITIA_A) + count(board, space, MILITIA_U);
}

/** Spaces where the Patriots outfight the Royalist pieces present. */
function battleTargets(board: Board): SpaceId[] {
	return spacesWhere(
		(s) =>
			patriotUnits(board, s) > 0 &&
			royalistPieces(board, s) > 0 &&
			rebelDefense(board, s) + rebelLeaderBonus(board, s) > royalistForce(board, s),
	);
}

function canHoldMilitia(board: Board, space: SpaceId): boolean {
	return count(board, space, FORT_PAT) > 0 || (!isReserve(space) && !isWestIndies(space));
}

function rallySpaces(board: Board): SpaceId[] {
	return spacesWhere((s) => (board.support[s] ?? 0) !== ACTIVE_SUPPORT && canHoldMilitia(board, s));
}

function rabbleSpaces(board: Board): SpaceId[] {
	return spacesWhere((s) => canRabbleRouseIn(board, s) && (board.support[s] ?? 0) > ACTIVE_OPPOSITION);
}

// --- Commands -----------------------------------------------------------------

function battle(input: TurnInput) {
	const { board, ctx } = input;
	// Spaces with French Regulars cost the French a Resource each.
	let frenchFee = board.resources.FRENCH;
	const affordable = (s: SpaceId) => {
		if (count(board, s, REGULAR_FRE) === 0) return true;
		if (frenchFee === 0) return false;
		frenchFee -= 1;
		return true;
	};
	const ranked = rankSpaces(
		battleTargets(board),
		(s) => rebelDefense(board, s) - royalistForce(board, s),
		population,
	).filter(affordable);
	const spaces = ranked.slice(0, spaceBudget(input, board.resources.PATRIOTS));
	if (spaces.length === 0) return noTarget("Battle");
	return executeCommand(board, "PATRIOTS", { name: "BATTLE", request: { faction: "PATRIOTS", spaces } }, ctx);
}

function rally(input: TurnInput) {
	const { board, ctx } = input;
	const ranked = rankSpaces(
		rallySpaces(board),
		flag((s) => count(board, s, FORT_PAT) > 0),
		population,
		lowest((s) => board.support[s] ?? 0),
	);
	const budget = spaceBudget(input, board.resources.PATRIOTS);
	let militiaLeft = poolCount(board, "available", MILITIA_U);
	let fortsLeft = poolCount(board, "available", FORT_PAT);

	const spaces: SpaceId[] = [];
	const buildFort: SpaceId[] = [];
	const bulkPlace: Record<SpaceId, number> = {};
	for (const space of ranked) {
		if (spaces.length >= budget) break;
		const hasFort = count(board, space, FORT_PAT) > 0;
		if (hasFort) {
			const n = Math.min(count(board, space, FORT_PAT) + population(space), militiaLeft);
			if (n === 0 || isReserve(space) || isWestIndies(space)) continue;
			bulkPlace[space] = n;
			militiaLeft -= n;
		} else if (fortsLeft > 0 && patriotUnits(board, space) >= 2 && bases(board, space) < MAX_BASES_PER_SPACE) {
			buildFort.push(space);
			fortsLeft -= 1;
		} else {
			if (militiaLeft === 0) continue;
			militiaLeft -= 1;
		}
		spaces.push(space);
	}
	if (spaces.length === 0) return noTarget("Rally");
	return executeCommand(
		board,
		"PATRIOTS",
		{
			name: "RALLY",
			request: {
				spaces,
				buildFort: buildFort.length > 0 ? buildFort : undefined,
				bulkPlace: Object.keys(bulkPlace).length > 0 ? bulkPlace : undefined,
			},
		},
		ctx,
	);
}

function rabbleRousing(input: TurnInput) {
	const { board, ctx } = input;
	const ranked = rankSpaces(rabbleSpaces(board), population, (s) => board.support[s] ?? 0);
	const spaces = ranked.slice(0, spaceBudget(input, board.resources.PATRIOTS));
	if (spaces.length === 0) return noTarget("Rabble-Rousing");
	return executeCommand(board, "PATRIOTS", { name: "RABBLE_ROUSING", request: { spaces } }, ctx);
}

function march(input: TurnInput) {
	const { board, ctx } = input;
	const destinations = rankSpaces(
		spacesWhere((s) => !isWestIndies(s) && control(board, s) !== "REBELLION"),
		flag(isCity),
		population,
	);
	const budget = spaceBudget(input, Math.min(2, board.resources.PATRIOTS));
	const used = new Set<SpaceId>();
	const moves: MarchMove[] = [];
	for (const dst of destinations) {
		if (moves.length >= budget) break;
		const [src] = rankSpaces(
			adjacent(dst).filter((s) => !used.has(s) && count(board, s, REGULAR_PAT) + count(board, s, MILITIA_U) >= 2),
			(s) => count(board, s, REGULAR_PAT),
			(s) => count(board, s, MILITIA_U),
		);
		if (src === undefined) continue;
		used.add(src);
		const continentals = count(board, src, REGULAR_PAT);
		const militia = count(board, src, MILITIA_U);
		// One unit stays behind.
		moves.push({
			src,
			dst,
			pieces:
				continentals > 0
					? { [REGULAR_PAT]: continentals, [MILITIA_U]: Math.max(0, militia - 1) }
					: { [MILITIA_U]: militia - 1 },
		});
	}
	if (moves.length === 0) return noTarget("March");
	return executeCommand(board, "PATRIOTS", { name: "MARCH", request: { faction: "PATRIOTS", moves } }, ctx);
}

const COMMANDS: readonly BotRule[] = [
	{ name: "BATTLE", when: ({ board }) => battleTargets(board).length > 0, run: battle, fallback: "RALLY" },
	{
		name: "RALLY",
		when: ({ board }) => poolCount(board, "available", MILITIA_U) + poolCount(board, "available", FORT_PAT) > 0,
		run: rally,
		fallback: "RABBLE_ROUSING",
	},
	{ name: "RABBLE_ROUSING", when: ({ board }) => rabbleSpaces(board).length > 0, run: rabbleRousing, fallback: "RALLY" },
	{ name: "MARCH", when: () => true, run: march },
];

// --- Special Activities -------------------------------------------------------

function partisans({ board, ctx }: TurnInput) {
	const [space] = rankSpaces(
		spacesWhere((s) => canPartisansIn(board, s)),
		(s) => count(board, s, VILLAGE),
		(s) => count(board, s, WARPARTY_A) + count(board, s, TORY),
	);
	if (space === undefined) return noTarget("Partisans");
	const underground = count(board, space, MILITIA_U);
	const warParties = count(board, space, WARPARTY_A) + count(board, space, WARPARTY_U);
	const option = underground >= 2 && warParties === 0 && count(board, space, VILLAGE) > 0 ? 3 : underground >= 2 ? 2 : 1;
	return executeSpecialActivity(board, "PATRIOTS", { name: "PARTISANS", request: { space, option } }, ctx);
}

function skirmish({ board, ctx }: TurnInput) {
	const used = commandSpaces(ctx);
	const [space] = rankSpaces(
		spacesWhere(
			(s) =>
				!used.has(s) &&
				count(board, s, REGULAR_PAT) > 0 &&
				(count(board, s, REGULAR_BRI) + count(board, s, TORY) > 0 || count(board, s, FORT_BRI) > 0),
		),
		flag((s) => count(board, s, REGULAR_PAT) === 1),
		lowest((s) => count(board, s, REGULAR_BRI) + count(board, s, TORY)),
		flag(isCity),
	);
	if (space === undefined) return noTarget("Skirmish");
	const targets = count(board, space, REGULAR_BRI) + count(board, space, TORY);
	const option = targets === 0 ? 3 : targets >= 2 && count(board, space, REGULAR_PAT) >= 2 ? 2 : 1;
	return executeSpecialActivity(
		board,
		"PATRIOTS",
		{ name: "SKIRMISH", request: { faction: "PATRIOTS", space, option } },
		ctx,
	);
}

function persuasion({ board, ctx }: TurnInput) {
	const spaces = rankSpaces(
		spacesWhere((s) => canPersuadeIn(board, s)),
		population,
		(s) => count(board, s, MILITIA_U),
	).slice(0, 3);
	if (spaces.length === 0) return noTarget("Persuasion");
	return executeSpecialActivity(board, "PATRIOTS", { name: "PERSUASION", request: { spaces } }, ctx);
}

const SPECIALS: readonly BotRule[] = [
	{ name: "PARTISANS", when: () => true, run: partisans },
	{ name: "SKIRMISH", when: () => true, run: skirmish },
	{ name: "PERSUASION", when: () => true, run: persuasion },
];

export function makePatriotBot() {
	return makeRuleBot({ faction: "PATRIOTS", name: "PatriotBot", commands: COMMANDS, specials: SPECIALS });
}
