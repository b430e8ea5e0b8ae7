import {
	adjacent,
	AGENT_MOBILIZATION_PROVINCES,
	ACTIVE_SUPPORT,
	type Board,
	BLOCKADE,
	blockadedCities,
	control,
	count,
	executeCommand,
	executeSpecialActivity,
	FORT_BRI,
	hasMarker,
	isCity,
	isWestIndies,
	MARKER_CAPS,
	MILITIA_A,
	MILITIA_U,
	type MarchMove,
	poolCount,
	population,
	type PreparerChoice,
	PREPARER_REGULARS,
	rebelDefense,
	rebelLeaderBonus,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	rollD3,
	rollD6,
	royalistForce,
	royalistPieces,
	type SpaceId,
	TORY,
} from "@liberty/engine";
import type { TurnInput } from "../types";
import { makeRuleBot } from "./ruleBot";
import type { BotRule } from "./rules";
import { commandSpaces, flag, lowest, noTarget, rankSpaces, spaceBudget, spacesWhere } from "./targets";

const funded = (board: Board) => board.resources.FRENCH > 0;

function patriotUnits(board: Board, space: SpaceId): number {
	return count(board, space, REGULAR_PAT) + count(board, space, MILITIA_A) + count(board, space, MILITIA_U);
}

function battleTargets(board: Board): SpaceId[] {
	return spacesWhere(
		(s) =>
			count(board, s, REGULAR_FRE) > 0 &&
			royalistPieces(board, s) > 0 &&
			rebelDefense(board, s) + rebelLeaderBonus(board, s) > royalistForce(board, s),
	);
}

/** Whether placing `n` Patriot units would hand the province to the Rebellion. */
function addsControl(board: Board, province: SpaceId, n: number): boolean {
	if (control(board, province) === "REBELLION") return false;
	const rebels = rebelsIn(board, province) + n;
	return rebels > royalistPieces(board, province);
}

function rebelsIn(board: Board, space: SpaceId): number {
	return patriotUnits(board, space) + count(board, space, REGULAR_FRE);
}

// --- Commands -----------------------------------------------------------------

function hortalez({ board, ctx }: TurnInput) {
	const pay = Math.min(board.resources.FRENCH, rollD3(ctx.rng));
	return executeCommand(board, "FRENCH", { name: "HORTALEZ", request: { pay } }, ctx);
}

function agentMobilization({ board, ctx }: TurnInput) {
	const continental = poolCount(board, "available", MILITIA_U) < 2;
	const placed = continental ? 1 : 2;
	const [province] = rankSpaces(
		AGENT_MOBILIZATION_PROVINCES.filter((s) => (board.support[s] ?? 0) !== ACTIVE_SUPPORT),
		flag((s) => addsControl(board, s, placed)),
		(s) => patriotUnits(board, s),
	);
	if (province === undefined) return noTarget("Agent Mobilization");
	return executeCommand(
		board,
		"FRENCH",
		{ name: "AGENT_MOBILIZATION", request: { province, continental: continental || undefined } },
		ctx,
	);
}

function muster({ board, ctx }: TurnInput) {
	const [space] = rankSpaces(
		spacesWhere((s) => isWestIndies(s) || control(board, s) === "REBELLION"),
		flag((s) => !isWestIndies(s)),
		(s) => count(board, s, REGULAR_PAT),
		population,
	);
	if (space === undefined) return noTarget("Muster");
	return executeCommand(board, "FRENCH", { name: "MUSTER", request: { faction: "FRENCH", spaces: [space] } }, ctx);
}

function battle(input: TurnInput) {
	const { board, ctx } = input;
	// Continentals in a Battle space cost the Patriots a Resource each.
	let patriotFee = board.resources.PATRIOTS;
	const affordable = (s: SpaceId) => {
		if (count(board, s, REGULAR_PAT) === 0) return true;
		if (patriotFee === 0) return false;
		patriotFee -= 1;
		return true;
	};
	const spaces = rankSpaces(
		battleTargets(board),
		(s) => rebelDefense(board, s) - royalistForce(board, s),
		population,
	)
		.filter(affordable)
		.slice(0, spaceBudget(input, board.resources.FRENCH));
	if (spaces.length === 0) return noTarget("Battle");
	return executeCommand(board, "FRENCH", { name: "BATTLE", request: { faction: "FRENCH", spaces } }, ctx);
}

function march(input: TurnInput) {
	const { board, ctx } = input;
	const destinations = rankSpaces(
		spacesWhere((s) => !isWestIndies(s) && control(board, s) !== "REBELLION"),
		(s) => count(board, s, REGULAR_BRI) + count(board, s, TORY),
		flag(isCity),
		population,
	);
	const budget = spaceBudget(input, Math.min(2, board.resources.FRENCH));
	const used = new Set<SpaceId>();
	const moves: MarchMove[] = [];
	for (const dst of destinations) {
		if (moves.length >= budget) break;
		const [src] = rankSpaces(
			adjacent(dst).filter((s) => !used.has(s) && count(board, s, REGULAR_FRE) >= 2),
			(s) => count(board, s, REGULAR_FRE),
		);
		if (src === undefined) continue;
		used.add(src);
		moves.push({ src, dst, pieces: { [REGULAR_FRE]: count(board, src, REGULAR_FRE) - 1 } });
	}
	if (moves.length === 0) return noTarget("March");
	return executeCommand(board, "FRENCH", { name: "MARCH", request: { faction: "FRENCH", moves } }, ctx);
}

const COMMANDS: readonly BotRule[] = [
	{
		name: "HORTALEZ",
		when: ({ board, ctx }) => funded(board) && !board.toaPlayed && board.resources.PATRIOTS < rollD3(ctx.rng),
		run: hortalez,
	},
	{
		name: "AGENT_MOBILIZATION",
		when: ({ board }) => funded(board) && !board.toaPlayed,
		run: agentMobilization,
		fallback: "HORTALEZ",
	},
	{
		name: "MUSTER",
		when: ({ board, ctx }) =>
			funded(board) && board.toaPlayed && rollD6(ctx.rng) < poolCount(board, "available", REGULAR_FRE),
		run: muster,
		fallback: "MARCH",
	},
	{ name: "BATTLE", when: ({ board }) => funded(board) && board.toaPlayed, run: battle, fallback: "MARCH" },
	{ name: "MARCH", when: ({ board }) => funded(board) && board.toaPlayed, run: march },
];

// --- Special Activities -------------------------------------------------------

function skirmish({ board, ctx }: TurnInput) {
	const enemies = (s: SpaceId) => count(board, s, REGULAR_BRI) + count(board, s, TORY);
	const used = commandSpaces(ctx);
	const [space] = rankSpaces(
		spacesWhere(
			(s) => !used.has(s) && count(board, s, REGULAR_FRE) > 0 && (enemies(s) > 0 || count(board, s, FORT_BRI) > 0),
		),
		flag(isWestIndies),
		lowest(enemies),
		flag(isCity),
	);
	if (space === undefined) return noTarget("Skirmish");
	const targets = enemies(space);
	const option = targets === 0 ? 3 : targets >= 2 && count(board, space, REGULAR_FRE) >= 2 ? 2 : 1;
	return executeSpecialActivity(board, "FRENCH", { name: "SKIRMISH", request: { faction: "FRENCH", space, option } }, ctx);
}

function preparerChoice(board: Board): PreparerChoice {
	if (poolCount(board, "unavailable", REGULAR_FRE) >= PREPARER_REGULARS) return "REGULARS";
	const blockades = board.markers[BLOCKADE];
	if (board.unavailableBlockades > 0 && blockades.pool + blockades.onMap.size < MARKER_CAPS.Blockade) return "BLOCKADE";
	return "RESOURCES";
}

function navalPressure({ board, ctx }: TurnInput) {
	const [city] = rankSpaces(
		spacesWhere((s) => isCity(s) && !hasMarker(board, BLOCKADE, s)),
		flag((s) => control(board, s) === "BRITISH"),
		population,
	);
	const rearrange = board.markers[BLOCKADE].pool === 0 ? blockadedCities(board) : undefined;
	return executeSpecialActivity(
		board,
		"FRENCH",
		{ name: "NAVAL_PRESSURE", request: { faction: "FRENCH", city, rearrange } },
		ctx,
	);
}

const SPECIALS: readonly BotRule[] = [
	{ name: "SKIRMISH", when: ({ board }) => board.toaPlayed, run: skirmish },
	{
		name: "PREPARER",
		when: ({ board }) => board.toaPlayed,
		run: ({ board, ctx }) =>
			executeSpecialActivity(board, "FRENCH", { name: "PREPARER", request: { choice: preparerChoice(board) } }, ctx),
	},
	{ name: "NAVAL_PRESSURE", when: ({ board }) => board.toaPlayed, run: navalPressure },
];

export function makeFrenchBot() {
	return makeRuleBot({ faction: "FRENCH", name: "FrenchBot", commands: COMMANDS, specials: SPECIALS });
}
