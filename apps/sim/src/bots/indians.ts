import {
	adjacent,
	type Board,
	bases,
	canGatherIn,
	canPlunderIn,
	canRaidIn,
	canTradeIn,
	canWarPathIn,
	count,
	executeCommand,
	executeSpecialActivity,
	FORT_PAT,
	isCity,
	isProvince,
	isReserve,
	MAX_BASES_PER_SPACE,
	MAX_RAID_SPACES,
	MILITIA_A,
	MILITIA_U,
	type MarchMove,
	population,
	poolCount,
	type RaidMove,
	rebellionPieces,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	type SpaceId,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
} from "@liberty/engine";
import { orderByRandomSpaces } from "../randomSpaces";
import type { TurnInput } from "../types";
import { makeRuleBot } from "./ruleBot";
import type { BotRule } from "./rules";
import { flag, lowest, noTarget, rankSpaces, spaceBudget, spacesWhere } from "./targets";

const VILLAGE_WAR_PARTIES = 2;

function warParties(board: Board, space: SpaceId): number {
	return count(board, space, WARPARTY_A) + count(board, space, WARPARTY_U);
}

function rebelUnits(board: Board, space: SpaceId): number {
	return (
		count(board, space, REGULAR_PAT) +
		count(board, space, REGULAR_FRE) +
		count(board, space, MILITIA_A) +
		count(board, space, MILITIA_U)
	);
}

/** Gather costs one Resource per Province, the first Reserve free. */
function gatherCost(spaces: readonly SpaceId[]): number {
	return spaces.length - (spaces.some(isReserve) ? 1 : 0);
}

// --- Commands -----------------------------------------------------------------

function raid(input: TurnInput) {
	const { board, ctx } = input;
	const ranked = rankSpaces(
		spacesWhere((s) => canRaidIn(board, s)),
		lowest((s) => board.support[s] ?? 0),
		(s) => count(board, s, WARPARTY_U),
		population,
	);
	const budget = spaceBudget(input, Math.min(MAX_RAID_SPACES, board.resources.INDIANS));
	const spaces: SpaceId[] = [];
	const moves: RaidMove[] = [];
	const sent = new Map<SpaceId, number>();
	// A source keeps one Underground War Party when it is Raided itself.
	const spare = (src: SpaceId) =>
		count(board, src, WARPARTY_U) - (sent.get(src) ?? 0) - (spaces.includes(src) ? 1 : 0);

	for (const space of ranked) {
		if (spaces.length >= budget) break;
		if (count(board, space, WARPARTY_U) - (sent.get(space) ?? 0) > 0) {
			spaces.push(space);
			continue;
		}
		const [src] = rankSpaces(
			adjacent(space).filter((s) => spare(s) > 0),
			(s) => spare(s),
		);
		if (src === undefined) continue;
		sent.set(src, (sent.get(src) ?? 0) + 1);
		moves.push({ src, dst: space });
		spaces.push(space);
	}
	if (spaces.length === 0) return noTarget("Raid");
	return executeCommand(board, "INDIANS", { name: "RAID", request: { spaces, moves } }, ctx);
}

function gather(input: TurnInput) {
	const { board, ctx } = input;
	const eligible = spacesWhere((s) => canGatherIn(board, s));
	const withVillage = rankSpaces(
		eligible.filter((s) => count(board, s, VILLAGE) > 0),
		(s) => count(board, s, VILLAGE),
	);
	const others = orderByRandomSpaces(
		ctx.rng,
		eligible.filter((s) => count(board, s, VILLAGE) === 0),
	);
	const budget = spaceBudget(input, eligible.length);
	let warPartiesLeft = poolCount(board, "available", WARPARTY_U);
	let villagesLeft = poolCount(board, "available", VILLAGE);

	const spaces: SpaceId[] = [];
	const buildVillage: SpaceId[] = [];
	const bulkPlace: Record<SpaceId, number> = {};
	for (const space of [...withVillage, ...others]) {
		if (spaces.length >= budget) break;
		if (gatherCost([...spaces, space]) > board.resources.INDIANS) continue;
		if (count(board, space, VILLAGE) > 0) {
			const n = Math.min(count(board, space, VILLAGE) + 1, warPartiesLeft);
			if (n === 0) continue;
			bulkPlace[space] = n;
			warPartiesLeft -= n;
		} else if (
			villagesLeft > 0 &&
			warParties(board, space) >= VILLAGE_WAR_PARTIES &&
			bases(board, space) < MAX_BASES_PER_SPACE
		) {
			buildVillage.push(space);
			villagesLeft -= 1;
		} else {
			if (warPartiesLeft === 0) continue;
			warPartiesLeft -= 1;
		}
		spaces.push(space);
	}
	if (spaces.length === 0) return noTarget("Gather");
	return executeCommand(
		board,
		"INDIANS",
		{
			name: "GATHER",
			request: {
				spaces,
				buildVillage: buildVillage.length > 0 ? buildVillage : undefined,
				bulkPlace: Object.keys(bulkPlace).length > 0 ? bulkPlace : undefined,
			},
		},
		ctx,
	);
}

/** War Parties and British Regulars sharing a Province, with a Province next door. */
function scoutRoutes(board: Board): { src: SpaceId; dst: SpaceId }[] {
	const routes: { src: SpaceId; dst: SpaceId }[] = [];
	for (const src of spacesWhere((s) => isProvince(s) && warParties(board, s) > 0 && count(board, s, REGULAR_BRI) > 0)) {
		for (const dst of adjacent(src)) {
			if (isProvince(dst)) routes.push({ src, dst });
		}
	}
	return routes;
}

function scout({ board, ctx }: TurnInput) {
	const routes = scoutRoutes(board);
	const [dst] = rankSpaces(
		[...new Set(routes.map((r) => r.dst))],
		(s) => count(board, s, MILITIA_U),
		(s) => rebelUnits(board, s),
	);
	const route = routes.find((r) => r.dst === dst);
	if (route === undefined) return noTarget("Scout");
	return executeCommand(
		board,
		"INDIANS",
		{ name: "SCOUT", request: { src: route.src, dst: route.dst, warParties: 1, regulars: 1 } },
		ctx,
	);
}

function march(input: TurnInput) {
	const { board, ctx } = input;
	const destinations = rankSpaces(
		spacesWhere((s) => isProvince(s) && count(board, s, VILLAGE) === 0 && bases(board, s) < MAX_BASES_PER_SPACE),
		lowest((s) => rebellionPieces(board, s)),
		flag((s) => canGatherIn(board, s)),
	);
	const budget = spaceBudget(input, Math.min(2, board.resources.INDIANS + 1));
	const used = new Set<SpaceId>();
	const moves: MarchMove[] = [];
	for (const dst of destinations) {
		if (moves.length >= budget) break;
		const [src] = rankSpaces(
			adjacent(dst).filter((s) => !used.has(s) && !isCity(s) && warParties(board, s) >= 2),
			flag(isReserve),
			(s) => warParties(board, s),
		);
		if (src === undefined) continue;
		used.add(src);
		const underground = count(board, src, WARPARTY_U);
		const total = warParties(board, src) - 1;
		const hidden = Math.min(underground, total);
		moves.push({ src, dst, pieces: { [WARPARTY_U]: hidden, [WARPARTY_A]: total - hidden } });
	}
	if (moves.length === 0) return noTarget("March");
	return executeCommand(board, "INDIANS", { name: "MARCH", request: { faction: "INDIANS", moves } }, ctx);
}

// --- Special Activities -------------------------------------------------------

function warPath({ board, ctx }: TurnInput) {
	const [space] = rankSpaces(
		spacesWhere((s) => canWarPathIn(board, s)),
		(s) => count(board, s, FORT_PAT),
		(s) => rebelUnits(board, s),
	);
	if (space === undefined) return noTarget("War Path");
	const underground = count(board, space, WARPARTY_U);
	const units = rebelUnits(board, space);
	const option = underground < 2 ? 1 : units === 0 ? 3 : units >= 2 ? 2 : 1;
	return executeSpecialActivity(board, "INDIANS", { name: "WAR_PATH", request: { space, option } }, ctx);
}

function trade({ board, ctx }: TurnInput) {
	const [space] = rankSpaces(
		spacesWhere((s) => canTradeIn(board, s)),
		(s) => count(board, s, VILLAGE),
		(s) => count(board, s, WARPARTY_U),
	);
	if (space === undefined) return noTarget("Trade");
	return executeSpecialActivity(board, "INDIANS", { name: "TRADE", request: { space } }, ctx);
}

function plunder({ board, ctx }: TurnInput) {
	const [space] = rankSpaces(
		ctx.raided.filter((s) => canPlunderIn(board, s, ctx)),
		population,
	);
	if (space === undefined) return noTarget("Plunder");
	return executeSpecialActivity(board, "INDIANS", { name: "PLUNDER", request: { space } }, ctx);
}

const COMMANDS: readonly BotRule[] = [
	{
		name: "TRADE",
		when: ({ board, slot }) => board.resources.INDIANS === 0 && slot.specialAllowed,
		run: trade,
		fallback: "GATHER",
	},
	{ name: "RAID", when: ({ board }) => spacesWhere((s) => canRaidIn(board, s)).length > 0, run: raid, fallback: "GATHER" },
	{
		name: "GATHER",
		when: ({ board }) => poolCount(board, "available", WARPARTY_U) + poolCount(board, "available", VILLAGE) > 0,
		run: gather,
		fallback: "RAID",
	},
	{ name: "SCOUT", when: ({ board }) => scoutRoutes(board).length > 0, run: scout, fallback: "MARCH" },
	{ name: "MARCH", when: () => true, run: march },
];

const SPECIALS: readonly BotRule[] = [
	{ name: "WAR_PATH", when: () => true, run: warPath },
	{ name: "TRADE", when: () => true, run: trade },
	{ name: "PLUNDER", when: ({ ctx }) => ctx.raided.length > 0, run: plunder },
];

export function makeIndianBot() {
	return makeRuleBot({ faction: "INDIANS", name: "IndianBot", commands: COMMANDS, specials: SPECIALS });
}
