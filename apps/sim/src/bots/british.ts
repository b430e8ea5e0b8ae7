import {
	ACTIVE_SUPPORT,
	type Board,
	battleableSpaces,
	britishPieces,
	canBattle,
	control,
	count,
	executeCommand,
	executeSpecialActivity,
	FORT_BRI,
	FORT_PAT,
	type GarrisonMove,
	hasMarker,
	isBlockaded,
	isCity,
	isWestIndies,
	MAX_MUSTER_REGULARS,
	MILITIA_A,
	type MarchMove,
	maxToriesAt,
	nearBritishPower,
	adjacent,
	population,
	poolCount,
	PROPAGANDA,
	RAID,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	rebellionPieces,
	rollD6,
	royalistPieces,
	type SkirmishOption,
	SPACE_IDS,
	type SpaceId,
	TORY,
	WARPARTY_A,
	WARPARTY_U,
} from "@liberty/engine";
import type { TurnInput } from "../types";
import { makeRuleBot } from "./ruleBot";
import type { BotRule } from "./rules";
import { commandSpaces, flag, lowest, noTarget, rankSpaces, spaceBudget, spacesWhere } from "./targets";

const GARRISON_REGULARS = 10;

function regularsOnMap(board: Board): number {
	return SPACE_IDS.reduce((sum, space) => sum + count(board, space, REGULAR_BRI), 0);
}

/** Rebellion-held Cities the British could take back with a Garrison. */
function garrisonTargets(board: Board): SpaceId[] {
	return spacesWhere(
		(s) => isCity(s) && control(board, s) === "REBELLION" && count(board, s, FORT_BRI) === 0 && !isBlockaded(board, s),
	);
}

function warParties(board: Board, space: SpaceId): number {
	return count(board, space, WARPARTY_A) + count(board, space, WARPARTY_U);
}

// --- Commands -----------------------------------------------------------------

function garrison({ board, ctx, slot }: TurnInput) {
	const [target] = rankSpaces(garrisonTargets(board), (s) => rebellionPieces(board, s), population);
	if (target === undefined) return noTarget("Garrison");

	const needed = Math.max(1, rebellionPieces(board, target) - royalistPieces(board, target) + 1);
	const sources = rankSpaces(
		spacesWhere((s) => s !== target && !isBlockaded(board, s) && count(board, s, REGULAR_BRI) > 1),
		(s) => count(board, s, REGULAR_BRI),
	);
	const moves: GarrisonMove[] = [];
	let moved = 0;
	for (const src of sources) {
		if (moved >= needed) break;
		const n = Math.min(count(board, src, REGULAR_BRI) - 1, needed - moved);
		moves.push({ src, dst: target, n });
		moved += n;
	}
	return executeCommand(board, "BRITISH", { name: "GARRISON", request: { moves, limited: slot.limitedOnly } }, ctx);
}

function muster(input: TurnInput) {
	const { board, ctx } = input;
	const candidates = spacesWhere((s) => !isWestIndies(s) && nearBritishPower(board, s));
	const [regSpace] = rankSpaces(candidates, population, (s) => rebellionPieces(board, s));
	if (regSpace === undefined) return noTarget("Muster");

	let toriesLeft = poolCount(board, "available", TORY);
	const tories: Record<SpaceId, number> = {};
	const addTories = (space: SpaceId) => {
		const n = Math.min(maxToriesAt(board, space), toriesLeft);
		if (n > 0) tories[space] = n;
		toriesLeft -= n;
		return n;
	};
	addTories(regSpace);

	const spaces = [regSpace];
	const maxSpaces = spaceBudget(input, Math.min(4, board.resources.BRITISH - 1));
	const torySpaces = rankSpaces(
		candidates.filter((s) => s !== regSpace && maxToriesAt(board, s) > 0),
		(s) => board.support[s] ?? 0,
		population,
	);
	for (const space of torySpaces) {
		if (spaces.length >= maxSpaces) break;
		if (addTories(space) > 0) spaces.push(space);
	}

	const regulars = Math.min(MAX_MUSTER_REGULARS, poolCount(board, "available", REGULAR_BRI));
	const toryHere = count(board, regSpace, TORY) + (tories[regSpace] ?? 0);
	const canReward =
		control(board, regSpace) === "BRITISH" &&
		regulars + count(board, regSpace, REGULAR_BRI) > 0 &&
		toryHere > 0 &&
		(board.support[regSpace] ?? 0) < ACTIVE_SUPPORT &&
		!hasMarker(board, PROPAGANDA, regSpace) &&
		!hasMarker(board, RAID, regSpace) &&
		board.resources.BRITISH >= spaces.length + 1;

	return executeCommand(
		board,
		"BRITISH",
		{
			name: "MUSTER",
			request: {
				faction: "BRITISH",
				spaces,
				regulars: regulars > 0 ? { space: regSpace, n: regulars } : undefined,
				tories,
				rewardLoyalty: canReward ? { space: regSpace, levels: 1 } : undefined,
			},
		},
		ctx,
	);
}

function battle(input: TurnInput) {
	const { board, ctx, slot } = input;
	const targets = rankSpaces(
		battleableSpaces(board).filter((s) => count(board, s, REGULAR_BRI) + count(board, s, TORY) > 0),
		(s) => britishPieces(board, s),
		population,
	);
	const spaces = targets.slice(0, spaceBudget(input, Math.max(1, board.resources.BRITISH)));
	if (spaces.length === 0) return noTarget("Battle");

	// Common Cause goes first so the War Parties fight as Tories.
	const joining = spaces.filter((s) => count(board, s, REGULAR_BRI) > count(board, s, TORY) && warParties(board, s) > 0);
	if (slot.specialAllowed && joining.length > 0 && board.resources.BRITISH >= spaces.length) {
		executeSpecialActivity(
			board,
			"BRITISH",
			{ name: "COMMON_CAUSE", request: { spaces: joining, mode: "BATTLE", preserveWp: true } },
			ctx,
		);
	}
	return executeCommand(board, "BRITISH", { name: "BATTLE", request: { faction: "BRITISH", spaces } }, ctx);
}

function march(input: TurnInput) {
	const { board, ctx } = input;
	const sourceOf = (dst: SpaceId, used: ReadonlySet<SpaceId>) =>
		rankSpaces(
			adjacent(dst).filter((s) => !used.has(s) && count(board, s, REGULAR_BRI) >= 2),
			(s) => count(board, s, REGULAR_BRI),
		)[0];
	const destinations = rankSpaces(
		spacesWhere((s) => !isWestIndies(s) && control(board, s) !== "BRITISH"),
		population,
		lowest((s) => rebellionPieces(board, s)),
	);

	const budget = spaceBudget(input, Math.min(2, Math.max(1, board.resources.BRITISH)));
	const used = new Set<SpaceId>();
	const moves: MarchMove[] = [];
	for (const dst of destinations) {
		if (moves.length >= budget) break;
		const src = sourceOf(dst, used);
		if (src === undefined) continue;
		used.add(src);
		moves.push({ src, dst, pieces: { [REGULAR_BRI]: count(board, src, REGULAR_BRI) - 1 } });
	}
	return executeCommand(board, "BRITISH", { name: "MARCH", request: { faction: "BRITISH", moves } }, ctx);
}

const COMMANDS: readonly BotRule[] = [
	{
		name: "GARRISON",
		when: ({ board }) => regularsOnMap(board) >= GARRISON_REGULARS && garrisonTargets(board).length > 0,
		run: garrison,
	},
	{
		name: "MUSTER",
		when: ({ board, ctx }) => rollD6(ctx.rng) < poolCount(board, "available", REGULAR_BRI),
		run: muster,
		fallback: "MARCH",
	},
	{ name: "BATTLE", when: ({ board }) => canBattle(board), run: battle, fallback: "MARCH" },
	{ name: "MARCH", when: () => true, run: march },
];

// --- Special Activities -------------------------------------------------------

function skirmishTargets(board: Board, space: SpaceId): number {
	return count(board, space, MILITIA_A) + count(board, space, REGULAR_PAT) + count(board, space, REGULAR_FRE);
}

function skirmishOption(board: Board, space: SpaceId): SkirmishOption {
	const targets = skirmishTargets(board, space);
	if (targets === 0) return 3;
	return targets >= 2 && count(board, space, REGULAR_BRI) >= 2 ? 2 : 1;
}

function skirmish({ board, ctx }: TurnInput) {
	const used = commandSpaces(ctx);
	const candidates = spacesWhere(
		(s) =>
			!used.has(s) &&
			count(board, s, REGULAR_BRI) > 0 &&
			(skirmishTargets(board, s) > 0 || count(board, s, FORT_PAT) > 0),
	);
	const [space] = rankSpaces(
		candidates,
		flag(isWestIndies),
		flag((s) => count(board, s, REGULAR_BRI) === 1),
		lowest((s) => skirmishTargets(board, s)),
		flag(isCity),
	);
	if (space === undefined) return noTarget("Skirmish");
	return executeSpecialActivity(
		board,
		"BRITISH",
		{ name: "SKIRMISH", request: { faction: "BRITISH", space, option: skirmishOption(board, space) } },
		ctx,
	);
}

export const BRITISH_SPECIALS: readonly BotRule[] = [
	{ name: "SKIRMISH", when: () => true, run: skirmish },
	{
		name: "NAVAL_PRESSURE",
		when: () => true,
		run: ({ board, ctx }) =>
			executeSpecialActivity(board, "BRITISH", { name: "NAVAL_PRESSURE", request: { faction: "BRITISH" } }, ctx),
	},
];

export function makeBritishBot() {
	return makeRuleBot({ faction: "BRITISH", name: "BritishBot", commands: COMMANDS, specials: BRITISH_SPECIALS });
}
