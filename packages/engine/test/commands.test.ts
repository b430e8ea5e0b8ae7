import { describe, expect, test } from "vitest";
import {
	agentMobilization,
	type BoardSnapshotInput,
	count,
	executeCommand,
	FORT_PAT,
	garrison,
	gather,
	hasMarker,
	hortalez,
	march,
	MILITIA_A,
	MILITIA_U,
	muster,
	poolCount,
	rabbleRousing,
	raid,
	rally,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	scout,
	TORY,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
} from "@liberty/engine";
import { expectOk, makeBoard, makeContext } from "./helpers";

describe("march", () => {
	test("Indians march out of a Reserve for free", () => {
		const board = makeBoard({ spaces: { Quebec: { Indian_WP_U: 2 } } });
		const outcome = expectOk(
			march(board, { faction: "INDIANS", moves: [{ src: "Quebec", dst: "Northwest", pieces: { Indian_WP_U: 2 } }] }, makeContext()),
		);
		expect(outcome.notes).toEqual({ cost: 0 });
		expect(count(board, "Northwest", WARPARTY_U)).toBe(2);
		expect(count(board, "Quebec", WARPARTY_U)).toBe(0);
	});

	test("Indians cannot enter a City", () => {
		const board = makeBoard({ spaces: { Quebec: { Indian_WP_U: 1 } } });
		const result = march(
			board,
			{ faction: "INDIANS", moves: [{ src: "Quebec", dst: "Quebec_City", pieces: { Indian_WP_U: 1 } }] },
			makeContext(),
		);
		expect(result).toEqual({ ok: false, reason: "illegal_action", error: "Indians cannot enter a City" });
	});

	test("British escorts may not outnumber the Regulars", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 1, British_Tory: 2 } },
			resources: { BRITISH: 5, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const result = march(
			board,
			{ faction: "BRITISH", moves: [{ src: "Massachusetts", dst: "Boston", pieces: { British_Regular: 1, British_Tory: 2 } }] },
			makeContext(),
		);
		expect(result).toMatchObject({ ok: false, error: "Escort cap exceeded for British March" });
	});

	test("every three British cubes arriving reveal one Militia", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 3 }, New_York: { Patriot_Militia_U: 2 } },
			resources: { BRITISH: 2, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		expectOk(
			march(
				board,
				{ faction: "BRITISH", moves: [{ src: "Massachusetts", dst: "New_York", pieces: { British_Regular: 3 } }] },
				makeContext(),
			),
		);
		expect(board.resources.BRITISH).toBe(1);
		expect(count(board, "New_York", MILITIA_A)).toBe(1);
		expect(count(board, "New_York", MILITIA_U)).toBe(1);
	});

	test("French stay put until the Treaty of Alliance", () => {
		const board = makeBoard({ spaces: { Virginia: { French_Regular: 2 } } });
		const result = march(
			board,
			{ faction: "FRENCH", moves: [{ src: "Virginia", dst: "Norfolk", pieces: { French_Regular: 2 } }] },
			makeContext(),
		);
		expect(result).toMatchObject({ ok: false, reason: "not_available" });
	});
});

describe("muster", () => {
	test("British place Regulars and Tories next to British power", () => {
		const board = makeBoard({
			spaces: { Boston: { British_Regular: 1 } },
			available: { British_Regular: 5, British_Tory: 5 },
			resources: { BRITISH: 3, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(
			muster(
				board,
				{
					faction: "BRITISH",
					spaces: ["Massachusetts"],
					regulars: { space: "Massachusetts", n: 2 },
					tories: { Massachusetts: 2 },
				},
				makeContext(),
			),
		);
		expect(outcome.notes).toEqual({ cost: 1, loyaltyShifts: 0 });
		expect(count(board, "Massachusetts", REGULAR_BRI)).toBe(2);
		expect(count(board, "Massachusetts", TORY)).toBe(2);
		expect(board.resources.BRITISH).toBe(2);
	});

	test("Gage makes one Reward Loyalty shift free", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 2, British_Tory: 1 } },
			leaders: { GAGE: "Massachusetts" },
			markers: { Propaganda: { pool: 11, on_map: ["Massachusetts"] } },
			resources: { BRITISH: 3, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(
			muster(
				board,
				{ faction: "BRITISH", spaces: ["Massachusetts"], rewardLoyalty: { space: "Massachusetts", levels: 2 } },
				makeContext(),
			),
		);
		expect(outcome.notes).toEqual({ cost: 3, loyaltyShifts: 2 });
		expect(board.resources.BRITISH).toBe(0);
		expect(board.support.Massachusetts).toBe(2);
		expect(hasMarker(board, "Propaganda", "Massachusetts")).toBe(false);
		expect(board.markers.Propaganda.pool).toBe(12);
	});

	test("no Tories where the population stands at Active Opposition", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 2 } },
			support: { Massachusetts: -2 },
			available: { British_Tory: 5 },
			resources: { BRITISH: 3, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const result = muster(
			board,
			{ faction: "BRITISH", spaces: ["Massachusetts"], tories: { Massachusetts: 1 } },
			makeContext(),
		);
		expect(result).toMatchObject({ ok: false, error: "At most 0 Tories in Massachusetts" });
	});

	test("French Muster four Regulars into the West Indies", () => {
		const board = makeBoard({
			toaPlayed: true,
			available: { French_Regular: 6 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 2, INDIANS: 0 },
		});
		const outcome = expectOk(muster(board, { faction: "FRENCH", spaces: ["West_Indies"] }, makeContext()));
		expect(outcome.notes).toEqual({ regulars: 4 });
		expect(count(board, "West_Indies", REGULAR_FRE)).toBe(4);
		expect(board.resources.FRENCH).toBe(0);
	});

	test("French Muster elsewhere needs Rebellion Control", () => {
		const board = makeBoard({
			toaPlayed: true,
			available: { French_Regular: 6 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 2, INDIANS: 0 },
		});
		const result = muster(board, { faction: "FRENCH", spaces: ["New_York"] }, makeContext());
		expect(result).toMatchObject({ ok: false, reason: "illegal_action" });
	});
});

describe("garrison", () => {
	test("Regulars move into a City and reveal Militia", () => {
		const board = makeBoard({
			spaces: { Boston: { British_Regular: 4 }, New_York_City: { Patriot_Militia_U: 2 } },
			resources: { BRITISH: 2, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		expectOk(garrison(board, { moves: [{ src: "Boston", dst: "New_York_City", n: 4 }] }, makeContext()));
		expect(count(board, "New_York_City", REGULAR_BRI)).toBe(4);
		expect(count(board, "New_York_City", MILITIA_A)).toBe(1);
		expect(count(board, "New_York_City", MILITIA_U)).toBe(1);
		expect(board.resources.BRITISH).toBe(0);
	});

	test("a controlled City can be cleared of Rebellion units", () => {
		const board = makeBoard({
			spaces: {
				Boston: { British_Regular: 3 },
				New_York_City: { Patriot_Militia_A: 1, Patriot_Continental: 1 },
			},
			resources: { BRITISH: 2, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(
			garrison(
				board,
				{
					moves: [{ src: "Boston", dst: "New_York_City", n: 3 }],
					displace: { city: "New_York_City", target: "New_Jersey" },
				},
				makeContext(),
			),
		);
		expect(outcome.spaces).toEqual(["New_York_City"]);
		expect(count(board, "New_Jersey", REGULAR_PAT)).toBe(1);
		expect(count(board, "New_Jersey", MILITIA_A)).toBe(1);
		expect(count(board, "New_York_City", REGULAR_PAT)).toBe(0);
	});

	test("Blockades and a full FNI stop a Garrison", () => {
		const blockaded = makeBoard({
			spaces: { Boston: { British_Regular: 2 } },
			markers: { Blockade: { pool: 0, on_map: ["New_York_City"] } },
			resources: { BRITISH: 2, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		expect(garrison(blockaded, { moves: [{ src: "Boston", dst: "New_York_City", n: 2 }] }, makeContext())).toMatchObject({
			ok: false,
			error: "New_York_City is Blockaded",
		});

		const fni = makeBoard({ spaces: { Boston: { British_Regular: 2 } }, fni: 3, toaPlayed: true });
		expect(garrison(fni, { moves: [{ src: "Boston", dst: "Philadelphia", n: 2 }] }, makeContext())).toMatchObject({
			ok: false,
			reason: "not_available",
		});
	});
});

describe("rally", () => {
	test("one Underground Militia per space without a Fort", () => {
		const board = makeBoard({
			available: { Patriot_Militia_U: 5 },
			resources: { BRITISH: 0, PATRIOTS: 1, FRENCH: 0, INDIANS: 0 },
		});
		expectOk(rally(board, { spaces: ["Virginia"] }, makeContext()));
		expect(count(board, "Virginia", MILITIA_U)).toBe(1);
		expect(board.resources.PATRIOTS).toBe(0);
	});

	test("never at Active Support", () => {
		const board = makeBoard({
			support: { Virginia: 2 },
			available: { Patriot_Militia_U: 5 },
			resources: { BRITISH: 0, PATRIOTS: 1, FRENCH: 0, INDIANS: 0 },
		});
		expect(rally(board, { spaces: ["Virginia"] }, makeContext())).toMatchObject({
			ok: false,
			error: "Virginia is at Active Support",
		});
	});

	test("two Militia become a Fort, Underground first", () => {
		const board = makeBoard({
			spaces: { Virginia: { Patriot_Militia_U: 1, Patriot_Militia_A: 1, Patriot_Continental: 1 } },
			available: { Patriot_Fort: 1 },
			resources: { BRITISH: 0, PATRIOTS: 1, FRENCH: 0, INDIANS: 0 },
		});
		expectOk(rally(board, { spaces: ["Virginia"], buildFort: ["Virginia"] }, makeContext()));
		expect(count(board, "Virginia", FORT_PAT)).toBe(1);
		expect(count(board, "Virginia", MILITIA_U)).toBe(0);
		expect(count(board, "Virginia", MILITIA_A)).toBe(0);
		expect(count(board, "Virginia", REGULAR_PAT)).toBe(1);
	});

	test("Militia in a Fort space are promoted to Continentals", () => {
		const board = makeBoard({
			spaces: { Pennsylvania: { Patriot_Fort: 1, Patriot_Militia_U: 2 } },
			available: { Patriot_Continental: 5 },
			resources: { BRITISH: 0, PATRIOTS: 1, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(rally(board, { spaces: ["Pennsylvania"], promote: "Pennsylvania" }, makeContext()));
		expect(outcome.notes).toEqual({ cost: 1, promoted: 2 });
		expect(count(board, "Pennsylvania", REGULAR_PAT)).toBe(2);
		expect(poolCount(board, "available", MILITIA_U)).toBe(2);
	});
});

describe("rabble-rousing", () => {
	test("spaces not held by Patriots reveal a Militia", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { Patriot_Militia_U: 1 }, Boston: { British_Regular: 2, Patriot_Militia_U: 1 } },
			resources: { BRITISH: 0, PATRIOTS: 2, FRENCH: 0, INDIANS: 0 },
		});
		expectOk(rabbleRousing(board, { spaces: ["Massachusetts", "Boston"] }, makeContext()));
		expect(board.support.Massachusetts).toBe(-1);
		expect(board.support.Boston).toBe(-1);
		expect(count(board, "Massachusetts", MILITIA_U)).toBe(1);
		expect(count(board, "Boston", MILITIA_A)).toBe(1);
		expect(board.markers.Propaganda.pool).toBe(10);
		expect(board.resources.PATRIOTS).toBe(0);
	});

	test("a space with neither Control nor Underground Militia is refused", () => {
		const board = makeBoard({ resources: { BRITISH: 0, PATRIOTS: 2, FRENCH: 0, INDIANS: 0 } });
		expect(rabbleRousing(board, { spaces: ["Virginia"] }, makeContext())).toMatchObject({
			ok: false,
			error: "Virginia is not eligible for Rabble-Rousing",
		});
	});
});

describe("gather", () => {
	test("a Reserve space is free and a Village replaces two War Parties", () => {
		const board = makeBoard({
			spaces: { New_York: { Indian_WP_U: 2 } },
			available: { Indian_WP_U: 3, Indian_Village: 1 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
		});
		const outcome = expectOk(
			gather(board, { spaces: ["Quebec", "New_York"], buildVillage: ["New_York"] }, makeContext()),
		);
		expect(outcome.notes).toEqual({ cost: 1 });
		expect(count(board, "New_York", VILLAGE)).toBe(1);
		expect(count(board, "New_York", WARPARTY_U)).toBe(0);
		expect(count(board, "Quebec", WARPARTY_U)).toBe(1);
		expect(poolCount(board, "available", WARPARTY_U)).toBe(4);
	});

	test("Cornplanter builds a Village from one War Party", () => {
		const board = makeBoard({
			spaces: { New_York: { Indian_WP_A: 1 } },
			leaders: { CORNPLANTER: "New_York" },
			available: { Indian_Village: 1 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
		});
		expectOk(gather(board, { spaces: ["New_York"], buildVillage: ["New_York"] }, makeContext()));
		expect(count(board, "New_York", VILLAGE)).toBe(1);
		expect(count(board, "New_York", WARPARTY_A)).toBe(0);
	});

	test("Cities and Active Support are closed to Gather", () => {
		const board = makeBoard({
			support: { Virginia: 2 },
			available: { Indian_WP_U: 3 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 3 },
		});
		expect(gather(board, { spaces: ["Boston"] }, makeContext())).toMatchObject({
			error: "Boston is not an eligible Province for Gather",
		});
		expect(gather(board, { spaces: ["Virginia"] }, makeContext())).toMatchObject({
			error: "Virginia is not an eligible Province for Gather",
		});
	});
});

describe("raid", () => {
	test("a Raid activates a War Party and shifts toward Neutral", () => {
		const board = makeBoard({
			spaces: { Virginia: { Indian_WP_U: 1 } },
			support: { Virginia: -1 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
		});
		const ctx = makeContext();
		const outcome = expectOk(raid(board, { spaces: ["Virginia"] }, ctx));
		expect(outcome.notes).toEqual({ cost: 1, markers: 1 });
		expect(count(board, "Virginia", WARPARTY_A)).toBe(1);
		expect(board.support.Virginia).toBe(0);
		expect(hasMarker(board, "Raid", "Virginia")).toBe(true);
		expect(ctx.raided).toEqual(["Virginia"]);
	});

	test("a War Party may come from an adjacent Province", () => {
		const board = makeBoard({
			spaces: { North_Carolina: { Indian_WP_U: 1 } },
			support: { Virginia: -2 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
		});
		expectOk(raid(board, { spaces: ["Virginia"], moves: [{ src: "North_Carolina", dst: "Virginia" }] }, makeContext()));
		expect(count(board, "Virginia", WARPARTY_A)).toBe(1);
		expect(count(board, "North_Carolina", WARPARTY_U)).toBe(0);
		expect(board.support.Virginia).toBe(-1);
	});

	test("Dragging Canoe reaches two spaces away", () => {
		const snapshot: Partial<BoardSnapshotInput> = {
			spaces: { Georgia: { Indian_WP_U: 1 } },
			support: { Virginia: -1 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
		};
		const request = { spaces: ["Virginia"], moves: [{ src: "Georgia", dst: "Virginia" }] };

		expect(raid(makeBoard(snapshot), request, makeContext())).toMatchObject({
			ok: false,
			error: "Virginia cannot be Raided",
		});
		const board = makeBoard({ ...snapshot, leaders: { DRAGGING_CANOE: "Georgia" } });
		expectOk(raid(board, request, makeContext()));
		expect(count(board, "Virginia", WARPARTY_A)).toBe(1);
	});

	test("Neutral Provinces cannot be Raided", () => {
		const board = makeBoard({
			spaces: { Virginia: { Indian_WP_U: 1 } },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
		});
		expect(raid(board, { spaces: ["Virginia"] }, makeContext())).toMatchObject({ ok: false });
	});
});

describe("scout", () => {
	const snapshot = {
		spaces: {
			Quebec: { Indian_WP_U: 2, British_Regular: 2, British_Tory: 1 },
			New_York: { Patriot_Militia_U: 2 },
		},
		resources: { BRITISH: 1, PATRIOTS: 0, FRENCH: 0, INDIANS: 1 },
	};

	test("War Parties arrive Active and reveal every Militia", () => {
		const board = makeBoard(snapshot);
		expectOk(scout(board, { src: "Quebec", dst: "New_York", warParties: 1, regulars: 2, tories: 1 }, makeContext()));
		expect(count(board, "New_York", WARPARTY_A)).toBe(1);
		expect(count(board, "New_York", REGULAR_BRI)).toBe(2);
		expect(count(board, "New_York", TORY)).toBe(1);
		expect(count(board, "New_York", MILITIA_A)).toBe(2);
		expect(count(board, "Quebec", WARPARTY_U)).toBe(1);
		expect(board.resources).toEqual({ BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 });
	});

	test("the British may Skirmish on arrival", () => {
		const board = makeBoard(snapshot);
		const outcome = expectOk(
			scout(board, { src: "Quebec", dst: "New_York", warParties: 1, regulars: 2, skirmish: 1 }, makeContext()),
		);
		expect(outcome.notes.skirmish).toBe("done");
		expect(count(board, "New_York", MILITIA_A)).toBe(1);
	});

	test("an illegal Skirmish is noted and the Scout stands", () => {
		const board = makeBoard(snapshot);
		const outcome = expectOk(
			scout(board, { src: "Quebec", dst: "New_York", warParties: 1, regulars: 2, skirmish: 3 }, makeContext()),
		);
		expect(outcome.notes.skirmish).toBe("Option 3 only when no enemy cubes or Active Militia remain");
		expect(count(board, "New_York", MILITIA_A)).toBe(2);
	});
});

describe("French commands before the Treaty", () => {
	test("Hortalez turns French Resources into one more Patriot Resource", () => {
		const board = makeBoard({ resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 3, INDIANS: 0 } });
		const outcome = expectOk(hortalez(board, { pay: 2 }, makeContext()));
		expect(outcome.notes).toEqual({ cost: 2, gained: 3 });
		expect(board.resources.FRENCH).toBe(1);
		expect(board.resources.PATRIOTS).toBe(3);
		expect(hortalez(board, { pay: 0 }, makeContext())).toMatchObject({ reason: "illegal_action" });
	});

	test("Hortalez ends with the Treaty", () => {
		const board = makeBoard({ toaPlayed: true, resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 3, INDIANS: 0 } });
		expect(hortalez(board, { pay: 1 }, makeContext())).toMatchObject({ reason: "not_available" });
	});

	test("Agent Mobilization places two Militia or one Continental", () => {
		const board = makeBoard({
			available: { Patriot_Militia_U: 2, Patriot_Continental: 1 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 2, INDIANS: 0 },
		});
		expectOk(agentMobilization(board, { province: "Quebec" }, makeContext()));
		expectOk(agentMobilization(board, { province: "New_York", continental: true }, makeContext()));
		expect(count(board, "Quebec", MILITIA_U)).toBe(2);
		expect(count(board, "New_York", REGULAR_PAT)).toBe(1);
		expect(board.resources.FRENCH).toBe(0);
		expect(agentMobilization(board, { province: "Virginia" }, makeContext())).toMatchObject({
			error: "Virginia is not open to Agent Mobilization",
		});
	});
});

describe("command registry", () => {
	test("factions issue only their own Commands", () => {
		const board = makeBoard({ resources: { BRITISH: 0, PATRIOTS: 5, FRENCH: 0, INDIANS: 0 } });
		expect(executeCommand(board, "PATRIOTS", { name: "GATHER", request: { spaces: ["Quebec"] } }, makeContext())).toEqual({
			ok: false,
			reason: "illegal_action",
			error: "PATRIOTS cannot GATHER",
		});
	});

	test("a request naming another faction is refused", () => {
		const board = makeBoard({ spaces: { Virginia: { Patriot_Militia_U: 1 } } });
		const result = executeCommand(
			board,
			"BRITISH",
			{
				name: "MARCH",
				request: { faction: "PATRIOTS", moves: [{ src: "Virginia", dst: "Norfolk", pieces: { Patriot_Militia_U: 1 } }] },
			},
			makeContext(),
		);
		expect(result).toMatchObject({ error: "BRITISH cannot issue a MARCH for another faction" });
	});

	test("dispatches to the handler", () => {
		const board = makeBoard({
			available: { Patriot_Militia_U: 1 },
			resources: { BRITISH: 0, PATRIOTS: 1, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(executeCommand(board, "PATRIOTS", { name: "RALLY", request: { spaces: ["Virginia"] } }, makeContext()));
		expect(outcome.name).toBe("RALLY");
		expect(count(board, "Virginia", MILITIA_U)).toBe(1);
	});
});
