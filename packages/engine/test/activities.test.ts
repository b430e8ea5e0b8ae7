import { describe, expect, test } from "vitest";
import {
	blockadedCities,
	commonCause,
	count,
	executeSpecialActivity,
	FORT_PAT,
	MILITIA_A,
	MILITIA_U,
	navalPressure,
	partisans,
	persuasion,
	plunder,
	poolCount,
	preparer,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	skirmish,
	trade,
	usableWarParties,
	VILLAGE,
	warPath,
	WARPARTY_A,
	WARPARTY_U,
} from "@liberty/engine";
import { expectOk, makeBoard, makeContext } from "./helpers";

describe("skirmish", () => {
	test("Clinton removes one extra Militia", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 1, Patriot_Militia_A: 1, Patriot_Militia_U: 2 } },
			leaders: { CLINTON: "Massachusetts" },
		});
		const outcome = expectOk(skirmish(board, { faction: "BRITISH", space: "Massachusetts", option: 1 }, makeContext()));
		expect(outcome.notes).toEqual({ option: 1, removed: 2 });
		expect(count(board, "Massachusetts", MILITIA_A)).toBe(0);
		expect(count(board, "Massachusetts", MILITIA_U)).toBe(1);
		expect(count(board, "Massachusetts", REGULAR_BRI)).toBe(1);
	});

	test("option 2 trades one of our cubes for two of theirs", () => {
		const board = makeBoard({
			spaces: { Virginia: { Patriot_Continental: 2, British_Regular: 1, British_Tory: 1 } },
		});
		expectOk(skirmish(board, { faction: "PATRIOTS", space: "Virginia", option: 2 }, makeContext()));
		expect(count(board, "Virginia", REGULAR_PAT)).toBe(1);
		expect(count(board, "Virginia", REGULAR_BRI)).toBe(0);
		expect(board.cbc).toBe(2);
		expect(board.crc).toBe(1);
	});

	test("option 3 takes an undefended Fort", () => {
		const board = makeBoard({ spaces: { Virginia: { British_Regular: 1, Patriot_Fort: 1 } } });
		expectOk(skirmish(board, { faction: "BRITISH", space: "Virginia", option: 3 }, makeContext()));
		expect(count(board, "Virginia", FORT_PAT)).toBe(0);
		expect(poolCount(board, "available", FORT_PAT)).toBe(1);
		expect(poolCount(board, "casualties", REGULAR_BRI)).toBe(1);
		expect(board.crc).toBe(1);
		expect(board.cbc).toBe(1);
	});

	test("French Skirmish waits for the Treaty", () => {
		const board = makeBoard({ spaces: { Virginia: { French_Regular: 1, British_Tory: 1 } } });
		expect(skirmish(board, { faction: "FRENCH", space: "Virginia", option: 1 }, makeContext())).toMatchObject({
			reason: "not_available",
		});
	});
});

describe("common cause", () => {
	test("a March leaves one War Party behind", () => {
		const board = makeBoard({
			spaces: { New_York: { British_Regular: 1, Indian_WP_A: 1, Indian_WP_U: 1 } },
		});
		const ctx = makeContext();
		const outcome = expectOk(commonCause(board, { spaces: ["New_York"], mode: "MARCH" }, ctx));
		expect(outcome.notes).toEqual({ mode: "MARCH", used: 1 });
		expect(ctx.commonCause).toEqual({ New_York: 1 });
		expect(count(board, "New_York", WARPARTY_A)).toBe(2);
	});

	test("a lone War Party cannot March with the British", () => {
		const board = makeBoard({ spaces: { New_York: { British_Regular: 1, Indian_WP_U: 1 } } });
		expect(usableWarParties(board, "New_York", "MARCH", true)).toBe(0);
		expect(commonCause(board, { spaces: ["New_York"], mode: "MARCH" }, makeContext())).toEqual({
			ok: false,
			reason: "illegal_action",
			error: "No War Parties can serve as Tories",
		});
	});

	test("a Battle keeps one War Party Underground", () => {
		const board = makeBoard({
			spaces: { New_York: { British_Regular: 1, Indian_WP_A: 2, Indian_WP_U: 1 } },
		});
		const ctx = makeContext();
		expectOk(commonCause(board, { spaces: ["New_York"], mode: "BATTLE" }, ctx));
		expect(ctx.commonCause.New_York).toBe(2);
		expect(count(board, "New_York", WARPARTY_U)).toBe(1);
	});

	test("without preservation every War Party joins", () => {
		const board = makeBoard({
			spaces: { New_York: { British_Regular: 1, Indian_WP_A: 2, Indian_WP_U: 1 } },
		});
		const ctx = makeContext();
		expectOk(commonCause(board, { spaces: ["New_York"], mode: "BATTLE", preserveWp: false }, ctx));
		expect(ctx.commonCause.New_York).toBe(3);
		expect(count(board, "New_York", WARPARTY_A)).toBe(3);
	});

	test("needs British Regulars in the space", () => {
		const board = makeBoard({ spaces: { New_York: { Indian_WP_A: 3 } } });
		expect(commonCause(board, { spaces: ["New_York"], mode: "BATTLE" }, makeContext())).toMatchObject({
			error: "New_York has no British Regulars",
		});
	});
});

describe("war path", () => {
	test("option 1 removes a Continental before Militia", () => {
		const board = makeBoard({
			spaces: { Virginia: { Indian_WP_U: 1, Patriot_Militia_A: 1, Patriot_Continental: 1 } },
		});
		expectOk(warPath(board, { space: "Virginia", option: 1 }, makeContext()));
		expect(count(board, "Virginia", REGULAR_PAT)).toBe(0);
		expect(count(board, "Virginia", MILITIA_A)).toBe(1);
		expect(count(board, "Virginia", WARPARTY_A)).toBe(1);
		expect(board.crc).toBe(1);
	});

	test("Brant adds a Militia to option 2", () => {
		const board = makeBoard({
			spaces: { New_York: { Indian_WP_U: 2, Patriot_Militia_U: 3 } },
			leaders: { BRANT: "New_York" },
		});
		const outcome = expectOk(warPath(board, { space: "New_York", option: 2 }, makeContext()));
		expect(outcome.notes).toEqual({ option: 2, removed: 3 });
		expect(count(board, "New_York", MILITIA_U)).toBe(0);
		expect(count(board, "New_York", WARPARTY_A)).toBe(1);
		expect(poolCount(board, "available", WARPARTY_U)).toBe(1);
		expect(poolCount(board, "available", MILITIA_U)).toBe(3);
	});

	test("option 3 only against a lone Fort", () => {
		const board = makeBoard({
			spaces: { Virginia: { Indian_WP_U: 2, Patriot_Fort: 1, Patriot_Militia_U: 1 } },
		});
		expect(warPath(board, { space: "Virginia", option: 3 }, makeContext())).toMatchObject({
			error: "Option 3 only when no Rebellion units remain",
		});
	});
});

describe("partisans", () => {
	test("option 1 removes Tories first", () => {
		const board = makeBoard({
			spaces: { Virginia: { Patriot_Militia_U: 1, British_Tory: 1, British_Regular: 1 } },
		});
		expectOk(partisans(board, { space: "Virginia", option: 1 }, makeContext()));
		expect(count(board, "Virginia", "British_Tory")).toBe(0);
		expect(count(board, "Virginia", REGULAR_BRI)).toBe(1);
		expect(count(board, "Virginia", MILITIA_A)).toBe(1);
		expect(board.cbc).toBe(1);
	});

	test("option 3 burns a Village where no War Party stands", () => {
		const board = makeBoard({ spaces: { Georgia: { Patriot_Militia_U: 2, Indian_Village: 1 } } });
		const outcome = expectOk(partisans(board, { space: "Georgia", option: 3 }, makeContext()));
		expect(outcome.notes).toEqual({ option: 3, removed: 1 });
		expect(count(board, "Georgia", VILLAGE)).toBe(0);
		expect(count(board, "Georgia", MILITIA_A)).toBe(1);
		expect(count(board, "Georgia", MILITIA_U)).toBe(0);
	});

	test("option 3 is refused while War Parties guard the Village", () => {
		const board = makeBoard({
			spaces: { Georgia: { Patriot_Militia_U: 2, Indian_Village: 1, Indian_WP_A: 1 } },
		});
		expect(partisans(board, { space: "Georgia", option: 3 }, makeContext())).toMatchObject({
			error: "Option 3 only when no War Parties are present",
		});
	});
});

describe("trade", () => {
	test("the British may hand over Resources", () => {
		const board = makeBoard({
			spaces: { Quebec: { Indian_WP_U: 1, Indian_Village: 1 } },
			resources: { BRITISH: 3, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(trade(board, { space: "Quebec", transfer: 2 }, makeContext()));
		expect(outcome.notes).toEqual({ transfer: 2, gained: 2 });
		expect(board.resources.BRITISH).toBe(1);
		expect(board.resources.INDIANS).toBe(2);
		expect(count(board, "Quebec", WARPARTY_A)).toBe(1);
	});

	test("otherwise the Indians roll a D3", () => {
		const board = makeBoard({ spaces: { Quebec: { Indian_WP_U: 1, Indian_Village: 1 } } });
		const outcome = expectOk(trade(board, { space: "Quebec" }, makeContext([0.5])));
		expect(outcome.notes).toEqual({ transfer: 0, gained: 2 });
	});
});

describe("plunder", () => {
	test("takes Patriot Resources up to the population", () => {
		const board = makeBoard({
			spaces: { Virginia: { Indian_WP_A: 2, Patriot_Militia_U: 1 } },
			resources: { BRITISH: 0, PATRIOTS: 5, FRENCH: 0, INDIANS: 0 },
		});
		const ctx = makeContext();
		ctx.raided.push("Virginia");
		const outcome = expectOk(plunder(board, { space: "Virginia" }, ctx));
		expect(outcome.notes).toEqual({ taken: 2 });
		expect(board.resources.PATRIOTS).toBe(3);
		expect(board.resources.INDIANS).toBe(2);
		expect(count(board, "Virginia", WARPARTY_A)).toBe(1);
	});

	test("must follow a Raid in a populated Province", () => {
		const board = makeBoard({ spaces: { Virginia: { Indian_WP_A: 2 }, Northwest: { Indian_WP_A: 2 } } });
		expect(plunder(board, { space: "Virginia" }, makeContext())).toMatchObject({
			error: "Plunder must follow a Raid in Virginia",
		});
		const ctx = makeContext();
		ctx.raided.push("Northwest");
		expect(plunder(board, { space: "Northwest" }, ctx)).toMatchObject({
			error: "Northwest has no population to Plunder",
		});
	});
});

describe("persuasion", () => {
	test("each space reveals a Militia for a Resource and Propaganda", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { Patriot_Militia_U: 2 }, Boston: { Patriot_Militia_U: 1 } },
		});
		const outcome = expectOk(persuasion(board, { spaces: ["Massachusetts", "Boston"] }, makeContext()));
		expect(outcome.notes).toEqual({ gained: 2, markers: 2 });
		expect(board.resources.PATRIOTS).toBe(2);
		expect(count(board, "Massachusetts", MILITIA_A)).toBe(1);
		expect(count(board, "Boston", MILITIA_U)).toBe(0);
	});

	test("needs Rebellion Control", () => {
		const board = makeBoard({ spaces: { Massachusetts: { Patriot_Militia_U: 1, British_Regular: 2 } } });
		expect(persuasion(board, { spaces: ["Massachusetts"] }, makeContext())).toMatchObject({
			error: "Massachusetts is not eligible for Persuasion",
		});
	});
});

describe("naval pressure", () => {
	test("before the Treaty the British roll for Resources", () => {
		const board = makeBoard();
		const outcome = expectOk(navalPressure(board, { faction: "BRITISH" }, makeContext([0.9])));
		expect(outcome.notes).toEqual({ gained: 3 });
		expect(board.resources.BRITISH).toBe(3);
	});

	test("the British lift the first Blockade and lower FNI", () => {
		const board = makeBoard({
			toaPlayed: true,
			fni: 2,
			markers: { Blockade: { pool: 0, on_map: ["Philadelphia", "Boston"] } },
		});
		const outcome = expectOk(navalPressure(board, { faction: "BRITISH" }, makeContext()));
		expect(outcome.spaces).toEqual(["Boston"]);
		expect(board.fni).toBe(1);
		expect(blockadedCities(board)).toEqual(["Philadelphia"]);
		expect(board.markers.Blockade.pool).toBe(1);
	});

	test("the French raise FNI no higher than the Blockades in play", () => {
		const board = makeBoard({ toaPlayed: true, markers: { Blockade: { pool: 1, on_map: [] } } });
		expectOk(navalPressure(board, { faction: "FRENCH", city: "Boston" }, makeContext()));
		expect(board.fni).toBe(1);
		expect(blockadedCities(board)).toEqual(["Boston"]);
		expect(navalPressure(board, { faction: "FRENCH", city: "Philadelphia" }, makeContext())).toMatchObject({
			error: "FNI cannot rise above 1",
		});
	});

	test("with the box empty the French rearrange every Blockade", () => {
		const board = makeBoard({
			toaPlayed: true,
			fni: 1,
			markers: { Blockade: { pool: 0, on_map: ["Boston", "Philadelphia"] } },
		});
		expectOk(navalPressure(board, { faction: "FRENCH", rearrange: ["Savannah", "Charles_Town"] }, makeContext()));
		expect(board.fni).toBe(2);
		expect(blockadedCities(board)).toEqual(["Charles_Town", "Savannah"]);
	});
});

describe("préparer la guerre", () => {
	test("needs the Treaty", () => {
		const board = makeBoard({ unavailable: { French_Regular: 3 } });
		expect(preparer(board, { choice: "REGULARS" }, makeContext())).toMatchObject({ reason: "not_available" });
	});

	test("each choice", () => {
		const board = makeBoard({
			toaPlayed: true,
			unavailableBlockades: 1,
			unavailable: { French_Regular: 3 },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 49, INDIANS: 0 },
		});
		expectOk(preparer(board, { choice: "BLOCKADE" }, makeContext()));
		expectOk(preparer(board, { choice: "REGULARS" }, makeContext()));
		const outcome = expectOk(preparer(board, { choice: "RESOURCES" }, makeContext()));

		expect(board.markers.Blockade.pool).toBe(1);
		expect(board.unavailableBlockades).toBe(0);
		expect(poolCount(board, "available", REGULAR_FRE)).toBe(3);
		expect(outcome.notes).toEqual({ choice: "RESOURCES", gained: 1 });
		expect(preparer(board, { choice: "BLOCKADE" }, makeContext())).toMatchObject({
			error: "No Blockades remain out of play",
		});
	});
});

describe("special activity registry", () => {
	test("Howe lowers FNI before a British Special Activity", () => {
		const board = makeBoard({
			toaPlayed: true,
			fni: 1,
			leaders: { HOWE: "Boston" },
			spaces: { Massachusetts: { British_Regular: 1, Patriot_Militia_A: 1 } },
		});
		const outcome = expectOk(
			executeSpecialActivity(
				board,
				"BRITISH",
				{ name: "SKIRMISH", request: { faction: "BRITISH", space: "Massachusetts", option: 1 } },
				makeContext(),
			),
		);
		expect(outcome.notes.howe).toBe(true);
		expect(board.fni).toBe(0);
		expect(count(board, "Massachusetts", MILITIA_A)).toBe(0);
	});

	test("a refused activity keeps FNI where it was", () => {
		const board = makeBoard({
			toaPlayed: true,
			fni: 1,
			leaders: { HOWE: "Boston" },
			spaces: { Massachusetts: { British_Regular: 1, Patriot_Militia_A: 1 } },
		});
		const result = executeSpecialActivity(
			board,
			"BRITISH",
			{ name: "SKIRMISH", request: { faction: "BRITISH", space: "Massachusetts", option: 3 } },
			makeContext(),
		);
		expect(result.ok).toBe(false);
		expect(board.fni).toBe(1);
		expect(board.history).toEqual([]);
	});

	test("factions run only their own activities", () => {
		const board = makeBoard({ spaces: { Virginia: { Indian_WP_U: 1, Patriot_Militia_A: 1 } } });
		expect(
			executeSpecialActivity(board, "PATRIOTS", { name: "WAR_PATH", request: { space: "Virginia", option: 1 } }, makeContext()),
		).toMatchObject({ error: "PATRIOTS cannot WAR_PATH" });
		expect(
			executeSpecialActivity(
				board,
				"FRENCH",
				{ name: "SKIRMISH", request: { faction: "BRITISH", space: "Virginia", option: 1 } },
				makeContext(),
			),
		).toMatchObject({ error: "FRENCH cannot run a SKIRMISH for another faction" });
	});
});
