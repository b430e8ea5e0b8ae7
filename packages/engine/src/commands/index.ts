import { type ActionContext, type ActionResult, illegal } from "../actions";
import { battle, type BattleRequest } from "../battle";
import type { Board } from "../board";
import type { Faction } from "../constants";
import { agentMobilization, type AgentMobilizationRequest } from "./agentMobilization";
import { garrison, type GarrisonRequest } from "./garrison";
import { gather, type GatherRequest } from "./gather";
import { hortalez, type HortalezRequest } from "./hortalez";
import { march, type MarchRequest } from "./march";
import { muster, type MusterRequest } from "./muster";
import { rabbleRousing, type RabbleRousingRequest } from "./rabbleRousing";
import { raid, type RaidRequest } from "./raid";
import { rally, type RallyRequest } from "./rally";
import { scout, type ScoutRequest } from "./scout";

export type CommandRequests = {
	MARCH: MarchRequest;
	BATTLE: BattleRequest;
	MUSTER: MusterRequest;
	GARRISON: GarrisonRequest;
	RALLY: RallyRequest;
	RABBLE_ROUSING: RabbleRousingRequest;
	GATHER: GatherRequest;
	SCOUT: ScoutRequest;
	RAID: RaidRequest;
	HORTALEZ: HortalezRequest;
	AGENT_MOBILIZATION: AgentMobilizationRequest;
};

export type CommandName = keyof CommandRequests;

export type CommandHandler<K extends CommandName> = (
	board: Board,
	request: CommandRequests[K],
	ctx: ActionContext,
) => ActionResult;

export const COMMANDS: { [K in CommandName]: CommandHandler<K> } = {
	MARCH: march,
	BATTLE: battle,
	MUSTER: muster,
	GARRISON: garrison,
	RALLY: rally,
	RABBLE_ROUSING: rabbleRousing,
	GATHER: gather,
	SCOUT: scout,
	RAID: raid,
	HORTALEZ: hortalez,
	AGENT_MOBILIZATION: agentMobilization,
};

/** Which factions may issue each Command. */
export const COMMAND_FACTIONS: Record<CommandName, readonly Faction[]> = {
	MARCH: ["BRITISH", "PATRIOTS", "FRENCH", "INDIANS"],
	BATTLE: ["BRITISH", "PATRIOTS", "FRENCH"],
	MUSTER: ["BRITISH", "FRENCH"],
	GARRISON: ["BRITISH"],
	RALLY: ["PATRIOTS"],
	RABBLE_ROUSING: ["PATRIOTS"],
	GATHER: ["INDIANS"],
	SCOUT: ["INDIANS"],
	RAID: ["INDIANS"],
	HORTALEZ: ["FRENCH"],
	AGENT_MOBILIZATION: ["FRENCH"],
};

export type CommandInvocation<K extends CommandName = CommandName> = {
	[P in K]: { name: P; request: CommandRequests[P] };
}[K];

export function executeCommand<K extends CommandName>(
	board: Board,
	faction: Faction,
	invocation: CommandInvocation<K>,
	ctx: ActionContext,
): ActionResult {
	if (!COMMAND_FACTIONS[invocation.name].includes(faction)) {
		return illegal(`${faction} cannot ${invocation.name}`);
	}
	const request = invocation.request;
	if ("faction" in request && request.faction !== faction) {
		return illegal(`${faction} cannot issue a ${invocation.name} for another faction`);
	}
	const handler = COMMANDS[invocation.name];
	return handler(board, request, ctx);
}

export { agentMobilization, garrison, gather, hortalez, march, muster, rabbleRousing, raid, rally, scout };
export type {
	AgentMobilizationRequest,
	GarrisonRequest,
	GatherRequest,
	HortalezRequest,
	MarchRequest,
	MusterRequest,
	RabbleRousingRequest,
	RaidRequest,
	RallyRequest,
	ScoutRequest,
};
