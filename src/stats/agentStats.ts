import { ResourceNotFoundError, isStatsError } from "../core/errors.js";
import type { StatsError } from "../core/errors.js";

export interface AgentInventory<T> {
  knownAgents(): Promise<ReadonlySet<string>>;
  fetchAgentStats(agentId: string, component: string): Promise<T>;
}

export type AgentStatsResult<T> = {
  failed: Array<[agentId: string, error: StatsError]>;
  affected: T[];
};

/**
 * Collects one component's stats from several agents.
 *
 * Only `StatsError`s are recorded per agent; anything else is unexpected and
 * aborts the whole batch.
 */
export async function componentStats<T>(
  inventory: AgentInventory<T>,
  agentIds: readonly string[],
  component: string
): Promise<AgentStatsResult<T>> {
  const result: AgentStatsResult<T> = { failed: [], affected: [] };
  const known = await inventory.knownAgents();

  for (const agentId of agentIds) {
    if (!known.has(agentId)) {
      result.failed.push([agentId, new ResourceNotFoundError(1701, { extraMessage: agentId })]);
      continue;
    }
    try {
      result.affected.push(await inventory.fetchAgentStats(agentId, component));
    } catch (err) {
      if (!isStatsError(err)) throw err;
      result.failed.push([agentId, err]);
    }
  }

  return result;
}
