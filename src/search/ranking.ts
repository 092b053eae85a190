import { CommandEntry, Query, RankedList } from "../types/index.js";
import { getLogger } from "../utils/logger.js";

/** Weight for recency. */
const RECENCY_WEIGHT = 0.6;
/** Weight for frequency. */
const FREQUENCY_WEIGHT = 0.4;

const EPOCH = new Date(0);

/**
 * More recent = higher weight. Elapsed time is counted in whole seconds
 * and never below one second, so fresh (or clock-skewed future) entries
 * get the full weight of 1.0.
 */
export function recencyWeight(timestamp: Date, now: number = Date.now()): number {
  const secondsAgo = Math.max(1, Math.trunc((now - timestamp.getTime()) / 1000));
  return 1 / (1 + Math.log10(secondsAgo));
}

/**
 * 1.0 for a prefix match, `0.5 - position / length` for a later match,
 * 0 when the query does not occur at all.
 */
export function matchScore(command: string, query: string): number {
  const position = command.toLowerCase().indexOf(query.toLowerCase());
  if (position === -1) {
    return 0;
  }
  if (position === 0) {
    return 1;
  }
  return 0.5 - position / command.length;
}

function toRankedList(scores: Map<string, number>, limit: number): RankedList {
  // Array#sort is stable, so ties keep first-seen order
  return Array.from(scores.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([command]) => ({ command, timestamp: EPOCH }));
}

/**
 * Best total score per unique command containing `query`, in first-seen order.
 */
export function searchScores(query: string, history: readonly CommandEntry[]): Map<string, number> {
  const now = Date.now();
  // Best total score seen so far for each unique command
  const commandScores = new Map<string, number>();

  for (const entry of history) {
    const score = matchScore(entry.command, query);
    if (score <= 0) {
      continue;
    }

    // Running baseline, not an exact occurrence count: a repeat sighting
    // builds on the best total recorded for the command so far.
    const previous = commandScores.get(entry.command);
    const frequency = previous === undefined ? 1 : previous + 1;

    const total =
      score * (RECENCY_WEIGHT * recencyWeight(entry.timestamp, now) + FREQUENCY_WEIGHT * frequency);

    commandScores.set(entry.command, previous === undefined ? total : Math.max(previous, total));
  }

  return commandScores;
}

/**
 * Rank history entries containing `query`, best first.
 */
export function search(query: string, history: readonly CommandEntry[], limit: number): RankedList {
  getLogger().debug(`Search commands with term: ${query}`);
  return toRankedList(searchScores(query, history), limit);
}

/**
 * Score per unique command from its exact occurrence count and most recent
 * use, in first-seen order.
 */
export function frequencyScores(history: readonly CommandEntry[]): Map<string, number> {
  const now = Date.now();
  const commandData = new Map<string, { count: number; latest: Date }>();

  for (const entry of history) {
    const data = commandData.get(entry.command);
    if (!data) {
      commandData.set(entry.command, { count: 1, latest: entry.timestamp });
      continue;
    }
    data.count++;
    if (entry.timestamp.getTime() > data.latest.getTime()) {
      data.latest = entry.timestamp;
    }
  }

  const scores = new Map<string, number>();
  for (const [command, { count, latest }] of commandData) {
    scores.set(command, RECENCY_WEIGHT * recencyWeight(latest, now) + FREQUENCY_WEIGHT * count);
  }

  return scores;
}

/**
 * Rank every unique command by exact occurrence count and most recent use.
 */
export function mostFrequent(history: readonly CommandEntry[], limit: number): RankedList {
  getLogger().debug("Get frequent commands");
  return toRankedList(frequencyScores(history), limit);
}

/**
 * Substring search for a non-empty query, frequency ranking otherwise.
 */
export function rank(query: Query, history: readonly CommandEntry[], limit: number): RankedList {
  return query ? search(query, history, limit) : mostFrequent(history, limit);
}
