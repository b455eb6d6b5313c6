import type { Logger } from "../logger.js";
import type { Config, Schedule, SchedulerStrategy } from "../types.js";

export type ConstructiveStrategy = Exclude<SchedulerStrategy, "optimal">;

/**
 * Options every strategy accepts.
 */
export interface SchedulerOptions {
  /** Defaults to the shared planner logger. */
  logger?: Logger;
  /**
   * Day used as the window start when nothing in the config is dated.
   * Defaults to today (UTC).
   */
  today?: string;
}

export interface StochasticSchedulerOptions extends SchedulerOptions {
  /** Seed of the random source; equal seeds give equal schedules. */
  seed?: number;
}

/**
 * Ordering rules of the heuristic strategy.
 *
 * - `earliest_deadline`: nearest deadline first
 * - `latest_start`: latest possible start first
 * - `shortest_processing_time` / `longest_processing_time`: by duration
 * - `critical_path`: longest chain of dependent work first
 */
export const HEURISTIC_RULES = [
  "earliest_deadline",
  "latest_start",
  "shortest_processing_time",
  "longest_processing_time",
  "critical_path",
] as const;

export type HeuristicRule = (typeof HEURISTIC_RULES)[number];

export interface HeuristicSchedulerOptions extends SchedulerOptions {
  /** Defaults to `earliest_deadline`. */
  rule?: HeuristicRule;
}

/** Options any constructive strategy can be built from by name. */
export interface ConstructiveSchedulerOptions extends StochasticSchedulerOptions {
  /** Rule for the `heuristic` strategy. */
  heuristicRule?: HeuristicRule;
}

/**
 * A strategy that builds its schedule synchronously, one placement at a
 * time.
 *
 * Returns fewer entries than there are submissions when some cannot be
 * placed; never throws on valid configs.
 *
 * @category Schedulers
 */
export interface Scheduler {
  readonly strategy: ConstructiveStrategy;
  schedule(config: Config): Schedule;
}
