import type { SolverClient, SolverStatus } from "../client.types.js";
import { calculateScheduleMetrics, type ScheduleMetrics } from "../scoring/metrics.js";
import type { Config, Schedule, SchedulerStrategy } from "../types.js";
import { BacktrackingScheduler } from "./backtracking.js";
import { GreedyScheduler } from "./greedy.js";
import { HeuristicScheduler } from "./heuristic.js";
import { LookaheadScheduler } from "./lookahead.js";
import { OptimalScheduler } from "./optimal.js";
import { RandomScheduler } from "./random.js";
import type {
  ConstructiveSchedulerOptions,
  ConstructiveStrategy,
  Scheduler,
} from "./scheduler.types.js";
import { StochasticScheduler } from "./stochastic.js";

type SchedulerFactory = (options: ConstructiveSchedulerOptions) => Scheduler;

export const constructiveSchedulerFactories: Readonly<
  Record<ConstructiveStrategy, SchedulerFactory>
> = {
  greedy: (options) => new GreedyScheduler(options),
  stochastic: (options) => new StochasticScheduler(options),
  lookahead: (options) => new LookaheadScheduler(options),
  backtracking: (options) => new BacktrackingScheduler(options),
  heuristic: (options) => new HeuristicScheduler({ ...options, rule: options.heuristicRule }),
  random: (options) => new RandomScheduler(options),
};

export const CONSTRUCTIVE_STRATEGIES: readonly ConstructiveStrategy[] = [
  "greedy",
  "stochastic",
  "lookahead",
  "backtracking",
  "heuristic",
  "random",
];

/**
 * Options for building any strategy.
 *
 * `client` is required for `optimal`; `seed` only affects `stochastic` and
 * `random`; `heuristicRule` only affects `heuristic`.
 */
export interface StrategyOptions extends ConstructiveSchedulerOptions {
  client?: SolverClient;
}

function isConstructive(strategy: SchedulerStrategy): strategy is ConstructiveStrategy {
  return strategy !== "optimal";
}

/**
 * Builds a strategy by name.
 *
 * @category Schedulers
 */
export function createScheduler(
  strategy: "optimal",
  options: StrategyOptions & { client: SolverClient },
): OptimalScheduler;
export function createScheduler(
  strategy: ConstructiveStrategy,
  options?: ConstructiveSchedulerOptions,
): Scheduler;
export function createScheduler(
  strategy: SchedulerStrategy,
  options: StrategyOptions = {},
): Scheduler | OptimalScheduler {
  if (isConstructive(strategy)) return constructiveSchedulerFactories[strategy](options);
  const { client } = options;
  if (!client) throw new Error(`Strategy "${strategy}" needs a solver client`);
  return new OptimalScheduler({ ...options, client });
}

/**
 * Runs one strategy and returns its schedule.
 *
 * Throws when `optimal` is requested without a client.
 *
 * @category Schedulers
 */
export async function runStrategy(
  strategy: SchedulerStrategy,
  config: Config,
  options: StrategyOptions = {},
): Promise<Schedule> {
  if (isConstructive(strategy)) return createScheduler(strategy, options).schedule(config);
  const { client } = options;
  if (!client) throw new Error(`Strategy "${strategy}" needs a solver client`);
  return createScheduler(strategy, { ...options, client }).schedule(config);
}

export interface StrategyComparison {
  readonly strategy: SchedulerStrategy;
  readonly schedule: Schedule;
  readonly metrics: ScheduleMetrics;
  /** Solver status; only set for `optimal`. */
  readonly status?: SolverStatus;
}

export interface CompareStrategiesOptions extends StrategyOptions {
  /**
   * Defaults to every constructive strategy, plus `optimal` when a client
   * is given.
   */
  strategies?: readonly SchedulerStrategy[];
}

/**
 * Runs several strategies on the same config and scores each result.
 *
 * Strategies run one after another, in the order given.
 *
 * @example
 * ```typescript
 * const results = await compareStrategies(config, { seed: 7 });
 * const best = results.toSorted((a, b) => a.metrics.penalty.totalPenalty - b.metrics.penalty.totalPenalty)[0];
 * ```
 *
 * @category Schedulers
 */
export async function compareStrategies(
  config: Config,
  options: CompareStrategiesOptions = {},
): Promise<StrategyComparison[]> {
  const { strategies, ...strategyOptions } = options;
  const names: readonly SchedulerStrategy[] =
    strategies ??
    (options.client ? [...CONSTRUCTIVE_STRATEGIES, "optimal"] : CONSTRUCTIVE_STRATEGIES);

  const results: StrategyComparison[] = [];
  for (const strategy of names) {
    if (isConstructive(strategy)) {
      const schedule = createScheduler(strategy, strategyOptions).schedule(config);
      results.push({ strategy, schedule, metrics: calculateScheduleMetrics(schedule, config) });
      continue;
    }
    const { client } = strategyOptions;
    if (!client) throw new Error(`Strategy "${strategy}" needs a solver client`);
    const { status, schedule } = await createScheduler(strategy, {
      ...strategyOptions,
      client,
    }).solve(config);
    results.push({
      strategy,
      schedule,
      metrics: calculateScheduleMetrics(schedule, config),
      status,
    });
  }
  return results;
}
