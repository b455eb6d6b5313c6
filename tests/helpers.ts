import { createConfig } from "../src/config.js";
import type { ConferenceInput, ConfigInput, SubmissionInput } from "../src/config.schemas.js";
import type { SolverClient, SolverRequest, SolverResponse } from "../src/client.types.js";
import type { Config, Schedule } from "../src/types.js";

/** Window start used by every test config unless overridden. */
export const TEST_START = "2025-01-01";

export type TestConfigInput = Partial<ConfigInput> & Pick<ConfigInput, "submissions">;

/**
 * Builds a config with test-friendly defaults: no lead times, two slots,
 * and a fixed window start so nothing depends on today's date.
 */
export function makeConfig(input: TestConfigInput): Config {
  return createConfig({
    conferences: [],
    minAbstractLeadTimeDays: 0,
    minPaperLeadTimeDays: 0,
    maxConcurrentSubmissions: 2,
    schedulingStartDate: TEST_START,
    ...input,
  });
}

export const paper = (
  id: string,
  overrides: Partial<SubmissionInput> = {},
): SubmissionInput => ({ id, title: id, kind: "paper", ...overrides });

export const abstract = (
  id: string,
  overrides: Partial<SubmissionInput> = {},
): SubmissionInput => ({ id, title: id, kind: "abstract", ...overrides });

export const poster = (
  id: string,
  overrides: Partial<SubmissionInput> = {},
): SubmissionInput => ({ id, title: id, kind: "poster", ...overrides });

export const conference = (
  id: string,
  deadlines: ConferenceInput["deadlines"],
  overrides: Partial<ConferenceInput> = {},
): ConferenceInput => ({ id, name: id, confType: "MEDICAL", deadlines, ...overrides });

/** Start days of a schedule, keyed by id, for compact assertions. */
export function starts(schedule: Schedule): Record<string, string> {
  return Object.fromEntries([...schedule].map(([id, interval]) => [id, interval.startDate]));
}

/**
 * In-process solver stand-in that records requests and answers with a
 * canned response or by computing one from the request.
 */
export class StubSolverClient implements SolverClient {
  readonly requests: SolverRequest[] = [];
  readonly #answer: (request: SolverRequest) => SolverResponse;

  constructor(answer: SolverResponse | ((request: SolverRequest) => SolverResponse)) {
    this.#answer = typeof answer === "function" ? answer : () => answer;
  }

  async solve(request: SolverRequest): Promise<SolverResponse> {
    this.requests.push(request);
    return this.#answer(request);
  }
}
