import type { SolverClient, SolverRequest, SolverResponse, FetcherLike } from "./client.types.js";
import type { ZodError } from "zod";
import { SolverResponseSchema } from "./client.schemas.js";
import { SolverRequestError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";

export type {
  SolverClient,
  SolverRequest,
  SolverResponse,
  SolverVariable,
  SolverConstraint,
  SolverTerm,
  SolverObjective,
  FetcherLike,
} from "./client.types.js";

/** @category Solver */
export interface HttpSolverClientOptions {
  /** Defaults to the global `fetch`. */
  fetch?: FetcherLike;
  /** Defaults to `http://localhost:8080`. */
  baseUrl?: string;
  logger?: Logger;
}

/** Gateway statuses meaning the solver ran out of time upstream. */
const UPSTREAM_TIMEOUT_STATUSES: ReadonlySet<number> = new Set([408, 504]);

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Reads a solve response body into a {@link SolverResponse}.
 *
 * A solved status must come with variable values, since the optimal
 * strategy decodes start days from them.
 *
 * @throws SolverRequestError when the body is not JSON, does not match the
 * response schema, or reports a solution without values
 */
export function parseSolveResponse(bodyText: string, httpStatus: number): SolverResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(bodyText);
  } catch (error) {
    throw new SolverRequestError("Solver sent a body that is not JSON", httpStatus, bodyText, {
      cause: error,
    });
  }

  const parsed = SolverResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SolverRequestError(
      `Solver sent an unexpected response: ${describeIssues(parsed.error)}`,
      httpStatus,
      payload,
    );
  }

  const response = parsed.data;
  if ((response.status === "OPTIMAL" || response.status === "FEASIBLE") && !response.values) {
    throw new SolverRequestError(
      `Solver reported ${response.status} without variable values`,
      httpStatus,
      payload,
    );
  }
  return response;
}

/**
 * Sends start-day models to a solver service over HTTP (`POST /solve`).
 *
 * An upstream timeout (408 or 504) comes back as a `TIMEOUT` response so the
 * optimal strategy treats it like its own budget running out. Any other
 * failure throws {@link SolverRequestError}. Aborting `signal` aborts the
 * request.
 *
 * @example
 * ```typescript
 * const client = new HttpSolverClient({ baseUrl: "http://solver.internal:8080" });
 * const strategy = new OptimalScheduler({ client });
 * ```
 *
 * @category Solver
 */
export class HttpSolverClient implements SolverClient {
  readonly #fetch: typeof fetch;
  readonly #solveUrl: string;
  readonly #logger: Logger;

  constructor(options: HttpSolverClientOptions = {}) {
    const fetcher = options.fetch ?? fetch;
    this.#fetch = typeof fetcher === "function" ? fetcher : fetcher.fetch.bind(fetcher);
    this.#solveUrl = `${(options.baseUrl ?? "http://localhost:8080").replace(/\/$/, "")}/solve`;
    this.#logger = options.logger ?? defaultLogger;
  }

  async solve(request: SolverRequest, options?: { signal?: AbortSignal }): Promise<SolverResponse> {
    this.#logger.debug(
      {
        url: this.#solveUrl,
        variables: request.variables.length,
        constraints: request.constraints.length,
      },
      "sending model to solver",
    );

    const res = await this.#fetch(this.#solveUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(request),
      signal: options?.signal,
    });
    const bodyText = await res.text();

    if (UPSTREAM_TIMEOUT_STATUSES.has(res.status)) {
      return { status: "TIMEOUT", error: `Solver timed out upstream with ${res.status}` };
    }
    if (res.status === 422) {
      throw new SolverRequestError(`Solver rejected the model: ${bodyText}`, res.status, bodyText);
    }
    if (!res.ok) {
      const detail = bodyText ? `: ${bodyText}` : "";
      throw new SolverRequestError(`Solver failed with ${res.status}${detail}`, res.status, bodyText);
    }
    if (!bodyText) {
      throw new SolverRequestError("Solver sent an empty response", res.status, bodyText);
    }

    const response = parseSolveResponse(bodyText, res.status);
    this.#logger.debug(
      { status: response.status, solveTimeMs: response.statistics?.solveTimeMs },
      "solver answered",
    );
    return response;
  }
}
