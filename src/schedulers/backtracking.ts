import { addDays, laterDay } from "../datetime.utils.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import {
  commitPlacement,
  ConstructiveScheduler,
  createSchedulingContext,
  firstLegalPlacement,
  type Placement,
  type ScanCursor,
  type SchedulingContext,
} from "./base.js";

/**
 * One placement on the decision stack.
 */
interface DecisionFrame {
  readonly submissionId: string;
  readonly orderIndex: number;
  readonly interval: Interval;
  /** What the builder held for the id before the placement. */
  readonly previous: Interval | undefined;
  /** Where this submission's scan stopped, so a retry resumes after it. */
  readonly cursor: ScanCursor;
}

/**
 * Where the undone frame resumes. When the blocked submission fits once the
 * frame is gone, the frame retries from the end of that slot; otherwise
 * from the day after its old start.
 */
function retryCursor(
  context: SchedulingContext,
  blocked: Submission,
  frame: DecisionFrame,
): ScanCursor {
  const freed = firstLegalPlacement(context, blocked);
  if (!freed) return frame.cursor;
  return {
    venueIndex: frame.cursor.venueIndex,
    from: laterDay(frame.cursor.from, freed.check.interval.endDate),
  };
}

/**
 * Greedy with undo.
 *
 * When a submission has no legal day, the most recent placement is popped
 * off the decision stack and retried at the first day that leaves room for
 * the blocked submission. At most `maxBacktracks` pops happen per run;
 * after that, unplaceable submissions are skipped. Returns whichever of the final and the best partial
 * schedule holds more placements.
 *
 * @category Schedulers
 */
export class BacktrackingScheduler extends ConstructiveScheduler {
  override readonly strategy = "backtracking";

  override schedule(config: Config): Schedule {
    const context = createSchedulingContext(config, this.today);
    const order = this.order(config);
    const maxBacktracks = config.schedulingOptions.maxBacktracks;

    const stack: DecisionFrame[] = [];
    const cursors = new Map<number, ScanCursor>();
    let backtracks = 0;
    let best: Schedule = new Map();
    let index = 0;

    while (index < order.length) {
      const submission = order[index];
      if (submission === undefined) break;

      const placement = this.choosePlacement(context, submission, cursors.get(index));
      if (placement) {
        const previous = context.builder.get(submission.id);
        commitPlacement(context, submission, placement);
        const interval = context.builder.get(submission.id) ?? placement.check.interval;
        stack.push({
          submissionId: submission.id,
          orderIndex: index,
          interval,
          previous,
          cursor: {
            venueIndex: placement.venueIndex,
            from: addDays(placement.startDate, 1),
          },
        });
        if (context.builder.size > best.size) best = context.builder.build();
        index++;
        continue;
      }

      const frame = backtracks < maxBacktracks ? stack.pop() : undefined;
      if (!frame) {
        this.logger.debug({ strategy: this.strategy, submissionId: submission.id }, "no legal start day");
        cursors.delete(index);
        index++;
        continue;
      }

      backtracks++;
      context.builder.restore(frame.submissionId, frame.previous);
      for (const key of [...cursors.keys()]) {
        if (key > frame.orderIndex) cursors.delete(key);
      }
      const cursor = retryCursor(context, submission, frame);
      cursors.set(frame.orderIndex, cursor);
      index = frame.orderIndex;
      this.logger.debug(
        {
          strategy: this.strategy,
          undone: frame.submissionId,
          blockedBy: submission.id,
          retryFrom: cursor.from,
          backtracks,
        },
        "backtracked",
      );
    }

    const final = context.builder.build();
    const schedule = final.size >= best.size ? final : best;
    this.logger.info(
      {
        strategy: this.strategy,
        scheduled: schedule.size,
        total: config.submissions.length,
        backtracks,
      },
      "schedule built",
    );
    return schedule;
  }

  protected override choosePlacement(
    context: SchedulingContext,
    submission: Submission,
    cursor?: ScanCursor,
  ): Placement | undefined {
    return firstLegalPlacement(context, submission, cursor);
  }
}
