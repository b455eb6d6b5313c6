import type {
  ConstraintFamily,
  ScheduleViolation,
  ValidationResult,
} from "./validation.types.js";

/**
 * Collects one family's outcome subject by subject.
 *
 * A subject is whatever the family counts: a scheduled submission for most
 * families, a loaded day for the resource family.
 */
export interface ValidationReporter<V extends ScheduleViolation> {
  /** Records an applicable subject and the violations found for it. */
  reportChecked(violations: readonly V[]): void;

  hasViolations(): boolean;
  getResult(): ValidationResult<V>;
}

/**
 * Compliance percentage, 100 when nothing applies.
 */
export function complianceRate(compliant: number, total: number): number {
  return total === 0 ? 100 : (compliant / total) * 100;
}

export class ValidationReporterImpl<V extends ScheduleViolation> implements ValidationReporter<V> {
  readonly #family: ConstraintFamily;
  #violations: V[] = [];
  #total = 0;
  #compliant = 0;

  constructor(family: ConstraintFamily) {
    this.#family = family;
  }

  reportChecked(violations: readonly V[]): void {
    this.#total++;
    if (violations.length === 0) {
      this.#compliant++;
    } else {
      this.#violations.push(...violations);
    }
  }

  hasViolations(): boolean {
    return this.#violations.length > 0;
  }

  getResult(): ValidationResult<V> {
    const rate = complianceRate(this.#compliant, this.#total);
    return {
      family: this.#family,
      isValid: this.#violations.length === 0,
      violations: [...this.#violations],
      complianceRate: rate,
      total: this.#total,
      compliant: this.#compliant,
      summary: summarizeFamily(this.#family, this.#compliant, this.#total, this.#violations.length),
    };
  }
}

function summarizeFamily(
  family: ConstraintFamily,
  compliant: number,
  total: number,
  violationCount: number,
): string {
  if (total === 0) return `${family}: not applicable`;
  const rate = complianceRate(compliant, total).toFixed(1);
  return `${family}: ${compliant}/${total} compliant (${rate}%), ${violationCount} violation(s)`;
}
