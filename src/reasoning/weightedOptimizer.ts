import type { Assignment, Proposition, SoftClause } from '../types/index.js';

export const PROPOSITIONS: readonly Proposition[] = ['harm', 'intent', 'empathy', 'apology'];

export interface OptimizationResult {
  assignment: Assignment;
  satisfiedWeight: number;
  totalWeight: number;
  /** Number of assignments, the chosen one included, that reach `satisfiedWeight`. */
  tiedAssignments: number;
}

/**
 * All 16 assignments in tie-break order: lexicographic over PROPOSITIONS with `harm`
 * most significant and `false` before `true`.
 */
export function enumerateAssignments(): Assignment[] {
  const assignments: Assignment[] = [];
  for (let bits = 0; bits < 1 << PROPOSITIONS.length; bits += 1) {
    assignments.push({
      harm: (bits & 0b1000) !== 0,
      intent: (bits & 0b0100) !== 0,
      empathy: (bits & 0b0010) !== 0,
      apology: (bits & 0b0001) !== 0,
    });
  }
  return assignments;
}

export function satisfiedWeight(clauses: readonly SoftClause[], assignment: Assignment): number {
  let total = 0;
  for (const clause of clauses) {
    if (!PROPOSITIONS.includes(clause.proposition)) {
      throw new Error(`Unknown proposition in soft clause: ${String(clause.proposition)}`);
    }
    if (assignment[clause.proposition] === clause.polarity) {
      total += clause.weight;
    }
  }
  return total;
}

/**
 * Brute-force weighted MaxSAT over the four propositions. The first assignment in
 * enumeration order that reaches the maximum wins, so ties resolve deterministically.
 * Returns null only when no assignment scores to a comparable number (e.g. NaN weights).
 */
export function optimize(clauses: readonly SoftClause[]): OptimizationResult | null {
  let best: Assignment | null = null;
  let bestWeight = Number.NEGATIVE_INFINITY;
  let tied = 0;

  for (const candidate of enumerateAssignments()) {
    const weight = satisfiedWeight(clauses, candidate);
    if (weight > bestWeight) {
      best = candidate;
      bestWeight = weight;
      tied = 1;
    } else if (weight === bestWeight) {
      tied += 1;
    }
  }

  if (!best) {
    return null;
  }

  return {
    assignment: best,
    satisfiedWeight: bestWeight,
    totalWeight: clauses.reduce((sum, clause) => sum + clause.weight, 0),
    tiedAssignments: tied,
  };
}
