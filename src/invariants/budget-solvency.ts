/**
 * BUDGET_SOLVENCY: every oversight plan must keep the worst-case fitted
 * risk within the strictest tolerance that applies to its context.
 *
 * For a plan at context P and a (hazard, severity) pair:
 *   strictest τ  = min τ over tolerances whose context covers P
 *   worst risk   = max risk over fits whose context covers P
 *   solvent      ⇔ worst risk ≤ strictest τ
 * Aggregation is min/max, never an average.
 */

import type { ContextLattice } from "../lattice/lattice.js";
import {
  loadOversightPlans,
  loadRepoLattice,
  loadRiskFits,
  loadTolerances,
  type OversightPlan,
  type RiskFit,
  type Tolerance,
} from "./repo.js";
import {
  describeError,
  failResult,
  type FailureRecord,
  type Invariant,
  type InvariantCheck,
  type InvariantContext,
} from "./types.js";

const NAME = "BUDGET_SOLVENCY";

/** Parse a numeric field; numeric strings are accepted. */
export function getNumeric(value: unknown, field: string, source: string): number {
  let n = Number.NaN;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    n = Number(value);
  }
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid numeric '${field}' in ${source}`);
  }
  return n;
}

function pick(record: Record<string, unknown>, primary: string, fallback: string): unknown {
  return primary in record ? record[primary] : record[fallback];
}

/**
 * Risk of one fit under a plan's channel allocations:
 *
 *   ε_high + Σ_channel k_low(channel) / allocation(channel)
 *
 * `k_low(channel)` is `k_low_by_channel[channel]`, else the fit-wide
 * `conservative_k_low` / `k_low`; channels without any k_low add nothing.
 * Allocations must be strictly positive.
 */
export function computeFitRisk(
  fit: Record<string, unknown>,
  channelAllocations: unknown,
  source: string,
): number {
  let risk = getNumeric(
    pick(fit, "conservative_epsilon_high", "epsilon_high"),
    "conservative_epsilon_high",
    source,
  );

  if (channelAllocations === null || channelAllocations === undefined) return risk;
  if (typeof channelAllocations !== "object" || Array.isArray(channelAllocations)) {
    throw new Error(`channel_allocations must be a mapping in ${source}`);
  }

  const kLowDefault = pick(fit, "conservative_k_low", "k_low");
  const byChannelRaw = fit["k_low_by_channel"];
  const kLowByChannel =
    typeof byChannelRaw === "object" && byChannelRaw !== null ? byChannelRaw : {};

  for (const [channel, allocation] of Object.entries(channelAllocations)) {
    const allocationValue = getNumeric(allocation, `channel_allocations[${channel}]`, source);
    if (allocationValue <= 0) {
      throw new Error(`channel_allocations[${channel}] must be > 0 in ${source}`);
    }
    const kLow: unknown =
      Object.hasOwn(kLowByChannel, channel) ? Reflect.get(kLowByChannel, channel) : kLowDefault;
    if (kLow === null || kLow === undefined) continue;
    risk += getNumeric(kLow, `k_low[${channel}]`, source) / allocationValue;
  }
  return risk;
}

export interface SolvencyEvaluation {
  plan: string;
  hazardId: string;
  severityId: string;
  strictestTau: number;
  worstCaseRisk: number;
  solvent: boolean;
}

export interface SolvencyReport {
  evaluations: SolvencyEvaluation[];
  failures: FailureRecord[];
}

/** Distinct (hazard, severity) pairs declared by tolerances, sorted. */
function hazardPairs(tolerances: readonly Tolerance[]): Array<[string, string]> {
  const seen = new Map<string, [string, string]>();
  for (const tol of tolerances) {
    if (tol.hazardId === undefined || tol.severityId === undefined) continue;
    seen.set(JSON.stringify([tol.hazardId, tol.severityId]), [tol.hazardId, tol.severityId]);
  }
  return [...seen.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, pair]) => pair);
}

/**
 * Evaluate every plan against every declared (hazard, severity) pair.
 * Pure: all inputs are passed in.
 */
export function evaluateBudgetSolvency(
  lattice: ContextLattice,
  plans: readonly OversightPlan[],
  tolerances: readonly Tolerance[],
  fits: readonly RiskFit[],
): SolvencyReport {
  const evaluations: SolvencyEvaluation[] = [];
  const failures: FailureRecord[] = [];

  for (const plan of plans) {
    const planLabel = plan.planId ?? plan.contextClass;
    for (const [hazardId, severityId] of hazardPairs(tolerances)) {
      const fail = (reason: string, file: string): void => {
        failures.push({ plan: planLabel, reason, hazard_id: hazardId, severity_id: severityId, file });
      };

      // Tolerances ------------------------------------------------------
      const taus: number[] = [];
      let applicableTolerances = 0;
      for (const tol of tolerances) {
        if (tol.hazardId !== hazardId || tol.severityId !== severityId) continue;
        if (tol.contextClass === undefined) {
          fail("Tolerance missing context_class", tol.file);
          continue;
        }
        let applies: boolean;
        try {
          applies = lattice.covers(tol.contextClass, plan.contextClass);
        } catch (error) {
          fail(describeError(error), tol.file);
          continue;
        }
        if (!applies) continue;
        applicableTolerances += 1;
        try {
          taus.push(getNumeric(tol.tau, "tau", tol.file));
        } catch (error) {
          fail(describeError(error), tol.file);
        }
      }
      if (applicableTolerances === 0) {
        fail("No tolerance covers plan context", plan.file);
        continue;
      }
      if (taus.length === 0) {
        fail("No valid tau values found", plan.file);
        continue;
      }
      const strictestTau = Math.min(...taus);

      // Fits ------------------------------------------------------------
      const applicableFits: RiskFit[] = [];
      for (const fit of fits) {
        if (fit.hazardId !== hazardId || fit.severityId !== severityId) continue;
        if (fit.contextClass === undefined) {
          fail("Risk fit missing context_class", fit.file);
          continue;
        }
        try {
          if (lattice.covers(fit.contextClass, plan.contextClass)) {
            applicableFits.push(fit);
          }
        } catch (error) {
          fail(describeError(error), fit.file);
        }
      }
      if (applicableFits.length === 0) {
        fail("No risk fit covers plan context", plan.file);
        continue;
      }

      const risks: number[] = [];
      for (const fit of applicableFits) {
        try {
          risks.push(computeFitRisk(fit.data, plan.channelAllocations, fit.file));
        } catch (error) {
          fail(describeError(error), fit.file);
        }
      }
      if (risks.length === 0) {
        fail("No computable risk from applicable fits", plan.file);
        continue;
      }
      const worstCaseRisk = Math.max(...risks);

      const solvent = worstCaseRisk <= strictestTau;
      evaluations.push({ plan: planLabel, hazardId, severityId, strictestTau, worstCaseRisk, solvent });
      if (!solvent) {
        fail(
          `Risk ${formatNumber(worstCaseRisk)} exceeds tau ${formatNumber(strictestTau)}`,
          plan.file,
        );
      }
    }
  }

  return { evaluations, failures };
}

function formatNumber(n: number): string {
  return String(Number(n.toPrecision(6)));
}

export const budgetSolvencyInvariant: Invariant = {
  name: NAME,
  check(ctx: InvariantContext): InvariantCheck {
    let lattice: ContextLattice;
    let latticePath: string;
    try {
      ({ lattice, path: latticePath } = loadRepoLattice(ctx.repoRoot));
    } catch (error) {
      return { name: NAME, result: "FAIL", message: describeError(error) };
    }

    const plans = loadOversightPlans(ctx.repoRoot, ctx.logger);
    if (plans.length === 0) {
      return {
        name: NAME,
        result: "SKIP",
        message: `No oversight plans found (lattice: ${latticePath.split(/[\\/]/).pop() ?? latticePath})`,
      };
    }

    const tolerances = loadTolerances(ctx.repoRoot, ctx.logger);
    if (tolerances.length === 0) {
      return { name: NAME, result: "FAIL", message: "No safety contract tolerances found" };
    }

    const fits = loadRiskFits(ctx.repoRoot, ctx.logger);
    if (fits.length === 0) {
      return { name: NAME, result: "FAIL", message: "No risk fits found" };
    }

    const report = evaluateBudgetSolvency(lattice, plans, tolerances, fits);
    if (report.failures.length > 0) {
      return failResult(NAME, report.failures, "solvency issue");
    }
    return {
      name: NAME,
      result: "PASS",
      message: `Verified ${plans.length} oversight plan(s) against lattice and tolerances`,
      details: { evaluations: report.evaluations },
    };
  },
};
