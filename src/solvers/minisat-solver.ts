/**
 * MiniSat-based Solver Implementation
 *
 * Uses the logic-solver npm package which contains MiniSat
 * compiled to JavaScript via Emscripten.
 */

import Logic from "logic-solver";
import {
  BaseFormulaBuilder,
  problemWeights,
  type Clause,
  type IndependentSetProblem,
  type IndependentSetSolution,
  type IndependentSetSolver,
  type SATSolver,
  type SolveResult,
} from "./types";

/**
 * Implementation of SATSolver using logic-solver (MiniSat)
 */
export class MiniSatSolver implements SATSolver {
  private solver: Logic.Solver;
  private variableCount: number = 0;
  private varNumToName: Map<number, string> = new Map();

  constructor() {
    this.solver = new Logic.Solver();
  }

  newVariable(): number {
    this.variableCount++;
    const varName = `v${this.variableCount}`;
    this.varNumToName.set(this.variableCount, varName);
    // Force the variable to exist in the solver
    this.solver.getVarNum(varName);
    return this.variableCount;
  }

  addClause(clause: Clause): void {
    if (clause.length === 0) {
      // Empty clause means UNSAT
      this.solver.require(Logic.FALSE);
      return;
    }

    const terms = clause.map((lit) => {
      const varName = this.nameOf(Math.abs(lit));
      return lit > 0 ? varName : `-${varName}`;
    });

    this.solver.require(Logic.or(...terms));
  }

  maximize(variables: number[], weights: number[]): SolveResult {
    if (weights.some((w) => !Number.isInteger(w) || w < 0)) {
      throw new RangeError("MiniSat weighted sums take non-negative integer weights");
    }
    const first = this.solver.solve();
    if (!first) {
      return { satisfiable: false };
    }
    const names = variables.map((v) => this.nameOf(v));
    return this.toResult(this.solver.maximizeWeightedSum(first, names, weights));
  }

  private nameOf(varNum: number): string {
    const varName = this.varNumToName.get(varNum);
    if (!varName) {
      throw new Error(`Unknown variable: ${varNum}`);
    }
    return varName;
  }

  private toResult(solution: Logic.Solution | null): SolveResult {
    if (!solution) {
      return { satisfiable: false };
    }

    const assignment = new Map<number, boolean>();
    const trueVars = new Set(solution.getTrueVars());
    for (const [varNum, varName] of this.varNumToName) {
      assignment.set(varNum, trueVars.has(varName));
    }
    return { satisfiable: true, assignment };
  }
}

/**
 * Formula builder implementation using MiniSat
 */
export class MiniSatFormulaBuilder extends BaseFormulaBuilder {
  constructor() {
    super(new MiniSatSolver());
  }
}

/** Largest denominator tried when scaling fractional weights to integers */
const MAX_WEIGHT_SCALE = 1024;

function integerScale(weights: readonly number[]): number {
  for (let scale = 1; scale <= MAX_WEIGHT_SCALE; scale *= 2) {
    if (weights.every((w) => Number.isInteger(w * scale))) {
      return scale;
    }
  }
  throw new RangeError(`Weights are not multiples of 1/${MAX_WEIGHT_SCALE}`);
}

/**
 * Maximum-weight independent set as weighted MaxSAT: one variable per
 * vertex, one "not both" clause per edge. Fractional weights are scaled by
 * a power of two so MiniSat sees integers.
 */
export class MiniSatIndependentSetSolver implements IndependentSetSolver {
  readonly name = "minisat";

  solve(problem: IndependentSetProblem): IndependentSetSolution {
    const weights = problemWeights(problem);
    if (weights.some((w) => w < 0)) {
      throw new RangeError("Vertex weights must be non-negative");
    }
    const scale = integerScale(weights);

    const builder = new MiniSatFormulaBuilder();
    const vars: number[] = [];
    for (let v = 0; v < problem.vertexCount; v++) {
      vars.push(builder.createNamedVariable(`x${v}`));
    }
    for (const [u, v] of problem.edges) {
      builder.addNand(vars[u], vars[v]);
    }

    const result = builder.solver.maximize(
      vars,
      weights.map((w) => Math.round(w * scale))
    );
    if (!result.satisfiable) {
      // The all-zero assignment always satisfies the edge clauses
      throw new Error("Independent-set formula reported unsatisfiable");
    }

    const config = vars.map((x) => (result.assignment.get(x) ? 1 : 0));
    const value = config.reduce<number>((sum, bit, v) => sum + bit * weights[v], 0);
    return { value, config };
  }
}
