/**
 * Solver Abstraction Layer
 *
 * Exact independent-set solvers share one interface so tests can check a
 * mapping with whichever backend suits the instance. The SAT-backed solver
 * sits on a small clause-level interface that can be swapped between
 * SAT backends.
 */

/**
 * A literal is either a positive variable (variable number)
 * or a negative variable (-variable number).
 */
export type Literal = number;

/**
 * A clause is a disjunction (OR) of literals
 */
export type Clause = Literal[];

export type SolveResult =
  | { satisfiable: true; assignment: Map<number, boolean> }
  | { satisfiable: false };

/**
 * Clause-level SAT backend with weighted-sum optimisation
 */
export interface SATSolver {
  /** Create a new variable and return its number (1-indexed) */
  newVariable(): number;

  addClause(clause: Clause): void;

  /**
   * Find a satisfying assignment that maximises the sum of the weights of
   * the true variables. Weights must be non-negative integers.
   */
  maximize(variables: number[], weights: number[]): SolveResult;
}

/**
 * Named-variable helpers on top of a SATSolver
 */
export class BaseFormulaBuilder {
  solver: SATSolver;
  private nameToVar: Map<string, number> = new Map();

  constructor(solver: SATSolver) {
    this.solver = solver;
  }

  createNamedVariable(name: string): number {
    if (this.nameToVar.has(name)) {
      throw new Error(`Variable already exists: ${name}`);
    }
    const varNum = this.solver.newVariable();
    this.nameToVar.set(name, varNum);
    return varNum;
  }

  /** Not both: ¬a ∨ ¬b */
  addNand(a: Literal, b: Literal): void {
    this.solver.addClause([-a, -b]);
  }
}

// ============================================================================
// Independent-set problems
// ============================================================================

/**
 * An undirected graph with optional vertex weights (default 1).
 * sweepOrder, when given, is the vertex order a sweeping solver follows.
 */
export interface IndependentSetProblem {
  vertexCount: number;
  edges: ReadonlyArray<readonly [number, number]>;
  weights?: readonly number[];
  sweepOrder?: readonly number[];
}

export interface IndependentSetSolution {
  /** Total weight of the selected vertices */
  value: number;
  /** 1 for a selected vertex, 0 otherwise */
  config: number[];
}

/**
 * An exact maximum-weight independent-set solver
 */
export interface IndependentSetSolver {
  readonly name: string;
  solve(problem: IndependentSetProblem): IndependentSetSolution;
}

export function problemWeights(problem: IndependentSetProblem): number[] {
  const { vertexCount, weights } = problem;
  if (weights && weights.length !== vertexCount) {
    throw new RangeError(`Expected ${vertexCount} weights, got ${weights.length}`);
  }
  return weights ? [...weights] : new Array<number>(vertexCount).fill(1);
}

export function adjacencyLists(problem: IndependentSetProblem): number[][] {
  const lists: number[][] = Array.from({ length: problem.vertexCount }, () => []);
  for (const [u, v] of problem.edges) {
    lists[u].push(v);
    lists[v].push(u);
  }
  return lists;
}

/**
 * Whether a configuration selects no two adjacent vertices
 */
export function isIndependentSet(problem: IndependentSetProblem, config: readonly number[]): boolean {
  return problem.edges.every(([u, v]) => !(config[u] > 0 && config[v] > 0));
}
