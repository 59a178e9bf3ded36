/**
 * Type declarations for the logic-solver npm package (MiniSat compiled to
 * JavaScript). Only the calls MiniSatSolver makes are declared.
 */

declare module "logic-solver" {
  namespace Logic {
    const FALSE: string;

    type Term = string | number | Formula;
    type Formula = object;

    function or(...operands: Term[]): Formula;

    class Solver {
      constructor();
      getVarNum(variableName: string, noCreate?: boolean): number;
      require(...args: Term[]): void;
      solve(): Solution | null;
      /** Returns the optimum; the solver keeps the sum fixed at it afterwards */
      maximizeWeightedSum(solution: Solution, costTerms: Term[], costWeights: number[]): Solution;
    }

    class Solution {
      getTrueVars(): string[];
    }
  }

  export = Logic;
}
