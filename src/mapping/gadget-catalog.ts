/**
 * Gadget Catalog
 *
 * Loads the base gadgets from their JSON files and assembles the ordered
 * rulesets each layout mode rewrites with. The catalog is immutable and
 * built once at module load.
 */

import ksgCatalogFile from "./gadgets/ksg-gadgets.json";
import triangularCatalogFile from "./gadgets/triangular-gadgets.json";
import type { LatticeKind, LayoutMode } from "./graph-types";
import { catalogFileSchema, patternFromCatalog, reflected, rotated, type Pattern } from "./pattern";

export interface Ruleset {
  lattice: LatticeKind;
  /** Tried in order at every crossing location; the first match wins */
  crossing: readonly Pattern[];
  /** Dangling-leg variants, applied everywhere they match */
  simplifiers: readonly Pattern[];
}

type Catalog = ReadonlyMap<string, Pattern>;

function loadCatalog(file: unknown, overheadScale: number): Catalog {
  const parsed = catalogFileSchema.parse(file);
  return new Map(parsed.gadgets.map((g) => [g.name, patternFromCatalog(g, overheadScale)]));
}

function gadget(catalog: Catalog, name: string): Pattern {
  const pattern = catalog.get(name);
  if (!pattern) {
    throw new Error(`Gadget not in catalog: ${name}`);
  }
  return pattern;
}

function kingRuleset(catalog: Catalog): Ruleset {
  const g = (name: string) => gadget(catalog, name);
  const rotatedTCon = rotated(g("TCon"), 1);
  const leg = g("DanglingLeg");
  return {
    lattice: "king",
    crossing: [
      g("Cross<false>"),
      g("Turn"),
      g("WTurn"),
      g("Branch"),
      g("BranchFix"),
      g("TCon"),
      g("TrivialTurn"),
      rotatedTCon,
      reflected(g("Cross<true>"), "y"),
      reflected(g("TrivialTurn"), "y"),
      g("BranchFixB"),
      g("EndTurn"),
      reflected(rotatedTCon, "y"),
    ],
    simplifiers: [leg, rotated(leg, 1), rotated(leg, 2), rotated(leg, 3), reflected(leg, "x"), reflected(leg, "y")],
  };
}

function triangularRuleset(catalog: Catalog): Ruleset {
  const g = (name: string) => gadget(catalog, name);
  const leg = g("DanglingLeg");
  return {
    lattice: "triangular",
    crossing: [
      g("TriCross<true>"),
      g("TriCross<false>"),
      g("TriTConLeft"),
      g("TriTConUp"),
      g("TriTConDown"),
      g("TriTrivialTurnLeft"),
      g("TriTrivialTurnRight"),
      g("TriEndTurn"),
      g("TriTurn"),
      g("TriWTurn"),
      g("TriBranchFix"),
      g("TriBranchFixB"),
      g("TriBranch"),
    ],
    // down, up, right, left
    simplifiers: [leg, rotated(leg, 2), rotated(leg, 3), rotated(leg, 1)],
  };
}

const RULESETS: Readonly<Record<LayoutMode, Ruleset>> = {
  ksg: kingRuleset(loadCatalog(ksgCatalogFile, 1)),
  weighted: kingRuleset(loadCatalog(ksgCatalogFile, 2)),
  triangular: triangularRuleset(loadCatalog(triangularCatalogFile, 1)),
};

export function rulesetFor(mode: LayoutMode): Ruleset {
  return RULESETS[mode];
}

/**
 * Every pattern a mode can apply, crossing gadgets first
 */
export function allPatterns(mode: LayoutMode): Pattern[] {
  const { crossing, simplifiers } = RULESETS[mode];
  return [...crossing, ...simplifiers];
}
