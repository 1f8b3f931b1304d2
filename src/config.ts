/**
 * Global evosys configuration contract & default instance.
 *
 * WHY THIS EXISTS
 * --------------
 * A central `config` object offers one documented surface for end-users (and tests)
 * to tweak library defaults without digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'evosys';
 *   config.warnings = true;          // enable runtime warnings
 *   config.maxDerivationDepth = 40;  // tighter bound for grammar expansion
 *
 * Adjust BEFORE constructing systems / random streams / expanding genomes: values are
 * read once when those objects are created, so a running experiment never observes a
 * change mid-generation.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object, no setters / proxies.
 * - Per-run settings (population sizes, seeds, limits) do NOT live here; they belong to the
 *   experiment's `ConfigurationContext`.
 */
export type WrapPolicy = 'wrap' | 'fail' | 'pad';

export interface EvosysConfig {
  /**
   * Emit binding and runtime warnings to stderr (`console.warn`).
   * Default: false
   */
  warnings: boolean;

  /**
   * Seed used for both random streams when none is supplied.
   * Default: 12345
   */
  defaultSeed: number;

  /**
   * Maximum derivation depth for grammar expansion. Exceeding it raises
   * `GrammarRecursionLimitError`, which keeps left-recursive grammars from running away.
   * Default: 100
   */
  maxDerivationDepth: number;

  /**
   * Spaces emitted per indent level by the `INDENT` built-in rule.
   * Default: 1
   */
  indentWidth: number;

  /**
   * What the expander does when a genome runs out of codons.
   * Default: 'wrap'
   */
  wrapPolicy: WrapPolicy;

  /**
   * Upper bound on genome reuse under the 'wrap' policy. `Infinity` = unbounded
   * (termination is then guaranteed by `maxDerivationDepth`).
   */
  maxWraps: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: EvosysConfig = {
  warnings: false, // emit runtime guidance
  defaultSeed: 12345, // breeding + landscape default seed
  maxDerivationDepth: 100, // grammar recursion bound
  indentWidth: 1, // spaces per INDENT level
  wrapPolicy: 'wrap', // exhausted genome behaviour
  maxWraps: Infinity, // genome reuse cap under 'wrap'
};
