import { log } from "./utils/logger/log.js";

/**
 * Predefined patterns for {@link TextValidator.setPattern}.
 */
export const Validators = {
  /** Accept any input. */
  All: ".*",
  /** Accept negative and positive integers. */
  Int: "[+-]?[0-9]*",
  /** Accept only positive integers. */
  UInt: "[0-9]*",
  /** Accept decimal numbers. */
  Float: "[+-]?[0-9]*\\.?[0-9]*",
} as const;

export type ValidatorPreset = keyof typeof Validators;

function compile(pattern: string): RegExp {
  // Compile the bare pattern first: something like "a)|(b" is only rejected
  // before it gets wrapped in the anchoring group below.
  new RegExp(pattern, "su");
  return new RegExp(`^(?:${pattern})$`, "su");
}

/**
 * Decides whether a candidate text is acceptable. Holds an immutable pattern
 * string together with its compiled matcher; the pair is only ever replaced
 * as a unit.
 */
export default class TextValidator {
  private pattern: string;
  private matcher: RegExp;

  constructor(pattern: string = Validators.All) {
    this.pattern = Validators.All;
    this.matcher = compile(Validators.All);
    this.setPattern(pattern);
  }

  getPattern(): string {
    return this.pattern;
  }

  /** True iff the whole of `candidate` matches the configured pattern. */
  matches(candidate: string): boolean {
    return this.matcher.test(candidate);
  }

  /**
   * Recompile with a new pattern. Returns false and keeps the previous
   * pattern when `pattern` is not a valid regular expression.
   */
  setPattern(pattern: string): boolean {
    let matcher: RegExp;
    try {
      matcher = compile(pattern);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log(
        `[lineedit] invalid input validator ${JSON.stringify(pattern)}: ${reason}`,
      );
      return false;
    }
    this.pattern = pattern;
    this.matcher = matcher;
    return true;
  }
}
