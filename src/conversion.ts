/**
 * Conversion of committed input (e.g. phonetic spelling) into output
 * text, for alphabets whose conversion mode is not "none".
 *
 * Rules are matched left to right over the input.  At each position the
 * applicable rule with the longest context wins, then the one with the
 * longest input, then the one defined first.  A rule's context must be
 * a suffix of the input consumed so far.  Input no rule covers is
 * copied through.
 */

import type { Alphabet, ConversionMode } from "./alphabet";

export interface ConversionRule {
  readonly input: string;
  readonly output: string;
  /** Only for context-sensitive routes. */
  readonly context?: string;
}

export interface ConversionManager {
  readonly mode: ConversionMode;
  readonly rules: readonly ConversionRule[];
  convert(input: string): string;
  /** The rule that would apply at `position`, if any. */
  ruleAt(input: string, position: number): ConversionRule | undefined;
}

/**
 * Rules an alphabet carries itself.  A phonetic map turns each symbol's
 * display form into its text.  A route maps the symbols written between
 * the `trainStart` and `trainStop` markers onto the symbol that follows.
 */
export function alphabetRules(alphabet: Alphabet): ConversionRule[] {
  const rules: ConversionRule[] = [];
  if (alphabet.conversion === "phonetic-map") {
    for (let s = 1; s <= alphabet.size; s++) {
      const { text, display } = alphabet.symbol(s);
      if (text !== "" && text !== display) rules.push({ input: display, output: text });
    }
  } else if (alphabet.conversion !== "none") {
    let inTraining = false;
    let input = "";
    for (let s = 1; s <= alphabet.size; s++) {
      const { text } = alphabet.symbol(s);
      if (text === alphabet.trainStart) {
        inTraining = true;
        input = "";
      } else if (text === alphabet.trainStop) {
        inTraining = false;
      } else if (inTraining) {
        input += text;
      } else if (input !== "") {
        rules.push({ input, output: text });
        input = "";
      }
    }
  }
  return rules;
}

export function createConversionManager(
  mode: ConversionMode,
  rules: readonly ConversionRule[],
): ConversionManager {
  // Context rules are ignored unless routing is context-sensitive.
  const active = rules.filter(
    (r) =>
      r.input.length > 0 &&
      (mode === "context-sensitive-route" || !r.context),
  );

  function ruleAt(input: string, position: number): ConversionRule | undefined {
    const before = input.slice(0, position);
    let best: ConversionRule | undefined;
    let bestContext = -1;
    let bestInput = -1;
    for (const rule of active) {
      if (!input.startsWith(rule.input, position)) continue;
      const context = rule.context ?? "";
      if (!before.endsWith(context)) continue;
      if (
        context.length > bestContext ||
        (context.length === bestContext && rule.input.length > bestInput)
      ) {
        best = rule;
        bestContext = context.length;
        bestInput = rule.input.length;
      }
    }
    return best;
  }

  return {
    mode,
    rules: active,
    ruleAt,

    convert(input) {
      if (mode === "none") return input;
      let out = "";
      let i = 0;
      while (i < input.length) {
        const rule = ruleAt(input, i);
        if (rule) {
          out += rule.output;
          i += rule.input.length;
        } else {
          out += input[i];
          i++;
        }
      }
      return out;
    },
  };
}
