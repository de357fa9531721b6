/**
 * Training text: free text fed to the language model, or conversion
 * rules for alphabets that route input through a converter.
 */

import type { Alphabet } from "./alphabet";
import type { ConversionRule } from "./conversion";
import type { LanguageModel } from "./models";
import { ConfigurationError } from "./errors";

/** Lines that carry content: not blank, not `#` comments. */
function contentLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "" && !line.trimStart().startsWith("#"));
}

/** A run of training symbols and the history it follows. */
export interface TrainingSegment {
  /** Taken as already written; not learnt. */
  readonly context: number[];
  readonly symbols: number[];
}

/**
 * Split a free-text training file into segments.  Lines are joined with
 * a newline if the alphabet has one, otherwise with a space.  The
 * alphabet's context escape sets the history for what follows:
 * `§ab§` starts a new segment after "ab", and a doubled escape stands
 * for the escape text itself.
 */
export function trainingSegments(text: string, alphabet: Alphabet): TrainingSegment[] {
  const separator = alphabet.symbolForText("\n") !== undefined ? "\n" : " ";
  const body = contentLines(text).join(separator);
  const escape = alphabet.contextEscape;
  const segments: TrainingSegment[] = [];
  let context: number[] = [];
  let pending = "";

  const flush = () => {
    const symbols = alphabet.textToSymbols(pending);
    if (symbols.length > 0) segments.push({ context, symbols });
    pending = "";
  };

  let i = 0;
  while (i < body.length) {
    if (!body.startsWith(escape, i)) {
      pending += body[i];
      i++;
    } else if (body.startsWith(escape, i + escape.length)) {
      pending += escape;
      i += 2 * escape.length;
    } else {
      const end = body.indexOf(escape, i + escape.length);
      if (end < 0) {
        throw new ConfigurationError(`unterminated context escape in training text at ${i}`);
      }
      flush();
      context = alphabet.textToSymbols(body.slice(i + escape.length, end));
      i = end + escape.length;
    }
  }
  flush();
  return segments;
}

/**
 * Parse `input=output` and `context:input=output` lines.  Context is
 * only recognised when `contextSensitive` is set, so that a colon can
 * appear in context-free input.
 */
export function parseConversionRules(
  text: string,
  contextSensitive: boolean,
): ConversionRule[] {
  const rules: ConversionRule[] = [];
  for (const line of contentLines(text)) {
    const eq = line.indexOf("=");
    if (eq <= 0) {
      throw new ConfigurationError(`conversion rule without "=": ${line}`);
    }
    let lhs = line.slice(0, eq);
    const output = line.slice(eq + 1);
    let context: string | undefined;
    if (contextSensitive) {
      const colon = lhs.indexOf(":");
      if (colon >= 0) {
        context = lhs.slice(0, colon);
        lhs = lhs.slice(colon + 1);
      }
    }
    if (lhs === "") {
      throw new ConfigurationError(`conversion rule with empty input: ${line}`);
    }
    rules.push(context ? { input: lhs, output, context } : { input: lhs, output });
  }
  return rules;
}

/** Feed `symbols` to the model one at a time, each with its own context. */
export function trainModel(
  model: LanguageModel,
  symbols: readonly number[],
  context: readonly number[] = [],
): void {
  const history = [...context];
  for (const symbol of symbols) {
    model.observe(history.slice(Math.max(0, history.length - model.contextLength)), symbol);
    history.push(symbol);
  }
}

/** Train on every segment of a training file; returns the symbols learnt. */
export function trainOnText(model: LanguageModel, text: string, alphabet: Alphabet): number {
  let learnt = 0;
  for (const segment of trainingSegments(text, alphabet)) {
    trainModel(model, segment.symbols, segment.context);
    learnt += segment.symbols.length;
  }
  return learnt;
}
