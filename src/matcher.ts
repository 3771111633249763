import type { SchedulePattern } from "./ast.js";
import { type Result, TranslateError, fail } from "./error.js";
import { type Phrase, preparePhrase } from "./lexer.js";
import { SHAPES, type Shape } from "./shapes.js";

/**
 * Classify a phrase against the shapes in precedence order and extract its
 * parameters. Once a shape recognizes the phrase its verdict is final: a bad
 * slot is reported, never retried against a later shape.
 */
export function match(input: string): Result<SchedulePattern> {
  const phrase = preparePhrase(input);

  if (phrase.raw.length === 0) {
    return fail(
      TranslateError.noMatch("empty expression", { start: 0, end: 0 }, ""),
    );
  }

  const shape = recognizeShape(phrase);
  if (shape === null) {
    return fail(
      TranslateError.noMatch(
        "unsupported phrasing",
        { start: 0, end: phrase.normalized.length },
        phrase.normalized,
        suggestExample(phrase),
      ),
    );
  }
  return shape.extract(phrase);
}

export function recognizeShape(phrase: Phrase): Shape | null {
  return SHAPES.find((shape) => shape.recognize(phrase)) ?? null;
}

/** Example of a shape that starts with the same keyword, if any. */
function suggestExample(phrase: Phrase): string | undefined {
  const lead = phrase.tokens.length > 0 ? phrase.tokens[0].kind : null;
  if (lead?.type !== "word") return undefined;
  const word = lead.word;
  return SHAPES.find((shape) => shape.example.split(" ")[0] === word)?.example;
}
