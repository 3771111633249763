// Conformance runner: drives translation cases from fixtures/translations.json.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
  type TranslateErrorKind,
  cronFields,
  display,
  emit,
  match,
  translate,
} from "../src/index.js";

interface TranslationCase {
  input: string;
  cron: string;
  description: string;
  canonical: string;
}

interface ErrorCase {
  input: string;
  kind: TranslateErrorKind;
  offending: string;
}

interface Fixture {
  cases: TranslationCase[];
  errors: ErrorCase[];
}

const fixturePath = fileURLToPath(
  new URL("./fixtures/translations.json", import.meta.url),
);
const fixture: Fixture = JSON.parse(readFileSync(fixturePath, "utf-8"));

describe("translations", () => {
  for (const tc of fixture.cases) {
    it(JSON.stringify(tc.input), () => {
      const result = translate(tc.input);
      if (!result.ok) throw result.error;
      expect(result.value.expression).toBe(tc.cron);
      expect(result.value.description).toBe(tc.description);
      expect(cronFields(result.value.cron).join(" ")).toBe(tc.cron);
    });
  }
});

describe("canonical phrases", () => {
  for (const tc of fixture.cases) {
    it(`${JSON.stringify(tc.input)} -> ${tc.canonical}`, () => {
      const first = match(tc.input);
      if (!first.ok) throw first.error;
      expect(display(first.value)).toBe(tc.canonical);

      // Idempotency: the canonical phrase matches to the same pattern
      const second = match(tc.canonical);
      if (!second.ok) throw second.error;
      expect(second.value).toEqual(first.value);
      expect(display(second.value)).toBe(tc.canonical);
    });
  }
});

describe("emit totality", () => {
  it("emits every matched pattern", () => {
    for (const tc of fixture.cases) {
      const matched = match(tc.input);
      if (!matched.ok) throw matched.error;
      expect(() => emit(matched.value)).not.toThrow();
    }
  });
});

describe("translation errors", () => {
  for (const tc of fixture.errors) {
    it(JSON.stringify(tc.input), () => {
      const result = translate(tc.input);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(tc.kind);
      expect(result.error.offending).toBe(tc.offending);
    });
  }
});
