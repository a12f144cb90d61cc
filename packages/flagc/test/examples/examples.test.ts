/**
 * Example Programs Test Suite
 *
 * Discovers every .yaml file under programs/, compiles its source tree to
 * tagged IR and checks the outcome against the file's `expect` section:
 *
 *   expect:
 *     error: INLINE002      - compilation fails with this code
 *     tagged: |             - formatted tagged IR
 *     removed: [x]          - destinations of the removed dead stores
 *     valid: true           - flattened IR passes validation
 */

import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { glob } from "glob";

import { compile } from "#compiler";
import { Result } from "#result";
import { arithmeticBuiltins } from "#builtins";
import * as Ir from "#ir";
import "#test/matchers";

import { parseExample, type Example } from "./annotations.js";

const PROGRAMS_DIR = fileURLToPath(new URL("./programs", import.meta.url));

interface ExampleInfo {
  relativePath: string;
  example: Example;
}

async function loadExamples(): Promise<ExampleInfo[]> {
  const files = await glob("**/*.yaml", { cwd: PROGRAMS_DIR });
  const examples: ExampleInfo[] = [];

  for (const relativePath of files.sort()) {
    const fullPath = path.join(PROGRAMS_DIR, relativePath);
    const text = await fs.readFile(fullPath, "utf-8");
    examples.push({ relativePath, example: parseExample(text) });
  }

  return examples;
}

function compileExample(example: Example) {
  return compile({
    to: "tagged",
    program: example.program,
    builtins: example.builtins === "arithmetic" ? arithmeticBuiltins() : [],
    inputs: example.inputs,
    results: example.results,
  });
}

describe("Example Programs", async () => {
  const examples = await loadExamples();

  it("finds the example programs", () => {
    expect(examples.length).toBeGreaterThan(0);
  });

  for (const { relativePath, example } of examples) {
    const { expect: expectation } = example;

    it(`${relativePath}: ${example.description}`, () => {
      const result = compileExample(example);

      if (expectation.error !== undefined) {
        expect(result.success).toBe(false);
        expect(result).toHaveMessage({ code: expectation.error });
        return;
      }

      if (!result.success) {
        const errors = Result.errors(result)
          .map((error) => `${error.code}: ${error.message}`)
          .join("\n");
        throw new Error(
          `Expected compilation to succeed but got errors:\n${errors}`,
        );
      }

      const { ir, tagged, liveness } = result.value;

      if (expectation.tagged !== undefined) {
        expect(new Ir.Analysis.Formatter().format(tagged, { tags: true })).toBe(
          expectation.tagged,
        );
      }

      if (expectation.removed !== undefined) {
        expect(
          liveness.transformations.map(({ original }) => original.dest),
        ).toEqual(expectation.removed);
      }

      if (expectation.valid !== undefined) {
        expect(new Ir.Analysis.Validator().validate(ir).isValid).toBe(
          expectation.valid,
        );
      }
    });
  }
});
