/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * imports.test.ts: Tests for module specifier conventions across the source tree.
 */
import { describe, expect, it } from "vitest";
import { readFile, readdir } from "node:fs/promises";
import { builtinModules } from "node:module";
import { fileURLToPath } from "node:url";
import path from "node:path";

const SOURCE_DIR = fileURLToPath(new URL("../src", import.meta.url));
const SPECIFIER_PATTERN = /from "([^"]+)"/g;

describe("source imports", () => {

  it("name built-in modules with the node: prefix", async () => {

    const files = (await readdir(SOURCE_DIR, { recursive: true })).filter((file) => file.endsWith(".ts"));
    const bare: string[] = [];

    for(const file of files) {

      // eslint-disable-next-line no-await-in-loop
      const text = await readFile(path.join(SOURCE_DIR, file), "utf8");

      for(const match of text.matchAll(SPECIFIER_PATTERN)) {

        if(builtinModules.includes(match[1])) {

          bare.push([ file, ": ", match[1] ].join(""));
        }
      }
    }

    expect(files.length).toBeGreaterThan(0);
    expect(bare).toEqual([]);
  });
});
