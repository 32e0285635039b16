// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { USAGE, runValidateCommand } from "../../src/cli/validate-command.js";

const PROJECT = join(import.meta.dirname, "../fixtures/project");

function run(argv: string[], env: Record<string, string> = {}) {
  const log: string[] = [];
  const error: string[] = [];
  const io = { log: (m: string) => log.push(m), error: (m: string) => error.push(m) };
  return runValidateCommand(argv, { cwd: PROJECT, env, io }).then((code) => ({ code, log, error }));
}

describe("validate-messages (integration)", () => {
  it("exits 0 for a passing feed", async () => {
    const { code, log, error } = await run(["--usages", "usages.yaml"]);
    expect(code).toBe(0);
    expect(error).toEqual([]);
    expect(log[0]).toBe(`[l10n] Config: ${join(PROJECT, "l10n.yaml")}`);
    expect(log[1]).toBe(`[l10n] Resources: ${join(PROJECT, "l10n")}`);
    expect(log[2]).toMatch(/^\[l10n\] Catalog [a-f0-9]{12}: 3 locale\(s\), 8 resource\(s\), 6 usage\(s\)$/);
    expect(log[3]).toBe("Validation passed with no findings");
  });

  it("exits 1 and prints the findings for a failing feed", async () => {
    const { code, error } = await run(["--usages", "usages-broken.yaml"]);
    expect(code).toBe(1);
    expect(error).toEqual([
      [
        "Validation failed with 5 error(s) and 0 warning(s):",
        '  - [error] Message "welcome" in resource "home" requires missing arguments: name (locales: en, fr) (src/home.ts:10)',
        '  - [error] Message "farewell" is missing in resource "home" for locale en (src/home.ts:11)',
        '  - [error] Message "farewell" is missing in resource "home" for locale fr (src/home.ts:11)',
        '  - [error] Resource "profile" is missing for locale en (src/profile.ts:2)',
        '  - [error] Resource "profile" is missing for locale fr (src/profile.ts:2)',
      ].join("\n"),
    ]);
  });

  it("exits 0 when every error kind is downgraded", async () => {
    const { code, log } = await run([
      "--usages",
      "usages-broken.yaml",
      "--downgrade",
      "missing-argument",
      "--downgrade",
      "missing-message",
      "--downgrade",
      "missing-resource",
    ]);
    expect(code).toBe(0);
    expect(log[3]?.split("\n")[0]).toBe("Validation passed with 5 warning(s):");
  });

  it("exits 2 when the named config file does not exist", async () => {
    const { code, error } = await run(["--usages", "usages.yaml", "--config", "missing.yaml"]);
    expect(code).toBe(2);
    expect(error).toEqual([`[l10n] Config file not found: ${join(PROJECT, "missing.yaml")}`]);
  });

  it("exits 2 for a missing usage feed", async () => {
    const { code, error } = await run(["--usages", "nope.yaml"]);
    expect(code).toBe(2);
    expect(error[0]?.startsWith("[l10n] Cannot read usage feed: ")).toBe(true);
  });

  it("exits 2 and prints usage for bad arguments", async () => {
    const { code, error } = await run([]);
    expect(code).toBe(2);
    expect(error).toEqual(["[l10n] --usages is required", USAGE]);
  });

  it("prints usage for --help", async () => {
    const { code, log } = await run(["--help"]);
    expect(code).toBe(0);
    expect(log).toEqual([USAGE]);
  });
});
