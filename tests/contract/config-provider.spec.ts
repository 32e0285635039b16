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

/**
 * Contract tests for ConfigProvider implementations.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileConfigProvider } from "../../src/config/file-provider.js";
import { resolveConfig } from "../../src/config/index.js";
import type { ConfigProvider } from "../../src/config/provider.js";

interface ProviderFactory {
  /** A provider whose configuration is `{ l10n: { path: "res" } }`. */
  withConfig(dir: string): Promise<ConfigProvider>;
  /** A provider with no configuration at all. */
  empty(dir: string): Promise<ConfigProvider>;
}

/**
 * Reusable contract test suite for ConfigProvider implementations.
 */
function runConfigProviderContractTests(name: string, factory: ProviderFactory): void {
  describe(`ConfigProvider contract: ${name}`, () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "l10n-provider-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("exposes an absolute project root", async () => {
      const provider = await factory.withConfig(dir);
      expect(provider.rootDir).toBe(dir);
    });

    it("loadConfigFile() returns the parsed content with a non-empty source file", async () => {
      const raw = await (await factory.withConfig(dir)).loadConfigFile();
      expect(raw).not.toBeNull();
      expect(raw?.content).toEqual({ l10n: { path: "res" } });
      expect(raw?.sourceFile).not.toBe("");
    });

    it("loadConfigFile() returns null when there is no configuration", async () => {
      expect(await (await factory.empty(dir)).loadConfigFile()).toBeNull();
    });

    it("feeds resolveConfig", async () => {
      const config = await resolveConfig(await factory.withConfig(dir), { env: {} });
      expect(config.resourceRoot).toBe(join(dir, "res"));
    });
  });
}

runConfigProviderContractTests("FileConfigProvider", {
  async withConfig(dir) {
    await writeFile(join(dir, "l10n.yaml"), "l10n:\n  path: res\n", "utf-8");
    return new FileConfigProvider({ rootDir: dir, env: {} });
  },
  async empty(dir) {
    return new FileConfigProvider({ rootDir: dir, env: {} });
  },
});

runConfigProviderContractTests("in-memory provider", {
  async withConfig(dir) {
    return {
      rootDir: dir,
      loadConfigFile: async () => ({ content: { l10n: { path: "res" } }, sourceFile: "memory" }),
    };
  },
  async empty(dir) {
    return { rootDir: dir, loadConfigFile: async () => null };
  },
});
