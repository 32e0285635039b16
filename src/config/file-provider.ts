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
 * FileConfigProvider: reads l10n.yaml / l10n.yml / l10n.json from the project root,
 * or the file named by L10N_CONFIG_FILE.
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, join, parse as parsePath, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { substituteEnvVars } from "./env-substitute.js";
import { ConfigError } from "./errors.js";
import type {
  ConfigProvider,
  Env,
  FileConfigProviderOptions,
  RawConfig,
  RawConfigFile,
} from "./provider.js";

export const CONFIG_FILE_ENV = "L10N_CONFIG_FILE";
export const DEFAULT_CONFIG_FILES: readonly string[] = ["l10n.yaml", "l10n.yml", "l10n.json"];

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class FileConfigProvider implements ConfigProvider {
  readonly rootDir: string;
  private readonly configFile: string | undefined;
  private readonly env: Env;

  constructor(options: FileConfigProviderOptions) {
    this.rootDir = resolve(options.rootDir);
    this.env = options.env ?? process.env;
    this.configFile = options.configFile ?? this.env[CONFIG_FILE_ENV];
  }

  async loadConfigFile(): Promise<RawConfigFile | null> {
    if (this.configFile) {
      const filePath = isAbsolute(this.configFile)
        ? this.configFile
        : join(this.rootDir, this.configFile);
      const text = await this.readText(filePath);
      if (text === null) {
        throw new ConfigError({
          file: filePath,
          message: `Config file not found: ${filePath}`,
        });
      }
      return { content: this.parseFile(text, filePath), sourceFile: filePath };
    }

    for (const name of DEFAULT_CONFIG_FILES) {
      const filePath = join(this.rootDir, name);
      const text = await this.readText(filePath);
      if (text !== null) {
        return { content: this.parseFile(text, filePath), sourceFile: filePath };
      }
    }
    return null;
  }

  private async readText(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private parseFile(raw: string, filePath: string): RawConfig {
    const content = substituteEnvVars(raw, filePath, this.env);
    const ext = parsePath(filePath).ext.toLowerCase();
    let parsed: unknown;
    try {
      parsed = ext === ".json" ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigError({
        file: filePath,
        message: `Failed to parse ${ext === ".json" ? "JSON" : "YAML"}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
    if (!isRawConfig(parsed)) {
      throw new ConfigError({ file: filePath, message: "Config file must contain a mapping" });
    }
    return parsed;
  }
}
