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
 * Public config API.
 * Orchestrates: load → substitute → validate → resolve paths → freeze.
 */

import { dirname, isAbsolute, join, resolve } from "node:path";
import type { LocaleDeclarationInput } from "../locale/graph.js";
import type { FindingKind } from "../validation/types.js";
import { ConfigError, ConfigValidationError } from "./errors.js";
import type { ConfigProvider, Env } from "./provider.js";
import { ConfigFileSchema, type L10nConfigParsed, issuesToDetails } from "./schema.js";

export const PATH_ENV = "L10N_PATH_ENV";
export const ROOT_PLACEHOLDER = "$ROOT";
export const DEFAULT_RESOURCE_PATH = "l10n";

export interface ResolvedConfig {
  rootDir: string;
  /** Null when defaults were used. */
  configFile: string | null;
  /** Absolute resource root. */
  resourceRoot: string;
  /** Null selects discovery from the resource directories. */
  locales: readonly LocaleDeclarationInput[] | null;
  validation: {
    functions: readonly string[];
    downgrade: readonly FindingKind[];
    allowIncomplete: boolean;
  };
}

export interface ResolveConfigOptions {
  env?: Env;
}

function selectPath(config: L10nConfigParsed, env: Env, file: string | undefined): string {
  const paths = config.paths ?? config.path;
  const environment = env[PATH_ENV];

  if (environment !== undefined && environment !== "") {
    const selected =
      typeof paths === "object" && Object.hasOwn(paths, environment) ? paths[environment] : undefined;
    if (selected === undefined) {
      throw new ConfigError({
        file,
        path: config.paths === undefined ? "l10n.path" : "l10n.paths",
        message: `l10n path for environment "${environment}" is not set in the configuration`,
      });
    }
    return selected;
  }

  if (paths === undefined) return DEFAULT_RESOURCE_PATH;
  if (typeof paths === "string") return paths;
  return paths.default ?? DEFAULT_RESOURCE_PATH;
}

/**
 * Resolve a configured path. A leading $ROOT is the directory of the config file;
 * other relative paths resolve against the project root.
 */
export function resolveResourcePath(path: string, rootDir: string, configFile: string | null): string {
  if (path === ROOT_PLACEHOLDER || path.startsWith(`${ROOT_PLACEHOLDER}/`)) {
    const base = configFile ? dirname(configFile) : rootDir;
    return join(base, path.slice(ROOT_PLACEHOLDER.length));
  }
  return isAbsolute(path) ? path : resolve(rootDir, path);
}

/**
 * Load and validate the configuration, falling back to defaults when there is no file.
 * @throws ConfigError, ConfigValidationError
 */
export async function resolveConfig(
  provider: ConfigProvider,
  options: ResolveConfigOptions = {},
): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const raw = await provider.loadConfigFile();

  let config: L10nConfigParsed = {};
  if (raw) {
    const result = ConfigFileSchema.safeParse(raw.content);
    if (!result.success) {
      throw new ConfigValidationError(issuesToDetails(result.error, raw.sourceFile));
    }
    config = result.data.l10n;
  }

  const configFile = raw?.sourceFile ?? null;
  const path = selectPath(config, env, raw?.sourceFile);
  const validation = config.validation;

  return Object.freeze({
    rootDir: provider.rootDir,
    configFile,
    resourceRoot: resolveResourcePath(path, provider.rootDir, configFile),
    locales: config.locales ? Object.freeze([...config.locales]) : null,
    validation: Object.freeze({
      functions: validation?.functions ?? [],
      downgrade: validation?.downgrade ?? [],
      allowIncomplete: validation?.allowIncomplete ?? false,
    }),
  });
}

export { ConfigError, ConfigValidationError } from "./errors.js";
export { FileConfigProvider } from "./file-provider.js";
export type { ConfigProvider, RawConfigFile } from "./provider.js";
