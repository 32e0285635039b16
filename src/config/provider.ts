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
 * ConfigProvider interface: where the raw l10n configuration comes from.
 */

export interface RawConfig {
  [key: string]: unknown;
}

export interface RawConfigFile {
  /** Parsed content, after environment variable substitution. */
  content: RawConfig;
  sourceFile: string;
}

export interface ConfigProvider {
  /** The project root: relative paths in the configuration resolve against it. */
  readonly rootDir: string;
  /** Null when no configuration file exists; defaults apply. */
  loadConfigFile(): Promise<RawConfigFile | null>;
}

export type Env = Record<string, string | undefined>;

export interface FileConfigProviderOptions {
  rootDir: string;
  /** Explicit file, absolute or relative to rootDir. Overrides L10N_CONFIG_FILE. */
  configFile?: string;
  env?: Env;
}
