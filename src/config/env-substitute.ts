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
 * Environment variable substitution for config files.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Runs on raw YAML/JSON text BEFORE parsing.
 */

import { ConfigError } from "./errors.js";
import type { Env } from "./provider.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

/**
 * Substitute ${VAR} and ${VAR:-default} references in raw text.
 * @throws ConfigError naming every variable that is missing and has no default.
 */
export function substituteEnvVars(text: string, sourceFile: string, env: Env = process.env): string {
  const unresolved: string[] = [];

  const result = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const defaultSepIndex = expr.indexOf(":-");
    const varName = defaultSepIndex === -1 ? expr : expr.slice(0, defaultSepIndex);
    const defaultValue = defaultSepIndex === -1 ? undefined : expr.slice(defaultSepIndex + 2);

    const value = env[varName];
    if (value !== undefined) {
      return value;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    unresolved.push(varName);
    return match;
  });

  if (unresolved.length > 0) {
    throw new ConfigError({
      file: sourceFile,
      message: `Unresolved environment variable(s): ${unresolved.map((v) => `\${${v}}`).join(", ")}`,
    });
  }

  return result;
}
