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
 * validate-messages: checks a usage feed against the resource catalog.
 *
 * Exit codes: 0 report ok, 1 report has errors, 2 configuration or resource failure.
 */

import { resolve } from "node:path";
import { ResourceError } from "../catalog/errors.js";
import { ConfigError, ConfigValidationError } from "../config/errors.js";
import { FileConfigProvider } from "../config/file-provider.js";
import { resolveConfig } from "../config/index.js";
import type { Env } from "../config/provider.js";
import { createL10n } from "../l10n/index.js";
import { LocaleGraphError } from "../locale/errors.js";
import { formatReport } from "../validation/report.js";
import { FINDING_KINDS, type FindingKind } from "../validation/types.js";
import { loadUsageFeed } from "../validation/usage-feed.js";

export const USAGE = `Usage: validate-messages --usages <file> [options]

Options:
  --usages <file>       Usage feed (YAML or JSON), required
  --root <dir>          Project root holding l10n.yaml (default: current directory)
  --config <file>       Config file, overrides L10N_CONFIG_FILE
  --function <NAME>     Registered function name, repeatable
  --downgrade <kind>    Report a finding kind as a warning, repeatable
  --allow-incomplete    Accept usages with incomplete argument lists
  --help                Show this message`;

export interface ValidateArgs {
  usages: string;
  root?: string;
  config?: string;
  functions: string[];
  downgrade: FindingKind[];
  allowIncomplete: boolean;
}

export type ParsedArgs = { help: true } | { help: false; args: ValidateArgs } | { error: string };

function isFindingKind(value: string): value is FindingKind {
  return FINDING_KINDS.some((kind) => kind === value);
}

export function parseValidateArgs(argv: readonly string[]): ParsedArgs {
  let usages: string | undefined;
  let root: string | undefined;
  let config: string | undefined;
  const functions: string[] = [];
  const downgrade: FindingKind[] = [];
  let allowIncomplete = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") return { help: true };
    if (arg === "--allow-incomplete") {
      allowIncomplete = true;
      continue;
    }

    const value = argv[i + 1];
    if (
      arg !== "--usages" &&
      arg !== "--root" &&
      arg !== "--config" &&
      arg !== "--function" &&
      arg !== "--downgrade"
    ) {
      return { error: `Unknown argument: ${arg}` };
    }
    if (value === undefined || value.startsWith("--")) {
      return { error: `Missing value for ${arg}` };
    }
    i++;

    switch (arg) {
      case "--usages":
        usages = value;
        break;
      case "--root":
        root = value;
        break;
      case "--config":
        config = value;
        break;
      case "--function":
        functions.push(value);
        break;
      case "--downgrade":
        if (!isFindingKind(value)) {
          return { error: `Unknown finding kind: ${value} (expected one of ${FINDING_KINDS.join(", ")})` };
        }
        downgrade.push(value);
        break;
    }
  }

  if (usages === undefined) return { error: "--usages is required" };
  return { help: false, args: { usages, root, config, functions, downgrade, allowIncomplete } };
}

export interface CommandIO {
  log(message: string): void;
  error(message: string): void;
}

export interface CommandContext {
  cwd: string;
  env: Env;
  io: CommandIO;
}

function isKnownFailure(error: unknown): error is Error {
  return (
    error instanceof ConfigError ||
    error instanceof ConfigValidationError ||
    error instanceof LocaleGraphError ||
    error instanceof ResourceError
  );
}

export async function runValidateCommand(
  argv: readonly string[],
  context: CommandContext,
): Promise<number> {
  const { io } = context;
  const parsed = parseValidateArgs(argv);
  if ("error" in parsed) {
    io.error(`[l10n] ${parsed.error}`);
    io.error(USAGE);
    return 2;
  }
  if (parsed.help) {
    io.log(USAGE);
    return 0;
  }
  const { args } = parsed;

  try {
    const rootDir = resolve(context.cwd, args.root ?? ".");
    const provider = new FileConfigProvider({ rootDir, configFile: args.config, env: context.env });
    const config = await resolveConfig(provider, { env: context.env });
    io.log(`[l10n] Config: ${config.configFile ?? "defaults"}`);
    io.log(`[l10n] Resources: ${config.resourceRoot}`);

    const l10n = await createL10n({ root: config.resourceRoot, locales: config.locales });
    const usages = await loadUsageFeed(resolve(context.cwd, args.usages));
    io.log(
      `[l10n] Catalog ${l10n.catalogHash.slice(0, 12)}: ${l10n.graph.allLocales().length} locale(s), ${l10n.catalog.resources().length} resource(s), ${usages.length} usage(s)`,
    );

    const report = l10n.validate(usages, {
      functions: [...config.validation.functions, ...args.functions],
      downgrade: [...config.validation.downgrade, ...args.downgrade],
      allowIncomplete: config.validation.allowIncomplete || args.allowIncomplete,
    });
    if (report.ok) {
      io.log(formatReport(report));
      return 0;
    }
    io.error(formatReport(report));
    return 1;
  } catch (error) {
    if (isKnownFailure(error)) {
      io.error(`[l10n] ${error.message}`);
      return 2;
    }
    throw error;
  }
}
