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
 * Usage feed: the list of call sites to validate, as YAML or JSON.
 *
 * usages:
 *   - resource: home
 *     key: welcome
 *     args: [first-name]
 *     locales: all
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, ConfigValidationError } from "../config/errors.js";
import { issuesToDetails } from "../config/schema.js";
import { parseMessageKey } from "../translate/translator.js";
import type { MessageUsage } from "./types.js";

const IDENTIFIER = "[a-zA-Z][a-zA-Z0-9_-]*";

export const UsageEntrySchema = z
  .object({
    resource: z.string().min(1),
    key: z
      .string()
      .regex(new RegExp(`^${IDENTIFIER}(?:\\.${IDENTIFIER})?$`), 'Expected "message-id" or "message-id.attribute"'),
    args: z.array(z.string().min(1)).default([]),
    locales: z.union([z.literal("all"), z.array(z.string().min(1)).min(1)]).default("all"),
    incomplete: z.boolean().default(false),
    origin: z
      .object({
        file: z.string().min(1),
        line: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const UsageFeedSchema = z
  .object({
    usages: z.array(UsageEntrySchema),
  })
  .strict();

export type UsageEntryInput = z.input<typeof UsageEntrySchema>;

/**
 * @throws ConfigError when the text is not valid YAML/JSON
 * @throws ConfigValidationError listing every invalid field
 */
export function parseUsageFeed(text: string, sourceFile: string): MessageUsage[] {
  const isJson = extname(sourceFile).toLowerCase() === ".json";
  let raw: unknown;
  try {
    raw = isJson ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new ConfigError({
      file: sourceFile,
      message: `Failed to parse ${isJson ? "JSON" : "YAML"}: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const result = UsageFeedSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(issuesToDetails(result.error, sourceFile));
  }

  return result.data.usages.map((entry) => {
    const { messageId, attribute } = parseMessageKey(entry.key);
    return {
      resourceName: entry.resource,
      messageId,
      attribute,
      suppliedArgNames: [...new Set(entry.args)].sort(),
      declaredLocales: entry.locales,
      incomplete: entry.incomplete,
      origin: entry.origin ?? { file: sourceFile },
    };
  });
}

export async function loadUsageFeed(path: string): Promise<MessageUsage[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError({
      file: path,
      message: `Cannot read usage feed: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
  return parseUsageFeed(text, path);
}
