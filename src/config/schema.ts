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
 * Zod schemas for the l10n configuration file.
 * All object schemas use .strict() to reject unknown fields.
 */

import { z } from "zod";
import { tryNormalizeLocaleId } from "../locale/locale-id.js";
import { FINDING_KINDS } from "../validation/types.js";
import type { ConfigErrorDetail } from "./errors.js";

export const LocaleIdSchema = z
  .string()
  .min(1)
  .refine((value) => tryNormalizeLocaleId(value) !== null, {
    message: 'Expected a Unicode Language Identifier like "en-US"',
  });

export const LocaleDeclarationSchema = z.union([
  LocaleIdSchema,
  z
    .object({
      main: LocaleIdSchema,
      fallback: LocaleIdSchema.nullable().optional(),
    })
    .strict(),
]);

/** A single path, or one path per environment with a mandatory "default". */
export const PathsSchema = z.union([
  z.string().min(1),
  z
    .record(z.string(), z.string().min(1))
    .refine((paths) => "default" in paths, { message: 'Path environments require a "default" entry' }),
]);

export const ValidationConfigSchema = z
  .object({
    functions: z.array(z.string().regex(/^[A-Z][A-Z0-9_-]*$/, "Function names are upper-case")).default([]),
    downgrade: z.array(z.enum(FINDING_KINDS)).default([]),
    allowIncomplete: z.boolean().default(false),
  })
  .strict();

export const L10nConfigSchema = z
  .object({
    path: PathsSchema.optional(),
    paths: PathsSchema.optional(),
    locales: z.array(LocaleDeclarationSchema).min(1).optional(),
    validation: ValidationConfigSchema.optional(),
  })
  .strict()
  .refine((data) => data.path === undefined || data.paths === undefined, {
    message: 'Use either "path" or "paths", not both',
  });

export const ConfigFileSchema = z
  .object({
    l10n: L10nConfigSchema,
  })
  .strict();

export type LocaleDeclarationParsed = z.output<typeof LocaleDeclarationSchema>;
export type ValidationConfigParsed = z.output<typeof ValidationConfigSchema>;
export type L10nConfigParsed = z.output<typeof L10nConfigSchema>;
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;

export function issuesToDetails(error: z.ZodError, file?: string): ConfigErrorDetail[] {
  return error.issues.map((issue) => ({
    file,
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}
