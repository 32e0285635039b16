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
 * Unicode language identifiers: language[-script][-region][-variant...].
 * Equality is exact on the normalized form; no subtag matching happens here.
 */

import { InvalidLocaleError } from "./errors.js";

/** Normalized locale identifier, e.g. "en", "sr-Latn-RS", "de-CH-1996". */
export type LocaleId = string;

export interface LanguageIdentifier {
  readonly language: string;
  readonly script: string | null;
  readonly region: string | null;
  readonly variants: readonly string[];
}

const LANGUAGE = /^(?:[a-z]{2,3}|[a-z]{5,8})$/i;
const SCRIPT = /^[a-z]{4}$/i;
const REGION = /^(?:[a-z]{2}|[0-9]{3})$/i;
const VARIANT = /^(?:[a-z0-9]{5,8}|[0-9][a-z0-9]{3})$/i;

/**
 * Parse a language identifier. Subtags may be separated by "-" or "_".
 * @throws InvalidLocaleError on any malformed or misplaced subtag.
 */
export function parseLanguageIdentifier(input: string): LanguageIdentifier {
  const [first, ...rest] = input.split(/[-_]/);
  if (first === undefined || !LANGUAGE.test(first)) {
    throw new InvalidLocaleError(input, `invalid language subtag "${first ?? ""}"`);
  }

  let script: string | null = null;
  let region: string | null = null;
  const variants = new Set<string>();
  // 0: script allowed, 1: region allowed, 2: variants only
  let position = 0;

  for (const subtag of rest) {
    if (position === 0 && SCRIPT.test(subtag)) {
      script = subtag.charAt(0).toUpperCase() + subtag.slice(1).toLowerCase();
      position = 1;
    } else if (position <= 1 && REGION.test(subtag)) {
      region = subtag.toUpperCase();
      position = 2;
    } else if (VARIANT.test(subtag)) {
      variants.add(subtag.toLowerCase());
      position = 2;
    } else {
      throw new InvalidLocaleError(input, `invalid subtag "${subtag}"`);
    }
  }

  return {
    language: first.toLowerCase(),
    script,
    region,
    variants: [...variants].sort(),
  };
}

export function formatLanguageIdentifier(id: LanguageIdentifier): LocaleId {
  const subtags = [id.language];
  if (id.script) subtags.push(id.script);
  if (id.region) subtags.push(id.region);
  subtags.push(...id.variants);
  return subtags.join("-");
}

/**
 * Normalize a raw locale string.
 * @throws InvalidLocaleError
 */
export function normalizeLocaleId(input: string): LocaleId {
  return formatLanguageIdentifier(parseLanguageIdentifier(input));
}

/**
 * Normalize a raw locale string, or return null when it is not a valid identifier.
 */
export function tryNormalizeLocaleId(input: string): LocaleId | null {
  try {
    return normalizeLocaleId(input);
  } catch (error) {
    if (error instanceof InvalidLocaleError) return null;
    throw error;
  }
}

/**
 * Successive truncations of a locale, most specific first.
 * Variants go right to left, then the region, then the script:
 * "en-Latn-GB-fonipa" → ["en-Latn-GB", "en-Latn", "en"].
 */
export function ancestorsOf(locale: LocaleId): LocaleId[] {
  const id = parseLanguageIdentifier(locale);
  const ancestors: LocaleId[] = [];
  const variants = [...id.variants];
  let { script, region } = id;

  while (variants.length > 0 || region !== null || script !== null) {
    if (variants.length > 0) {
      variants.pop();
    } else if (region !== null) {
      region = null;
    } else {
      script = null;
    }
    ancestors.push(formatLanguageIdentifier({ language: id.language, script, region, variants }));
  }

  return ancestors;
}
