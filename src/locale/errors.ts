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
 * Locale configuration errors. All of them abort initialization.
 */

import type { LocaleId } from "./locale-id.js";

export class LocaleGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LocaleGraphError";
  }
}

export class InvalidLocaleError extends LocaleGraphError {
  readonly input: string;
  readonly reason: string;

  constructor(input: string, reason: string) {
    super(
      `invalid value "${input}", expected a valid Unicode Language Identifier like "en-US" (${reason})`,
    );
    this.name = "InvalidLocaleError";
    this.input = input;
    this.reason = reason;
  }
}

export class CycleError extends LocaleGraphError {
  readonly chain: readonly LocaleId[];

  constructor(chain: LocaleId[]) {
    super(`infinite fallback loop detected: (${chain.join(" -> ")})`);
    this.name = "CycleError";
    this.chain = Object.freeze([...chain]);
  }
}

export class UnknownFallbackError extends LocaleGraphError {
  readonly locale: LocaleId;
  readonly fallback: LocaleId;

  constructor(locale: LocaleId, fallback: LocaleId) {
    super(
      `fallback "${fallback}" of locale "${locale}" is neither a declared locale nor an available locale directory`,
    );
    this.name = "UnknownFallbackError";
    this.locale = locale;
    this.fallback = fallback;
  }
}

export class DuplicateLocaleError extends LocaleGraphError {
  readonly locale: LocaleId;

  constructor(locale: LocaleId) {
    super(`main locale duplicate: ${locale}`);
    this.name = "DuplicateLocaleError";
    this.locale = locale;
  }
}

export class EmptyLocalesError extends LocaleGraphError {
  constructor() {
    super("no locales declared or discovered");
    this.name = "EmptyLocalesError";
  }
}
