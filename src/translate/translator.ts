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
 * Runtime translation with locale fallback.
 *
 * A lookup walks the requested locale's route and formats with the first hop
 * whose bundle has the message. Gaps come back as a placeholder result;
 * resource errors such as duplicate ids still throw.
 */

import type { FormatArgs } from "../bundle/bundle.js";
import type { BundleCache } from "../bundle/bundle-cache.js";
import type { LocaleGraph } from "../locale/graph.js";
import type { LocaleId } from "../locale/locale-id.js";
import { patternOf, requiredNames } from "../validation/required-args.js";
import { defaultVariantSelectors } from "./selectors.js";

export const DEFAULT_PLACEHOLDER = "Unexpected message";

export type TranslationDiagnostic =
  | { kind: "format-error"; message: string }
  | { kind: "default-variant"; selector: string }
  | { kind: "unused-argument"; name: string };

export type TranslationResult =
  | {
      status: "translated";
      text: string;
      /** The hop that supplied the message. */
      locale: LocaleId;
      diagnostics: TranslationDiagnostic[];
    }
  | {
      status: "missing";
      text: string;
      reason: "unsupported-locale" | "message-not-found";
    };

export interface TranslatorOptions {
  /** Text returned when nothing in the route has the message. */
  placeholder?: string;
  /** Called for every miss. Defaults to a console warning. */
  onMissing?: (miss: MissingTranslation) => void;
}

export interface MissingTranslation {
  locale: string;
  resourceName: string;
  messageId: string;
  attribute: string | null;
  reason: "unsupported-locale" | "message-not-found";
}

function warnMissing(miss: MissingTranslation): void {
  const key = miss.attribute === null ? miss.messageId : `${miss.messageId}.${miss.attribute}`;
  console.warn(`[l10n] ${miss.reason}: ${miss.locale} ${miss.resourceName} ${key}`);
}

export class Translator {
  readonly placeholder: string;
  private readonly graph: LocaleGraph;
  private readonly bundles: BundleCache;
  private readonly onMissing: (miss: MissingTranslation) => void;

  constructor(graph: LocaleGraph, bundles: BundleCache, options: TranslatorOptions = {}) {
    this.graph = graph;
    this.bundles = bundles;
    this.placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;
    this.onMissing = options.onMissing ?? warnMissing;
  }

  translate(
    locale: string,
    resourceName: string,
    messageId: string,
    attribute: string | null = null,
    args?: FormatArgs,
  ): TranslationResult {
    const route = this.graph.route(locale);
    if (!route) {
      return this.miss({ locale, resourceName, messageId, attribute, reason: "unsupported-locale" });
    }

    for (const hop of route) {
      const bundle = this.bundles.tryGetBundle(hop, resourceName);
      if (!bundle?.has(messageId, attribute)) continue;

      const formatted = bundle.format(messageId, attribute, args);
      if (!formatted) continue;

      const diagnostics: TranslationDiagnostic[] = formatted.errors.map((error) => ({
        kind: "format-error",
        message: error.message,
      }));
      const pattern = patternOf(bundle.getMessage(messageId), attribute);
      if (pattern && args) {
        for (const selector of defaultVariantSelectors(pattern, args, hop)) {
          diagnostics.push({ kind: "default-variant", selector });
        }
      }
      const required = bundle.requiredArgs(messageId, attribute);
      if (required && args) {
        const used = new Set(requiredNames(required));
        for (const name of Object.keys(args).sort()) {
          if (!used.has(name)) diagnostics.push({ kind: "unused-argument", name });
        }
      }
      return { status: "translated", text: formatted.text, locale: hop, diagnostics };
    }

    return this.miss({ locale, resourceName, messageId, attribute, reason: "message-not-found" });
  }

  /** Translate "id" or "id.attr". */
  translateKey(locale: string, resourceName: string, key: string, args?: FormatArgs): TranslationResult {
    const { messageId, attribute } = parseMessageKey(key);
    return this.translate(locale, resourceName, messageId, attribute, args);
  }

  /** The translated text, or the placeholder. */
  text(
    locale: string,
    resourceName: string,
    messageId: string,
    attribute: string | null = null,
    args?: FormatArgs,
  ): string {
    return this.translate(locale, resourceName, messageId, attribute, args).text;
  }

  private miss(miss: MissingTranslation): TranslationResult {
    this.onMissing(miss);
    return { status: "missing", text: this.placeholder, reason: miss.reason };
  }
}

export interface MessageKey {
  messageId: string;
  attribute: string | null;
}

/** Split "id.attr" at the first dot. */
export function parseMessageKey(key: string): MessageKey {
  const dot = key.indexOf(".");
  if (dot === -1) return { messageId: key, attribute: null };
  return { messageId: key.slice(0, dot), attribute: key.slice(dot + 1) };
}
