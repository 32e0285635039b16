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
 * A bundle is the merged formatting context for one (locale, named resource):
 * global-unnamed resources, then the locale's unnamed resources, then the
 * named resource. It wraps a runtime FluentBundle and keeps a merged view of
 * the syntax trees for argument analysis.
 */

import { FluentBundle } from "@fluent/bundle";
import { Message, Term } from "@fluent/syntax";
import type { Resource } from "../catalog/catalog.js";
import type { LocaleId } from "../locale/locale-id.js";
import { type RequiredArgs, collectRequiredArgs, patternOf } from "../validation/required-args.js";
import { DuplicateMessageError } from "./errors.js";

type FluentBundleOptions = NonNullable<ConstructorParameters<typeof FluentBundle>[1]>;
export type FluentFunctions = NonNullable<FluentBundleOptions["functions"]>;
export type TextTransform = NonNullable<FluentBundleOptions["transform"]>;
export type FormatArgs = NonNullable<Parameters<FluentBundle["formatPattern"]>[1]>;

export interface BundleOptions {
  /** Custom formatting functions, keyed by the name resources call them by. */
  functions?: FluentFunctions;
  /** Wrap placeables in Unicode isolation marks. Defaults to true. */
  useIsolating?: boolean;
  transform?: TextTransform;
  /** Let later resources shadow earlier ids instead of failing. Defaults to false. */
  allowOverrides?: boolean;
}

export type LookupResult =
  | { found: true; message: Message }
  | { found: false; reason: "message" | "attribute" | "value" };

export interface FormattedMessage {
  text: string;
  /** Non-fatal engine errors, e.g. a reference to a variable that was not supplied. */
  errors: Error[];
}

export class Bundle {
  readonly locale: LocaleId;
  readonly resourceName: string;
  readonly resources: readonly Resource[];
  private readonly runtime: FluentBundle;
  private readonly messages = new Map<string, Message>();
  private readonly requiredArgsCache = new Map<string, RequiredArgs>();

  /**
   * @throws DuplicateMessageError when two resources define the same id and
   * overrides are not allowed.
   */
  constructor(
    locale: LocaleId,
    resourceName: string,
    resources: readonly Resource[],
    options: BundleOptions = {},
  ) {
    this.locale = locale;
    this.resourceName = resourceName;
    this.resources = resources;
    this.runtime = new FluentBundle(locale, {
      functions: options.functions,
      useIsolating: options.useIsolating ?? true,
      transform: options.transform,
    });

    const allowOverrides = options.allowOverrides ?? false;
    const definedIn = new Map<string, string>();
    for (const resource of resources) {
      for (const entry of resource.syntax.body) {
        if (!(entry instanceof Message) && !(entry instanceof Term)) continue;
        const id = entry instanceof Term ? `-${entry.id.name}` : entry.id.name;
        const previous = definedIn.get(id);
        if (previous !== undefined && !allowOverrides) {
          throw new DuplicateMessageError(locale, resourceName, id, [previous, resource.path]);
        }
        definedIn.set(id, resource.path);
        if (entry instanceof Message) this.messages.set(id, entry);
      }

      const errors = this.runtime.addResource(resource.runtime, { allowOverrides });
      const [first] = errors;
      if (first) throw first;
    }
  }

  /** Message ids defined in this bundle, sorted. */
  messageIds(): string[] {
    return [...this.messages.keys()].sort();
  }

  getMessage(id: string): Message | undefined {
    return this.messages.get(id);
  }

  /** Find a message, and check it has the requested attribute or a value. */
  lookup(messageId: string, attribute: string | null = null): LookupResult {
    const message = this.messages.get(messageId);
    if (!message) return { found: false, reason: "message" };
    if (patternOf(message, attribute) === null) {
      return { found: false, reason: attribute === null ? "value" : "attribute" };
    }
    return { found: true, message };
  }

  has(messageId: string, attribute: string | null = null): boolean {
    return this.lookup(messageId, attribute).found;
  }

  /** Arguments the message (or attribute) needs, memoized per bundle. */
  requiredArgs(messageId: string, attribute: string | null = null): RequiredArgs | null {
    const key = `${messageId}\u0000${attribute ?? ""}`;
    const cached = this.requiredArgsCache.get(key);
    if (cached) return cached;

    const pattern = patternOf(this.messages.get(messageId), attribute);
    if (pattern === null) return null;

    const args = Object.freeze(
      collectRequiredArgs(pattern, (id) => this.messages.get(id), { id: messageId, attribute }),
    );
    this.requiredArgsCache.set(key, args);
    return args;
  }

  /** Format a message value or attribute. Null when it does not exist here. */
  format(messageId: string, attribute: string | null = null, args?: FormatArgs): FormattedMessage | null {
    const message = this.runtime.getMessage(messageId);
    if (!message) return null;
    const pattern = attribute === null ? message.value : message.attributes[attribute];
    if (pattern === null || pattern === undefined) return null;

    const errors: Error[] = [];
    const text = this.runtime.formatPattern(pattern, args ?? null, errors);
    return { text, errors };
  }
}

export type BundleFactory = (
  locale: LocaleId,
  resourceName: string,
  resources: readonly Resource[],
  options: BundleOptions,
) => Bundle;

export const createBundle: BundleFactory = (locale, resourceName, resources, options) =>
  new Bundle(locale, resourceName, resources, options);
