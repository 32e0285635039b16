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
 * L10nMessage: a message reference carried as a value, e.g. an error variant
 * that knows which message renders it and with which arguments.
 *
 * @example
 * const quota = defineMessage("errors", "quota-exceeded", { limit: 10 });
 * translateMessage(translator, "en-GB", quota).text;
 */

import type { FormatArgs } from "../bundle/bundle.js";
import type { MessageUsage, UsageOrigin } from "../validation/types.js";
import { type TranslationResult, type Translator, parseMessageKey } from "./translator.js";

export interface L10nMessage<A extends FormatArgs = FormatArgs> {
  readonly resourceName: string;
  readonly messageId: string;
  readonly attribute: string | null;
  readonly args: Readonly<A>;
}

/** `key` is "id" or "id.attr". */
export function defineMessage<A extends FormatArgs>(
  resourceName: string,
  key: string,
  args: A,
): L10nMessage<A> {
  const { messageId, attribute } = parseMessageKey(key);
  return Object.freeze({ resourceName, messageId, attribute, args: Object.freeze({ ...args }) });
}

/** Overrides win over the message's own arguments. */
export function translateMessage(
  translator: Translator,
  locale: string,
  message: L10nMessage,
  overrides: FormatArgs = {},
): TranslationResult {
  return translator.translate(locale, message.resourceName, message.messageId, message.attribute, {
    ...message.args,
    ...overrides,
  });
}

/** The static usage this message represents, for validation. */
export function messageUsageOf(
  message: L10nMessage,
  locales: "all" | readonly string[] = "all",
  origin?: UsageOrigin,
): MessageUsage {
  return {
    resourceName: message.resourceName,
    messageId: message.messageId,
    attribute: message.attribute,
    suppliedArgNames: Object.keys(message.args).sort(),
    declaredLocales: locales,
    origin,
  };
}
