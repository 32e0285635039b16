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

import { ResourceError } from "../catalog/errors.js";
import type { LocaleId } from "../locale/locale-id.js";

/** The locale has no named resource of that name. Recoverable during fallback. */
export class ResourceNotFoundError extends ResourceError {
  readonly locale: LocaleId;
  readonly resourceName: string;

  constructor(locale: LocaleId, resourceName: string) {
    super(`Resource "${resourceName}" not found for locale ${locale}`);
    this.name = "ResourceNotFoundError";
    this.locale = locale;
    this.resourceName = resourceName;
  }
}

/** Two resources merged into one bundle define the same message or term. */
export class DuplicateMessageError extends ResourceError {
  readonly locale: LocaleId;
  readonly resourceName: string;
  readonly messageId: string;
  readonly paths: readonly [string, string];

  constructor(locale: LocaleId, resourceName: string, messageId: string, paths: [string, string]) {
    super(
      `Duplicate message "${messageId}" in bundle ${locale}/${resourceName}: defined in ${paths[0]} and ${paths[1]}`,
    );
    this.name = "DuplicateMessageError";
    this.locale = locale;
    this.resourceName = resourceName;
    this.messageId = messageId;
    this.paths = paths;
  }
}
