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
 * Resource loading errors. Fatal: a catalog is either complete or not built.
 */

import type { LocaleId } from "../locale/locale-id.js";

export class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceError";
  }
}

export interface ParseErrorDetail {
  code: string;
  message: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export class ParseError extends ResourceError {
  readonly path: string;
  readonly details: readonly ParseErrorDetail[];

  constructor(path: string, details: ParseErrorDetail[]) {
    super(
      `Failed to parse ${path}:\n${details
        .map((d) => `  - ${d.line}:${d.column} ${d.code}: ${d.message}`)
        .join("\n")}`,
    );
    this.name = "ParseError";
    this.path = path;
    this.details = Object.freeze([...details]);
  }
}

export class GlobalNamedResourceError extends ResourceError {
  readonly path: string;

  constructor(path: string) {
    super(`Resources at the root must be unnamed (start with "_"): ${path}`);
    this.name = "GlobalNamedResourceError";
    this.path = path;
  }
}

export class MissingLocaleDirectoryError extends ResourceError {
  readonly locales: readonly LocaleId[];

  constructor(locales: LocaleId[]) {
    super(`Missing resource directories for mandatory locales: ${locales.join(", ")}`);
    this.name = "MissingLocaleDirectoryError";
    this.locales = Object.freeze([...locales]);
  }
}

export class InvalidLocaleDirectoryError extends ResourceError {
  readonly directory: string;

  constructor(directory: string, reason: string) {
    super(`Directory "${directory}" is not a locale identifier: ${reason}`);
    this.name = "InvalidLocaleDirectoryError";
    this.directory = directory;
  }
}

export class DuplicateResourceError extends ResourceError {
  readonly locale: LocaleId | null;
  readonly resourceName: string;

  constructor(locale: LocaleId | null, resourceName: string) {
    super(
      locale === null
        ? `Duplicate global resource: ${resourceName}`
        : `Duplicate resource "${resourceName}" in locale ${locale}`,
    );
    this.name = "DuplicateResourceError";
    this.locale = locale;
    this.resourceName = resourceName;
  }
}

export class ResourceReadError extends ResourceError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "ResourceReadError";
    this.path = path;
    this.cause = cause;
  }
}
