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
 * In-memory resource catalog.
 *
 * Three scopes:
 * - global-unnamed: `_*.ftl` at the root, shared by every locale
 * - locale-unnamed: `_*.ftl` inside a locale directory (or one of its sub-directories)
 * - named: any other `.ftl` inside a locale directory, addressed by its
 *   slash-separated path without extension, e.g. "settings/account"
 *
 * Each resource keeps both the full syntax tree (for static analysis) and the
 * runtime resource the formatter consumes.
 */

import { FluentResource } from "@fluent/bundle";
import { Junk, type Resource as SyntaxResource, parse } from "@fluent/syntax";
import type { LocaleId } from "../locale/locale-id.js";
import { DuplicateResourceError, ParseError, type ParseErrorDetail } from "./errors.js";

export type ResourceScope =
  | { kind: "global-unnamed" }
  | { kind: "locale-unnamed"; locale: LocaleId; directory: string }
  | { kind: "named"; locale: LocaleId; name: string };

export interface Resource {
  readonly scope: ResourceScope;
  readonly path: string;
  readonly source: string;
  readonly syntax: SyntaxResource;
  readonly runtime: FluentResource;
}

interface LocaleResources {
  unnamed: Resource[];
  named: Map<string, Resource>;
}

function lineAndColumn(source: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

/**
 * Parse one resource file. Any junk entry makes the whole file invalid.
 * @throws ParseError
 */
export function parseResource(path: string, source: string): SyntaxResource {
  const syntax = parse(source, { withSpans: true });
  const details: ParseErrorDetail[] = [];

  for (const entry of syntax.body) {
    if (!(entry instanceof Junk)) continue;
    if (entry.annotations.length === 0) {
      details.push({
        code: "E0000",
        message: "Unparsed content",
        ...lineAndColumn(source, entry.span?.start ?? 0),
      });
    }
    for (const annotation of entry.annotations) {
      details.push({
        code: annotation.code,
        message: annotation.message,
        ...lineAndColumn(source, annotation.span?.start ?? entry.span?.start ?? 0),
      });
    }
  }

  if (details.length > 0) {
    throw new ParseError(path, details);
  }
  return syntax;
}

/** Directories from the locale root down to the directory holding `name`. */
export function directoriesOf(name: string): string[] {
  const segments = name.split("/").slice(0, -1);
  const directories = [""];
  for (let i = 1; i <= segments.length; i++) {
    directories.push(segments.slice(0, i).join("/"));
  }
  return directories;
}

export class ResourceCatalog {
  private readonly global: readonly Resource[];
  private readonly byLocale: ReadonlyMap<LocaleId, LocaleResources>;

  /** @internal use ResourceCatalogBuilder */
  constructor(global: readonly Resource[], byLocale: ReadonlyMap<LocaleId, LocaleResources>) {
    this.global = global;
    this.byLocale = byLocale;
  }

  globalUnnamed(): readonly Resource[] {
    return this.global;
  }

  locales(): LocaleId[] {
    return [...this.byLocale.keys()].sort();
  }

  hasLocale(locale: LocaleId): boolean {
    return this.byLocale.has(locale);
  }

  /**
   * Unnamed resources of `locale` that apply to the named resource `name`:
   * those of every directory from the locale root down to `name`'s directory,
   * outermost first.
   */
  unnamedFor(locale: LocaleId, name: string): Resource[] {
    const resources = this.byLocale.get(locale);
    if (!resources) return [];

    const result: Resource[] = [];
    for (const directory of directoriesOf(name)) {
      for (const resource of resources.unnamed) {
        if (resource.scope.kind === "locale-unnamed" && resource.scope.directory === directory) {
          result.push(resource);
        }
      }
    }
    return result;
  }

  named(locale: LocaleId, name: string): Resource | undefined {
    return this.byLocale.get(locale)?.named.get(name);
  }

  namedResourceNames(locale?: LocaleId): string[] {
    if (locale !== undefined) {
      return [...(this.byLocale.get(locale)?.named.keys() ?? [])].sort();
    }
    const names = new Set<string>();
    for (const resources of this.byLocale.values()) {
      for (const name of resources.named.keys()) names.add(name);
    }
    return [...names].sort();
  }

  /** Every resource, global ones first, then per locale in sorted order. */
  resources(): Resource[] {
    const all: Resource[] = [...this.global];
    for (const locale of this.locales()) {
      const resources = this.byLocale.get(locale);
      if (!resources) continue;
      all.push(...resources.unnamed);
      for (const name of [...resources.named.keys()].sort()) {
        const resource = resources.named.get(name);
        if (resource) all.push(resource);
      }
    }
    return all;
  }
}

export class ResourceCatalogBuilder {
  private readonly global: Resource[] = [];
  private readonly byLocale = new Map<LocaleId, LocaleResources>();

  private entry(locale: LocaleId): LocaleResources {
    let resources = this.byLocale.get(locale);
    if (!resources) {
      resources = { unnamed: [], named: new Map() };
      this.byLocale.set(locale, resources);
    }
    return resources;
  }

  private create(scope: ResourceScope, path: string, source: string): Resource {
    return Object.freeze({
      scope: Object.freeze(scope),
      path,
      source,
      syntax: parseResource(path, source),
      runtime: new FluentResource(source),
    });
  }

  /** Register a locale even if it holds no resources yet. */
  addLocale(locale: LocaleId): this {
    this.entry(locale);
    return this;
  }

  addGlobalUnnamed(path: string, source: string): this {
    if (this.global.some((r) => r.path === path)) {
      throw new DuplicateResourceError(null, path);
    }
    this.global.push(this.create({ kind: "global-unnamed" }, path, source));
    return this;
  }

  /** `directory` is relative to the locale directory, "" for the locale root. */
  addUnnamed(locale: LocaleId, path: string, source: string, directory = ""): this {
    const resources = this.entry(locale);
    if (resources.unnamed.some((r) => r.path === path)) {
      throw new DuplicateResourceError(locale, path);
    }
    resources.unnamed.push(this.create({ kind: "locale-unnamed", locale, directory }, path, source));
    return this;
  }

  addNamed(locale: LocaleId, name: string, source: string, path = `${locale}/${name}.ftl`): this {
    const resources = this.entry(locale);
    if (resources.named.has(name)) {
      throw new DuplicateResourceError(locale, name);
    }
    resources.named.set(name, this.create({ kind: "named", locale, name }, path, source));
    return this;
  }

  build(): ResourceCatalog {
    const byLocale = new Map<LocaleId, LocaleResources>();
    for (const [locale, resources] of this.byLocale) {
      byLocale.set(locale, {
        unnamed: [...resources.unnamed],
        named: new Map(resources.named),
      });
    }
    const catalog = new ResourceCatalog(Object.freeze([...this.global]), byLocale);
    Object.freeze(catalog);
    return catalog;
  }
}
