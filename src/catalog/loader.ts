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
 * Filesystem loader for the resource catalog.
 *
 * root/
 *   _global.ftl            global-unnamed
 *   en/
 *     _shared.ftl          locale-unnamed
 *     home.ftl             named "home"
 *     settings/
 *       _common.ftl        locale-unnamed, only for resources under settings/
 *       account.ftl        named "settings/account"
 */

import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { extname, join, relative } from "node:path";
import type { LocaleGraph } from "../locale/graph.js";
import { InvalidLocaleError } from "../locale/errors.js";
import { type LocaleId, normalizeLocaleId, tryNormalizeLocaleId } from "../locale/locale-id.js";
import { type ResourceCatalog, ResourceCatalogBuilder } from "./catalog.js";
import {
  GlobalNamedResourceError,
  InvalidLocaleDirectoryError,
  MissingLocaleDirectoryError,
  ResourceReadError,
} from "./errors.js";

const RESOURCE_EXTENSION = ".ftl";

function isHidden(entry: Dirent): boolean {
  return entry.name.startsWith(".");
}

function isResourceFile(entry: Dirent): boolean {
  return entry.isFile() && !isHidden(entry) && extname(entry.name) === RESOURCE_EXTENSION;
}

function isUnnamed(fileName: string): boolean {
  return fileName.startsWith("_");
}

async function listDirectory(path: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new ResourceReadError(path, error);
  }
}

async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new ResourceReadError(path, error);
  }
}

/** Slash-separated regardless of platform. */
function toPosix(path: string): string {
  return path.split(/[\\/]/).filter(Boolean).join("/");
}

/** Names of the immediate, non-hidden sub-directories of `root`, sorted. */
export async function listLocaleDirectoryNames(root: string): Promise<string[]> {
  const entries = await listDirectory(root);
  return entries.filter((entry) => entry.isDirectory() && !isHidden(entry)).map((entry) => entry.name);
}

/**
 * Locale ids of the immediate sub-directories of `root`, used by discovery mode.
 * @throws InvalidLocaleDirectoryError when a directory name is not a locale id.
 * @throws ResourceReadError
 */
export async function discoverLocaleDirectories(root: string): Promise<LocaleId[]> {
  const locales = new Set<LocaleId>();
  for (const name of await listLocaleDirectoryNames(root)) {
    try {
      locales.add(normalizeLocaleId(name));
    } catch (error) {
      if (error instanceof InvalidLocaleError) {
        throw new InvalidLocaleDirectoryError(name, error.reason);
      }
      throw error;
    }
  }
  return [...locales].sort();
}

async function walkLocaleDirectory(
  builder: ResourceCatalogBuilder,
  locale: LocaleId,
  localeRoot: string,
  directory: string,
): Promise<void> {
  for (const entry of await listDirectory(directory)) {
    const path = join(directory, entry.name);
    if (entry.isDirectory() && !isHidden(entry)) {
      await walkLocaleDirectory(builder, locale, localeRoot, path);
      continue;
    }
    if (!isResourceFile(entry)) continue;

    const source = await readSource(path);
    const relativeDirectory = toPosix(relative(localeRoot, directory));
    if (isUnnamed(entry.name)) {
      builder.addUnnamed(locale, path, source, relativeDirectory);
    } else {
      const name = toPosix(relative(localeRoot, path)).slice(0, -RESOURCE_EXTENSION.length);
      builder.addNamed(locale, name, source, path);
    }
  }
}

/**
 * Load every resource under `root` for the locales known to `graph`.
 * Directories that are not locales of the graph are skipped.
 * @throws ResourceReadError, ParseError, GlobalNamedResourceError, MissingLocaleDirectoryError
 */
export async function loadResourceCatalog(
  root: string,
  graph: LocaleGraph,
): Promise<ResourceCatalog> {
  const builder = new ResourceCatalogBuilder();

  for (const entry of await listDirectory(root)) {
    const path = join(root, entry.name);
    if (entry.isDirectory()) {
      if (isHidden(entry)) continue;
      const locale = tryNormalizeLocaleId(entry.name);
      if (locale === null || !graph.has(locale)) continue;
      builder.addLocale(locale);
      await walkLocaleDirectory(builder, locale, path, path);
      continue;
    }
    if (!isResourceFile(entry)) continue;
    if (!isUnnamed(entry.name)) {
      throw new GlobalNamedResourceError(path);
    }
    builder.addGlobalUnnamed(path, await readSource(path));
  }

  const catalog = builder.build();
  const missing = graph.mandatoryLocales().filter((locale) => !catalog.hasLocale(locale));
  if (missing.length > 0) {
    throw new MissingLocaleDirectoryError(missing);
  }
  return catalog;
}
