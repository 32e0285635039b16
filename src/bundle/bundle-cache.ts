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
 * Lazily built, memoized bundles keyed by (locale, resource name).
 *
 * Construction is synchronous, so a key is filled at most once: the first
 * caller builds, every later caller gets the stored bundle or the stored error.
 */

import type { ResourceCatalog } from "../catalog/catalog.js";
import type { LocaleId } from "../locale/locale-id.js";
import { type Bundle, type BundleFactory, type BundleOptions, createBundle } from "./bundle.js";
import { ResourceNotFoundError } from "./errors.js";

type CacheEntry = { ok: true; bundle: Bundle } | { ok: false; error: unknown };

export function bundleKey(locale: LocaleId, resourceName: string): string {
  return `${locale}\u0000${resourceName}`;
}

export class BundleCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly catalog: ResourceCatalog;
  private readonly options: BundleOptions;
  private readonly factory: BundleFactory;

  constructor(catalog: ResourceCatalog, options: BundleOptions = {}, factory: BundleFactory = createBundle) {
    this.catalog = catalog;
    this.options = options;
    this.factory = factory;
  }

  /**
   * @throws ResourceNotFoundError when the locale has no such named resource
   * @throws DuplicateMessageError when the merged resources collide
   */
  getBundle(locale: LocaleId, resourceName: string): Bundle {
    const key = bundleKey(locale, resourceName);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = this.build(locale, resourceName);
      this.entries.set(key, entry);
    }
    if (!entry.ok) throw entry.error;
    return entry.bundle;
  }

  /** Like getBundle, but a missing named resource yields null. Other errors propagate. */
  tryGetBundle(locale: LocaleId, resourceName: string): Bundle | null {
    try {
      return this.getBundle(locale, resourceName);
    } catch (error) {
      if (error instanceof ResourceNotFoundError) return null;
      throw error;
    }
  }

  /** Number of keys built so far, successful or not. */
  get size(): number {
    return this.entries.size;
  }

  private build(locale: LocaleId, resourceName: string): CacheEntry {
    const named = this.catalog.named(locale, resourceName);
    if (!named) {
      return { ok: false, error: new ResourceNotFoundError(locale, resourceName) };
    }
    const resources = [
      ...this.catalog.globalUnnamed(),
      ...this.catalog.unnamedFor(locale, resourceName),
      named,
    ];
    try {
      return { ok: true, bundle: this.factory(locale, resourceName, resources, this.options) };
    } catch (error) {
      return { ok: false, error };
    }
  }
}
