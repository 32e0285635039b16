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

import { describe, expect, it, vi } from "vitest";
import { createBundle } from "../../../src/bundle/bundle.js";
import { BundleCache } from "../../../src/bundle/bundle-cache.js";
import { DuplicateMessageError, ResourceNotFoundError } from "../../../src/bundle/errors.js";
import { ResourceCatalogBuilder } from "../../../src/catalog/catalog.js";

function catalog() {
  return new ResourceCatalogBuilder()
    .addGlobalUnnamed("_brand.ftl", "-brand = Acme\n")
    .addUnnamed("en", "en/_shared.ftl", "app = { -brand } Portal\n")
    .addUnnamed("en", "en/settings/_common.ftl", "save = Save\n", "settings")
    .addNamed("en", "home", "welcome = Welcome to { app }\n")
    .addNamed("en", "settings/account", "title = { save } account\n")
    .addNamed("en", "broken", "app = Shadowed\n")
    .build();
}

describe("BundleCache", () => {
  it("composes global, locale-unnamed and named resources", () => {
    const cache = new BundleCache(catalog(), { useIsolating: false });
    const bundle = cache.getBundle("en", "home");
    expect(bundle.resources.map((r) => r.path)).toEqual(["_brand.ftl", "en/_shared.ftl", "en/home.ftl"]);
    expect(bundle.format("welcome")?.text).toBe("Welcome to Acme Portal");
  });

  it("includes unnamed resources of nested directories", () => {
    const cache = new BundleCache(catalog(), { useIsolating: false });
    const bundle = cache.getBundle("en", "settings/account");
    expect(bundle.resources.map((r) => r.path)).toEqual([
      "_brand.ftl",
      "en/_shared.ftl",
      "en/settings/_common.ftl",
      "en/settings/account.ftl",
    ]);
    expect(bundle.format("title")?.text).toBe("Save account");
  });

  it("returns the identical bundle on repeated calls", () => {
    const factory = vi.fn(createBundle);
    const cache = new BundleCache(catalog(), {}, factory);
    const first = cache.getBundle("en", "home");
    const second = cache.getBundle("en", "home");
    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it("builds once for concurrent requests of the same key", async () => {
    const factory = vi.fn(createBundle);
    const cache = new BundleCache(catalog(), {}, factory);
    const bundles = await Promise.all(
      Array.from({ length: 8 }, () => Promise.resolve().then(() => cache.getBundle("en", "home"))),
    );
    expect(new Set(bundles).size).toBe(1);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("throws ResourceNotFoundError for a missing named resource", () => {
    const cache = new BundleCache(catalog());
    expect(() => cache.getBundle("en", "nope")).toThrow(ResourceNotFoundError);
    expect(() => cache.getBundle("fr", "home")).toThrow('Resource "home" not found for locale fr');
  });

  it("memoizes errors", () => {
    const factory = vi.fn(createBundle);
    const cache = new BundleCache(catalog(), {}, factory);
    expect(() => cache.getBundle("en", "broken")).toThrow(DuplicateMessageError);
    expect(() => cache.getBundle("en", "broken")).toThrow(DuplicateMessageError);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("tryGetBundle maps only a missing resource to null", () => {
    const cache = new BundleCache(catalog());
    expect(cache.tryGetBundle("en", "nope")).toBeNull();
    expect(cache.tryGetBundle("en", "home")).not.toBeNull();
    expect(() => cache.tryGetBundle("en", "broken")).toThrow(DuplicateMessageError);
  });

  it("passes allowOverrides through to the bundle", () => {
    const cache = new BundleCache(catalog(), { allowOverrides: true, useIsolating: false });
    expect(cache.getBundle("en", "broken").format("app")?.text).toBe("Shadowed");
  });
});
