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

import { describe, expect, it } from "vitest";
import { Bundle } from "../../../src/bundle/bundle.js";
import { DuplicateMessageError } from "../../../src/bundle/errors.js";
import { ResourceCatalogBuilder } from "../../../src/catalog/catalog.js";

function resources(...sources: string[]) {
  const builder = new ResourceCatalogBuilder();
  sources.forEach((source, index) => {
    builder.addNamed("en", `r${index}`, source, `r${index}.ftl`);
  });
  const catalog = builder.build();
  return sources.map((_, index) => {
    const resource = catalog.named("en", `r${index}`);
    if (!resource) throw new Error("fixture missing");
    return resource;
  });
}

describe("Bundle", () => {
  const source = [
    "welcome = Welcome, { $name }!",
    "login =",
    "    .placeholder = Email",
    "inbox = { $count ->",
    "    [one] One message",
    "   *[other] { $count } messages",
    "}",
    "",
  ].join("\n");

  it("formats values and attributes", () => {
    const bundle = new Bundle("en", "home", resources(source), { useIsolating: false });
    expect(bundle.format("welcome", null, { name: "Ada" })).toEqual({ text: "Welcome, Ada!", errors: [] });
    expect(bundle.format("login", "placeholder")?.text).toBe("Email");
    expect(bundle.format("inbox", null, { count: 1 })?.text).toBe("One message");
    expect(bundle.format("inbox", null, { count: 5 })?.text).toBe("5 messages");
  });

  it("wraps placeables in isolation marks by default", () => {
    const bundle = new Bundle("en", "home", resources(source));
    expect(bundle.format("welcome", null, { name: "Ada" })?.text).toBe("Welcome, \u2068Ada\u2069!");
  });

  it("collects engine errors for missing variables", () => {
    const bundle = new Bundle("en", "home", resources(source), { useIsolating: false });
    const formatted = bundle.format("welcome");
    expect(formatted?.text).toBe("Welcome, {$name}!");
    expect(formatted?.errors.map((e) => e.message)).toEqual(["Unknown variable: $name"]);
  });

  it("returns null when the message or attribute does not exist", () => {
    const bundle = new Bundle("en", "home", resources(source));
    expect(bundle.format("nope")).toBeNull();
    expect(bundle.format("login")).toBeNull();
    expect(bundle.format("login", "label")).toBeNull();
  });

  it("explains why a lookup failed", () => {
    const bundle = new Bundle("en", "home", resources(source));
    expect(bundle.lookup("nope")).toEqual({ found: false, reason: "message" });
    expect(bundle.lookup("login")).toEqual({ found: false, reason: "value" });
    expect(bundle.lookup("login", "label")).toEqual({ found: false, reason: "attribute" });
    expect(bundle.lookup("login", "placeholder").found).toBe(true);
  });

  it("memoizes required arguments", () => {
    const bundle = new Bundle("en", "home", resources(source));
    const first = bundle.requiredArgs("inbox");
    expect(first).toEqual({ variables: ["count"], selectorKeys: ["count"], unresolved: [] });
    expect(bundle.requiredArgs("inbox")).toBe(first);
    expect(bundle.requiredArgs("nope")).toBeNull();
  });

  it("merges resources in order", () => {
    const bundle = new Bundle(
      "en",
      "home",
      resources("-brand = Acme\n", "title = { -brand } Portal\n"),
      { useIsolating: false },
    );
    expect(bundle.format("title")?.text).toBe("Acme Portal");
    expect(bundle.messageIds()).toEqual(["title"]);
  });

  it("fails on a duplicate message id across resources", () => {
    let caught: unknown;
    try {
      new Bundle("en", "home", resources("title = One\n", "title = Two\n"));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DuplicateMessageError);
    if (!(caught instanceof DuplicateMessageError)) return;
    expect(caught.messageId).toBe("title");
    expect(caught.paths).toEqual(["r0.ftl", "r1.ftl"]);
  });

  it("fails on a duplicate term", () => {
    expect(() => new Bundle("en", "home", resources("-brand = A\n", "-brand = B\n"))).toThrow(
      'Duplicate message "-brand" in bundle en/home: defined in r0.ftl and r1.ftl',
    );
  });

  it("lets later resources shadow earlier ones when overrides are allowed", () => {
    const bundle = new Bundle("en", "home", resources("title = One\n", "title = Two\n"), {
      allowOverrides: true,
    });
    expect(bundle.format("title")?.text).toBe("Two");
  });

  it("applies custom functions and transforms", () => {
    const bundle = new Bundle("en", "home", resources("shout = { UPPER($text) }\nplain = banana\n"), {
      useIsolating: false,
      functions: { UPPER: ([text]) => String(text).toUpperCase() },
      transform: (text) => text.replace("a", "4"),
    });
    expect(bundle.format("shout", null, { text: "quiet" })?.text).toBe("QUIET");
    expect(bundle.format("plain")?.text).toBe("b4nana");
  });
});
