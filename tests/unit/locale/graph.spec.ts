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
import {
  CycleError,
  DuplicateLocaleError,
  EmptyLocalesError,
  InvalidLocaleError,
  UnknownFallbackError,
} from "../../../src/locale/errors.js";
import { buildLocaleGraph, discoverLocaleGraph } from "../../../src/locale/graph.js";

describe("buildLocaleGraph", () => {
  const chain = [
    "en",
    { main: "en-GB", fallback: "en" },
    { main: "en-CA", fallback: "en-GB" },
  ];

  it("resolves en-CA through en-GB to the mandatory en", () => {
    const graph = buildLocaleGraph(chain);
    expect(graph.route("en-CA")).toEqual(["en-CA", "en-GB", "en"]);
    expect(graph.terminalOf("en-CA")).toBe("en");
    expect(graph.mandatoryLocales()).toEqual(["en"]);
    expect(graph.get("en-GB")?.isMandatory).toBe(false);
  });

  it("keeps declaration order for main locales", () => {
    const graph = buildLocaleGraph(chain);
    expect(graph.mainLocales()).toEqual(["en", "en-GB", "en-CA"]);
  });

  it("normalizes lookups", () => {
    const graph = buildLocaleGraph(chain);
    expect(graph.has("en_gb")).toBe(true);
    expect(graph.route("en_ca")).toEqual(["en-CA", "en-GB", "en"]);
  });

  it("terminates every chain at a mandatory node", () => {
    const graph = buildLocaleGraph([
      "fr",
      { main: "fr-CA", fallback: "fr" },
      "de",
      { main: "de-AT", fallback: "de" },
      { main: "de-CH", fallback: "de-AT" },
    ]);
    for (const locale of graph.allLocales()) {
      const terminal = graph.terminalOf(locale);
      expect(terminal).not.toBeNull();
      expect(graph.get(terminal ?? "")?.isMandatory).toBe(true);
    }
    expect(graph.mandatoryLocales()).toEqual(["de", "fr"]);
  });

  it("treats a fallback-only target as mandatory but not requestable", () => {
    const graph = buildLocaleGraph([{ main: "pt-BR", fallback: "pt" }]);
    expect(graph.route("pt-BR")).toEqual(["pt-BR", "pt"]);
    expect(graph.route("pt")).toBeNull();
    expect(graph.get("pt")).toEqual({ id: "pt", fallback: null, isMandatory: true, isMain: false });
    expect(graph.mandatoryLocales()).toEqual(["pt"]);
    expect(graph.mainLocales()).toEqual(["pt-BR"]);
  });

  it("returns null routes for unknown or invalid locales", () => {
    const graph = buildLocaleGraph(chain);
    expect(graph.route("de")).toBeNull();
    expect(graph.route("???")).toBeNull();
    expect(graph.terminalOf("de")).toBeNull();
  });

  it("rejects a two-node cycle with the visited chain", () => {
    expect(() =>
      buildLocaleGraph([
        { main: "en-GB", fallback: "en-CA" },
        { main: "en-CA", fallback: "en-GB" },
      ]),
    ).toThrow("infinite fallback loop detected: (en-GB -> en-CA -> en-GB)");
  });

  it("rejects a longer cycle", () => {
    let caught: unknown;
    try {
      buildLocaleGraph([
        { main: "en-GB", fallback: "en-CA" },
        { main: "en-CA", fallback: "en-IE" },
        { main: "en-IE", fallback: "en-GB" },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CycleError);
    expect(caught instanceof CycleError && caught.chain).toEqual(["en-GB", "en-CA", "en-IE", "en-GB"]);
  });

  it("rejects a self-loop", () => {
    expect(() => buildLocaleGraph([{ main: "en", fallback: "en" }])).toThrow(
      "infinite fallback loop detected: (en -> en)",
    );
  });

  it("rejects duplicate main locales", () => {
    expect(() => buildLocaleGraph(["en-CA", { main: "en_CA", fallback: "en" }])).toThrow(
      DuplicateLocaleError,
    );
    expect(() => buildLocaleGraph(["en-CA", "en-CA"])).toThrow("main locale duplicate: en-CA");
  });

  it("rejects an empty declaration list", () => {
    expect(() => buildLocaleGraph([])).toThrow(EmptyLocalesError);
  });

  it("rejects invalid identifiers", () => {
    expect(() => buildLocaleGraph(["english language"])).toThrow(InvalidLocaleError);
  });

  describe("with available locale directories", () => {
    it("accepts a fallback that exists on disk", () => {
      const graph = buildLocaleGraph([{ main: "en-GB", fallback: "en" }], { available: ["en", "en-GB"] });
      expect(graph.route("en-GB")).toEqual(["en-GB", "en"]);
    });

    it("accepts a fallback that is declared", () => {
      expect(() => buildLocaleGraph(chain, { available: [] })).not.toThrow();
    });

    it("rejects a dangling fallback", () => {
      let caught: unknown;
      try {
        buildLocaleGraph([{ main: "en-GB", fallback: "en" }], { available: ["en-GB"] });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnknownFallbackError);
      expect(caught instanceof UnknownFallbackError && caught.fallback).toBe("en");
    });
  });
});

describe("discoverLocaleGraph", () => {
  it("links each locale to its closest existing ancestor", () => {
    const graph = discoverLocaleGraph(["en", "en-GB", "en-GB-scotland", "fr-CA"]);
    expect(graph.route("en-GB-scotland")).toEqual(["en-GB-scotland", "en-GB", "en"]);
    expect(graph.route("fr-CA")).toEqual(["fr-CA"]);
    expect(graph.mandatoryLocales()).toEqual(["en", "fr-CA"]);
  });

  it("skips missing intermediate ancestors", () => {
    const graph = discoverLocaleGraph(["zh", "zh-Hant-TW"]);
    expect(graph.get("zh-Hant-TW")?.fallback).toBe("zh");
  });

  it("prefers the script ancestor over the bare language", () => {
    const graph = discoverLocaleGraph(["sr", "sr-Latn", "sr-Latn-RS"]);
    expect(graph.route("sr-Latn-RS")).toEqual(["sr-Latn-RS", "sr-Latn", "sr"]);
  });

  it("merges duplicate spellings", () => {
    const graph = discoverLocaleGraph(["en_GB", "en-GB", "en"]);
    expect(graph.mainLocales()).toEqual(["en", "en-GB"]);
  });

  it("rejects an empty set", () => {
    expect(() => discoverLocaleGraph([])).toThrow(EmptyLocalesError);
  });
});
