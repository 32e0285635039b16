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
import { BundleCache } from "../../../src/bundle/bundle-cache.js";
import { ResourceCatalogBuilder } from "../../../src/catalog/catalog.js";
import { buildLocaleGraph } from "../../../src/locale/graph.js";
import { defineMessage, messageUsageOf, translateMessage } from "../../../src/translate/message.js";
import { Translator } from "../../../src/translate/translator.js";

const catalog = new ResourceCatalogBuilder()
  .addNamed(
    "en",
    "errors",
    [
      "quota-exceeded = You can upload at most { $limit } files.",
      "upload =",
      "    .failed = Upload of { $file } failed",
      "",
    ].join("\n"),
  )
  .build();
const translator = new Translator(
  buildLocaleGraph(["en"]),
  new BundleCache(catalog, { useIsolating: false }),
  { onMissing: () => {} },
);

describe("defineMessage", () => {
  it("splits the key and freezes the value", () => {
    const message = defineMessage("errors", "upload.failed", { file: "a.txt" });
    expect(message).toEqual({
      resourceName: "errors",
      messageId: "upload",
      attribute: "failed",
      args: { file: "a.txt" },
    });
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.args)).toBe(true);
  });

  it("copies the arguments", () => {
    const args = { limit: 10 };
    const message = defineMessage("errors", "quota-exceeded", args);
    args.limit = 20;
    expect(message.args.limit).toBe(10);
  });
});

describe("translateMessage", () => {
  it("formats with the message arguments", () => {
    const quota = defineMessage("errors", "quota-exceeded", { limit: 10 });
    expect(translateMessage(translator, "en", quota).text).toBe("You can upload at most 10 files.");
  });

  it("lets overrides win", () => {
    const failed = defineMessage("errors", "upload.failed", { file: "a.txt" });
    expect(translateMessage(translator, "en", failed, { file: "b.txt" }).text).toBe("Upload of b.txt failed");
  });
});

describe("messageUsageOf", () => {
  it("describes the message as a usage with sorted argument names", () => {
    const message = defineMessage("errors", "upload.failed", { zeta: 1, file: "a" });
    expect(messageUsageOf(message, ["en"], { file: "src/upload.ts", line: 12 })).toEqual({
      resourceName: "errors",
      messageId: "upload",
      attribute: "failed",
      suppliedArgNames: ["file", "zeta"],
      declaredLocales: ["en"],
      origin: { file: "src/upload.ts", line: 12 },
    });
  });

  it("defaults to every locale", () => {
    const usage = messageUsageOf(defineMessage("errors", "quota-exceeded", { limit: 1 }));
    expect(usage.declaredLocales).toBe("all");
    expect(usage.origin).toBeUndefined();
  });
});
