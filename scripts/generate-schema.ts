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
 * Generates JSON Schema from Zod schemas using Zod v4's built-in toJSONSchema.
 * Output: schema/l10n.schema.json, schema/usage-feed.schema.json
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigFileSchema } from "../src/config/schema.js";
import { UsageFeedSchema } from "../src/validation/usage-feed.js";

const outputDir = join(process.cwd(), "schema");
mkdirSync(outputDir, { recursive: true });

const outputs = [
  {
    file: "l10n.schema.json",
    title: "l10n Configuration Schema",
    description: "Schema for l10n.yaml / l10n.json configuration files.",
    schema: z.toJSONSchema(ConfigFileSchema, { io: "input" }),
  },
  {
    file: "usage-feed.schema.json",
    title: "Message Usage Feed Schema",
    description: "Schema for the message usages checked by validate-messages.",
    schema: z.toJSONSchema(UsageFeedSchema, { io: "input" }),
  },
];

for (const { file, title, description, schema } of outputs) {
  const outputPath = join(outputDir, file);
  writeFileSync(outputPath, `${JSON.stringify({ ...schema, title, description }, null, 2)}\n`);
  console.log(`Generated: ${outputPath}`);
}
