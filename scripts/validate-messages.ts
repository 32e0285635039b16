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
 * Build-time message validation.
 * Usage: tsx scripts/validate-messages.ts --usages l10n-usages.yaml
 */

import "dotenv/config";
import { runValidateCommand } from "../src/cli/validate-command.js";

process.exitCode = await runValidateCommand(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  io: {
    log: (message) => console.log(message),
    error: (message) => console.error(message),
  },
});
