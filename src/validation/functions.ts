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

import { type FunctionReference, type Resource as SyntaxResource, Visitor } from "@fluent/syntax";

/** Functions every FluentBundle provides without registration. */
export const BUILTIN_FUNCTIONS: readonly string[] = Object.freeze(["DATETIME", "NUMBER"]);

class FunctionReferenceCollector extends Visitor {
  readonly names = new Set<string>();

  visitFunctionReference(node: FunctionReference): void {
    this.names.add(node.id.name);
    this.genericVisit(node);
  }
}

/** Names of all functions called anywhere in the resource, terms and select variants included. */
export function collectFunctionReferences(resource: SyntaxResource): Set<string> {
  const collector = new FunctionReferenceCollector();
  collector.visit(resource);
  return collector.names;
}
