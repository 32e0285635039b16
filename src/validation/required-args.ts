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
 * Arguments a message body needs from its caller.
 *
 * Message references are followed into the referenced message (or attribute).
 * Term references are not: a term's variables are supplied by the term call
 * itself, never by the caller.
 */

import {
  type Expression,
  FunctionReference,
  type Message,
  MessageReference,
  type Pattern,
  Placeable,
  SelectExpression,
  VariableReference,
} from "@fluent/syntax";

export interface RequiredArgs {
  /** Variables used in placeholders, sorted. */
  readonly variables: readonly string[];
  /** Variables used as (or inside) a selector, sorted. */
  readonly selectorKeys: readonly string[];
  /** Message references that could not be resolved, as "id" or "id.attr", sorted. */
  readonly unresolved: readonly string[];
}

export type MessageLookup = (id: string) => Message | undefined;

interface Collector {
  variables: Set<string>;
  selectorKeys: Set<string>;
  unresolved: Set<string>;
  visited: Set<string>;
  lookup: MessageLookup;
}

function referenceKey(id: string, attribute: string | null): string {
  return attribute === null ? id : `${id}.${attribute}`;
}

function walkExpression(collector: Collector, expression: Expression, inSelector: boolean): void {
  if (expression instanceof VariableReference) {
    (inSelector ? collector.selectorKeys : collector.variables).add(expression.id.name);
  } else if (expression instanceof SelectExpression) {
    walkExpression(collector, expression.selector, true);
    for (const variant of expression.variants) {
      walkPattern(collector, variant.value);
    }
  } else if (expression instanceof FunctionReference) {
    for (const argument of expression.arguments.positional) {
      walkExpression(collector, argument, inSelector);
    }
  } else if (expression instanceof Placeable) {
    walkExpression(collector, expression.expression, inSelector);
  } else if (expression instanceof MessageReference) {
    const attribute = expression.attribute?.name ?? null;
    const key = referenceKey(expression.id.name, attribute);
    if (collector.visited.has(key)) return;
    collector.visited.add(key);

    const pattern = patternOf(collector.lookup(expression.id.name), attribute);
    if (pattern) {
      walkPattern(collector, pattern);
    } else {
      collector.unresolved.add(key);
    }
  }
}

function walkPattern(collector: Collector, pattern: Pattern): void {
  for (const element of pattern.elements) {
    if (element instanceof Placeable) {
      walkExpression(collector, element.expression, false);
    }
  }
}

/** The value pattern, or the named attribute's pattern. */
export function patternOf(message: Message | undefined, attribute: string | null): Pattern | null {
  if (!message) return null;
  if (attribute === null) return message.value;
  return message.attributes.find((attr) => attr.id.name === attribute)?.value ?? null;
}

export function collectRequiredArgs(
  pattern: Pattern,
  lookup: MessageLookup,
  self?: { id: string; attribute: string | null },
): RequiredArgs {
  const collector: Collector = {
    variables: new Set(),
    selectorKeys: new Set(),
    unresolved: new Set(),
    visited: new Set(self ? [referenceKey(self.id, self.attribute)] : []),
    lookup,
  };
  walkPattern(collector, pattern);

  return {
    variables: [...collector.variables].sort(),
    selectorKeys: [...collector.selectorKeys].sort(),
    unresolved: [...collector.unresolved].sort(),
  };
}

/** Names the caller must supply: variables ∪ selector keys, sorted. */
export function requiredNames(args: RequiredArgs): string[] {
  return [...new Set([...args.variables, ...args.selectorKeys])].sort();
}
