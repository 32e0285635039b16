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
 * Selectors that fell through to the default variant: the supplied value
 * matches none of the variant keys, so the engine silently picked `*[...]`.
 * Only the variants that formatting actually takes are followed.
 */

import { FluentNumber } from "@fluent/bundle";
import {
  type Expression,
  Identifier,
  NumberLiteral,
  type Pattern,
  Placeable,
  SelectExpression,
  type Variant,
  VariableReference,
} from "@fluent/syntax";
import type { FormatArgs } from "../bundle/bundle.js";

type Selected = { variant: Variant; fellThrough: boolean };

function numericValue(value: unknown): number | null {
  if (typeof value === "number") return value;
  if (value instanceof FluentNumber) return value.value;
  return null;
}

class SelectorWalker {
  readonly fellThrough = new Set<string>();
  private readonly locale: string;
  private readonly args: FormatArgs;
  private plural: Intl.PluralRules | null = null;

  constructor(locale: string, args: FormatArgs) {
    this.locale = locale;
    this.args = args;
  }

  walkPattern(pattern: Pattern): void {
    for (const element of pattern.elements) {
      if (element instanceof Placeable) this.walkExpression(element.expression);
    }
  }

  private walkExpression(expression: Expression): void {
    if (expression instanceof Placeable) {
      this.walkExpression(expression.expression);
    } else if (expression instanceof SelectExpression) {
      const selected = this.select(expression);
      if (!selected) return;
      if (selected.fellThrough && expression.selector instanceof VariableReference) {
        this.fellThrough.add(expression.selector.id.name);
      }
      this.walkPattern(selected.variant.value);
    }
  }

  private select(expression: SelectExpression): Selected | null {
    const fallback = expression.variants.find((variant) => variant.default);
    if (!fallback) return null;
    if (!(expression.selector instanceof VariableReference)) {
      return { variant: fallback, fellThrough: false };
    }

    const value = this.args[expression.selector.id.name];
    const number = numericValue(value);
    let match: Variant | undefined;
    if (typeof value === "string") {
      match = expression.variants.find((v) => v.key instanceof Identifier && v.key.name === value);
    } else if (number !== null) {
      match =
        expression.variants.find((v) => v.key instanceof NumberLiteral && Number(v.key.value) === number) ??
        expression.variants.find((v) => v.key instanceof Identifier && v.key.name === this.category(number));
    } else {
      // Missing values are reported by the engine; dates and other types are not compared.
      return { variant: fallback, fellThrough: false };
    }
    return match ? { variant: match, fellThrough: false } : { variant: fallback, fellThrough: true };
  }

  private category(value: number): string {
    if (!this.plural) this.plural = new Intl.PluralRules(this.locale);
    return this.plural.select(value);
  }
}

/** Names of variable selectors that fell through to the default variant, sorted. */
export function defaultVariantSelectors(pattern: Pattern, args: FormatArgs, locale: string): string[] {
  const walker = new SelectorWalker(locale, args);
  walker.walkPattern(pattern);
  return [...walker.fellThrough].sort();
}
