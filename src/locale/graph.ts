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
 * Locale fallback graph: a forest where every locale has at most one fallback edge.
 * The locale at the end of each chain is mandatory: it is the only place a
 * lookup is guaranteed never to fall further back, so it must define everything.
 *
 * Built once, immutable afterwards.
 */

import {
  CycleError,
  DuplicateLocaleError,
  EmptyLocalesError,
  UnknownFallbackError,
} from "./errors.js";
import { type LocaleId, ancestorsOf, normalizeLocaleId, tryNormalizeLocaleId } from "./locale-id.js";

export interface LocaleDeclaration {
  readonly main: LocaleId;
  readonly fallback: LocaleId | null;
}

/** A bare locale ("en") or a main/fallback pair. */
export type LocaleDeclarationInput = string | { main: string; fallback?: string | null };

export interface LocaleNode {
  readonly id: LocaleId;
  readonly fallback: LocaleId | null;
  readonly isMandatory: boolean;
  /** Declared as a main locale, i.e. usable as a requested locale. */
  readonly isMain: boolean;
}

export interface BuildLocaleGraphOptions {
  /**
   * Locales that exist on disk. When given, a fallback target must be either
   * declared as a main locale or listed here.
   */
  available?: Iterable<string>;
}

export class LocaleGraph {
  private readonly nodes: ReadonlyMap<LocaleId, LocaleNode>;
  private readonly declared: readonly LocaleDeclaration[];

  private constructor(declarations: readonly LocaleDeclaration[]) {
    const nodes = new Map<LocaleId, LocaleNode>();
    for (const { main, fallback } of declarations) {
      nodes.set(main, Object.freeze({ id: main, fallback, isMandatory: fallback === null, isMain: true }));
    }
    for (const { fallback } of declarations) {
      if (fallback !== null && !nodes.has(fallback)) {
        nodes.set(
          fallback,
          Object.freeze({ id: fallback, fallback: null, isMandatory: true, isMain: false }),
        );
      }
    }
    this.nodes = nodes;
    this.declared = Object.freeze(declarations.map((d) => Object.freeze({ ...d })));
  }

  /** @internal declarations are assumed normalized and cycle-free. */
  static fromDeclarations(declarations: readonly LocaleDeclaration[]): LocaleGraph {
    const graph = new LocaleGraph(declarations);
    Object.freeze(graph);
    return graph;
  }

  get(locale: string): LocaleNode | undefined {
    const id = tryNormalizeLocaleId(locale);
    return id === null ? undefined : this.nodes.get(id);
  }

  has(locale: string): boolean {
    return this.get(locale) !== undefined;
  }

  /**
   * Resolution route for a requested locale: the locale itself followed by every
   * fallback hop. Null when the locale is unknown or only reachable as a fallback.
   */
  route(locale: string): LocaleId[] | null {
    const node = this.get(locale);
    if (!node?.isMain) return null;

    const route: LocaleId[] = [node.id];
    let current: LocaleNode | undefined = node;
    while (current?.fallback) {
      route.push(current.fallback);
      current = this.nodes.get(current.fallback);
    }
    return route;
  }

  /** The mandatory locale at the end of the chain starting at `locale`. */
  terminalOf(locale: string): LocaleId | null {
    let current = this.get(locale);
    if (!current) return null;
    while (current.fallback) {
      const next = this.nodes.get(current.fallback);
      if (!next) return current.fallback;
      current = next;
    }
    return current.id;
  }

  mandatoryLocales(): LocaleId[] {
    return [...this.nodes.values()]
      .filter((node) => node.isMandatory)
      .map((node) => node.id)
      .sort();
  }

  mainLocales(): LocaleId[] {
    return this.declared.map((d) => d.main);
  }

  allLocales(): LocaleId[] {
    return [...this.nodes.keys()];
  }

  declarations(): readonly LocaleDeclaration[] {
    return this.declared;
  }
}

function toDeclaration(input: LocaleDeclarationInput): LocaleDeclaration {
  if (typeof input === "string") {
    return { main: normalizeLocaleId(input), fallback: null };
  }
  return {
    main: normalizeLocaleId(input.main),
    fallback: input.fallback ? normalizeLocaleId(input.fallback) : null,
  };
}

/**
 * Build a graph from explicit declarations.
 * @throws InvalidLocaleError, DuplicateLocaleError, CycleError, UnknownFallbackError, EmptyLocalesError
 */
export function buildLocaleGraph(
  inputs: readonly LocaleDeclarationInput[],
  options: BuildLocaleGraphOptions = {},
): LocaleGraph {
  const declarations = inputs.map(toDeclaration);
  if (declarations.length === 0) {
    throw new EmptyLocalesError();
  }

  const byMain = new Map<LocaleId, LocaleDeclaration>();
  for (const declaration of declarations) {
    if (byMain.has(declaration.main)) {
      throw new DuplicateLocaleError(declaration.main);
    }
    byMain.set(declaration.main, declaration);
  }

  for (const declaration of declarations) {
    const visited: LocaleId[] = [];
    let current: LocaleDeclaration | undefined = declaration;
    while (current) {
      visited.push(current.main);
      const { fallback }: LocaleDeclaration = current;
      if (fallback === null) break;
      if (visited.includes(fallback)) {
        visited.push(fallback);
        throw new CycleError(visited);
      }
      current = byMain.get(fallback);
    }
  }

  if (options.available) {
    const available = new Set<LocaleId>();
    for (const locale of options.available) {
      const id = tryNormalizeLocaleId(locale);
      if (id !== null) available.add(id);
    }
    for (const { main, fallback } of declarations) {
      if (fallback !== null && !byMain.has(fallback) && !available.has(fallback)) {
        throw new UnknownFallbackError(main, fallback);
      }
    }
  }

  return LocaleGraph.fromDeclarations(declarations);
}

/**
 * Infer a graph from a set of locales (typically the resource directory names).
 * Each locale falls back to its closest existing truncation, see `ancestorsOf`;
 * a locale without one becomes its own mandatory terminal.
 * @throws InvalidLocaleError, EmptyLocalesError
 */
export function discoverLocaleGraph(locales: Iterable<string>): LocaleGraph {
  const ids = [...new Set([...locales].map(normalizeLocaleId))].sort();
  if (ids.length === 0) {
    throw new EmptyLocalesError();
  }

  const known = new Set(ids);
  const declarations = ids.map((main) => ({
    main,
    fallback: ancestorsOf(main).find((ancestor) => known.has(ancestor)) ?? null,
  }));

  return LocaleGraph.fromDeclarations(declarations);
}
