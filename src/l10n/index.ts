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
 * L10n: graph, catalog, bundles and translator built once from a resource root
 * and passed around as one immutable value.
 */

import type { FormatArgs, FluentFunctions, TextTransform } from "../bundle/bundle.js";
import { BundleCache } from "../bundle/bundle-cache.js";
import type { ResourceCatalog } from "../catalog/catalog.js";
import { computeCatalogHash } from "../catalog/hasher.js";
import {
  discoverLocaleDirectories,
  listLocaleDirectoryNames,
  loadResourceCatalog,
} from "../catalog/loader.js";
import { type ResolveConfigOptions, type ResolvedConfig, resolveConfig } from "../config/index.js";
import type { ConfigProvider } from "../config/provider.js";
import {
  type LocaleDeclarationInput,
  type LocaleGraph,
  buildLocaleGraph,
  discoverLocaleGraph,
} from "../locale/graph.js";
import { type TranslationResult, Translator, type TranslatorOptions } from "../translate/translator.js";
import type { MessageUsage, ValidationReport } from "../validation/types.js";
import { type ValidateOptions, validateUsages } from "../validation/validator.js";

export interface CreateL10nOptions extends TranslatorOptions {
  /** Resource root directory. */
  root: string;
  /** Explicit declarations; discovered from the locale directories when omitted. */
  locales?: readonly LocaleDeclarationInput[] | null;
  functions?: FluentFunctions;
  useIsolating?: boolean;
  transform?: TextTransform;
  allowOverrides?: boolean;
}

export interface L10n {
  readonly root: string;
  readonly graph: LocaleGraph;
  readonly catalog: ResourceCatalog;
  readonly bundles: BundleCache;
  readonly translator: Translator;
  /** SHA-256 fingerprint of the locale declarations and resource sources. */
  readonly catalogHash: string;
  translate(
    locale: string,
    resourceName: string,
    messageId: string,
    attribute?: string | null,
    args?: FormatArgs,
  ): TranslationResult;
  /** Function names default to the ones registered with the bundles. */
  validate(usages: Iterable<MessageUsage>, options?: Omit<ValidateOptions, "bundles">): ValidationReport;
}

/**
 * @throws LocaleGraphError, ResourceError
 */
export async function createL10n(options: CreateL10nOptions): Promise<L10n> {
  const { root } = options;
  // With explicit declarations, a directory that is not a locale id is simply not a locale.
  const available = options.locales
    ? await listLocaleDirectoryNames(root)
    : await discoverLocaleDirectories(root);
  const graph = options.locales
    ? buildLocaleGraph(options.locales, { available })
    : discoverLocaleGraph(available);

  const catalog = await loadResourceCatalog(root, graph);
  const bundles = new BundleCache(catalog, {
    functions: options.functions,
    useIsolating: options.useIsolating,
    transform: options.transform,
    allowOverrides: options.allowOverrides,
  });
  const translator = new Translator(graph, bundles, {
    placeholder: options.placeholder,
    onMissing: options.onMissing,
  });
  const registered = Object.keys(options.functions ?? {});

  return Object.freeze({
    root,
    graph,
    catalog,
    bundles,
    translator,
    catalogHash: computeCatalogHash(graph, catalog),
    translate: (
      locale: string,
      resourceName: string,
      messageId: string,
      attribute: string | null = null,
      args?: FormatArgs,
    ) => translator.translate(locale, resourceName, messageId, attribute, args),
    validate: (usages: Iterable<MessageUsage>, validateOptions: Omit<ValidateOptions, "bundles"> = {}) =>
      validateUsages(usages, catalog, graph, {
        ...validateOptions,
        functions: validateOptions.functions ?? registered,
        bundles,
      }),
  });
}

export interface LoadL10nOptions
  extends Omit<CreateL10nOptions, "root" | "locales">,
    ResolveConfigOptions {}

/** Resolve configuration, then build. Returns the resolved config alongside. */
export async function loadL10n(
  provider: ConfigProvider,
  options: LoadL10nOptions = {},
): Promise<{ l10n: L10n; config: ResolvedConfig }> {
  const { env, ...createOptions } = options;
  const config = await resolveConfig(provider, { env });
  const l10n = await createL10n({
    ...createOptions,
    root: config.resourceRoot,
    locales: config.locales,
  });
  return { l10n, config };
}
