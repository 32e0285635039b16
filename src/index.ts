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
 * Library entry point.
 */

export { Bundle, createBundle } from "./bundle/bundle.js";
export type {
  BundleFactory,
  BundleOptions,
  FluentFunctions,
  FormatArgs,
  FormattedMessage,
  LookupResult,
  TextTransform,
} from "./bundle/bundle.js";
export { BundleCache, bundleKey } from "./bundle/bundle-cache.js";
export { DuplicateMessageError, ResourceNotFoundError } from "./bundle/errors.js";

export { ResourceCatalog, ResourceCatalogBuilder, parseResource } from "./catalog/catalog.js";
export type { Resource, ResourceScope } from "./catalog/catalog.js";
export {
  DuplicateResourceError,
  GlobalNamedResourceError,
  InvalidLocaleDirectoryError,
  MissingLocaleDirectoryError,
  ParseError,
  ResourceError,
  ResourceReadError,
} from "./catalog/errors.js";
export type { ParseErrorDetail } from "./catalog/errors.js";
export { computeCatalogHash } from "./catalog/hasher.js";
export { discoverLocaleDirectories, loadResourceCatalog } from "./catalog/loader.js";

export { FileConfigProvider } from "./config/file-provider.js";
export { ConfigError, ConfigValidationError } from "./config/errors.js";
export { resolveConfig } from "./config/index.js";
export type { ResolvedConfig } from "./config/index.js";
export type { ConfigProvider, RawConfigFile } from "./config/provider.js";

export { createL10n, loadL10n } from "./l10n/index.js";
export type { CreateL10nOptions, L10n, LoadL10nOptions } from "./l10n/index.js";

export {
  CycleError,
  DuplicateLocaleError,
  EmptyLocalesError,
  InvalidLocaleError,
  LocaleGraphError,
  UnknownFallbackError,
} from "./locale/errors.js";
export { LocaleGraph, buildLocaleGraph, discoverLocaleGraph } from "./locale/graph.js";
export type { LocaleDeclaration, LocaleDeclarationInput, LocaleNode } from "./locale/graph.js";
export { ancestorsOf, normalizeLocaleId, parseLanguageIdentifier } from "./locale/locale-id.js";
export type { LanguageIdentifier, LocaleId } from "./locale/locale-id.js";

export { defineMessage, messageUsageOf, translateMessage } from "./translate/message.js";
export type { L10nMessage } from "./translate/message.js";
export { DEFAULT_PLACEHOLDER, Translator, parseMessageKey } from "./translate/translator.js";
export { defaultVariantSelectors } from "./translate/selectors.js";
export type { TranslationDiagnostic, TranslationResult, TranslatorOptions } from "./translate/translator.js";

export { collectRequiredArgs } from "./validation/required-args.js";
export type { RequiredArgs } from "./validation/required-args.js";
export { formatFinding, formatReport } from "./validation/report.js";
export { FINDING_KINDS } from "./validation/types.js";
export type { Finding, FindingKind, MessageUsage, ValidationReport } from "./validation/types.js";
export { loadUsageFeed, parseUsageFeed } from "./validation/usage-feed.js";
export { validateUsages } from "./validation/validator.js";
export type { ValidateOptions } from "./validation/validator.js";
