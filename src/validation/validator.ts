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
 * Static validation of message usages against the catalog.
 *
 * Every usage is checked for existence in every mandatory locale it can end up
 * in, and for arguments in every locale that resolves it. The sweep
 * never stops at the first finding; the report lists them all, de-duplicated
 * and in a stable order. Resource errors (duplicates in a bundle) still throw.
 */

import stringify from "safe-stable-stringify";
import type { Bundle, BundleOptions } from "../bundle/bundle.js";
import { BundleCache } from "../bundle/bundle-cache.js";
import type { ResourceCatalog } from "../catalog/catalog.js";
import type { LocaleGraph } from "../locale/graph.js";
import type { LocaleId } from "../locale/locale-id.js";
import { BUILTIN_FUNCTIONS, collectFunctionReferences } from "./functions.js";
import { requiredNames } from "./required-args.js";
import type {
  Finding,
  FindingDetail,
  FindingKind,
  MessageUsage,
  UsageOrigin,
  ValidationReport,
} from "./types.js";

export interface ValidateOptions {
  /** Function names registered with the runtime bundles. NUMBER and DATETIME are always known. */
  functions?: Iterable<string>;
  /** Finding kinds reported as warnings instead of errors. */
  downgrade?: Iterable<FindingKind>;
  /** Accept usages that forward arguments they cannot enumerate. */
  allowIncomplete?: boolean;
  /** Require every named resource to exist in every mandatory locale. Defaults to true. */
  checkResourceCoverage?: boolean;
  /** Reuse an existing cache, e.g. the runtime one. */
  bundles?: BundleCache;
  /** Options for the cache built when `bundles` is not given. */
  bundleOptions?: BundleOptions;
}

/**
 * Mandatory locales a usage lands on. Declared locales that are not mandatory
 * are replaced by the terminal of their fallback chain.
 */
function targetLocales(
  usage: MessageUsage,
  graph: LocaleGraph,
  report: (detail: FindingDetail) => void,
): LocaleId[] {
  if (usage.declaredLocales === "all") {
    return graph.mandatoryLocales();
  }
  const targets = new Set<LocaleId>();
  for (const locale of usage.declaredLocales) {
    const terminal = graph.terminalOf(locale);
    if (terminal === null) {
      report({ kind: "unknown-locale", locale });
      continue;
    }
    targets.add(terminal);
  }
  return [...targets].sort();
}

/**
 * Locales whose resolved message must accept the usage's arguments: the
 * mandatory targets plus every requestable locale in scope.
 */
function argumentLocales(usage: MessageUsage, graph: LocaleGraph, targets: readonly LocaleId[]): LocaleId[] {
  const locales = new Set<LocaleId>(targets);
  if (usage.declaredLocales === "all") {
    for (const locale of graph.mainLocales()) locales.add(locale);
  } else {
    for (const locale of usage.declaredLocales) {
      const node = graph.get(locale);
      if (node?.isMain) locales.add(node.id);
    }
  }
  return [...locales].sort();
}

/** The first bundle on the locale's route that has the message. */
function resolvingBundle(
  bundles: BundleCache,
  graph: LocaleGraph,
  locale: LocaleId,
  resourceName: string,
  messageId: string,
  attribute: string | null,
): Bundle | null {
  for (const hop of graph.route(locale) ?? [locale]) {
    const bundle = bundles.tryGetBundle(hop, resourceName);
    if (bundle?.has(messageId, attribute)) return bundle;
  }
  return null;
}

function sortKey(detail: FindingDetail): string {
  return `${detail.kind}\u0000${stringify(detail) ?? ""}`;
}

export function validateUsages(
  usages: Iterable<MessageUsage>,
  catalog: ResourceCatalog,
  graph: LocaleGraph,
  options: ValidateOptions = {},
): ValidationReport {
  const bundles = options.bundles ?? new BundleCache(catalog, options.bundleOptions ?? {});
  const downgraded = new Set<FindingKind>(options.downgrade ?? []);
  const findings = new Map<string, Finding>();

  const add = (detail: FindingDetail, origin?: UsageOrigin): void => {
    const key = sortKey(detail);
    if (findings.has(key)) return;
    const severity = downgraded.has(detail.kind) ? "warning" : "error";
    findings.set(key, origin ? { ...detail, severity, origin } : { ...detail, severity });
  };

  for (const usage of usages) {
    const attribute = usage.attribute ?? null;
    const { resourceName, messageId, origin } = usage;
    const report = (detail: FindingDetail): void => add(detail, origin);

    if (usage.incomplete && !options.allowIncomplete) {
      report({ kind: "incomplete-arguments", resourceName, messageId, attribute });
    }

    const targets = targetLocales(usage, graph, report);
    for (const locale of targets) {
      const bundle = bundles.tryGetBundle(locale, resourceName);
      if (!bundle) {
        report({ kind: "missing-resource", locale, resourceName });
        continue;
      }
      const lookup = bundle.lookup(messageId, attribute);
      if (!lookup.found) {
        report({
          kind: "missing-message",
          locale,
          resourceName,
          messageId,
          attribute,
          reason: lookup.reason,
        });
      }
    }

    // Arguments come from whichever bundle each locale resolves the message in,
    // so overrides in non-mandatory locales are checked too.
    const supplied = new Set(usage.suppliedArgNames);
    const missingNames = new Set<string>();
    const missingIn: LocaleId[] = [];
    const checked = new Set<LocaleId>();

    for (const locale of argumentLocales(usage, graph, targets)) {
      const bundle = resolvingBundle(bundles, graph, locale, resourceName, messageId, attribute);
      if (!bundle || checked.has(bundle.locale)) continue;
      checked.add(bundle.locale);

      const required = bundle.requiredArgs(messageId, attribute);
      if (!required) continue;
      for (const reference of required.unresolved) {
        report({
          kind: "unresolved-reference",
          locale: bundle.locale,
          resourceName,
          messageId,
          attribute,
          reference,
        });
      }
      if (usage.incomplete) continue;

      const missing = requiredNames(required).filter((name) => !supplied.has(name));
      if (missing.length > 0) {
        missingIn.push(bundle.locale);
        for (const name of missing) missingNames.add(name);
      }
    }

    if (missingIn.length > 0) {
      report({
        kind: "missing-argument",
        locales: missingIn.sort(),
        resourceName,
        messageId,
        attribute,
        missing: [...missingNames].sort(),
      });
    }
  }

  if (options.checkResourceCoverage ?? true) {
    const mandatory = graph.mandatoryLocales();
    for (const resourceName of catalog.namedResourceNames()) {
      for (const locale of mandatory) {
        if (!catalog.named(locale, resourceName)) {
          add({ kind: "missing-resource", locale, resourceName });
        }
      }
    }
  }

  const registered = new Set([...BUILTIN_FUNCTIONS, ...(options.functions ?? [])]);
  const unknownFunctions = new Map<string, Set<string>>();
  for (const resource of catalog.resources()) {
    for (const name of collectFunctionReferences(resource.syntax)) {
      if (registered.has(name)) continue;
      let paths = unknownFunctions.get(name);
      if (!paths) {
        paths = new Set();
        unknownFunctions.set(name, paths);
      }
      paths.add(resource.path);
    }
  }
  for (const [name, paths] of unknownFunctions) {
    add({ kind: "unknown-function", name, resources: [...paths].sort() });
  }

  const sorted = [...findings.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, finding]) => finding);
  const errorCount = sorted.filter((f) => f.severity === "error").length;
  const warningCount = sorted.length - errorCount;

  return Object.freeze({
    findings: Object.freeze(sorted),
    errorCount,
    warningCount,
    ok: errorCount === 0,
  });
}
