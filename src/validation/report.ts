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
 * Human-readable rendering of validation reports.
 */

import type { Finding, UsageOrigin, ValidationReport } from "./types.js";

function messageKey(messageId: string, attribute: string | null): string {
  return attribute === null ? messageId : `${messageId}.${attribute}`;
}

function formatOrigin(origin: UsageOrigin | undefined): string {
  if (!origin) return "";
  return origin.line === undefined ? ` (${origin.file})` : ` (${origin.file}:${origin.line})`;
}

function describe(finding: Finding): string {
  switch (finding.kind) {
    case "missing-resource":
      return `Resource "${finding.resourceName}" is missing for locale ${finding.locale}`;
    case "missing-message": {
      const key = messageKey(finding.messageId, finding.attribute);
      const what =
        finding.reason === "message"
          ? "is missing"
          : finding.reason === "attribute"
            ? "has no such attribute"
            : "has no value";
      return `Message "${key}" ${what} in resource "${finding.resourceName}" for locale ${finding.locale}`;
    }
    case "missing-argument":
      return `Message "${messageKey(finding.messageId, finding.attribute)}" in resource "${finding.resourceName}" requires missing arguments: ${finding.missing.join(", ")} (locales: ${finding.locales.join(", ")})`;
    case "unknown-function":
      return `Function "${finding.name}" is not registered (used in ${finding.resources.join(", ")})`;
    case "unknown-locale":
      return `Locale "${finding.locale}" is not declared`;
    case "unresolved-reference":
      return `Message "${messageKey(finding.messageId, finding.attribute)}" in resource "${finding.resourceName}" references unknown message "${finding.reference}" for locale ${finding.locale}`;
    case "incomplete-arguments":
      return `Message "${messageKey(finding.messageId, finding.attribute)}" in resource "${finding.resourceName}" is used with an incomplete argument list`;
  }
}

export function formatFinding(finding: Finding): string {
  return `[${finding.severity}] ${describe(finding)}${formatOrigin(finding.origin)}`;
}

export function formatReport(report: ValidationReport): string {
  if (report.findings.length === 0) {
    return "Validation passed with no findings";
  }
  const header = report.ok
    ? `Validation passed with ${report.warningCount} warning(s):`
    : `Validation failed with ${report.errorCount} error(s) and ${report.warningCount} warning(s):`;
  return [header, ...report.findings.map((finding) => `  - ${formatFinding(finding)}`)].join("\n");
}
