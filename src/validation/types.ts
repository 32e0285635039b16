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
 * Static validation types: usages in, findings out.
 */

import type { LocaleId } from "../locale/locale-id.js";

/** Where a usage was declared, for diagnostics. */
export interface UsageOrigin {
  file: string;
  line?: number;
}

/** One call site: "format this message from this resource with these arguments". */
export interface MessageUsage {
  resourceName: string;
  messageId: string;
  attribute?: string | null;
  suppliedArgNames: readonly string[];
  /** "all" targets every mandatory locale. */
  declaredLocales: "all" | readonly string[];
  /** The call site forwards arguments it cannot enumerate. */
  incomplete?: boolean;
  origin?: UsageOrigin;
}

export type MissingMessageReason = "message" | "attribute" | "value";

export const FINDING_KINDS = [
  "missing-resource",
  "missing-message",
  "missing-argument",
  "unknown-function",
  "unknown-locale",
  "unresolved-reference",
  "incomplete-arguments",
] as const;

export type FindingKind = (typeof FINDING_KINDS)[number];

export type Severity = "error" | "warning";

export type FindingDetail =
  | { kind: "missing-resource"; locale: LocaleId; resourceName: string }
  | {
      kind: "missing-message";
      locale: LocaleId;
      resourceName: string;
      messageId: string;
      attribute: string | null;
      reason: MissingMessageReason;
    }
  | {
      kind: "missing-argument";
      locales: LocaleId[];
      resourceName: string;
      messageId: string;
      attribute: string | null;
      missing: string[];
    }
  | { kind: "unknown-function"; name: string; resources: string[] }
  | { kind: "unknown-locale"; locale: string }
  | {
      kind: "unresolved-reference";
      locale: LocaleId;
      resourceName: string;
      messageId: string;
      attribute: string | null;
      reference: string;
    }
  | {
      kind: "incomplete-arguments";
      resourceName: string;
      messageId: string;
      attribute: string | null;
    };

export type Finding = FindingDetail & {
  severity: Severity;
  origin?: UsageOrigin;
};

export interface ValidationReport {
  findings: readonly Finding[];
  errorCount: number;
  warningCount: number;
  /** No error-severity findings. Warnings do not fail the build. */
  ok: boolean;
}
