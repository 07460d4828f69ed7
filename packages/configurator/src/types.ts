/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Resolution output types
 */

export interface ConfigurationDiagnostics {
  /** Targets without a matching variant; they keep their current look */
  readonly notUpdatedTargets: readonly string[];
  /** Targets the look library reported as ambiguous */
  readonly conflictingTargets: readonly string[];
  /** Configurable node ids absent from the remote scene */
  readonly missingNodes: readonly string[];
  /** Material targets absent from the remote scene */
  readonly missingTargets: readonly string[];
}

export interface ConfigurationResult {
  readonly config: string;
  /** Configurable nodes whose PR tags match, in document order */
  readonly visibleNodeIds: ReadonlySet<string>;
  /** Configurable nodes whose PR tags do not match, in document order */
  readonly invisibleNodeIds: ReadonlySet<string>;
  /** Every target in library order; null when no variant matched */
  readonly activeVariants: ReadonlyMap<string, string | null>;
  readonly diagnostics: ConfigurationDiagnostics;
}

/** Overlay reported by a remote scene check */
export interface DiagnosticsOverlay {
  missingNodes?: readonly string[];
  missingTargets?: readonly string[];
}
