/**
 * Input fingerprinting for preflight matrices.
 *
 * The fingerprint covers every input that can change the matrix. A stored
 * matrix whose fingerprint no longer matches is stale and must be rebuilt.
 */

import { createHash } from "node:crypto";

import type { QcPolicy } from "../config/qc/schema.js";
import type { ReferenceData } from "../reference/loader.js";
import type { TrustRegistry } from "../reference/schema.js";
import type { AnchorCounts } from "../portfolio/schema.js";
import type { Order, PublisherProfile, SerpSignal, PreflightMatrix } from "./schema.js";

export interface FingerprintInputs {
  order: Order;
  profile: PublisherProfile;
  serp: SerpSignal;
  portfolio: AnchorCounts;
  registry: TrustRegistry;
  reference: ReferenceData;
  policy: QcPolicy;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth. Array order is kept.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

export function computeInputFingerprint(inputs: FingerprintInputs): string {
  return sha256Hex(
    canonicalJson({
      order: inputs.order,
      profile: inputs.profile,
      serp: inputs.serp,
      portfolio: inputs.portfolio,
      registryVersion: inputs.registry.version,
      reference: {
        lexicon: inputs.reference.lexicon.version,
        lemmaRules: inputs.reference.lemmaRules.version,
        rulebook: inputs.reference.rulebook.version,
        midpoints: inputs.reference.midpoints.version,
      },
      policy: inputs.policy,
    })
  );
}

export function isMatrixStale(matrix: PreflightMatrix, inputs: FingerprintInputs): boolean {
  return matrix.inputFingerprint !== computeInputFingerprint(inputs);
}
