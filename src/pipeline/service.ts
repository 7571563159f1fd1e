/**
 * Preflight service: the boundary the pipeline and the CLI call.
 *
 * Gathers collaborator inputs under timeouts, then hands them to the pure
 * planner and scorer. Failures come back as OperationResult values.
 */

import type { QcPolicy } from "../config/qc/schema.js";
import type { ReferenceData } from "../reference/loader.js";
import type { Lemmatizer } from "../lexical/lemmatizer.js";
import { buildPreflightMatrix } from "../preflight/builder.js";
import { computeInputFingerprint, type FingerprintInputs } from "../preflight/fingerprint.js";
import { extractQuery } from "../preflight/query.js";
import type { Order, PreflightMatrix } from "../preflight/schema.js";
import { evaluate } from "../qc/engine.js";
import type { QcContext } from "../qc/facts.js";
import type { FixRecord, ValidationReport } from "../qc/schema.js";
import { maybeFix } from "../autofix/controller.js";
import { hostOf } from "../trust/registry.js";
import { PreflightError } from "../types/errors.js";
import { failFrom, ok, type OperationResult } from "../types/result.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { withTimeout, type Collaborators } from "./collaborators.js";

export interface PreflightServiceOptions {
  collaborators: Collaborators;
  reference: ReferenceData;
  policy: QcPolicy;
  lemmatizer: Lemmatizer;
  /** Budget for each collaborator call */
  timeoutMs: number;
  logger?: Logger;
}

export interface ValidationOutcome {
  report: Readonly<ValidationReport>;
  /** The article as scored last; differs from the input when a fix applied */
  article: string;
  fix: FixRecord | null;
}

function targetDomainOf(order: Order): string {
  return hostOf(order.targetUrl) ?? order.targetUrl;
}

export class PreflightService {
  private readonly collaborators: Collaborators;
  private readonly reference: ReferenceData;
  private readonly policy: QcPolicy;
  private readonly lemmatizer: Lemmatizer;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly stopwords: ReadonlySet<string>;

  constructor(options: PreflightServiceOptions) {
    this.collaborators = options.collaborators;
    this.reference = options.reference;
    this.policy = options.policy;
    this.lemmatizer = options.lemmatizer;
    this.timeoutMs = options.timeoutMs;
    this.logger = (options.logger ?? silentLogger).child("preflight");
    this.stopwords = new Set(options.reference.lemmaRules.stopwords.map((word) => word.toLowerCase()));
  }

  /**
   * Fetch every input the matrix depends on.
   *
   * @throws PreflightError DEPENDENCY_UNAVAILABLE for an unknown publisher,
   *   PipelineError TIMEOUT from a slow collaborator
   */
  async gatherInputs(order: Order): Promise<FingerprintInputs> {
    const call = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
      withTimeout(operation, this.timeoutMs, fn);

    const profile = await call("getPublisherProfile", () =>
      this.collaborators.getPublisherProfile(order.publisherDomain)
    );
    if (profile === null) {
      throw new PreflightError(
        "DEPENDENCY_UNAVAILABLE",
        `No publisher profile for ${order.publisherDomain}`,
        { orderId: order.id, dependency: "publisherProfile" }
      );
    }

    const query = extractQuery(order.topic, this.stopwords);
    const serp = await call("getSerpSignal", () => this.collaborators.getSerpSignal(query, order.locale));
    const portfolio = await call("getAnchorPortfolio", () =>
      this.collaborators.getAnchorPortfolio(targetDomainOf(order))
    );
    const registry = await call("getTrustRegistry", () => this.collaborators.getTrustRegistry());

    return {
      order,
      profile,
      serp,
      portfolio: portfolio.counts,
      registry,
      reference: this.reference,
      policy: this.policy,
    };
  }

  async buildPreflight(order: Order): Promise<OperationResult<Readonly<PreflightMatrix>>> {
    try {
      const inputs = await this.gatherInputs(order);
      const matrix = buildPreflightMatrix(
        inputs.order,
        inputs.profile,
        inputs.serp,
        { targetDomain: targetDomainOf(order), counts: inputs.portfolio },
        {
          reference: this.reference,
          registry: inputs.registry,
          policy: this.policy,
          lemmatizer: this.lemmatizer,
        }
      );
      this.logger.info("Preflight matrix built", {
        orderId: order.id,
        fingerprint: matrix.inputFingerprint.slice(0, 12),
        terms: matrix.lsi.terms.length,
      });
      return ok(matrix);
    } catch (err) {
      this.logger.warn("Preflight failed", {
        orderId: order.id,
        error: err instanceof Error ? err.message : String(err),
      });
      return failFrom(err);
    }
  }

  /**
   * True when the inputs behind a stored matrix have changed since it was
   * built.
   */
  async isStale(matrix: PreflightMatrix, order: Order): Promise<OperationResult<boolean>> {
    try {
      const inputs = await this.gatherInputs(order);
      return ok(matrix.inputFingerprint !== computeInputFingerprint(inputs));
    } catch (err) {
      return failFrom(err);
    }
  }

  /**
   * Score an article against its matrix, with at most one automatic fix
   * when autoFix is set.
   */
  async validate(
    articleText: string,
    matrix: PreflightMatrix,
    autoFix: boolean
  ): Promise<OperationResult<ValidationOutcome>> {
    try {
      const registry = await withTimeout("getTrustRegistry", this.timeoutMs, () =>
        this.collaborators.getTrustRegistry()
      );
      const context: QcContext = {
        registry,
        rulebook: this.reference.rulebook,
        voiceMarkers: this.reference.voiceMarkers,
        lemmatizer: this.lemmatizer,
        policy: this.policy,
      };

      const report = evaluate(articleText, matrix, context);
      const outcome: ValidationOutcome = autoFix
        ? maybeFix(articleText, report, matrix, context)
        : { report, article: articleText, fix: null };

      this.logger.info("Article scored", {
        orderId: matrix.orderId,
        status: outcome.report.status,
        score: outcome.report.score,
        fix: outcome.fix?.type ?? null,
      });
      return ok(outcome);
    } catch (err) {
      return failFrom(err);
    }
  }
}
