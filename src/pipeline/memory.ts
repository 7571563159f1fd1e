/**
 * In-memory collaborators backed by a fixtures file. Used by the CLI and
 * the tests; a deployment swaps in real adapters behind the same interface.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";

import { defaultDataDir, parseReference, readJsonFile, ReferenceDataError } from "../reference/loader.js";
import type { TrustRegistry } from "../reference/schema.js";
import { AnchorPortfolioSchema, EMPTY_COUNTS, type AnchorPortfolio } from "../portfolio/schema.js";
import {
  OrderSchema,
  PublisherProfileSchema,
  SerpSignalSchema,
  type Order,
  type PublisherProfile,
  type SerpSignal,
} from "../preflight/schema.js";
import type { OrderRecord } from "../orders/machine.js";
import { PipelineError } from "../types/errors.js";
import type { Collaborators } from "./collaborators.js";

export const SampleFixturesSchema = z
  .object({
    profiles: z.array(PublisherProfileSchema),
    portfolios: z.array(AnchorPortfolioSchema),
    serp: z.array(SerpSignalSchema),
    orders: z.array(OrderSchema),
    articles: z
      .record(z.string().min(1))
      .describe("Order id to article file, relative to the fixtures file"),
  })
  .strict();

export type SampleFixtures = z.infer<typeof SampleFixturesSchema>;

export const SAMPLE_FIXTURES_FILE = "sample-fixtures.json";

export interface LoadedFixtures {
  fixtures: Readonly<SampleFixtures>;
  /** Article text by order id */
  articles: ReadonlyMap<string, string>;
}

/**
 * Read and validate a fixtures file and the articles it points to.
 *
 * @throws ReferenceDataError when the file, its schema or an article is bad
 */
export function loadSampleFixtures(
  path: string = join(defaultDataDir(), SAMPLE_FIXTURES_FILE)
): LoadedFixtures {
  const fixtures = parseReference(SampleFixturesSchema, readJsonFile(path), path);
  const articles = new Map<string, string>();
  for (const [orderId, file] of Object.entries(fixtures.articles)) {
    const articlePath = join(dirname(path), file);
    try {
      articles.set(orderId, readFileSync(articlePath, "utf-8"));
    } catch {
      throw new ReferenceDataError(articlePath, `Article for ${orderId} not found`);
    }
  }
  return { fixtures, articles };
}

export class InMemoryCollaborators implements Collaborators {
  private readonly profiles: ReadonlyMap<string, PublisherProfile>;
  private readonly portfolios: ReadonlyMap<string, AnchorPortfolio>;
  private readonly serp: readonly SerpSignal[];
  private readonly articles: ReadonlyMap<string, string>;
  private readonly registry: TrustRegistry;
  private readonly records = new Map<string, Readonly<OrderRecord>>();

  constructor(loaded: LoadedFixtures, registry: TrustRegistry) {
    this.profiles = new Map(loaded.fixtures.profiles.map((profile) => [profile.domain, profile]));
    this.portfolios = new Map(
      loaded.fixtures.portfolios.map((portfolio) => [portfolio.targetDomain, portfolio])
    );
    this.serp = loaded.fixtures.serp;
    this.articles = loaded.articles;
    this.registry = registry;
  }

  async getPublisherProfile(domain: string): Promise<PublisherProfile | null> {
    return this.profiles.get(domain) ?? null;
  }

  async getAnchorPortfolio(targetDomain: string): Promise<AnchorPortfolio> {
    return this.portfolios.get(targetDomain) ?? { targetDomain, counts: { ...EMPTY_COUNTS } };
  }

  /** Signal for the exact query and locale, else an empty one. */
  async getSerpSignal(query: string, locale: string): Promise<SerpSignal> {
    const match = this.serp.find((signal) => signal.query === query && signal.locale === locale);
    return match ?? { query, locale, lsiTerms: [], intents: [] };
  }

  async getTrustRegistry(): Promise<TrustRegistry> {
    return this.registry;
  }

  async persist(record: Readonly<OrderRecord>): Promise<void> {
    this.records.set(record.orderId, record);
  }

  async draft(order: Order): Promise<string> {
    const article = this.articles.get(order.id);
    if (article === undefined) {
      throw new PipelineError("DEPENDENCY_UNAVAILABLE", `No draft for ${order.id}`, {
        orderId: order.id,
        dependency: "draft",
      });
    }
    return article;
  }

  /** Last persisted record for an order. */
  persisted(orderId: string): Readonly<OrderRecord> | undefined {
    return this.records.get(orderId);
  }
}
