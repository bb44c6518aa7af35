/**
 * Domain Classifier
 *
 * Keyword-count classification against a small taxonomy. Each keyword found
 * as a substring of the lower-cased text scores one point; the first domain
 * (in taxonomy order) with the highest non-zero score wins.
 *
 * One instance is created per run and passed to whatever needs it.
 *
 * Usage:
 *   const classifier = await DomainClassifier.fromFile(config.paths.domainsConfig);
 *   classifier.classify("Configure an Azure Monitor alert"); // "monitoring"
 */

import { readFile } from "fs/promises";
import { errorMessage, logSystem } from "@/lib/logger";
import { validate, taxonomySchema, type Domain, type Taxonomy } from "@/lib/validation";
import { TaxonomyConfigError } from "./errors";

export class DomainClassifier {
  private domains: Domain[];
  private defaultDomain: string;

  constructor(
    taxonomy: Taxonomy,
    private readonly sourcePath: string | null = null,
  ) {
    this.domains = normalizeDomains(taxonomy);
    this.defaultDomain = taxonomy.default_domain;
  }

  /**
   * Load and validate a taxonomy file.
   * @throws TaxonomyConfigError when the file is unreadable or invalid
   */
  static async fromFile(path: string): Promise<DomainClassifier> {
    return new DomainClassifier(await loadTaxonomy(path), path);
  }

  get defaultDomainId(): string {
    return this.defaultDomain;
  }

  classify(text: string): string {
    if (!text) return this.defaultDomain;

    const lower = text.toLowerCase();
    let bestId = this.defaultDomain;
    let bestScore = 0;

    for (const domain of this.domains) {
      const score = domain.keywords.filter((keyword) => lower.includes(keyword)).length;
      if (score > bestScore) {
        bestScore = score;
        bestId = domain.id;
      }
    }

    return bestId;
  }

  /** Display name for a domain id; unknown ids are returned unchanged */
  getDomainName(domainId: string): string {
    return this.domains.find((d) => d.id === domainId)?.name ?? domainId;
  }

  getAllDomains(): Domain[] {
    return this.domains.map((d) => ({ ...d, keywords: [...d.keywords] }));
  }

  /**
   * Re-read the taxonomy file. Already classified questions keep their
   * domain; only later classify() calls see the change.
   */
  async reload(): Promise<void> {
    if (!this.sourcePath) {
      throw new Error("Cannot reload a classifier that was not loaded from a file");
    }
    const taxonomy = await loadTaxonomy(this.sourcePath);
    this.domains = normalizeDomains(taxonomy);
    this.defaultDomain = taxonomy.default_domain;
    logSystem("taxonomy.reloaded", { message: `Reloaded ${this.domains.length} domains`, path: this.sourcePath });
  }
}

function normalizeDomains(taxonomy: Taxonomy): Domain[] {
  return taxonomy.domains.map((d) => ({ ...d, keywords: d.keywords.map((k) => k.toLowerCase()) }));
}

async function loadTaxonomy(path: string): Promise<Taxonomy> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new TaxonomyConfigError(path, [errorMessage(error)]);
  }

  const result = validate(taxonomySchema, raw);
  if (!result.ok) {
    throw new TaxonomyConfigError(path, result.errors);
  }
  return result.data;
}
