/**
 * Writer brief: the plan handed to whoever drafts the article.
 */

import type { ComplianceRulebook } from "../reference/schema.js";
import type { Order, PreflightMatrix } from "./schema.js";

export interface BriefSection {
  part: "introduction" | "midpoint" | "conclusion";
  guidance: string;
}

export interface WriterBrief {
  orderId: string;
  topic: string;
  anchor: {
    text: string;
    targetUrl: string;
    type: string;
  };
  outline: BriefSection[];
  lsiTerms: string[];
  trustSources: string[];
  requiredTrustLinks: number;
  disclaimers: string[];
  wordRange: { min: number; target: number; max: number };
  voice: { tone: string; perspective: string };
}

export function createWriterBrief(
  order: Order,
  matrix: PreflightMatrix,
  rulebook?: ComplianceRulebook
): WriterBrief {
  const disclaimers = matrix.compliance.tags.map((tag) =>
    rulebook ? rulebook.rules[tag].disclaimer : `Include a ${tag} disclaimer.`
  );

  return {
    orderId: order.id,
    topic: order.topic,
    anchor: {
      text: matrix.anchor.text,
      targetUrl: matrix.targetUrl,
      type: matrix.anchor.type,
    },
    outline: [
      {
        part: "introduction",
        guidance: `Open on the publisher's subject (${matrix.industries.publisher}). No outbound links here.`,
      },
      {
        part: "midpoint",
        guidance:
          `Bridge through "${matrix.bridge.label}": ${matrix.bridge.rationale} ` +
          `Place the link within the first ${matrix.placement.maxParagraphDepth} paragraphs of a middle section.`,
      },
      {
        part: "conclusion",
        guidance: "Summarize for the reader. Do not repeat the anchor.",
      },
    ],
    lsiTerms: matrix.lsi.terms.map((term) => term.term),
    trustSources: matrix.trust.sources.map((source) => source.domain),
    requiredTrustLinks: matrix.trust.requiredCount,
    disclaimers,
    wordRange: {
      min: matrix.wordCount.min,
      target: matrix.wordCount.target,
      max: matrix.wordCount.max,
    },
    voice: { tone: matrix.voice.tone, perspective: matrix.voice.perspective },
  };
}

export function formatWriterBrief(brief: WriterBrief): string {
  const lines: string[] = [
    `WRITER BRIEF: ${brief.orderId}`,
    `Topic: ${brief.topic}`,
    `Anchor: "${brief.anchor.text}" -> ${brief.anchor.targetUrl} (${brief.anchor.type})`,
    `Length: ${brief.wordRange.min}-${brief.wordRange.max} words (target ${brief.wordRange.target})`,
    `Voice: ${brief.voice.tone}, ${brief.voice.perspective.replace("_", " ")}`,
    "",
    "Outline:",
  ];
  for (const section of brief.outline) {
    lines.push(`  ${section.part}: ${section.guidance}`);
  }
  lines.push("", `LSI terms near the anchor: ${brief.lsiTerms.join(", ")}`);
  lines.push(
    `Cite at least ${brief.requiredTrustLinks} of: ${brief.trustSources.join(", ")}`
  );
  if (brief.disclaimers.length > 0) {
    lines.push("", "Disclaimers:");
    for (const disclaimer of brief.disclaimers) {
      lines.push(`  - ${disclaimer}`);
    }
  }
  return lines.join("\n");
}
