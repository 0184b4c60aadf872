import type { Claim, SectionName, Severity } from "../types/supervision";
import { hashParts } from "./hash";

export type ArtifactSection = {
  name: SectionName;
  heading: string;
  /** 1-based line of the heading. */
  line: number;
  body: Array<{ line: number; text: string }>;
};

const SECTION_PATTERNS: Array<[SectionName, RegExp]> = [
  ["Non-goals", /^(?:non-?goals?|out of scope)\b/i],
  ["Goals", /^(?:goals?|objectives?)\b/i],
  ["Scope", /^scope\b/i],
  ["Metrics", /^(?:success\s+)?(?:metrics?|kpis?)\b/i],
  ["Risks", /^risks?\b/i],
  ["Tradeoffs", /^(?:trade-?offs?|alternatives?)\b/i],
  ["Rollout", /^(?:rollout|launch plan|deployment)\b/i]
];

const BASE_SEVERITY: Partial<Record<SectionName, Severity>> = {
  Goals: "HIGH",
  Risks: "HIGH",
  Metrics: "MEDIUM"
};

const STRONG_MODAL = /\b(?:must|critical|required)\b/i;
const MIN_CLAIM_LENGTH = 12;

function sectionOf(heading: string): SectionName | null {
  const title = heading.replace(/^[\d.\s]+/, "").trim();
  for (const [name, pattern] of SECTION_PATTERNS) {
    if (pattern.test(title)) return name;
  }
  return null;
}

/**
 * Split markdown into recognized sections. Text before the first
 * recognized heading, or under any other heading, is not part of a section.
 */
export function parseSections(content: string): ArtifactSection[] {
  const sections: ArtifactSection[] = [];
  let current: ArtifactSection | null = null;

  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    const heading = raw.match(/^\s{0,3}#{1,6}\s+(.*?)\s*#*\s*$/);
    if (heading) {
      const title = (heading[1] ?? "").trim();
      const name = sectionOf(title);
      current = name ? { name, heading: title, line: i + 1, body: [] } : null;
      if (current) sections.push(current);
      continue;
    }

    const text = raw.trim();
    if (current && text) current.body.push({ line: i + 1, text });
  }

  return sections;
}

export function splitSentences(line: string): string[] {
  const stripped = line.replace(/^(?:[-*+]|\d+[.)])\s+/, "").replace(/^\[[ xX]\]\s+/, "");
  return stripped
    .split(/[.!?]+\s+/)
    .map((s) => s.trim().replace(/[.!?]+$/, ""))
    .filter((s) => s.length >= MIN_CLAIM_LENGTH);
}

export function severityFor(section: SectionName, sentence: string): Severity {
  const base = BASE_SEVERITY[section] ?? "LOW";
  if (!STRONG_MODAL.test(sentence)) return base;
  return base === "LOW" ? "MEDIUM" : "HIGH";
}

/**
 * Every qualifying sentence under a recognized section becomes a claim.
 * Ids hash the artifact id, section, ordinal within the section and text,
 * so unchanged content always yields the same claims.
 */
export function extractClaims(content: string, artifactId: string): Claim[] {
  const claims: Claim[] = [];
  const ordinals = new Map<SectionName, number>();

  for (const section of parseSections(content)) {
    for (const { line, text } of section.body) {
      for (const sentence of splitSentences(text)) {
        const ordinal = (ordinals.get(section.name) ?? 0) + 1;
        ordinals.set(section.name, ordinal);

        claims.push({
          id: `claim_${hashParts([artifactId, section.name, ordinal, sentence])}`,
          text: sentence,
          severity: severityFor(section.name, sentence),
          section: section.name,
          sourceArtifact: artifactId,
          line
        });
      }
    }
  }

  return claims;
}
