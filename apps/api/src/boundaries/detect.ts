import { parseSections, splitSentences } from "../evidence/claims";
import type { Boundary } from "../types/supervision";

export type ArtifactSnapshot = {
  id: string;
  content: string;
};

// Digits, a percent sign, or a whole unit word (time, counts, rates, sizes).
const MEASURABLE =
  /\d|%|\b(?:ms|millis(?:econds?)?|secs?|seconds?|mins?|minutes?|hours?|hrs?|days?|weeks?|users?|requests?|sessions?|rps|qps|kb|mb|gb|tb|percent)\b/i;

export function hasMeasurableQuantity(text: string): boolean {
  return MEASURABLE.test(text);
}

/** Structural gaps in the latest artifact. Every rule that matches is reported. */
export function detectBoundaries(artifact: ArtifactSnapshot | null): Boundary[] {
  if (!artifact) return [];

  const sections = parseSections(artifact.content);
  const boundaries: Boundary[] = [];

  const metrics = sections.filter((s) => s.name === "Metrics");
  if (metrics.length > 0) {
    const sentences = metrics.flatMap((s) => s.body.flatMap((b) => splitSentences(b.text)));
    if (!sentences.some(hasMeasurableQuantity)) {
      boundaries.push({
        type: "empty_metrics",
        section: "Metrics",
        rationale: `Metrics section in ${artifact.id} has no measurable targets (numbers, units or percentages)`
      });
    }
  }

  if (!sections.some((s) => s.name === "Tradeoffs")) {
    boundaries.push({
      type: "missing_tradeoffs",
      section: "Tradeoffs",
      rationale: `${artifact.id} has no Tradeoffs or Alternatives section`
    });
  }

  return boundaries;
}
