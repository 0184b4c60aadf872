import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Claim, EvidenceItem, Intervention } from "../types/supervision";

export type EscalationPacketInput = {
  runId: string;
  /** 1-based escalation number within the run. */
  sequence: number;
  intervention: Intervention;
  uncoveredHigh: Claim[];
  /** Evidence already bound to some claim. */
  evidence?: EvidenceItem[];
  generatedAt?: Date;
};

const MAX_CLAIMS = 20;
const MAX_CLAIM_CHARS = 200;
const MAX_STEPS = 10;
const MAX_EVIDENCE = 10;
const MAX_EVIDENCE_CHARS = 100;

function clamp(s: string, max: number) {
  const t = s.trim();
  return t.length > max ? t.slice(0, max) + "…" : t;
}

export function packetFileName(sequence: number) {
  return `packet_${sequence}.md`;
}

export function renderEscalationPacket(input: EscalationPacketInput): string {
  const { intervention, uncoveredHigh } = input;
  const generatedAt = (input.generatedAt ?? new Date()).toISOString();

  const lines = [
    `# Escalation Packet ${input.sequence}`,
    "",
    `**Run ID**: ${input.runId}`,
    `**Generated**: ${generatedAt}`,
    `**Trigger**: ${intervention.type}`,
    "",
    "## Rationale",
    "",
    clamp(intervention.rationale, 1000),
    "",
    "## Uncovered HIGH Claims",
    ""
  ];

  if (uncoveredHigh.length === 0) {
    lines.push("No uncovered HIGH severity claims.");
  } else {
    for (const c of uncoveredHigh.slice(0, MAX_CLAIMS)) {
      lines.push(`- \`${c.id}\` (${c.section}, ${c.sourceArtifact}:${c.line}): ${clamp(c.text, MAX_CLAIM_CHARS)}`);
    }
    if (uncoveredHigh.length > MAX_CLAIMS) lines.push(`- +${uncoveredHigh.length - MAX_CLAIMS} more`);
  }

  const evidence = input.evidence ?? [];
  lines.push("", "## Evidence Gathered", "");
  if (evidence.length === 0) {
    lines.push("No evidence gathered yet.");
  } else {
    for (const e of evidence.slice(0, MAX_EVIDENCE)) {
      lines.push(`- ${clamp(e.text, MAX_EVIDENCE_CHARS)} (from \`${e.sourceRef}\`)`);
    }
    if (evidence.length > MAX_EVIDENCE) lines.push(`- +${evidence.length - MAX_EVIDENCE} more`);
  }

  lines.push("", "## Suggested Next Steps", "");
  const steps = intervention.suggestedNextSteps.slice(0, MAX_STEPS);
  if (steps.length === 0) lines.push("None suggested.");
  steps.forEach((s, i) => lines.push(`${i + 1}. ${clamp(s, MAX_CLAIM_CHARS)}`));

  return lines.join("\n") + "\n";
}

export async function writeEscalationPacket(packetsDir: string, input: EscalationPacketInput): Promise<string> {
  await mkdir(packetsDir, { recursive: true });
  const path = join(packetsDir, packetFileName(input.sequence));
  await writeFile(path, renderEscalationPacket(input), "utf8");
  return path;
}
