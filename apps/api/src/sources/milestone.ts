import { z } from "zod";
import type { EvidenceSource } from "../supervisor/hook";
import type { EvidenceItem } from "../types/supervision";

export const BundleIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().default(""),
  state: z.string(),
  labels: z.array(z.string()).default([]),
  createdAt: z.string().optional(),
  closedAt: z.string().nullable().optional(),
  user: z.string().default("")
});

export const MilestoneBundleSchema = z.object({
  repo: z.object({ owner: z.string(), name: z.string(), fullName: z.string() }),
  milestone: z.object({
    number: z.number().int(),
    title: z.string(),
    description: z.string().nullable().default(""),
    state: z.string(),
    dueOn: z.string().nullable().optional()
  }),
  issues: z.array(BundleIssueSchema)
});

export type BundleIssue = z.infer<typeof BundleIssueSchema>;
export type MilestoneBundle = z.infer<typeof MilestoneBundleSchema>;

/** Issues (title + body) and the milestone description as evidence. */
export function milestoneBundleItems(bundle: MilestoneBundle): EvidenceItem[] {
  const items: EvidenceItem[] = [];

  for (const issue of bundle.issues) {
    const text = `${issue.title} ${issue.body ?? ""}`.trim();
    if (text) items.push({ text, sourceRef: `issue:${issue.number}`, sourceType: "issue" });
  }

  const description = bundle.milestone.description?.trim();
  if (description) {
    items.push({ text: description, sourceRef: `milestone:${bundle.milestone.number}`, sourceType: "milestone" });
  }

  return items;
}

export class MilestoneBundleEvidenceSource implements EvidenceSource {
  constructor(private readonly bundle: MilestoneBundle) {}

  getEvidenceItems(): EvidenceItem[] {
    return milestoneBundleItems(this.bundle);
  }
}

export class StaticEvidenceSource implements EvidenceSource {
  private readonly items: EvidenceItem[];

  constructor(items: EvidenceItem[] = []) {
    this.items = [...items];
  }

  add(...items: EvidenceItem[]) {
    this.items.push(...items);
  }

  getEvidenceItems(): EvidenceItem[] {
    return [...this.items];
  }
}
