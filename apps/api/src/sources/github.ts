import { Agent, request, type Dispatcher } from "undici";
import { z } from "zod";
import { cachedJson, cacheKey } from "../services/cache";
import { env } from "../services/env";
import type { EvidenceSource } from "../supervisor/hook";
import type { EvidenceItem } from "../types/supervision";
import { milestoneBundleItems, MilestoneBundleSchema, type MilestoneBundle } from "./milestone";

const agent = new Agent({
  connect: {
    timeout: 4_000
  }
});

const MilestoneSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  description: z.string().nullable().optional(),
  state: z.string(),
  due_on: z.string().nullable().optional()
});

const IssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().optional(),
  state: z.string(),
  labels: z.array(z.union([z.string(), z.object({ name: z.string() })])).default([]),
  created_at: z.string().optional(),
  closed_at: z.string().nullable().optional(),
  user: z.object({ login: z.string() }).nullable().optional(),
  pull_request: z.unknown().optional()
});

export type GitHubOptions = {
  repo: string;
  /** Milestone title or number. */
  milestone: string;
  token?: string;
  baseUrl?: string;
  /** Overrides the shared undici agent (tests pass a MockAgent). */
  dispatcher?: Dispatcher;
  cacheTtlSeconds?: number;
};

async function getJson(url: string, opts: GitHubOptions): Promise<unknown> {
  const token = opts.token ?? env.GITHUB_TOKEN;
  const res = await request(url, {
    method: "GET",
    headers: {
      Accept: "application/vnd.github+json",
      "User-Agent": "claimwatch-supervisor/1.0",
      ...(token ? { Authorization: `Bearer ${token}` } : {})
    },
    dispatcher: opts.dispatcher ?? agent,
    headersTimeout: 5_000,
    bodyTimeout: 10_000
  });

  if (res.statusCode < 200 || res.statusCode >= 300) {
    const detail = await res.body.text().catch(() => "");
    throw new Error(`GitHub request failed (${res.statusCode}): ${detail.slice(0, 200)}`);
  }
  return res.body.json();
}

/**
 * Fetch a milestone and its issues (pull requests excluded) as a bundle.
 * Bundles are cached; a cache hit makes no request.
 */
export function fetchMilestoneBundle(opts: GitHubOptions): Promise<MilestoneBundle> {
  return cachedJson(
    cacheKey("milestone:v1", opts.repo, opts.milestone),
    MilestoneBundleSchema,
    opts.cacheTtlSeconds ?? 30 * 60,
    () => loadMilestoneBundle(opts)
  );
}

async function loadMilestoneBundle(opts: GitHubOptions): Promise<MilestoneBundle> {
  const [owner, name] = opts.repo.split("/");
  if (!owner || !name) throw new Error(`Repository must be "owner/name", got "${opts.repo}"`);

  const base = (opts.baseUrl ?? env.GITHUB_API_URL).replace(/\/+$/, "");
  const repoUrl = `${base}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`;

  const milestones = z.array(MilestoneSchema).parse(await getJson(`${repoUrl}/milestones?state=all&per_page=100`, opts));
  const wanted = opts.milestone.trim();
  const milestone = milestones.find((m) => m.title === wanted || String(m.number) === wanted);
  if (!milestone) throw new Error(`Milestone "${wanted}" not found in ${opts.repo}`);

  const issues = z
    .array(IssueSchema)
    .parse(await getJson(`${repoUrl}/issues?state=all&per_page=100&milestone=${milestone.number}`, opts));

  return {
    repo: { owner, name, fullName: opts.repo },
    milestone: {
      number: milestone.number,
      title: milestone.title,
      description: milestone.description ?? "",
      state: milestone.state,
      dueOn: milestone.due_on ?? null
    },
    issues: issues
      .filter((i) => i.pull_request === undefined)
      .map((i) => ({
        number: i.number,
        title: i.title,
        body: i.body ?? "",
        state: i.state,
        labels: i.labels.map((l) => (typeof l === "string" ? l : l.name)),
        createdAt: i.created_at,
        closedAt: i.closed_at ?? null,
        user: i.user?.login ?? ""
      }))
  };
}

/**
 * Evidence from an issue-tracker milestone. The bundle is fetched on first
 * use; a failed fetch is retried on the next call.
 */
export class IssueTrackerEvidenceSource implements EvidenceSource {
  private bundle: Promise<MilestoneBundle> | null = null;

  constructor(private readonly opts: GitHubOptions) {}

  async getEvidenceItems(): Promise<EvidenceItem[]> {
    if (!this.bundle) {
      this.bundle = fetchMilestoneBundle(this.opts);
    }

    try {
      return milestoneBundleItems(await this.bundle);
    } catch (err) {
      this.bundle = null;
      throw err;
    }
  }
}
