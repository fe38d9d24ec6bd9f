import type { ProfileConfig } from "../core/config-schema";
import { ContentGenerationError, errorMessage } from "../core/errors";
import type { EmailDrafter } from "../services/llm";
import type { DraftLifecycle } from "./draft-lifecycle";
import type { EmailResolver } from "./email-resolver";
import type { OpportunityStore } from "./opportunity-store";
import { rankCandidates } from "./ranker";
import type { ContactEmail, Draft, Opportunity, RoleCategory } from "./types";

export interface DraftRunOptions {
  /** Stop after this many new drafts. */
  limit?: number;
}

export interface DraftRunSummary {
  companies: number;
  drafted: Draft[];
  skipped: { companyKey: string; reason: string }[];
  unreachable: number;
}

export interface DraftServiceDeps {
  store: OpportunityStore;
  lifecycle: DraftLifecycle;
  resolver: EmailResolver;
  drafter: EmailDrafter;
  priority: readonly RoleCategory[];
  profile: ProfileConfig;
  resumeText: () => Promise<string>;
}

/**
 * One pending draft per eligible company: rank the company's candidates,
 * resolve a contact for the best reachable one, and ask the drafter for
 * subject and body.
 */
export class DraftService {
  constructor(private readonly deps: DraftServiceDeps) {}

  async run(options: DraftRunOptions = {}): Promise<DraftRunSummary> {
    const { store, lifecycle } = this.deps;
    const buckets = store.candidatesByCompany();
    const summary: DraftRunSummary = { companies: 0, drafted: [], skipped: [], unreachable: 0 };
    let resumeText: string | undefined;

    for (const [companyKey, candidates] of buckets) {
      if (options.limit !== undefined && summary.drafted.length >= options.limit) break;

      if (lifecycle.hasSentDraft(companyKey)) {
        summary.skipped.push({ companyKey, reason: "already contacted" });
        continue;
      }
      if (lifecycle.hasActiveDraft(companyKey)) {
        summary.skipped.push({ companyKey, reason: "draft awaiting review" });
        continue;
      }
      summary.companies++;

      const picked = await this.pickReachable(candidates, summary);
      if (!picked) {
        summary.skipped.push({ companyKey, reason: "no contact address" });
        continue;
      }

      resumeText ??= await this.deps.resumeText();
      try {
        const content = await this.deps.drafter.draft({
          opportunity: picked.opportunity,
          contact: picked.contact,
          profile: this.deps.profile,
          resumeText,
        });
        const draft = lifecycle.create({
          opportunityId: picked.opportunity.id,
          recipient: picked.contact.address,
          subject: content.subject,
          body: content.body,
        });
        summary.drafted.push(draft);
        console.log(`📝 [Draft] #${draft.id} ${draft.title} at ${draft.company} -> ${draft.recipient}`);
      } catch (err) {
        if (!(err instanceof ContentGenerationError)) throw err;
        console.warn(`⚠️ [Draft] Skipping ${picked.opportunity.company}: ${errorMessage(err)}`);
        summary.skipped.push({ companyKey, reason: errorMessage(err) });
      }
    }

    console.log(
      `✅ [Draft] ${summary.drafted.length} new draft(s) across ${summary.companies} compan${summary.companies === 1 ? "y" : "ies"}`,
    );
    return summary;
  }

  /** Companies a run would draft for and their current winner. Resolves nothing. */
  preview(): { companyKey: string; winner: Opportunity }[] {
    const { store, lifecycle, priority } = this.deps;
    const plan: { companyKey: string; winner: Opportunity }[] = [];
    for (const [companyKey, candidates] of store.candidatesByCompany()) {
      if (lifecycle.hasSentDraft(companyKey) || lifecycle.hasActiveDraft(companyKey)) continue;
      const [winner] = rankCandidates(candidates, priority);
      if (winner) plan.push({ companyKey, winner });
    }
    return plan;
  }

  /**
   * Walk the ranked candidates until one has a contact. Candidates that
   * exhaust every strategy are marked unreachable and the next one is tried.
   */
  private async pickReachable(
    candidates: Opportunity[],
    summary: DraftRunSummary,
  ): Promise<{ opportunity: Opportunity; contact: ContactEmail } | null> {
    const { store, resolver, priority } = this.deps;
    for (const opportunity of rankCandidates(candidates, priority)) {
      const known = store.getContact(opportunity.id);
      if (known) return { opportunity, contact: known };

      const resolved = await resolver.resolve(opportunity);
      if (resolved) {
        return { opportunity, contact: store.saveContact(resolved) };
      }
      store.markReachability(opportunity.id, "unreachable");
      summary.unreachable++;
    }
    return null;
  }
}
