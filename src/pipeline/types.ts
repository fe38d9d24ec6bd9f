export const SOURCES = ["linkedin-posts", "linkedin-jobs", "twitter"] as const;
export type Source = typeof SOURCES[number];

export const ROLE_CATEGORIES = ["js-ts", "full-stack", "frontend", "backend", "other"] as const;
export type RoleCategory = typeof ROLE_CATEGORIES[number];

export const RESOLUTION_STRATEGIES = ["posting-text", "company-website", "hr-pattern"] as const;
export type ResolutionStrategyName = typeof RESOLUTION_STRATEGIES[number];

/** Ordered strongest first. */
export const CONFIDENCE_TIERS = ["explicit-in-posting", "company-domain-pattern", "generic-hr-pattern"] as const;
export type ConfidenceTier = typeof CONFIDENCE_TIERS[number];

export const DRAFT_STATUSES = ["pending", "approved", "discarded", "sent"] as const;
export type DraftStatus = typeof DRAFT_STATUSES[number];

export const REACHABILITY = ["unresolved", "reachable", "unreachable"] as const;
export type Reachability = typeof REACHABILITY[number];

/** Canonical record produced by the normalizer, before persistence. */
export interface OpportunityRecord {
  companyKey: string;
  company: string;
  title: string;
  description: string;
  source: Source;
  url: string;
  location: string;
  discoveredAt: Date;
  category: RoleCategory;
}

export interface Opportunity extends OpportunityRecord {
  id: number;
  urlKey: string;
  reachability: Reachability;
}

export interface ContactEmail {
  opportunityId: number;
  address: string;
  strategy: ResolutionStrategyName;
  tier: ConfidenceTier;
  /** False only for an HR-pattern guess whose domain could not be confirmed. */
  verified: boolean;
  resolvedAt: Date;
}

export interface Draft {
  id: number;
  opportunityId: number;
  companyKey: string;
  company: string;
  title: string;
  recipient: string;
  subject: string;
  body: string;
  status: DraftStatus;
  createdAt: Date;
  updatedAt: Date;
  sentAt: Date | null;
}

export interface CategoryRule {
  category: RoleCategory;
  keywords: string[];
}
