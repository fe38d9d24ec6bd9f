import { Type, type Static } from "@sinclair/typebox";

/**
 * Outreach Configuration Schema (TypeBox)
 * Single source of truth for outreach.json structure
 */

const RoleCategorySchema = Type.Union([
  Type.Literal("js-ts"),
  Type.Literal("full-stack"),
  Type.Literal("frontend"),
  Type.Literal("backend"),
  Type.Literal("other"),
]);

const StrategySchema = Type.Union([
  Type.Literal("posting-text"),
  Type.Literal("company-website"),
  Type.Literal("hr-pattern"),
]);

const ProfileSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  email: Type.String({ minLength: 3 }),
  phone: Type.String({ default: "" }),
  location: Type.String({ default: "" }),
  resume_path: Type.String({ default: "resume.pdf" }),
});

const SearchSchema = Type.Object({
  keywords: Type.Array(Type.String(), { minItems: 1 }),
  locations: Type.Array(Type.String(), { minItems: 1 }),
  experience_level: Type.Union([Type.Literal("junior"), Type.Literal("mid"), Type.Literal("senior")], {
    default: "mid",
  }),
  remote_only: Type.Boolean({ default: true }),
});

const SourceToggleSchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  max_results: Type.Integer({ default: 25, minimum: 1 }),
});

const SourcesSchema = Type.Object({
  "linkedin-posts": SourceToggleSchema,
  "linkedin-jobs": SourceToggleSchema,
  twitter: Type.Object({
    enabled: Type.Boolean({ default: true }),
    max_results: Type.Integer({ default: 20, minimum: 1 }),
    bearer_token: Type.Optional(Type.String()),
  }),
  request_timeout_ms: Type.Integer({ default: 15000, minimum: 100 }),
});

const RankingSchema = Type.Object({
  category_keywords: Type.Array(
    Type.Object({
      category: RoleCategorySchema,
      keywords: Type.Array(Type.String({ minLength: 1 })),
    }),
  ),
  category_priority: Type.Array(RoleCategorySchema),
});

const ResolverSchema = Type.Object({
  strategies: Type.Array(StrategySchema, { minItems: 1 }),
  timeout_ms: Type.Integer({ default: 20000, minimum: 100 }),
  max_pages: Type.Integer({ default: 4, minimum: 1 }),
  hr_prefixes: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
});

const EmailSchema = Type.Object({
  smtp_host: Type.String({ default: "smtp.gmail.com" }),
  smtp_port: Type.Integer({ default: 587, minimum: 1 }),
  secure: Type.Boolean({ default: false }),
  user: Type.String(),
  sender_name: Type.String(),
  /** Connect, greeting and socket timeout for SMTP; must stay below lock.ttl_ms. */
  timeout_ms: Type.Integer({ default: 30000, minimum: 1 }),
});

const LlmSchema = Type.Object({
  provider: Type.String({ default: "anthropic" }),
  model: Type.String(),
  temperature: Type.Number({ default: 0.7, minimum: 0, maximum: 2 }),
  max_tokens: Type.Integer({ default: 1024, minimum: 64 }),
});

const LimitsSchema = Type.Object({
  max_per_run: Type.Integer({ default: 10, minimum: 1 }),
  max_per_day: Type.Integer({ default: 30, minimum: 1 }),
});

const LockSchema = Type.Object({
  ttl_ms: Type.Integer({ default: 120000, minimum: 1 }),
  wait_ms: Type.Integer({ default: 30000, minimum: 0 }),
  poll_ms: Type.Integer({ default: 250, minimum: 1 }),
});

// Root config schema
export const OutreachConfigSchema = Type.Object({
  profile: ProfileSchema,
  search: SearchSchema,
  sources: SourcesSchema,
  ranking: RankingSchema,
  resolver: ResolverSchema,
  email: EmailSchema,
  llm: LlmSchema,
  limits: LimitsSchema,
  lock: LockSchema,
});

export type OutreachConfig = Static<typeof OutreachConfigSchema>;
export type ProfileConfig = Static<typeof ProfileSchema>;
export type SearchConfig = Static<typeof SearchSchema>;
export type SourcesConfig = Static<typeof SourcesSchema>;
export type RankingConfig = Static<typeof RankingSchema>;
export type ResolverConfig = Static<typeof ResolverSchema>;
export type EmailConfig = Static<typeof EmailSchema>;
export type LlmConfig = Static<typeof LlmSchema>;
export type LimitsConfig = Static<typeof LimitsSchema>;
export type LockConfig = Static<typeof LockSchema>;
