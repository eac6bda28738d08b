import { z } from "zod";

export const RawTurnSchema = z.object({
  conversationId: z.string().default(""),
  timestamp: z.string().default(""),
  author: z.string().default(""),
  text: z.string(),
});

export const OntologyValueSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  tier: z.union([z.literal(0), z.literal(1)]),
});

export const OntologyCategorySchema = z.object({
  label: z.string(),
  description: z.string().default(""),
  aliases: z.array(z.string()).default([]),
  externalRefs: z.array(z.string()).default([]),
});

export const OntologySchema = z.object({
  values: z.array(OntologyValueSchema).default([]),
  categories: z.record(OntologyCategorySchema).default({}),
  map: z.record(z.string()).default({}),
  valueMap: z.record(z.array(z.string())).default({}),
});

export const SourceRecordSchema = z.object({
  type: z.enum(["url_domain", "wikipedia_page", "wikipedia_category", "isbn", "author"]),
  id: z.string().min(1),
  label: z.string().default(""),
  count: z.number().int().nonnegative().default(0),
  lastSeen: z.string().default(""),
  url: z.string().optional(),
  subjects: z.array(z.string()).optional(),
  observations: z.array(z.string()).default([]),
});

export const AuthorSeedSchema = z.object({
  name: z.string().min(1),
  isbns: z.array(z.string()).default([]),
  bookPatterns: z.array(z.string()).default([]),
  subjects: z.array(z.string()).default([]),
});

export const OntologySeedsSchema = z.object({
  categories: z.record(OntologyCategorySchema).default({}),
  aliases: z.record(z.string()).default({}),
  patterns: z.record(z.string()).default({}),
  sources: z.array(SourceRecordSchema).default([]),
  authors: z.array(AuthorSeedSchema).default([]),
});

const TierLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

export const PromotionProposalSchema = z.object({
  excerpt: z.string(),
  provenance: z.string(),
  primaryTopic: z.string().default(""),
  fromTier: TierLevelSchema,
  toTier: TierLevelSchema,
  reasons: z.array(z.enum(["strong-opinion", "core-value-link", "frequent-topic"])).default([]),
});

export const ApprovedPromotionsSchema = z.object({
  proposals: z.array(PromotionProposalSchema),
});

export type ParsedOntology = z.infer<typeof OntologySchema>;
export type ParsedSeeds = z.infer<typeof OntologySeedsSchema>;
