// ============================================================================
// Issue Zod Schemas
// Runtime validation for tracker payloads and cached records
// ============================================================================

import { z } from "zod";

// ============================================================================
// Jira REST payload
// ============================================================================

const NamedFieldSchema = z.object({ name: z.string().optional() }).nullish();

const IssueKeySchema = z.object({ key: z.string().min(1) });

export const JiraIssueLinkSchema = z.object({
  type: z
    .object({
      name: z.string().optional(),
      outward: z.string().optional(),
    })
    .optional(),
  outwardIssue: IssueKeySchema.optional(),
  inwardIssue: IssueKeySchema.optional(),
});

export const JiraIssueResponseSchema = z.object({
  key: z.string().min(1),
  fields: z.object({
    summary: z.string().nullish(),
    status: NamedFieldSchema,
    priority: NamedFieldSchema,
    assignee: z
      .object({
        displayName: z.string().optional(),
        name: z.string().optional(),
      })
      .nullish(),
    subtasks: z.array(IssueKeySchema).nullish(),
    issuelinks: z.array(JiraIssueLinkSchema).nullish(),
  }),
});

export type JiraIssueResponse = z.infer<typeof JiraIssueResponseSchema>;

// ============================================================================
// Cached record
// ============================================================================

export const IssueRecordSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  priority: z.string(),
  assignee: z.string(),
  summary: z.string(),
  outwardLinks: z.array(z.string()),
  subtasks: z.array(z.string()),
  url: z.string(),
});
