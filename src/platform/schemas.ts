/**
 * Wire schemas for platform responses.
 *
 * Responses are validated here, at the boundary, so that a missing field
 * fails the listing as PLATFORM.UNAVAILABLE instead of surfacing later as an
 * undefined lookup in reconciliation.
 */

import { z } from 'zod';

export const scimEmailSchema = z.object({
  value: z.string(),
  primary: z.boolean().optional(),
});

export const scimUserSchema = z.object({
  id: z.string().min(1),
  active: z.boolean(),
  userName: z.string().optional(),
  emails: z.array(scimEmailSchema).default([]),
});

export const scimListResponseSchema = z.object({
  totalResults: z.number().int().nonnegative(),
  itemsPerPage: z.number().int().nonnegative().optional(),
  startIndex: z.number().int().optional(),
  Resources: z.array(scimUserSchema).default([]),
});

export const memberSchema = z.object({
  id: z.string().min(1),
  deleted: z.boolean().optional(),
  is_bot: z.boolean().optional(),
  is_owner: z.boolean().optional(),
  is_restricted: z.boolean().optional(),
  is_ultra_restricted: z.boolean().optional(),
  profile: z
    .object({
      email: z.string().optional(),
    })
    .default({}),
});

/** Common envelope of Web API responses. */
export const apiEnvelopeSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

export const memberListResponseSchema = apiEnvelopeSchema.extend({
  members: z.array(memberSchema).default([]),
  response_metadata: z
    .object({
      next_cursor: z.string().optional(),
    })
    .optional(),
});

export type ScimUser = z.infer<typeof scimUserSchema>;
export type WorkspaceMember = z.infer<typeof memberSchema>;
export type ScimListResponse = z.infer<typeof scimListResponseSchema>;
export type MemberListResponse = z.infer<typeof memberListResponseSchema>;

/** Primary email of a SCIM user: the one flagged primary, else the first listed. */
export function primaryEmail(user: ScimUser): string | undefined {
  const primary = user.emails.find((email) => email.primary === true);
  return (primary ?? user.emails[0])?.value;
}
