import { isValid, parseISO } from "date-fns";
import { z } from "zod";

// ========================================================================
// Enums
// ========================================================================

export const LinkType = {
  File: "File",
  Folder: "Folder",
} as const;

export type LinkType = (typeof LinkType)[keyof typeof LinkType];

export const LinkAccessibility = {
  Anyone: "Anyone",
  Password: "Password",
  Domain: "Domain",
  Recipients: "Recipients",
} as const;

export type LinkAccessibility =
  (typeof LinkAccessibility)[keyof typeof LinkAccessibility];

// ========================================================================
// Wire schemas (Egnyte public API v1)
// ========================================================================

export const LinkDetailsResponseSchema = z.object({
  id: z.string(),
  path: z.string(),
  url: z.string(),
  link_type: z.string().nullish(),
  accessibility: z.string().nullish(),
  notify: z.boolean().nullish(),
  protection: z.string().nullish(),
  link_to_current: z.boolean().nullish(),
  creation_date: z
    .string()
    .refine((value) => isValid(parseISO(value)), "Invalid ISO 8601 timestamp"),
  created_by: z.string(),
  recipients: z.array(z.string()).nullish(),
});

// Paging envelope; returned to callers as received.
export const LinksListSchema = z
  .object({
    ids: z.array(z.string()).optional(),
    offset: z.number().optional(),
    count: z.number().optional(),
    total_count: z.number().optional(),
  })
  .passthrough();

export type LinkDetailsResponse = z.infer<typeof LinkDetailsResponseSchema>;
export type LinksList = z.infer<typeof LinksListSchema>;

// ========================================================================
// Domain models
// ========================================================================

export interface LinkDetails {
  readonly id: string;
  readonly path: string;
  readonly url: string;
  readonly type: LinkType;
  readonly accessibility: LinkAccessibility;
  readonly notify: boolean;
  readonly linkToCurrent: boolean;
  readonly creationDate: Date;
  readonly createdBy: string;
  /** Raw protection value reported by Egnyte (e.g. "PREVIEW"), or null. */
  readonly protection: string | null;
  readonly recipients: readonly string[];
}

/**
 * Filters for listing links. Every field is optional; absent fields (and
 * blank strings) produce no query parameter.
 */
export interface ListLinksFilters {
  /** Full path of a file or folder. Spaces are sent as `%20`. */
  path?: string | null;
  /** Only links created by this user. */
  userName?: string | null;
  createdBefore?: Date | null;
  createdAfter?: Date | null;
  linkType?: LinkType | null;
  accessibility?: LinkAccessibility | null;
  /** 0-based index of the first record. */
  offset?: number | null;
  /** Page size. Egnyte returns every entry when omitted. */
  count?: number | null;
}

export type RequestOptions = {
  signal?: AbortSignal;
};
