import { format, parseISO } from "date-fns";

import {
  LinkAccessibility,
  type LinkDetails,
  type LinkDetailsResponse,
  LinkType,
} from "./types";

const QUERY_DATE_FORMAT = "yyyy-MM-dd";

export function linkTypeToWire(linkType: LinkType): "file" | "folder" {
  return linkType === LinkType.File ? "file" : "folder";
}

export function parseLinkType(value: string | null | undefined): LinkType {
  return value === "file" ? LinkType.File : LinkType.Folder;
}

export function accessibilityToWire(accessibility: LinkAccessibility): string {
  switch (accessibility) {
    case LinkAccessibility.Domain:
      return "domain";
    case LinkAccessibility.Password:
      return "password";
    case LinkAccessibility.Recipients:
      return "recipients";
    default:
      return "anyone";
  }
}

export function parseAccessibility(
  value: string | null | undefined
): LinkAccessibility {
  switch (value) {
    case "domain":
      return LinkAccessibility.Domain;
    case "password":
      return LinkAccessibility.Password;
    case "recipients":
      return LinkAccessibility.Recipients;
    default:
      return LinkAccessibility.Anyone;
  }
}

/**
 * Formats a date as `yyyy-MM-dd` in local time; the time of day is dropped.
 */
export function formatQueryDate(date: Date): string {
  return format(date, QUERY_DATE_FORMAT);
}

export function mapLinkDetailsResponse(data: LinkDetailsResponse): LinkDetails {
  return Object.freeze({
    id: data.id,
    path: data.path,
    url: data.url,
    type: parseLinkType(data.link_type),
    accessibility: parseAccessibility(data.accessibility),
    notify: data.notify ?? false,
    protection: data.protection ?? null,
    linkToCurrent: data.link_to_current ?? false,
    creationDate: parseISO(data.creation_date),
    createdBy: data.created_by,
    recipients: Object.freeze([...(data.recipients ?? [])]),
  });
}
