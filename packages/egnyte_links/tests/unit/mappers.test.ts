import { describe, expect, it } from "vitest";

import {
  accessibilityToWire,
  formatQueryDate,
  linkTypeToWire,
  mapLinkDetailsResponse,
  parseAccessibility,
  parseLinkType,
} from "@/lib/links/mappers";
import { LinkAccessibility, LinkType } from "@/lib/links/types";

describe("link type mapping", () => {
  it("writes file and folder", () => {
    expect(linkTypeToWire(LinkType.File)).toBe("file");
    expect(linkTypeToWire(LinkType.Folder)).toBe("folder");
  });

  it("only reads an exact \"file\" as File", () => {
    expect(parseLinkType("file")).toBe(LinkType.File);
    expect(parseLinkType("folder")).toBe(LinkType.Folder);
    expect(parseLinkType("File")).toBe(LinkType.Folder);
    expect(parseLinkType("anything-else")).toBe(LinkType.Folder);
    expect(parseLinkType(undefined)).toBe(LinkType.Folder);
    expect(parseLinkType(null)).toBe(LinkType.Folder);
  });
});

describe("accessibility mapping", () => {
  it("writes each accessibility value", () => {
    expect(accessibilityToWire(LinkAccessibility.Anyone)).toBe("anyone");
    expect(accessibilityToWire(LinkAccessibility.Password)).toBe("password");
    expect(accessibilityToWire(LinkAccessibility.Domain)).toBe("domain");
    expect(accessibilityToWire(LinkAccessibility.Recipients)).toBe("recipients");
  });

  it("reads known values and defaults the rest to Anyone", () => {
    expect(parseAccessibility("password")).toBe(LinkAccessibility.Password);
    expect(parseAccessibility("domain")).toBe(LinkAccessibility.Domain);
    expect(parseAccessibility("recipients")).toBe(LinkAccessibility.Recipients);
    expect(parseAccessibility("anyone")).toBe(LinkAccessibility.Anyone);
    expect(parseAccessibility("Password")).toBe(LinkAccessibility.Anyone);
    expect(parseAccessibility("everyone")).toBe(LinkAccessibility.Anyone);
    expect(parseAccessibility(undefined)).toBe(LinkAccessibility.Anyone);
  });
});

describe("formatQueryDate", () => {
  it("formats the local calendar date", () => {
    expect(formatQueryDate(new Date(2024, 11, 31, 23, 59, 59, 999))).toBe("2024-12-31");
    expect(formatQueryDate(new Date(2025, 0, 2))).toBe("2025-01-02");
  });
});

describe("mapLinkDetailsResponse", () => {
  it("returns a frozen model", () => {
    const details = mapLinkDetailsResponse({
      id: "abc123",
      path: "/Shared/Docs/plan.docx",
      url: "https://acme.egnyte.com/dl/abc123",
      link_type: "file",
      accessibility: "recipients",
      notify: false,
      protection: null,
      link_to_current: true,
      creation_date: "2024-07-04T12:00:00+02:00",
      created_by: "jdoe",
      recipients: ["alice@example.com"],
    });

    expect(details.accessibility).toBe(LinkAccessibility.Recipients);
    expect(details.protection).toBeNull();
    expect(details.creationDate.toISOString()).toBe("2024-07-04T10:00:00.000Z");
    expect(Object.isFrozen(details)).toBe(true);
    expect(Object.isFrozen(details.recipients)).toBe(true);
  });
});
