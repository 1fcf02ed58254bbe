/**
 * Links API client
 * Lists shareable links and reads the details of a single link.
 */

import { buildLinksBaseUrl } from "../config";
import { InvalidArgumentError } from "../errors";
import type { HttpTransport } from "../transport";
import {
  accessibilityToWire,
  formatQueryDate,
  linkTypeToWire,
  mapLinkDetailsResponse,
} from "./mappers";
import {
  type LinkDetails,
  LinkDetailsResponseSchema,
  type LinksList,
  LinksListSchema,
  type ListLinksFilters,
  type RequestOptions,
} from "./types";

export type LinksClientOptions = {
  domain: string;
  transport: HttpTransport;
};

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim() !== "";
}

export class LinksClient {
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;

  constructor({ domain, transport }: LinksClientOptions) {
    this.baseUrl = buildLinksBaseUrl(domain);
    this.transport = transport;
  }

  buildListLinksUrl(filters: ListLinksFilters = {}): string {
    const query = new URLSearchParams();
    if (hasText(filters.path)) query.append("path", filters.path);
    if (hasText(filters.userName)) query.append("username", filters.userName);
    if (filters.createdBefore != null) {
      query.append("created_before", formatQueryDate(filters.createdBefore));
    }
    if (filters.createdAfter != null) {
      query.append("created_after", formatQueryDate(filters.createdAfter));
    }
    if (filters.linkType != null) {
      query.append("type", linkTypeToWire(filters.linkType));
    }
    if (filters.accessibility != null) {
      query.append("accessibility", accessibilityToWire(filters.accessibility));
    }
    if (filters.offset != null) query.append("offset", String(filters.offset));
    if (filters.count != null) query.append("count", String(filters.count));

    // URLSearchParams writes spaces as "+"; a literal "+" is already "%2B"
    const search = query.toString().replace(/\+/g, "%20");
    const suffix = search ? `?${search}` : "";
    return `${this.baseUrl}${suffix}`;
  }

  buildLinkDetailsUrl(linkId: string): string {
    return `${this.baseUrl}/${encodeURIComponent(linkId)}`;
  }

  /**
   * Lists links. For non-admin users Egnyte only returns links the user
   * created. Paging is left to the caller through `offset` and `count`.
   */
  async listLinks(
    filters: ListLinksFilters = {},
    { signal }: RequestOptions = {}
  ): Promise<LinksList> {
    return this.transport.send(
      { method: "GET", url: this.buildListLinksUrl(filters), signal },
      LinksListSchema
    );
  }

  /**
   * Reads one link. Throws `InvalidArgumentError` before sending anything
   * when `linkId` is missing or blank.
   */
  getLinkDetails(
    linkId: string | null | undefined,
    options: RequestOptions = {}
  ): Promise<LinkDetails> {
    if (!hasText(linkId)) {
      throw new InvalidArgumentError("linkId");
    }

    return this.fetchLinkDetails(linkId, options);
  }

  private async fetchLinkDetails(
    linkId: string,
    { signal }: RequestOptions
  ): Promise<LinkDetails> {
    const data = await this.transport.send(
      { method: "GET", url: this.buildLinkDetailsUrl(linkId), signal },
      LinkDetailsResponseSchema
    );
    return mapLinkDetailsResponse(data);
  }
}
