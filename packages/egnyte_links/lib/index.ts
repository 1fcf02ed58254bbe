export { createEgnyteClient } from "./client";
export type { EgnyteClient, EgnyteClientOptions } from "./client";
export {
  buildLinksBaseUrl,
  buildPublicApiBaseUrl,
  resolveAccessToken,
  resolveEgnyteDomain,
} from "./config";
export { EgnyteRequestError, InvalidArgumentError } from "./errors";
export { LinksClient } from "./links/client";
export type { LinksClientOptions } from "./links/client";
export {
  accessibilityToWire,
  formatQueryDate,
  linkTypeToWire,
  mapLinkDetailsResponse,
  parseAccessibility,
  parseLinkType,
} from "./links/mappers";
export {
  LinkAccessibility,
  LinkDetailsResponseSchema,
  LinksListSchema,
  LinkType,
} from "./links/types";
export type {
  LinkDetails,
  LinkDetailsResponse,
  LinksList,
  ListLinksFilters,
  RequestOptions,
} from "./links/types";
export { createFetchTransport } from "./transport";
export type {
  EgnyteRequest,
  FetchTransportOptions,
  HttpTransport,
  PayloadSchema,
} from "./transport";
