import { resolveAccessToken, resolveEgnyteDomain } from "./config";
import { LinksClient } from "./links/client";
import { createFetchTransport, type HttpTransport } from "./transport";

export type EgnyteClientOptions = {
  /** Tenant subdomain; defaults to EGNYTE_DOMAIN. */
  domain?: string;
  /** OAuth access token; defaults to EGNYTE_ACCESS_TOKEN. */
  accessToken?: string;
  fetch?: typeof fetch;
  /** Replaces the fetch transport entirely. */
  transport?: HttpTransport;
};

export type EgnyteClient = {
  domain: string;
  links: LinksClient;
};

export function createEgnyteClient(options: EgnyteClientOptions = {}): EgnyteClient {
  const domain = resolveEgnyteDomain(options.domain);
  const transport =
    options.transport ??
    createFetchTransport({
      accessToken: resolveAccessToken(options.accessToken),
      fetch: options.fetch,
    });

  return {
    domain,
    links: new LinksClient({ domain, transport }),
  };
}
