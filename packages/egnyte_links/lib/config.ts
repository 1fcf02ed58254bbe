import { InvalidArgumentError } from "./errors";

const DOMAIN_PATTERN = /^[A-Za-z0-9][A-Za-z0-9-]*$/;

/**
 * Resolves the tenant subdomain (`acme` in `acme.egnyte.com`), falling back
 * to `EGNYTE_DOMAIN`.
 */
export function resolveEgnyteDomain(explicit?: string): string {
  const domain = (explicit ?? process.env.EGNYTE_DOMAIN ?? "").trim();

  if (!domain) {
    throw new InvalidArgumentError(
      "domain",
      "domain is required (pass it explicitly or set EGNYTE_DOMAIN)"
    );
  }

  if (!DOMAIN_PATTERN.test(domain)) {
    throw new InvalidArgumentError("domain", `Invalid Egnyte domain: ${domain}`);
  }

  return domain;
}

export function resolveAccessToken(explicit?: string): string | undefined {
  const token = explicit ?? process.env.EGNYTE_ACCESS_TOKEN;
  return token && token.trim() ? token.trim() : undefined;
}

export function buildPublicApiBaseUrl(domain: string): string {
  return `https://${domain}.egnyte.com/pubapi/v1`;
}

export function buildLinksBaseUrl(domain: string): string {
  return `${buildPublicApiBaseUrl(domain)}/links`;
}
