/**
 * Utility functions for domain operations
 */

import { InvalidParameterError } from './errors';

/**
 * Normalize domain to lowercase and trim, dropping a trailing root dot
 */
export function normalizeDomain(domain: string): string {
  return domain.toLowerCase().trim().replace(/\.$/, '');
}

/**
 * Split domain into SLD and TLD, the pair Namecheap expects instead of a full name
 *
 * The first label is the SLD and everything after it the TLD:
 * "example.com" → { sld: "example", tld: "com" }
 * "example.co.uk" → { sld: "example", tld: "co.uk" }
 *
 * With a TLD override the TLD is taken as given and must be a suffix of the domain.
 *
 * @throws InvalidParameterError if the domain has fewer than two labels or the override does not match
 */
export function splitDomain(domain: string, tldOverride?: string): { sld: string; tld: string } {
  const normalized = normalizeDomain(domain);
  const labels = normalized.split('.');

  if (labels.length < 2 || labels.some((label) => label.length === 0)) {
    throw new InvalidParameterError(`Invalid domain name: ${domain}`);
  }

  if (tldOverride !== undefined) {
    const tld = normalizeDomain(tldOverride).replace(/^\./, '');
    const suffix = `.${tld}`;

    if (!tld || !normalized.endsWith(suffix)) {
      throw new InvalidParameterError(`TLD '${tldOverride}' does not match domain ${domain}`);
    }

    const sld = normalized.slice(0, -suffix.length);
    if (!sld || sld.includes('.')) {
      throw new InvalidParameterError(`Domain ${domain} must have exactly one label before TLD '${tld}'`);
    }

    return { sld, tld };
  }

  const [sld, ...rest] = labels;
  return { sld, tld: rest.join('.') };
}
