/**
 * Record types Namecheap accepts in setHosts
 */
export const HOST_RECORD_TYPES = [
  'A',
  'AAAA',
  'ALIAS',
  'CAA',
  'CNAME',
  'MX',
  'MXE',
  'NS',
  'TXT',
  'URL',
  'URL301',
  'FRAME',
] as const;

export type HostRecordType = typeof HOST_RECORD_TYPES[number];

/**
 * DNS host record as sent to setHosts
 */
export interface HostRecord {
  host_name: string; // Subdomain or "@" for root
  record_type: HostRecordType;
  address: string; // IP address, hostname, URL or text content
  mx_pref?: number; // Only meaningful for MX records
  ttl?: number; // Seconds; provider default when omitted
}

/**
 * Host record as returned by getHosts.
 * The type is reported verbatim, including types this service cannot write back.
 */
export interface StoredHostRecord extends Omit<HostRecord, 'record_type'> {
  host_id: string;
  record_type: string;
}

/**
 * Email forwarding entry: mailbox@domain → forward_to
 */
export interface EmailForwardingEntry {
  mailbox: string; // Local part, before the @
  forward_to: string;
}

/**
 * Result of commands that only report success
 */
export interface UpdateResult {
  domain: string;
  success: boolean;
}

/**
 * Nameservers in the order the provider reports them
 */
export interface DnsServerList {
  domain: string;
  is_using_our_dns: boolean;
  nameservers: string[];
}

export interface HostList {
  domain: string;
  is_using_our_dns: boolean;
  hosts: StoredHostRecord[];
}

export interface EmailForwardingList {
  domain: string;
  forwards: EmailForwardingEntry[];
}

/**
 * Domain entry from the account's domain list
 */
export interface DomainSummary {
  id: string;
  name: string;
  user: string;
  created: string;
  expires: string;
  is_expired: boolean;
  is_locked: boolean;
  auto_renew: boolean;
  whois_guard: string;
  is_premium: boolean;
  is_our_dns: boolean;
}

export interface DomainList {
  domains: DomainSummary[];
  total_items: number;
  current_page: number;
  page_size: number;
}

export interface DomainInfo {
  domain: string;
  status: string;
  owner: string;
  created: string;
  expires: string;
  is_premium: boolean;
  dns_provider: string;
  nameservers: string[];
}

export interface DomainAvailability {
  domain: string;
  available: boolean;
  premium: boolean;
}

/**
 * Credentials sent with every Namecheap command
 */
export interface NamecheapCredentials {
  apiUser: string;
  apiKey: string;
  username: string;
  clientIp: string;
}
