/**
 * Namecheap DNS Client
 *
 * Wraps the DNS and domain commands of Namecheap's XML API (Sandbox & Production)
 *
 * Sandbox Setup:
 * 1. Create sandbox account at https://www.sandbox.namecheap.com/
 * 2. Enable API access in account settings
 * 3. Whitelist your IP address
 * 4. Set environment variables:
 *    - NAMECHEAP_API_KEY (from sandbox settings)
 *    - NAMECHEAP_USERNAME (your username)
 *    - NAMECHEAP_API_USER (optional, defaults to NAMECHEAP_USERNAME)
 *    - NAMECHEAP_CLIENT_IP (your whitelisted IP)
 *    - NAMECHEAP_SANDBOX (optional, defaults to true)
 *
 * API Documentation: https://www.namecheap.com/support/api/intro/
 */

import axios from 'axios';
import pino from 'pino';
import { logger } from '../middleware/logging';
import { InvalidParameterError, ProviderRejectedError, TransportFailureError } from '../lib/errors';
import { normalizeDomain, splitDomain } from '../lib/utils';
import { incNamecheapCall } from '../metrics';
import { XmlNode, asNode, attr, child, childText, children, flag, parseXml, text } from './xml';
import {
  DnsServerList,
  DomainAvailability,
  DomainInfo,
  DomainList,
  EmailForwardingEntry,
  EmailForwardingList,
  HostList,
  HostRecord,
  HostRecordType,
  HOST_RECORD_TYPES,
  NamecheapCredentials,
  StoredHostRecord,
  UpdateResult,
} from './types';

export const PRODUCTION_URL = 'https://api.namecheap.com/xml.response';
export const SANDBOX_URL = 'https://api.sandbox.namecheap.com/xml.response';

export const MAX_NAMESERVERS = 12;

/**
 * Issues one GET against the API endpoint and resolves with the raw body
 */
export interface NamecheapTransport {
  get(url: string, params: Record<string, string>): Promise<string>;
}

/**
 * Default transport over axios
 */
export function createAxiosTransport(timeoutMs: number): NamecheapTransport {
  return {
    async get(url, params) {
      const response = await axios.get<string>(url, {
        params,
        timeout: timeoutMs,
        responseType: 'text',
        headers: {
          'User-Agent': 'namecheap-dns-functions/1.0',
        },
      });
      return typeof response.data === 'string' ? response.data : String(response.data);
    },
  };
}

export interface NamecheapClientOptions extends NamecheapCredentials {
  sandbox?: boolean;
  baseUrl?: string;
  timeoutMs?: number;
  transport?: NamecheapTransport;
  logger?: pino.Logger;
}

function isHostRecordType(value: string): value is HostRecordType {
  return HOST_RECORD_TYPES.some((type) => type === value);
}

function parseOptionalInt(value: string): number | undefined {
  if (value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function domainParams(domain: string, tld?: string): { SLD: string; TLD: string } {
  const parts = splitDomain(domain, tld);
  return { SLD: parts.sld, TLD: parts.tld };
}

/**
 * Commands that take the full name still require an SLD and a TLD in it
 */
function domainNameParam(domain: string): { DomainName: string } {
  const parts = splitDomain(domain);
  return { DomainName: `${parts.sld}.${parts.tld}` };
}

/**
 * Flatten host records into HostName1, RecordType1, Address1, ... in caller order.
 * Optional fields are left out rather than sent empty.
 */
export function encodeHostRecords(records: HostRecord[]): Record<string, string> {
  const params: Record<string, string> = {};

  records.forEach((record, index) => {
    const i = index + 1;
    params[`HostName${i}`] = record.host_name;
    params[`RecordType${i}`] = record.record_type;
    params[`Address${i}`] = record.address;

    if (record.mx_pref !== undefined) {
      params[`MXPref${i}`] = String(record.mx_pref);
    }
    if (record.ttl !== undefined) {
      params[`TTL${i}`] = String(record.ttl);
    }
  });

  // Mail records only take effect when the matching email type is set
  if (records.some((record) => record.record_type === 'MXE')) {
    params.EmailType = 'MXE';
  } else if (records.some((record) => record.record_type === 'MX')) {
    params.EmailType = 'MX';
  }

  return params;
}

/**
 * Flatten forwarding entries into MailBox1, ForwardTo1, ... in caller order
 */
export function encodeEmailForwards(entries: EmailForwardingEntry[]): Record<string, string> {
  const params: Record<string, string> = {};

  entries.forEach((entry, index) => {
    params[`MailBox${index + 1}`] = entry.mailbox;
    params[`ForwardTo${index + 1}`] = entry.forward_to;
  });

  return params;
}

/**
 * Namecheap Client Implementation
 */
export class NamecheapClient {
  private apiUser: string;
  private apiKey: string;
  private username: string;
  private clientIp: string;
  private transport: NamecheapTransport;
  private log: pino.Logger;

  readonly baseUrl: string;
  readonly sandbox: boolean;

  constructor(options: NamecheapClientOptions) {
    this.apiUser = options.apiUser || options.username;
    this.apiKey = options.apiKey;
    this.username = options.username;
    this.clientIp = options.clientIp;
    this.sandbox = options.sandbox ?? true;
    this.baseUrl = options.baseUrl || (this.sandbox ? SANDBOX_URL : PRODUCTION_URL);
    this.transport = options.transport || createAxiosTransport(options.timeoutMs ?? 30000);
    this.log = (options.logger || logger).child({ component: 'namecheap', sandbox: this.sandbox });

    // Validate required config
    if (!this.apiUser || !this.apiKey || !this.username || !this.clientIp) {
      throw new Error('Namecheap client requires apiKey, username, and clientIp');
    }
  }

  /**
   * Call Namecheap API and return the CommandResponse element
   */
  private async callNamecheap(command: string, params: Record<string, string> = {}): Promise<XmlNode> {
    const startTime = Date.now();

    const queryParams: Record<string, string> = {
      ...params,
      ApiUser: this.apiUser,
      ApiKey: this.apiKey,
      UserName: this.username,
      ClientIp: this.clientIp,
      Command: command,
    };

    let body: string;
    try {
      body = await this.transport.get(this.baseUrl, queryParams);
    } catch (error) {
      const failure = this.toTransportFailure(command, error);
      incNamecheapCall(command, 'transport_error');
      this.log.error({
        event: 'namecheap_call',
        command,
        outcome: failure.reason,
        latency: Date.now() - startTime,
        error: failure.message,
      });
      throw failure;
    }

    const latency = Date.now() - startTime;

    // Parse XML response
    let apiResponse: XmlNode | undefined;
    try {
      apiResponse = child(parseXml(body), 'ApiResponse');
    } catch (error) {
      apiResponse = undefined;
      this.log.debug({ event: 'namecheap_parse_error', command, error: error instanceof Error ? error.message : String(error) });
    }

    if (!apiResponse || attr(apiResponse, 'Status') === '') {
      incNamecheapCall(command, 'transport_error');
      this.log.error({ event: 'namecheap_call', command, outcome: 'malformed_response', latency });
      throw new TransportFailureError(
        command,
        'malformed_response',
        'Namecheap returned a response that is not a valid API response',
        { bodyLength: body.length }
      );
    }

    // Check for API errors
    if (attr(apiResponse, 'Status').toUpperCase() !== 'OK') {
      const [firstError] = children(child(apiResponse, 'Errors'), 'Error');
      const code = attr(asNode(firstError), 'Number') || 'UNKNOWN';
      const message = text(firstError) || 'Unknown Namecheap API error';

      incNamecheapCall(command, 'rejected');
      this.log.warn({ event: 'namecheap_call', command, outcome: 'rejected', code, latency });
      throw new ProviderRejectedError(command, code, message);
    }

    incNamecheapCall(command, 'success');
    this.log.info({ event: 'namecheap_call', command, outcome: 'success', latency });

    return child(apiResponse, 'CommandResponse') || {};
  }

  private toTransportFailure(command: string, error: unknown): TransportFailureError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TransportFailureError(command, 'timeout', `Namecheap request timed out: ${error.message}`);
      }
      if (error.response) {
        return new TransportFailureError(
          command,
          'http_status',
          `Namecheap responded with HTTP ${error.response.status}`,
          { httpStatus: error.response.status }
        );
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransportFailureError(command, 'network', `Could not reach Namecheap: ${message}`);
  }

  /**
   * Find the named result element or fail as a malformed response
   */
  private requireResult(command: string, response: XmlNode, name: string): XmlNode {
    const result = child(response, name);
    if (!result) {
      throw new TransportFailureError(command, 'malformed_response', `Namecheap response is missing ${name}`);
    }
    return result;
  }

  /**
   * Switch a domain to Namecheap's default nameservers
   */
  async setDefaultDns(domain: string, tld?: string): Promise<UpdateResult> {
    const command = 'namecheap.domains.dns.setDefault';
    const response = await this.callNamecheap(command, domainParams(domain, tld));
    const result = this.requireResult(command, response, 'DomainDNSSetDefaultResult');

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      success: flag(result, 'Updated'),
    };
  }

  /**
   * Point a domain at custom nameservers, in the given order
   */
  async setCustomDns(domain: string, nameservers: string[], tld?: string): Promise<UpdateResult> {
    if (nameservers.length === 0 || nameservers.length > MAX_NAMESERVERS) {
      throw new InvalidParameterError(`Between 1 and ${MAX_NAMESERVERS} nameservers are required`);
    }

    const command = 'namecheap.domains.dns.setCustom';
    const response = await this.callNamecheap(command, {
      ...domainParams(domain, tld),
      Nameservers: nameservers.join(','),
    });
    const result = this.requireResult(command, response, 'DomainDNSSetCustomResult');

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      success: flag(result, 'Updated'),
    };
  }

  /**
   * Get the nameservers a domain is using
   */
  async getDnsList(domain: string, tld?: string): Promise<DnsServerList> {
    const command = 'namecheap.domains.dns.getList';
    const response = await this.callNamecheap(command, domainParams(domain, tld));
    const result = this.requireResult(command, response, 'DomainDNSGetListResult');

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      is_using_our_dns: flag(result, 'IsUsingOurDNS'),
      nameservers: children(result, 'Nameserver').map(text).filter((ns) => ns.length > 0),
    };
  }

  /**
   * Get the host records of a domain
   */
  async getHosts(domain: string, tld?: string): Promise<HostList> {
    const command = 'namecheap.domains.dns.getHosts';
    const response = await this.callNamecheap(command, domainParams(domain, tld));
    const result = this.requireResult(command, response, 'DomainDNSGetHostsResult');

    const hosts: StoredHostRecord[] = [];
    for (const value of children(result, 'host')) {
      const host = asNode(value);
      const type = attr(host, 'Type').toUpperCase();

      // Kept as reported; set_hosts rejects a list carrying it rather than dropping it
      if (!isHostRecordType(type)) {
        this.log.warn({ event: 'unwritable_record_type', command, type });
      }

      const record: StoredHostRecord = {
        host_id: attr(host, 'HostId'),
        host_name: attr(host, 'Name'),
        record_type: type,
        address: attr(host, 'Address'),
      };

      const mxPref = parseOptionalInt(attr(host, 'MXPref'));
      if (mxPref !== undefined && (type === 'MX' || type === 'MXE')) {
        record.mx_pref = mxPref;
      }

      const ttl = parseOptionalInt(attr(host, 'TTL'));
      if (ttl !== undefined) {
        record.ttl = ttl;
      }

      hosts.push(record);
    }

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      is_using_our_dns: flag(result, 'IsUsingOurDNS'),
      hosts,
    };
  }

  /**
   * Replace every host record of a domain with the given set
   */
  async setHosts(domain: string, records: HostRecord[], tld?: string): Promise<UpdateResult> {
    const command = 'namecheap.domains.dns.setHosts';
    const response = await this.callNamecheap(command, {
      ...domainParams(domain, tld),
      ...encodeHostRecords(records),
    });
    const result = this.requireResult(command, response, 'DomainDNSSetHostsResult');

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      success: flag(result, 'IsSuccess'),
    };
  }

  /**
   * Get email forwarding settings of a domain
   */
  async getEmailForwarding(domain: string): Promise<EmailForwardingList> {
    const command = 'namecheap.domains.dns.getEmailForwarding';
    const response = await this.callNamecheap(command, domainNameParam(domain));
    const result = this.requireResult(command, response, 'DomainDNSGetEmailForwardingResult');

    const forwards = children(result, 'Forward').map((value) => ({
      mailbox: attr(asNode(value), 'mailbox'),
      forward_to: text(value),
    }));

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      forwards,
    };
  }

  /**
   * Replace the email forwarding entries of a domain
   */
  async setEmailForwarding(domain: string, entries: EmailForwardingEntry[]): Promise<UpdateResult> {
    const command = 'namecheap.domains.dns.setEmailForwarding';
    const response = await this.callNamecheap(command, {
      ...domainNameParam(domain),
      ...encodeEmailForwards(entries),
    });
    const result = this.requireResult(command, response, 'DomainDNSSetEmailForwardingResult');

    return {
      domain: attr(result, 'Domain') || normalizeDomain(domain),
      success: flag(result, 'IsSuccess'),
    };
  }

  /**
   * List domains in the account
   */
  async getDomains(page = 1, pageSize = 20): Promise<DomainList> {
    const command = 'namecheap.domains.getList';
    const response = await this.callNamecheap(command, {
      Page: String(page),
      PageSize: String(pageSize),
    });
    const result = this.requireResult(command, response, 'DomainGetListResult');
    const paging = child(response, 'Paging');

    const domains = children(result, 'Domain').map((value) => {
      const domain = asNode(value);
      return {
        id: attr(domain, 'ID'),
        name: attr(domain, 'Name'),
        user: attr(domain, 'User'),
        created: attr(domain, 'Created'),
        expires: attr(domain, 'Expires'),
        is_expired: flag(domain, 'IsExpired'),
        is_locked: flag(domain, 'IsLocked'),
        auto_renew: flag(domain, 'AutoRenew'),
        whois_guard: attr(domain, 'WhoisGuard'),
        is_premium: flag(domain, 'IsPremium'),
        is_our_dns: flag(domain, 'IsOurDNS'),
      };
    });

    return {
      domains,
      total_items: parseOptionalInt(childText(paging, 'TotalItems')) ?? domains.length,
      current_page: parseOptionalInt(childText(paging, 'CurrentPage')) ?? page,
      page_size: parseOptionalInt(childText(paging, 'PageSize')) ?? pageSize,
    };
  }

  /**
   * Get registration and DNS details of a domain
   */
  async getDomainInfo(domain: string): Promise<DomainInfo> {
    const command = 'namecheap.domains.getInfo';
    const response = await this.callNamecheap(command, domainNameParam(domain));
    const result = this.requireResult(command, response, 'DomainGetInfoResult');
    const details = child(result, 'DomainDetails');
    const dns = child(result, 'DnsDetails');

    return {
      domain: attr(result, 'DomainName') || normalizeDomain(domain),
      status: attr(result, 'Status'),
      owner: attr(result, 'OwnerName'),
      created: childText(details, 'CreatedDate'),
      expires: childText(details, 'ExpiredDate'),
      is_premium: flag(result, 'IsPremium'),
      dns_provider: attr(dns, 'ProviderType'),
      nameservers: children(dns, 'Nameserver').map(text).filter((ns) => ns.length > 0),
    };
  }

  /**
   * Check registration availability for one or more domains
   */
  async checkAvailability(domains: string[]): Promise<DomainAvailability[]> {
    if (domains.length === 0) {
      return [];
    }

    const command = 'namecheap.domains.check';
    const response = await this.callNamecheap(command, {
      DomainList: domains.map(normalizeDomain).join(','),
    });

    return children(response, 'DomainCheckResult').map((value) => {
      const result = asNode(value);
      return {
        domain: attr(result, 'Domain'),
        available: flag(result, 'Available'),
        premium: flag(result, 'IsPremiumName'),
      };
    });
  }
}
