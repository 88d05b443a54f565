import { defineFunction, ParameterDescriptor, RegisteredFunction } from './registry';
import {
  CheckAvailabilityParamsSchema,
  DomainNameParamsSchema,
  DomainParamsSchema,
  GetDomainsParamsSchema,
  SetCustomDnsParamsSchema,
  SetEmailForwardingParamsSchema,
  SetHostsParamsSchema,
} from '../lib/schemas';

const domainName: ParameterDescriptor = {
  name: 'domain_name',
  type: 'string',
  required: true,
  description: 'Domain name, e.g. example.com',
};

const tld: ParameterDescriptor = {
  name: 'tld',
  type: 'string',
  required: false,
  description: 'TLD override when the domain is not split at its first label',
};

/**
 * Functions exposed to agents, in discovery order
 */
export const namecheapFunctions: RegisteredFunction[] = [
  defineFunction({
    name: 'set_default_dns',
    title: 'Set Default DNS',
    description: "Sets domain to use Namecheap's default DNS servers",
    parameters: [domainName, tld],
    annotations: { destructiveHint: true, idempotentHint: true, openWorldHint: true },
    schema: DomainParamsSchema,
    invoke: (client, params) => client.setDefaultDns(params.domain_name, params.tld),
  }),

  defineFunction({
    name: 'set_custom_dns',
    title: 'Set Custom DNS',
    description: 'Sets domain to use custom DNS servers, in the given order',
    parameters: [
      domainName,
      {
        name: 'nameservers',
        type: 'string[]',
        required: true,
        description: 'Nameserver host names, primary first (1-12)',
      },
      tld,
    ],
    annotations: { destructiveHint: true, idempotentHint: true, openWorldHint: true },
    schema: SetCustomDnsParamsSchema,
    invoke: (client, params) => client.setCustomDns(params.domain_name, params.nameservers, params.tld),
  }),

  defineFunction({
    name: 'get_dns_list',
    title: 'Get DNS List',
    description: 'Gets a list of DNS servers associated with the specified domain',
    parameters: [domainName, tld],
    annotations: { readOnlyHint: true, openWorldHint: true },
    schema: DomainParamsSchema,
    invoke: (client, params) => client.getDnsList(params.domain_name, params.tld),
  }),

  defineFunction({
    name: 'get_hosts',
    title: 'Get Hosts',
    description: 'Retrieves DNS host record settings for the specified domain',
    parameters: [domainName, tld],
    annotations: { readOnlyHint: true, openWorldHint: true },
    schema: DomainParamsSchema,
    invoke: (client, params) => client.getHosts(params.domain_name, params.tld),
  }),

  defineFunction({
    name: 'set_hosts',
    title: 'Set DNS Host Records',
    description:
      'Replaces all DNS host records of the specified domain. Records not included are deleted; ' +
      'call get_hosts first and send the merged list to keep existing records.',
    parameters: [
      domainName,
      {
        name: 'hosts',
        type: 'host_record[]',
        required: true,
        description:
          'Host records: { host_name, record_type (A, AAAA, ALIAS, CAA, CNAME, MX, MXE, NS, TXT, URL, URL301, FRAME), address, mx_pref?, ttl? }',
      },
      tld,
    ],
    annotations: { destructiveHint: true, idempotentHint: true, openWorldHint: true },
    schema: SetHostsParamsSchema,
    invoke: (client, params) => client.setHosts(params.domain_name, params.hosts, params.tld),
  }),

  defineFunction({
    name: 'get_email_forwarding',
    title: 'Get Email Forwarding',
    description: 'Gets email forwarding settings for the specified domain',
    parameters: [domainName],
    annotations: { readOnlyHint: true, openWorldHint: true },
    schema: DomainNameParamsSchema,
    invoke: (client, params) => client.getEmailForwarding(params.domain_name),
  }),

  defineFunction({
    name: 'set_email_forwarding',
    title: 'Set Email Forwarding',
    description: 'Replaces all email forwarding entries of the specified domain',
    parameters: [
      domainName,
      {
        name: 'forwards',
        type: 'email_forward[]',
        required: true,
        description: 'Forwarding entries: { mailbox (part before @), forward_to }',
      },
    ],
    annotations: { destructiveHint: true, idempotentHint: true, openWorldHint: true },
    schema: SetEmailForwardingParamsSchema,
    invoke: (client, params) => client.setEmailForwarding(params.domain_name, params.forwards),
  }),

  defineFunction({
    name: 'get_domains',
    title: 'Get Domains',
    description: "Gets a page of domains in the user's account",
    parameters: [
      { name: 'page', type: 'integer', required: false, description: 'Page number, starting at 1' },
      { name: 'page_size', type: 'integer', required: false, description: 'Domains per page (10-100)' },
    ],
    annotations: { readOnlyHint: true, openWorldHint: true },
    schema: GetDomainsParamsSchema,
    invoke: (client, params) => client.getDomains(params.page, params.page_size),
  }),

  defineFunction({
    name: 'get_domain_info',
    title: 'Get Domain',
    description: "Gets registration and DNS details for a domain in the user's account",
    parameters: [domainName],
    annotations: { readOnlyHint: true, openWorldHint: true },
    schema: DomainNameParamsSchema,
    invoke: (client, params) => client.getDomainInfo(params.domain_name),
  }),

  defineFunction({
    name: 'check_domains_availability',
    title: 'Check domains for availability',
    description: 'Checks the availability of one or multiple domain names',
    parameters: [
      {
        name: 'domains',
        type: 'string[]',
        required: true,
        description: 'Domain names to check; a comma-separated string is also accepted',
      },
    ],
    annotations: { readOnlyHint: true, openWorldHint: true },
    schema: CheckAvailabilityParamsSchema,
    invoke: async (client, params) => ({ domains: await client.checkAvailability(params.domains) }),
  }),
];
