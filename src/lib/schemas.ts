import { z } from 'zod';
import { HOST_RECORD_TYPES } from '../providers/types';
import { MAX_NAMESERVERS } from '../providers/namecheap';

/**
 * Hostname regex validation: two or more LDH labels, no leading or trailing hyphen
 */
const HOSTNAME_REGEX = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)+$/;

/**
 * Domain validation (lower-cased before matching)
 */
export const domainSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(3, 'Domain must be at least 3 characters')
  .max(253, 'Domain must not exceed 253 characters')
  .regex(HOSTNAME_REGEX, 'Invalid domain format');

/**
 * Explicit TLD for names whose split cannot be inferred, e.g. "co.uk"
 */
export const tldSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^\.?[a-z0-9-]{2,63}(\.[a-z0-9-]{2,63})*$/, 'Invalid TLD format');

/**
 * Integers may arrive as JSON numbers or digit strings; empty values count as absent
 */
function optionalInteger(min: number, max: number) {
  return z.preprocess(
    (value) => (value === '' || value === null ? undefined : value),
    z
      .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected an integer')])
      .pipe(z.coerce.number().int().min(min).max(max))
      .optional()
  );
}

/**
 * DNS host record
 */
export const hostRecordSchema = z.object({
  host_name: z.string().trim().min(1, 'host_name must not be empty').max(253),
  record_type: z.string().trim().toUpperCase().pipe(z.enum(HOST_RECORD_TYPES)),
  address: z.string().trim().min(1, 'address must not be empty').max(2048),
  mx_pref: optionalInteger(0, 65535),
  ttl: optionalInteger(60, 60000),
});

/**
 * Email forwarding entry
 */
export const emailForwardSchema = z.object({
  mailbox: z
    .string()
    .trim()
    .min(1, 'mailbox must not be empty')
    .max(64)
    .regex(/^[^@\s]+$/, 'mailbox is the part before @ and must not contain @ or spaces'),
  forward_to: z.string().trim().email('forward_to must be an email address'),
});

export const nameserversSchema = z
  .array(domainSchema)
  .min(1, 'At least one nameserver is required')
  .max(MAX_NAMESERVERS, `Maximum ${MAX_NAMESERVERS} nameservers allowed`);

/**
 * Domain list given either as an array or a comma-separated string
 */
export const domainListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === 'string' ? value.split(',') : value))
  .pipe(z.array(domainSchema).min(1, 'At least one domain is required').max(50, 'Maximum 50 domains per check'));

export const DomainParamsSchema = z.object({
  domain_name: domainSchema,
  tld: tldSchema.optional(),
});

export const SetCustomDnsParamsSchema = DomainParamsSchema.extend({
  nameservers: nameserversSchema,
});

export const SetHostsParamsSchema = DomainParamsSchema.extend({
  hosts: z.array(hostRecordSchema).min(1, 'At least one host record is required'),
});

export const DomainNameParamsSchema = z.object({
  domain_name: domainSchema,
});

export const SetEmailForwardingParamsSchema = DomainNameParamsSchema.extend({
  forwards: z.array(emailForwardSchema).min(1, 'At least one forwarding entry is required'),
});

export const GetDomainsParamsSchema = z.object({
  page: optionalInteger(1, 100000),
  page_size: optionalInteger(10, 100),
});

export const CheckAvailabilityParamsSchema = z.object({
  domains: domainListSchema,
});

/**
 * Body of POST /call
 */
export const CallSchema = z.object({
  name: z.string().trim().min(1, 'Function name is required'),
  params: z.record(z.unknown()).optional().default({}),
});
