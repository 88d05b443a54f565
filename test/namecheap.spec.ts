/**
 * Namecheap Client Tests
 *
 * Unit tests against an in-process transport returning canned XML
 */

import axios, { AxiosError, AxiosHeaders } from 'axios';
import {
  NamecheapClient,
  PRODUCTION_URL,
  SANDBOX_URL,
  encodeEmailForwards,
  encodeHostRecords,
} from '../src/providers/namecheap';
import { ProviderRejectedError, TransportFailureError } from '../src/lib/errors';
import { createRegistry } from '../src/app';
import { loadConfig } from '../src/config';
import {
  DNS_LIST_RESPONSE,
  SET_HOSTS_RESPONSE,
  createTestClient,
  errorResponse,
  fakeTransport,
  okResponse,
  sentParams,
} from './helpers/namecheap';

describe('NamecheapClient', () => {
  describe('requests', () => {
    it('should send every credential field and the command', async () => {
      const transport = fakeTransport(DNS_LIST_RESPONSE);
      const client = createTestClient(transport);

      await client.getDnsList('example.com');

      expect(transport.get).toHaveBeenCalledTimes(1);
      expect(transport.get.mock.calls[0][0]).toBe(SANDBOX_URL);
      expect(sentParams(transport)).toEqual({
        ApiUser: 'test_user',
        ApiKey: 'test-api-key',
        UserName: 'test_user',
        ClientIp: '127.0.0.1',
        Command: 'namecheap.domains.dns.getList',
        SLD: 'example',
        TLD: 'com',
      });
    });

    it('should target production when sandbox is off', async () => {
      const transport = fakeTransport(DNS_LIST_RESPONSE);
      const client = createTestClient(transport, false);

      await client.getDnsList('example.com');

      expect(client.baseUrl).toBe(PRODUCTION_URL);
      expect(transport.get.mock.calls[0][0]).toBe(PRODUCTION_URL);
    });

    it('should split multi-label TLDs at the first label', async () => {
      const transport = fakeTransport(
        okResponse(
          'namecheap.domains.dns.setDefault',
          '<DomainDNSSetDefaultResult Domain="example.co.uk" Updated="true" />'
        )
      );
      const client = createTestClient(transport);

      const result = await client.setDefaultDns('Example.co.uk');

      expect(result).toEqual({ domain: 'example.co.uk', success: true });
      expect(sentParams(transport).SLD).toBe('example');
      expect(sentParams(transport).TLD).toBe('co.uk');
    });

    it('should default to sandbox and to the username as API user', async () => {
      const transport = fakeTransport(DNS_LIST_RESPONSE);
      const client = new NamecheapClient({
        apiUser: '',
        apiKey: 'test-api-key',
        username: 'other_user',
        clientIp: '127.0.0.1',
        transport,
      });

      await client.getDnsList('example.com');

      expect(client.sandbox).toBe(true);
      expect(client.baseUrl).toBe(SANDBOX_URL);
      expect(sentParams(transport).ApiUser).toBe('other_user');
    });

    it('should require credentials', () => {
      expect(() => new NamecheapClient({
        apiUser: 'test_user',
        apiKey: '',
        username: 'test_user',
        clientIp: '127.0.0.1',
        transport: fakeTransport(),
      })).toThrow('Namecheap client requires apiKey, username, and clientIp');
    });
  });

  describe('getDnsList', () => {
    it('should preserve nameserver order', async () => {
      const client = createTestClient(fakeTransport(DNS_LIST_RESPONSE));

      const result = await client.getDnsList('example.com');

      expect(result).toEqual({
        domain: 'example.com',
        is_using_our_dns: false,
        nameservers: ['dns1.x.com', 'dns2.x.com'],
      });
    });

    it('should read a single nameserver as a list', async () => {
      const client = createTestClient(fakeTransport(okResponse(
        'namecheap.domains.dns.getList',
        `<DomainDNSGetListResult Domain="example.com" IsUsingOurDNS="true">
          <Nameserver>dns1.registrar-servers.com</Nameserver>
        </DomainDNSGetListResult>`
      )));

      const result = await client.getDnsList('example.com');

      expect(result.is_using_our_dns).toBe(true);
      expect(result.nameservers).toEqual(['dns1.registrar-servers.com']);
    });
  });

  describe('setCustomDns', () => {
    it('should send nameservers comma-joined in order', async () => {
      const transport = fakeTransport(okResponse(
        'namecheap.domains.dns.setCustom',
        '<DomainDNSSetCustomResult Domain="example.com" Updated="true" />'
      ));
      const client = createTestClient(transport);

      const result = await client.setCustomDns('example.com', ['ns2.host.net', 'ns1.host.net']);

      expect(result).toEqual({ domain: 'example.com', success: true });
      expect(sentParams(transport).Nameservers).toBe('ns2.host.net,ns1.host.net');
    });

    it('should refuse more than 12 nameservers without calling the API', async () => {
      const transport = fakeTransport();
      const client = createTestClient(transport);
      const nameservers = Array.from({ length: 13 }, (_, i) => `ns${i + 1}.host.net`);

      await expect(client.setCustomDns('example.com', nameservers)).rejects.toThrow(
        'Between 1 and 12 nameservers are required'
      );
      expect(transport.get).not.toHaveBeenCalled();
    });
  });

  describe('getHosts', () => {
    it('should parse host records in document order', async () => {
      const client = createTestClient(fakeTransport(okResponse(
        'namecheap.domains.dns.getHosts',
        `<DomainDNSGetHostsResult Domain="example.com" EmailType="MX" IsUsingOurDNS="true">
          <host HostId="12" Name="@" Type="A" Address="192.0.2.1" MXPref="10" TTL="1800" />
          <host HostId="14" Name="www" Type="CNAME" Address="example.com." MXPref="10" TTL="1800" />
          <host HostId="15" Name="@" Type="MX" Address="mail.example.com." MXPref="20" TTL="3600" />
        </DomainDNSGetHostsResult>`
      )));

      const result = await client.getHosts('example.com');

      expect(result.domain).toBe('example.com');
      expect(result.is_using_our_dns).toBe(true);
      expect(result.hosts).toEqual([
        { host_id: '12', host_name: '@', record_type: 'A', address: '192.0.2.1', ttl: 1800 },
        { host_id: '14', host_name: 'www', record_type: 'CNAME', address: 'example.com.', ttl: 1800 },
        { host_id: '15', host_name: '@', record_type: 'MX', address: 'mail.example.com.', mx_pref: 20, ttl: 3600 },
      ]);
    });

    it('should return records of every type the provider reports', async () => {
      const client = createTestClient(fakeTransport(okResponse(
        'namecheap.domains.dns.getHosts',
        `<DomainDNSGetHostsResult Domain="example.com" IsUsingOurDNS="true">
          <host HostId="21" Name="@" Type="A" Address="192.0.2.1" MXPref="10" TTL="1800" />
          <host HostId="22" Name="@" Type="CAA" Address="0 issue letsencrypt.org" MXPref="10" TTL="1800" />
          <host HostId="23" Name="sub" Type="NS" Address="ns1.other.net." MXPref="10" TTL="1800" />
          <host HostId="24" Name="_sip._tcp" Type="SRV" Address="sip.example.com." MXPref="10" TTL="1800" />
        </DomainDNSGetHostsResult>`
      )));

      const result = await client.getHosts('example.com');

      expect(result.hosts.map((host) => [host.host_id, host.record_type, host.address])).toEqual([
        ['21', 'A', '192.0.2.1'],
        ['22', 'CAA', '0 issue letsencrypt.org'],
        ['23', 'NS', 'ns1.other.net.'],
        ['24', 'SRV', 'sip.example.com.'],
      ]);
    });

    it('should return an empty list when the domain has no records', async () => {
      const client = createTestClient(fakeTransport(okResponse(
        'namecheap.domains.dns.getHosts',
        '<DomainDNSGetHostsResult Domain="example.com" IsUsingOurDNS="true" />'
      )));

      const result = await client.getHosts('example.com');

      expect(result.hosts).toEqual([]);
    });
  });

  describe('setHosts', () => {
    it('should send indexed parameters in caller order', async () => {
      const transport = fakeTransport(SET_HOSTS_RESPONSE);
      const client = createTestClient(transport);

      const result = await client.setHosts('example.com', [
        { host_name: '@', record_type: 'A', address: '192.0.2.1', ttl: 1800 },
        { host_name: 'www', record_type: 'CNAME', address: 'example.com.' },
        { host_name: '@', record_type: 'TXT', address: 'v=spf1 -all', ttl: 300 },
      ]);

      expect(result).toEqual({ domain: 'example.com', success: true });
      expect(sentParams(transport)).toMatchObject({
        Command: 'namecheap.domains.dns.setHosts',
        SLD: 'example',
        TLD: 'com',
        HostName1: '@',
        RecordType1: 'A',
        Address1: '192.0.2.1',
        TTL1: '1800',
        HostName2: 'www',
        RecordType2: 'CNAME',
        Address2: 'example.com.',
        HostName3: '@',
        RecordType3: 'TXT',
        Address3: 'v=spf1 -all',
        TTL3: '300',
      });
      expect(sentParams(transport)).not.toHaveProperty('TTL2');
      expect(sentParams(transport)).not.toHaveProperty('EmailType');
    });

    it('should report failure when the provider does not confirm', async () => {
      const client = createTestClient(fakeTransport(okResponse(
        'namecheap.domains.dns.setHosts',
        '<DomainDNSSetHostsResult Domain="example.com" IsSuccess="false" />'
      )));

      const result = await client.setHosts('example.com', [
        { host_name: '@', record_type: 'A', address: '192.0.2.1' },
      ]);

      expect(result.success).toBe(false);
    });
  });

  describe('encodeHostRecords', () => {
    it('should omit absent optional fields', () => {
      expect(encodeHostRecords([
        { host_name: 'api', record_type: 'AAAA', address: '2001:db8::1' },
      ])).toEqual({
        HostName1: 'api',
        RecordType1: 'AAAA',
        Address1: '2001:db8::1',
      });
    });

    it('should send MXPref and EmailType for MX records', () => {
      expect(encodeHostRecords([
        { host_name: '@', record_type: 'MX', address: 'mx1.mail.net.', mx_pref: 10, ttl: 3600 },
      ])).toEqual({
        HostName1: '@',
        RecordType1: 'MX',
        Address1: 'mx1.mail.net.',
        MXPref1: '10',
        TTL1: '3600',
        EmailType: 'MX',
      });
    });

    it('should prefer MXE email type when an MXE record is present', () => {
      const params = encodeHostRecords([
        { host_name: '@', record_type: 'MX', address: 'mx1.mail.net.', mx_pref: 10 },
        { host_name: 'mail', record_type: 'MXE', address: '192.0.2.25' },
      ]);

      expect(params.EmailType).toBe('MXE');
    });
  });

  describe('email forwarding', () => {
    it('should parse forwarding entries', async () => {
      const transport = fakeTransport(okResponse(
        'namecheap.domains.dns.getEmailForwarding',
        `<DomainDNSGetEmailForwardingResult Domain="example.com">
          <Forward mailbox="info">owner@mail.test</Forward>
          <Forward mailbox="sales">team@mail.test</Forward>
        </DomainDNSGetEmailForwardingResult>`
      ));
      const client = createTestClient(transport);

      const result = await client.getEmailForwarding('example.com');

      expect(sentParams(transport).DomainName).toBe('example.com');
      expect(sentParams(transport)).not.toHaveProperty('SLD');
      expect(result).toEqual({
        domain: 'example.com',
        forwards: [
          { mailbox: 'info', forward_to: 'owner@mail.test' },
          { mailbox: 'sales', forward_to: 'team@mail.test' },
        ],
      });
    });

    it('should send indexed mailbox parameters', async () => {
      const transport = fakeTransport(okResponse(
        'namecheap.domains.dns.setEmailForwarding',
        '<DomainDNSSetEmailForwardingResult Domain="example.com" IsSuccess="true" />'
      ));
      const client = createTestClient(transport);

      const result = await client.setEmailForwarding('example.com', [
        { mailbox: 'info', forward_to: 'owner@mail.test' },
        { mailbox: 'sales', forward_to: 'team@mail.test' },
      ]);

      expect(result).toEqual({ domain: 'example.com', success: true });
      expect(sentParams(transport)).toMatchObject({
        DomainName: 'example.com',
        MailBox1: 'info',
        ForwardTo1: 'owner@mail.test',
        MailBox2: 'sales',
        ForwardTo2: 'team@mail.test',
      });
    });

    it('should encode entries with 1-based indices', () => {
      expect(encodeEmailForwards([{ mailbox: 'a', forward_to: 'a@mail.test' }])).toEqual({
        MailBox1: 'a',
        ForwardTo1: 'a@mail.test',
      });
    });
  });

  describe('account domains', () => {
    it('should list domains with paging', async () => {
      const transport = fakeTransport(okResponse(
        'namecheap.domains.getList',
        `<DomainGetListResult>
          <Domain ID="127" Name="example.com" User="test_user" Created="02/15/2024" Expires="02/15/2026" IsExpired="false" IsLocked="false" AutoRenew="true" WhoisGuard="ENABLED" IsPremium="false" IsOurDNS="true" />
        </DomainGetListResult>
        <Paging>
          <TotalItems>1</TotalItems>
          <CurrentPage>1</CurrentPage>
          <PageSize>20</PageSize>
        </Paging>`
      ));
      const client = createTestClient(transport);

      const result = await client.getDomains();

      expect(sentParams(transport)).toMatchObject({ Page: '1', PageSize: '20' });
      expect(result).toEqual({
        domains: [{
          id: '127',
          name: 'example.com',
          user: 'test_user',
          created: '02/15/2024',
          expires: '02/15/2026',
          is_expired: false,
          is_locked: false,
          auto_renew: true,
          whois_guard: 'ENABLED',
          is_premium: false,
          is_our_dns: true,
        }],
        total_items: 1,
        current_page: 1,
        page_size: 20,
      });
    });

    it('should read domain info', async () => {
      const client = createTestClient(fakeTransport(okResponse(
        'namecheap.domains.getInfo',
        `<DomainGetInfoResult Status="Ok" ID="127" DomainName="example.com" OwnerName="test_user" IsOwner="true" IsPremium="false">
          <DomainDetails>
            <CreatedDate>02/15/2024</CreatedDate>
            <ExpiredDate>02/15/2026</ExpiredDate>
          </DomainDetails>
          <DnsDetails ProviderType="CUSTOM" IsUsingOurDNS="false">
            <Nameserver>ns1.host.net</Nameserver>
            <Nameserver>ns2.host.net</Nameserver>
          </DnsDetails>
        </DomainGetInfoResult>`
      )));

      const result = await client.getDomainInfo('example.com');

      expect(result).toEqual({
        domain: 'example.com',
        status: 'Ok',
        owner: 'test_user',
        created: '02/15/2024',
        expires: '02/15/2026',
        is_premium: false,
        dns_provider: 'CUSTOM',
        nameservers: ['ns1.host.net', 'ns2.host.net'],
      });
    });

    it('should check availability for several domains', async () => {
      const transport = fakeTransport(okResponse(
        'namecheap.domains.check',
        `<DomainCheckResult Domain="taken.com" Available="false" IsPremiumName="false" />
        <DomainCheckResult Domain="free.io" Available="true" IsPremiumName="true" />`
      ));
      const client = createTestClient(transport);

      const result = await client.checkAvailability(['taken.com', 'Free.io']);

      expect(sentParams(transport).DomainList).toBe('taken.com,free.io');
      expect(result).toEqual([
        { domain: 'taken.com', available: false, premium: false },
        { domain: 'free.io', available: true, premium: true },
      ]);
    });
  });

  describe('errors', () => {
    it('should raise ProviderRejected with the provider code and message', async () => {
      const client = createTestClient(fakeTransport(
        errorResponse('1011150', 'Parameter RequestIP is invalid')
      ));

      const error = await client.getHosts('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderRejectedError);
      expect(error).toMatchObject({
        name: 'ProviderRejected',
        code: '1011150',
        message: 'Parameter RequestIP is invalid',
        command: 'namecheap.domains.dns.getHosts',
        status: 502,
      });
    });

    it('should fall back to UNKNOWN when the error carries no number', async () => {
      const client = createTestClient(fakeTransport(`<?xml version="1.0" encoding="utf-8"?>
<ApiResponse Status="ERROR" xmlns="http://api.namecheap.com/xml.response">
  <Errors />
</ApiResponse>`));

      await expect(client.getHosts('example.com')).rejects.toMatchObject({
        name: 'ProviderRejected',
        code: 'UNKNOWN',
        message: 'Unknown Namecheap API error',
      });
    });

    it('should raise TransportFailure when the connection fails', async () => {
      const transport = fakeTransport();
      transport.get.mockRejectedValueOnce(new Error('connect ECONNREFUSED 192.0.2.10:443'));
      const client = createTestClient(transport);

      const error = await client.getDnsList('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).toMatchObject({
        name: 'TransportFailure',
        reason: 'network',
        status: 502,
        message: 'Could not reach Namecheap: connect ECONNREFUSED 192.0.2.10:443',
      });
    });

    it('should report timeouts separately', async () => {
      const transport = fakeTransport();
      transport.get.mockRejectedValueOnce(new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED'));
      const client = createTestClient(transport);

      await expect(client.getDnsList('example.com')).rejects.toMatchObject({
        name: 'TransportFailure',
        reason: 'timeout',
        status: 504,
      });
    });

    it('should report non-2xx responses as http_status failures', async () => {
      const config = { headers: new AxiosHeaders() };
      const transport = fakeTransport();
      transport.get.mockRejectedValueOnce(new AxiosError(
        'Request failed with status code 503',
        'ERR_BAD_RESPONSE',
        config,
        undefined,
        { data: 'Service Unavailable', status: 503, statusText: 'Service Unavailable', headers: {}, config }
      ));
      const client = createTestClient(transport);

      const error = await client.getDnsList('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).toMatchObject({
        reason: 'http_status',
        status: 502,
        message: 'Namecheap responded with HTTP 503',
        details: { command: 'namecheap.domains.dns.getList', reason: 'http_status', httpStatus: 503 },
      });
    });

    it('should raise TransportFailure for a body that is not XML', async () => {
      const client = createTestClient(fakeTransport('Service Unavailable <<'));

      await expect(client.getDnsList('example.com')).rejects.toMatchObject({
        name: 'TransportFailure',
        reason: 'malformed_response',
      });
    });

    it('should raise TransportFailure for XML that is not an API response', async () => {
      const client = createTestClient(fakeTransport('<html><body>Bad Gateway</body></html>'));

      await expect(client.getDnsList('example.com')).rejects.toMatchObject({
        name: 'TransportFailure',
        reason: 'malformed_response',
      });
    });

    it('should raise TransportFailure when the result element is missing', async () => {
      const client = createTestClient(fakeTransport(okResponse('namecheap.domains.dns.getList', '')));

      await expect(client.getDnsList('example.com')).rejects.toMatchObject({
        name: 'TransportFailure',
        reason: 'malformed_response',
        message: 'Namecheap response is missing DomainDNSGetListResult',
      });
    });

    it('should keep credentials out of error payloads', async () => {
      const client = createTestClient(fakeTransport(
        errorResponse('1011102', 'Parameter APIKey is invalid')
      ));

      const error = await client.getHosts('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderRejectedError);
      const serialized = JSON.stringify(error) + (error instanceof Error ? error.message : '');
      expect(serialized).not.toContain('test-api-key');
    });

    it('should reject an invalid domain before calling the API', async () => {
      const transport = fakeTransport();
      const client = createTestClient(transport);

      await expect(client.getHosts('localhost')).rejects.toThrow('Invalid domain name: localhost');
      expect(transport.get).not.toHaveBeenCalled();
    });
  });

  describe('axios transport', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should send the query with the configured timeout', async () => {
      const get = jest.spyOn(axios, 'get').mockResolvedValue({ data: DNS_LIST_RESPONSE });
      const client = new NamecheapClient({
        apiUser: 'test_user',
        apiKey: 'test-api-key',
        username: 'test_user',
        clientIp: '127.0.0.1',
        timeoutMs: 4500,
      });

      const result = await client.getDnsList('example.com');

      expect(result.nameservers).toEqual(['dns1.x.com', 'dns2.x.com']);
      expect(get).toHaveBeenCalledTimes(1);
      expect(get).toHaveBeenCalledWith(SANDBOX_URL, expect.objectContaining({
        timeout: 4500,
        responseType: 'text',
        params: expect.objectContaining({ Command: 'namecheap.domains.dns.getList', SLD: 'example', TLD: 'com' }),
      }));
    });

    it('should take the timeout from NAMECHEAP_TIMEOUT_MS', async () => {
      const get = jest.spyOn(axios, 'get').mockResolvedValue({ data: DNS_LIST_RESPONSE });
      const registry = createRegistry(loadConfig({
        NAMECHEAP_API_KEY: 'test-api-key',
        NAMECHEAP_USERNAME: 'test_user',
        NAMECHEAP_CLIENT_IP: '127.0.0.1',
        NAMECHEAP_TIMEOUT_MS: '7000',
      }));

      await registry.call('get_dns_list', { domain_name: 'example.com' });

      expect(get).toHaveBeenCalledWith(SANDBOX_URL, expect.objectContaining({ timeout: 7000 }));
    });
  });
});
