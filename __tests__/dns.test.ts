const mockResolve4 = jest.fn();
const mockResolve6 = jest.fn();
const mockSetServers = jest.fn();

jest.mock('dns/promises', () => ({
  Resolver: jest.fn().mockImplementation(() => ({
    resolve4: (host: string) => mockResolve4(host),
    resolve6: (host: string) => mockResolve6(host),
    setServers: (servers: string[]) => mockSetServers(servers),
  })),
}));

import { Resolver } from 'dns/promises';
import { addressSetKey, createResolver, sameAddressSet, toAddressSet } from '../lib/dns';

function dnsError(code: string): Error {
  return Object.assign(new Error(`query ${code}`), { code });
}

describe('createResolver', () => {
  beforeEach(() => {
    mockResolve4.mockReset();
    mockResolve6.mockReset();
    mockSetServers.mockReset();
    jest.mocked(Resolver).mockClear();
  });

  test('merges A and AAAA answers into one sorted set', async () => {
    mockResolve4.mockResolvedValue(['192.0.2.2', '192.0.2.1', '192.0.2.2']);
    mockResolve6.mockResolvedValue(['2001:db8::1']);
    const resolve = createResolver({ timeoutMs: 500 });
    expect(await resolve('a.example.com')).toEqual(['192.0.2.1', '192.0.2.2', '2001:db8::1']);
    expect(mockResolve4).toHaveBeenCalledWith('a.example.com');
    expect(Resolver).toHaveBeenCalledWith({ timeout: 500, tries: 1 });
  });

  test('one failing family still yields the other', async () => {
    mockResolve4.mockResolvedValue(['192.0.2.1']);
    mockResolve6.mockRejectedValue(dnsError('ENODATA'));
    expect(await createResolver()('a.example.com')).toEqual(['192.0.2.1']);
  });

  test('NXDOMAIN is an empty set', async () => {
    mockResolve4.mockRejectedValue(dnsError('ENOTFOUND'));
    mockResolve6.mockRejectedValue(dnsError('ENOTFOUND'));
    expect(await createResolver()('gone.example.com')).toEqual([]);
  });

  test('a lookup that never answers times out to an empty set', async () => {
    mockResolve4.mockReturnValue(new Promise(() => undefined));
    mockResolve6.mockResolvedValue([]);
    expect(await createResolver({ timeoutMs: 20 })('slow.example.com')).toEqual([]);
  });

  test('custom nameservers are applied', () => {
    createResolver({ servers: ['192.0.2.53'] });
    expect(mockSetServers).toHaveBeenCalledWith(['192.0.2.53']);
  });

  test('system nameservers are kept when none are given', () => {
    createResolver({ servers: [] });
    expect(mockSetServers).not.toHaveBeenCalled();
  });
});

describe('address sets', () => {
  test('toAddressSet sorts and drops duplicates', () => {
    expect(toAddressSet(['10.0.0.2', '10.0.0.1', '10.0.0.2'])).toEqual(['10.0.0.1', '10.0.0.2']);
  });

  test('order does not affect identity', () => {
    expect(addressSetKey(['10.0.0.2', '10.0.0.1'])).toBe('10.0.0.1,10.0.0.2');
    expect(sameAddressSet(['10.0.0.2', '10.0.0.1'], ['10.0.0.1', '10.0.0.2'])).toBe(true);
    expect(sameAddressSet(['10.0.0.1'], ['10.0.0.1', '10.0.0.2'])).toBe(false);
  });
});
