import { describe, it, expect } from 'vitest';
import {
  blockRange,
  cidrsOverlap,
  formatSubnet,
  hostRange,
  ipToNumber,
  normalizeCidr,
  numberToIp,
  parseCidr,
  parseSubnet,
  reservedAddresses,
} from './cidr.js';
import { isPeerError } from './errors.js';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isPeerError(error) ? error.code : 'not-a-peer-error';
  }
  return undefined;
}

describe('ipToNumber / numberToIp', () => {
  it('converts dotted quads to unsigned integers and back', () => {
    expect(ipToNumber('10.13.13.1')).toBe(168627457);
    expect(numberToIp(168627457)).toBe('10.13.13.1');
    expect(ipToNumber('255.255.255.255')).toBe(4294967295);
    expect(numberToIp(4294967295)).toBe('255.255.255.255');
  });

  it('rejects malformed addresses', () => {
    expect(errorCode(() => ipToNumber('256.0.0.1'))).toBe('InvalidRequest');
    expect(errorCode(() => ipToNumber('10.0.0'))).toBe('InvalidRequest');
    expect(errorCode(() => ipToNumber('fd00::1'))).toBe('InvalidRequest');
  });
});

describe('parseCidr', () => {
  it('treats a bare address as /32', () => {
    expect(parseCidr('10.13.13.5')).toEqual({ network: ipToNumber('10.13.13.5'), prefix: 32 });
    expect(normalizeCidr('10.13.13.5')).toBe('10.13.13.5/32');
    expect(normalizeCidr(' 10.13.13.8/29 ')).toBe('10.13.13.8/29');
  });

  it('rejects host bits and bad prefixes', () => {
    expect(errorCode(() => parseCidr('10.13.13.5/24'))).toBe('InvalidRequest');
    expect(errorCode(() => parseCidr('10.13.13.0/33'))).toBe('InvalidRequest');
    expect(errorCode(() => parseCidr('10.13.13.0/x'))).toBe('InvalidRequest');
    expect(errorCode(() => parseCidr('10.13.13.0/24/1'))).toBe('InvalidRequest');
  });

  it('computes inclusive ranges', () => {
    expect(blockRange(parseCidr('10.13.13.8/29'))).toEqual({
      start: ipToNumber('10.13.13.8'),
      end: ipToNumber('10.13.13.15'),
    });
    expect(blockRange(parseCidr('0.0.0.0/0'))).toEqual({ start: 0, end: 4294967295 });
  });

  it('detects overlapping blocks', () => {
    expect(cidrsOverlap('10.13.13.8/29', '10.13.13.12/32')).toBe(true);
    expect(cidrsOverlap('10.13.13.8/29', '10.13.13.16/32')).toBe(false);
    expect(cidrsOverlap('10.13.13.0/24', '10.13.13.200')).toBe(true);
  });
});

describe('parseSubnet', () => {
  it('takes the host part as the interface address', () => {
    const subnet = parseSubnet('10.13.13.1/24');
    expect(subnet).toEqual({
      network: ipToNumber('10.13.13.0'),
      prefix: 24,
      gateway: ipToNumber('10.13.13.1'),
    });
    expect(formatSubnet(subnet)).toBe('10.13.13.0/24');
  });

  it('defaults the interface address to the first host', () => {
    expect(parseSubnet('10.13.13.0/24').gateway).toBe(ipToNumber('10.13.13.1'));
  });

  it('accepts an explicit interface address inside the subnet only', () => {
    expect(parseSubnet('10.13.13.0/24', '10.13.13.254').gateway).toBe(ipToNumber('10.13.13.254'));
    expect(errorCode(() => parseSubnet('10.13.13.0/24', '10.13.14.1'))).toBe('InvalidRequest');
  });

  it('requires a prefix', () => {
    expect(errorCode(() => parseSubnet('10.13.13.1'))).toBe('InvalidRequest');
  });
});

describe('reserved and host addresses', () => {
  it('reserves network, interface and broadcast up to /30', () => {
    expect(reservedAddresses(parseSubnet('10.13.13.1/24')).map(numberToIp)).toEqual([
      '10.13.13.0',
      '10.13.13.1',
      '10.13.13.255',
    ]);
    expect(hostRange(parseCidr('10.13.13.0/24'))).toEqual({
      start: ipToNumber('10.13.13.1'),
      end: ipToNumber('10.13.13.254'),
    });
  });

  it('has no network or broadcast address for /31 and /32', () => {
    const subnet = parseSubnet('10.0.0.0/31');
    expect(reservedAddresses(subnet).map(numberToIp)).toEqual(['10.0.0.0']);
    expect(hostRange(subnet)).toEqual({ start: ipToNumber('10.0.0.0'), end: ipToNumber('10.0.0.1') });
  });
});
