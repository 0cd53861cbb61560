import { describe, expect, it } from 'vitest';
import { cidrsOverlap, isValidCidr, isValidDomain, parseCidr } from '../../src/utils/network.js';
import { arrayField, fieldAt, numberField, stringField } from '../../src/utils/type-guards.js';

describe('network helpers', () => {
  it('should parse a CIDR block to its network address', () => {
    expect(parseCidr('10.0.0.5/24')).toEqual({ network: 167772160, prefix: 24 });
    expect(parseCidr('10.0.0.0/33')).toBeUndefined();
    expect(parseCidr('256.0.0.0/8')).toBeUndefined();
    expect(isValidCidr('35.235.240.0/20')).toBe(true);
    expect(isValidCidr('not-a-cidr')).toBe(false);
  });

  it('should detect overlapping ranges', () => {
    expect(cidrsOverlap('10.0.0.0/24', '10.0.0.128/25')).toBe(true);
    expect(cidrsOverlap('10.0.0.0/8', '10.2.0.0/16')).toBe(true);
    expect(cidrsOverlap('10.0.0.0/24', '10.1.0.0/16')).toBe(false);
    expect(cidrsOverlap('10.1.0.0/16', '10.2.0.0/16')).toBe(false);
  });

  it('should accept fully qualified domains only', () => {
    expect(isValidDomain('n8n-dev.example.com')).toBe(true);
    expect(isValidDomain('localhost')).toBe(false);
    expect(isValidDomain('-bad.example.com')).toBe(false);
    expect(isValidDomain('under_score.example.com')).toBe(false);
  });
});

describe('type guards', () => {
  const live = { status: { loadBalancer: { ingress: [{ ip: '203.0.113.10' }] }, replicas: 2 } };

  it('should follow nested fields', () => {
    expect(fieldAt(live, 'status', 'replicas')).toBe(2);
    expect(numberField(live, 'status', 'replicas')).toBe(2);
    expect(stringField(live, 'status', 'replicas')).toBeUndefined();
    expect(arrayField(live, 'status', 'loadBalancer', 'ingress')).toHaveLength(1);
    expect(arrayField(live, 'status', 'missing')).toEqual([]);
    expect(fieldAt(live, 'status', 'replicas', 'deeper')).toBeUndefined();
  });
});
