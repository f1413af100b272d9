/**
 * Policy Mapper Unit Tests
 */

import { PolicyMapper, mapPolicy, resolvePolicy, complianceReferences } from '../../src/core/PolicyMapper.js';
import type { Policy } from '../../src/types/policy.js';
import { buildCatalog, policy, policyA, policyB } from '../fixtures/catalog.js';

describe('mapPolicy()', () => {
  const catalog = buildCatalog();

  it('should map a control reference to its standard', () => {
    expect(mapPolicy(policyA, catalog)).toEqual(new Map([['SOC-2', new Set(['CC6.1'])]]));
  });

  it('should not add a standard referenced without a control', () => {
    expect(mapPolicy(policyB, catalog).size).toBe(0);
  });

  it('should add the standard once a control is referenced alongside a bare reference', () => {
    const mapping = mapPolicy(policy('mixed', ['SOC-2', 'SOC-2-CC6.2']), catalog);
    expect(mapping).toEqual(new Map([['SOC-2', new Set(['CC6.2'])]]));
  });

  it('should drop references to unknown standards', () => {
    const mapping = mapPolicy(policy('unknown-refs', ['PCI-DSS-1.1', 'HIPAA', 'ISO-27001-A.5.1']), catalog);
    expect([...mapping.keys()]).toEqual(['ISO-27001']);
  });

  it('should collapse duplicate control references', () => {
    const mapping = mapPolicy(policy('dupes', ['SOC-2-CC6.1', 'SOC-2-CC6.1', 'SOC-2-CC6.2']), catalog);
    expect(mapping.get('SOC-2')).toEqual(new Set(['CC6.1', 'CC6.2']));
  });

  it('should accept control ids the standard does not declare', () => {
    const mapping = mapPolicy(policy('custom', ['SOC-2-CC99']), catalog);
    expect(mapping.get('SOC-2')).toEqual(new Set(['CC99']));
  });

  it('should keep hyphenated control ids whole', () => {
    const mapping = mapPolicy(policy('hyphens', ['ISO-27001-A-8-2']), catalog);
    expect(mapping.get('ISO-27001')).toEqual(new Set(['A-8-2']));
  });

  it('should return an empty mapping when metadata is missing', () => {
    expect(mapPolicy({}, catalog).size).toBe(0);
    expect(mapPolicy({ metadata: { name: 'no-refs' } }, catalog).size).toBe(0);
  });

  it('should be idempotent', () => {
    const multi = policy('multi', ['SOC-2-CC6.1', 'ISO-27001-A.8.2']);
    expect(mapPolicy(multi, catalog)).toEqual(mapPolicy(multi, catalog));
    expect(multi.metadata?.compliance).toEqual(['SOC-2-CC6.1', 'ISO-27001-A.8.2']);
  });
});

describe('resolvePolicy()', () => {
  const catalog = buildCatalog();

  it('should return the mapping and unresolved references together', () => {
    const p = policy('partial', ['SOC-2-CC6.1', 'PCI-DSS-1.1', 'SOC-2', 'GDPR', 'ISO-27001-A.8.2']);

    expect(resolvePolicy(p, catalog)).toEqual({
      mapping: new Map([['SOC-2', new Set(['CC6.1'])], ['ISO-27001', new Set(['A.8.2'])]]),
      unresolved: ['PCI-DSS-1.1', 'GDPR'],
    });
  });

  it('should agree with mapPolicy', () => {
    const p = policy('multi', ['SOC-2-CC6.2', 'ISO-27001-A.5.1', 'HIPAA-164-312']);
    expect(resolvePolicy(p, catalog).mapping).toEqual(mapPolicy(p, catalog));
  });

  it('should resolve a policy without references to nothing', () => {
    expect(resolvePolicy({}, catalog)).toEqual({ mapping: new Map(), unresolved: [] });
  });
});

describe('complianceReferences()', () => {
  it('should skip non-string entries', () => {
    const raw: Policy = JSON.parse('{"metadata":{"compliance":["SOC-2-CC6.1",42,null]}}');
    expect(complianceReferences(raw)).toEqual(['SOC-2-CC6.1']);
  });

  it('should treat a non-array compliance value as no references', () => {
    const raw: Policy = JSON.parse('{"metadata":{"compliance":"SOC-2-CC6.1"}}');
    expect(complianceReferences(raw)).toEqual([]);
  });
});

describe('PolicyMapper', () => {
  const mapper = new PolicyMapper(buildCatalog());

  it('should map with its bound catalog', () => {
    expect(mapper.map(policyA)).toEqual(new Map([['SOC-2', new Set(['CC6.1'])]]));
  });

  it('should list references to standards outside the catalog', () => {
    const p = policy('partial', ['SOC-2-CC6.1', 'PCI-DSS-1.1', 'GDPR', 'SOC-2']);
    expect(mapper.unresolvedReferences(p)).toEqual(['PCI-DSS-1.1', 'GDPR']);
  });
});
