/**
 * Compliance Mapper Unit Tests
 */

import { ComplianceMapper } from '../../src/core/ComplianceMapper.js';
import { UnknownStandardError } from '../../src/core/errors.js';
import { buildCatalog, policy, policyA, policyB } from '../fixtures/catalog.js';

const mockLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
};

describe('ComplianceMapper', () => {
  let mapper: ComplianceMapper;

  beforeEach(() => {
    jest.clearAllMocks();
    mapper = new ComplianceMapper(buildCatalog(), mockLogger);
  });

  it('should map a single policy', () => {
    expect(mapper.mapPolicy(policyA)).toEqual(new Map([['SOC-2', new Set(['CC6.1'])]]));
    expect(mapper.mapPolicy(policyB)).toEqual(new Map());
  });

  it('should generate a report and log its scope', () => {
    const report = mapper.generateReport([policyA, policyB]);

    expect(report.summary.standardsCovered).toEqual(new Set(['SOC-2']));
    expect(report.summary.controlsCovered).toEqual(new Map([['SOC-2', new Set(['CC6.1'])]]));
    expect(mockLogger.info).toHaveBeenCalledWith('Mapping 2 policies against 2 standards');
    expect(mockLogger.info).toHaveBeenCalledWith('Policies reference 1 known standards');
  });

  it('should check a gap against an explicit control list', () => {
    const gap = mapper.checkGap('SOC-2', [policyA, policyB], ['CC6.1', 'CC6.2']);

    expect(gap.implementedControls).toEqual(new Set(['CC6.1']));
    expect(gap.missingControls).toEqual(new Set(['CC6.2']));
    expect(gap.coveragePercentage).toBe(50);
    expect(mockLogger.info).toHaveBeenCalledWith('SOC-2: 1 implemented, 1 missing (50.0% coverage)');
  });

  it('should require every catalog control when no list is given', () => {
    const gap = mapper.checkGap('ISO-27001', [policy('iso', ['ISO-27001-A.8.2'])]);

    expect(gap.requiredControls).toEqual(['A.5.1', 'A.8.2']);
    expect(gap.missingControls).toEqual(new Set(['A.5.1']));
  });

  it('should propagate UnknownStandardError', () => {
    expect(() => mapper.checkGap('ISO-9999', [policyA], ['A.1'])).toThrow(UnknownStandardError);
    expect(() => mapper.checkGap('ISO-9999', [policyA])).toThrow(UnknownStandardError);
  });
});
