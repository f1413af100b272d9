/**
 * Definition File Guard Tests
 */

import { validateYamlSafety } from '../../src/utils/validation.js';
import { LIMITS } from '../../src/utils/constants.js';

describe('validateYamlSafety()', () => {
  it('should accept ordinary YAML', () => {
    expect(validateYamlSafety('metadata:\n  name: access-policy\n')).toEqual({ safe: true });
  });

  it('should accept a standard that reuses a few anchors', () => {
    const content = [
      'standard: {id: SOC-2, name: SOC 2, version: "2017"}',
      'controls:',
      '  - id: CC6.1',
      '    title: Logical Access Controls',
      '    description: Restrict logical access.',
      '    checks: &access-checks [{type: policy-exists}]',
      '  - id: CC6.2',
      '    title: User Registration',
      '    description: Register users.',
      '    checks: *access-checks',
    ].join('\n');

    expect(validateYamlSafety(content).safe).toBe(true);
  });

  it('should reject oversized content', () => {
    const result = validateYamlSafety('a'.repeat(LIMITS.YAML_MAX_SIZE_BYTES + 1));

    expect(result).toEqual({
      safe: false,
      error: 'content is 1048577 bytes; definition files are limited to 1048576 bytes',
    });
  });

  it('should reject excessive aliases', () => {
    const content = Array.from({ length: 51 }, (_, i) => `k${i}: *a`).join('\n');

    expect(validateYamlSafety(content)).toEqual({
      safe: false,
      error: '51 aliases exceed the limit of 50 per definition file',
    });
  });

  it('should count hyphenated alias names', () => {
    const content = Array.from({ length: 51 }, (_, i) => `k${i}: *access-checks`).join('\n');

    expect(validateYamlSafety(content).safe).toBe(false);
  });

  it('should reject long runs of aliases in one list', () => {
    const content = `a: &a [x]\nb: [${Array.from({ length: 10 }, () => '*a').join(', ')}, *a]\n`;

    expect(validateYamlSafety(content)).toEqual({
      safe: false,
      error: 'list of 10 or more consecutive aliases (alias expansion)',
    });
  });
});
