/**
 * HTML Reporter Tests
 */

import { ReportAggregator } from '../../src/core/ReportAggregator.js';
import { escapeHtml, renderReportHtml } from '../../src/reporters/HtmlReporter.js';
import { buildCatalog, policy } from '../fixtures/catalog.js';
import { buildReport, emptyReport } from '../fixtures/reports.js';

describe('HtmlReporter', () => {
  describe('escapeHtml()', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
        '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
      );
    });
  });

  describe('renderReportHtml()', () => {
    const html = renderReportHtml(buildReport(), { title: 'Q3 Coverage', generatedAt: '2026-01-15T00:00:00.000Z' });

    it('should render a complete document', () => {
      expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
      expect(html).toContain('<title>Q3 Coverage</title>');
      expect(html).toContain('<p class="timestamp">Generated 2026-01-15T00:00:00.000Z</p>');
    });

    it('should summarise policies and standards', () => {
      expect(html).toContain('Policies analysed: <strong>3</strong>');
      expect(html).toContain('standards covered: <strong>2</strong>');
    });

    it('should list sorted controls per standard', () => {
      expect(html).toContain('<td><code>A.5.1</code> <code>A.8.2</code></td>');
      expect(html).toContain('<td><code>CC6.1</code> <code>CC6.2</code></td>');
    });

    it('should mark policies without mapped standards', () => {
      expect(html).toContain(
        '<tr><td>bare-reference-policy</td><td colspan="2"><em>No mapped standards</em></td></tr>'
      );
    });

    it('should escape policy names', () => {
      const report = new ReportAggregator(buildCatalog()).aggregate([policy('<b>bold</b>', ['SOC-2-CC6.1'])]);
      const output = renderReportHtml(report);

      expect(output).toContain('<td>&lt;b&gt;bold&lt;/b&gt;</td>');
      expect(output).not.toContain('<b>bold</b>');
    });

    it('should render an empty report', () => {
      const output = renderReportHtml(emptyReport());

      expect(output).toContain('<title>Policy Compliance Report</title>');
      expect(output).toContain('<em>No standards covered</em>');
    });
  });
});
